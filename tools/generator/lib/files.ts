import { existsSync, mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "fs";
import { dirname } from "path";
import { InputError } from "../pipeline/errors.js";
import { emitAgentEvent } from "../pipeline/events.js";

export const STDIN_PATH = "-";

export function ensureDir(path: string): void {
  mkdirSync(path, { recursive: true });
}

/** Reads the response text from a file, or from stdin when `path` is `-`. */
export function readResponseText(path: string): string {
  const source = path === STDIN_PATH ? "<stdin>" : path;
  emitAgentEvent({
    level: "debug",
    eventType: "file.read",
    message: "Reading response text",
    path: source,
  });

  if (path !== STDIN_PATH && !existsSync(path)) {
    throw new InputError(`Response file not found: ${path}`);
  }

  try {
    return readFileSync(path === STDIN_PATH ? 0 : path, "utf-8");
  } catch (error) {
    throw new InputError(`Could not read response text from ${source}`, error);
  }
}

export function writeJsonAtomic(path: string, value: unknown): void {
  writeTextAtomic(path, `${JSON.stringify(value, null, 2)}\n`);
}

export function writeTextAtomic(path: string, content: string): void {
  ensureDir(dirname(path));
  emitAgentEvent({
    level: "debug",
    eventType: "file.write",
    message: "Writing text file atomically",
    path,
    bytes: Buffer.byteLength(content, "utf-8"),
  });
  const tmpPath = `${path}.tmp-${process.pid}-${Date.now()}`;
  writeFileSync(tmpPath, content, "utf-8");
  try {
    renameSync(tmpPath, path);
  } catch (error) {
    rmSync(tmpPath, { force: true });
    throw error;
  }
}
