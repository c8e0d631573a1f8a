import { mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import { FileWriteError } from "../pipeline/errors.js";
import { Logger } from "../pipeline/logger.js";
import type { MaterializeReport, WriteOutcome } from "../pipeline/types.js";
import { resolveSafePath } from "./safe-path.js";

export interface MaterializeOptions {
  rootDir: string;
  logger?: Logger;
}

/**
 * Writes every extracted file under `rootDir`, sequentially and in order.
 * Each file is independent: an unsafe name or a failed write is recorded as a
 * skipped outcome and the remaining files are still attempted.
 */
export function materializeFiles(
  files: Iterable<[string, string]>,
  options: MaterializeOptions
): MaterializeReport {
  const logger = options.logger ?? new Logger();
  const outcomes: WriteOutcome[] = [];

  for (const [requestedPath, content] of files) {
    const outcome = writeOne(requestedPath, content, options.rootDir, logger);
    outcomes.push(outcome);
  }

  return {
    outcomes,
    written: outcomes.flatMap((outcome) => (outcome.status === "written" ? [outcome.path] : [])),
    skipped: outcomes.flatMap((outcome) =>
      outcome.status === "skipped" ? [outcome.requestedPath] : []
    ),
  };
}

function writeOne(requestedPath: string, content: string, rootDir: string, logger: Logger): WriteOutcome {
  const resolved = resolveSafePath(requestedPath, rootDir);
  if (!resolved.safe) {
    logger.warn(`SKIP: ${resolved.reason === "unsafe-path" ? "unsafe" : "empty"} path '${requestedPath}'`, {
      eventType: "file.skip",
      reason: resolved.reason,
    });
    return { status: "skipped", requestedPath, reason: resolved.reason };
  }

  try {
    mkdirSync(dirname(resolved.absolutePath), { recursive: true });
    writeFileSync(resolved.absolutePath, content, "utf-8");
  } catch (cause) {
    const error = new FileWriteError(resolved.path, cause);
    logger.error(error.message, {
      eventType: "file.skip",
      path: resolved.path,
      reason: "io-error",
      errorCode: error.code,
    });
    return { status: "skipped", requestedPath, path: resolved.path, reason: "io-error", error };
  }

  const bytes = Buffer.byteLength(content, "utf-8");
  logger.info(`Written: ${resolved.path} (${content.length.toLocaleString("en-US")} chars)`, {
    eventType: "file.write",
    path: resolved.path,
    bytes,
  });
  return { status: "written", requestedPath, path: resolved.path, chars: content.length, bytes };
}
