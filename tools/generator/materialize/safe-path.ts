import { isAbsolute, posix, relative, resolve, sep } from "path";

export type SafePathResult =
  | { safe: true; path: string; absolutePath: string }
  | { safe: false; reason: "unsafe-path" | "empty-path" };

const DRIVE_PREFIX = /^[A-Za-z]:/;

/**
 * Validates an untrusted relative path against `root` without touching the
 * filesystem. `path` is the normalized POSIX form, `absolutePath` the location
 * it resolves to under `root`.
 */
export function resolveSafePath(candidate: string, root: string): SafePathResult {
  const cleaned = candidate.replace(/\\/g, "/").trim();
  if (cleaned.startsWith("/") || DRIVE_PREFIX.test(cleaned)) {
    return { safe: false, reason: "unsafe-path" };
  }

  const normalized = posix.normalize(cleaned);
  if (isParentTraversal(normalized)) {
    return { safe: false, reason: "unsafe-path" };
  }
  if (normalized === "." || normalized.endsWith("/")) {
    return { safe: false, reason: "empty-path" };
  }

  const rootDir = resolve(root);
  const absolutePath = resolve(rootDir, ...normalized.split("/"));
  const fromRoot = relative(rootDir, absolutePath);
  if (!fromRoot || isAbsolute(fromRoot) || fromRoot === ".." || fromRoot.startsWith(`..${sep}`)) {
    return { safe: false, reason: "unsafe-path" };
  }

  return { safe: true, path: normalized, absolutePath };
}

function isParentTraversal(normalized: string): boolean {
  return normalized === ".." || normalized.startsWith("../");
}
