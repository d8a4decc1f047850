import { isAbsolute, relative, resolve, sep } from "node:path";

/**
 * Path outside the working directory.
 */
export class PathSandboxError extends Error {
  constructor(path: string, root: string) {
    super(`Path is outside the working directory (${root}): ${path}`);
    this.name = "PathSandboxError";
  }
}

/**
 * Resolves `path` against `root`, rejecting anything that escapes it.
 */
export function resolveWithinRoot(root: string, path: string): string {
  const absoluteRoot = resolve(root);
  const target = resolve(absoluteRoot, path);
  const rel = relative(absoluteRoot, target);
  if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    throw new PathSandboxError(path, absoluteRoot);
  }
  return target;
}

/**
 * Repository-relative form of a path, with forward slashes.
 */
export function toRepoPath(root: string, path: string): string {
  return relative(resolve(root), resolveWithinRoot(root, path)).split(sep).join("/");
}
