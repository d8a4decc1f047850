import { PatchMatchError } from "../core/errors.js";
import { err, ok, type Result } from "../core/result.js";
import { classifyPatch, type Patch } from "./types.js";

/**
 * File content after a patch; `undefined` means the file does not exist.
 */
export type FileContent = string | undefined;

/**
 * Anchors whose last line is the file's unterminated final line. The replacement
 * keeps the file without a trailing newline.
 */
function matchFinalLine(content: string, patch: Patch): string | undefined {
  if (!patch.oldCode.endsWith("\n")) {
    return undefined;
  }
  const anchor = patch.oldCode.slice(0, -1);
  const start = content.length - anchor.length;
  if (!content.endsWith(anchor) || (start > 0 && content[start - 1] !== "\n")) {
    return undefined;
  }
  const replacement = patch.newCode.endsWith("\n") ? patch.newCode.slice(0, -1) : patch.newCode;
  return content.slice(0, start) + replacement;
}

/**
 * Applies one patch to in-memory content.
 *
 * An anchored patch replaces only the first occurrence of its old code and fails
 * when that code is absent, so applying it a second time is an error rather than
 * a silent no-op.
 */
export function applyPatchToContent(
  filePath: string,
  content: FileContent,
  patch: Patch,
): Result<FileContent, PatchMatchError> {
  switch (classifyPatch(patch)) {
    case "delete":
      return ok(undefined);
    case "replace-file":
      return ok(patch.newCode);
    case "anchored": {
      if (content === undefined) {
        return err(new PatchMatchError(filePath, patch.oldCode));
      }
      const index = content.indexOf(patch.oldCode);
      if (index !== -1) {
        return ok(content.slice(0, index) + patch.newCode + content.slice(index + patch.oldCode.length));
      }
      const tail = matchFinalLine(content, patch);
      if (tail === undefined) {
        return err(new PatchMatchError(filePath, patch.oldCode));
      }
      return ok(tail);
    }
  }
}

/**
 * Applies patches in order, stopping at the first failure.
 */
export function applyPatchesToContent(
  filePath: string,
  content: FileContent,
  patches: readonly Patch[],
): Result<FileContent, PatchMatchError> {
  let current = content;
  for (const patch of patches) {
    const result = applyPatchToContent(filePath, current, patch);
    if (!result.ok) {
      return result;
    }
    current = result.value;
  }
  return ok(current);
}
