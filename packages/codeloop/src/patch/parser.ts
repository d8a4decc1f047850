import {
  PATCH_DIVIDER_PATTERN,
  PATCH_END,
  PATCH_FILE_PREFIX,
  PATCH_REASON_PREFIX,
  PATCH_REPLACE,
  PATCH_SEARCH,
  PATCH_START,
} from "../core/constants.js";
import { MalformedCallError } from "../core/errors.js";
import { err, ok, type Result } from "../core/result.js";
import type { Patch, PatchBlock } from "./types.js";

export interface PatchParseOptions {
  /** Target of blocks that carry no `File:` line. */
  defaultFile?: string;
}

type ParseResult<T> = Result<T, MalformedCallError>;

interface NumberedLine {
  /** 1-based */
  number: number;
  text: string;
}

function isMarker(line: string, marker: string): boolean {
  return line.trim() === marker;
}

function headerValue(line: string, prefix: string): string | undefined {
  const trimmed = line.trimStart();
  return trimmed.startsWith(prefix) ? trimmed.slice(prefix.length).trim() : undefined;
}

/**
 * Code captured between two markers. Non-empty code always ends with a newline,
 * so `"b"` on its own line is the text `"b\n"` of the file.
 */
function joinCode(lines: readonly NumberedLine[]): string {
  return lines.length === 0 ? "" : `${lines.map((line) => line.text).join("\n")}\n`;
}

function parseSearchReplace(body: readonly NumberedLine[], file: string): ParseResult<Patch[]> {
  const patches: Patch[] = [];
  let state: "between" | "search" | "replace" = "between";
  let sectionStart = 0;
  let oldLines: NumberedLine[] = [];
  let newLines: NumberedLine[] = [];

  for (const line of body) {
    switch (state) {
      case "between":
        if (isMarker(line.text, PATCH_SEARCH)) {
          state = "search";
          sectionStart = line.number;
          oldLines = [];
          newLines = [];
        } else if (line.text.trim() !== "") {
          return err(
            new MalformedCallError(`Unexpected text outside a ${PATCH_SEARCH} section of ${file}`, {
              line: line.number,
            }),
          );
        }
        break;
      case "search":
        if (PATCH_DIVIDER_PATTERN.test(line.text)) {
          state = "replace";
        } else if (isMarker(line.text, PATCH_REPLACE)) {
          return err(
            new MalformedCallError(`Missing ====== divider before ${PATCH_REPLACE}`, { line: line.number }),
          );
        } else {
          oldLines.push(line);
        }
        break;
      case "replace":
        if (isMarker(line.text, PATCH_REPLACE)) {
          patches.push({ oldCode: joinCode(oldLines), newCode: joinCode(newLines) });
          state = "between";
        } else {
          newLines.push(line);
        }
        break;
    }
  }

  if (state !== "between") {
    return err(new MalformedCallError(`Unterminated ${PATCH_SEARCH} section`, { line: sectionStart }));
  }
  return ok(patches);
}

/**
 * Parses every `<PATCH>` block of a response.
 *
 * A block whose body contains a `>>>>>> SEARCH` line holds search/replace
 * pairs; any other block holds a code fragment with context. Both kinds may
 * start with `File:` and `Reason:` header lines. Text outside blocks is ignored.
 *
 * @example
 * ```typescript
 * const result = parsePatchBlocks(response);
 * if (result.ok) {
 *   for (const [file, blocks] of groupBlocksByFile(result.value)) { ... }
 * }
 * ```
 */
export function parsePatchBlocks(text: string, options: PatchParseOptions = {}): ParseResult<PatchBlock[]> {
  const lines = text.split("\n");
  const blocks: PatchBlock[] = [];
  let index = 0;

  while (index < lines.length) {
    if (!isMarker(lines[index] ?? "", PATCH_START)) {
      index++;
      continue;
    }

    const openLine = index + 1;
    let cursor = index + 1;
    let file: string | undefined;
    let reason: string | undefined;

    // Header lines
    while (cursor < lines.length) {
      const line = lines[cursor] ?? "";
      const fileValue = headerValue(line, PATCH_FILE_PREFIX);
      const reasonValue = headerValue(line, PATCH_REASON_PREFIX);
      if (fileValue !== undefined && file === undefined) {
        file = fileValue;
      } else if (reasonValue !== undefined && reason === undefined) {
        reason = reasonValue;
      } else {
        break;
      }
      cursor++;
    }

    const body: NumberedLine[] = [];
    let closed = false;
    while (cursor < lines.length) {
      const line = lines[cursor] ?? "";
      if (isMarker(line, PATCH_END)) {
        closed = true;
        break;
      }
      body.push({ number: cursor + 1, text: line });
      cursor++;
    }

    if (!closed) {
      return err(new MalformedCallError(`Unterminated ${PATCH_START} block`, { line: openLine }));
    }

    const target = file || options.defaultFile;
    if (!target) {
      return err(new MalformedCallError(`Missing required key '${PATCH_FILE_PREFIX.slice(0, -1)}'`, { line: openLine }));
    }

    if (body.some((line) => isMarker(line.text, PATCH_SEARCH))) {
      const patches = parseSearchReplace(body, target);
      if (!patches.ok) {
        return patches;
      }
      blocks.push({ kind: "search-replace", file: target, reason, line: openLine, patches: patches.value });
    } else {
      const code = body.map((line) => line.text).join("\n");
      if (code.trim() === "") {
        return err(new MalformedCallError(`Patch block for ${target} has no code`, { line: openLine }));
      }
      blocks.push({ kind: "context", file: target, reason, line: openLine, code });
    }

    index = cursor + 1;
  }

  return ok(blocks);
}

/**
 * Whether the text contains at least one patch opening marker.
 */
export function containsPatchBlock(text: string): boolean {
  return text.split("\n").some((line) => isMarker(line, PATCH_START));
}

/**
 * Groups blocks by target file, keeping first-appearance order of files and
 * declaration order of blocks within a file.
 */
export function groupBlocksByFile(blocks: readonly PatchBlock[]): Map<string, PatchBlock[]> {
  const groups = new Map<string, PatchBlock[]>();
  for (const block of blocks) {
    const group = groups.get(block.file);
    if (group) {
      group.push(block);
    } else {
      groups.set(block.file, [block]);
    }
  }
  return groups;
}
