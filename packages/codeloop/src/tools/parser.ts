import { load, YAMLException } from "js-yaml";
import { TOOL_CALL_END, TOOL_CALL_START } from "../core/constants.js";
import { MalformedCallError } from "../core/errors.js";
import { err, ok, type Result } from "../core/result.js";
import { isRecord } from "./tool.js";
import type { ToolCall } from "./types.js";

export interface ToolCallParserOptions {
  startMarker?: string;
  endMarker?: string;
}

export interface ExtractedToolCall {
  call: ToolCall;
  /** Complete blocks after the first one; they are not executed. */
  ignoredBlocks: number;
}

/** 1-based line number of a character offset. */
function lineAt(text: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset && i < text.length; i++) {
    if (text[i] === "\n") line++;
  }
  return line;
}

/**
 * Remove a markdown fence (```yaml ... ```) wrapped around a block body.
 * Returns the number of leading lines removed so error positions stay accurate.
 *
 * @internal Exported for testing
 */
export function stripMarkdownFences(body: string): { content: string; removedLeadingLines: number } {
  const lines = body.split("\n");
  let removedLeadingLines = 0;

  while (lines.length > 0 && lines[0]?.trim() === "") {
    lines.shift();
    removedLeadingLines++;
  }
  if (lines.length > 0 && /^```[a-z]*\s*$/i.test(lines[0] ?? "")) {
    lines.shift();
    removedLeadingLines++;
    while (lines.length > 0 && lines[lines.length - 1]?.trim() === "") {
      lines.pop();
    }
    if (lines.length > 0 && /^```\s*$/.test(lines[lines.length - 1] ?? "")) {
      lines.pop();
    }
  }

  return { content: lines.join("\n"), removedLeadingLines };
}

/**
 * Extracts a single tool call from model output.
 *
 * The call is a YAML document between the start and end markers:
 *
 * ```
 * <START_TOOL_CALL>
 * name: read_code
 * arguments:
 *     files:
 *         - path: src/index.ts
 * <END_TOOL_CALL>
 * ```
 *
 * Text outside the markers is ignored. An opening marker without a closing one is
 * malformed: responses are parsed whole, never as a stream.
 */
export class ToolCallParser {
  readonly startMarker: string;
  readonly endMarker: string;

  constructor(options: ToolCallParserOptions = {}) {
    this.startMarker = options.startMarker ?? TOOL_CALL_START;
    this.endMarker = options.endMarker ?? TOOL_CALL_END;
  }

  /** Whether the text contains an opening marker at all. */
  hasDirective(text: string): boolean {
    return text.includes(this.startMarker);
  }

  extract(text: string): Result<ExtractedToolCall | undefined, MalformedCallError> {
    const startIndex = text.indexOf(this.startMarker);
    if (startIndex === -1) {
      return ok(undefined);
    }

    const bodyStart = startIndex + this.startMarker.length;
    const endIndex = text.indexOf(this.endMarker, bodyStart);
    if (endIndex === -1) {
      return err(
        new MalformedCallError(`Missing closing marker ${this.endMarker}`, {
          line: lineAt(text, startIndex),
        }),
      );
    }

    const ignoredBlocks = this.countCompleteBlocks(text, endIndex + this.endMarker.length);
    const rawBody = text.slice(bodyStart, endIndex);
    if (rawBody.trim() === "") {
      return ok(undefined);
    }

    const { content, removedLeadingLines } = stripMarkdownFences(rawBody);
    const firstBodyLine = lineAt(text, bodyStart) + removedLeadingLines;

    let document: unknown;
    try {
      document = load(content);
    } catch (error) {
      if (error instanceof YAMLException) {
        return err(
          new MalformedCallError(`Invalid tool call body: ${error.reason}`, {
            line: firstBodyLine + error.mark.line,
            column: error.mark.column + 1,
          }),
        );
      }
      return err(new MalformedCallError(`Invalid tool call body: ${String(error)}`));
    }

    const call = this.toToolCall(document, lineAt(text, startIndex));
    if (!call.ok) {
      return call;
    }
    return ok({ call: call.value, ignoredBlocks });
  }

  private toToolCall(document: unknown, line: number): Result<ToolCall, MalformedCallError> {
    if (!isRecord(document)) {
      return err(
        new MalformedCallError("Tool call body must be a mapping with 'name' and 'arguments'", { line }),
      );
    }
    if (!("name" in document)) {
      return err(new MalformedCallError("Missing required key 'name'", { line }));
    }
    if (typeof document.name !== "string" || document.name.trim() === "") {
      return err(new MalformedCallError("'name' must be a non-empty string", { line }));
    }
    if (!("arguments" in document)) {
      return err(new MalformedCallError("Missing required key 'arguments'", { line }));
    }

    const args = document.arguments ?? {};
    if (!isRecord(args)) {
      return err(new MalformedCallError("'arguments' must be a mapping", { line }));
    }

    return ok({ name: document.name.trim(), arguments: args });
  }

  private countCompleteBlocks(text: string, from: number): number {
    let count = 0;
    let cursor = from;
    while (true) {
      const start = text.indexOf(this.startMarker, cursor);
      if (start === -1) break;
      const end = text.indexOf(this.endMarker, start + this.startMarker.length);
      if (end === -1) break;
      count++;
      cursor = end + this.endMarker.length;
    }
    return count;
  }
}
