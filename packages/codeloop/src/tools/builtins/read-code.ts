import { readFile } from "node:fs/promises";
import * as z from "zod";
import { describeError } from "../../core/errors.js";
import { createTool } from "../create-tool.js";
import { failureResult, successResult } from "../types.js";
import { resolveWithinRoot } from "../../core/paths.js";

export interface LineRange {
  start?: number;
  /** Inclusive; -1 means the last line. */
  end?: number;
}

/**
 * Renders the selected lines with right-aligned 1-based line numbers.
 *
 * @internal Exported for testing
 */
export function numberLines(path: string, content: string, range: LineRange = {}): string {
  const lines = content.split("\n");
  if (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  const total = lines.length;
  if (total === 0) {
    return `File: ${path} (empty)`;
  }

  const start = range.start ?? 1;
  const end = range.end === undefined || range.end === -1 ? total : Math.min(range.end, total);
  if (start > total) {
    throw new Error(`start_line ${start} exceeds the length of ${path} (${total} lines)`);
  }
  if (start > end) {
    throw new Error(`start_line ${start} is after end_line ${end}`);
  }

  const width = String(end).length;
  const body = lines
    .slice(start - 1, end)
    .map((line, index) => `${String(start + index).padStart(width, " ")} | ${line}`);
  return [`File: ${path} (lines ${start}-${end} of ${total})`, ...body].join("\n");
}

/**
 * read_code - returns files (or line ranges of them) with line numbers.
 */
export const readCode = createTool({
  name: "read_code",
  description:
    "Read one or more source files with line numbers. Use start_line/end_line to read part of a large file.",
  schema: z.object({
    files: z
      .array(
        z.object({
          path: z.string().describe("File path relative to the repository root"),
          start_line: z.number().int().min(1).optional().describe("First line to read (1-based)"),
          end_line: z
            .number()
            .int()
            .min(-1)
            .optional()
            .describe("Last line to read, inclusive (-1 for end of file)"),
        }),
      )
      .min(1)
      .describe("Files to read"),
  }),
  examples: [
    {
      params: { files: [{ path: "src/math.ts", start_line: 1, end_line: 3 }] },
      output:
        "Status: success\nStdout:\nFile: src/math.ts (lines 1-3 of 40)\n1 | export function add(a: number, b: number) {\n2 |   return a + b;\n3 | }",
      comment: "Read the first three lines of a file",
    },
  ],
  execute: async ({ files }, ctx) => {
    const sections: string[] = [];
    const errors: string[] = [];

    for (const file of files) {
      try {
        const content = await readFile(resolveWithinRoot(ctx.cwd, file.path), "utf-8");
        sections.push(numberLines(file.path, content, { start: file.start_line, end: file.end_line }));
      } catch (error) {
        errors.push(`${file.path}: ${describeError(error)}`);
      }
    }

    const stdout = sections.join("\n\n");
    if (errors.length > 0) {
      return failureResult(`Failed to read ${errors.length} file(s)`, stdout, errors.join("\n"));
    }
    return successResult(stdout);
  },
});
