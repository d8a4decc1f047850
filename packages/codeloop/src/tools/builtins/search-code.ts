import * as z from "zod";
import { describeError } from "../../core/errors.js";
import { runProcess } from "../../process/run.js";
import { createTool } from "../create-tool.js";
import { failureResult, successResult } from "../types.js";

const DEFAULT_MAX_RESULTS = 200;

/**
 * Builds the `git grep` argv for a search.
 *
 * @internal Exported for testing
 */
export function buildGrepArgs(options: {
  pattern: string;
  paths?: readonly string[];
  ignoreCase?: boolean;
}): string[] {
  const args = ["git", "grep", "-n", "-I", "--untracked"];
  if (options.ignoreCase) {
    args.push("-i");
  }
  args.push("-e", options.pattern);
  if (options.paths && options.paths.length > 0) {
    args.push("--", ...options.paths);
  }
  return args;
}

/**
 * Keeps the first `max` lines of grep output and notes how many were dropped.
 *
 * @internal Exported for testing
 */
export function truncateMatches(output: string, max: number): string {
  const lines = output.split("\n").filter((line) => line !== "");
  if (lines.length <= max) {
    return lines.join("\n");
  }
  return [...lines.slice(0, max), `... (${lines.length - max} more matches)`].join("\n");
}

/**
 * search_code - regular-expression search over the working tree with `git grep`.
 */
export const searchCode = createTool({
  name: "search_code",
  description:
    "Search the repository (tracked and untracked files, .gitignore respected) for a regular expression. Returns matching lines as path:line:text.",
  schema: z.object({
    pattern: z.string().min(1).describe("Basic regular expression to search for"),
    paths: z.array(z.string()).optional().describe("Limit the search to these paths or globs"),
    ignore_case: z.boolean().optional().describe("Case-insensitive search"),
    max_results: z
      .number()
      .int()
      .positive()
      .optional()
      .describe(`Maximum number of matching lines (default: ${DEFAULT_MAX_RESULTS})`),
  }),
  examples: [
    {
      params: { pattern: "createLogger", paths: ["src"] },
      output: "Status: success\nStdout:\nsrc/logger.ts:12:export function createLogger() {",
    },
  ],
  execute: async ({ pattern, paths, ignore_case, max_results }, ctx) => {
    try {
      const { exitCode, stdout, stderr } = await runProcess(
        buildGrepArgs({ pattern, paths, ignoreCase: ignore_case }),
        { cwd: ctx.cwd },
      );
      // git grep exits with 1 when nothing matched
      if (exitCode === 1 && stderr.trim() === "") {
        return successResult("No matches found");
      }
      if (exitCode !== 0) {
        return failureResult(`git grep exited with status ${exitCode}`, "", stderr);
      }
      return successResult(truncateMatches(stdout, max_results ?? DEFAULT_MAX_RESULTS));
    } catch (error) {
      return failureResult(`Could not run git grep: ${describeError(error)}`);
    }
  },
});
