import * as z from "zod";
import { DEFAULT_SHELL_TIMEOUT_MS } from "../../core/constants.js";
import { describeError } from "../../core/errors.js";
import { runProcess } from "../../process/run.js";
import { createTool } from "../create-tool.js";
import { failureResult, successResult } from "../types.js";

/**
 * execute_shell - runs a script through `sh -c` in the working directory.
 *
 * The script is passed as a single argv element, never interpolated into a
 * command line. Output streams are returned separately.
 */
export const executeShell = createTool({
  name: "execute_shell",
  description:
    "Execute a shell script in the repository root and return its stdout and stderr. Use it to inspect the project, run tests or build commands.",
  schema: z.object({
    script: z.string().describe("Shell script to run with sh"),
    timeout_ms: z
      .number()
      .int()
      .positive()
      .optional()
      .describe(`Kill the script after this many milliseconds (default: ${DEFAULT_SHELL_TIMEOUT_MS})`),
  }),
  examples: [
    {
      params: { script: "ls src" },
      output: "Status: success\nStdout:\nindex.ts\nutils.ts",
      comment: "List a directory",
    },
    {
      params: { script: "npm test 2>&1 | tail -n 20", timeout_ms: 300000 },
      comment: "Run the test suite with a longer timeout",
    },
  ],
  execute: async ({ script, timeout_ms }, ctx) => {
    if (script.trim() === "") {
      return failureResult("Missing or empty script");
    }

    const timeoutMs = timeout_ms ?? DEFAULT_SHELL_TIMEOUT_MS;
    ctx.logger.debug("Running shell script", { script, timeoutMs });

    try {
      const { exitCode, stdout, stderr, timedOut } = await runProcess(["sh", "-c", script], {
        cwd: ctx.cwd,
        timeoutMs,
      });
      if (timedOut) {
        return failureResult(`Script timed out after ${timeoutMs}ms`, stdout, stderr);
      }
      if (exitCode !== 0) {
        return failureResult(`Script exited with status ${exitCode}`, stdout, stderr);
      }
      return successResult(stdout, stderr);
    } catch (error) {
      return failureResult(`Could not start sh: ${describeError(error)}`);
    }
  },
});
