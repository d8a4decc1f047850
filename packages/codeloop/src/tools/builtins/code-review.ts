import type { ILogObj, Logger } from "tslog";
import * as z from "zod";
import { Agent } from "../../agent/agent.js";
import type { RetryConfig } from "../../core/retry.js";
import type { ModelTransport } from "../../transport/transport.js";
import { ToolRegistry } from "../registry.js";
import { AbstractTool } from "../tool.js";
import { type ExecutionContext, failureResult, successResult, type ToolResult } from "../types.js";

/** Tools the reviewing sub-agent may use. */
export const REVIEW_TOOL_NAMES = ["execute_shell", "read_code", "search_code", "ask_user"] as const;

const REVIEW_SYSTEM_PROMPT = `You are a code reviewer. Review one commit against the requirement it implements.

Check:
1. Requirement alignment: missing functionality or over-implementation.
2. Correctness and error handling.
3. Security: input validation, injection, handling of secrets.
4. Tests: coverage of new code and edge cases.
5. Readability and consistency with the surrounding code.

Start with \`git show --stat <commit>\` and \`git show <commit>\`, then read the changed files as needed.
Reference concrete files and lines in every finding.`;

const REVIEW_SUMMARY_PROMPT = `Report the findings of the review in YAML:
findings:
  - file: <path>
    lines: [<start>, <end>]
    severity: critical | major | minor
    description: <problem>
    suggestion: <fix>
If there are no findings, reply with "findings: []".`;

const codeReviewSchema = z.object({
  commit: z.string().min(1).describe("Commit to review (hash or ref)"),
  requirement: z.string().min(1).describe("Requirement the commit should implement"),
});

export interface CodeReviewToolOptions {
  /** Creates the transport of each review; every sub-agent owns its session. */
  createTransport: () => ModelTransport;
  /** Tools offered to the reviewer, filtered to {@link REVIEW_TOOL_NAMES}. */
  tools: readonly AbstractTool[];
  retry?: RetryConfig;
  logger?: Logger<ILogObj>;
}

/**
 * code_review - delegates the review of a commit to a sub-agent with read-only
 * tools and returns its structured findings.
 */
export class CodeReviewTool extends AbstractTool<typeof codeReviewSchema> {
  readonly name = "code_review";
  readonly description =
    "Review a commit against a requirement. A separate reviewer inspects the changes and returns findings with severity and suggestions.";
  readonly parameterSchema = codeReviewSchema;

  constructor(private readonly options: CodeReviewToolOptions) {
    super();
    this.examples = [
      {
        params: { commit: "HEAD", requirement: "Retry failed model calls with exponential backoff" },
        comment: "Review the latest commit",
      },
    ];
  }

  async execute(params: z.output<typeof codeReviewSchema>, ctx: ExecutionContext): Promise<ToolResult> {
    const registry = new ToolRegistry({ cwd: ctx.cwd, logger: ctx.logger })
      .registerMany(this.options.tools)
      .useTools(REVIEW_TOOL_NAMES)
      .dontUseTools([this.name]);

    const reviewer = new Agent({
      name: "code-review",
      transport: this.options.createTransport(),
      registry,
      systemPrompt: REVIEW_SYSTEM_PROMPT,
      subAgent: true,
      autoComplete: true,
      summaryPrompt: REVIEW_SUMMARY_PROMPT,
      retry: this.options.retry,
      logger: this.options.logger ?? ctx.logger,
    });

    const result = await reviewer.run(`Review commit ${params.commit} for this requirement: ${params.requirement}`);
    if (result.status !== "completed") {
      return failureResult(`Review ${result.status}: ${result.output}`);
    }
    return successResult(result.output);
  }
}
