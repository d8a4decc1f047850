/**
 * Output handlers decide what a model response means.
 *
 * The agent asks each handler in order whether it recognises the response; the
 * first one that does turns the response into the text of the next tool turn.
 */

import type { AgentError } from "../core/errors.js";
import type { PatchEngine } from "../patch/engine.js";
import { containsPatchBlock } from "../patch/parser.js";
import { type PatchProtocol, patchInstructions } from "../patch/prompts.js";
import type { PatchApplyReport } from "../patch/types.js";
import { ToolErrorFormatter } from "../tools/error-formatter.js";
import { ToolCallParser } from "../tools/parser.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { ToolCall, ToolResult } from "../tools/types.js";
import { toolCallInstructions } from "./prompts.js";

export interface HandlerOutcome {
  /** Text appended to the conversation as a tool turn. */
  message: string;
  toolCall?: ToolCall;
  result?: ToolResult;
  patchReport?: PatchApplyReport;
  /** Recoverable failure to show the human before the model sees it. */
  error?: AgentError;
}

export interface OutputHandler {
  readonly name: string;
  canHandle(response: string): boolean;
  handle(response: string): Promise<HandlerOutcome>;
  /** Protocol description for the system prompt. */
  instructions(): string;
}

/**
 * Executes the single tool call of a response through a {@link ToolRegistry}.
 */
export class ToolCallHandler implements OutputHandler {
  readonly name = "tool-call";
  private readonly formatter = new ToolErrorFormatter();

  constructor(
    private readonly registry: ToolRegistry,
    private readonly parser = new ToolCallParser(),
  ) {}

  /** A block that parses to nothing (empty body) is not handled. */
  canHandle(response: string): boolean {
    if (!this.parser.hasDirective(response)) {
      return false;
    }
    const extracted = this.parser.extract(response);
    return !extracted.ok || extracted.value !== undefined;
  }

  async handle(response: string): Promise<HandlerOutcome> {
    const extracted = this.parser.extract(response);
    if (!extracted.ok) {
      return { message: this.formatter.formatParseError(extracted.error.message), error: extracted.error };
    }
    if (!extracted.value) {
      return { message: "The tool call block was empty; no tool was run." };
    }

    const { call, ignoredBlocks } = extracted.value;
    const result = await this.registry.executeCall(call);
    let message = this.registry.formatResult(result);
    if (ignoredBlocks > 0) {
      message += `\nNote: ${ignoredBlocks} more tool call block(s) in your response were ignored. Only one tool call is executed per response.`;
    }
    return { message, toolCall: call, result };
  }

  instructions(): string {
    return toolCallInstructions(this.registry.toolHelpText());
  }
}

/**
 * Applies the `<PATCH>` blocks of a response with a {@link PatchEngine}.
 */
export class PatchOutputHandler implements OutputHandler {
  readonly name = "patch";

  constructor(
    private readonly engine: PatchEngine,
    private readonly protocol: PatchProtocol = "search-replace",
  ) {}

  canHandle(response: string): boolean {
    return containsPatchBlock(response);
  }

  async handle(response: string): Promise<HandlerOutcome> {
    const report = await this.engine.apply(response);
    return { message: report.summary, patchReport: report };
  }

  instructions(): string {
    return patchInstructions(this.protocol);
  }
}
