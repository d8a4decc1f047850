import type { ILogObj, Logger } from "tslog";
import {
  DEFAULT_MAX_TURNS_BEFORE_REMINDER,
  DEFAULT_METHODOLOGY_LIMIT,
  INTERRUPT_INPUT,
  SUMMARIZE_SENTINEL,
  TASK_CANCELLED,
  TASK_COMPLETED,
} from "../core/constants.js";
import { describeError, FatalIOError, ToolExecutionError } from "../core/errors.js";
import type { ConversationTurn } from "../core/messages.js";
import type { Notice, Severity } from "../core/notice.js";
import {
  type ResolvedRetryConfig,
  type RetryConfig,
  resolveRetryConfig,
  withTransportRetry,
} from "../core/retry.js";
import { defaultLogger } from "../logging/logger.js";
import type { MethodologyStore } from "../methodology/store.js";
import type { ToolRegistry } from "../tools/registry.js";
import type { ModelTransport } from "../transport/transport.js";
import { ConversationManager } from "./conversation-manager.js";
import { type OutputHandler, ToolCallHandler } from "./handlers.js";
import type { AgentObservers, AgentState } from "./hooks.js";
import {
  buildSystemPrompt,
  DEFAULT_SUB_AGENT_SUMMARY_PROMPT,
  DEFAULT_SYSTEM_PROMPT,
  METHODOLOGY_REQUEST_PROMPT,
  renderMethodologies,
  SUMMARIZE_REMINDER,
  SUMMARY_REQUEST_PROMPT,
} from "./prompts.js";

export type AgentRunStatus = "completed" | "cancelled" | "failed";

export interface AgentRunResult {
  status: AgentRunStatus;
  /**
   * Fixed completion marker, the sub-agent summary, the cancellation marker
   * or the failure message.
   */
  output: string;
}

/** Blocks for the next message of the human. */
export type UserInputFn = (prompt: string) => Promise<string>;

export const USER_INPUT_PROMPT = "Continue the conversation, or submit an empty message to finish the task";

export interface AgentOptions {
  /** Name shown in logs and observer contexts. */
  name?: string;
  transport: ModelTransport;
  /** Registry of this agent; used by the default tool-call handler. */
  registry: ToolRegistry;
  systemPrompt?: string;
  /**
   * Response handlers, asked in order.
   * @default [new ToolCallHandler(registry)]
   */
  handlers?: OutputHandler[];
  /** Without it the agent completes whenever it would wait for the human. */
  getUserInput?: UserInputFn;
  /** A sub-agent returns a summary of the task instead of the completion marker. */
  subAgent?: boolean;
  /** Request used to obtain the sub-agent summary. */
  summaryPrompt?: string;
  /** Complete as soon as a response needs no handler instead of asking the human. */
  autoComplete?: boolean;
  methodologyStore?: MethodologyStore;
  /**
   * Ask for a methodology write-up on completion and store it.
   * @default true when a methodology store is given
   */
  recordMethodology?: boolean;
  /** @default 3 */
  methodologyLimit?: number;
  /**
   * The summarization reminder is sent once the turn counter exceeds this value.
   * @default 10
   */
  maxTurnsBeforeReminder?: number;
  retry?: RetryConfig;
  observers?: AgentObservers;
  logger?: Logger<ILogObj>;
}

/**
 * The agent run-loop.
 *
 * A strictly sequential state machine: send the conversation to the model, let
 * the first matching output handler act on the response and feed its result
 * back, or wait for the human when no handler applies. Recoverable failures are
 * folded into the conversation as text so the model can react to them.
 *
 * @example
 * ```typescript
 * const registry = new ToolRegistry({ cwd: repoRoot }).registerMany(createDefaultTools({ askUser }));
 * const agent = new Agent({ transport, registry, getUserInput: readMultiline });
 * const result = await agent.run("Find where the config file is parsed");
 * ```
 */
export class Agent {
  readonly name: string;
  private readonly transport: ModelTransport;
  private readonly handlers: OutputHandler[];
  private readonly conversation: ConversationManager;
  private readonly systemPrompt: string;
  private readonly options: AgentOptions;
  private readonly retry: ResolvedRetryConfig;
  private readonly maxTurnsBeforeReminder: number;
  private readonly logger: Logger<ILogObj>;
  private state: AgentState = "DONE";
  private turnCount = 0;

  constructor(options: AgentOptions) {
    this.options = options;
    this.name = options.name ?? "agent";
    this.transport = options.transport;
    this.handlers = options.handlers ?? [new ToolCallHandler(options.registry)];
    this.maxTurnsBeforeReminder = options.maxTurnsBeforeReminder ?? DEFAULT_MAX_TURNS_BEFORE_REMINDER;
    this.logger = options.logger ?? defaultLogger.getSubLogger({ name: this.name });

    const retry = resolveRetryConfig(options.retry);
    this.retry = {
      ...retry,
      onRetry: (error, attempt) => {
        void this.notify("error", `${error.message} (attempt ${attempt}); retrying`);
        retry.onRetry?.(error, attempt);
      },
    };

    this.systemPrompt = buildSystemPrompt(
      options.systemPrompt ?? DEFAULT_SYSTEM_PROMPT,
      this.handlers.map((handler) => handler.instructions()),
    );
    this.conversation = new ConversationManager(this.systemPrompt);
  }

  getState(): AgentState {
    return this.state;
  }

  /** Model responses since the start of the task or the last summarization. */
  getTurnCount(): number {
    return this.turnCount;
  }

  getConversation(): ConversationTurn[] {
    return this.conversation.getTurns();
  }

  getSystemPrompt(): string {
    return this.systemPrompt;
  }

  /**
   * Runs one task to completion. The conversation starts fresh for every task.
   *
   * Only unexpected exceptions propagate; local I/O failures end the task with
   * status `failed`.
   */
  async run(task: string): Promise<AgentRunResult> {
    this.conversation.reset();
    this.turnCount = 0;
    await this.transport.reset();
    this.transport.setSystemMessage(this.systemPrompt);

    try {
      return await this.loop(task);
    } catch (error) {
      if (error instanceof FatalIOError) {
        await this.notify("error", error.message);
        await this.transition("DONE");
        return { status: "failed", output: error.message };
      }
      throw error;
    }
  }

  private async loop(task: string): Promise<AgentRunResult> {
    let pending: ConversationTurn | undefined = { role: "user", content: await this.primeTask(task) };
    let response = "";
    let handler: OutputHandler | undefined;

    await this.transition("AWAITING_MODEL");

    while (true) {
      switch (this.state) {
        case "AWAITING_MODEL": {
          if (pending) {
            if (this.turnCount > this.maxTurnsBeforeReminder) {
              pending = { ...pending, content: `${pending.content}\n\n${SUMMARIZE_REMINDER}` };
            }
            this.conversation.add(pending);
            pending = undefined;
          }

          response = await this.callModel(this.conversation.getTurns());
          this.turnCount++;
          this.conversation.addAssistantMessage(response);
          await this.observe(() =>
            this.options.observers?.onModelResponse?.({
              agentName: this.name,
              text: response,
              turnCount: this.turnCount,
            }),
          );

          if (response.includes(SUMMARIZE_SENTINEL)) {
            await this.transition("SUMMARIZING");
            break;
          }

          handler = this.handlers.find((candidate) => candidate.canHandle(response));
          if (handler) {
            await this.transition("AWAITING_TOOL_RESULT");
          } else if (this.options.autoComplete) {
            await this.transition("COMPLETING");
          } else {
            await this.transition("AWAITING_USER_INPUT");
          }
          break;
        }

        case "AWAITING_TOOL_RESULT": {
          if (!handler) {
            throw new Error("AWAITING_TOOL_RESULT entered without an output handler");
          }
          pending = await this.runHandler(handler, response);
          await this.transition("AWAITING_MODEL");
          break;
        }

        case "AWAITING_USER_INPUT": {
          const input = this.options.getUserInput ? await this.options.getUserInput(USER_INPUT_PROMPT) : "";
          if (input === INTERRUPT_INPUT) {
            await this.notify("warn", TASK_CANCELLED);
            await this.transition("DONE");
            return { status: "cancelled", output: TASK_CANCELLED };
          }
          if (input.trim() === "") {
            await this.transition("COMPLETING");
          } else {
            pending = { role: "user", content: input };
            await this.transition("AWAITING_MODEL");
          }
          break;
        }

        case "SUMMARIZING": {
          await this.summarize();
          await this.transition("AWAITING_MODEL");
          break;
        }

        case "COMPLETING": {
          const output = await this.complete(task);
          await this.transition("DONE");
          return { status: "completed", output };
        }

        case "DONE":
          throw new Error("Agent loop reached DONE without a result");
      }
    }
  }

  private async transition(to: AgentState): Promise<void> {
    const from = this.state;
    this.state = to;
    this.logger.debug(`${from} -> ${to}`, { turnCount: this.turnCount });
    await this.observe(() =>
      this.options.observers?.onStateChange?.({ agentName: this.name, from, to, turnCount: this.turnCount }),
    );
  }

  private async callModel(turns: readonly ConversationTurn[]): Promise<string> {
    return withTransportRetry(() => this.transport.chat(turns), this.retry, this.logger);
  }

  private async runHandler(handler: OutputHandler, response: string): Promise<ConversationTurn> {
    try {
      const outcome = await handler.handle(response);
      await this.observe(() =>
        this.options.observers?.onHandlerComplete?.({ agentName: this.name, handler: handler.name, outcome }),
      );

      if (outcome.error) {
        await this.notify("error", outcome.error.message);
      }
      if (outcome.toolCall && outcome.result) {
        const { toolCall, result } = outcome;
        await this.observe(() =>
          this.options.observers?.onToolResult?.({ agentName: this.name, call: toolCall, result }),
        );
        if (!result.success) {
          await this.notify("error", result.error ?? `Tool '${toolCall.name}' failed`);
        }
      }
      return { role: "tool", content: outcome.message, toolCall: outcome.toolCall };
    } catch (error) {
      if (error instanceof FatalIOError) {
        throw error;
      }
      const wrapped = new ToolExecutionError(handler.name, error);
      this.logger.error(wrapped.message);
      await this.notify("error", wrapped.message);
      return { role: "tool", content: `Error: ${wrapped.message}` };
    }
  }

  private async summarize(): Promise<void> {
    const summary = await this.callModel([
      ...this.conversation.getTurns(),
      { role: "user", content: SUMMARY_REQUEST_PROMPT },
    ]);
    this.conversation.replaceWithSummary(summary.trim());
    this.turnCount = 0;
    await this.notify("info", "Conversation history summarized");
  }

  private async primeTask(task: string): Promise<string> {
    const store = this.options.methodologyStore;
    if (!store) {
      return task;
    }
    try {
      const matches = await store.find(task, this.options.methodologyLimit ?? DEFAULT_METHODOLOGY_LIMIT);
      if (matches.length === 0) {
        return task;
      }
      await this.notify("info", `Using ${matches.length} stored methodolog${matches.length === 1 ? "y" : "ies"}`);
      return `${task}\n\n${renderMethodologies(matches)}`;
    } catch (error) {
      this.logger.warn(`Methodology lookup failed: ${describeError(error)}`);
      await this.notify("warn", `Methodology lookup failed: ${describeError(error)}`);
      return task;
    }
  }

  private async complete(task: string): Promise<string> {
    const store = this.options.methodologyStore;
    if (store && (this.options.recordMethodology ?? true)) {
      try {
        const writeUp = await this.callModel([
          ...this.conversation.getTurns(),
          { role: "user", content: METHODOLOGY_REQUEST_PROMPT },
        ]);
        if (writeUp.trim() !== "") {
          await store.add(task, writeUp.trim());
          await this.notify("success", "Methodology recorded");
        }
      } catch (error) {
        this.logger.warn(`Recording the methodology failed: ${describeError(error)}`);
        await this.notify("warn", `Recording the methodology failed: ${describeError(error)}`);
      }
    }

    if (this.options.subAgent) {
      const summary = await this.callModel([
        ...this.conversation.getTurns(),
        { role: "user", content: this.options.summaryPrompt ?? DEFAULT_SUB_AGENT_SUMMARY_PROMPT },
      ]);
      return summary.trim();
    }

    await this.notify("success", TASK_COMPLETED);
    return TASK_COMPLETED;
  }

  private async notify(severity: Severity, message: string): Promise<void> {
    const notice: Notice = { severity, message };
    await this.observe(() => this.options.observers?.onNotice?.(notice));
  }

  /**
   * Runs an observer, logging instead of propagating its errors.
   */
  private async observe(fn: () => void | Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (error) {
      this.logger.error("Observer threw error (ignoring)", { error: describeError(error) });
    }
  }
}
