/**
 * Read-only observers of an agent run.
 *
 * Observers cannot change what the agent does. Errors they throw are logged and
 * otherwise ignored.
 *
 * @example
 * ```typescript
 * const agent = new Agent({
 *   transport,
 *   registry,
 *   observers: {
 *     onModelResponse: ({ text }) => console.log(text),
 *     onNotice: ({ severity, message }) => console.error(`[${severity}] ${message}`),
 *   },
 * });
 * ```
 */

import type { Notice } from "../core/notice.js";
import type { ToolCall, ToolResult } from "../tools/types.js";
import type { HandlerOutcome } from "./handlers.js";

export type AgentState =
  | "AWAITING_MODEL"
  | "AWAITING_TOOL_RESULT"
  | "AWAITING_USER_INPUT"
  | "SUMMARIZING"
  | "COMPLETING"
  | "DONE";

export interface StateChangeContext {
  agentName: string;
  from: AgentState;
  to: AgentState;
  turnCount: number;
}

export interface ModelResponseContext {
  agentName: string;
  text: string;
  turnCount: number;
}

export interface ToolResultContext {
  agentName: string;
  call: ToolCall;
  result: ToolResult;
}

export interface HandlerCompleteContext {
  agentName: string;
  handler: string;
  outcome: HandlerOutcome;
}

type Observer<T> = (ctx: T) => void | Promise<void>;

export interface AgentObservers {
  onStateChange?: Observer<StateChangeContext>;
  onModelResponse?: Observer<ModelResponseContext>;
  onToolResult?: Observer<ToolResultContext>;
  onHandlerComplete?: Observer<HandlerCompleteContext>;
  /** Severity-tagged messages for the human, errors included. */
  onNotice?: Observer<Notice>;
}
