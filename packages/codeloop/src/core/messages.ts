import type { ToolCall } from "../tools/types.js";

export type TurnRole = "system" | "user" | "assistant" | "tool";

/**
 * One entry of the conversation state.
 */
export interface ConversationTurn {
  role: TurnRole;
  content: string;
  /** Directive that produced a tool turn. */
  toolCall?: ToolCall;
}

/** Prefix used when a tool turn is sent to a chat API without a tool role. */
export const TOOL_RESULT_PREFIX = "Tool result:\n";

/**
 * Renders a tool turn as plain user text.
 */
export function renderToolTurn(turn: ConversationTurn): string {
  const header = turn.toolCall ? `Tool result (${turn.toolCall.name}):\n` : TOOL_RESULT_PREFIX;
  return `${header}${turn.content}`;
}
