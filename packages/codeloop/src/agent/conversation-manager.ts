/**
 * ConversationManager owns the conversation state of one agent.
 *
 * The first turn is always the system turn. It is only replaced through
 * {@link ConversationManager.setSystemPrompt}; summarization and reset keep it.
 */

import type { ConversationTurn } from "../core/messages.js";
import type { ToolCall } from "../tools/types.js";
import { summaryTurnContent } from "./prompts.js";

export class ConversationManager {
  private systemTurn: ConversationTurn;
  private history: ConversationTurn[] = [];

  constructor(systemPrompt: string) {
    this.systemTurn = { role: "system", content: systemPrompt };
  }

  setSystemPrompt(systemPrompt: string): void {
    this.systemTurn = { role: "system", content: systemPrompt };
  }

  add(turn: ConversationTurn): void {
    if (turn.role === "system") {
      throw new Error("The system turn cannot be appended; use setSystemPrompt()");
    }
    this.history.push(turn);
  }

  addUserMessage(content: string): void {
    this.add({ role: "user", content });
  }

  addAssistantMessage(content: string): void {
    this.add({ role: "assistant", content });
  }

  addToolResult(content: string, toolCall?: ToolCall): void {
    this.add({ role: "tool", content, toolCall });
  }

  /** System turn followed by the history. */
  getTurns(): ConversationTurn[] {
    return [this.systemTurn, ...this.history];
  }

  getHistory(): ConversationTurn[] {
    return [...this.history];
  }

  get length(): number {
    return this.history.length + 1;
  }

  /**
   * Replaces every turn except the system turn with one summary turn.
   */
  replaceWithSummary(summary: string): void {
    this.history = [{ role: "user", content: summaryTurnContent(summary) }];
  }

  /** Drops everything but the system turn. */
  reset(): void {
    this.history = [];
  }
}
