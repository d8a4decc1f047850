import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { ConversationTurn } from "../core/messages.js";
import { renderToolTurn } from "../core/messages.js";
import type { ModelTransport } from "./transport.js";

export interface OpenAITransportOptions {
  model: string;
  apiKey?: string;
  /** Base URL of any OpenAI-compatible endpoint. */
  baseURL?: string;
  maxTokens?: number;
  temperature?: number;
  /** Preconfigured client, mainly for tests. */
  client?: OpenAI;
}

/**
 * Convert conversation turns to chat-completion messages.
 *
 * Tool turns become user messages because the agent's protocol lives in plain
 * text. When the conversation has no system turn, `systemMessage` is prepended.
 */
export function toChatMessages(
  conversation: readonly ConversationTurn[],
  systemMessage?: string,
): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = [];
  const hasSystemTurn = conversation.some((turn) => turn.role === "system");

  if (!hasSystemTurn && systemMessage) {
    messages.push({ role: "system", content: systemMessage });
  }

  for (const turn of conversation) {
    switch (turn.role) {
      case "system":
        messages.push({ role: "system", content: turn.content });
        break;
      case "user":
        messages.push({ role: "user", content: turn.content });
        break;
      case "assistant":
        messages.push({ role: "assistant", content: turn.content });
        break;
      case "tool":
        messages.push({ role: "user", content: renderToolTurn(turn) });
        break;
    }
  }

  return messages;
}

/**
 * Model transport for OpenAI and OpenAI-compatible chat-completion APIs.
 *
 * The HTTP API is stateless, so `reset()` only forgets the stored system message
 * override.
 */
export class OpenAITransport implements ModelTransport {
  private readonly client: OpenAI;
  private readonly options: OpenAITransportOptions;
  private systemMessage?: string;

  constructor(options: OpenAITransportOptions) {
    this.options = options;
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
  }

  setSystemMessage(text: string): void {
    this.systemMessage = text;
  }

  async reset(): Promise<void> {
    this.systemMessage = undefined;
  }

  async chat(conversation: readonly ConversationTurn[]): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: this.options.model,
      messages: toChatMessages(conversation, this.systemMessage),
      max_tokens: this.options.maxTokens,
      temperature: this.options.temperature,
    });

    return completion.choices[0]?.message.content ?? "";
  }
}
