import type { ConversationTurn } from "../core/messages.js";

/**
 * Text-in/text-out connection to a language model.
 *
 * The agent treats implementations as opaque: no provider framing, no native
 * tool calling. Implementations throw on failure; the agent wraps the call with
 * retry.
 */
export interface ModelTransport {
  /** Send the whole conversation and return the model's reply text. */
  chat(conversation: readonly ConversationTurn[]): Promise<string>;
  setSystemMessage(text: string): void;
  /** Clear any local or server-side session state. */
  reset(): Promise<void>;
  /** Make files available to the model, if the provider supports uploads. */
  uploadFiles?(paths: readonly string[]): Promise<void>;
}
