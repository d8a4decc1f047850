export type Severity = "error" | "warn" | "info" | "success";

/**
 * Message for the human supervising a session. Errors are reported this way
 * before they are folded back into the conversation.
 */
export interface Notice {
  severity: Severity;
  message: string;
}

export type NoticeListener = (notice: Notice) => void;
