// Tool-call markers (single-call protocol)
export const TOOL_CALL_START = "<START_TOOL_CALL>";
export const TOOL_CALL_END = "<END_TOOL_CALL>";

// Patch markers
export const PATCH_START = "<PATCH>";
export const PATCH_END = "</PATCH>";
export const PATCH_SEARCH = ">>>>>> SEARCH";
export const PATCH_REPLACE = "<<<<<< REPLACE";
/** A divider line is five or more `=` characters. */
export const PATCH_DIVIDER_PATTERN = /^={5,}\s*$/;
export const PATCH_FILE_PREFIX = "File:";
export const PATCH_REASON_PREFIX = "Reason:";

// Variant A merge output markers
export const MERGED_CODE_START = "<MERGED_CODE>";
export const MERGED_CODE_END = "</MERGED_CODE>";

/** Literal marker the model emits to request a history recap. */
export const SUMMARIZE_SENTINEL = "<!!!SUMMARIZE!!!>";

/** Input value that cancels the running task at the user-input prompt. */
export const INTERRUPT_INPUT = "__interrupt__";

/** Result text of a top-level agent that finished normally. */
export const TASK_COMPLETED = "Task completed";

/** Result text of a task cancelled through the interrupt input. */
export const TASK_CANCELLED = "Task cancelled by user";

/** Once the turn counter exceeds this value the summarization reminder is sent. */
export const DEFAULT_MAX_TURNS_BEFORE_REMINDER = 10;

// Transport retry defaults
export const DEFAULT_RETRY_MIN_TIMEOUT_MS = 5_000;
export const DEFAULT_RETRY_MAX_TIMEOUT_MS = 30_000;
export const DEFAULT_RETRY_FACTOR = 2;

/** Default timeout of the execute_shell tool. */
export const DEFAULT_SHELL_TIMEOUT_MS = 120_000;

/** Number of stored methodologies offered to a new task. */
export const DEFAULT_METHODOLOGY_LIMIT = 3;
