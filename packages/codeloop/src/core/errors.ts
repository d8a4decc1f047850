/**
 * Error taxonomy for the agent.
 *
 * Every recoverable failure is modelled as an {@link AgentError} subclass with a
 * `kind` discriminant. These errors are normally carried inside a `Result` or
 * converted to text and fed back to the model; only programming errors are thrown
 * past the run-loop.
 */

export type AgentErrorKind =
  | "malformed_call"
  | "tool_not_found"
  | "argument_validation"
  | "tool_execution"
  | "transport"
  | "patch_match"
  | "commit_rejected"
  | "fatal_io";

export abstract class AgentError extends Error {
  abstract readonly kind: AgentErrorKind;
}

/**
 * A directive block in the model output could not be parsed.
 *
 * `line` and `column` are 1-based and relative to the whole response text when known.
 */
export class MalformedCallError extends AgentError {
  readonly kind = "malformed_call";
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, position?: { line?: number; column?: number }) {
    const where =
      position?.line !== undefined
        ? ` (line ${position.line}${position.column !== undefined ? `, column ${position.column}` : ""})`
        : "";
    super(`${message}${where}`);
    this.name = "MalformedCallError";
    this.line = position?.line;
    this.column = position?.column;
  }
}

export class ToolNotFoundError extends AgentError {
  readonly kind = "tool_not_found";
  readonly toolName: string;

  constructor(toolName: string) {
    super(`tool not found: ${toolName}`);
    this.name = "ToolNotFoundError";
    this.toolName = toolName;
  }
}

export class ArgumentValidationError extends AgentError {
  readonly kind = "argument_validation";
  readonly toolName: string;

  constructor(toolName: string, message: string) {
    super(message);
    this.name = "ArgumentValidationError";
    this.toolName = toolName;
  }
}

/**
 * Wraps anything thrown from inside a tool implementation.
 */
export class ToolExecutionError extends AgentError {
  readonly kind = "tool_execution";
  readonly toolName: string;

  constructor(toolName: string, cause: unknown) {
    super(`Tool '${toolName}' failed: ${describeError(cause)}`, { cause });
    this.name = "ToolExecutionError";
    this.toolName = toolName;
  }
}

export class TransportError extends AgentError {
  readonly kind = "transport";

  constructor(cause: unknown) {
    super(`Model call failed: ${describeError(cause)}`, { cause });
    this.name = "TransportError";
  }
}

export class PatchMatchError extends AgentError {
  readonly kind = "patch_match";
  readonly filePath: string;
  readonly search: string;

  constructor(filePath: string, search: string) {
    super(`File ${filePath} does not contain the search block:\n${search}`);
    this.name = "PatchMatchError";
    this.filePath = filePath;
    this.search = search;
  }
}

export class CommitRejectedError extends AgentError {
  readonly kind = "commit_rejected";

  constructor(message = "Commit was rejected; working tree reset to the baseline revision") {
    super(message);
    this.name = "CommitRejectedError";
  }
}

/**
 * Unrecoverable local I/O failure. Ends the current task but never the process.
 */
export class FatalIOError extends AgentError {
  readonly kind = "fatal_io";

  constructor(message: string, cause?: unknown) {
    super(cause === undefined ? message : `${message}: ${describeError(cause)}`, { cause });
    this.name = "FatalIOError";
  }
}

export function isAgentError(error: unknown): error is AgentError {
  return error instanceof AgentError;
}

/**
 * Extracts a printable message from any thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
