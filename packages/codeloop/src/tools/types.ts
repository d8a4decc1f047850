import type { ILogObj, Logger } from "tslog";

/**
 * A directive extracted from model output.
 */
export interface ToolCall {
  name: string;
  arguments: Record<string, unknown>;
}

/**
 * Outcome of one tool invocation. Folded into a single conversation message.
 */
export interface ToolResult {
  success: boolean;
  stdout: string;
  stderr: string;
  error?: string;
}

/**
 * Tools may return a plain string as a shorthand for a successful result.
 */
export type ToolExecuteReturn = ToolResult | string;

export interface ToolParameterDescriptor {
  type: string;
  description?: string;
  required: boolean;
}

/**
 * Metadata surfaced to the model and to `listAvailable()`.
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  parameters: Record<string, ToolParameterDescriptor>;
}

export interface ExecutionContext {
  /** Working directory tools resolve relative paths against. */
  cwd: string;
  logger: Logger<ILogObj>;
}

export interface ToolExample<TParams> {
  params: TParams;
  output?: string;
  comment?: string;
}

export function successResult(stdout: string, stderr = ""): ToolResult {
  return { success: true, stdout, stderr };
}

export function failureResult(error: string, stdout = "", stderr = ""): ToolResult {
  return { success: false, stdout, stderr, error };
}
