/**
 * Built-in tools.
 *
 * A static factory table: every tool is listed here explicitly, nothing is
 * discovered at run time.
 */

import type { RetryConfig } from "../../core/retry.js";
import type { ModelTransport } from "../../transport/transport.js";
import type { AbstractTool } from "../tool.js";
import { type AskUserFn, createAskUserTool } from "./ask-user.js";
import { CodeReviewTool } from "./code-review.js";
import { executeShell } from "./execute-shell.js";
import { numberLines, readCode } from "./read-code.js";
import { searchCode } from "./search-code.js";

export interface BuiltinToolDeps {
  /** Enables ask_user. */
  askUser?: AskUserFn;
  /** Enables code_review. */
  createTransport?: () => ModelTransport;
  retry?: RetryConfig;
}

export type BuiltinToolName = "execute_shell" | "read_code" | "search_code" | "ask_user" | "code_review";

type ToolFactory = (deps: BuiltinToolDeps, previous: readonly AbstractTool[]) => AbstractTool | undefined;

/**
 * Factories in registration order. A factory returns undefined when its
 * dependencies are missing. code_review receives the tools built before it.
 */
export const builtinToolFactories: Record<BuiltinToolName, ToolFactory> = {
  execute_shell: () => executeShell,
  read_code: () => readCode,
  search_code: () => searchCode,
  ask_user: (deps) => (deps.askUser ? createAskUserTool(deps.askUser) : undefined),
  code_review: (deps, previous) =>
    deps.createTransport
      ? new CodeReviewTool({ createTransport: deps.createTransport, tools: [...previous], retry: deps.retry })
      : undefined,
};

export function getBuiltinToolNames(): BuiltinToolName[] {
  return ["execute_shell", "read_code", "search_code", "ask_user", "code_review"];
}

/**
 * Builds the default tool set, optionally limited to some names.
 */
export function createDefaultTools(
  deps: BuiltinToolDeps = {},
  names: readonly BuiltinToolName[] = getBuiltinToolNames(),
): AbstractTool[] {
  const tools: AbstractTool[] = [];
  for (const name of names) {
    const tool = builtinToolFactories[name](deps, tools);
    if (tool) {
      tools.push(tool);
    }
  }
  return tools;
}

export { createAskUserTool, CodeReviewTool, executeShell, numberLines, readCode, searchCode };
export type { AskUserFn };
