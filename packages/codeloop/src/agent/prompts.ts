import { SUMMARIZE_SENTINEL, TOOL_CALL_END, TOOL_CALL_START } from "../core/constants.js";
import type { MethodologyMatch } from "../methodology/store.js";

export const DEFAULT_SYSTEM_PROMPT =
  "You are a rigorous software engineering assistant working in the user's repository. Obtain every fact through the tools; never guess file contents or command output.";

/**
 * How to call tools, followed by the tool catalogue.
 */
export function toolCallInstructions(toolHelpText: string): string {
  return `# Tool calls
Call a tool by writing one block in this format:

${TOOL_CALL_START}
name: <tool name>
arguments:
    <parameter>: <value>
${TOOL_CALL_END}

Rules:
1. The body is YAML: indent arguments with four spaces and use "|" for multi-line values.
2. Only one tool call per response is executed. Wait for its result before the next call.
3. Do not invent tool results; they are sent back to you in the next message.
4. When no tool is needed, answer in plain text.

# Available tools
${toolHelpText === "" ? "(none)" : toolHelpText}`;
}

export const SUMMARIZATION_INSTRUCTIONS = `# Long conversations
When the conversation becomes long, reply with only ${SUMMARIZE_SENTINEL} and you will be asked to summarize it. The summary replaces the conversation history.`;

/** Appended to the outgoing prompt once the conversation has run for many turns. */
export const SUMMARIZE_REMINDER = `The conversation is getting long. If the history is no longer needed in full, reply with ${SUMMARIZE_SENTINEL} to summarize it.`;

export const SUMMARY_REQUEST_PROMPT = `Summarize the conversation so far for your own future reference. Include:
- the task and its current status
- key findings: files, functions and facts that were discovered
- changes already made
- remaining steps
Reply with the summary only.`;

export function summaryTurnContent(summary: string): string {
  return `Summary of the conversation so far:\n${summary}\n\nContinue the task from here.`;
}

export const METHODOLOGY_REQUEST_PROMPT = `The task is finished. Write a short, reusable methodology for solving this kind of problem: the steps that worked, the tools that helped and the pitfalls to avoid. Do not mention details that only apply to this repository. Reply with the methodology only.`;

export const DEFAULT_SUB_AGENT_SUMMARY_PROMPT = `Summarize the result of the task for the agent that delegated it. Reply in YAML:
status: completed | partial | failed
result: <what was found or done>
details:
  - <important facts, file paths and line numbers>`;

/**
 * Stored methodologies appended to a new task.
 */
export function renderMethodologies(matches: readonly MethodologyMatch[]): string {
  const sections = matches.map(
    (match, index) => `## ${index + 1}. ${match.problem}\n${match.methodology.trim()}`,
  );
  return `Methodologies from similar problems solved before (use them if they apply):\n\n${sections.join("\n\n")}`;
}

/**
 * System prompt: base instructions, each handler's protocol and the
 * summarization rules.
 */
export function buildSystemPrompt(base: string, handlerInstructions: readonly string[]): string {
  return [base, ...handlerInstructions.filter((text) => text !== ""), SUMMARIZATION_INSTRUCTIONS].join("\n\n");
}
