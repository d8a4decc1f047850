import { LOG_LEVELS } from "codeloop";

export const CLI_NAME = "codeloop";
export const CLI_DESCRIPTION = "Coding assistant that explores a repository with tools and commits patches with git.";
export const VERSION = "0.1.0";

export const COMMANDS = {
  agent: "agent",
  code: "code",
} as const;

export { LOG_LEVELS };
export type CLILogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_MODEL = "gpt-4o";
export const DEFAULT_API_KEY_ENV = "CODELOOP_API_KEY";

/** Predefined task file looked up in the working directory. */
export const TASKS_FILE = ".codeloop.yaml";

export const OPTION_FLAGS = {
  model: "-m, --model <model>",
  logLevel: "--log-level <level>",
  files: "-f, --files <paths...>",
  yes: "-y, --yes",
} as const;

export const OPTION_DESCRIPTIONS = {
  model: "Model name sent to the chat-completion endpoint.",
  logLevel: `Log level: ${LOG_LEVELS.join(", ")}.`,
  files: "Files whose contents are attached to the task.",
  yes: "Skip confirmations: commit patches and accept results without asking.",
} as const;

export const ERROR_PREFIX = "[error]";
