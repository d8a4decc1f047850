import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import {
  type AgentObservers,
  type AgentRunResult,
  FatalIOError,
  FileMethodologyStore,
  INTERRUPT_INPUT,
  type MethodologyStore,
  numberLines,
  OpenAITransport,
  PathSandboxError,
  resolveWithinRoot,
  toRepoPath,
} from "codeloop";
import type { CLIConfig } from "./config.js";
import { ConfigError, getMethodologyDir, type ModelSettings, resolveModelSettings } from "./config.js";
import type { CLIEnvironment } from "./environment.js";
import { expandFileReferences, type FileReferenceOptions, withFileReferences } from "./file-input.js";
import { withShellShortcut } from "./input.js";
import { loadPredefinedTasks, renderTaskMenu, selectTask } from "./tasks.js";
import { formatHeading, formatNotice, formatRunResult } from "./ui/formatters.js";

/**
 * CLI options shared by the agent and code commands (camelCase, matching Commander output).
 */
export interface CLITaskOptions {
  model?: string;
  files?: string[];
  yes?: boolean;
}

/**
 * Task text from the command arguments, the predefined task menu or a prompt.
 * Returns undefined when the human cancels or enters nothing.
 */
export async function resolveTask(args: readonly string[], env: CLIEnvironment): Promise<string | undefined> {
  if (args.length > 0) {
    return args.join(" ");
  }

  const tasks = await loadPredefinedTasks(env.cwd);
  let answer: string;
  if (tasks.length > 0) {
    env.stdout.write(`${formatHeading("Tasks")}\n${renderTaskMenu(tasks)}\n`);
    answer = await env.prompt("Task (number, name or description): ");
    if (answer !== INTERRUPT_INPUT) {
      answer = selectTask(tasks, answer);
    }
  } else {
    answer = await env.readInput("Describe the task");
  }

  return answer === INTERRUPT_INPUT || answer.trim() === "" ? undefined : answer;
}

/**
 * Repository-relative forms of `--files` arguments, which are given relative to
 * the working directory.
 *
 * @throws ConfigError when a file lies outside the repository
 */
export function resolveFileArguments(files: readonly string[], cwd: string, root: string): string[] {
  return files.map((file) => {
    try {
      return toRepoPath(root, resolve(cwd, file));
    } catch (error) {
      if (error instanceof PathSandboxError) {
        throw new ConfigError(`${file} is outside the repository ${root}`);
      }
      throw error;
    }
  });
}

/**
 * Appends the numbered contents of files to the task.
 *
 * @throws FatalIOError when a file cannot be read
 */
export async function attachFiles(task: string, files: readonly string[], cwd: string): Promise<string> {
  if (files.length === 0) {
    return task;
  }
  const sections: string[] = [];
  for (const file of files) {
    try {
      sections.push(numberLines(file, await readFile(resolveWithinRoot(cwd, file), "utf-8")));
    } catch (error) {
      throw new FatalIOError(`Cannot read ${file}`, error);
    }
  }
  return `${task}\n\nAttached files:\n\n${sections.join("\n\n")}`;
}

/**
 * Observers that print model replies, tool activity and notices.
 */
export function createTerminalObservers(env: CLIEnvironment): AgentObservers {
  return {
    onModelResponse: ({ agentName, text }) => {
      env.stdout.write(`${formatHeading(agentName)}\n${text}\n`);
    },
    onToolResult: ({ call, result }) => {
      const status = result.success ? "success" : "info";
      env.stderr.write(`${formatNotice({ severity: status, message: `${call.name} finished` })}\n`);
    },
    onNotice: (notice) => {
      env.stderr.write(`${formatNotice(notice)}\n`);
    },
  };
}

/**
 * Everything a command needs to build agents for one task.
 */
export interface TaskRuntime {
  settings: ModelSettings;
  createTransport: () => OpenAITransport;
  methodologyStore?: MethodologyStore;
  observers: AgentObservers;
  /** Human input with the `!` shell shortcut and backtick file references. */
  getUserInput: (prompt: string) => Promise<string>;
  /** Prepends files referenced in backticks to a task. */
  expandReferences: (text: string) => Promise<string>;
  confirm: (question: string, defaultAnswer: boolean) => Promise<boolean>;
}

/**
 * @param root Directory file references must stay inside; the repository root
 * for the code command
 */
export function createTaskRuntime(
  env: CLIEnvironment,
  config: CLIConfig,
  options: CLITaskOptions,
  root = env.cwd,
): TaskRuntime {
  const settings = resolveModelSettings(config.model, options, env.vars);
  if (!settings.apiKey) {
    throw new ConfigError(`No API key found; set ${settings.apiKeyEnv}`);
  }
  const confirm: TaskRuntime["confirm"] = options.yes
    ? async () => true
    : (question, defaultAnswer) => env.confirm(question, defaultAnswer);
  const references: FileReferenceOptions = {
    cwd: env.cwd,
    root,
    onNotice: (notice) => env.stderr.write(`${formatNotice(notice)}\n`),
  };

  return {
    settings,
    createTransport: () =>
      new OpenAITransport({
        model: settings.model,
        apiKey: settings.apiKey,
        baseURL: settings.baseURL,
        maxTokens: settings.maxTokens,
        temperature: settings.temperature,
      }),
    methodologyStore:
      config.agent?.methodology === false
        ? undefined
        : new FileMethodologyStore(getMethodologyDir(env.vars), env.createLogger("methodology")),
    observers: createTerminalObservers(env),
    getUserInput: withFileReferences(
      withShellShortcut({
        read: env.readInput,
        confirm,
        write: (text) => env.stdout.write(text),
        cwd: env.cwd,
      }),
      references,
    ),
    expandReferences: (text) => expandFileReferences(text, references),
    confirm,
  };
}

/** Prints the result and sets the exit code. */
export function reportResult(result: AgentRunResult, env: CLIEnvironment): void {
  env.stdout.write(`${formatRunResult(result)}\n`);
  if (result.status === "failed") {
    env.setExitCode(1);
  }
}
