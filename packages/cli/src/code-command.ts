import type { Command } from "commander";
import {
  Agent,
  CliGitClient,
  createDefaultTools,
  INTERRUPT_INPUT,
  modelCommitMessage,
  PatchEngine,
  PatchOutputHandler,
  type ResultReviewFn,
  TASK_CANCELLED,
  ToolCallHandler,
  ToolRegistry,
} from "codeloop";
import { type CLIConfig, ConfigError } from "./config.js";
import { COMMANDS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { selectFiles } from "./file-input.js";
import { addTaskOptions, executeAction } from "./option-helpers.js";
import {
  attachFiles,
  type CLITaskOptions,
  createTaskRuntime,
  reportResult,
  resolveFileArguments,
  resolveTask,
} from "./runtime.js";
import { formatHeading, formatNotice, renderColoredDiff } from "./ui/formatters.js";

const CODE_SYSTEM_PROMPT = `You are a coding assistant working in a git repository.
Explore the code with tools before changing it. Change files only with patch blocks; every applied patch set is committed, and the result of each session is reported back to you.`;

/**
 * Shows a patch session summary and lets the human accept it or write the reply
 * the model receives instead.
 */
export function createResultReview(env: CLIEnvironment): ResultReviewFn {
  return async (summary) => {
    env.stdout.write(`${formatHeading("Patch result")}\n${summary}\n`);
    if (await env.confirm("Use this reply?", true)) {
      return summary;
    }
    const reply = await env.readInput("Enter the reply to send instead");
    return reply === INTERRUPT_INPUT || reply.trim() === "" ? summary : reply;
  };
}

/**
 * Runs the coding agent: tool calls plus patch blocks applied and committed
 * with git.
 */
export async function executeCode(
  args: readonly string[],
  options: CLITaskOptions,
  env: CLIEnvironment,
  config: CLIConfig,
): Promise<void> {
  const root = await CliGitClient.findRoot(env.cwd);
  if (root === undefined) {
    throw new ConfigError(`${env.cwd} is not inside a git repository`);
  }

  const task = await resolveTask(args, env);
  if (task === undefined) {
    reportResult({ status: "cancelled", output: TASK_CANCELLED }, env);
    return;
  }

  const runtime = createTaskRuntime(env, config, options, root);
  const git = new CliGitClient(root);
  let files = resolveFileArguments(options.files ?? [], env.cwd, root);
  if ((config.code?.["select-files"] ?? true) && !options.yes && env.isTTY) {
    env.stdout.write(`${formatHeading("Files")}\n`);
    files = await selectFiles(files, {
      root,
      prompt: env.prompt,
      confirm: env.confirm,
      write: (text) => env.stdout.write(text),
      listFiles: () => git.listFiles(),
    });
  }

  const confirmCommit = config.code?.["confirm-before-commit"] ?? true;
  const confirmResult = (config.code?.["confirm-result"] ?? true) && !options.yes;
  const generateMessage = config.code?.["generate-commit-message"] ?? true;

  const engine = new PatchEngine({
    git,
    transport: runtime.createTransport(),
    confirm: confirmCommit ? runtime.confirm : undefined,
    reviewResult: confirmResult ? createResultReview(env) : undefined,
    commitMessage: generateMessage ? modelCommitMessage(runtime.createTransport()) : undefined,
    onNotice: (notice) => env.stderr.write(`${formatNotice(notice)}\n`),
    onDiff: (diff) => env.stdout.write(`${formatHeading("Staged changes")}\n${renderColoredDiff(diff)}\n`),
    logger: env.createLogger("patch-engine"),
  });

  const registry = new ToolRegistry({ cwd: root, logger: env.createLogger("tools") }).registerMany(
    createDefaultTools({ askUser: env.readInput, createTransport: runtime.createTransport }),
  );

  const agent = new Agent({
    name: COMMANDS.code,
    transport: runtime.createTransport(),
    registry,
    systemPrompt: config.agent?.["system-prompt"] ?? CODE_SYSTEM_PROMPT,
    handlers: [new PatchOutputHandler(engine), new ToolCallHandler(registry)],
    getUserInput: runtime.getUserInput,
    methodologyStore: runtime.methodologyStore,
    maxTurnsBeforeReminder: config.agent?.["max-turns-before-reminder"],
    observers: runtime.observers,
    logger: env.createLogger(COMMANDS.code),
  });

  reportResult(await agent.run(await attachFiles(await runtime.expandReferences(task), files, root)), env);
}

/**
 * Registers the code command with the CLI program.
 */
export function registerCodeCommand(program: Command, env: CLIEnvironment, config: CLIConfig): void {
  const cmd = program
    .command(COMMANDS.code)
    .description("Change the repository with patch blocks committed to git.")
    .argument("[task...]", "Task for the agent. Falls back to the task menu or a prompt.");

  addTaskOptions(cmd, config.model);

  cmd.action((task: string[], options: CLITaskOptions) =>
    executeAction(() => executeCode(task, options, env, config), env),
  );
}
