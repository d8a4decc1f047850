import type { Command } from "commander";
import { Agent, createDefaultTools, TASK_CANCELLED, ToolRegistry } from "codeloop";
import type { CLIConfig } from "./config.js";
import { COMMANDS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";
import { addTaskOptions, executeAction } from "./option-helpers.js";
import { attachFiles, type CLITaskOptions, createTaskRuntime, reportResult, resolveTask } from "./runtime.js";

/**
 * Runs the exploration agent: tool calls only, no patches.
 */
export async function executeAgent(
  args: readonly string[],
  options: CLITaskOptions,
  env: CLIEnvironment,
  config: CLIConfig,
): Promise<void> {
  const task = await resolveTask(args, env);
  if (task === undefined) {
    reportResult({ status: "cancelled", output: TASK_CANCELLED }, env);
    return;
  }

  const runtime = createTaskRuntime(env, config, options);
  const registry = new ToolRegistry({ cwd: env.cwd, logger: env.createLogger("tools") }).registerMany(
    createDefaultTools({ askUser: env.readInput, createTransport: runtime.createTransport }),
  );

  const agent = new Agent({
    name: COMMANDS.agent,
    transport: runtime.createTransport(),
    registry,
    systemPrompt: config.agent?.["system-prompt"],
    getUserInput: runtime.getUserInput,
    methodologyStore: runtime.methodologyStore,
    maxTurnsBeforeReminder: config.agent?.["max-turns-before-reminder"],
    observers: runtime.observers,
    logger: env.createLogger(COMMANDS.agent),
  });

  const prompt = await attachFiles(await runtime.expandReferences(task), options.files ?? [], env.cwd);
  reportResult(await agent.run(prompt), env);
}

/**
 * Registers the agent command with the CLI program.
 */
export function registerAgentCommand(program: Command, env: CLIEnvironment, config: CLIConfig): void {
  const cmd = program
    .command(COMMANDS.agent)
    .description("Explore the repository with tools and answer questions about it.")
    .argument("[task...]", "Task for the agent. Falls back to the task menu or a prompt.");

  addTaskOptions(cmd, config.model);

  cmd.action((task: string[], options: CLITaskOptions) =>
    executeAction(() => executeAgent(task, options, env, config), env),
  );
}
