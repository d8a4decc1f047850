import chalk from "chalk";
import type { Command } from "commander";
import { describeError } from "codeloop";
import type { ModelConfig } from "./config.js";
import { OPTION_DESCRIPTIONS, OPTION_FLAGS } from "./constants.js";
import type { CLIEnvironment } from "./environment.js";

/**
 * Adds the options shared by the agent and code commands.
 * The model default stays unset so that CODELOOP_MODEL and the config file apply.
 */
export function addTaskOptions(cmd: Command, defaults?: ModelConfig): Command {
  const modelHint = defaults?.model ? ` (config: ${defaults.model})` : "";
  return cmd
    .option(OPTION_FLAGS.model, `${OPTION_DESCRIPTIONS.model}${modelHint}`)
    .option(OPTION_FLAGS.files, OPTION_DESCRIPTIONS.files)
    .option(OPTION_FLAGS.yes, OPTION_DESCRIPTIONS.yes);
}

/**
 * Runs a command action, printing failures instead of throwing them and
 * setting exit code 1.
 */
export async function executeAction(action: () => Promise<void>, env: CLIEnvironment): Promise<void> {
  try {
    await action();
  } catch (error) {
    env.stderr.write(`${chalk.red.bold("Error:")} ${describeError(error)}\n`);
    env.setExitCode(1);
  }
}
