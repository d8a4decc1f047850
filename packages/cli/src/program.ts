import { Command, InvalidArgumentError } from "commander";
import { registerAgentCommand } from "./agent-command.js";
import { registerCodeCommand } from "./code-command.js";
import { type CLIConfig, loadConfig } from "./config.js";
import {
  CLI_DESCRIPTION,
  CLI_NAME,
  type CLILogLevel,
  LOG_LEVELS,
  OPTION_DESCRIPTIONS,
  OPTION_FLAGS,
  VERSION,
} from "./constants.js";
import type { CLIEnvironment, CLILoggerConfig } from "./environment.js";
import { createDefaultEnvironment } from "./environment.js";

function isLogLevel(value: string): value is CLILogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Parses and validates the log level option value.
 */
function parseLogLevelOption(value: string): CLILogLevel {
  const normalized = value.toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new InvalidArgumentError(`Log level must be one of: ${LOG_LEVELS.join(", ")}`);
  }
  return normalized;
}

/**
 * Global CLI options that apply to all commands.
 */
interface GlobalOptions {
  logLevel?: CLILogLevel;
}

/**
 * Creates and configures the CLI program with the agent and code commands.
 */
export function createProgram(env: CLIEnvironment, config: CLIConfig = {}): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description(CLI_DESCRIPTION)
    .version(VERSION)
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel, parseLogLevelOption)
    .configureOutput({
      writeOut: (str) => env.stdout.write(str),
      writeErr: (str) => env.stderr.write(str),
    });

  registerAgentCommand(program, env, config);
  registerCodeCommand(program, env, config);

  return program;
}

/**
 * Options for runCLI function.
 */
export interface RunCLIOptions {
  /** Environment overrides for testing or customization */
  env?: Partial<CLIEnvironment>;
  /** Config override - if provided, skips loading from file. Use {} to disable config. */
  config?: CLIConfig;
}

/**
 * Main entry point for running the CLI.
 * Creates environment, parses arguments, and executes the appropriate command.
 */
export async function runCLI(opts: RunCLIOptions = {}): Promise<void> {
  // Config errors fail before any command runs
  const config = opts.config ?? loadConfig();
  const argv = opts.env?.argv ?? process.argv;

  // First pass: global options only, so loggers exist before commands are built
  const preParser = new Command();
  preParser
    .option(OPTION_FLAGS.logLevel, OPTION_DESCRIPTIONS.logLevel, parseLogLevelOption)
    .allowUnknownOption()
    .allowExcessArguments()
    .helpOption(false);

  preParser.parse(argv);
  const globalOpts = preParser.opts<GlobalOptions>();

  // Priority: CLI flags > config file > defaults
  const loggerConfig: CLILoggerConfig = {
    logLevel: globalOpts.logLevel ?? config.global?.["log-level"],
  };

  const env: CLIEnvironment = {
    ...createDefaultEnvironment(loggerConfig),
    ...opts.env,
  };
  const program = createProgram(env, config);
  await program.parseAsync(env.argv);
}
