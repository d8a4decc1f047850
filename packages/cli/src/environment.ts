import chalk from "chalk";
import type { ILogObj, Logger, LoggerOptions } from "codeloop";
import { createLogger, parseLogLevel } from "codeloop";
import { parseConfirmation, readLine, readMultiline } from "./input.js";

/**
 * Stream type that may have TTY detection capability.
 */
export type TTYAwareStream = NodeJS.ReadableStream & { isTTY?: boolean };

/**
 * Logger configuration for CLI commands.
 */
export interface CLILoggerConfig {
  logLevel?: string;
}

/**
 * Environment abstraction for CLI dependencies and I/O.
 * Allows dependency injection for testing.
 */
export interface CLIEnvironment {
  argv: string[];
  cwd: string;
  stdin: TTYAwareStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  /** Process environment the model settings are read from */
  vars: NodeJS.ProcessEnv;
  setExitCode: (code: number) => void;
  loggerConfig?: CLILoggerConfig;
  createLogger: (name: string) => Logger<ILogObj>;
  /** Whether stdin is a TTY (interactive terminal) */
  isTTY: boolean;
  /** Single-line question */
  prompt: (question: string) => Promise<string>;
  confirm: (question: string, defaultAnswer: boolean) => Promise<boolean>;
  /** Multi-line message, ended by an empty line */
  readInput: (prompt: string) => Promise<string>;
}

/**
 * Creates a logger factory based on CLI configuration.
 * Priority: CLI options > environment variables > defaults
 */
export function createLoggerFactory(config?: CLILoggerConfig): (name: string) => Logger<ILogObj> {
  return (name: string) => {
    const options: LoggerOptions = { name };
    const level = parseLogLevel(config?.logLevel);
    if (level !== undefined) {
      options.minLevel = level;
    }
    return createLogger(options);
  };
}

/**
 * Creates the default CLI environment using Node.js process globals.
 */
export function createDefaultEnvironment(loggerConfig?: CLILoggerConfig): CLIEnvironment {
  const streams = { input: process.stdin, output: process.stdout };
  const prompt = (question: string) => readLine(chalk.green.bold(question), streams);

  return {
    argv: process.argv,
    cwd: process.cwd(),
    stdin: process.stdin,
    stdout: process.stdout,
    stderr: process.stderr,
    vars: process.env,
    setExitCode: (code: number) => {
      process.exitCode = code;
    },
    loggerConfig,
    createLogger: createLoggerFactory(loggerConfig),
    isTTY: Boolean(process.stdin.isTTY),
    prompt,
    confirm: async (question, defaultAnswer) =>
      parseConfirmation(await prompt(`${question} ${defaultAnswer ? "[Y/n]" : "[y/N]"} `), defaultAnswer),
    readInput: (message) => readMultiline(chalk.cyan.bold(message), streams),
  };
}
