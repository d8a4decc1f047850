/**
 * Process-invocation wrapper.
 *
 * Commands are always given as an argv array and spawned without a shell, so
 * arguments never need quoting or escaping.
 *
 * @module process/run
 */

import { spawn } from "node:child_process";

export interface RunProcessOptions {
  /** Working directory for the child process */
  cwd?: string;
  /** Text written to stdin before it is closed */
  input?: string;
  /** Kill the process after this many milliseconds */
  timeoutMs?: number;
  /** Extra environment variables */
  env?: NodeJS.ProcessEnv;
}

export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}

/**
 * Spawn a process and collect its output.
 *
 * Resolves once the process has exited (whatever the exit code); rejects only
 * when the process cannot be started, e.g. the command does not exist.
 *
 * @example
 * ```typescript
 * const { exitCode, stdout } = await runProcess(["git", "rev-parse", "HEAD"], { cwd: repo });
 * ```
 */
export function runProcess(argv: readonly string[], options: RunProcessOptions = {}): Promise<ProcessResult> {
  const [command, ...args] = argv;
  if (command === undefined) {
    return Promise.reject(new Error("argv array cannot be empty"));
  }

  return new Promise<ProcessResult>((resolve, reject) => {
    const proc = spawn(command, args, {
      cwd: options.cwd,
      env: options.env ? { ...process.env, ...options.env } : process.env,
      stdio: [options.input === undefined ? "ignore" : "pipe", "pipe", "pipe"],
    });

    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    let timedOut = false;
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
      timeoutId = setTimeout(() => {
        timedOut = true;
        proc.kill("SIGKILL");
      }, options.timeoutMs);
    }

    proc.stdout?.on("data", (chunk: Buffer) => stdoutChunks.push(chunk));
    proc.stderr?.on("data", (chunk: Buffer) => stderrChunks.push(chunk));

    proc.on("error", (error) => {
      if (timeoutId) clearTimeout(timeoutId);
      reject(error);
    });

    // "close" fires after the stdio streams have been drained
    proc.on("close", (code) => {
      if (timeoutId) clearTimeout(timeoutId);
      resolve({
        exitCode: code ?? 1,
        stdout: Buffer.concat(stdoutChunks).toString("utf-8"),
        stderr: Buffer.concat(stderrChunks).toString("utf-8"),
        timedOut,
      });
    });

    if (options.input !== undefined && proc.stdin) {
      proc.stdin.end(options.input);
    }
  });
}
