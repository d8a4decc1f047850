import { createWriteStream, mkdirSync, type WriteStream } from "node:fs";
import { dirname } from "node:path";
import { type ILogObj, Logger } from "tslog";

export const LOG_LEVELS = ["silly", "trace", "debug", "info", "warn", "error", "fatal"] as const;
export type LogLevelName = (typeof LOG_LEVELS)[number];

/**
 * Converts a level name ("debug") or number ("2") to a tslog level id.
 */
export function parseLogLevel(value?: string): number | undefined {
  if (!value) {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  if (normalized === "") {
    return undefined;
  }

  const numericLevel = Number(normalized);
  if (Number.isFinite(numericLevel)) {
    return Math.max(0, Math.min(6, Math.floor(numericLevel)));
  }

  const index = LOG_LEVELS.findIndex((level) => level === normalized);
  return index === -1 ? undefined : index;
}

export interface LoggerOptions {
  /**
   * Log level: 0=silly, 1=trace, 2=debug, 3=info, 4=warn, 5=error, 6=fatal
   * @default 4 (warn)
   */
  minLevel?: number;

  /**
   * Output type: 'pretty' for terminals, 'json' for machines, 'hidden' for tests
   * @default 'pretty'
   */
  type?: "pretty" | "json" | "hidden";

  /** Logger name (appears in logs) */
  name?: string;

  /**
   * Truncate the log file instead of appending.
   * @default false
   */
  logReset?: boolean;
}

function parseEnvBoolean(value?: string): boolean | undefined {
  if (!value) return undefined;
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  return undefined;
}

// All loggers share one file stream
let sharedLogFilePath: string | undefined;
let sharedLogFileStream: WriteStream | undefined;

const LOG_TEMPLATE =
  "{{yyyy}}-{{mm}}-{{dd}} {{hh}}:{{MM}}:{{ss}}:{{ms}}\t{{logLevelName}}\t[{{name}}]\t";

/**
 * Strips ANSI color codes from a string.
 */
export function stripAnsi(str: string): string {
  // biome-ignore lint/suspicious/noControlCharactersInRegex: ANSI escape codes use control characters
  return str.replace(/\x1b\[[0-9;]*m/g, "");
}

/**
 * Closes the shared log file. Used by tests.
 * @internal
 */
export function _resetFileLoggingState(): void {
  sharedLogFileStream?.end();
  sharedLogFileStream = undefined;
  sharedLogFilePath = undefined;
}

function openLogFile(path: string, reset: boolean): void {
  if (sharedLogFileStream && sharedLogFilePath === path) {
    return;
  }
  sharedLogFileStream?.end();
  sharedLogFileStream = undefined;

  try {
    mkdirSync(dirname(path), { recursive: true });
    const stream = createWriteStream(path, { flags: reset ? "w" : "a" });
    stream.on("error", (error) => {
      console.error(`[codeloop] Log file write error: ${error.message}, disabling file logging`);
      if (sharedLogFileStream === stream) {
        sharedLogFileStream = undefined;
        sharedLogFilePath = undefined;
      }
    });
    sharedLogFileStream = stream;
    sharedLogFilePath = path;
  } catch (error) {
    console.error("Failed to initialize CODELOOP_LOG_FILE output:", error);
  }
}

/**
 * Create a logger.
 *
 * `CODELOOP_LOG_LEVEL` sets the level when `minLevel` is not given and
 * `CODELOOP_LOG_FILE` redirects output (without colors) to a file.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ name: "patch-engine", minLevel: 2 });
 * const silent = createLogger({ type: "hidden" });
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger<ILogObj> {
  const envMinLevel = parseLogLevel(process.env.CODELOOP_LOG_LEVEL);
  const envLogFile = process.env.CODELOOP_LOG_FILE?.trim() ?? "";
  const logReset = options.logReset ?? parseEnvBoolean(process.env.CODELOOP_LOG_RESET) ?? false;

  const minLevel = options.minLevel ?? envMinLevel ?? 4;
  const defaultType = options.type ?? "pretty";
  const name = options.name ?? "codeloop";

  if (envLogFile) {
    openLogFile(envLogFile, logReset);
  }

  const useFileLogging = Boolean(sharedLogFileStream) && defaultType !== "hidden";

  return new Logger<ILogObj>({
    name,
    minLevel,
    type: useFileLogging ? "pretty" : defaultType,
    hideLogPositionForProduction: useFileLogging || defaultType !== "pretty",
    prettyLogTemplate: LOG_TEMPLATE,
    overwrite: useFileLogging
      ? {
          transportFormatted: (logMetaMarkup: string, logArgs: unknown[]) => {
            if (!sharedLogFileStream) return;
            const meta = stripAnsi(logMetaMarkup);
            const args = logArgs.map((arg) =>
              typeof arg === "string" ? stripAnsi(arg) : JSON.stringify(arg),
            );
            sharedLogFileStream.write(`${meta}${args.join(" ")}\n`);
          },
        }
      : undefined,
  });
}

/**
 * Default logger of the library. Components derive named children from it.
 */
export const defaultLogger = createLogger();
