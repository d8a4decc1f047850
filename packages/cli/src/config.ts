import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join } from "node:path";
import { load as parseToml } from "js-toml";
import * as z from "zod";
import { DEFAULT_API_KEY_ENV, DEFAULT_MODEL, LOG_LEVELS } from "./constants.js";

/**
 * Returns the default config file path: ~/.codeloop/config.toml
 */
export function getConfigPath(): string {
  return join(homedir(), ".codeloop", "config.toml");
}

/**
 * Configuration validation error.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly path?: string,
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = "ConfigError";
  }
}

const globalSchema = z.strictObject({
  "log-level": z.enum(LOG_LEVELS).optional(),
});

const modelSchema = z.strictObject({
  "base-url": z.url().optional(),
  "api-key-env": z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  "max-tokens": z.int().positive().optional(),
  temperature: z.number().min(0).max(2).optional(),
});

const agentSchema = z.strictObject({
  "max-turns-before-reminder": z.int().positive().optional(),
  "system-prompt": z.string().optional(),
  methodology: z.boolean().optional(),
});

const codeSchema = z.strictObject({
  "confirm-before-commit": z.boolean().optional(),
  "confirm-result": z.boolean().optional(),
  "generate-commit-message": z.boolean().optional(),
  /** Offer the file list for adjustment before the agent starts. */
  "select-files": z.boolean().optional(),
});

const configSchema = z.strictObject({
  global: globalSchema.optional(),
  model: modelSchema.optional(),
  agent: agentSchema.optional(),
  code: codeSchema.optional(),
});

export type CLIConfig = z.infer<typeof configSchema>;
export type ModelConfig = z.infer<typeof modelSchema>;
export type AgentConfig = z.infer<typeof agentSchema>;
export type CodeConfig = z.infer<typeof codeSchema>;

function issuePath(path: readonly PropertyKey[]): string {
  const [section, ...rest] = path.map(String);
  if (section === undefined) {
    return "config";
  }
  return rest.length > 0 ? `[${section}].${rest.join(".")}` : `[${section}]`;
}

/**
 * Validates a parsed TOML document.
 *
 * @throws ConfigError naming the first offending key
 */
export function validateConfig(raw: unknown, configPath?: string): CLIConfig {
  const parsed = configSchema.safeParse(raw);
  if (parsed.success) {
    return parsed.data;
  }
  const [issue] = parsed.error.issues;
  if (!issue) {
    throw new ConfigError("Invalid configuration", configPath);
  }
  if (issue.code === "unrecognized_keys") {
    const keys = issue.keys.map((key) => (issue.path.length > 0 ? `${issuePath(issue.path)}.${key}` : `[${key}]`));
    throw new ConfigError(`${keys.join(", ")} is not a valid option`, configPath);
  }
  throw new ConfigError(`${issuePath(issue.path)}: ${issue.message}`, configPath);
}

/**
 * Loads configuration from `configPath` (default ~/.codeloop/config.toml).
 * Returns an empty config when the file does not exist.
 *
 * @throws ConfigError if the file exists but cannot be read or validated
 */
export function loadConfig(configPath = getConfigPath()): CLIConfig {
  if (!existsSync(configPath)) {
    return {};
  }

  let content: string;
  try {
    content = readFileSync(configPath, "utf-8");
  } catch (error) {
    throw new ConfigError(
      `Failed to read config file: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  let raw: unknown;
  try {
    raw = parseToml(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid TOML syntax: ${error instanceof Error ? error.message : "Unknown error"}`,
      configPath,
    );
  }

  return validateConfig(raw, configPath);
}

export interface ModelSettings {
  model: string;
  /** Environment variable the API key is read from */
  apiKeyEnv: string;
  baseURL?: string;
  apiKey?: string;
  maxTokens?: number;
  temperature?: number;
}

/**
 * Resolves model connection settings.
 * Priority: CLI flag > environment > config file > defaults
 */
export function resolveModelSettings(
  config: ModelConfig | undefined,
  flags: { model?: string },
  env: NodeJS.ProcessEnv = process.env,
): ModelSettings {
  const apiKeyEnv = config?.["api-key-env"] ?? DEFAULT_API_KEY_ENV;
  return {
    model: flags.model ?? env.CODELOOP_MODEL ?? config?.model ?? DEFAULT_MODEL,
    apiKeyEnv,
    baseURL: env.CODELOOP_BASE_URL ?? config?.["base-url"],
    apiKey: env[apiKeyEnv],
    maxTokens: config?.["max-tokens"],
    temperature: config?.temperature,
  };
}

/**
 * Directory of stored methodologies: CODELOOP_METHODOLOGY_DIR or ~/.codeloop/methodology
 */
export function getMethodologyDir(env: NodeJS.ProcessEnv = process.env): string {
  return env.CODELOOP_METHODOLOGY_DIR?.trim() || join(homedir(), ".codeloop", "methodology");
}
