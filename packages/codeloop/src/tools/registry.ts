import type { ILogObj, Logger } from "tslog";
import { ArgumentValidationError, ToolExecutionError, ToolNotFoundError } from "../core/errors.js";
import { defaultLogger } from "../logging/logger.js";
import { ToolErrorFormatter } from "./error-formatter.js";
import type { AbstractTool } from "./tool.js";
import {
  type ExecutionContext,
  failureResult,
  successResult,
  type ToolCall,
  type ToolDescriptor,
  type ToolExecuteReturn,
  type ToolResult,
} from "./types.js";

export interface ToolRegistryOptions {
  /** Directory tools resolve relative paths against. Defaults to `process.cwd()`. */
  cwd?: string;
  logger?: Logger<ILogObj>;
}

function normalizeResult(output: ToolExecuteReturn): ToolResult {
  return typeof output === "string" ? successResult(output) : output;
}

/**
 * Folds a tool result into the single text message appended to the conversation.
 */
export function formatToolResult(result: ToolResult): string {
  const sections = [result.success ? "Status: success" : "Status: failed"];
  if (result.error) {
    sections.push(`Error: ${result.error}`);
  }
  if (result.stdout) {
    sections.push(`Stdout:\n${result.stdout}`);
  }
  if (result.stderr) {
    sections.push(`Stderr:\n${result.stderr}`);
  }
  if (result.success && !result.stdout && !result.stderr) {
    sections.push("(no output)");
  }
  return sections.join("\n");
}

/**
 * Holds the tools one agent may call and dispatches calls to them.
 *
 * Every agent gets its own instance; filters set with {@link useTools} and
 * {@link dontUseTools} only affect the instance they are called on.
 *
 * @example
 * ```typescript
 * const registry = new ToolRegistry({ cwd: repoRoot });
 * registry.registerMany(createDefaultTools({ askUser }));
 *
 * const reviewer = registry.fork().useTools(["read_code", "search_code"]);
 * ```
 */
export class ToolRegistry {
  private readonly tools = new Map<string, AbstractTool>();
  private allowList?: Set<string>;
  private readonly denyList = new Set<string>();
  private readonly formatter = new ToolErrorFormatter();
  private readonly logger: Logger<ILogObj>;
  readonly cwd: string;

  constructor(options: ToolRegistryOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.logger = options.logger ?? defaultLogger.getSubLogger({ name: "tool-registry" });
  }

  /**
   * Adds a tool. A tool registered under an existing name replaces it.
   */
  register(tool: AbstractTool): this {
    if (this.tools.has(tool.name)) {
      this.logger.debug(`Replacing tool '${tool.name}'`);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  registerMany(tools: Iterable<AbstractTool>): this {
    for (const tool of tools) {
      this.register(tool);
    }
    return this;
  }

  private isEnabled(name: string): boolean {
    if (this.denyList.has(name)) return false;
    return this.allowList ? this.allowList.has(name) : true;
  }

  /** Returns an enabled tool. */
  get(name: string): AbstractTool | undefined {
    return this.isEnabled(name) ? this.tools.get(name) : undefined;
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  getNames(): string[] {
    return [...this.tools.keys()].filter((name) => this.isEnabled(name));
  }

  listAvailable(): ToolDescriptor[] {
    return this.getNames().flatMap((name) => {
      const tool = this.tools.get(name);
      return tool ? [tool.describe()] : [];
    });
  }

  /**
   * Restricts this registry to the named tools. Unknown names are ignored.
   */
  useTools(names: readonly string[]): this {
    this.allowList = new Set(names);
    return this;
  }

  /**
   * Hides the named tools from this registry.
   */
  dontUseTools(names: readonly string[]): this {
    for (const name of names) {
      this.denyList.add(name);
    }
    return this;
  }

  /**
   * Independent copy sharing the tool instances but not the filters.
   */
  fork(options: ToolRegistryOptions = {}): ToolRegistry {
    const copy = new ToolRegistry({ cwd: options.cwd ?? this.cwd, logger: options.logger ?? this.logger });
    for (const tool of this.tools.values()) {
      copy.tools.set(tool.name, tool);
    }
    if (this.allowList) {
      copy.allowList = new Set(this.allowList);
    }
    for (const name of this.denyList) {
      copy.denyList.add(name);
    }
    return copy;
  }

  /**
   * Runs a tool. Never throws: unknown names, invalid arguments and failures
   * inside the tool all come back as unsuccessful results.
   */
  async execute(name: string, args: Record<string, unknown>): Promise<ToolResult> {
    const tool = this.get(name);
    if (!tool) {
      const error = new ToolNotFoundError(name);
      this.logger.warn(error.message);
      return failureResult(this.formatter.formatNotFoundError(error, this.getNames()));
    }

    const parsed = tool.parameterSchema.safeParse(args);
    if (!parsed.success) {
      const error = new ArgumentValidationError(name, this.formatter.formatValidationError(name, parsed.error, tool));
      this.logger.warn(`Invalid arguments for '${name}'`, parsed.error.issues);
      return failureResult(error.message);
    }

    const ctx: ExecutionContext = {
      cwd: this.cwd,
      logger: this.logger.getSubLogger({ name: `tool:${name}` }),
    };

    try {
      this.logger.debug(`Executing tool '${name}'`, args);
      return normalizeResult(await tool.execute(parsed.data, ctx));
    } catch (error) {
      const wrapped = new ToolExecutionError(name, error);
      this.logger.error(wrapped.message);
      return failureResult(wrapped.message);
    }
  }

  executeCall(call: ToolCall): Promise<ToolResult> {
    return this.execute(call.name, call.arguments);
  }

  formatResult(result: ToolResult): string {
    return formatToolResult(result);
  }

  /**
   * Catalogue of the enabled tools for the system prompt.
   */
  toolHelpText(): string {
    return this.getNames()
      .flatMap((name) => {
        const tool = this.tools.get(name);
        return tool ? [`## ${name}\n${tool.getInstruction()}`] : [];
      })
      .join("\n\n");
  }
}
