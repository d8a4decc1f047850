/**
 * Function-based tool creation helper.
 *
 * Parameters are typed from the zod schema.
 *
 * @example
 * ```typescript
 * const echo = createTool({
 *   name: "echo",
 *   description: "Repeats the given text",
 *   schema: z.object({ text: z.string() }),
 *   execute: ({ text }) => text,
 * });
 * ```
 */

import type * as z from "zod";
import { AbstractTool } from "./tool.js";
import type { ExecutionContext, ToolExample, ToolExecuteReturn } from "./types.js";

export interface CreateToolConfig<TSchema extends z.ZodType> {
  name: string;
  description: string;
  schema: TSchema;
  execute: (
    params: z.output<TSchema>,
    ctx: ExecutionContext,
  ) => ToolExecuteReturn | Promise<ToolExecuteReturn>;
  examples?: ToolExample<z.input<TSchema>>[];
}

export function createTool<TSchema extends z.ZodType>(
  config: CreateToolConfig<TSchema>,
): AbstractTool<TSchema> {
  class DynamicTool extends AbstractTool<TSchema> {
    readonly name = config.name;
    readonly description = config.description;
    readonly parameterSchema = config.schema;
    examples = config.examples;

    execute(params: z.output<TSchema>, ctx: ExecutionContext): ToolExecuteReturn | Promise<ToolExecuteReturn> {
      return config.execute(params, ctx);
    }
  }

  return new DynamicTool();
}
