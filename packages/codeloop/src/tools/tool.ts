import { dump } from "js-yaml";
import * as z from "zod";
import { TOOL_CALL_END, TOOL_CALL_START } from "../core/constants.js";
import type {
  ExecutionContext,
  ToolDescriptor,
  ToolExample,
  ToolExecuteReturn,
  ToolParameterDescriptor,
} from "./types.js";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeType(prop: Record<string, unknown>): string {
  const type = typeof prop.type === "string" ? prop.type : "any";
  if (type === "array") {
    const items = isRecord(prop.items) && typeof prop.items.type === "string" ? prop.items.type : "any";
    return `array of ${items}`;
  }
  return type;
}

function requiredKeys(schema: Record<string, unknown>): string[] {
  return Array.isArray(schema.required)
    ? schema.required.filter((key): key is string => typeof key === "string")
    : [];
}

/**
 * Format a JSON Schema object as plain text, one parameter per line.
 * Nested objects are indented below their parent.
 */
export function formatSchemaAsPlainText(schema: Record<string, unknown>, indent = ""): string {
  const lines: string[] = [];
  const properties = isRecord(schema.properties) ? schema.properties : {};
  const required = requiredKeys(schema);

  for (const [key, prop] of Object.entries(properties)) {
    if (!isRecord(prop)) continue;

    let line = `${indent}- ${key} (${describeType(prop)})`;
    if (required.includes(key)) {
      line += " [required]";
    }
    if (typeof prop.description === "string") {
      line += `: ${prop.description}`;
    }
    if (Array.isArray(prop.enum)) {
      line += ` - one of: ${prop.enum.map((v) => `"${String(v)}"`).join(", ")}`;
    }
    lines.push(line);

    if (prop.type === "object" && isRecord(prop.properties)) {
      lines.push(formatSchemaAsPlainText(prop, `${indent}  `));
    }
  }

  return lines.join("\n");
}

/**
 * Render a call in the tool-call wire format.
 */
export function formatToolCallBlock(name: string, args: unknown): string {
  const body = dump({ name, arguments: args }, { indent: 4, lineWidth: -1, noRefs: true }).trimEnd();
  return `${TOOL_CALL_START}\n${body}\n${TOOL_CALL_END}`;
}

/**
 * Base class for tools. Most tools are built with `createTool()`; extend this
 * class directly when a tool needs constructor-injected collaborators.
 */
export abstract class AbstractTool<TSchema extends z.ZodType = z.ZodType> {
  /** Identifier the model uses in the `name:` field. */
  abstract readonly name: string;

  abstract readonly description: string;

  /** Parameter contract, validated before every execution. */
  abstract readonly parameterSchema: TSchema;

  /** Usage examples rendered into the instructions. */
  examples?: ToolExample<z.input<TSchema>>[];

  abstract execute(
    params: z.output<TSchema>,
    ctx: ExecutionContext,
  ): ToolExecuteReturn | Promise<ToolExecuteReturn>;

  private jsonSchema(): Record<string, unknown> {
    const schema: unknown = z.toJSONSchema(this.parameterSchema, { target: "draft-7", io: "input" });
    return isRecord(schema) ? schema : {};
  }

  describe(): ToolDescriptor {
    const schema = this.jsonSchema();
    const properties = isRecord(schema.properties) ? schema.properties : {};
    const required = requiredKeys(schema);
    const parameters: Record<string, ToolParameterDescriptor> = {};

    for (const [key, prop] of Object.entries(properties)) {
      if (!isRecord(prop)) continue;
      parameters[key] = {
        type: describeType(prop),
        description: typeof prop.description === "string" ? prop.description : undefined,
        required: required.includes(key),
      };
    }

    return { name: this.name, description: this.description, parameters };
  }

  /**
   * Instruction text for the model: description, parameters and examples.
   */
  getInstruction(): string {
    const parts: string[] = [this.description];

    const parameters = formatSchemaAsPlainText(this.jsonSchema());
    if (parameters) {
      parts.push("", "Parameters:", parameters);
    }

    if (this.examples && this.examples.length > 0) {
      parts.push("", "Examples:");
      this.examples.forEach((example, index) => {
        if (index > 0) {
          parts.push("");
        }
        if (example.comment) {
          parts.push(`# ${example.comment}`);
        }
        parts.push(formatToolCallBlock(this.name, example.params));
        if (example.output !== undefined) {
          parts.push("Expected Output:", example.output);
        }
      });
    }

    return parts.join("\n");
  }
}
