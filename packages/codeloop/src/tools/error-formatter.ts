import type * as z from "zod";
import { TOOL_CALL_END, TOOL_CALL_START } from "../core/constants.js";
import type { ToolNotFoundError } from "../core/errors.js";
import type { AbstractTool } from "./tool.js";

/**
 * Formats dispatch and parse failures as text the model can act on.
 *
 * Messages carry the tool's usage instructions or the wire-format reference so
 * that the next response can correct the mistake.
 */
export class ToolErrorFormatter {
  formatValidationError(toolName: string, zodError: z.ZodError, tool: AbstractTool): string {
    const parts: string[] = [`Invalid arguments for '${toolName}':`];

    for (const issue of zodError.issues) {
      const path = issue.path.map(String).join(".") || "arguments";
      parts.push(`  - ${path}: ${issue.message}`);
    }

    parts.push("", "Tool usage:", tool.getInstruction());
    return parts.join("\n");
  }

  formatParseError(message: string): string {
    return [
      "Failed to parse the tool call:",
      `  ${message}`,
      "",
      "Tool call format reference:",
      TOOL_CALL_START,
      "name: <tool name>",
      "arguments:",
      "    <parameter>: <value>",
      TOOL_CALL_END,
    ].join("\n");
  }

  formatNotFoundError(error: ToolNotFoundError, availableTools: string[]): string {
    const parts = [error.message];
    if (availableTools.length > 0) {
      parts.push(`Available tools: ${availableTools.join(", ")}`);
    } else {
      parts.push("No tools are currently available.");
    }
    return parts.join("\n");
  }
}
