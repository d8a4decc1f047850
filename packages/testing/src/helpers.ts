import { createTool, formatToolCallBlock, type ToolCall, z } from "codeloop";

/**
 * Tool that echoes its `text` argument.
 */
export function createEchoTool(name = "echo") {
  return createTool({
    name,
    description: "Repeats the given text",
    schema: z.object({ text: z.string().describe("Text to repeat") }),
    execute: ({ text }) => text,
  });
}

/**
 * Tool that always throws the given message.
 */
export function createThrowingTool(name = "explode", message = "boom") {
  return createTool({
    name,
    description: "Always fails",
    schema: z.object({}),
    execute: () => {
      throw new Error(message);
    },
  });
}

/**
 * Model response carrying one tool call, optionally preceded by prose.
 */
export function toolCallResponse(name: string, args: ToolCall["arguments"] = {}, prose = ""): string {
  const block = formatToolCallBlock(name, args);
  return prose ? `${prose}\n${block}` : block;
}

export interface SearchReplaceOptions {
  file: string;
  search: string;
  replace: string;
  reason?: string;
}

/**
 * Patch block with one SEARCH/REPLACE pair. `search` and `replace` are written
 * line for line; an empty string leaves the section empty.
 */
export function searchReplaceBlock({ file, search, replace, reason }: SearchReplaceOptions): string {
  const section = (code: string) => (code === "" ? [] : code.replace(/\n$/, "").split("\n"));
  return [
    "<PATCH>",
    `File: ${file}`,
    ...(reason ? [`Reason: ${reason}`] : []),
    ">>>>>> SEARCH",
    ...section(search),
    "=======",
    ...section(replace),
    "<<<<<< REPLACE",
    "</PATCH>",
  ].join("\n");
}

/**
 * Context-anchored patch block holding a code fragment.
 */
export function contextBlock(file: string, code: string): string {
  return ["<PATCH>", `File: ${file}`, ...code.replace(/\n$/, "").split("\n"), "</PATCH>"].join("\n");
}
