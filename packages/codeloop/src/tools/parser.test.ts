import { describe, expect, it } from "vitest";
import { MalformedCallError } from "../core/errors.js";
import { stripMarkdownFences, ToolCallParser } from "./parser.js";

const parser = new ToolCallParser();

function block(body: string): string {
  return `<START_TOOL_CALL>\n${body}\n<END_TOOL_CALL>`;
}

describe("ToolCallParser", () => {
  describe("extract", () => {
    it("extracts a call surrounded by prose", () => {
      const text = `I'll read the file.\n${block("name: read_code\narguments:\n    files:\n        - path: src/a.ts")}\nThen I'll decide.`;

      const result = parser.extract(text);

      expect(result).toEqual({
        ok: true,
        value: {
          call: { name: "read_code", arguments: { files: [{ path: "src/a.ts" }] } },
          ignoredBlocks: 0,
        },
      });
    });

    it("returns no call when there is no marker", () => {
      expect(parser.extract("Just an answer.")).toEqual({ ok: true, value: undefined });
    });

    it("treats an empty block as no call", () => {
      expect(parser.extract("<START_TOOL_CALL>\n\n<END_TOOL_CALL>")).toEqual({ ok: true, value: undefined });
    });

    it("reports a missing closing marker with the line of the opening marker", () => {
      const result = parser.extract("Let me check.\n<START_TOOL_CALL>\nname: echo");

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(MalformedCallError);
      expect(result.error.message).toBe("Missing closing marker <END_TOOL_CALL> (line 2)");
      expect(result.error.line).toBe(2);
    });

    it("strips a markdown fence around the body", () => {
      const result = parser.extract(block("```yaml\nname: echo\narguments:\n    text: hi\n```"));

      expect(result.ok && result.value?.call).toEqual({ name: "echo", arguments: { text: "hi" } });
    });

    it("executes only the first of several blocks and counts the rest", () => {
      const text = [
        block("name: echo\narguments:\n    text: one"),
        block("name: echo\narguments:\n    text: two"),
        block("name: echo\narguments:\n    text: three"),
      ].join("\n");

      const result = parser.extract(text);

      expect(result.ok && result.value).toEqual({
        call: { name: "echo", arguments: { text: "one" } },
        ignoredBlocks: 2,
      });
    });

    it("reports invalid YAML with a position inside the response", () => {
      const result = parser.extract(`Intro\n${block("name: echo\narguments: [unclosed")}`);

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message.startsWith("Invalid tool call body:")).toBe(true);
      expect(result.error.line).toBeGreaterThanOrEqual(3);
    });

    it("rejects a body that is not a mapping", () => {
      const result = parser.extract(block("just some text"));

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.message).toBe("Tool call body must be a mapping with 'name' and 'arguments' (line 1)");
    });

    it("requires the name key", () => {
      const result = parser.extract(block("arguments:\n    text: hi"));

      expect(!result.ok && result.error.message).toBe("Missing required key 'name' (line 1)");
    });

    it("requires a non-empty name", () => {
      const result = parser.extract(block("name: '  '\narguments: {}"));

      expect(!result.ok && result.error.message).toBe("'name' must be a non-empty string (line 1)");
    });

    it("requires the arguments key", () => {
      const result = parser.extract(block("name: echo"));

      expect(!result.ok && result.error.message).toBe("Missing required key 'arguments' (line 1)");
    });

    it("rejects arguments that are not a mapping", () => {
      const result = parser.extract(block("name: echo\narguments:\n    - one"));

      expect(!result.ok && result.error.message).toBe("'arguments' must be a mapping (line 1)");
    });

    it("treats empty arguments as an empty mapping and trims the name", () => {
      const result = parser.extract(block("name: ' list_files '\narguments:"));

      expect(result.ok && result.value?.call).toEqual({ name: "list_files", arguments: {} });
    });

    it("keeps multi-line string arguments intact", () => {
      const result = parser.extract(block("name: execute_shell\narguments:\n    script: |\n        ls\n        pwd"));

      expect(result.ok && result.value?.call.arguments).toEqual({ script: "ls\npwd\n" });
    });
  });

  it("supports custom markers", () => {
    const custom = new ToolCallParser({ startMarker: "[[call]]", endMarker: "[[/call]]" });

    expect(custom.hasDirective("[[call]]")).toBe(true);
    expect(custom.hasDirective("<START_TOOL_CALL>")).toBe(false);
    expect(custom.extract("[[call]]\nname: echo\narguments: {}\n[[/call]]")).toEqual({
      ok: true,
      value: { call: { name: "echo", arguments: {} }, ignoredBlocks: 0 },
    });
  });
});

describe("stripMarkdownFences", () => {
  it("removes the fence and counts the removed leading lines", () => {
    expect(stripMarkdownFences("\n```yaml\nname: echo\n```\n")).toEqual({
      content: "name: echo",
      removedLeadingLines: 2,
    });
  });

  it("leaves unfenced bodies alone apart from leading blank lines", () => {
    expect(stripMarkdownFences("\nname: echo\n")).toEqual({ content: "name: echo\n", removedLeadingLines: 1 });
  });
});
