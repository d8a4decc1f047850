import { describe, expect, it } from "vitest";
import { MockTransport, scriptedInput } from "../../../../testing/src/index.js";
import { createLogger } from "../../logging/logger.js";
import { ToolRegistry } from "../registry.js";
import { REVIEW_TOOL_NAMES } from "./code-review.js";
import { createDefaultTools, getBuiltinToolNames } from "./index.js";

describe("createDefaultTools", () => {
  it("omits tools whose dependencies are missing", () => {
    expect(createDefaultTools().map((tool) => tool.name)).toEqual(["execute_shell", "read_code", "search_code"]);
  });

  it("builds every tool when dependencies are given", () => {
    const tools = createDefaultTools({ askUser: scriptedInput([]), createTransport: () => new MockTransport() });

    expect(tools.map((tool) => tool.name)).toEqual(getBuiltinToolNames());
  });

  it("limits the set to the given names", () => {
    expect(createDefaultTools({}, ["read_code"]).map((tool) => tool.name)).toEqual(["read_code"]);
  });
});

describe("code_review", () => {
  it("runs a reviewing sub-agent and returns its findings", async () => {
    const transport = new MockTransport(["I inspected the commit.", "findings: []"]);
    const tools = createDefaultTools({
      askUser: scriptedInput([]),
      createTransport: () => transport,
      retry: { enabled: false },
    });
    const registry = new ToolRegistry({ logger: createLogger({ type: "hidden" }) }).registerMany(tools);

    const result = await registry.execute("code_review", { commit: "HEAD", requirement: "Add retries" });

    expect(result).toEqual({ success: true, stdout: "findings: []", stderr: "" });
    expect(transport.calls[0]?.[1]).toEqual({
      role: "user",
      content: "Review commit HEAD for this requirement: Add retries",
    });
    const systemPrompt = transport.systemMessages[0] ?? "";
    for (const name of REVIEW_TOOL_NAMES) {
      expect(systemPrompt).toContain(`## ${name}\n`);
    }
    expect(systemPrompt).not.toContain("## code_review\n");
  });
});
