import { Writable } from "node:stream";
import { createLogger } from "codeloop";
import { describe, expect, it } from "vitest";
import type { CLIEnvironment } from "./environment.js";
import { executeAction } from "./option-helpers.js";
import { createProgram } from "./program.js";

function createMockEnv(overrides: Partial<CLIEnvironment> = {}) {
  const written = { stdout: "", stderr: "" };
  let exitCode = 0;
  const sink = (key: keyof typeof written) =>
    new Writable({
      write(chunk: Buffer, _encoding, callback) {
        written[key] += chunk.toString("utf-8");
        callback();
      },
    });

  const env: CLIEnvironment = {
    argv: [],
    cwd: process.cwd(),
    stdin: process.stdin,
    stdout: sink("stdout"),
    stderr: sink("stderr"),
    vars: {},
    setExitCode: (code) => {
      exitCode = code;
    },
    createLogger: (name) => createLogger({ type: "hidden", name }),
    isTTY: false,
    prompt: async () => "",
    confirm: async (_question, defaultAnswer) => defaultAnswer,
    readInput: async () => "",
    ...overrides,
  };
  return { env, written, exitCode: () => exitCode };
}

describe("createProgram", () => {
  it("registers the agent and code commands", () => {
    const { env } = createMockEnv();

    expect(createProgram(env).commands.map((command) => command.name())).toEqual(["agent", "code"]);
  });

  it("shares the task options between commands", () => {
    const { env } = createMockEnv();

    for (const command of createProgram(env).commands) {
      expect(command.options.map((option) => option.long)).toEqual(["--model", "--files", "--yes"]);
    }
  });

  it("fails the agent command without an API key", async () => {
    const { env, written, exitCode } = createMockEnv();

    await createProgram(env).parseAsync(["node", "codeloop", "agent", "list", "the", "files"]);

    expect(exitCode()).toBe(1);
    expect(written.stderr).toContain("No API key found; set CODELOOP_API_KEY\n");
  });
});

describe("executeAction", () => {
  it("prints the error and sets exit code 1", async () => {
    const { env, written, exitCode } = createMockEnv();

    await executeAction(async () => {
      throw new Error("config exploded");
    }, env);

    expect(exitCode()).toBe(1);
    expect(written.stderr.endsWith(" config exploded\n")).toBe(true);
  });

  it("leaves the exit code alone on success", async () => {
    const { env, exitCode } = createMockEnv();

    await executeAction(async () => undefined, env);

    expect(exitCode()).toBe(0);
  });
});
