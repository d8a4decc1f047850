import { describe, expect, it } from "vitest";
import { createTempWorkspace } from "../../../testing/src/index.js";
import { FatalIOError } from "../core/errors.js";
import { createLogger } from "../logging/logger.js";
import { FileMethodologyStore, methodologyFileName } from "./file-store.js";

const logger = createLogger({ type: "hidden" });

describe("methodologyFileName", () => {
  it("slugs the problem text", () => {
    expect(methodologyFileName("Add a CLI flag: --log-level!")).toBe("add-a-cli-flag-log-level-bd3155f4.yaml");
  });

  it("falls back when nothing is left", () => {
    expect(methodologyFileName("???")).toBe("methodology-a03b221c.yaml");
  });

  it("gives problems that share a slug different names", () => {
    expect(methodologyFileName("修复解析器")).toBe("methodology-74e6b2cb.yaml");
    expect(methodologyFileName("重构日志")).toBe("methodology-57fb700b.yaml");
    expect(methodologyFileName(`${"word ".repeat(30)}one`)).not.toBe(methodologyFileName(`${"word ".repeat(30)}two`));
  });

  it("caps the slug length", () => {
    expect(methodologyFileName("word ".repeat(30))).toBe(`${"word-".repeat(12).slice(0, 59)}-9e80c85b.yaml`);
  });
});

describe("FileMethodologyStore", () => {
  it("returns nothing for a missing directory", async () => {
    const workspace = await createTempWorkspace();
    try {
      const store = new FileMethodologyStore(workspace.path("missing"), logger);
      expect(await store.find("anything")).toEqual([]);
    } finally {
      await workspace.cleanup();
    }
  });

  it("stores write-ups as YAML and finds them again", async () => {
    const workspace = await createTempWorkspace();
    try {
      const store = new FileMethodologyStore(workspace.path("methodology"), logger);
      await store.add("Fix parser tests", "1. Run the tests\n2. Read the parser");

      expect(await workspace.read("methodology/fix-parser-tests-cff6200a.yaml")).toBe(
        "problem: Fix parser tests\nmethodology: |-\n  1. Run the tests\n  2. Read the parser\n",
      );
      expect(await store.find("fix the parser tests")).toEqual([
        { problem: "Fix parser tests", methodology: "1. Run the tests\n2. Read the parser", score: 0.75 },
      ]);
    } finally {
      await workspace.cleanup();
    }
  });

  it("skips invalid files", async () => {
    const workspace = await createTempWorkspace({
      "methodology/broken.yaml": "problem: [unclosed",
      "methodology/incomplete.yaml": "problem: fix parser\n",
      "methodology/notes.txt": "problem: fix parser\nmethodology: ignored\n",
      "methodology/valid.yml": "problem: fix parser\nmethodology: Read it first\n",
    });
    try {
      const store = new FileMethodologyStore(workspace.path("methodology"), logger);
      expect(await store.load()).toEqual([{ problem: "fix parser", methodology: "Read it first" }]);
    } finally {
      await workspace.cleanup();
    }
  });

  it("fails with a fatal I/O error when the directory cannot be created", async () => {
    const workspace = await createTempWorkspace({ blocker: "a file" });
    try {
      const store = new FileMethodologyStore(workspace.path("blocker/methodology"), logger);
      await expect(store.add("problem", "steps")).rejects.toBeInstanceOf(FatalIOError);
    } finally {
      await workspace.cleanup();
    }
  });
});
