import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  createTempWorkspace,
  InMemoryGitClient,
  MockTransport,
  scriptedConfirm,
  searchReplaceBlock,
  type TempWorkspace,
} from "../../../testing/src/index.js";
import type { Notice } from "../core/notice.js";
import { createLogger } from "../logging/logger.js";
import {
  formatPatchSummary,
  modelCommitMessage,
  PatchEngine,
  type PatchEngineOptions,
  SNAPSHOT_COMMIT_MESSAGE,
} from "./engine.js";

const logger = createLogger({ type: "hidden" });

describe("PatchEngine", () => {
  let ws: TempWorkspace;
  let git: InMemoryGitClient;
  let notices: Notice[];

  beforeEach(async () => {
    ws = await createTempWorkspace({ "a.txt": "a\nb\nc\n", "b.txt": "x\n" });
    git = await InMemoryGitClient.init(ws.root);
    notices = [];
  });

  afterEach(async () => {
    await ws.cleanup();
  });

  function engine(options: Partial<PatchEngineOptions> = {}): PatchEngine {
    return new PatchEngine({
      git,
      logger,
      retry: { enabled: false },
      onNotice: (notice) => notices.push(notice),
      ...options,
    });
  }

  it("applies, stages and commits a patch", async () => {
    const report = await engine().apply(searchReplaceBlock({ file: "a.txt", search: "b\n", replace: "B\n" }));

    expect(report.status).toBe("committed");
    expect(await ws.read("a.txt")).toBe("a\nB\nc\n");
    expect(git.log()).toEqual(["Initial commit", "Apply patches to a.txt"]);
    expect(report.files).toEqual([{ file: "a.txt", status: "applied" }]);
    expect(report.commits).toHaveLength(1);
    expect(report.summary).toBe(
      `The patches have been applied\nFiles:\n- a.txt: applied\nCommit History:\n- ${report.commits[0]?.id.slice(0, 7)}: Apply patches to a.txt`,
    );
    expect(report.diff).toContain("-b\n+B");
  });

  it("restores a file whose patch does not match and keeps the others", async () => {
    const response = [
      searchReplaceBlock({ file: "a.txt", search: "b\n", replace: "B\n" }),
      searchReplaceBlock({ file: "b.txt", search: "missing\n", replace: "y\n" }),
    ].join("\n");

    const report = await engine().apply(response);

    expect(report.status).toBe("committed");
    expect(report.files).toEqual([
      { file: "a.txt", status: "applied" },
      { file: "b.txt", status: "failed", error: "File b.txt does not contain the search block:\nmissing\n" },
    ]);
    expect(await ws.read("a.txt")).toBe("a\nB\nc\n");
    expect(await ws.read("b.txt")).toBe("x\n");
    expect(git.show("b.txt")).toBe("x\n");
    expect(notices).toContainEqual({
      severity: "error",
      message: "File b.txt does not contain the search block:\nmissing\n",
    });
  });

  it("removes a new file whose patch fails", async () => {
    const report = await engine().apply(
      searchReplaceBlock({ file: "src/new.txt", search: "x\n", replace: "y\n" }),
    );

    expect(report.status).toBe("failed");
    expect(ws.exists("src/new.txt")).toBe(false);
    expect(git.log()).toEqual(["Initial commit"]);
  });

  it("fails the session without committing when every file fails", async () => {
    const response = [
      searchReplaceBlock({ file: "a.txt", search: "missing\n", replace: "y\n" }),
      searchReplaceBlock({ file: "b.txt", search: "", replace: "" }),
      searchReplaceBlock({ file: "b.txt", search: "x\n", replace: "y\n" }),
    ].join("\n");

    const report = await engine().apply(response);

    expect(report.status).toBe("failed");
    expect(report.commits).toEqual([]);
    expect(report.summary).toBe(
      "The patches could not be applied\nFiles:\n" +
        "- a.txt: failed (File a.txt does not contain the search block:\nmissing\n)\n" +
        "- b.txt: failed (File b.txt does not contain the search block:\nx\n)",
    );
    expect(git.log()).toEqual(["Initial commit"]);
    expect(await ws.read("a.txt")).toBe("a\nb\nc\n");
    expect(await ws.read("b.txt")).toBe("x\n");
  });

  it("normalizes absolute and dotted targets to repository paths", async () => {
    const response = [
      searchReplaceBlock({ file: join(ws.root, "a.txt"), search: "b\n", replace: "B\n" }),
      searchReplaceBlock({ file: "./a.txt", search: "c\n", replace: "C\n" }),
    ].join("\n");

    const report = await engine().apply(response);

    expect(report.files).toEqual([{ file: "a.txt", status: "applied" }]);
    expect(git.log()).toEqual(["Initial commit", "Apply patches to a.txt"]);
    expect(git.show("a.txt")).toBe("a\nB\nC\n");
  });

  it("restores a tracked file addressed by its absolute path", async () => {
    const response = [
      searchReplaceBlock({ file: "a.txt", search: "b\n", replace: "B\n" }),
      searchReplaceBlock({ file: join(ws.root, "b.txt"), search: "missing\n", replace: "y\n" }),
    ].join("\n");

    const report = await engine().apply(response);

    expect(report.files[1]).toEqual({
      file: "b.txt",
      status: "failed",
      error: "File b.txt does not contain the search block:\nmissing\n",
    });
    expect(await ws.read("b.txt")).toBe("x\n");
    expect(git.show("b.txt")).toBe("x\n");
  });

  it("applies patches to the same file in order within one block", async () => {
    const response = [
      "<PATCH>",
      "File: a.txt",
      ">>>>>> SEARCH",
      "a",
      "=======",
      "A",
      "<<<<<< REPLACE",
      ">>>>>> SEARCH",
      "c",
      "=======",
      "C",
      "<<<<<< REPLACE",
      "</PATCH>",
    ].join("\n");

    await engine().apply(response);

    expect(await ws.read("a.txt")).toBe("A\nb\nC\n");
  });

  it("resets the working tree to the baseline when the commit is rejected", async () => {
    const confirm = scriptedConfirm([false]);
    const diffs: string[] = [];
    const response = [
      searchReplaceBlock({ file: "a.txt", search: "b\n", replace: "B\n" }),
      searchReplaceBlock({ file: "src/new.txt", search: "", replace: "new\n" }),
    ].join("\n");

    const report = await engine({ confirm, onDiff: (diff) => diffs.push(diff) }).apply(response);

    expect(report.status).toBe("rejected");
    expect(confirm.questions).toEqual(["Commit these changes?"]);
    expect(diffs).toHaveLength(1);
    expect(diffs[0]).toContain("+new");
    expect(await ws.snapshot()).toEqual(
      new Map([
        ["a.txt", "a\nb\nc\n"],
        ["b.txt", "x\n"],
      ]),
    );
    expect(ws.exists("src")).toBe(false);
    expect(git.log()).toEqual(["Initial commit"]);
    expect(report.summary).toBe(
      "Commit was rejected; working tree reset to the baseline revision\nFiles:\n- a.txt: applied\n- src/new.txt: applied",
    );
  });

  it("commits when the human confirms", async () => {
    const confirm = scriptedConfirm([true]);

    const report = await engine({ confirm }).apply(searchReplaceBlock({ file: "a.txt", search: "b\n", replace: "B\n" }));

    expect(report.status).toBe("committed");
    expect(git.log()).toHaveLength(2);
  });

  it("snapshots uncommitted work before recording the baseline", async () => {
    await ws.write("notes.txt", "mine\n");
    const confirm = scriptedConfirm([false]);

    const report = await engine({ confirm }).apply(searchReplaceBlock({ file: "a.txt", search: "b\n", replace: "B\n" }));

    expect(report.status).toBe("rejected");
    expect(git.log()).toEqual(["Initial commit", SNAPSHOT_COMMIT_MESSAGE]);
    expect(report.baseline).toBe(await git.currentRevision());
    expect(await ws.read("notes.txt")).toBe("mine\n");
    expect(await ws.read("a.txt")).toBe("a\nb\nc\n");
  });

  it("leaves a dirty tree alone when snapshots are disabled", async () => {
    await ws.write("notes.txt", "mine\n");

    await engine({ snapshotDirtyTree: false }).apply(searchReplaceBlock({ file: "a.txt", search: "b\n", replace: "B\n" }));

    expect(git.log()).toEqual(["Initial commit", "Apply patches to a.txt"]);
    expect(git.show("notes.txt")).toBe("mine\n");
  });

  it("reports no changes when the patch leaves the file identical", async () => {
    const report = await engine().apply(searchReplaceBlock({ file: "a.txt", search: "b\n", replace: "b\n" }));

    expect(report.status).toBe("no-changes");
    expect(report.summary).toBe("No changes to commit\nFiles:\n- a.txt: applied");
    expect(git.log()).toEqual(["Initial commit"]);
  });

  it("deletes a tracked file", async () => {
    const report = await engine().apply(searchReplaceBlock({ file: "b.txt", search: "", replace: "" }));

    expect(report.status).toBe("committed");
    expect(ws.exists("b.txt")).toBe(false);
    expect(git.show("b.txt")).toBeUndefined();
  });

  it("reports unparseable responses without touching the tree", async () => {
    const report = await engine().apply("<PATCH>\nFile: a.txt\nno end");

    expect(report).toEqual({
      status: "failed",
      files: [],
      commits: [],
      diff: "",
      summary: "Failed to parse patches: Unterminated <PATCH> block (line 1)",
    });
    expect(notices).toEqual([{ severity: "error", message: "Unterminated <PATCH> block (line 1)" }]);
  });

  it("reports responses without blocks as no changes", async () => {
    const report = await engine().apply("All done.");

    expect(report.status).toBe("no-changes");
    expect(report.summary).toBe("No patch blocks found");
  });

  it("rejects paths outside the repository", async () => {
    const report = await engine().apply(searchReplaceBlock({ file: "../escape.txt", search: "", replace: "x\n" }));

    expect(report.files).toHaveLength(1);
    expect(report.files[0]?.status).toBe("failed");
    expect(report.status).toBe("failed");
  });

  it("lets the human replace the summary", async () => {
    const report = await engine({ reviewResult: async (summary) => `${summary}\n(reviewed)` }).apply("Nothing here.");

    expect(report.summary).toBe("No patch blocks found\n(reviewed)");
  });

  it("uses generated commit messages and falls back when generation fails", async () => {
    await engine({ commitMessage: async () => "Uppercase b" }).apply(
      searchReplaceBlock({ file: "a.txt", search: "b\n", replace: "B\n" }),
    );
    await engine({
      commitMessage: async () => {
        throw new Error("model offline");
      },
    }).apply(searchReplaceBlock({ file: "b.txt", search: "x\n", replace: "X\n" }));

    expect(git.log()).toEqual(["Initial commit", "Uppercase b", "Apply patches to b.txt"]);
  });

  describe("context blocks", () => {
    it("merges a fragment through the model", async () => {
      const transport = new MockTransport(["Here you go:\n<MERGED_CODE>\na\nb\nc\nd\n</MERGED_CODE>"]);

      const report = await engine({ transport }).apply("<PATCH>\nFile: a.txt\nb\nc\nd\n</PATCH>");

      expect(report.status).toBe("committed");
      expect(await ws.read("a.txt")).toBe("a\nb\nc\nd\n");
      expect(transport.calls).toHaveLength(1);
      expect(transport.calls[0]?.[0]?.content).toContain("File: a.txt\nOriginal content:\na\nb\nc\n");
    });

    it("fails the file when no model is configured", async () => {
      const report = await engine().apply("<PATCH>\nFile: a.txt\nnew line\n</PATCH>");

      expect(report.files).toEqual([
        {
          file: "a.txt",
          status: "failed",
          error: "Model call failed: no model is configured to merge the change into a.txt",
        },
      ]);
    });

    it("fails the file when the reply has no merged code", async () => {
      const transport = new MockTransport(["I cannot do that."]);

      const report = await engine({ transport }).apply("<PATCH>\nFile: a.txt\nnew line\n</PATCH>");

      expect(report.files[0]?.error).toBe("Merge response for a.txt has no merged code block");
      expect(await ws.read("a.txt")).toBe("a\nb\nc\n");
    });
  });
});

describe("formatPatchSummary", () => {
  it("lists failures with their errors", () => {
    expect(
      formatPatchSummary("failed", [{ file: "a.ts", status: "failed", error: "no match" }], []),
    ).toBe("The patches could not be applied\nFiles:\n- a.ts: failed (no match)");
  });
});

describe("modelCommitMessage", () => {
  it("asks the model and keeps the first line", async () => {
    const transport = new MockTransport(['"Fix the parser"\n\nMore details.']);

    const message = await modelCommitMessage(transport, { enabled: false })("diff --git a/x b/x", ["x"]);

    expect(message).toBe("Fix the parser");
    expect(transport.lastPrompt()?.content).toContain("diff --git a/x b/x");
  });
});
