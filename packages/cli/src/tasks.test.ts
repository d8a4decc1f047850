import { describe, expect, it } from "vitest";
import { createTempWorkspace } from "../../testing/src/index.js";
import { ConfigError } from "./config.js";
import { loadPredefinedTasks, renderTaskMenu, selectTask } from "./tasks.js";

const tasks = [
  { name: "lint", description: "Fix every lint warning" },
  { name: "docs", description: "Update the README" },
];

describe("loadPredefinedTasks", () => {
  it("reads name/description pairs", async () => {
    const workspace = await createTempWorkspace({
      ".codeloop.yaml": "lint: Fix every lint warning\ndocs: Update the README\n",
    });
    try {
      expect(await loadPredefinedTasks(workspace.root)).toEqual(tasks);
    } finally {
      await workspace.cleanup();
    }
  });

  it("returns nothing without a task file", async () => {
    const workspace = await createTempWorkspace();
    try {
      expect(await loadPredefinedTasks(workspace.root)).toEqual([]);
    } finally {
      await workspace.cleanup();
    }
  });

  it("rejects files that are not a mapping of strings", async () => {
    const workspace = await createTempWorkspace({ ".codeloop.yaml": "- lint\n- docs\n" });
    try {
      await expect(loadPredefinedTasks(workspace.root)).rejects.toThrow(
        new ConfigError("Task file must map task names to descriptions", workspace.path(".codeloop.yaml")),
      );
    } finally {
      await workspace.cleanup();
    }
  });
});

describe("renderTaskMenu", () => {
  it("numbers the tasks", () => {
    expect(renderTaskMenu(tasks)).toBe("1. lint: Fix every lint warning\n2. docs: Update the README");
  });
});

describe("selectTask", () => {
  it("selects by number or name", () => {
    expect(selectTask(tasks, "2")).toBe("Update the README");
    expect(selectTask(tasks, " lint ")).toBe("Fix every lint warning");
  });

  it("treats anything else as the task itself", () => {
    expect(selectTask(tasks, "7")).toBe("7");
    expect(selectTask(tasks, "Rename the config module")).toBe("Rename the config module");
  });
});
