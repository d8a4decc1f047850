import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { load as parseYaml } from "js-yaml";
import * as z from "zod";
import { ConfigError } from "./config.js";
import { TASKS_FILE } from "./constants.js";

export interface PredefinedTask {
  name: string;
  description: string;
}

const tasksSchema = z.record(z.string(), z.string().min(1));

/**
 * Reads the predefined task file (`name: description` pairs) of a directory.
 * Returns an empty list when the file does not exist.
 *
 * @throws ConfigError if the file is not a mapping of strings
 */
export async function loadPredefinedTasks(cwd: string): Promise<PredefinedTask[]> {
  const path = join(cwd, TASKS_FILE);
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return [];
    }
    throw new ConfigError(`Failed to read task file: ${error instanceof Error ? error.message : "Unknown error"}`, path);
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Invalid YAML syntax: ${error instanceof Error ? error.message : "Unknown error"}`, path);
  }
  if (raw === undefined || raw === null) {
    return [];
  }

  const parsed = tasksSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError("Task file must map task names to descriptions", path);
  }
  return Object.entries(parsed.data).map(([name, description]) => ({ name, description }));
}

/** Numbered menu, one task per line. */
export function renderTaskMenu(tasks: readonly PredefinedTask[]): string {
  return tasks.map((task, index) => `${index + 1}. ${task.name}: ${task.description}`).join("\n");
}

/**
 * Maps a menu answer to a task: a menu number or task name selects a predefined
 * task, anything else is the task itself.
 */
export function selectTask(tasks: readonly PredefinedTask[], answer: string): string {
  const trimmed = answer.trim();
  if (/^\d+$/.test(trimmed)) {
    const task = tasks[Number(trimmed) - 1];
    if (task) return task.description;
  }
  return tasks.find((task) => task.name === trimmed)?.description ?? trimmed;
}
