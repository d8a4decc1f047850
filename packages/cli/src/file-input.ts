import { readFile, stat } from "node:fs/promises";
import { resolve } from "node:path";
import {
  describeError,
  FatalIOError,
  INTERRUPT_INPUT,
  type NoticeListener,
  numberLines,
  PathSandboxError,
  resolveWithinRoot,
  toRepoPath,
  type UserInputFn,
} from "codeloop";

export interface FileSelection {
  /** 0-based, sorted, without duplicates */
  indices: number[];
  /** Parts that were not numbers or fell outside the list */
  ignored: string[];
}

/**
 * Parses 1-based file numbers such as `1,3-5,7`. Whitespace is ignored and
 * ranges are clipped to the list.
 */
export function parseFileSelection(input: string, count: number): FileSelection {
  const selected = new Set<number>();
  const ignored: string[] = [];

  for (const part of input.replace(/\s+/g, "").split(",")) {
    if (part === "") continue;

    const range = /^(\d+)-(\d+)$/.exec(part);
    if (range) {
      const start = Math.max(1, Number(range[1]));
      const end = Math.min(count, Number(range[2]));
      if (start > end) {
        ignored.push(part);
      }
      for (let number = start; number <= end; number++) {
        selected.add(number - 1);
      }
      continue;
    }

    const number = /^\d+$/.test(part) ? Number(part) : Number.NaN;
    if (number >= 1 && number <= count) {
      selected.add(number - 1);
    } else {
      ignored.push(part);
    }
  }

  return { indices: [...selected].sort((a, b) => a - b), ignored };
}

/**
 * `*` matches any run of characters and `?` a single one. The pattern may match
 * anywhere in the path, case-insensitively.
 */
export function wildcardToRegExp(pattern: string): RegExp {
  const source = [...pattern]
    .map((char) => {
      if (char === "*") return ".*";
      if (char === "?") return ".";
      return char.replace(/[.+^${}()|[\]\\]/g, "\\$&");
    })
    .join("");
  return new RegExp(source, "i");
}

/** Files matching a wildcard, skipping hidden files and directories. */
export function matchFiles(files: readonly string[], pattern: string): string[] {
  const regex = wildcardToRegExp(pattern);
  return files.filter((file) => !file.split("/").some((part) => part.startsWith(".")) && regex.test(file));
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && "code" in error && (error.code === "ENOENT" || error.code === "ENOTDIR");
}

/**
 * Repository-relative path of a regular file inside `root`, or undefined when
 * there is none.
 */
async function existingFile(root: string, path: string): Promise<string | undefined> {
  let absolute: string;
  try {
    absolute = resolveWithinRoot(root, path);
  } catch (error) {
    if (error instanceof PathSandboxError) return undefined;
    throw error;
  }
  try {
    return (await stat(absolute)).isFile() ? toRepoPath(root, absolute) : undefined;
  } catch (error) {
    if (isMissing(error)) return undefined;
    throw new FatalIOError(`Cannot inspect ${path}`, error);
  }
}

export interface FileSelectionDeps {
  /** Repository root; entered paths are relative to it. */
  root: string;
  prompt: (question: string) => Promise<string>;
  confirm: (question: string, defaultAnswer: boolean) => Promise<boolean>;
  write: (text: string) => void;
  /** Candidates for wildcard entries. */
  listFiles: () => Promise<string[]>;
}

function numbered(files: readonly string[]): string {
  return files.map((file, index) => `[${index + 1}] ${file}`).join("\n");
}

function pick(files: readonly string[], answer: string, deps: FileSelectionDeps): string[] {
  const { indices, ignored } = parseFileSelection(answer, files.length);
  if (ignored.length > 0) {
    deps.write(`Ignoring invalid selection: ${ignored.join(", ")}\n`);
  }
  return files.filter((_, index) => indices.includes(index));
}

async function expandEntry(entry: string, deps: FileSelectionDeps): Promise<string[]> {
  if (!entry.includes("*") && !entry.includes("?")) {
    return [entry];
  }
  const matches = matchFiles(await deps.listFiles(), entry);
  if (matches.length === 0) {
    deps.write(`No files match ${entry}\n`);
    return [];
  }
  deps.write(`${numbered(matches)}\n`);
  const answer = await deps.prompt("File numbers to add (e.g. 1,3-5; Enter adds all): ");
  if (answer === INTERRUPT_INPUT) return [];
  return answer.trim() === "" ? matches : pick(matches, answer, deps);
}

/**
 * Lets the human narrow the candidate files by number and add more by path or
 * wildcard. Files that do not exist are dropped from the result.
 */
export async function selectFiles(candidates: readonly string[], deps: FileSelectionDeps): Promise<string[]> {
  let selected = [...candidates];

  if (candidates.length > 0) {
    deps.write(`${numbered(candidates)}\n`);
    if (await deps.confirm("Adjust the file list?", false)) {
      const answer = await deps.prompt("File numbers to keep (e.g. 1,3-5; Enter keeps all): ");
      if (answer !== INTERRUPT_INPUT && answer.trim() !== "") {
        const kept = pick(candidates, answer, deps);
        if (kept.length > 0) {
          selected = kept;
        } else {
          deps.write("No valid file numbers; keeping the current selection\n");
        }
      }
    }
  }

  if (await deps.confirm("Add other files?", false)) {
    while (true) {
      const entry = await deps.prompt("File path or wildcard (empty line to finish): ");
      if (entry === INTERRUPT_INPUT || entry.trim() === "") break;

      for (const path of await expandEntry(entry.trim(), deps)) {
        const file = await existingFile(deps.root, path);
        if (file === undefined) {
          deps.write(`File not found: ${path}\n`);
          continue;
        }
        if (!selected.includes(file)) {
          selected.push(file);
        }
        deps.write(`Added ${file}\n`);
      }
    }
  }

  const existing: string[] = [];
  for (const path of selected) {
    const file = await existingFile(deps.root, path);
    if (file === undefined) {
      deps.write(`Skipping missing file ${path}\n`);
    } else if (!existing.includes(file)) {
      existing.push(file);
    }
  }
  return existing;
}

/**
 * Resolves a `start,end` reference range against a file of `total` lines.
 * 0 stands for the whole file; negative numbers count back from the end, -1
 * being the last line. The result is clipped to the file.
 */
export function resolveLineRange(start: number, end: number, total: number): { start: number; end: number } {
  const first = start === 0 ? 1 : start > 0 ? start : total + start + 1;
  const last = end === 0 ? total : end > 0 ? end : total + end + 1;
  const clippedFirst = Math.max(1, Math.min(first, total));
  return { start: clippedFirst, end: Math.max(clippedFirst, Math.min(last, total)) };
}

function countLines(content: string): number {
  const lines = content.split("\n");
  return lines[lines.length - 1] === "" ? lines.length - 1 : lines.length;
}

export interface FileReferenceOptions {
  /** Directory references are relative to. */
  cwd: string;
  /** References outside this directory are left alone. */
  root: string;
  onNotice?: NoticeListener;
}

const REFERENCE_PATTERN = /`([^`]+)`/g;
const RANGE_PATTERN = /^(-?\d+),(-?\d+)$/;

async function renderReference(reference: string, options: FileReferenceOptions): Promise<string | undefined> {
  const colon = reference.indexOf(":");
  const path = colon === -1 ? reference : reference.slice(0, colon);
  const rangeText = colon === -1 ? "" : reference.slice(colon + 1);

  const file = await existingFile(options.root, resolve(options.cwd, path));
  if (file === undefined) {
    return undefined;
  }

  let content: string;
  try {
    content = await readFile(resolve(options.root, file), "utf-8");
  } catch (error) {
    options.onNotice?.({ severity: "warn", message: `Cannot read ${path}: ${describeError(error)}` });
    return undefined;
  }

  const range = RANGE_PATTERN.exec(rangeText);
  if (range === null) {
    if (rangeText.includes(",")) {
      options.onNotice?.({ severity: "warn", message: `Invalid line range ${rangeText} for ${path}` });
      return undefined;
    }
    return numberLines(path, content);
  }
  return numberLines(path, content, resolveLineRange(Number(range[1]), Number(range[2]), countLines(content)));
}

/**
 * Prepends the numbered contents of files named in backticks, either as
 * `` `path` `` or `` `path:start,end` ``. Backticked text that is not a file is
 * left as it is.
 */
export async function expandFileReferences(text: string, options: FileReferenceOptions): Promise<string> {
  const sections: string[] = [];
  for (const match of text.matchAll(REFERENCE_PATTERN)) {
    const section = await renderReference(match[1] ?? "", options);
    if (section !== undefined) {
      sections.push(section);
    }
  }
  return sections.length === 0 ? text : `${sections.join("\n\n")}\n\n${text}`;
}

/**
 * User input with backtick file references expanded.
 */
export function withFileReferences(read: UserInputFn, options: FileReferenceOptions): UserInputFn {
  return async (prompt) => {
    const text = await read(prompt);
    return text === INTERRUPT_INPUT ? text : expandFileReferences(text, options);
  };
}
