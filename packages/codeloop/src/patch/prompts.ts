import {
  MERGED_CODE_END,
  MERGED_CODE_START,
  PATCH_END,
  PATCH_REPLACE,
  PATCH_SEARCH,
  PATCH_START,
} from "../core/constants.js";

export type PatchProtocol = "search-replace" | "context";

const SEARCH_REPLACE_INSTRUCTIONS = `# Code changes
Change files with ${PATCH_START} blocks of search/replace pairs:

${PATCH_START}
File: src/math.ts
Reason: Reject division by zero
${PATCH_SEARCH}
export function divide(a: number, b: number) {
  return a / b;
======
export function divide(a: number, b: number) {
  if (b === 0) throw new Error("Division by zero");
  return a / b;
${PATCH_REPLACE}
${PATCH_END}

Rules:
1. The SEARCH text must appear in the file exactly, including whitespace, blank lines and comments. Only its first occurrence is replaced.
2. An empty SEARCH text writes the REPLACE text as the whole file (use it to create files).
3. Empty SEARCH and REPLACE texts delete the file.
4. Include enough surrounding lines to make the SEARCH text unique.
5. One block may hold several SEARCH/REPLACE sections; they are applied in order.
6. Changes are staged and committed after the user accepts them.`;

const CONTEXT_INSTRUCTIONS = `# Code changes
Change files with ${PATCH_START} blocks holding the modified code with context:

${PATCH_START}
File: src/math.ts
Reason: Reject division by zero
export function divide(a: number, b: number) {
  if (b === 0) throw new Error("Division by zero");
  return a / b;
}
${PATCH_END}

Rules:
1. Include at least three unchanged lines before and after each change.
2. Keep the original indentation and formatting.
3. For new files, provide the complete content.
4. Changes are staged and committed after the user accepts them.`;

/**
 * Patch-format instructions added to the system prompt.
 */
export function patchInstructions(protocol: PatchProtocol): string {
  return protocol === "search-replace" ? SEARCH_REPLACE_INSTRUCTIONS : CONTEXT_INSTRUCTIONS;
}

/**
 * Asks the model to fold a context fragment into the full file.
 */
export function buildMergePrompt(file: string, original: string, fragment: string): string {
  return `Merge a code change into an existing file.

File: ${file}
Original content:
${original === "" ? "(the file is new)" : original}

Change (modified code with surrounding context):
${fragment}

Return the complete merged file content and nothing else, in this format:
${MERGED_CODE_START}
[merged content]
${MERGED_CODE_END}`;
}

/**
 * Content between the merge markers, ending with exactly one newline.
 * Returns undefined when the markers are missing.
 */
export function extractMergedCode(response: string): string | undefined {
  const start = response.indexOf(MERGED_CODE_START);
  if (start === -1) return undefined;
  const end = response.indexOf(MERGED_CODE_END, start + MERGED_CODE_START.length);
  if (end === -1) return undefined;

  const inner = response.slice(start + MERGED_CODE_START.length, end).replace(/^\r?\n/, "");
  const trimmed = inner.replace(/(\r?\n)+$/, "");
  return trimmed === "" ? "" : `${trimmed}\n`;
}

export function buildCommitMessagePrompt(diff: string): string {
  return `Write a git commit message for the following staged diff.
Reply with a single line in the imperative mood, at most 72 characters, without quotes.

${diff}`;
}

/**
 * First non-empty line of the reply, without wrapping quotes or backticks.
 */
export function parseCommitMessage(response: string): string | undefined {
  const line = response
    .split("\n")
    .map((l) => l.trim())
    .find((l) => l !== "" && !l.startsWith("```"));
  if (!line) return undefined;
  const unquoted = line.replace(/^["'`]+|["'`]+$/g, "").trim();
  return unquoted === "" ? undefined : unquoted;
}
