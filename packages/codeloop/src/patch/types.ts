import type { CommitInfo } from "../vcs/git.js";

/**
 * One edit, discriminated by which of its two fields are empty.
 */
export interface Patch {
  oldCode: string;
  newCode: string;
}

/**
 * - `delete`: both fields empty, the file is removed.
 * - `replace-file`: only `newCode`, the whole file is (re)written.
 * - `anchored`: the first occurrence of `oldCode` is replaced by `newCode`.
 */
export type PatchKind = "delete" | "replace-file" | "anchored";

export function classifyPatch(patch: Patch): PatchKind {
  if (patch.oldCode === "") {
    return patch.newCode === "" ? "delete" : "replace-file";
  }
  return "anchored";
}

interface PatchBlockBase {
  file: string;
  reason?: string;
  /** 1-based line of the opening marker in the response. */
  line: number;
}

/** Block carrying explicit SEARCH/REPLACE pairs. */
export interface SearchReplaceBlock extends PatchBlockBase {
  kind: "search-replace";
  patches: Patch[];
}

/** Block carrying a code fragment the model merges into the file. */
export interface ContextBlock extends PatchBlockBase {
  kind: "context";
  code: string;
}

export type PatchBlock = SearchReplaceBlock | ContextBlock;

export type FilePatchStatus = "applied" | "failed";

export interface FilePatchOutcome {
  file: string;
  status: FilePatchStatus;
  error?: string;
}

export type PatchSessionStatus = "committed" | "rejected" | "no-changes" | "failed";

/**
 * Result of one apply-and-confirm cycle.
 */
export interface PatchApplyReport {
  status: PatchSessionStatus;
  /** Revision recorded before any edit. */
  baseline?: string;
  files: FilePatchOutcome[];
  /** Commits created during the session, oldest first. */
  commits: CommitInfo[];
  /** Staged diff shown for confirmation. */
  diff: string;
  /** Text fed back into the conversation. */
  summary: string;
}
