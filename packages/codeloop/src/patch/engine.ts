import { mkdir, readFile, rm, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { ILogObj, Logger } from "tslog";
import {
  CommitRejectedError,
  describeError,
  FatalIOError,
  MalformedCallError,
  type PatchMatchError,
  TransportError,
} from "../core/errors.js";
import type { NoticeListener, Severity } from "../core/notice.js";
import { resolveWithinRoot, toRepoPath } from "../core/paths.js";
import { err, ok, type Result } from "../core/result.js";
import {
  type ResolvedRetryConfig,
  type RetryConfig,
  resolveRetryConfig,
  withTransportRetry,
} from "../core/retry.js";
import { defaultLogger } from "../logging/logger.js";
import type { ModelTransport } from "../transport/transport.js";
import type { CommitInfo, GitClient } from "../vcs/git.js";
import { applyPatchesToContent, type FileContent } from "./apply.js";
import { groupBlocksByFile, parsePatchBlocks, type PatchParseOptions } from "./parser.js";
import { buildCommitMessagePrompt, buildMergePrompt, extractMergedCode, parseCommitMessage } from "./prompts.js";
import type { FilePatchOutcome, PatchApplyReport, PatchBlock, PatchSessionStatus } from "./types.js";

export const SNAPSHOT_COMMIT_MESSAGE = "chore: snapshot before applying patches";
export const INITIAL_COMMIT_MESSAGE = "chore: initial commit";

const MAX_COMMIT_PROMPT_DIFF_CHARS = 20_000;

/** Yes/no question to the human. */
export type ConfirmFn = (question: string, defaultAnswer: boolean) => Promise<boolean>;

/**
 * Last gate before the summary enters the conversation. Returns the summary or
 * a replacement written by the human.
 */
export type ResultReviewFn = (summary: string) => Promise<string>;

export type CommitMessageGenerator = (diff: string, files: readonly string[]) => Promise<string | undefined>;

export interface PatchEngineOptions {
  git: GitClient;
  /** Model used to merge context blocks into files. */
  transport?: ModelTransport;
  retry?: RetryConfig;
  /** Asked before committing. Without it changes are committed directly. */
  confirm?: ConfirmFn;
  reviewResult?: ResultReviewFn;
  commitMessage?: CommitMessageGenerator;
  /**
   * Commit uncommitted changes before recording the baseline, so a rejection
   * never discards work done outside the session.
   * @default true
   */
  snapshotDirtyTree?: boolean;
  onNotice?: NoticeListener;
  onDiff?: (diff: string) => void;
  logger?: Logger<ILogObj>;
}

function headline(status: PatchSessionStatus): string {
  switch (status) {
    case "committed":
      return "The patches have been applied";
    case "no-changes":
      return "No changes to commit";
    case "rejected":
      return new CommitRejectedError().message;
    case "failed":
      return "The patches could not be applied";
  }
}

/**
 * Text the model receives after a patch session.
 */
export function formatPatchSummary(
  status: PatchSessionStatus,
  files: readonly FilePatchOutcome[],
  commits: readonly CommitInfo[],
): string {
  const lines = [headline(status)];
  if (files.length > 0) {
    lines.push("Files:");
    for (const file of files) {
      lines.push(
        file.status === "applied"
          ? `- ${file.file}: applied`
          : `- ${file.file}: failed (${file.error ?? "unknown error"})`,
      );
    }
  }
  if (commits.length > 0) {
    lines.push("Commit History:");
    for (const commit of commits) {
      lines.push(`- ${commit.id.slice(0, 7)}: ${commit.message}`);
    }
  }
  return lines.join("\n");
}

/**
 * Commit messages written by the model from the staged diff.
 */
export function modelCommitMessage(transport: ModelTransport, retry?: RetryConfig): CommitMessageGenerator {
  const config = resolveRetryConfig(retry);
  return async (diff) => {
    const prompt = buildCommitMessagePrompt(diff.slice(0, MAX_COMMIT_PROMPT_DIFF_CHARS));
    const response = await withTransportRetry(() => transport.chat([{ role: "user", content: prompt }]), config);
    return parseCommitMessage(response);
  };
}

/**
 * Applies patch blocks from a model response to the working tree and runs the
 * commit workflow.
 *
 * Recovery happens at two levels: a file whose patch cannot be applied is
 * restored to the baseline revision while other files proceed, and a rejected
 * commit resets the whole working tree to the baseline.
 *
 * Agents that share a working tree must not run engines concurrently.
 */
export class PatchEngine {
  private readonly git: GitClient;
  private readonly options: PatchEngineOptions;
  private readonly retry: ResolvedRetryConfig;
  private readonly logger: Logger<ILogObj>;

  constructor(options: PatchEngineOptions) {
    this.git = options.git;
    this.options = options;
    this.retry = resolveRetryConfig(options.retry);
    this.logger = options.logger ?? defaultLogger.getSubLogger({ name: "patch-engine" });
  }

  private notify(severity: Severity, message: string): void {
    this.options.onNotice?.({ severity, message });
  }

  async apply(response: string, parseOptions: PatchParseOptions = {}): Promise<PatchApplyReport> {
    const parsed = parsePatchBlocks(response, parseOptions);
    if (!parsed.ok) {
      this.notify("error", parsed.error.message);
      return this.finish({
        status: "failed",
        files: [],
        commits: [],
        diff: "",
        summary: `Failed to parse patches: ${parsed.error.message}`,
      });
    }
    if (parsed.value.length === 0) {
      return this.finish({ status: "no-changes", files: [], commits: [], diff: "", summary: "No patch blocks found" });
    }

    await this.snapshotIfDirty();
    await this.ensureInitialCommit();
    const baseline = await this.git.currentRevision();
    this.logger.debug(`Patch session baseline ${baseline}`);

    const { blocks, rejected } = this.normalizeTargets(parsed.value);
    const files: FilePatchOutcome[] = [...rejected];
    try {
      for (const [file, fileBlocks] of groupBlocksByFile(blocks)) {
        files.push(await this.applyFile(file, fileBlocks, baseline));
      }
    } catch (error) {
      this.logger.error(`Patch session aborted: ${describeError(error)}`);
      await this.resetToBaseline(baseline);
      throw error;
    }

    const appliedFiles = files.filter((file) => file.status === "applied").map((file) => file.file);
    if (appliedFiles.length === 0) {
      await this.resetToBaseline(baseline);
      return this.finish({
        status: "failed",
        baseline,
        files,
        commits: [],
        diff: "",
        summary: formatPatchSummary("failed", files, []),
      });
    }

    await this.git.stage();
    const diff = await this.git.diff({ staged: true });
    if (diff.trim() === "") {
      this.notify("info", "No changes to commit");
      return this.finish({
        status: "no-changes",
        baseline,
        files,
        commits: [],
        diff: "",
        summary: formatPatchSummary("no-changes", files, []),
      });
    }

    this.options.onDiff?.(diff);

    if (this.options.confirm && !(await this.options.confirm("Commit these changes?", true))) {
      await this.resetToBaseline(baseline);
      this.notify("warn", new CommitRejectedError().message);
      return this.finish({
        status: "rejected",
        baseline,
        files,
        commits: [],
        diff,
        summary: formatPatchSummary("rejected", files, []),
      });
    }

    await this.git.commit(await this.commitMessageFor(diff, appliedFiles));
    const commits = await this.git.commitsBetween(baseline, await this.git.currentRevision());
    this.notify("success", `Committed ${appliedFiles.length} file(s)`);

    return this.finish({
      status: "committed",
      baseline,
      files,
      commits,
      diff,
      summary: formatPatchSummary("committed", files, commits),
    });
  }

  private async finish(report: PatchApplyReport): Promise<PatchApplyReport> {
    if (!this.options.reviewResult) {
      return report;
    }
    return { ...report, summary: await this.options.reviewResult(report.summary) };
  }

  private async snapshotIfDirty(): Promise<void> {
    if (this.options.snapshotDirtyTree === false || !(await this.git.hasUncommittedChanges())) {
      return;
    }
    await this.git.stage();
    const snapshot = await this.git.commit(SNAPSHOT_COMMIT_MESSAGE);
    this.notify("info", `Committed uncommitted changes as ${snapshot.id.slice(0, 7)} before applying patches`);
  }

  private async ensureInitialCommit(): Promise<void> {
    if (await this.git.hasCommits()) {
      return;
    }
    const initial = await this.git.commit(INITIAL_COMMIT_MESSAGE, { allowEmpty: true });
    this.notify("info", `Created initial commit ${initial.id.slice(0, 7)} as the patch baseline`);
  }

  /**
   * Rewrites every target to its repository-relative form, so `./a.ts` and an
   * absolute path inside the root address the same file in git.
   */
  private normalizeTargets(blocks: readonly PatchBlock[]): { blocks: PatchBlock[]; rejected: FilePatchOutcome[] } {
    const normalized: PatchBlock[] = [];
    const rejected: FilePatchOutcome[] = [];
    for (const block of blocks) {
      let file: string;
      try {
        file = toRepoPath(this.git.root, block.file);
      } catch (error) {
        this.notify("error", describeError(error));
        rejected.push({ file: block.file, status: "failed", error: describeError(error) });
        continue;
      }
      if (file === "") {
        const message = `Patch target ${block.file} is the repository root, not a file`;
        this.notify("error", message);
        rejected.push({ file: block.file, status: "failed", error: message });
        continue;
      }
      normalized.push({ ...block, file });
    }
    return { blocks: normalized, rejected };
  }

  private async resetToBaseline(baseline: string): Promise<void> {
    await this.git.resetHard(baseline);
    await this.git.clean();
  }

  private async applyFile(file: string, blocks: readonly PatchBlock[], baseline: string): Promise<FilePatchOutcome> {
    const absolute = resolveWithinRoot(this.git.root, file);
    let content = await this.readCurrent(absolute);
    for (const block of blocks) {
      const next =
        block.kind === "search-replace"
          ? applyPatchesToContent(file, content, block.patches)
          : await this.merge(file, content ?? "", block.code);

      if (!next.ok) {
        this.notify("error", next.error.message);
        await this.rollbackFile(file, absolute, baseline);
        return { file, status: "failed", error: next.error.message };
      }
      content = next.value;
    }

    await this.writeResult(file, absolute, content);
    this.notify("success", `Patched ${file}`);
    return { file, status: "applied" };
  }

  private async merge(
    file: string,
    original: string,
    fragment: string,
  ): Promise<Result<FileContent, PatchMatchError | TransportError | MalformedCallError>> {
    const transport = this.options.transport;
    if (!transport) {
      return err(new TransportError(`no model is configured to merge the change into ${file}`));
    }

    let response: string;
    try {
      response = await withTransportRetry(
        () => transport.chat([{ role: "user", content: buildMergePrompt(file, original, fragment) }]),
        this.retry,
        this.logger,
      );
    } catch (error) {
      return err(error instanceof TransportError ? error : new TransportError(error));
    }

    const merged = extractMergedCode(response);
    if (merged === undefined) {
      return err(new MalformedCallError(`Merge response for ${file} has no merged code block`));
    }
    return ok(merged);
  }

  private async readCurrent(absolute: string): Promise<FileContent> {
    try {
      return await readFile(absolute, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return undefined;
      }
      throw new FatalIOError(`Cannot read ${absolute}`, error);
    }
  }

  private async writeResult(file: string, absolute: string, content: FileContent): Promise<void> {
    if (content === undefined) {
      if (await this.git.isTracked(file)) {
        await this.git.removeFile(file);
      } else {
        await rm(absolute, { force: true });
      }
      return;
    }

    try {
      await mkdir(dirname(absolute), { recursive: true });
    } catch (error) {
      throw new FatalIOError(`Cannot create directory ${dirname(absolute)}`, error);
    }
    try {
      await writeFile(absolute, content, "utf-8");
    } catch (error) {
      throw new FatalIOError(`Cannot write ${absolute}`, error);
    }
  }

  private async rollbackFile(file: string, absolute: string, baseline: string): Promise<void> {
    if (await this.git.existsInRevision(file, baseline)) {
      await this.git.restoreFile(file, baseline);
      return;
    }
    if (await this.git.isTracked(file)) {
      await this.git.untrack(file);
    }
    await rm(absolute, { force: true });
  }

  private async commitMessageFor(diff: string, files: readonly string[]): Promise<string> {
    const fallback = `Apply patches to ${files.join(", ")}`;
    if (!this.options.commitMessage) {
      return fallback;
    }
    try {
      return (await this.options.commitMessage(diff, files)) ?? fallback;
    } catch (error) {
      this.logger.warn(`Commit message generation failed, using default: ${describeError(error)}`);
      return fallback;
    }
  }
}
