/**
 * Typed version-control client.
 *
 * {@link GitClient} is the narrow surface the patch engine needs; {@link CliGitClient}
 * implements it by invoking the `git` binary with argument arrays.
 */

import { runProcess } from "../process/run.js";

export interface CommitInfo {
  id: string;
  message: string;
}

export interface DiffOptions {
  /** Diff the index instead of the working tree. @default true */
  staged?: boolean;
  /** Revision to compare against. @default HEAD */
  base?: string;
}

export interface CommitOptions {
  /** Record a commit even when the index matches HEAD. */
  allowEmpty?: boolean;
}

export interface GitClient {
  /** Absolute path of the working tree root. */
  readonly root: string;

  isRepository(): Promise<boolean>;
  /** False for a freshly initialized repository whose HEAD is unborn. */
  hasCommits(): Promise<boolean>;
  currentRevision(): Promise<string>;
  isTracked(path: string): Promise<boolean>;
  existsInRevision(path: string, revision: string): Promise<boolean>;
  /** Stage the given paths, or every change in the working tree when omitted. */
  stage(paths?: readonly string[]): Promise<void>;
  diff(options?: DiffOptions): Promise<string>;
  commit(message: string, options?: CommitOptions): Promise<CommitInfo>;
  resetSoft(revision?: string): Promise<void>;
  resetHard(revision?: string): Promise<void>;
  /** Delete untracked files and directories. */
  clean(): Promise<void>;
  /** Restore one path (index and working tree) from a revision. */
  restoreFile(path: string, revision: string): Promise<void>;
  /** Stop tracking a path and delete it from disk. */
  removeFile(path: string): Promise<void>;
  /** Remove a path from the index, keeping the working-tree file. */
  untrack(path: string): Promise<void>;
  /** Commits reachable from `to` but not from `from`, oldest first. */
  commitsBetween(from: string, to: string): Promise<CommitInfo[]>;
  hasUncommittedChanges(): Promise<boolean>;
  /** Tracked and untracked files that are not ignored, repository-relative and sorted. */
  listFiles(): Promise<string[]>;
}

export class GitCommandError extends Error {
  readonly args: readonly string[];
  readonly exitCode: number;
  readonly stderr: string;

  constructor(args: readonly string[], exitCode: number, stderr: string) {
    super(`git ${args.join(" ")} exited with status ${exitCode}${stderr.trim() ? `: ${stderr.trim()}` : ""}`);
    this.name = "GitCommandError";
    this.args = args;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export interface CliGitClientOptions {
  /** Path of the git executable. @default "git" */
  gitBinary?: string;
  /** Committer identity passed with `-c user.name/user.email`. */
  identity?: { name: string; email: string };
}

// Unit separator between hash and subject in `git log` output
const FIELD_SEPARATOR = "\u001f";

export class CliGitClient implements GitClient {
  readonly root: string;
  private readonly gitBinary: string;
  private readonly configArgs: string[];

  constructor(root: string, options: CliGitClientOptions = {}) {
    this.root = root;
    this.gitBinary = options.gitBinary ?? "git";
    this.configArgs = options.identity
      ? ["-c", `user.name=${options.identity.name}`, "-c", `user.email=${options.identity.email}`]
      : [];
  }

  /**
   * Locate the top-level directory of the repository containing `cwd`.
   * Returns undefined when `cwd` is not inside a repository.
   */
  static async findRoot(cwd: string, gitBinary = "git"): Promise<string | undefined> {
    const result = await runProcess([gitBinary, "rev-parse", "--show-toplevel"], { cwd });
    return result.exitCode === 0 ? result.stdout.trim() : undefined;
  }

  private async git(args: readonly string[], allowedExitCodes: readonly number[] = [0]) {
    const result = await runProcess([this.gitBinary, ...this.configArgs, ...args], { cwd: this.root });
    if (!allowedExitCodes.includes(result.exitCode)) {
      throw new GitCommandError(args, result.exitCode, result.stderr);
    }
    return result;
  }

  async isRepository(): Promise<boolean> {
    const result = await this.git(["rev-parse", "--is-inside-work-tree"], [0, 128]);
    return result.exitCode === 0 && result.stdout.trim() === "true";
  }

  async hasCommits(): Promise<boolean> {
    const result = await this.git(["rev-parse", "--verify", "--quiet", "HEAD"], [0, 1]);
    return result.exitCode === 0;
  }

  async currentRevision(): Promise<string> {
    const result = await this.git(["rev-parse", "HEAD"]);
    return result.stdout.trim();
  }

  async isTracked(path: string): Promise<boolean> {
    const result = await this.git(["ls-files", "--error-unmatch", "--", path], [0, 1]);
    return result.exitCode === 0;
  }

  async existsInRevision(path: string, revision: string): Promise<boolean> {
    const result = await this.git(["cat-file", "-e", `${revision}:${path}`], [0, 1, 128]);
    return result.exitCode === 0;
  }

  async stage(paths?: readonly string[]): Promise<void> {
    if (paths === undefined) {
      await this.git(["add", "-A"]);
      return;
    }
    if (paths.length > 0) {
      await this.git(["add", "-A", "--", ...paths]);
    }
  }

  async diff(options: DiffOptions = {}): Promise<string> {
    const args = ["diff"];
    if (options.staged ?? true) {
      args.push("--cached");
    }
    if (options.base) {
      args.push(options.base);
    }
    const result = await this.git(args);
    return result.stdout;
  }

  async commit(message: string, options: CommitOptions = {}): Promise<CommitInfo> {
    await this.git(["commit", "--quiet", ...(options.allowEmpty ? ["--allow-empty"] : []), "-m", message]);
    const result = await this.git(["log", "-1", `--format=%H${FIELD_SEPARATOR}%s`]);
    return parseLogLine(result.stdout.trim());
  }

  async resetSoft(revision = "HEAD"): Promise<void> {
    await this.git(["reset", "--soft", revision]);
  }

  async resetHard(revision = "HEAD"): Promise<void> {
    await this.git(["reset", "--hard", "--quiet", revision]);
  }

  async clean(): Promise<void> {
    await this.git(["clean", "-f", "-d", "--quiet"]);
  }

  async restoreFile(path: string, revision: string): Promise<void> {
    await this.git(["checkout", revision, "--", path]);
  }

  async removeFile(path: string): Promise<void> {
    await this.git(["rm", "-f", "--quiet", "--ignore-unmatch", "--", path]);
  }

  async untrack(path: string): Promise<void> {
    await this.git(["rm", "--cached", "--quiet", "--ignore-unmatch", "--", path]);
  }

  async commitsBetween(from: string, to: string): Promise<CommitInfo[]> {
    const result = await this.git(["log", "--reverse", `--format=%H${FIELD_SEPARATOR}%s`, `${from}..${to}`]);
    return result.stdout
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0)
      .map(parseLogLine);
  }

  async hasUncommittedChanges(): Promise<boolean> {
    const result = await this.git(["status", "--porcelain"]);
    return result.stdout.trim().length > 0;
  }

  async listFiles(): Promise<string[]> {
    const result = await this.git(["ls-files", "--cached", "--others", "--exclude-standard"]);
    const files = result.stdout.split("\n").filter((line) => line.length > 0);
    return [...new Set(files)].sort();
  }
}

function parseLogLine(line: string): CommitInfo {
  const separatorIndex = line.indexOf(FIELD_SEPARATOR);
  if (separatorIndex === -1) {
    return { id: line, message: "" };
  }
  return { id: line.slice(0, separatorIndex), message: line.slice(separatorIndex + 1) };
}
