import chalk from "chalk";
import type { AgentRunResult, Notice, Severity } from "codeloop";

const SEVERITY_STYLES: Record<Severity, (text: string) => string> = {
  error: (text) => chalk.red.bold(text),
  warn: (text) => chalk.yellow.bold(text),
  info: (text) => chalk.cyan(text),
  success: (text) => chalk.green.bold(text),
};

/** `[error]`, `[warn]`, `[info]` or `[success]`, colored. */
export function severityTag(severity: Severity): string {
  return SEVERITY_STYLES[severity](`[${severity}]`);
}

export function formatNotice(notice: Notice): string {
  return `${severityTag(notice.severity)} ${notice.message}`;
}

/**
 * Renders a unified diff with ANSI colors.
 *
 * Color scheme:
 * - Added lines (+): green
 * - Removed lines (-): red
 * - Hunk headers (@@): cyan
 * - File headers (---/+++): bold
 * - Context lines: dim
 */
export function renderColoredDiff(diff: string): string {
  return diff
    .split("\n")
    .map((line) => {
      if (line.startsWith("---") || line.startsWith("+++")) {
        return chalk.bold(line);
      }
      if (line.startsWith("+")) {
        return chalk.green(line);
      }
      if (line.startsWith("-")) {
        return chalk.red(line);
      }
      if (line.startsWith("@@")) {
        return chalk.cyan(line);
      }
      return chalk.dim(line);
    })
    .join("\n");
}

/** Horizontal rule with an optional title, sized for an 80 column terminal. */
export function formatHeading(title: string, width = 60): string {
  const label = ` ${title} `;
  const side = Math.max(2, Math.floor((width - label.length) / 2));
  return chalk.cyan(`${"─".repeat(side)}${label}${"─".repeat(side)}`);
}

/** Final line printed for a finished task. */
export function formatRunResult(result: AgentRunResult): string {
  switch (result.status) {
    case "completed":
      return `${severityTag("success")} ${result.output}`;
    case "cancelled":
      return `${severityTag("warn")} ${result.output}`;
    case "failed":
      return `${severityTag("error")} ${result.output}`;
  }
}
