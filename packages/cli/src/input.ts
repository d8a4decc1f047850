import readline from "node:readline";
import { INTERRUPT_INPUT, runProcess, type UserInputFn } from "codeloop";

export interface LineStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Reads one message of one or more lines, ended by an empty line.
 *
 * An empty first line submits an empty message. Ctrl-C resolves to
 * {@link INTERRUPT_INPUT}; end of input submits what was typed so far.
 */
export function readMultiline(prompt: string, { input, output }: LineStreams): Promise<string> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({ input, output });
    const lines: string[] = [];
    let settled = false;

    const finish = (value: string) => {
      if (settled) return;
      settled = true;
      rl.close();
      resolve(value);
    };

    output.write(`${prompt}\n`);
    rl.setPrompt("> ");
    rl.prompt();

    rl.on("line", (line) => {
      if (line === "") {
        finish(lines.join("\n"));
        return;
      }
      lines.push(line);
      rl.prompt();
    });
    rl.on("SIGINT", () => finish(INTERRUPT_INPUT));
    rl.on("close", () => finish(lines.join("\n")));
  });
}

/**
 * Reads a single line.
 */
export function readLine(question: string, { input, output }: LineStreams): Promise<string> {
  return new Promise((resolve) => {
    const rl = readline.createInterface({ input, output });
    let settled = false;
    const finish = (value: string) => {
      if (settled) return;
      settled = true;
      rl.close();
      resolve(value);
    };
    rl.question(question, (answer) => finish(answer));
    rl.on("SIGINT", () => finish(INTERRUPT_INPUT));
    rl.on("close", () => finish(""));
  });
}

/**
 * Interprets a yes/no answer. Anything unrecognized yields the default.
 */
export function parseConfirmation(answer: string, defaultAnswer: boolean): boolean {
  const normalized = answer.trim().toLowerCase();
  if (normalized === "y" || normalized === "yes") return true;
  if (normalized === "n" || normalized === "no") return false;
  return defaultAnswer;
}

export interface ShellShortcutDeps {
  read: UserInputFn;
  confirm: (question: string, defaultAnswer: boolean) => Promise<boolean>;
  write: (text: string) => void;
  cwd: string;
}

/**
 * User input where a message starting with `!` runs as a shell script after
 * confirmation and the prompt is shown again.
 */
export function withShellShortcut({ read, confirm, write, cwd }: ShellShortcutDeps): UserInputFn {
  return async (prompt) => {
    while (true) {
      const text = await read(prompt);
      if (!text.startsWith("!")) {
        return text;
      }
      const script = text.slice(1).trim();
      if (script === "" || !(await confirm(`Run \`${script}\`?`, true))) {
        continue;
      }
      const result = await runProcess(["sh", "-c", script], { cwd });
      const output = `${result.stdout}${result.stderr}`;
      write(`${output}${output === "" || output.endsWith("\n") ? "" : "\n"}exit status ${result.exitCode}\n`);
    }
  };
}
