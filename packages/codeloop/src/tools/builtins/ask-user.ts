import * as z from "zod";
import { INTERRUPT_INPUT } from "../../core/constants.js";
import { createTool } from "../create-tool.js";
import type { AbstractTool } from "../tool.js";
import { failureResult, successResult } from "../types.js";

/** Reads one answer from the human. */
export type AskUserFn = (question: string) => Promise<string>;

/**
 * ask_user - puts a question to the human supervising the session.
 */
export function createAskUserTool(ask: AskUserFn): AbstractTool {
  return createTool({
    name: "ask_user",
    description:
      "Ask the user a question when you need information or a decision you cannot obtain with the other tools. The answer is returned as stdout.",
    schema: z.object({
      question: z.string().min(1).describe("The question to ask"),
    }),
    examples: [
      {
        params: { question: "Which of src/app.ts and src/main.ts is the entry point?" },
        output: "Status: success\nStdout:\nsrc/main.ts",
      },
    ],
    execute: async ({ question }) => {
      const answer = await ask(question);
      if (answer === INTERRUPT_INPUT) {
        return failureResult("The user declined to answer");
      }
      return successResult(answer.trim() === "" ? "(no answer)" : answer);
    },
  });
}
