#!/usr/bin/env node
import { describeError } from "codeloop";
import { ERROR_PREFIX } from "./constants.js";
import { runCLI } from "./program.js";

runCLI().catch((error: unknown) => {
  process.stderr.write(`${ERROR_PREFIX} ${describeError(error)}\n`);
  process.exitCode = 1;
});
