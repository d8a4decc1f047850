export { createEchoTool, createThrowingTool, contextBlock, searchReplaceBlock, toolCallResponse } from "./helpers.js";
export type { SearchReplaceOptions } from "./helpers.js";
export { InMemoryGitClient } from "./in-memory-git.js";
export type { ScriptedReply } from "./mock-transport.js";
export { MockTransport } from "./mock-transport.js";
export type { ScriptedConfirm, ScriptedInput } from "./scripted-input.js";
export { interruptingInput, scriptedConfirm, scriptedInput } from "./scripted-input.js";
export type { TempWorkspace } from "./workspace.js";
export { createTempWorkspace, readTree } from "./workspace.js";
