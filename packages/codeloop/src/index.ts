// Re-export zod's z so tool schemas use the same instance as the registry
export { z } from "zod";

// Agent
export type { AgentOptions, AgentRunResult, AgentRunStatus, UserInputFn } from "./agent/agent.js";
export { Agent, USER_INPUT_PROMPT } from "./agent/agent.js";
export { ConversationManager } from "./agent/conversation-manager.js";
export type { HandlerOutcome, OutputHandler } from "./agent/handlers.js";
export { PatchOutputHandler, ToolCallHandler } from "./agent/handlers.js";
export type {
  AgentObservers,
  AgentState,
  HandlerCompleteContext,
  ModelResponseContext,
  StateChangeContext,
  ToolResultContext,
} from "./agent/hooks.js";
export {
  buildSystemPrompt,
  DEFAULT_SUB_AGENT_SUMMARY_PROMPT,
  DEFAULT_SYSTEM_PROMPT,
  SUMMARIZE_REMINDER,
  toolCallInstructions,
} from "./agent/prompts.js";

// Core
export * from "./core/constants.js";
export type { AgentErrorKind } from "./core/errors.js";
export {
  AgentError,
  ArgumentValidationError,
  CommitRejectedError,
  describeError,
  FatalIOError,
  isAgentError,
  MalformedCallError,
  PatchMatchError,
  ToolExecutionError,
  ToolNotFoundError,
  TransportError,
} from "./core/errors.js";
export type { ConversationTurn, TurnRole } from "./core/messages.js";
export { renderToolTurn } from "./core/messages.js";
export type { Notice, NoticeListener, Severity } from "./core/notice.js";
export { PathSandboxError, resolveWithinRoot, toRepoPath } from "./core/paths.js";
export type { Err, Ok, Result } from "./core/result.js";
export { err, ok, unwrap } from "./core/result.js";
export type { ResolvedRetryConfig, RetryConfig } from "./core/retry.js";
export { computeBackoffDelay, DEFAULT_RETRY_CONFIG, resolveRetryConfig, withTransportRetry } from "./core/retry.js";

// Logging
export type { ILogObj, Logger } from "tslog";
export type { LoggerOptions, LogLevelName } from "./logging/logger.js";
export { createLogger, defaultLogger, LOG_LEVELS, parseLogLevel } from "./logging/logger.js";

// Methodology
export { FileMethodologyStore } from "./methodology/file-store.js";
export type { Methodology, MethodologyMatch, MethodologyStore } from "./methodology/store.js";
export { InMemoryMethodologyStore, rankMethodologies, similarity } from "./methodology/store.js";

// Patches
export { applyPatchesToContent, applyPatchToContent } from "./patch/apply.js";
export type {
  CommitMessageGenerator,
  ConfirmFn,
  PatchEngineOptions,
  ResultReviewFn,
} from "./patch/engine.js";
export {
  formatPatchSummary,
  INITIAL_COMMIT_MESSAGE,
  modelCommitMessage,
  PatchEngine,
  SNAPSHOT_COMMIT_MESSAGE,
} from "./patch/engine.js";
export type { PatchParseOptions } from "./patch/parser.js";
export { containsPatchBlock, groupBlocksByFile, parsePatchBlocks } from "./patch/parser.js";
export type { PatchProtocol } from "./patch/prompts.js";
export { patchInstructions } from "./patch/prompts.js";
export type {
  ContextBlock,
  FilePatchOutcome,
  Patch,
  PatchApplyReport,
  PatchBlock,
  PatchKind,
  PatchSessionStatus,
  SearchReplaceBlock,
} from "./patch/types.js";
export { classifyPatch } from "./patch/types.js";

// Processes and version control
export type { ProcessResult, RunProcessOptions } from "./process/run.js";
export { runProcess } from "./process/run.js";
export type { CliGitClientOptions, CommitInfo, CommitOptions, DiffOptions, GitClient } from "./vcs/git.js";
export { CliGitClient, GitCommandError } from "./vcs/git.js";

// Tools
export type { AskUserFn, BuiltinToolDeps, BuiltinToolName } from "./tools/builtins/index.js";
export {
  builtinToolFactories,
  CodeReviewTool,
  createAskUserTool,
  createDefaultTools,
  executeShell,
  getBuiltinToolNames,
  numberLines,
  readCode,
  searchCode,
} from "./tools/builtins/index.js";
export type { CreateToolConfig } from "./tools/create-tool.js";
export { createTool } from "./tools/create-tool.js";
export { ToolErrorFormatter } from "./tools/error-formatter.js";
export type { ExtractedToolCall, ToolCallParserOptions } from "./tools/parser.js";
export { ToolCallParser } from "./tools/parser.js";
export type { ToolRegistryOptions } from "./tools/registry.js";
export { formatToolResult, ToolRegistry } from "./tools/registry.js";
export { AbstractTool, formatToolCallBlock } from "./tools/tool.js";
export type {
  ExecutionContext,
  ToolCall,
  ToolDescriptor,
  ToolExample,
  ToolExecuteReturn,
  ToolParameterDescriptor,
  ToolResult,
} from "./tools/types.js";
export { failureResult, successResult } from "./tools/types.js";

// Transport
export type { OpenAITransportOptions } from "./transport/openai.js";
export { OpenAITransport, toChatMessages } from "./transport/openai.js";
export type { ModelTransport } from "./transport/transport.js";
