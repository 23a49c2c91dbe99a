/**
 * skillbench - Main Export
 *
 * For programmatic usage of the agent, the context loaders and the eval harness
 */

// Core
export { SkillAgent, DEFAULT_MAX_STEPS } from './core/agent.js';
export type { AgentConfig, AgentResponse, ChatOptions, ToolCallListener } from './core/agent.js';
export { Conversation } from './core/conversation.js';
export { Workspace } from './core/workspace.js';
export type { ShellResult, WorkspaceOptions, CreateWorkspaceOptions } from './core/workspace.js';
export { ConfigManager, resolveSettings, DEFAULT_SETTINGS, CONFIG_KEYS } from './core/config.js';
export type { AgentSettings, StoredConfig, ConfigKey } from './core/config.js';

// Models
export { OpenAIResponsesModel, createOpenAIModel, createResponsesClient } from './models/openai-responses.js';
export type { OpenAIResponsesConfig, ResponsesApi } from './models/openai-responses.js';
export { normalizeOutput, normalizeItem, parseToolArguments } from './models/normalize.js';
export * from './models/base.js';

// Context
export { assembleContext, formatChunk } from './personas/context-assembler.js';
export { buildSkillsContext, extractFrontmatterName, findSkillFiles } from './personas/skill-loader.js';
export { buildContext, buildPersonaContext, parseFileList } from './personas/persona-loader.js';
export { loadAgentContext } from './personas/agent-context.js';
export type { AgentContext, AgentContextOptions } from './personas/agent-context.js';
export * from './personas/types.js';

// Tools
export { ToolExecutor, createWorkspaceHandlers } from './tools/executor.js';
export { TOOL_DEFINITIONS, TOOL_NAMES, getTools, isToolName } from './tools/definitions.js';
export type { ToolName } from './tools/definitions.js';
export { ToolCallRecordSchema } from './tools/types.js';
export type { ToolCallRecord } from './tools/types.js';

// Eval
export { runAgent } from './eval/agent-run.js';
export type { AgentRunOptions, AgentRunSettings, RunRequest } from './eval/agent-run.js';
export { evaluateCase, runEvals, scoreRun } from './eval/harness.js';
export type { EvalOptions } from './eval/harness.js';
export { loadCases, parseCases } from './eval/cases.js';
export { fileExists, skillWasUsed, traceContainsCommand } from './eval/checks.js';
export { ProcessAgentRunner, InProcessAgentRunner } from './eval/runner-client.js';
export type { AgentRunner, ProcessAgentRunnerOptions } from './eval/runner-client.js';
export * from './eval/types.js';

// Utils
export { logger, LogLevel } from './utils/logger.js';
export * from './utils/errors.js';
