// SDK-free API. The model and tool-server clients, which load their SDKs, are exported from
// './runtime'.

// Errors
export {
  AgentError,
  ValidationError,
  ToolExecutionError,
  ToolUnavailableError,
  ModelError,
  IterationLimitExceededError,
  AccessDeniedError,
  DuplicateNameError,
  NotFoundError,
  CancelledError,
  TimedOutError,
  ConfigError,
  errorMessage,
  toAgentError,
} from './errors.js';
export type { ErrorCode } from './errors.js';

// Types
export type { Logger } from './types/common.js';
export { silentLogger } from './types/common.js';
export type { JsonSchemaDefinition, ToolInputSchema } from './types/json-schema.js';
export type {
  Turn,
  TurnType,
  UserTurn,
  AssistantTurn,
  ToolCallTurn,
  ToolResultTurn,
  ToolResult,
  ToolResultError,
  NewTurn,
} from './types/turns.js';
export type { ToolContext, ToolDefinition, ToolHandler, ToolInvocation, ToolSource, ToolCatalogEntry } from './types/tools.js';
export type { StreamEvent, StreamEventInput, StreamEventType } from './types/events.js';
export {
  AgentSettingsSchema,
  AgentConfigSchema,
  ProviderIdSchema,
  DEFAULT_DENIED_COMMANDS,
  getDefaultSettings,
} from './types/settings.js';
export type { AgentSettings, AgentConfig, ProviderId, ProviderConfig } from './types/settings.js';

// Conversation and streaming
export { ConversationState } from './state/conversation-state.js';
export { StreamBroker, Subscription } from './stream/stream-broker.js';
export type { SubscribeOptions } from './stream/stream-broker.js';

// Tools
export { ToolRegistry, qualifiedToolName } from './tools/tool-registry.js';
export type { ToolLease, ServerToolSpec } from './tools/tool-registry.js';
export { ToolExecutor } from './tools/tool-executor.js';
export type { ToolExecutorOptions } from './tools/tool-executor.js';
export { createBuiltinTools, Workspace, DEFAULT_IGNORE_PATTERNS, findDeniedCommand } from './tools/builtin/index.js';

// Model providers
export type { ModelClient, ModelRequest, ModelStreamEvent, ProviderInfo } from './providers/types.js';
export { ScriptedModelClient, textReply, toolCallReply, echoResponder } from './providers/test-provider.js';
export type { ScriptedStep, ScriptedResponder } from './providers/test-provider.js';
export { SecretManager } from './secrets/index.js';

// Remote tool servers
export { McpServerConfigSchema } from './mcp/types.js';
export type { McpServerConfig, McpServersConfig, RemoteTool, RemoteToolResult, RemoteToolServer, RemoteToolServerFactory } from './mcp/types.js';
export { ToolServerManager } from './mcp/client-manager.js';
export type { ToolServerStatus } from './mcp/client-manager.js';

// Agent loop and session
export { AgentLoop } from './agent/agent-loop.js';
export type { AgentLoopOptions, AgentLoopDependencies } from './agent/agent-loop.js';
export { RunHandle } from './agent/run-handle.js';
export type { RunState, RunOutcome } from './agent/run-handle.js';
export { SessionController } from './session/session-controller.js';
export type { SessionControllerOptions } from './session/session-controller.js';
export { renderSystemPrompt } from './session/system-prompt.js';
