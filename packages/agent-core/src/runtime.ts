// Runtime exports: these load the Anthropic and MCP SDKs

export { ClaudeModelClient, ClaudeConfigSchema, toModelError } from './providers/claude-provider.js';
export type { ClaudeConfig, ClaudeModelOptions } from './providers/claude-provider.js';
export { ProviderFactory } from './providers/provider-factory.js';
export { McpClientBase, McpClientStdio, McpClientSse, McpClientStreamableHttp } from './mcp/client.js';
export { createMcpClient } from './mcp/client-factory.js';
export { createSession } from './session/create-session.js';
