import { z } from 'zod';
import { ToolInputSchema } from '../types/json-schema.js';

export const McpServerConfigSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('stdio'),
    command: z.string(),
    args: z.array(z.string()).default([]),
    env: z.record(z.string(), z.string()).optional(),
    cwd: z.string().optional(),
    disabled: z.boolean().optional(),
  }),
  z.object({
    type: z.literal('sse'),
    url: z.string().url(),
    headers: z.record(z.string(), z.string()).optional(),
    disabled: z.boolean().optional(),
  }),
  z.object({
    type: z.literal('streamable-http'),
    url: z.string().url(),
    headers: z.record(z.string(), z.string()).optional(),
    disabled: z.boolean().optional(),
  }),
]);

export type McpServerConfig = z.infer<typeof McpServerConfigSchema>;

// mcpServers section of the configuration file, keyed by server name
export type McpServersConfig = Record<string, McpServerConfig>;

export interface RemoteTool {
  name: string;
  description?: string;
  inputSchema: ToolInputSchema;
}

export interface RemoteToolResult {
  text: string;
  isError: boolean;
  elapsedTimeMs: number;
}

/**
 * A connection to a remote tool server. Transport details (stdio child process, SSE, streamable
 * HTTP) stay behind this interface; the registry and executor only see these operations.
 *
 * A lost connection surfaces as ToolUnavailableError from callTool, never as a crash, and is
 * reported once through the `onClose` callback.
 */
export interface RemoteToolServer {
  readonly name: string;
  connect(): Promise<boolean>;
  isConnected(): boolean;
  listTools(): Promise<RemoteTool[]>;
  callTool(toolName: string, args: Record<string, unknown>, signal?: AbortSignal): Promise<RemoteToolResult>;
  disconnect(): Promise<void>;
  getErrorLog(): string[];
  onClose?: () => void;
}

export type RemoteToolServerFactory = (name: string, config: McpServerConfig) => RemoteToolServer;
