import { ToolInputSchema } from './json-schema.js';
import { Logger } from './common.js';
import { StreamEventInput } from './events.js';

export type ToolSource = { kind: 'local' } | { kind: 'remote'; serverName: string };

/**
 * Per-invocation context handed to a tool handler.
 *
 * Handlers that can run for a while must watch `signal` and stop (killing any child process)
 * once it aborts. `emit` lets a tool report side effects to the panes as they happen.
 */
export interface ToolContext {
  runId: string;
  callId: string;
  signal: AbortSignal;
  logger: Logger;
  emit(event: StreamEventInput): void;
}

export type ToolHandler = (args: Record<string, unknown>, context: ToolContext) => Promise<string>;

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  handler: ToolHandler;
  source: ToolSource;
  // Overrides the executor's default timeout for this tool; 0 disables the timeout
  timeoutMs?: number;
}

// What the model sees of a tool
export interface ToolCatalogEntry {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

/**
 * Runtime instance of a tool call. Created by the agent loop when the model emits a call, owned
 * by the executor until its result is produced.
 */
export interface ToolInvocation {
  id: string;
  runId: string;
  callId: string;
  name: string;
  arguments: Record<string, unknown>;
  startedAt: number;
  signal: AbortSignal;
  // Set when the model's arguments could not be parsed; the executor reports it without running
  argumentError?: string;
}
