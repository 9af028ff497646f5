import { silentLogger } from '../types/common';
import { StreamEventInput } from '../types/events';
import { ToolInputSchema } from '../types/json-schema';
import { ToolContext, ToolDefinition, ToolHandler, ToolInvocation } from '../types/tools';

export const EMPTY_SCHEMA: ToolInputSchema = { type: 'object', properties: {} };

export function localTool(name: string, handler: ToolHandler, options: { inputSchema?: ToolInputSchema; timeoutMs?: number } = {}): ToolDefinition {
  return {
    name,
    description: `Test tool ${name}`,
    inputSchema: options.inputSchema ?? EMPTY_SCHEMA,
    handler,
    source: { kind: 'local' },
    timeoutMs: options.timeoutMs,
  };
}

export function makeInvocation(name: string, args: Record<string, unknown> = {}, overrides: Partial<ToolInvocation> = {}): ToolInvocation {
  return {
    id: `inv-${name}`,
    runId: 'run-1',
    callId: `call-${name}`,
    name,
    arguments: args,
    startedAt: Date.now(),
    signal: new AbortController().signal,
    ...overrides,
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function makeContext(emitted: StreamEventInput[] = [], signal: AbortSignal = new AbortController().signal): ToolContext {
  return {
    runId: 'run-1',
    callId: 'call-1',
    signal,
    logger: silentLogger,
    emit: event => {
      emitted.push(event);
    },
  };
}

export function findTool(tools: ToolDefinition[], name: string): ToolDefinition {
  const tool = tools.find(candidate => candidate.name === name);
  if (!tool) {
    throw new Error(`No tool named ${name}`);
  }
  return tool;
}
