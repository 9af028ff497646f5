import { ToolCatalogEntry } from '../types/tools.js';
import { Turn } from '../types/turns.js';

export interface ProviderInfo {
  name: string;
  description: string;
  website?: string;
}

/**
 * Everything a model call needs. The transcript is re-sent in full on every call; clients keep no
 * conversation state of their own.
 */
export interface ModelRequest {
  transcript: readonly Turn[];
  tools: ToolCatalogEntry[];
  systemPrompt?: string;
}

export type ModelStreamEvent =
  | { type: 'text_delta'; text: string }
  // Emitted once the call's arguments are complete. `argumentError` is set when they did not parse.
  | { type: 'tool_call'; callId: string; name: string; arguments: Record<string, unknown>; argumentError?: string }
  | { type: 'end_of_turn'; stopReason: string };

/**
 * One streamed model response per call. The stream is not restartable: a retry is a new call.
 * Failures surface as ModelError thrown from the iterator.
 */
export interface ModelClient {
  readonly info: ProviderInfo;
  readonly modelName: string;
  completeStream(request: ModelRequest, signal: AbortSignal): AsyncIterable<ModelStreamEvent>;
}
