import type Anthropic from '@anthropic-ai/sdk';

import { errorMessage } from '../errors.js';
import { Turn } from '../types/turns.js';
import { ToolCatalogEntry } from '../types/tools.js';
import { ModelStreamEvent } from './types.js';

type MessageParam = Anthropic.Messages.MessageParam;
type ContentBlockParam = Anthropic.Messages.ContentBlockParam;

/**
 * Maps the transcript onto Anthropic messages. Assistant text and the tool calls that follow it
 * share one assistant message; consecutive tool results (and a following user turn) share one
 * user message, since the API expects the roles to alternate.
 */
export function toClaudeMessages(transcript: readonly Turn[]): MessageParam[] {
  const messages: MessageParam[] = [];
  const push = (role: 'user' | 'assistant', block: ContentBlockParam) => {
    const last = messages[messages.length - 1];
    if (last && last.role === role && Array.isArray(last.content)) {
      last.content.push(block);
    } else {
      messages.push({ role, content: [block] });
    }
  };

  for (const turn of transcript) {
    switch (turn.type) {
      // The API rejects text blocks that are empty or only whitespace
      case 'user':
        if (turn.text.trim().length > 0) {
          push('user', { type: 'text', text: turn.text });
        }
        break;
      case 'assistant':
        if (turn.text.trim().length > 0) {
          push('assistant', { type: 'text', text: turn.text });
        }
        break;
      case 'toolCall':
        push('assistant', { type: 'tool_use', id: turn.callId, name: turn.name, input: turn.arguments });
        break;
      case 'toolResult':
        push('user', turn.status === 'ok'
          ? { type: 'tool_result', tool_use_id: turn.callId, content: turn.payload }
          : { type: 'tool_result', tool_use_id: turn.callId, content: `${turn.error.code}: ${turn.error.message}`, is_error: true });
        break;
    }
  }
  return messages;
}

export function toClaudeTools(tools: ToolCatalogEntry[]): Anthropic.Messages.Tool[] {
  return tools.map(tool => ({
    name: tool.name,
    description: tool.description,
    input_schema: { ...tool.inputSchema, type: 'object' },
  }));
}

interface PendingToolUse {
  id: string;
  name: string;
  json: string;
}

/**
 * Turns raw Anthropic stream events into model stream events. Tool-use input arrives as partial
 * JSON fragments; they are buffered per content block and the call is emitted when the block
 * stops.
 */
export class ClaudeStreamTranslator {
  private pending = new Map<number, PendingToolUse>();
  private stopReason: string | null = null;

  translate(event: Anthropic.Messages.RawMessageStreamEvent): ModelStreamEvent[] {
    switch (event.type) {
      case 'content_block_start': {
        const block = event.content_block;
        if (block.type === 'tool_use') {
          this.pending.set(event.index, { id: block.id, name: block.name, json: '' });
        } else if (block.type === 'text' && block.text.length > 0) {
          return [{ type: 'text_delta', text: block.text }];
        }
        return [];
      }
      case 'content_block_delta': {
        const delta = event.delta;
        if (delta.type === 'text_delta') {
          return delta.text.length > 0 ? [{ type: 'text_delta', text: delta.text }] : [];
        }
        if (delta.type === 'input_json_delta') {
          const pending = this.pending.get(event.index);
          if (pending) {
            pending.json += delta.partial_json;
          }
        }
        return [];
      }
      case 'content_block_stop': {
        const pending = this.pending.get(event.index);
        if (!pending) {
          return [];
        }
        this.pending.delete(event.index);
        return [parseToolUse(pending)];
      }
      case 'message_delta':
        this.stopReason = event.delta.stop_reason ?? this.stopReason;
        return [];
      case 'message_stop':
        return [{ type: 'end_of_turn', stopReason: this.stopReason ?? 'end_turn' }];
      default:
        return [];
    }
  }
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseToolUse(pending: PendingToolUse): ModelStreamEvent {
  const text = pending.json.trim();
  if (text === '') {
    return { type: 'tool_call', callId: pending.id, name: pending.name, arguments: {} };
  }
  try {
    const parsed: unknown = JSON.parse(text);
    if (isJsonObject(parsed)) {
      return { type: 'tool_call', callId: pending.id, name: pending.name, arguments: parsed };
    }
    return { type: 'tool_call', callId: pending.id, name: pending.name, arguments: {}, argumentError: 'Tool arguments must be a JSON object' };
  } catch (error) {
    return { type: 'tool_call', callId: pending.id, name: pending.name, arguments: {}, argumentError: `Tool arguments are not valid JSON: ${errorMessage(error)}` };
  }
}

/**
 * Whether a failed request is worth one retry: no response at all (network), rate limiting,
 * request timeouts, conflicts, overload and other server-side failures.
 */
export function isTransientStatus(status: number | undefined): boolean {
  if (status === undefined) {
    return true;
  }
  return status === 408 || status === 409 || status === 429 || status >= 500;
}
