import { ToolResultError } from './turns.js';

// Events the stream broker fans out to the panes. `seq` is the broker's global publish order.

export type StreamEventInput =
  | { type: 'RunStarted'; runId: string; userText: string }
  | { type: 'AssistantDelta'; runId: string; turnId: string; text: string }
  | { type: 'ToolCallStarted'; runId: string; callId: string; name: string; arguments: Record<string, unknown> }
  | {
      type: 'ToolResultAppended';
      runId: string;
      callId: string;
      name: string;
      status: 'ok' | 'error';
      output: string;
      error?: ToolResultError;
      elapsedTimeMs: number;
    }
  | { type: 'FileOpened'; runId: string; callId: string; path: string; content: string }
  | { type: 'FileChanged'; runId: string; callId: string; path: string; operation: 'write' | 'patch' | 'replace' | 'insert'; content: string }
  | { type: 'TerminalOutput'; runId: string; callId: string; stream: 'stdout' | 'stderr'; text: string }
  | { type: 'RunFinished'; runId: string; iterations: number }
  | { type: 'RunFailed'; runId: string; error: { code: string; message: string } }
  | { type: 'RunCancelled'; runId: string };

export type StreamEvent = StreamEventInput & { seq: number };

export type StreamEventType = StreamEventInput['type'];

// Deltas that may be merged into a later event of the same kind when a subscriber falls behind
export type CoalescableEvent = Extract<StreamEvent, { type: 'AssistantDelta' | 'TerminalOutput' }>;

export function isCoalescable(event: StreamEvent): event is CoalescableEvent {
  return event.type === 'AssistantDelta' || event.type === 'TerminalOutput';
}
