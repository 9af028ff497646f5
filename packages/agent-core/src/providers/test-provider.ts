import { CancelledError } from '../errors.js';
import { sleep } from '../utils/sleep.js';
import { Turn } from '../types/turns.js';
import { ModelClient, ModelRequest, ModelStreamEvent, ProviderInfo } from './types.js';

/**
 * One scripted model response: the events to stream, optionally followed by a failure.
 * `delayMs` is waited before each event.
 */
export interface ScriptedStep {
  events: ModelStreamEvent[];
  delayMs?: number;
  error?: Error;
}

export type ScriptedResponder = (request: ModelRequest, callIndex: number) => ScriptedStep;

export const testProviderInfo: ProviderInfo = {
  name: 'Test Provider',
  description: 'Replays scripted responses; without a script it echoes the last user message',
};

export function textReply(text: string): ScriptedStep {
  return { events: [{ type: 'text_delta', text }, { type: 'end_of_turn', stopReason: 'end_turn' }] };
}

export function toolCallReply(
  calls: Array<{ callId: string; name: string; arguments?: Record<string, unknown> }>,
  text?: string,
): ScriptedStep {
  const events: ModelStreamEvent[] = text ? [{ type: 'text_delta', text }] : [];
  for (const call of calls) {
    events.push({ type: 'tool_call', callId: call.callId, name: call.name, arguments: call.arguments ?? {} });
  }
  events.push({ type: 'end_of_turn', stopReason: 'tool_use' });
  return { events };
}

function lastUserText(transcript: readonly Turn[]): string {
  for (let i = transcript.length - 1; i >= 0; i--) {
    const turn = transcript[i];
    if (turn.type === 'user') {
      return turn.text;
    }
  }
  return '';
}

export const echoResponder: ScriptedResponder = request => textReply(`You said: ${lastUserText(request.transcript)}`);

/**
 * Model client that plays back a fixed list of steps, one per call, or asks a responder for each
 * step. Every request is recorded so callers can inspect what the model was sent.
 */
export class ScriptedModelClient implements ModelClient {
  readonly info = testProviderInfo;
  readonly modelName: string;
  readonly requests: ModelRequest[] = [];
  private responder: ScriptedResponder;

  constructor(script: ScriptedStep[] | ScriptedResponder = echoResponder, modelName = 'scripted') {
    this.modelName = modelName;
    if (Array.isArray(script)) {
      const steps = [...script];
      this.responder = (_request, callIndex) => {
        const step = steps[callIndex];
        if (!step) {
          throw new Error(`Scripted model has no step for call ${callIndex + 1}`);
        }
        return step;
      };
    } else {
      this.responder = script;
    }
  }

  get callCount(): number {
    return this.requests.length;
  }

  async *completeStream(request: ModelRequest, signal: AbortSignal): AsyncIterable<ModelStreamEvent> {
    const callIndex = this.requests.length;
    this.requests.push({ ...request, transcript: [...request.transcript], tools: [...request.tools] });
    const step = this.responder(request, callIndex);

    for (const event of step.events) {
      if (step.delayMs) {
        await sleep(step.delayMs, signal);
      }
      if (signal.aborted) {
        throw new CancelledError('Model call was cancelled');
      }
      yield event;
    }
    if (step.error) {
      throw step.error;
    }
  }
}
