import { v4 as uuidv4 } from 'uuid';

import { AgentError } from '../errors.js';
import { AssistantTurn, NewTurn, ToolCallTurn, ToolResult, ToolResultTurn, Turn, UserTurn } from '../types/turns.js';

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

/**
 * Append-only transcript shared by the agent loop and every pane.
 *
 * All mutation goes through the methods below, each of which completes synchronously, so a reader
 * can never observe a half-appended turn: the event loop gives us the single-writer discipline.
 * Appended turns are frozen. The one exception is the streaming assistant turn, which grows in
 * place until finishAssistant() freezes it; readers get a copy of it in snapshots.
 */
export class ConversationState {
  private turns: Turn[] = [];
  // `${runId}:${callId}` -> whether a result has been appended
  private toolCalls = new Map<string, { turn: ToolCallTurn; resolved: boolean }>();
  private openAssistant: AssistantTurn | null = null;

  get length(): number {
    return this.turns.length;
  }

  append(runId: string, turn: NewTurn): Turn {
    switch (turn.type) {
      case 'user':
        return this.appendUser(runId, turn.text);
      case 'toolCall':
        return this.appendToolCall(runId, turn.callId, turn.name, turn.arguments);
      case 'toolResult':
        return this.appendToolResult(runId, turn);
    }
  }

  appendUser(runId: string, text: string): UserTurn {
    this.assertNoOpenAssistant();
    const turn: UserTurn = { type: 'user', id: uuidv4(), seq: this.turns.length, runId, text };
    return this.push(turn);
  }

  beginAssistant(runId: string): AssistantTurn {
    this.assertNoOpenAssistant();
    const turn: AssistantTurn = { type: 'assistant', id: uuidv4(), seq: this.turns.length, runId, text: '', finished: false };
    this.turns.push(turn);
    this.openAssistant = turn;
    return { ...turn };
  }

  appendAssistantText(turnId: string, text: string): void {
    const turn = this.requireOpenAssistant(turnId);
    turn.text += text;
  }

  finishAssistant(turnId: string): AssistantTurn {
    const turn = this.requireOpenAssistant(turnId);
    turn.finished = true;
    Object.freeze(turn);
    this.openAssistant = null;
    return turn;
  }

  // Finishes whatever assistant turn is still streaming (used when a run fails or is cancelled)
  finishOpenAssistant(): AssistantTurn | null {
    return this.openAssistant ? this.finishAssistant(this.openAssistant.id) : null;
  }

  appendToolCall(runId: string, callId: string, name: string, args: Record<string, unknown>): ToolCallTurn {
    this.assertNoOpenAssistant();
    const key = `${runId}:${callId}`;
    if (this.toolCalls.has(key)) {
      throw new AgentError('InternalError', `Tool call ${callId} was already appended for run ${runId}`);
    }
    // A copy, so a handler that mutates its arguments cannot rewrite the transcript
    const turn: ToolCallTurn = { type: 'toolCall', id: uuidv4(), seq: this.turns.length, runId, callId, name, arguments: structuredClone(args) };
    this.push(turn);
    this.toolCalls.set(key, { turn, resolved: false });
    return turn;
  }

  appendToolResult(runId: string, result: ToolResult): ToolResultTurn {
    this.assertNoOpenAssistant();
    const entry = this.toolCalls.get(`${runId}:${result.callId}`);
    if (!entry) {
      throw new AgentError('InternalError', `No tool call ${result.callId} in run ${runId} to attach a result to`);
    }
    if (entry.resolved) {
      throw new AgentError('InternalError', `Tool call ${result.callId} already has a result`);
    }
    const turn: ToolResultTurn = { ...result, type: 'toolResult', id: uuidv4(), seq: this.turns.length, runId };
    this.push(turn);
    entry.resolved = true;
    return turn;
  }

  // Marks a call that will never produce a result of its own
  markCancelled(runId: string, callId: string, reason = 'Tool call was cancelled'): ToolResultTurn {
    return this.appendToolResult(runId, {
      callId,
      status: 'error',
      error: { code: 'Cancelled', message: reason },
      elapsedTimeMs: 0,
    });
  }

  // Tool calls of a run (or of all runs) still waiting for a result, in emission order
  pendingToolCalls(runId?: string): ToolCallTurn[] {
    const pending: ToolCallTurn[] = [];
    for (const { turn, resolved } of this.toolCalls.values()) {
      if (!resolved && (runId === undefined || turn.runId === runId)) {
        pending.push(turn);
      }
    }
    return pending.sort((a, b) => a.seq - b.seq);
  }

  /**
   * Point-in-time copy of the transcript. Frozen turns are shared; a still-streaming assistant
   * turn is copied so the snapshot never changes under the reader.
   */
  getTurns(): Turn[] {
    return this.turns.map(turn => (turn === this.openAssistant ? { ...turn } : turn));
  }

  getTurnsForRun(runId: string): Turn[] {
    return this.getTurns().filter(turn => turn.runId === runId);
  }

  /**
   * Checks the transcript is replayable: every tool call resolved exactly once, every result
   * after its call, nothing still streaming. Returns the problems found (empty when valid).
   */
  validate(): string[] {
    const problems: string[] = [];
    const seen = new Map<string, boolean>();
    for (const turn of this.turns) {
      if (turn.type === 'assistant' && !turn.finished) {
        problems.push(`Assistant turn ${turn.id} is still streaming`);
      } else if (turn.type === 'toolCall') {
        seen.set(`${turn.runId}:${turn.callId}`, false);
      } else if (turn.type === 'toolResult') {
        const key = `${turn.runId}:${turn.callId}`;
        if (!seen.has(key)) {
          problems.push(`Tool result for ${turn.callId} has no preceding tool call`);
        } else if (seen.get(key)) {
          problems.push(`Tool call ${turn.callId} has more than one result`);
        }
        seen.set(key, true);
      }
    }
    for (const [key, resolved] of seen) {
      if (!resolved) {
        problems.push(`Tool call ${key.split(':')[1]} has no result`);
      }
    }
    return problems;
  }

  private push<T extends Turn>(turn: T): T {
    deepFreeze(turn);
    this.turns.push(turn);
    return turn;
  }

  private requireOpenAssistant(turnId: string): AssistantTurn {
    if (!this.openAssistant || this.openAssistant.id !== turnId) {
      throw new AgentError('InternalError', `Assistant turn ${turnId} is not streaming`);
    }
    return this.openAssistant;
  }

  // Nothing may be appended after a streaming assistant turn until it is finished
  private assertNoOpenAssistant(): void {
    if (this.openAssistant) {
      throw new AgentError('InternalError', `Assistant turn ${this.openAssistant.id} is still streaming`);
    }
  }
}
