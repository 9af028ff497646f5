import { AgentError } from '../errors';
import { ConversationState } from '../state/conversation-state';

describe('ConversationState', () => {
  let state: ConversationState;

  beforeEach(() => {
    state = new ConversationState();
  });

  it('should assign consecutive sequence numbers in append order', () => {
    state.appendUser('run-1', 'hello');
    state.appendToolCall('run-1', 'call-1', 'file-read', { path: 'a.txt' });
    state.appendToolResult('run-1', { callId: 'call-1', status: 'ok', payload: 'contents', elapsedTimeMs: 3 });

    const turns = state.getTurns();
    expect(turns.map(turn => turn.seq)).toEqual([0, 1, 2]);
    expect(turns.map(turn => turn.type)).toEqual(['user', 'toolCall', 'toolResult']);
    expect(state.validate()).toEqual([]);
  });

  it('should freeze appended turns', () => {
    const turn = state.appendUser('run-1', 'hello');
    expect(Object.isFrozen(turn)).toBe(true);
  });

  it('should record a frozen copy of tool call arguments', () => {
    const args = { path: 'a.txt', viewRange: [1, 5] };
    const turn = state.appendToolCall('run-1', 'call-1', 'file-read', args);

    args.viewRange.push(9);
    args.path = 'b.txt';

    expect(turn.arguments).toEqual({ path: 'a.txt', viewRange: [1, 5] });
    expect(Object.isFrozen(turn.arguments)).toBe(true);
    expect(Object.isFrozen(turn.arguments.viewRange)).toBe(true);
  });

  it('should grow a streaming assistant turn until it is finished', () => {
    const { id } = state.beginAssistant('run-1');
    state.appendAssistantText(id, 'Hel');
    const snapshot = state.getTurns();
    state.appendAssistantText(id, 'lo');

    const firstSnapshot = snapshot[0];
    expect(firstSnapshot.type === 'assistant' && firstSnapshot.text).toBe('Hel');

    const finished = state.finishAssistant(id);
    expect(finished.text).toBe('Hello');
    expect(finished.finished).toBe(true);
    expect(() => state.appendAssistantText(id, '!')).toThrow(AgentError);
  });

  it('should refuse appends while an assistant turn is streaming', () => {
    state.beginAssistant('run-1');
    expect(() => state.appendUser('run-1', 'again')).toThrow('is still streaming');
    expect(state.finishOpenAssistant()).not.toBeNull();
    expect(() => state.appendUser('run-1', 'again')).not.toThrow();
  });

  it('should reject a result without a matching call', () => {
    expect(() => state.appendToolResult('run-1', { callId: 'missing', status: 'ok', payload: '', elapsedTimeMs: 0 }))
      .toThrow('No tool call missing in run run-1 to attach a result to');
  });

  it('should reject a second result for the same call', () => {
    state.appendToolCall('run-1', 'call-1', 'grep', {});
    state.appendToolResult('run-1', { callId: 'call-1', status: 'ok', payload: '', elapsedTimeMs: 0 });
    expect(() => state.markCancelled('run-1', 'call-1')).toThrow('Tool call call-1 already has a result');
  });

  it('should reject a duplicate call id within a run but allow it across runs', () => {
    state.appendToolCall('run-1', 'call-1', 'grep', {});
    expect(() => state.appendToolCall('run-1', 'call-1', 'grep', {})).toThrow(AgentError);
    expect(() => state.appendToolCall('run-2', 'call-1', 'grep', {})).not.toThrow();
  });

  it('should track pending calls and mark them cancelled', () => {
    state.appendToolCall('run-1', 'a', 'grep', {});
    state.appendToolCall('run-1', 'b', 'tree', {});
    state.appendToolResult('run-1', { callId: 'a', status: 'ok', payload: 'x', elapsedTimeMs: 1 });

    expect(state.pendingToolCalls('run-1').map(call => call.callId)).toEqual(['b']);
    expect(state.validate()).toEqual(['Tool call b has no result']);

    const marker = state.markCancelled('run-1', 'b');
    expect(marker.status).toBe('error');
    expect(marker.status === 'error' && marker.error).toEqual({ code: 'Cancelled', message: 'Tool call was cancelled' });
    expect(state.pendingToolCalls()).toEqual([]);
    expect(state.validate()).toEqual([]);
  });

  it('should filter turns by run', () => {
    state.appendUser('run-1', 'first');
    state.appendUser('run-2', 'second');
    expect(state.getTurnsForRun('run-2').map(turn => turn.type === 'user' && turn.text)).toEqual(['second']);
  });

  it('should dispatch generic appends by turn type', () => {
    state.append('run-1', { type: 'user', text: 'hi' });
    state.append('run-1', { type: 'toolCall', callId: 'c', name: 'tree', arguments: {} });
    state.append('run-1', { type: 'toolResult', callId: 'c', status: 'ok', payload: '.', elapsedTimeMs: 0 });
    expect(state.length).toBe(3);
  });
});
