import { AgentLoop, AgentLoopOptions } from '../agent/agent-loop';
import { ModelError } from '../errors';
import { ScriptedModelClient, ScriptedStep, textReply, toolCallReply } from '../providers/test-provider';
import { ConversationState } from '../state/conversation-state';
import { StreamBroker, Subscription } from '../stream/stream-broker';
import { ToolExecutor } from '../tools/tool-executor';
import { ToolRegistry } from '../tools/tool-registry';
import { silentLogger } from '../types/common';
import { ToolDefinition, ToolHandler } from '../types/tools';
import { Turn } from '../types/turns';
import { delay, localTool } from './helpers';

const waitForAbort: ToolHandler = (_args, context) => new Promise((_resolve, reject) => {
  context.signal.addEventListener('abort', () => reject(context.signal.reason));
});

interface Harness {
  loop: AgentLoop;
  state: ConversationState;
  events: Subscription;
}

function createHarness(model: ScriptedModelClient, tools: ToolDefinition[] = [], options: Partial<AgentLoopOptions> = {}): Harness {
  const state = new ConversationState();
  const registry = new ToolRegistry(silentLogger);
  const broker = new StreamBroker(silentLogger);
  for (const tool of tools) {
    registry.register(tool);
  }
  const executor = new ToolExecutor(registry, silentLogger, { defaultTimeoutMs: 5000, emit: event => broker.publish(event) });
  const loop = new AgentLoop(
    { state, registry, executor, model, broker, logger: silentLogger },
    { maxIterations: 10, modelRetry: true, modelRetryDelayMs: 1, ...options },
  );
  return { loop, state, events: broker.subscribe('test') };
}

function describeTurn(turn: Turn): string {
  switch (turn.type) {
    case 'user':
      return `user:${turn.text}`;
    case 'assistant':
      return `assistant:${turn.text}`;
    case 'toolCall':
      return `call:${turn.callId}:${turn.name}`;
    case 'toolResult':
      return turn.status === 'ok' ? `result:${turn.callId}:${turn.payload}` : `error:${turn.callId}:${turn.error.code}`;
  }
}

describe('AgentLoop', () => {
  it('should finish a run that needs no tools', async () => {
    const { loop, state, events } = createHarness(new ScriptedModelClient([textReply('Hi there')]));

    const handle = loop.start('hello');
    const outcome = await handle.done;

    expect(outcome).toEqual({ status: 'done', runId: handle.id, iterations: 0 });
    expect(handle.state).toBe('Done');
    expect(state.getTurns().map(describeTurn)).toEqual(['user:hello', 'assistant:Hi there']);
    expect(events.drain().map(event => event.type)).toEqual(['RunStarted', 'AssistantDelta', 'RunFinished']);
  });

  it('should call a tool, append its result and feed it back to the model', async () => {
    const model = new ScriptedModelClient([
      toolCallReply([{ callId: 'c1', name: 'lookup', arguments: { key: 'a' } }]),
      textReply('The value is value-a'),
    ]);
    const lookup = localTool('lookup', async args => `value-${String(args.key)}`);
    const { loop, state, events } = createHarness(model, [lookup]);

    const outcome = await loop.start('what is a?').done;

    expect(outcome.status).toBe('done');
    expect(outcome.iterations).toBe(1);
    expect(state.getTurns().map(describeTurn)).toEqual([
      'user:what is a?',
      'call:c1:lookup',
      'result:c1:value-a',
      'assistant:The value is value-a',
    ]);
    expect(model.requests[1].transcript.map(describeTurn)).toEqual(['user:what is a?', 'call:c1:lookup', 'result:c1:value-a']);
    expect(model.requests[0].tools.map(tool => tool.name)).toEqual(['lookup']);
    expect(events.drain().map(event => event.type)).toEqual([
      'RunStarted',
      'ToolCallStarted',
      'ToolResultAppended',
      'AssistantDelta',
      'RunFinished',
    ]);
    expect(state.validate()).toEqual([]);
  });

  it('should run calls concurrently but append results in emission order', async () => {
    const completed: string[] = [];
    const wait = localTool('wait', async (args, context) => {
      await delay(Number(args.ms));
      completed.push(context.callId);
      return `waited ${String(args.ms)}`;
    });
    const model = new ScriptedModelClient([
      toolCallReply([
        { callId: 'slow', name: 'wait', arguments: { ms: 60 } },
        { callId: 'fast', name: 'wait', arguments: { ms: 0 } },
        { callId: 'mid', name: 'wait', arguments: { ms: 20 } },
      ]),
      textReply('done'),
    ]);
    const { loop, state } = createHarness(model, [wait]);

    await loop.start('go').done;

    expect(completed).toEqual(['fast', 'mid', 'slow']);
    expect(state.getTurns().map(describeTurn)).toEqual([
      'user:go',
      'call:slow:wait',
      'call:fast:wait',
      'call:mid:wait',
      'result:slow:waited 60',
      'result:fast:waited 0',
      'result:mid:waited 20',
      'assistant:done',
    ]);
  });

  it('should report a failing tool to the model and keep going', async () => {
    const model = new ScriptedModelClient([toolCallReply([{ callId: 'c1', name: 'missing' }]), textReply('sorry')]);
    const { loop, state } = createHarness(model);

    const outcome = await loop.start('try').done;

    expect(outcome.status).toBe('done');
    expect(state.getTurns().map(describeTurn)).toEqual(['user:try', 'call:c1:missing', 'error:c1:ToolExecutionError', 'assistant:sorry']);
  });

  it('should stop after the iteration limit and mark the extra calls as not run', async () => {
    let runs = 0;
    const noop = localTool('noop', async () => {
      runs++;
      return 'ok';
    });
    const model = new ScriptedModelClient((_request, callIndex) => toolCallReply([{ callId: `c${callIndex}`, name: 'noop' }]));
    const { loop, state, events } = createHarness(model, [noop], { maxIterations: 2 });

    const outcome = await loop.start('loop forever').done;

    expect(outcome.status).toBe('failed');
    expect(outcome.iterations).toBe(2);
    expect(outcome.status === 'failed' && outcome.error.code).toBe('IterationLimitExceeded');
    expect(model.callCount).toBe(3);
    expect(runs).toBe(2);

    const turns = state.getTurns();
    expect(turns.map(describeTurn)).toEqual([
      'user:loop forever',
      'call:c0:noop',
      'result:c0:ok',
      'call:c1:noop',
      'result:c1:ok',
      'call:c2:noop',
      'error:c2:Cancelled',
    ]);
    const last = turns[turns.length - 1];
    expect(last.type === 'toolResult' && last.status === 'error' && last.error.message)
      .toBe('Not run: Maximum number of tool iterations (2) reached for this run');
    expect(state.validate()).toEqual([]);

    const published = events.drain();
    expect(published[published.length - 1]).toMatchObject({
      type: 'RunFailed',
      error: { code: 'IterationLimitExceeded', message: 'Maximum number of tool iterations (2) reached for this run' },
    });
  });

  it('should cancel a run while a tool is executing', async () => {
    const model = new ScriptedModelClient([toolCallReply([{ callId: 'c1', name: 'block' }])]);
    const { loop, state, events } = createHarness(model, [localTool('block', waitForAbort)]);

    const handle = loop.start('block please');
    await delay(20);
    handle.cancel();
    const outcome = await handle.done;

    expect(outcome.status).toBe('cancelled');
    expect(handle.state).toBe('Cancelled');
    expect(state.getTurns().map(describeTurn)).toEqual(['user:block please', 'call:c1:block', 'error:c1:Cancelled']);
    expect(state.validate()).toEqual([]);
    const types = events.drain().map(event => event.type);
    expect(types[types.length - 1]).toBe('RunCancelled');
    expect(model.callCount).toBe(1);
  });

  it('should keep finished results and cancel the rest when a batch is cancelled', async () => {
    const model = new ScriptedModelClient([
      toolCallReply([
        { callId: 'c1', name: 'quick' },
        { callId: 'c2', name: 'block' },
        { callId: 'c3', name: 'quick' },
        { callId: 'c4', name: 'block' },
      ]),
    ]);
    const quick = localTool('quick', async (_args, context) => `done ${context.callId}`);
    const { loop, state } = createHarness(model, [quick, localTool('block', waitForAbort)]);

    const handle = loop.start('mixed');
    await delay(20);
    handle.cancel();
    const outcome = await handle.done;

    expect(outcome.status).toBe('cancelled');
    expect(state.getTurns().map(describeTurn)).toEqual([
      'user:mixed',
      'call:c1:quick',
      'call:c2:block',
      'call:c3:quick',
      'call:c4:block',
      'result:c1:done c1',
      'error:c2:Cancelled',
      'result:c3:done c3',
      'error:c4:Cancelled',
    ]);
    expect(state.validate()).toEqual([]);
    expect(model.callCount).toBe(1);
  });

  it('should not let a handler rewrite the recorded call arguments', async () => {
    const mutate = localTool('mutate', async args => {
      const nested = args.options;
      if (typeof nested === 'object' && nested !== null && 'mode' in nested) {
        Object.assign(nested, { mode: 'changed' });
      }
      return 'ok';
    });
    const model = new ScriptedModelClient([
      toolCallReply([{ callId: 'c1', name: 'mutate', arguments: { options: { mode: 'original' } } }]),
      textReply('done'),
    ]);
    const { loop, state } = createHarness(model, [mutate]);

    await loop.start('go').done;

    const call = state.getTurns()[1];
    expect(call.type === 'toolCall' && call.arguments).toEqual({ options: { mode: 'original' } });
    expect(call.type === 'toolCall' && Object.isFrozen(call.arguments.options)).toBe(true);
  });

  it('should cancel a run while the model is streaming', async () => {
    const step: ScriptedStep = {
      delayMs: 50,
      events: [{ type: 'text_delta', text: 'par' }, { type: 'text_delta', text: 'tial' }, { type: 'end_of_turn', stopReason: 'end_turn' }],
    };
    const { loop, state } = createHarness(new ScriptedModelClient([step]));

    const handle = loop.start('talk');
    await delay(75);
    handle.cancel();
    const outcome = await handle.done;

    expect(outcome.status).toBe('cancelled');
    const turns = state.getTurns();
    expect(turns.map(describeTurn)).toEqual(['user:talk', 'assistant:par']);
    expect(turns[1].type === 'assistant' && turns[1].finished).toBe(true);
  });

  it('should retry a transient model failure once', async () => {
    const model = new ScriptedModelClient([
      { events: [], error: new ModelError('overloaded', true) },
      textReply('recovered'),
    ]);
    const { loop, state } = createHarness(model);

    const outcome = await loop.start('hi').done;

    expect(outcome.status).toBe('done');
    expect(model.callCount).toBe(2);
    expect(state.getTurns().map(describeTurn)).toEqual(['user:hi', 'assistant:recovered']);
  });

  it('should give up after the second transient failure', async () => {
    const model = new ScriptedModelClient([
      { events: [], error: new ModelError('overloaded', true) },
      { events: [], error: new ModelError('still overloaded', true) },
    ]);
    const outcome = await createHarness(model).loop.start('hi').done;

    expect(outcome.status === 'failed' && outcome.error.message).toBe('still overloaded');
    expect(model.callCount).toBe(2);
  });

  it('should not retry a permanent model failure', async () => {
    const model = new ScriptedModelClient([{ events: [], error: new ModelError('bad request', false) }]);
    const { loop, events } = createHarness(model);

    const outcome = await loop.start('hi').done;

    expect(outcome.status === 'failed' && outcome.error.code).toBe('ModelError');
    expect(model.callCount).toBe(1);
    const published = events.drain();
    expect(published[published.length - 1]).toMatchObject({ type: 'RunFailed', error: { code: 'ModelError', message: 'bad request' } });
  });

  it('should not retry once the model has streamed text', async () => {
    const model = new ScriptedModelClient([
      { events: [{ type: 'text_delta', text: 'half' }], error: new ModelError('connection reset', true) },
      textReply('never sent'),
    ]);
    const { loop, state } = createHarness(model);

    const outcome = await loop.start('hi').done;

    expect(outcome.status).toBe('failed');
    expect(model.callCount).toBe(1);
    expect(state.getTurns().map(describeTurn)).toEqual(['user:hi', 'assistant:half']);
    expect(state.validate()).toEqual([]);
  });

  it('should report unexpected model client errors as model errors', async () => {
    const outcome = await createHarness(new ScriptedModelClient([])).loop.start('hi').done;

    expect(outcome.status).toBe('failed');
    if (outcome.status === 'failed') {
      expect(outcome.error).toBeInstanceOf(ModelError);
      expect(outcome.error.message).toBe('Scripted model has no step for call 1');
    }
  });

  it('should record a turn with no text and no calls as an empty assistant turn', async () => {
    const model = new ScriptedModelClient([{ events: [{ type: 'end_of_turn', stopReason: 'end_turn' }] }]);
    const { loop, state } = createHarness(model);

    await loop.start('quiet').done;

    expect(state.getTurns().map(describeTurn)).toEqual(['user:quiet', 'assistant:']);
  });

  it('should pass the system prompt to the model', async () => {
    const model = new ScriptedModelClient([textReply('ok')]);
    await createHarness(model, [], { systemPrompt: 'Be brief.' }).loop.start('hi').done;
    expect(model.requests[0].systemPrompt).toBe('Be brief.');
  });
});
