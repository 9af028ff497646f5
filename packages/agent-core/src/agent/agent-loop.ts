import { v4 as uuidv4 } from 'uuid';

import {
  AgentError,
  CancelledError,
  IterationLimitExceededError,
  ModelError,
  errorMessage,
  toAgentError,
} from '../errors.js';
import { ModelClient, ModelStreamEvent } from '../providers/types.js';
import { ConversationState } from '../state/conversation-state.js';
import { StreamBroker } from '../stream/stream-broker.js';
import { ToolExecutor } from '../tools/tool-executor.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { Logger } from '../types/common.js';
import { ToolInvocation } from '../types/tools.js';
import { ToolResult, ToolResultTurn } from '../types/turns.js';
import { sleep } from '../utils/sleep.js';
import { RunHandle, RunOutcome } from './run-handle.js';

export interface AgentLoopOptions {
  maxIterations: number;
  modelRetry: boolean;
  modelRetryDelayMs: number;
  systemPrompt?: string;
}

export interface AgentLoopDependencies {
  state: ConversationState;
  registry: ToolRegistry;
  executor: ToolExecutor;
  model: ModelClient;
  broker: StreamBroker;
  logger: Logger;
}

type ModelToolCall = Extract<ModelStreamEvent, { type: 'tool_call' }>;

/**
 * Drives one user input through alternating model turns and tool dispatch:
 *
 *   Idle -> ModelTurn -> Dispatching -> ModelTurn -> ... -> Done | Failed | Cancelled
 *
 * Tool calls of one model turn run concurrently, but their results are appended in the order the
 * model emitted the calls. Whatever way a run ends, every tool call it appended has a result
 * (a Cancelled one if it never produced its own) before `done` resolves.
 */
export class AgentLoop {
  constructor(
    private deps: AgentLoopDependencies,
    private options: AgentLoopOptions,
  ) {}

  /**
   * Appends the user turn and starts the run in the background.
   */
  start(userText: string): RunHandle {
    const handle = new RunHandle(userText);
    this.deps.state.appendUser(handle.id, userText);
    this.deps.broker.publish({ type: 'RunStarted', runId: handle.id, userText });
    this.deps.logger.info(`[AgentLoop] run ${handle.id} started`);
    this.run(handle).then(
      outcome => handle.settle(outcome),
      error => {
        // run() handles its own failures; reaching here means the bookkeeping itself broke
        this.deps.logger.error(`[AgentLoop] run ${handle.id} crashed: ${errorMessage(error)}`);
        handle.settle({ status: 'failed', runId: handle.id, iterations: 0, error: toAgentError(error) });
      },
    );
    return handle;
  }

  private async run(handle: RunHandle): Promise<RunOutcome> {
    let iterations = 0;
    try {
      for (;;) {
        this.throwIfCancelled(handle);
        handle.transition('ModelTurn');
        const calls = await this.modelTurn(handle);
        if (calls.length === 0) {
          handle.transition('Done');
          this.deps.broker.publish({ type: 'RunFinished', runId: handle.id, iterations });
          this.deps.logger.info(`[AgentLoop] run ${handle.id} finished after ${iterations} tool iterations`);
          return { status: 'done', runId: handle.id, iterations };
        }

        this.throwIfCancelled(handle);
        if (iterations >= this.options.maxIterations) {
          // Recorded so the transcript shows what was asked for; finishRun() marks them cancelled
          for (const call of calls) {
            this.appendCall(handle, call);
          }
          throw new IterationLimitExceededError(this.options.maxIterations);
        }
        iterations++;
        handle.transition('Dispatching');
        await this.dispatch(handle, calls);
      }
    } catch (error) {
      return this.finishRun(handle, error, iterations);
    }
  }

  /**
   * Runs one model call, retrying once when it fails transiently before producing anything.
   * Returns the tool calls the model asked for.
   */
  private async modelTurn(handle: RunHandle): Promise<ModelToolCall[]> {
    for (let attempt = 1; ; attempt++) {
      const progress = { emitted: false };
      try {
        return await this.streamModelTurn(handle, progress);
      } catch (error) {
        if (handle.isCancelled) {
          throw new CancelledError();
        }
        const retryable = error instanceof ModelError && error.transient && !progress.emitted;
        if (retryable && this.options.modelRetry && attempt === 1) {
          this.deps.logger.warn(`[AgentLoop] transient model error, retrying in ${this.options.modelRetryDelayMs}ms: ${errorMessage(error)}`);
          await sleep(this.options.modelRetryDelayMs, handle.signal);
          continue;
        }
        if (error instanceof AgentError) {
          throw error;
        }
        throw new ModelError(errorMessage(error), false, { cause: error });
      }
    }
  }

  private async streamModelTurn(handle: RunHandle, progress: { emitted: boolean }): Promise<ModelToolCall[]> {
    const { state, broker, registry, model, logger } = this.deps;
    const request = {
      transcript: state.getTurns(),
      tools: registry.catalog(),
      systemPrompt: this.options.systemPrompt,
    };
    logger.debug(`[AgentLoop] run ${handle.id}: model call with ${request.transcript.length} turns`);

    let assistantTurnId: string | null = null;
    const calls: ModelToolCall[] = [];
    for await (const event of model.completeStream(request, handle.signal)) {
      this.throwIfCancelled(handle);
      switch (event.type) {
        case 'text_delta':
          if (event.text.length === 0) {
            break;
          }
          progress.emitted = true;
          if (assistantTurnId === null) {
            assistantTurnId = state.beginAssistant(handle.id).id;
          }
          state.appendAssistantText(assistantTurnId, event.text);
          broker.publish({ type: 'AssistantDelta', runId: handle.id, turnId: assistantTurnId, text: event.text });
          break;
        case 'tool_call':
          progress.emitted = true;
          calls.push(event);
          break;
        case 'end_of_turn':
          logger.debug(`[AgentLoop] run ${handle.id}: model turn ended (${event.stopReason})`);
          break;
      }
    }
    this.throwIfCancelled(handle);

    // A final answer always ends the transcript with an assistant turn, even an empty one
    if (assistantTurnId === null && calls.length === 0) {
      assistantTurnId = state.beginAssistant(handle.id).id;
    }
    if (assistantTurnId !== null) {
      state.finishAssistant(assistantTurnId);
    }
    return calls;
  }

  private appendCall(handle: RunHandle, call: ModelToolCall): void {
    this.deps.state.appendToolCall(handle.id, call.callId, call.name, call.arguments);
    this.deps.broker.publish({ type: 'ToolCallStarted', runId: handle.id, callId: call.callId, name: call.name, arguments: call.arguments });
  }

  private async dispatch(handle: RunHandle, calls: ModelToolCall[]): Promise<void> {
    const invocations = calls.map((call): ToolInvocation => {
      this.appendCall(handle, call);
      const invocation: ToolInvocation = {
        id: uuidv4(),
        runId: handle.id,
        callId: call.callId,
        name: call.name,
        arguments: call.arguments,
        startedAt: Date.now(),
        signal: handle.signal,
        argumentError: call.argumentError,
      };
      handle.invocations.push(invocation);
      return invocation;
    });

    const pending = invocations.map(invocation => this.deps.executor.execute(invocation));
    for (const [index, resultPromise] of pending.entries()) {
      const result = await resultPromise;
      this.appendResult(handle, invocations[index].name, result);
    }
  }

  private appendResult(handle: RunHandle, name: string, result: ToolResult): ToolResultTurn {
    const turn = this.deps.state.appendToolResult(handle.id, result);
    this.publishResult(turn, name);
    return turn;
  }

  private publishResult(turn: ToolResultTurn, name: string): void {
    this.deps.broker.publish({
      type: 'ToolResultAppended',
      runId: turn.runId,
      callId: turn.callId,
      name,
      status: turn.status,
      output: turn.status === 'ok' ? turn.payload : turn.error.message,
      error: turn.status === 'error' ? turn.error : undefined,
      elapsedTimeMs: turn.elapsedTimeMs,
    });
  }

  /**
   * Brings a failed or cancelled run to a consistent end: the streaming assistant turn is
   * finished and every call still waiting for a result gets a Cancelled one.
   */
  private finishRun(handle: RunHandle, error: unknown, iterations: number): RunOutcome {
    const { state, broker, logger } = this.deps;
    const cancelled = handle.isCancelled;
    const failure = cancelled ? new CancelledError() : toAgentError(error);

    state.finishOpenAssistant();
    const reason = failure instanceof IterationLimitExceededError
      ? `Not run: ${failure.message}`
      : 'Tool call was cancelled';
    for (const call of state.pendingToolCalls(handle.id)) {
      this.publishResult(state.markCancelled(handle.id, call.callId, reason), call.name);
    }

    if (cancelled) {
      handle.transition('Cancelled');
      broker.publish({ type: 'RunCancelled', runId: handle.id });
      logger.info(`[AgentLoop] run ${handle.id} cancelled`);
      return { status: 'cancelled', runId: handle.id, iterations };
    }

    handle.transition('Failed');
    broker.publish({ type: 'RunFailed', runId: handle.id, error: { code: failure.code, message: failure.message } });
    logger.error(`[AgentLoop] run ${handle.id} failed with ${failure.code}: ${failure.message}`);
    return { status: 'failed', runId: handle.id, iterations, error: failure };
  }

  private throwIfCancelled(handle: RunHandle): void {
    if (handle.isCancelled) {
      throw new CancelledError();
    }
  }
}
