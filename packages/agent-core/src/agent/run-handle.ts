import { v4 as uuidv4 } from 'uuid';

import { AgentError, CancelledError } from '../errors.js';
import { ToolInvocation } from '../types/tools.js';

export type RunState = 'Idle' | 'ModelTurn' | 'Dispatching' | 'Done' | 'Failed' | 'Cancelled';

export type RunOutcome =
  | { status: 'done'; runId: string; iterations: number }
  | { status: 'failed'; runId: string; iterations: number; error: AgentError }
  | { status: 'cancelled'; runId: string; iterations: number };

const TERMINAL_STATES: ReadonlySet<RunState> = new Set<RunState>(['Done', 'Failed', 'Cancelled']);

/**
 * One agent loop execution bound to one user input. `done` resolves (never rejects) once the run
 * has reached a terminal state and the transcript has no unresolved tool calls left.
 */
export class RunHandle {
  readonly id = uuidv4();
  readonly invocations: ToolInvocation[] = [];
  readonly done: Promise<RunOutcome>;
  private controller = new AbortController();
  private _state: RunState = 'Idle';
  private resolveDone: (outcome: RunOutcome) => void = () => {};

  constructor(readonly userText: string) {
    this.done = new Promise(resolve => {
      this.resolveDone = resolve;
    });
  }

  get state(): RunState {
    return this._state;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get isTerminal(): boolean {
    return TERMINAL_STATES.has(this._state);
  }

  // Requests cooperative cancellation; no effect once the run is terminal
  cancel(reason = 'Run was cancelled'): void {
    if (!this.isTerminal && !this.controller.signal.aborted) {
      this.controller.abort(new CancelledError(reason));
    }
  }

  transition(state: RunState): void {
    if (this.isTerminal) {
      throw new AgentError('InternalError', `Run ${this.id} is already ${this._state}`);
    }
    this._state = state;
  }

  settle(outcome: RunOutcome): void {
    this.resolveDone(outcome);
  }
}
