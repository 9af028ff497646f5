import { AgentError, CancelledError, ErrorCode, TimedOutError, ToolExecutionError, ValidationError, errorMessage } from '../errors.js';
import { Logger } from '../types/common.js';
import { StreamEventInput } from '../types/events.js';
import { ToolContext, ToolInvocation } from '../types/tools.js';
import { ToolResult } from '../types/turns.js';
import { SchemaValidator } from './schema-validator.js';
import { ToolLease, ToolRegistry } from './tool-registry.js';

export interface ToolExecutorOptions {
  // Applies to tools that don't declare their own timeout; 0 disables
  defaultTimeoutMs: number;
  emit?: (event: StreamEventInput) => void;
}

// Codes a handler may raise that are reported as-is; anything else is a ToolExecutionError
const PASSTHROUGH_CODES: ReadonlySet<ErrorCode> = new Set<ErrorCode>([
  'ValidationError',
  'ToolExecutionError',
  'ToolUnavailable',
  'AccessDenied',
  'Cancelled',
  'TimedOut',
]);

function formatFailure(error: AgentError): string {
  if (error instanceof ToolExecutionError && error.output) {
    return `${error.message}\n${error.output}`;
  }
  return error.message;
}

/**
 * Runs one tool invocation to completion, timeout or cancellation, and always returns a result
 * envelope: execute() does not throw.
 */
export class ToolExecutor {
  private validator = new SchemaValidator();

  constructor(
    private registry: ToolRegistry,
    private logger: Logger,
    private options: ToolExecutorOptions,
  ) {}

  async execute(invocation: ToolInvocation): Promise<ToolResult> {
    const startTime = performance.now();
    let lease: ToolLease | null = null;
    let handlerSettled: Promise<void> | null = null;
    try {
      if (invocation.signal.aborted) {
        throw new CancelledError(`Tool call ${invocation.name} was cancelled before it started`);
      }
      if (invocation.argumentError) {
        throw new ValidationError(invocation.argumentError);
      }

      lease = this.registry.acquire(invocation.name);
      const definition = lease.definition;
      this.validator.validate(definition.name, definition.inputSchema, invocation.arguments);

      this.logger.info(`[ToolExecutor] ${invocation.name} (${invocation.callId}) started`);
      const timeoutMs = definition.timeoutMs ?? this.options.defaultTimeoutMs;
      const run = this.runHandler(invocation, timeoutMs, signal => definition.handler(invocation.arguments, this.createContext(invocation, signal)));
      handlerSettled = run.settled;
      const payload = await run.outcome;
      const elapsedTimeMs = performance.now() - startTime;
      this.logger.info(`[ToolExecutor] ${invocation.name} (${invocation.callId}) completed in ${elapsedTimeMs.toFixed(0)}ms`);
      return { callId: invocation.callId, status: 'ok', payload, elapsedTimeMs };
    } catch (error) {
      const failure = this.normalize(error);
      const elapsedTimeMs = performance.now() - startTime;
      this.logger.warn(`[ToolExecutor] ${invocation.name} (${invocation.callId}) failed with ${failure.code}: ${failure.message}`);
      return {
        callId: invocation.callId,
        status: 'error',
        error: { code: failure.code, message: formatFailure(failure) },
        elapsedTimeMs,
      };
    } finally {
      // The server lease is held until the handler itself has stopped, even when a timeout or
      // cancellation let us return earlier
      if (lease) {
        const held = lease;
        if (handlerSettled) {
          void handlerSettled.then(() => held.release());
        } else {
          held.release();
        }
      }
    }
  }

  /**
   * Races the handler against the timeout and the invocation's cancellation. Either one aborts
   * the signal the handler sees, so tools that spawn processes can kill them, and the executor
   * returns without waiting for the handler to notice.
   */
  private runHandler(
    invocation: ToolInvocation,
    timeoutMs: number,
    run: (signal: AbortSignal) => Promise<string>,
  ): { outcome: Promise<string>; settled: Promise<void> } {
    const controller = new AbortController();
    let handlerPromise: Promise<string>;
    try {
      handlerPromise = run(controller.signal);
    } catch (error) {
      handlerPromise = Promise.reject(error);
    }
    const settled = handlerPromise.then(() => undefined, () => undefined);

    const outcome = new Promise<string>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const settle = (fn: () => void) => {
        if (timer) {
          clearTimeout(timer);
        }
        invocation.signal.removeEventListener('abort', onAbort);
        fn();
      };
      const onAbort = () => {
        const error = new CancelledError(`Tool call ${invocation.name} was cancelled`);
        controller.abort(error);
        settle(() => reject(error));
      };

      if (timeoutMs > 0) {
        timer = setTimeout(() => {
          const error = new TimedOutError(timeoutMs, `Tool ${invocation.name} timed out after ${timeoutMs}ms`);
          controller.abort(error);
          settle(() => reject(error));
        }, timeoutMs);
      }
      invocation.signal.addEventListener('abort', onAbort, { once: true });

      handlerPromise.then(
        value => settle(() => resolve(value)),
        error => settle(() => reject(error)),
      );
    });
    return { outcome, settled };
  }

  private createContext(invocation: ToolInvocation, signal: AbortSignal): ToolContext {
    return {
      runId: invocation.runId,
      callId: invocation.callId,
      signal,
      logger: this.logger,
      emit: event => this.options.emit?.(event),
    };
  }

  private normalize(error: unknown): AgentError {
    if (error instanceof AgentError) {
      if (PASSTHROUGH_CODES.has(error.code)) {
        return error;
      }
      if (error.code === 'NotFound') {
        return new ToolExecutionError(error.message, { cause: error });
      }
    }
    return new ToolExecutionError(errorMessage(error), { cause: error });
  }
}
