import { types } from 'node:util';

export type ErrorCode =
  | 'ValidationError'
  | 'ToolExecutionError'
  | 'ToolUnavailable'
  | 'ModelError'
  | 'IterationLimitExceeded'
  | 'AccessDenied'
  | 'DuplicateName'
  | 'NotFound'
  | 'Cancelled'
  | 'TimedOut'
  | 'ConfigError'
  | 'InternalError';

/**
 * Base class for every error the core raises. The `code` is what ends up in tool results and
 * run failure events, so the chat pane can tell failures apart without parsing messages.
 */
export class AgentError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = code;
    this.code = code;
  }
}

// Bad tool arguments (schema mismatch, unparseable JSON from the model)
export class ValidationError extends AgentError {
  constructor(message: string, readonly details: string[] = []) {
    super('ValidationError', message);
  }
}

export class ToolExecutionError extends AgentError {
  constructor(message: string, options?: { cause?: unknown; output?: string }) {
    super('ToolExecutionError', message, options);
    this.output = options?.output;
  }

  // Captured process output for failed commands
  readonly output?: string;
}

export class ToolUnavailableError extends AgentError {
  constructor(readonly serverName: string, message: string, options?: { cause?: unknown }) {
    super('ToolUnavailable', message, options);
  }
}

export class ModelError extends AgentError {
  constructor(message: string, readonly transient: boolean, options?: { cause?: unknown; status?: number }) {
    super('ModelError', message, options);
    this.status = options?.status;
  }

  readonly status?: number;
}

export class IterationLimitExceededError extends AgentError {
  constructor(readonly limit: number) {
    super('IterationLimitExceeded', `Maximum number of tool iterations (${limit}) reached for this run`);
  }
}

export class AccessDeniedError extends AgentError {
  constructor(message: string) {
    super('AccessDenied', message);
  }
}

export class DuplicateNameError extends AgentError {
  constructor(readonly toolName: string) {
    super('DuplicateName', `A tool named '${toolName}' is already registered`);
  }
}

export class NotFoundError extends AgentError {
  constructor(message: string) {
    super('NotFound', message);
  }
}

export class CancelledError extends AgentError {
  constructor(message = 'Operation was cancelled') {
    super('Cancelled', message);
  }
}

export class TimedOutError extends AgentError {
  constructor(readonly timeoutMs: number, message?: string) {
    super('TimedOut', message ?? `Operation timed out after ${timeoutMs}ms`);
  }
}

export class ConfigError extends AgentError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('ConfigError', message, options);
  }
}

// isNativeError also recognizes errors from another realm, such as fs errors under a Jest sandbox
export function errorMessage(error: unknown): string {
  return types.isNativeError(error) ? error.message : String(error);
}

/**
 * The `code` of a Node system error (ENOENT, EACCES, ...), or undefined when there is none.
 */
export function systemErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isMissingPathError(error: unknown): boolean {
  const code = systemErrorCode(error);
  return code === 'ENOENT' || code === 'ENOTDIR';
}

// Anything that is not already an AgentError is reported under the fallback code
export function toAgentError(error: unknown, fallback: ErrorCode = 'InternalError'): AgentError {
  if (error instanceof AgentError) {
    return error;
  }
  return new AgentError(fallback, errorMessage(error), { cause: error });
}
