import { ErrorCode } from '../errors.js';

// The transcript is an append-only sequence of these turns. Every turn records the run that appended
// it; `seq` is its position in the transcript.

interface TurnBase {
  id: string;
  seq: number;
  runId: string;
}

export interface UserTurn extends TurnBase {
  type: 'user';
  text: string;
}

// The only turn that changes after it is appended: text grows while the model streams, until
// `finished` is set.
export interface AssistantTurn extends TurnBase {
  type: 'assistant';
  text: string;
  finished: boolean;
}

export interface ToolCallTurn extends TurnBase {
  type: 'toolCall';
  callId: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolResultError {
  code: ErrorCode;
  message: string;
}

// Uniform envelope every tool invocation produces, success or failure
export type ToolResult = {
  callId: string;
  elapsedTimeMs: number;
} & ({
  status: 'ok';
  payload: string;
} | {
  status: 'error';
  error: ToolResultError;
});

export type ToolResultTurn = TurnBase & { type: 'toolResult' } & ToolResult;

export type Turn = UserTurn | AssistantTurn | ToolCallTurn | ToolResultTurn;

export type TurnType = Turn['type'];

// What callers hand to ConversationState; id, seq and runId are assigned on append
export type NewTurn =
  | Pick<UserTurn, 'type' | 'text'>
  | Pick<ToolCallTurn, 'type' | 'callId' | 'name' | 'arguments'>
  | ({ type: 'toolResult' } & ToolResult);
