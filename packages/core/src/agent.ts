import type { ToolCall } from './messages.js';

/** States of the reasoning loop. */
export enum LoopState {
  THINKING = 'THINKING',
  INVOKING = 'INVOKING',
  OBSERVING = 'OBSERVING',
  DONE = 'DONE',
  ABORTED = 'ABORTED',
}

/** Events yielded from the agent loop and relayed to the client. */
export type AgentEvent =
  | { kind: 'token'; text: string }
  | { kind: 'tool_start'; toolName: string }
  | { kind: 'tool_end'; toolName: string; ok: boolean }
  | { kind: 'status'; message: string }
  | { kind: 'done'; conversationId: string; finalText: string }
  | { kind: 'error'; message: string };

export type AgentEventKind = AgentEvent['kind'];

/** Events after which nothing else is sent for a turn. */
export type TerminalAgentEvent = Extract<AgentEvent, { kind: 'done' | 'error' }>;

export function isTerminalEvent(event: AgentEvent): event is TerminalAgentEvent {
  return event.kind === 'done' || event.kind === 'error';
}

/** Options for the agent loop. */
export interface AgentLoopOptions {
  /** Ceiling on act/observe cycles. Default: 5. */
  maxIterations?: number;
  /** Per tool call timeout. Default: 20_000. */
  toolTimeoutMs?: number;
  /** Wall-clock ceiling for the whole loop. Unbounded when omitted. */
  turnTimeoutMs?: number;
  /** Tool output is truncated beyond this many characters. Default: 20_000. */
  maxToolOutputChars?: number;
}

export interface TokenUsage {
  input: number;
  output: number;
  total: number;
}

/** Aggregated result of one model completion. */
export interface StreamResponse {
  text: string;
  toolCalls?: ToolCall[];
  finishReason?: string;
  usage?: TokenUsage;
}
