import type { AgentLoopOptions, CompletionOptions, LLMProvider, Logger } from '@parley/core';

/** Options for constructing an LLMService. The first provider is the primary. */
export interface LLMServiceOptions {
  providers: LLMProvider[];
}

/** Per-turn options for `agentLoop`. */
export interface AgentRunOptions extends AgentLoopOptions {
  conversationId: string;
  logger: Logger;
  completion?: Omit<CompletionOptions, 'signal'>;
  /** Aborted when the client goes away. */
  signal?: AbortSignal;
}

/** Options for a single tool execution. */
export interface ToolExecutionOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}
