import type { Message, ToolCall } from './messages.js';
import type { ToolDefinition } from './tools.js';

/** A single chunk from an LLM stream. */
export interface StreamChunk {
  type: 'text_delta' | 'tool_call_delta' | 'usage' | 'done';
  text?: string;
  toolCall?: Partial<ToolCall>;
  usage?: { inputTokens: number; outputTokens: number };
  finishReason?: string;
}

/** Options for a completion request. */
export interface CompletionOptions {
  temperature?: number;
  maxTokens?: number;
  /** Aborts the underlying provider request. */
  signal?: AbortSignal;
}

/**
 * Provider-agnostic LLM interface.
 * Implementations wrap specific backends (e.g. pi-ai, or a scripted fake in tests).
 * A provider failure must surface as a thrown error, never as a silent end of stream.
 */
export interface LLMProvider {
  id: string;
  streamCompletion(
    messages: Message[],
    tools: ToolDefinition[],
    options: CompletionOptions,
  ): AsyncIterable<StreamChunk>;
}
