import type {
  CompletionOptions,
  LLMProvider,
  Message,
  StreamResponse,
  TokenUsage,
  ToolCall,
  ToolDefinition,
} from '@parley/core';
import { ModelProviderError, errorMessage } from '@parley/core';
import type { LLMServiceOptions } from './types.js';
import { LLMProviderUnavailableError } from './errors.js';

/**
 * Streams completions from the primary provider, falling back to the next
 * provider only while nothing has been streamed for the current completion.
 * Holds no per-request state; one instance serves every turn.
 */
export class LLMService {
  private readonly providers: LLMProvider[];

  constructor(options: LLMServiceOptions) {
    this.providers = [...options.providers];
  }

  get providerIds(): string[] {
    return this.providers.map((p) => p.id);
  }

  /**
   * Yields text deltas as they arrive and returns the aggregated response.
   * Provider failures surface as `ModelProviderError`; an aborted `signal`
   * surfaces as the abort reason.
   */
  async *stream(
    messages: Message[],
    tools: ToolDefinition[],
    options: CompletionOptions = {},
  ): AsyncGenerator<string, StreamResponse> {
    if (this.providers.length === 0) {
      throw new LLMProviderUnavailableError('No LLM provider configured');
    }

    let lastError: unknown;

    for (const provider of this.providers) {
      let streamed = false;
      try {
        const completion = this.runCompletion(provider, messages, tools, options);
        for (;;) {
          const step = await completion.next();
          if (step.done) return step.value;
          streamed = true;
          yield step.value;
        }
      } catch (err) {
        options.signal?.throwIfAborted();
        if (streamed) {
          throw err instanceof ModelProviderError
            ? err
            : new ModelProviderError(`Provider ${provider.id} failed mid-stream: ${errorMessage(err)}`, { cause: err });
        }
        lastError = err;
      }
    }

    throw new LLMProviderUnavailableError(
      `All LLM providers failed: ${errorMessage(lastError)}`,
      { cause: lastError },
    );
  }

  private async *runCompletion(
    provider: LLMProvider,
    messages: Message[],
    tools: ToolDefinition[],
    options: CompletionOptions,
  ): AsyncGenerator<string, StreamResponse> {
    let text = '';
    const toolCallMap = new Map<string, ToolCall>();
    let finishReason: string | undefined;
    let usage: TokenUsage | undefined;

    for await (const chunk of provider.streamCompletion(messages, tools, options)) {
      if (chunk.type === 'text_delta' && chunk.text) {
        text += chunk.text;
        yield chunk.text;
      } else if (chunk.type === 'tool_call_delta' && chunk.toolCall) {
        const tc = chunk.toolCall;
        if (tc.id) {
          const existing = toolCallMap.get(tc.id);
          if (existing) {
            if (tc.name) existing.name = tc.name;
            if (tc.arguments) existing.arguments += tc.arguments;
          } else {
            toolCallMap.set(tc.id, {
              id: tc.id,
              name: tc.name ?? '',
              arguments: tc.arguments ?? '',
            });
          }
        }
      } else if (chunk.type === 'usage' && chunk.usage) {
        usage = {
          input: chunk.usage.inputTokens,
          output: chunk.usage.outputTokens,
          total: chunk.usage.inputTokens + chunk.usage.outputTokens,
        };
      } else if (chunk.type === 'done') {
        finishReason = chunk.finishReason;
      }
    }

    const toolCalls = toolCallMap.size > 0 ? [...toolCallMap.values()] : undefined;
    return { text, toolCalls, finishReason, usage };
  }
}
