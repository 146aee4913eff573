import { describe, it, expect } from 'vitest';
import type { StreamResponse } from '@parley/core';
import { ModelProviderError } from '@parley/core';
import { LLMService } from '../src/llm-service.js';
import { LLMProviderUnavailableError } from '../src/errors.js';
import { createScriptedProvider } from './helpers.js';

async function drain(gen: AsyncGenerator<string, StreamResponse>) {
  const tokens: string[] = [];
  for (;;) {
    const step = await gen.next();
    if (step.done) return { tokens, response: step.value };
    tokens.push(step.value);
  }
}

describe('LLMService', () => {
  it('yields text deltas and returns the aggregated response', async () => {
    const service = new LLMService({
      providers: [createScriptedProvider([{ text: ['a', 'b'] }])],
    });

    const { tokens, response } = await drain(service.stream([], []));

    expect(tokens).toEqual(['a', 'b']);
    expect(response.text).toBe('ab');
    expect(response.toolCalls).toBeUndefined();
    expect(response.finishReason).toBe('stop');
  });

  it('merges tool call deltas by id', async () => {
    const service = new LLMService({
      providers: [
        {
          id: 'chunked',
          async *streamCompletion() {
            yield { type: 'tool_call_delta', toolCall: { id: 't1', name: 'search', arguments: '{"q":' } };
            yield { type: 'tool_call_delta', toolCall: { id: 't1', arguments: '"x"}' } };
            yield { type: 'usage', usage: { inputTokens: 7, outputTokens: 3 } };
            yield { type: 'done', finishReason: 'tool_calls' };
          },
        },
      ],
    });

    const { response } = await drain(service.stream([], []));

    expect(response.toolCalls).toEqual([{ id: 't1', name: 'search', arguments: '{"q":"x"}' }]);
    expect(response.usage).toEqual({ input: 7, output: 3, total: 10 });
  });

  it('falls back to the next provider when the primary fails before streaming', async () => {
    const primary = createScriptedProvider([{ fail: new Error('rate limited') }], 'primary');
    const backup = createScriptedProvider([{ text: ['from backup'] }], 'backup');
    const service = new LLMService({ providers: [primary, backup] });

    const { tokens } = await drain(service.stream([], []));

    expect(tokens).toEqual(['from backup']);
    expect(primary.requests).toHaveLength(1);
    expect(backup.requests).toHaveLength(1);
  });

  it('does not fall back once text has streamed', async () => {
    const primary = createScriptedProvider([{ text: ['half'], fail: new Error('reset') }], 'primary');
    const backup = createScriptedProvider([{ text: ['unused'] }], 'backup');
    const service = new LLMService({ providers: [primary, backup] });

    await expect(drain(service.stream([], []))).rejects.toBeInstanceOf(ModelProviderError);
    expect(backup.requests).toHaveLength(0);
  });

  it('throws LLMProviderUnavailableError when every provider fails', async () => {
    const service = new LLMService({
      providers: [
        createScriptedProvider([{ fail: new Error('one') }], 'p1'),
        createScriptedProvider([{ fail: new Error('two') }], 'p2'),
      ],
    });

    await expect(drain(service.stream([], []))).rejects.toThrow('All LLM providers failed: two');
  });

  it('throws when no provider is configured', async () => {
    const service = new LLMService({ providers: [] });
    await expect(drain(service.stream([], []))).rejects.toBeInstanceOf(LLMProviderUnavailableError);
  });

  it('rethrows the abort reason instead of falling back', async () => {
    const primary = createScriptedProvider([{ text: ['x'], delayMs: 5_000 }], 'primary');
    const backup = createScriptedProvider([{ text: ['unused'] }], 'backup');
    const service = new LLMService({ providers: [primary, backup] });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    const err = await drain(service.stream([], [], { signal: controller.signal })).catch((e: unknown) => e);

    expect(err).toMatchObject({ name: 'AbortError' });
    expect(backup.requests).toHaveLength(0);
  });

  it('passes completion options to the provider', async () => {
    const provider = createScriptedProvider([{ text: ['ok'] }]);
    const service = new LLMService({ providers: [provider] });

    await drain(service.stream([], [], { temperature: 0.2, maxTokens: 64 }));

    expect(provider.options[0]).toEqual({ temperature: 0.2, maxTokens: 64 });
  });

  it('lists provider ids in fallback order', () => {
    const service = new LLMService({
      providers: [createScriptedProvider([], 'a'), createScriptedProvider([], 'b')],
    });
    expect(service.providerIds).toEqual(['a', 'b']);
  });
});
