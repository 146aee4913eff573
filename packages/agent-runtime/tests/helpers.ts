import { setTimeout as sleep } from 'node:timers/promises';
import type {
  AgentEvent,
  CompletionOptions,
  LLMProvider,
  Message,
  StreamChunk,
  ToolCall,
} from '@parley/core';
import { createLogger } from '@parley/core';

/** One scripted model completion. */
export interface ScriptedCompletion {
  text?: string[];
  toolCalls?: ToolCall[];
  /** Thrown after `text` has been streamed. */
  fail?: Error;
  /** Waits before the first chunk; honors the request signal. */
  delayMs?: number;
}

export interface ScriptedProvider extends LLMProvider {
  /** Messages seen by each call, in call order. */
  readonly requests: Message[][];
  readonly options: CompletionOptions[];
}

/** LLMProvider that replays `script` one completion per call, then answers "fallback". */
export function createScriptedProvider(script: ScriptedCompletion[], id = 'mock'): ScriptedProvider {
  const requests: Message[][] = [];
  const options: CompletionOptions[] = [];
  let index = 0;

  return {
    id,
    requests,
    options,
    async *streamCompletion(messages, _tools, opts): AsyncIterable<StreamChunk> {
      requests.push(messages);
      options.push(opts);
      const step = script[index++] ?? { text: ['fallback'] };
      if (step.delayMs) {
        await sleep(step.delayMs, undefined, { signal: opts.signal });
      }
      for (const text of step.text ?? []) {
        yield { type: 'text_delta', text };
      }
      if (step.fail) throw step.fail;
      for (const tc of step.toolCalls ?? []) {
        yield { type: 'tool_call_delta', toolCall: tc };
      }
      yield { type: 'done', finishReason: step.toolCalls ? 'tool_calls' : 'stop' };
    },
  };
}

export async function collectEvents(gen: AsyncIterable<AgentEvent>): Promise<AgentEvent[]> {
  const events: AgentEvent[] = [];
  for await (const event of gen) {
    events.push(event);
  }
  return events;
}

export const silentLogger = createLogger({ level: 'silent' });
