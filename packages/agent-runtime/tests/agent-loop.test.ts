import { describe, it, expect } from 'vitest';
import type { ToolDefinition, ToolHandler } from '@parley/core';
import { isTerminalEvent } from '@parley/core';
import {
  agentLoop,
  INCOMPLETE_NOTE,
  MODEL_UNAVAILABLE_MESSAGE,
} from '../src/agent-loop.js';
import { ConversationContext } from '../src/conversation-context.js';
import { LLMService } from '../src/llm-service.js';
import type { ScriptedCompletion } from './helpers.js';
import { collectEvents, createScriptedProvider, silentLogger } from './helpers.js';

const searchTool: ToolDefinition = { name: 'search', description: 'Search', inputSchema: {} };

function setup(script: ScriptedCompletion[]) {
  const provider = createScriptedProvider(script);
  const llm = new LLMService({ providers: [provider] });
  const ctx = new ConversationContext({ conversationId: 'c1', systemPrompt: 'sys' });
  ctx.addUserMessage('Hi');
  return { provider, llm, ctx };
}

const searchCall = { id: 'tc1', name: 'search', arguments: '{"q":"test"}' };

describe('agentLoop', () => {
  it('streams text and finishes with done', async () => {
    const { llm, ctx } = setup([{ text: ['Hel', 'lo!'] }]);

    const events = await collectEvents(
      agentLoop(llm, ctx, [], new Map(), { conversationId: 'c1', logger: silentLogger }),
    );

    expect(events).toEqual([
      { kind: 'token', text: 'Hel' },
      { kind: 'token', text: 'lo!' },
      { kind: 'done', conversationId: 'c1', finalText: 'Hello!' },
    ]);
    expect(ctx.getHistory()).toEqual([
      { role: 'user', content: 'Hi' },
      { role: 'assistant', content: 'Hello!' },
    ]);
  });

  it('brackets a tool call and feeds the observation back to the model', async () => {
    const { provider, llm, ctx } = setup([
      { toolCalls: [searchCall] },
      { text: ['Here are the results.'] },
    ]);
    const handlers = new Map<string, ToolHandler>([
      ['search', async (args) => `Results for ${String(args['q'])}`],
    ]);

    const events = await collectEvents(
      agentLoop(llm, ctx, [searchTool], handlers, { conversationId: 'c1', logger: silentLogger }),
    );

    expect(events).toEqual([
      { kind: 'tool_start', toolName: 'search' },
      { kind: 'tool_end', toolName: 'search', ok: true },
      { kind: 'token', text: 'Here are the results.' },
      { kind: 'done', conversationId: 'c1', finalText: 'Here are the results.' },
    ]);
    const secondRequest = provider.requests[1] ?? [];
    expect(secondRequest.at(-1)).toEqual({
      role: 'tool',
      content: 'Results for test',
      toolCallId: 'tc1',
      isError: false,
    });
  });

  it('runs several tool calls from one completion in order', async () => {
    const { llm, ctx } = setup([
      {
        toolCalls: [
          { id: 'a', name: 'search', arguments: '{}' },
          { id: 'b', name: 'clock', arguments: '{}' },
        ],
      },
      { text: ['ok'] },
    ]);
    const handlers = new Map<string, ToolHandler>([
      ['search', async () => 'x'],
      ['clock', async () => 'y'],
    ]);

    const events = await collectEvents(
      agentLoop(llm, ctx, [], handlers, { conversationId: 'c1', logger: silentLogger }),
    );

    expect(events.map((e) => e.kind)).toEqual([
      'tool_start', 'tool_end', 'tool_start', 'tool_end', 'token', 'done',
    ]);
  });

  it('turns a failing tool into an error observation and keeps going', async () => {
    const { provider, llm, ctx } = setup([
      { toolCalls: [searchCall] },
      { text: ['Search is down, but here is what I know.'] },
    ]);
    const handlers = new Map<string, ToolHandler>([
      ['search', async () => { throw new Error('boom'); }],
    ]);

    const events = await collectEvents(
      agentLoop(llm, ctx, [searchTool], handlers, { conversationId: 'c1', logger: silentLogger }),
    );

    expect(events[1]).toEqual({ kind: 'tool_end', toolName: 'search', ok: false });
    expect(events.at(-1)?.kind).toBe('done');
    expect(provider.requests[1]?.at(-1)).toEqual({
      role: 'tool',
      content: '{"error":"Tool search is unavailable: boom"}',
      toolCallId: 'tc1',
      isError: true,
    });
  });

  it('reports an unknown tool to the model as unavailable', async () => {
    const { provider, llm, ctx } = setup([
      { toolCalls: [{ id: 'x', name: 'missing', arguments: '{}' }] },
      { text: ['done'] },
    ]);

    await collectEvents(
      agentLoop(llm, ctx, [], new Map(), { conversationId: 'c1', logger: silentLogger }),
    );

    expect(provider.requests[1]?.at(-1)?.content).toBe(
      '{"error":"Tool missing is unavailable: Unknown tool: missing"}',
    );
  });

  it('stops at the iteration ceiling with a status and the incomplete note', async () => {
    const loopForever: ScriptedCompletion = { text: ['Checking.'], toolCalls: [searchCall] };
    const { provider, llm, ctx } = setup([loopForever, loopForever, loopForever, loopForever]);
    const handlers = new Map<string, ToolHandler>([['search', async () => 'nothing']]);

    const events = await collectEvents(
      agentLoop(llm, ctx, [searchTool], handlers, {
        conversationId: 'c1',
        logger: silentLogger,
        maxIterations: 2,
      }),
    );

    expect(provider.requests).toHaveLength(3);
    expect(events.filter((e) => e.kind === 'tool_start')).toHaveLength(2);
    expect(events.slice(-3)).toEqual([
      { kind: 'status', message: 'Stopped after 2 tool-call rounds.' },
      { kind: 'token', text: `\n\n${INCOMPLETE_NOTE}` },
      {
        kind: 'done',
        conversationId: 'c1',
        finalText: `Checking.Checking.Checking.\n\n${INCOMPLETE_NOTE}`,
      },
    ]);
  });

  it('emits a generic error when the model fails', async () => {
    const { llm, ctx } = setup([{ fail: new Error('HTTP 500 from upstream') }]);

    const events = await collectEvents(
      agentLoop(llm, ctx, [], new Map(), { conversationId: 'c1', logger: silentLogger }),
    );

    expect(events).toEqual([{ kind: 'error', message: MODEL_UNAVAILABLE_MESSAGE }]);
  });

  it('emits exactly one terminal event when the model fails mid-stream', async () => {
    const { llm, ctx } = setup([{ text: ['partial'], fail: new Error('reset') }]);

    const events = await collectEvents(
      agentLoop(llm, ctx, [], new Map(), { conversationId: 'c1', logger: silentLogger }),
    );

    expect(events).toEqual([
      { kind: 'token', text: 'partial' },
      { kind: 'error', message: MODEL_UNAVAILABLE_MESSAGE },
    ]);
    expect(events.filter(isTerminalEvent)).toHaveLength(1);
  });

  it('returns silently when the client aborts', async () => {
    const { llm, ctx } = setup([{ text: ['late'], delayMs: 5_000 }]);
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 10);

    const events = await collectEvents(
      agentLoop(llm, ctx, [], new Map(), {
        conversationId: 'c1',
        logger: silentLogger,
        signal: controller.signal,
      }),
    );

    expect(events).toEqual([]);
  });

  it('finishes with the incomplete note when the turn deadline passes during a tool call', async () => {
    const { llm, ctx } = setup([{ toolCalls: [searchCall] }]);
    const handlers = new Map<string, ToolHandler>([
      ['search', () => new Promise(() => {})],
    ]);

    const events = await collectEvents(
      agentLoop(llm, ctx, [searchTool], handlers, {
        conversationId: 'c1',
        logger: silentLogger,
        turnTimeoutMs: 30,
      }),
    );

    expect(events).toEqual([
      { kind: 'tool_start', toolName: 'search' },
      { kind: 'tool_end', toolName: 'search', ok: false },
      { kind: 'status', message: 'Stopped: the time limit for this turn was reached.' },
      { kind: 'token', text: INCOMPLETE_NOTE },
      { kind: 'done', conversationId: 'c1', finalText: INCOMPLETE_NOTE },
    ]);
  });
});
