import { describe, it, expect } from 'vitest';
import type { Message } from '@parley/core';
import { ConversationContext, lastExchanges } from '../src/conversation-context.js';

const history: Message[] = [
  { role: 'user', content: 'q1' },
  { role: 'assistant', content: 'a1' },
  { role: 'user', content: 'q2' },
  { role: 'assistant', content: 'a2' },
  { role: 'user', content: 'q3' },
  { role: 'assistant', content: 'a3' },
];

describe('ConversationContext', () => {
  it('starts with the system prompt', () => {
    const ctx = new ConversationContext({ conversationId: 'c1', systemPrompt: 'You are helpful.' });

    expect(ctx.getMessages()).toEqual([{ role: 'system', content: 'You are helpful.' }]);
    expect(ctx.conversationId).toBe('c1');
  });

  it('places prior history after the system prompt and drops stray system messages', () => {
    const ctx = new ConversationContext({
      conversationId: 'c1',
      systemPrompt: 'sys',
      history: [{ role: 'system', content: 'old' }, ...history.slice(0, 2)],
    });

    expect(ctx.getMessages()).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'q1' },
      { role: 'assistant', content: 'a1' },
    ]);
  });

  it('bounds prior history to the last exchanges', () => {
    const ctx = new ConversationContext({
      conversationId: 'c1',
      systemPrompt: 'sys',
      history,
      maxHistoryExchanges: 2,
    });
    ctx.addUserMessage('q4');

    expect(ctx.getHistory().map((m) => m.content)).toEqual(['q2', 'a2', 'q3', 'a3', 'q4']);
  });

  it('records assistant tool calls and tool results', () => {
    const ctx = new ConversationContext({ conversationId: 'c1', systemPrompt: 'sys' });
    ctx.addAssistantMessage('', [{ id: 't1', name: 'search', arguments: '{}' }]);
    ctx.addToolResult('t1', 'result');
    ctx.addAssistantMessage('final', []);

    expect(ctx.getHistory()).toEqual([
      { role: 'assistant', content: '', toolCalls: [{ id: 't1', name: 'search', arguments: '{}' }] },
      { role: 'tool', content: 'result', toolCallId: 't1', isError: false },
      { role: 'assistant', content: 'final' },
    ]);
  });

  it('returns copies of its message list', () => {
    const ctx = new ConversationContext({ conversationId: 'c1', systemPrompt: 'sys' });
    ctx.getMessages().push({ role: 'user', content: 'sneaky' });
    expect(ctx.getMessages()).toHaveLength(1);
  });
});

describe('lastExchanges', () => {
  it('keeps the trailing exchanges including tool turns', () => {
    const messages: Message[] = [
      { role: 'user', content: 'q1' },
      { role: 'assistant', content: 'a1' },
      { role: 'user', content: 'q2' },
      { role: 'assistant', content: '', toolCalls: [{ id: 't', name: 'x', arguments: '{}' }] },
      { role: 'tool', content: 'r', toolCallId: 't' },
      { role: 'assistant', content: 'a2' },
    ];

    expect(lastExchanges(messages, 1).map((m) => m.content)).toEqual(['q2', '', 'r', 'a2']);
  });

  it('drops messages before the first user message', () => {
    const messages: Message[] = [{ role: 'assistant', content: 'orphan' }, ...history.slice(0, 2)];
    expect(lastExchanges(messages, 5).map((m) => m.content)).toEqual(['q1', 'a1']);
  });

  it('returns nothing for a non-positive count', () => {
    expect(lastExchanges(history, 0)).toEqual([]);
  });
});
