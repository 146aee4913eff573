import type { Message, ToolCall } from '@parley/core';

/**
 * Working message list for one turn: system prompt, bounded prior history,
 * the new user message, and whatever the loop appends while reasoning.
 */
export class ConversationContext {
  readonly conversationId: string;
  private readonly messages: Message[];

  constructor(params: {
    conversationId: string;
    systemPrompt: string;
    history?: Message[];
    /** Prior history is cut to this many user-led exchanges. */
    maxHistoryExchanges?: number;
  }) {
    this.conversationId = params.conversationId;
    const history = (params.history ?? []).filter((m) => m.role !== 'system');
    const bounded =
      params.maxHistoryExchanges === undefined
        ? history
        : lastExchanges(history, params.maxHistoryExchanges);
    this.messages = [{ role: 'system', content: params.systemPrompt }, ...bounded];
  }

  addUserMessage(content: string): void {
    this.messages.push({ role: 'user', content });
  }

  addAssistantMessage(content: string, toolCalls?: ToolCall[]): void {
    this.messages.push(toolCalls?.length ? { role: 'assistant', content, toolCalls } : { role: 'assistant', content });
  }

  addToolResult(toolCallId: string, content: string, isError = false): void {
    this.messages.push({ role: 'tool', content, toolCallId, isError });
  }

  getMessages(): Message[] {
    return [...this.messages];
  }

  getHistory(): Message[] {
    return this.messages.filter((m) => m.role !== 'system');
  }
}

/**
 * Keeps the trailing `count` exchanges. An exchange starts at a user message
 * and runs until the next one; leading non-user messages are dropped.
 */
export function lastExchanges(messages: Message[], count: number): Message[] {
  if (count <= 0) return [];
  const groups: Message[][] = [];
  let i = messages.length - 1;
  while (i >= 0 && groups.length < count) {
    const group: Message[] = [];
    for (let msg = messages[i]; msg && msg.role !== 'user'; msg = messages[--i]) {
      group.unshift(msg);
    }
    const user = messages[i];
    if (!user) break;
    group.unshift(user);
    i--;
    groups.unshift(group);
  }
  return groups.flat();
}
