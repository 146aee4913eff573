import type {
  CompletionOptions,
  LLMProvider,
  Message,
  StreamChunk,
  ToolDefinition,
} from '@parley/core';
import { ModelProviderError, isRecord } from '@parley/core';
import { stream } from '@mariozechner/pi-ai';
import type {
  Api,
  AssistantMessage as PiAssistantMessage,
  Context as PiContext,
  Model,
  Tool as PiTool,
  ToolCall as PiToolCall,
  UserMessage as PiUserMessage,
  ToolResultMessage as PiToolResultMessage,
} from '@mariozechner/pi-ai';
import type { TSchema } from '@mariozechner/pi-ai';

type PiMessage = PiUserMessage | PiAssistantMessage | PiToolResultMessage;

export interface PiMonoProviderOptions {
  model: Model<Api>;
  id?: string;
  /** Passed to pi-ai on every request; pi-ai reads its own env vars when omitted. */
  apiKey?: string;
}

/**
 * LLMProvider wrapping pi-ai's `stream()` function.
 * Converts between parley message/chunk types and pi-ai types.
 */
export class PiMonoProvider implements LLMProvider {
  readonly id: string;

  private readonly model: Model<Api>;
  private readonly apiKey: string | undefined;

  constructor(options: PiMonoProviderOptions) {
    this.model = options.model;
    this.apiKey = options.apiKey;
    this.id = options.id ?? `${options.model.provider}/${options.model.id}`;
  }

  async *streamCompletion(
    messages: Message[],
    tools: ToolDefinition[],
    options: CompletionOptions,
  ): AsyncIterable<StreamChunk> {
    const context = this.buildContext(messages, tools);

    const eventStream = stream(this.model, context, {
      temperature: options.temperature,
      maxTokens: options.maxTokens,
      signal: options.signal,
      apiKey: this.apiKey,
    });

    for await (const event of eventStream) {
      if (event.type === 'text_delta') {
        yield { type: 'text_delta', text: event.delta };
      } else if (event.type === 'toolcall_end') {
        yield {
          type: 'tool_call_delta',
          toolCall: {
            id: event.toolCall.id,
            name: event.toolCall.name,
            arguments: JSON.stringify(event.toolCall.arguments),
          },
        };
      } else if (event.type === 'done') {
        yield {
          type: 'usage',
          usage: {
            inputTokens: event.message.usage.input,
            outputTokens: event.message.usage.output,
          },
        };
        yield {
          type: 'done',
          finishReason: mapStopReason(event.reason),
        };
      } else if (event.type === 'error') {
        options.signal?.throwIfAborted();
        throw new ModelProviderError(`Model ${this.id} stream failed`, { cause: event });
      }
      // Ignore: start, text_start, text_end, thinking_*, toolcall_start, toolcall_delta
    }
  }

  /** Convert parley messages + tools into a pi-ai Context. */
  private buildContext(messages: Message[], tools: ToolDefinition[]): PiContext {
    let systemPrompt: string | undefined;
    const piMessages: PiMessage[] = [];

    for (const msg of messages) {
      if (msg.role === 'system') {
        systemPrompt = msg.content;
      } else if (msg.role === 'user') {
        piMessages.push({
          role: 'user',
          content: [{ type: 'text', text: msg.content }],
          timestamp: Date.now(),
        });
      } else if (msg.role === 'assistant') {
        piMessages.push(this.convertAssistantMessage(msg));
      } else if (msg.role === 'tool') {
        piMessages.push(convertToolResultMessage(msg, piMessages));
      }
    }

    const piTools: PiTool[] | undefined =
      tools.length > 0
        ? tools.map((t) => ({
            name: t.name,
            description: t.description,
            parameters: t.inputSchema as TSchema,
          }))
        : undefined;

    return { systemPrompt, messages: piMessages, tools: piTools };
  }

  private convertAssistantMessage(msg: Message): PiAssistantMessage {
    const content: ({ type: 'text'; text: string } | PiToolCall)[] = [];

    if (msg.content) {
      content.push({ type: 'text', text: msg.content });
    }

    for (const tc of msg.toolCalls ?? []) {
      content.push({
        type: 'toolCall',
        id: tc.id,
        name: tc.name,
        arguments: parseArguments(tc.arguments),
      });
    }

    return {
      role: 'assistant',
      content,
      api: this.model.api,
      provider: this.model.provider,
      model: this.model.id,
      usage: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0, totalTokens: 0, cost: { input: 0, output: 0, cacheRead: 0, cacheWrite: 0, total: 0 } },
      stopReason: 'toolUse',
      timestamp: Date.now(),
    };
  }
}

/** Tool results carry the tool name, looked up from the latest assistant turn. */
function convertToolResultMessage(msg: Message, preceding: PiMessage[]): PiToolResultMessage {
  let toolName = 'unknown';
  const lastAssistant = [...preceding].reverse().find((m) => m.role === 'assistant');
  if (lastAssistant && lastAssistant.role === 'assistant' && msg.toolCallId) {
    for (const block of lastAssistant.content) {
      if (block.type === 'toolCall' && block.id === msg.toolCallId) {
        toolName = block.name;
        break;
      }
    }
  }

  return {
    role: 'toolResult',
    toolCallId: msg.toolCallId ?? '',
    toolName,
    content: [{ type: 'text', text: msg.content }],
    isError: msg.isError ?? false,
    timestamp: Date.now(),
  };
}

function mapStopReason(reason: string): string {
  switch (reason) {
    case 'toolUse':
      return 'tool_calls';
    default:
      return reason;
  }
}

function parseArguments(str: string): Record<string, unknown> {
  try {
    const parsed: unknown = JSON.parse(str);
    return isRecord(parsed) ? parsed : {};
  } catch {
    return {};
  }
}
