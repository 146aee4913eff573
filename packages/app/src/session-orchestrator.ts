import type {
  AgentConfig,
  AgentEvent,
  ConversationSummary,
  Logger,
  Message,
  ModelsConfig,
  Principal,
  StoredMessage,
} from '@parley/core';
import { StorageError, errorMessage, generateId } from '@parley/core';
import type { LLMService } from '@parley/agent-runtime';
import { ConversationContext, agentLoop, buildSystemPrompt } from '@parley/agent-runtime';
import type { ConversationStore, OwnerScopedStore } from '@parley/conversations';
import { ConversationAccessError } from '@parley/conversations';
import type { ChatService, TurnContext, TurnRequest } from '@parley/gateway';
import type { ResolvedToolset, ToolResolver } from '@parley/tools';

export const SAVE_FAILED_MESSAGE = 'Your message could not be saved. Please try again.';
export const CONVERSATION_NOT_FOUND_MESSAGE = 'Conversation not found.';

export interface SessionOrchestratorOptions {
  store: ConversationStore;
  llm: LLMService;
  tools: ToolResolver;
  agent: AgentConfig;
  models: Pick<ModelsConfig, 'temperature' | 'maxTokens'>;
  logger: Logger;
}

function toContextMessage(message: StoredMessage): Message {
  return { role: message.role, content: message.content };
}

/**
 * Runs one chat turn end to end: saves the user's message, replays the
 * conversation to the agent loop with the caller's tools, and saves the
 * answer once the loop finishes.
 */
export class SessionOrchestrator implements ChatService {
  private readonly log: Logger;

  constructor(private readonly options: SessionOrchestratorOptions) {
    this.log = options.logger.child({ component: 'session' });
  }

  async *handleTurn(principal: Principal, request: TurnRequest, ctx: TurnContext): AsyncGenerator<AgentEvent> {
    const conversationId = request.conversationId ?? generateId();
    const log = this.log.child({ requestId: ctx.requestId, principalId: principal.principalId, conversationId });
    const store = this.options.store.forOwner(principal.principalId);

    const history = await this.saveUserMessage(store, conversationId, request.message, log);
    if (typeof history === 'string') {
      yield { kind: 'error', message: history };
      return;
    }
    if (ctx.signal.aborted) return;

    let toolset: ResolvedToolset;
    try {
      toolset = await this.options.tools.resolve(principal.credential, ctx.signal);
    } catch (err) {
      if (ctx.signal.aborted) return;
      throw err;
    }
    if (toolset.degraded && toolset.notice) {
      yield { kind: 'status', message: toolset.notice };
    }

    const definitions = toolset.registry.getDefinitions();
    const context = new ConversationContext({
      conversationId,
      systemPrompt: buildSystemPrompt(definitions),
      history: history.map(toContextMessage),
      maxHistoryExchanges: this.options.agent.maxHistoryExchanges,
    });
    context.addUserMessage(request.message);
    log.debug({ historyLength: history.length, tools: definitions.map((t) => t.name) }, 'turn started');

    const { agent, models } = this.options;
    const events = agentLoop(this.options.llm, context, definitions, toolset.registry.buildHandlerMap(), {
      conversationId,
      logger: log,
      signal: ctx.signal,
      maxIterations: agent.maxIterations,
      toolTimeoutMs: agent.toolTimeoutMs,
      turnTimeoutMs: agent.turnTimeoutMs,
      maxToolOutputChars: agent.maxToolOutputChars,
      completion: { temperature: models.temperature, maxTokens: models.maxTokens },
    });

    for await (const event of events) {
      if (event.kind === 'done') {
        try {
          await store.append({ conversationId, role: 'assistant', content: event.finalText });
        } catch (err) {
          log.error({ err: errorMessage(err) }, 'failed to save assistant message');
          yield { kind: 'error', message: SAVE_FAILED_MESSAGE };
          return;
        }
        log.info('turn completed');
      }
      yield event;
    }
  }

  async listConversations(principal: Principal, requestId: string): Promise<ConversationSummary[]> {
    this.log.debug({ requestId, principalId: principal.principalId }, 'listing conversations');
    return this.options.store.forOwner(principal.principalId).listConversations();
  }

  async listMessages(principal: Principal, conversationId: string, requestId: string): Promise<StoredMessage[]> {
    this.log.debug({ requestId, principalId: principal.principalId, conversationId }, 'listing messages');
    return this.options.store.forOwner(principal.principalId).listMessages(conversationId);
  }

  /** Prior messages on success, or the client-facing error message. */
  private async saveUserMessage(
    store: OwnerScopedStore,
    conversationId: string,
    content: string,
    log: Logger,
  ): Promise<StoredMessage[] | string> {
    try {
      const saved = await store.append({ conversationId, role: 'user', content });
      const messages = await store.listMessages(conversationId);
      return messages.filter((m) => m.id !== saved.id);
    } catch (err) {
      if (err instanceof ConversationAccessError) {
        log.warn('message sent to a conversation owned by someone else');
        return CONVERSATION_NOT_FOUND_MESSAGE;
      }
      if (err instanceof StorageError) {
        log.error({ err: errorMessage(err) }, 'failed to save user message');
        return SAVE_FAILED_MESSAGE;
      }
      throw err;
    }
  }
}
