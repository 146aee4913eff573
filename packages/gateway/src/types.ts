import type {
  AgentEvent,
  ConversationSummary,
  Logger,
  Principal,
  ServerConfig,
  StoredMessage,
} from '@parley/core';
import type { CredentialGate } from './credential-gate.js';

/** A validated `POST /chat/send` body. */
export interface TurnRequest {
  conversationId: string | null;
  message: string;
}

export interface TurnContext {
  requestId: string;
  /** Aborted when the client disconnects. */
  signal: AbortSignal;
}

/** What the HTTP layer needs from the application. */
export interface ChatService {
  /** Yields the turn's events; the last one is `done` or `error` unless `signal` aborted. */
  handleTurn(principal: Principal, request: TurnRequest, ctx: TurnContext): AsyncIterable<AgentEvent>;
  listConversations(principal: Principal, requestId: string): Promise<ConversationSummary[]>;
  listMessages(principal: Principal, conversationId: string, requestId: string): Promise<StoredMessage[]>;
}

/** Verifies a bearer token with the identity provider. */
export interface AuthProvider {
  /** Resolves null for a rejected token; rejects when the provider cannot answer. */
  verify(token: string, signal: AbortSignal): Promise<{ principalId: string } | null>;
}

export interface HealthStatus {
  status: 'ok' | 'degraded';
  storage: boolean;
  uptime: number;
}

export interface GatewayOptions {
  server: ServerConfig;
  gate: CredentialGate;
  chat: ChatService;
  isStorageReady: () => Promise<boolean>;
  logger: Logger;
}
