import type { ConversationSummary, StoredMessage, StoredRole } from '@parley/core';

export interface AppendInput {
  ownerId: string;
  conversationId: string;
  role: StoredRole;
  content: string;
}

/**
 * Append-only message log partitioned by owner and conversation. Async so a
 * network-backed store can stand in for the SQLite one.
 */
export interface ConversationStore {
  append(input: AppendInput): Promise<StoredMessage>;
  /** Messages in creation order; empty for unknown or foreign conversations. */
  listMessages(ownerId: string, conversationId: string): Promise<StoredMessage[]>;
  /** Most recently updated first. */
  listConversations(ownerId: string): Promise<ConversationSummary[]>;
  forOwner(ownerId: string): OwnerScopedStore;
  /** Cheap liveness probe for readiness checks. */
  ping(): Promise<boolean>;
  close(): void;
}

/** A store bound to one principal. Code above the store only sees these. */
export interface OwnerScopedStore {
  readonly ownerId: string;
  append(input: Omit<AppendInput, 'ownerId'>): Promise<StoredMessage>;
  listMessages(conversationId: string): Promise<StoredMessage[]>;
  listConversations(): Promise<ConversationSummary[]>;
}
