/** Role of a turn inside the model context. */
export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

/** A single turn in the model context. */
export interface Message {
  role: MessageRole;
  content: string;
  toolCallId?: string;
  toolCalls?: ToolCall[];
  /** Set on tool-result turns whose call failed. */
  isError?: boolean;
}

export interface ToolCall {
  id: string;
  name: string;
  arguments: string;
}

/** Roles that may be persisted to the conversation store. */
export type StoredRole = 'user' | 'assistant' | 'system';

/** A persisted conversation message. Immutable once written. */
export interface StoredMessage {
  id: string;
  conversationId: string;
  ownerId: string;
  role: StoredRole;
  content: string;
  /** RFC 3339, monotonic within a conversation. */
  createdAt: string;
  /** Insertion sequence; breaks ties between equal `createdAt` values. */
  seq: number;
}

export interface ConversationSummary {
  id: string;
  title: string;
  createdAt: string;
  updatedAt: string;
}
