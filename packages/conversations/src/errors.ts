import { ParleyError } from '@parley/core';

/** The conversation exists but belongs to another principal. */
export class ConversationAccessError extends ParleyError {
  readonly code = 'NOT_FOUND';

  constructor(public readonly conversationId: string) {
    super(`Conversation not found: ${conversationId}`);
  }
}
