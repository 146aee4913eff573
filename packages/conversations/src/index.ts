export type { AppendInput, ConversationStore, OwnerScopedStore } from './types.js';
export { ConversationAccessError } from './errors.js';
export { SqliteConversationStore, titleFrom } from './conversation-store.js';
export { DEFAULT_TITLE, TITLE_MAX_CHARS } from './schema.js';
