/** SQL DDL for the conversation store. */

export const CREATE_CONVERSATIONS_TABLE = `
CREATE TABLE IF NOT EXISTS conversations (
  id TEXT PRIMARY KEY,
  owner_id TEXT NOT NULL,
  title TEXT,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
`;

export const CREATE_MESSAGES_TABLE = `
CREATE TABLE IF NOT EXISTS messages (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  id TEXT NOT NULL UNIQUE,
  conversation_id TEXT NOT NULL REFERENCES conversations(id),
  owner_id TEXT NOT NULL,
  role TEXT NOT NULL,
  content TEXT NOT NULL,
  created_at TEXT NOT NULL,
  CHECK (role IN ('user', 'assistant', 'system'))
);
`;

export const CREATE_INDEXES = `
CREATE INDEX IF NOT EXISTS idx_messages_owner_conversation
  ON messages(owner_id, conversation_id, created_at, seq);
CREATE INDEX IF NOT EXISTS idx_conversations_owner_updated
  ON conversations(owner_id, updated_at);
`;

/** Messages are append-only, and only a conversation's owner may add to it. */
export const CREATE_GUARD_TRIGGERS = `
CREATE TRIGGER IF NOT EXISTS messages_append_only BEFORE UPDATE ON messages
BEGIN
  SELECT RAISE(ABORT, 'messages are append-only');
END;

CREATE TRIGGER IF NOT EXISTS messages_owner_match BEFORE INSERT ON messages
WHEN (SELECT owner_id FROM conversations WHERE id = NEW.conversation_id) IS NOT NEW.owner_id
BEGIN
  SELECT RAISE(ABORT, 'conversation owner mismatch');
END;
`;

export const ENABLE_WAL = 'PRAGMA journal_mode=WAL;';
export const SET_BUSY_TIMEOUT = 'PRAGMA busy_timeout=5000;';
export const ENABLE_FOREIGN_KEYS = 'PRAGMA foreign_keys=ON;';

/** Title shown until the conversation has a user message. */
export const DEFAULT_TITLE = 'New Chat';
export const TITLE_MAX_CHARS = 60;
