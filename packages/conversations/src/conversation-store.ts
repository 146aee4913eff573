import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { ConversationSummary, StoredMessage, StoredRole } from '@parley/core';
import { ParleyError, StorageError, errorMessage, generateId, now } from '@parley/core';
import { ConversationAccessError } from './errors.js';
import {
  CREATE_CONVERSATIONS_TABLE,
  CREATE_GUARD_TRIGGERS,
  CREATE_INDEXES,
  CREATE_MESSAGES_TABLE,
  DEFAULT_TITLE,
  ENABLE_FOREIGN_KEYS,
  ENABLE_WAL,
  SET_BUSY_TIMEOUT,
  TITLE_MAX_CHARS,
} from './schema.js';
import type { AppendInput, ConversationStore, OwnerScopedStore } from './types.js';

interface MessageRow {
  seq: number;
  id: string;
  conversation_id: string;
  owner_id: string;
  role: StoredRole;
  content: string;
  created_at: string;
}

interface ConversationRow {
  id: string;
  owner_id: string;
  title: string | null;
  created_at: string;
  updated_at: string;
}

/** Conversation title derived from the first user message. */
export function titleFrom(content: string): string {
  const text = content.trim();
  // Counted in code points so a surrogate pair is never split.
  const chars = [...text];
  return chars.length > TITLE_MAX_CHARS ? `${chars.slice(0, TITLE_MAX_CHARS).join('')}...` : text;
}

function toMessage(row: MessageRow): StoredMessage {
  return {
    id: row.id,
    conversationId: row.conversation_id,
    ownerId: row.owner_id,
    role: row.role,
    content: row.content,
    createdAt: row.created_at,
    seq: row.seq,
  };
}

function toSummary(row: ConversationRow): ConversationSummary {
  return {
    id: row.id,
    title: row.title ?? DEFAULT_TITLE,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/** ConversationStore on a local SQLite file via better-sqlite3. */
export class SqliteConversationStore implements ConversationStore {
  private db: Database.Database | null = null;

  constructor(private readonly dbPath: string) {}

  open(): void {
    try {
      if (this.dbPath !== ':memory:') {
        mkdirSync(dirname(this.dbPath), { recursive: true });
      }
      const db = new Database(this.dbPath);
      db.exec(ENABLE_WAL);
      db.exec(SET_BUSY_TIMEOUT);
      db.exec(ENABLE_FOREIGN_KEYS);
      db.exec(CREATE_CONVERSATIONS_TABLE);
      db.exec(CREATE_MESSAGES_TABLE);
      db.exec(CREATE_INDEXES);
      db.exec(CREATE_GUARD_TRIGGERS);
      this.db = db;
    } catch (err) {
      throw new StorageError(`Failed to open database: ${this.dbPath}`, { cause: err });
    }
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  async append(input: AppendInput): Promise<StoredMessage> {
    return this.run('append', (db) => {
      const findConversation = db.prepare<[string], ConversationRow>('SELECT * FROM conversations WHERE id = ?');
      const latestMessage = db.prepare<[string], { created_at: string }>(
        'SELECT created_at FROM messages WHERE conversation_id = ? ORDER BY created_at DESC, seq DESC LIMIT 1',
      );
      const insertConversation = db.prepare<[string, string, string | null, string, string]>(
        'INSERT INTO conversations (id, owner_id, title, created_at, updated_at) VALUES (?, ?, ?, ?, ?)',
      );
      const touchConversation = db.prepare<[string, string | null, string]>(
        'UPDATE conversations SET updated_at = ?, title = COALESCE(title, ?) WHERE id = ?',
      );
      const insertMessage = db.prepare<[string, string, string, StoredRole, string, string]>(
        'INSERT INTO messages (id, conversation_id, owner_id, role, content, created_at) VALUES (?, ?, ?, ?, ?, ?)',
      );

      const transaction = db.transaction((item: AppendInput): StoredMessage => {
        const conversation = findConversation.get(item.conversationId);
        if (conversation && conversation.owner_id !== item.ownerId) {
          throw new ConversationAccessError(item.conversationId);
        }

        // Clock steps backwards must not reorder a conversation.
        const previous = latestMessage.get(item.conversationId)?.created_at;
        const current = now();
        const createdAt = previous !== undefined && previous > current ? previous : current;
        const title = item.role === 'user' ? titleFrom(item.content) : null;

        if (conversation) {
          touchConversation.run(createdAt, title, item.conversationId);
        } else {
          insertConversation.run(item.conversationId, item.ownerId, title, createdAt, createdAt);
        }

        const id = generateId();
        const info = insertMessage.run(id, item.conversationId, item.ownerId, item.role, item.content, createdAt);
        return {
          id,
          conversationId: item.conversationId,
          ownerId: item.ownerId,
          role: item.role,
          content: item.content,
          createdAt,
          seq: Number(info.lastInsertRowid),
        };
      });

      return transaction(input);
    });
  }

  async listMessages(ownerId: string, conversationId: string): Promise<StoredMessage[]> {
    return this.run('listMessages', (db) =>
      db
        .prepare<[string, string], MessageRow>(
          `SELECT seq, id, conversation_id, owner_id, role, content, created_at
           FROM messages
           WHERE owner_id = ? AND conversation_id = ?
           ORDER BY created_at ASC, seq ASC`,
        )
        .all(ownerId, conversationId)
        .map(toMessage),
    );
  }

  async listConversations(ownerId: string): Promise<ConversationSummary[]> {
    return this.run('listConversations', (db) =>
      db
        .prepare<[string], ConversationRow>(
          `SELECT id, owner_id, title, created_at, updated_at
           FROM conversations
           WHERE owner_id = ?
           ORDER BY updated_at DESC, rowid DESC`,
        )
        .all(ownerId)
        .map(toSummary),
    );
  }

  forOwner(ownerId: string): OwnerScopedStore {
    return {
      ownerId,
      append: (input) => this.append({ ...input, ownerId }),
      listMessages: (conversationId) => this.listMessages(ownerId, conversationId),
      listConversations: () => this.listConversations(ownerId),
    };
  }

  async ping(): Promise<boolean> {
    if (!this.db) return false;
    try {
      this.db.prepare('SELECT 1').get();
      return true;
    } catch {
      return false;
    }
  }

  /** Runs `fn` against the open database; driver failures become StorageError. */
  private run<T>(operation: string, fn: (db: Database.Database) => T): T {
    const db = this.db;
    if (!db) {
      throw new StorageError(`Conversation store is not open (${operation})`);
    }
    try {
      return fn(db);
    } catch (err) {
      if (err instanceof ParleyError) throw err;
      throw new StorageError(`${operation} failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
