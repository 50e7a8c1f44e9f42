import Database from 'better-sqlite3';
import { Conversation, HistoryBlob, StoredMessage } from '../types';
import { HistoryBlobSchema } from '../schemas';
import { debugLogger } from './debug-logger';

/**
 * Storage contract for one user's serialized history
 */
export interface HistoryBackend {
  readonly kind: 'memory' | 'sqlite';
  get(userKey: string): Promise<HistoryBlob | null>;
  put(userKey: string, blob: HistoryBlob): Promise<void>;
}

export class MemoryHistoryBackend implements HistoryBackend {
  readonly kind = 'memory';
  private readonly users = new Map<string, string>();

  async get(userKey: string): Promise<HistoryBlob | null> {
    const raw = this.users.get(userKey);
    return raw === undefined ? null : parseBlob(userKey, raw);
  }

  async put(userKey: string, blob: HistoryBlob): Promise<void> {
    // Stored serialized so callers never share references with the store
    this.users.set(userKey, JSON.stringify(blob));
  }
}

export class SqliteHistoryBackend implements HistoryBackend {
  readonly kind = 'sqlite';
  private readonly db: Database.Database;

  constructor(path: string) {
    this.db = new Database(path);
    if (path !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS users (
        email TEXT PRIMARY KEY,
        chat_history TEXT NOT NULL DEFAULT '[]',
        created_at TEXT NOT NULL
      )
    `);
    console.log(`📚 History database ready at ${path}`);
  }

  async get(userKey: string): Promise<HistoryBlob | null> {
    const row: unknown = this.db.prepare('SELECT chat_history FROM users WHERE email = ?').get(userKey);
    if (!isHistoryRow(row)) {
      return null;
    }
    return parseBlob(userKey, row.chat_history);
  }

  async put(userKey: string, blob: HistoryBlob): Promise<void> {
    this.db
      .prepare(
        `INSERT INTO users (email, chat_history, created_at) VALUES (?, ?, ?)
         ON CONFLICT(email) DO UPDATE SET chat_history = excluded.chat_history`
      )
      .run(userKey, JSON.stringify(blob), new Date().toISOString());
  }

  close(): void {
    this.db.close();
  }
}

function isHistoryRow(row: unknown): row is { chat_history: string } {
  return typeof row === 'object' && row !== null && 'chat_history' in row && typeof row.chat_history === 'string';
}

function parseBlob(userKey: string, raw: string): HistoryBlob {
  try {
    const parsed = HistoryBlobSchema.safeParse(JSON.parse(raw));
    if (parsed.success) {
      return parsed.data;
    }
    console.warn(`⚠️  Malformed history for ${userKey}, treating as empty:`, parsed.error.issues[0]?.message);
  } catch (error) {
    console.warn(`⚠️  Unreadable history for ${userKey}, treating as empty:`, error instanceof Error ? error.message : error);
  }
  return [];
}

/**
 * Named conversations per user, persisted through a HistoryBackend.
 *
 * Appends for the same user run one after another, so two turns landing at
 * once both end up in the blob.
 */
export class HistoryStore {
  private readonly queues = new Map<string, Promise<void>>();

  constructor(
    private readonly backend: HistoryBackend,
    private readonly now: () => Date = () => new Date()
  ) {}

  get backendKind(): HistoryBackend['kind'] {
    return this.backend.kind;
  }

  append(userKey: string, conversationName: string, sender: string, text: string): Promise<void> {
    const message: StoredMessage = { sender, text, timestamp: this.now().toISOString() };
    return this.enqueue(userKey, async () => {
      const stepId = debugLogger.stepStart('HISTORY', 'Appending message', { userKey, conversationName, sender });
      const blob = (await this.backend.get(userKey)) ?? [];

      const existing = blob.find(entry => Object.prototype.hasOwnProperty.call(entry, conversationName));
      if (existing) {
        existing[conversationName] = [...existing[conversationName], message];
      } else {
        blob.push({ [conversationName]: [message] });
      }

      await this.backend.put(userKey, blob);
      debugLogger.stepFinish(stepId, { conversations: blob.length });
    });
  }

  async fetch(userKey: string): Promise<Conversation[]> {
    await this.settled(userKey);
    const blob = (await this.backend.get(userKey)) ?? [];
    return blob.flatMap(entry => Object.entries(entry).map(([name, messages]) => ({ name, messages })));
  }

  async getConversation(userKey: string, conversationName: string): Promise<Conversation | null> {
    const conversations = await this.fetch(userKey);
    return conversations.find(c => c.name === conversationName) ?? null;
  }

  /**
   * Latest messages across all of a user's conversations, newest first.
   * Messages from `excludeSender` (the assistant) are skipped.
   */
  async recentMessages(userKey: string, options: { excludeSender?: string; limit: number }): Promise<StoredMessage[]> {
    const conversations = await this.fetch(userKey);
    return conversations
      .flatMap(conversation => conversation.messages)
      .filter(message => message.sender !== options.excludeSender)
      .map((message, index) => ({ message, index }))
      .sort((a, b) => b.message.timestamp.localeCompare(a.message.timestamp) || b.index - a.index)
      .slice(0, options.limit)
      .map(entry => entry.message);
  }

  /**
   * Name of the conversation that received the most recent message
   */
  async lastConversationName(userKey: string): Promise<string | null> {
    const conversations = await this.fetch(userKey);
    let latest: { name: string; timestamp: string } | null = null;
    for (const conversation of conversations) {
      const last = conversation.messages[conversation.messages.length - 1];
      if (last && (latest === null || last.timestamp >= latest.timestamp)) {
        latest = { name: conversation.name, timestamp: last.timestamp };
      }
    }
    return latest?.name ?? null;
  }

  private enqueue(userKey: string, task: () => Promise<void>): Promise<void> {
    const previous = this.queues.get(userKey) ?? Promise.resolve();
    const run = previous.then(task);
    // The chain itself must never reject, or every later append would fail
    const tail = run.catch((error: unknown) => {
      console.error(`❌ History write failed for ${userKey}:`, error instanceof Error ? error.message : error);
    });
    this.queues.set(userKey, tail);
    void tail.then(() => {
      if (this.queues.get(userKey) === tail) {
        this.queues.delete(userKey);
      }
    });
    return run;
  }

  private async settled(userKey: string): Promise<void> {
    await this.queues.get(userKey);
  }
}

export function createHistoryBackend(kind: 'memory' | 'sqlite', sqlitePath: string): HistoryBackend {
  return kind === 'sqlite' ? new SqliteHistoryBackend(sqlitePath) : new MemoryHistoryBackend();
}
