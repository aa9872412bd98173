// Conversation sessions
// One row per session; the message list is stored as JSON and rewritten on every exchange

import { desc, eq } from 'drizzle-orm';
import { randomUUID } from 'crypto';
import { schema, type Db } from '../../db/index.js';
import type { StoredSessionCommand, StoredSessionMessage } from '../../db/schema.js';
import type { ExecutionRecord, Turn } from '../orchestrator/types.js';

const TITLE_MAX_CHARS = 30;

export interface Session {
  id: string;
  title: string;
  messages: StoredSessionMessage[];
  createdAt: string;
  updatedAt: string;
}

export interface SessionSummary {
  id: string;
  title: string;
  updatedAt: string;
  messageCount: number;
}

export function sessionTitle(instruction: string): string {
  const text = instruction.trim().replace(/\s+/g, ' ');
  const chars = Array.from(text);
  if (chars.length <= TITLE_MAX_CHARS) return text;
  return `${chars.slice(0, TITLE_MAX_CHARS).join('')}…`;
}

export function toStoredCommands(records: ExecutionRecord[]): StoredSessionCommand[] {
  return records.map(record => ({
    asset_name: record.assetName,
    command: record.command,
    result: record.result,
    timestamp: record.timestamp,
  }));
}

/** Prior turns for the loop. Commands run earlier are noted on the assistant turn that reported them. */
export function historyFromSession(messages: StoredSessionMessage[]): Turn[] {
  return messages.map((message): Turn => {
    if (message.role === 'user') {
      return { role: 'user', content: message.content };
    }
    const commands = message.commands ?? [];
    if (commands.length === 0) {
      return { role: 'assistant', content: message.content };
    }
    const ran = commands.map(c => `- [${c.asset_name}] ${c.command}`).join('\n');
    return { role: 'assistant', content: `${message.content}\n\nCommands run for this answer:\n${ran}` };
  });
}

export class SessionStore {
  constructor(private db: Db) {}

  async get(id: string): Promise<Session | undefined> {
    const row = this.db.select().from(schema.sessions).where(eq(schema.sessions.id, id)).get();
    if (!row) return undefined;
    return {
      id: row.id,
      title: row.title,
      messages: row.messages,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
  }

  async list(limit: number = 100): Promise<SessionSummary[]> {
    const rows = this.db
      .select()
      .from(schema.sessions)
      .orderBy(desc(schema.sessions.updatedAt))
      .limit(limit)
      .all();

    return rows.map(row => ({
      id: row.id,
      title: row.title,
      updatedAt: row.updatedAt,
      messageCount: row.messages.length,
    }));
  }

  async save(id: string, title: string, messages: StoredSessionMessage[]): Promise<Session> {
    const now = new Date().toISOString();
    this.db
      .insert(schema.sessions)
      .values({ id, title, messages, createdAt: now, updatedAt: now })
      .onConflictDoUpdate({
        target: schema.sessions.id,
        set: { title, messages, updatedAt: now },
      })
      .run();

    const saved = await this.get(id);
    if (!saved) {
      throw new Error(`Session ${id} was not persisted`);
    }
    return saved;
  }

  /**
   * Append one instruction and its reply, creating the session when it does
   * not exist yet.
   */
  async appendExchange(
    sessionId: string | undefined,
    instruction: string,
    reply: string,
    commands: ExecutionRecord[],
  ): Promise<Session> {
    const id = sessionId || randomUUID();
    const existing = await this.get(id);
    const messages: StoredSessionMessage[] = existing ? [...existing.messages] : [];

    messages.push({ role: 'user', content: instruction });
    const answer: StoredSessionMessage = { role: 'assistant', content: reply };
    if (commands.length > 0) answer.commands = toStoredCommands(commands);
    messages.push(answer);

    return this.save(id, existing?.title ?? sessionTitle(instruction), messages);
  }

  async delete(id: string): Promise<boolean> {
    const result = this.db.delete(schema.sessions).where(eq(schema.sessions.id, id)).run();
    return result.changes > 0;
  }
}
