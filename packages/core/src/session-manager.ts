import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import {
  type ChatSession,
  type SessionMessage,
  type SessionListEntry,
  DEFAULT_SESSIONS_DIR,
  chatSessionSchema,
  generateId,
  isoNow,
} from '@costwise/shared';

export function newSession(): ChatSession {
  const now = isoNow();
  return {
    id: generateId('session'),
    createdAt: now,
    updatedAt: now,
    messages: [],
    metadata: {
      messageCount: 0,
      toolCallCount: 0,
      interruptionCount: 0,
    },
  };
}

/** Returns a copy of the session with the message appended. */
export function withMessage(session: ChatSession, message: SessionMessage): ChatSession {
  const completedCalls = message.toolLog?.filter(r => r.status === 'completed').length ?? 0;
  return {
    ...session,
    updatedAt: message.timestamp,
    messages: [...session.messages, message],
    metadata: {
      ...session.metadata,
      messageCount: session.metadata.messageCount + (message.role === 'user' ? 1 : 0),
      toolCallCount: session.metadata.toolCallCount + completedCalls,
    },
  };
}

export class SessionManager {
  private sessionsDir: string;

  constructor(baseDir?: string) {
    this.sessionsDir = baseDir ?? path.join(process.cwd(), DEFAULT_SESSIONS_DIR);
  }

  getDirectory(): string {
    return this.sessionsDir;
  }

  async ensureDir(): Promise<void> {
    await fs.mkdir(this.sessionsDir, { recursive: true });
  }

  async create(): Promise<ChatSession> {
    const session = newSession();
    await this.save(session);
    return session;
  }

  /** Null when the file is missing or does not hold a valid session. */
  async load(id: string): Promise<ChatSession | null> {
    let content: string;
    try {
      content = await fs.readFile(this.sessionPath(id), 'utf-8');
    } catch {
      return null;
    }
    return this.parse(content);
  }

  async save(session: ChatSession): Promise<void> {
    await this.ensureDir();
    await fs.writeFile(this.sessionPath(session.id), JSON.stringify(session, null, 2), 'utf-8');
  }

  async list(): Promise<SessionListEntry[]> {
    await this.ensureDir();

    const files = await fs.readdir(this.sessionsDir);
    const entries: SessionListEntry[] = [];

    for (const file of files) {
      if (!file.endsWith('.json')) continue;

      const content = await fs.readFile(path.join(this.sessionsDir, file), 'utf-8');
      const session = this.parse(content);
      // Corrupt files are left alone and not listed
      if (!session) continue;

      const first = session.messages.find(m => m.role === 'user');
      entries.push({
        id: session.id,
        createdAt: session.createdAt,
        updatedAt: session.updatedAt,
        messageCount: session.metadata.messageCount,
        preview: first ? first.content.slice(0, 80) : '(empty session)',
      });
    }

    return entries.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }

  async delete(id: string): Promise<boolean> {
    try {
      await fs.unlink(this.sessionPath(id));
      return true;
    } catch {
      return false;
    }
  }

  private parse(content: string): ChatSession | null {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch {
      return null;
    }
    const result = chatSessionSchema.safeParse(raw);
    return result.success ? result.data : null;
  }

  private sessionPath(id: string): string {
    return path.join(this.sessionsDir, `${path.basename(id)}.json`);
  }
}
