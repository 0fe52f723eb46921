import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';
import { SessionManager, newSession, withMessage } from '../src/session-manager.js';

describe('SessionManager', () => {
  let tmpDir: string;
  let manager: SessionManager;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'costwise-session-test-'));
    manager = new SessionManager(tmpDir);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('creates a new session with empty metadata', async () => {
    const session = await manager.create();

    expect(session.id).toMatch(/^session_/);
    expect(session.messages).toEqual([]);
    expect(session.metadata).toEqual({ messageCount: 0, toolCallCount: 0, interruptionCount: 0 });
  });

  it('saves and loads a session with its tool log', async () => {
    let session = await manager.create();
    session = withMessage(session, { role: 'user', content: 'Hello', timestamp: '2026-01-01T00:00:00.000Z' });
    session = withMessage(session, {
      role: 'assistant',
      content: 'S3 cost $3',
      timestamp: '2026-01-01T00:00:01.000Z',
      status: 'completed',
      toolLog: [{
        callId: 'call_1',
        toolName: 'redshift__execute_query',
        payload: { sql: 'SELECT 1' },
        status: 'completed',
        timestamp: '2026-01-01T00:00:00.500Z',
        success: true,
      }],
    });
    await manager.save(session);

    const loaded = await manager.load(session.id);

    expect(loaded).toEqual(session);
    expect(loaded?.metadata).toEqual({ messageCount: 1, toolCallCount: 1, interruptionCount: 0 });
  });

  it('returns null for non-existent session', async () => {
    expect(await manager.load('session_nonexistent')).toBeNull();
  });

  it('returns null for a file that is not a session', async () => {
    await fs.writeFile(path.join(tmpDir, 'session_bad.json'), '{"id": 1}', 'utf-8');
    expect(await manager.load('session_bad')).toBeNull();
  });

  it('lists sessions sorted by updatedAt descending, skipping corrupt files', async () => {
    const s1 = withMessage(newSession(), { role: 'user', content: 'First session message', timestamp: '2026-01-01T00:00:00.000Z' });
    const s2 = withMessage(newSession(), { role: 'user', content: 'Second session message', timestamp: '2026-01-02T00:00:00.000Z' });
    await manager.save(s1);
    await manager.save(s2);
    await fs.writeFile(path.join(tmpDir, 'broken.json'), 'not json', 'utf-8');

    const list = await manager.list();

    expect(list.map(e => e.id)).toEqual([s2.id, s1.id]);
    expect(list[0].preview).toBe('Second session message');
    expect(list[0].messageCount).toBe(1);
  });

  it('deletes a session', async () => {
    const session = await manager.create();

    expect(await manager.delete(session.id)).toBe(true);
    expect(await manager.load(session.id)).toBeNull();
  });

  it('returns false when deleting non-existent session', async () => {
    expect(await manager.delete('session_nonexistent')).toBe(false);
  });
});

describe('withMessage', () => {
  it('leaves the original session untouched', () => {
    const session = newSession();
    const next = withMessage(session, { role: 'user', content: 'hi', timestamp: '2026-01-01T00:00:00.000Z' });

    expect(session.messages).toEqual([]);
    expect(next.messages).toHaveLength(1);
    expect(next.updatedAt).toBe('2026-01-01T00:00:00.000Z');
  });

  it('counts only completed calls toward the tool call total', () => {
    const next = withMessage(newSession(), {
      role: 'assistant',
      content: '❌ Error: boom',
      timestamp: '2026-01-01T00:00:00.000Z',
      status: 'failed',
      toolLog: [
        { callId: 'a', toolName: 'q', payload: {}, status: 'completed', timestamp: '2026-01-01T00:00:00.000Z', success: true },
        { callId: 'b', toolName: 'q', payload: {}, status: 'started', timestamp: '2026-01-01T00:00:00.000Z' },
      ],
    });

    expect(next.metadata).toEqual({ messageCount: 0, toolCallCount: 1, interruptionCount: 0 });
  });
});
