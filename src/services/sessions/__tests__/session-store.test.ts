import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createDb, migrateDb } from '../../../db/index.js';
import { SessionStore, historyFromSession, sessionTitle } from '../session-store.js';
import type { ExecutionRecord } from '../../orchestrator/types.js';

const record: ExecutionRecord = {
  assetName: 'web-1',
  command: 'df -h',
  result: '/dev/sda1 42%',
  timestamp: '2026-01-05T10:00:00.000Z',
};

describe('sessionTitle', () => {
  it('should keep short instructions as they are', () => {
    expect(sessionTitle('  check disk   on web-1 ')).toBe('check disk on web-1');
  });

  it('should cut long instructions at 30 characters', () => {
    expect(sessionTitle('restart nginx on every frontend server please')).toBe('restart nginx on every fronten…');
  });
});

describe('historyFromSession', () => {
  it('should note the commands behind an answer', () => {
    const history = historyFromSession([
      { role: 'user', content: 'check disk on web-1' },
      {
        role: 'assistant',
        content: 'Disk is at 42%.',
        commands: [{ asset_name: 'web-1', command: 'df -h', result: '...', timestamp: record.timestamp }],
      },
      { role: 'user', content: 'thanks' },
      { role: 'assistant', content: 'You are welcome.' },
    ]);

    expect(history).toEqual([
      { role: 'user', content: 'check disk on web-1' },
      { role: 'assistant', content: 'Disk is at 42%.\n\nCommands run for this answer:\n- [web-1] df -h' },
      { role: 'user', content: 'thanks' },
      { role: 'assistant', content: 'You are welcome.' },
    ]);
  });
});

describe('SessionStore', () => {
  let store: SessionStore;

  beforeEach(() => {
    const db = createDb(':memory:');
    migrateDb(db);
    store = new SessionStore(db);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should create a session on the first exchange', async () => {
    const session = await store.appendExchange(undefined, 'check disk on web-1', 'Disk is at 42%.', [record]);

    expect(session.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(session.title).toBe('check disk on web-1');
    expect(session.messages).toEqual([
      { role: 'user', content: 'check disk on web-1' },
      {
        role: 'assistant',
        content: 'Disk is at 42%.',
        commands: [{ asset_name: 'web-1', command: 'df -h', result: '/dev/sda1 42%', timestamp: '2026-01-05T10:00:00.000Z' }],
      },
    ]);
  });

  it('should append to an existing session and keep its title', async () => {
    const first = await store.appendExchange('s-1', 'first question', 'first answer', []);
    const second = await store.appendExchange(first.id, 'second question', 'second answer', []);

    expect(second.id).toBe('s-1');
    expect(second.title).toBe('first question');
    expect(second.messages.map(m => m.content)).toEqual([
      'first question',
      'first answer',
      'second question',
      'second answer',
    ]);
    expect(second.messages[1].commands).toBeUndefined();
  });

  it('should list sessions newest first', async () => {
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date('2026-01-05T10:00:00.000Z'));
    await store.appendExchange('older', 'a', 'b', []);
    vi.setSystemTime(new Date('2026-01-05T11:00:00.000Z'));
    await store.appendExchange('newer', 'c', 'd', []);

    expect(await store.list()).toEqual([
      { id: 'newer', title: 'c', updatedAt: '2026-01-05T11:00:00.000Z', messageCount: 2 },
      { id: 'older', title: 'a', updatedAt: '2026-01-05T10:00:00.000Z', messageCount: 2 },
    ]);
    expect(await store.list(1)).toHaveLength(1);
  });

  it('should delete a session', async () => {
    await store.appendExchange('gone', 'a', 'b', []);

    expect(await store.delete('gone')).toBe(true);
    expect(await store.get('gone')).toBeUndefined();
    expect(await store.delete('gone')).toBe(false);
  });
});
