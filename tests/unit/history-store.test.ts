// ============================================================
// Tests for server/src/history/store.ts
// Covers: save, newest-first listing, limits, immutability,
//         cascade delete
// ============================================================

import { describe, it, expect } from 'vitest';
import { InMemoryHistoryStore } from '../../server/src/history/store';
import type { VibeResult } from '../../src/shared/types';

function vibe(mood: string): VibeResult {
  return {
    mood,
    genre: 'Jazz',
    energy_level: 'low',
    aesthetic_keywords: ['smooth'],
    suggested_music: 'Miles Davis',
  };
}

/** Clock that moves forward one minute per call */
function tickingClock(start = Date.parse('2026-10-19T08:00:00.000Z')) {
  let tick = 0;
  return () => new Date(start + tick++ * 60_000);
}

describe('InMemoryHistoryStore', () => {
  it('should store the description, vibe fields and timestamp', async () => {
    const store = new InMemoryHistoryStore(() => new Date('2026-10-19T08:30:00.000Z'));
    await store.save('user-1', 'quiet evenings', vibe('Calm'));

    const [entry] = await store.listRecent('user-1');

    expect(entry).toMatchObject({
      user_id: 'user-1',
      description: 'quiet evenings',
      mood: 'Calm',
      genre: 'Jazz',
      energy_level: 'low',
      aesthetic_keywords: ['smooth'],
      suggested_music: 'Miles Davis',
      created_at: '2026-10-19T08:30:00.000Z',
    });
    expect(typeof entry.id).toBe('string');
  });

  it('should list newest first', async () => {
    const store = new InMemoryHistoryStore(tickingClock());
    await store.save('user-1', 'a', vibe('First'));
    await store.save('user-1', 'b', vibe('Second'));
    await store.save('user-1', 'c', vibe('Third'));

    const moods = (await store.listRecent('user-1')).map((e) => e.mood);
    expect(moods).toEqual(['Third', 'Second', 'First']);
  });

  it('should keep reverse insertion order for equal timestamps', async () => {
    const store = new InMemoryHistoryStore(() => new Date('2026-10-19T08:30:00.000Z'));
    await store.save('user-1', 'a', vibe('First'));
    await store.save('user-1', 'b', vibe('Second'));

    const moods = (await store.listRecent('user-1')).map((e) => e.mood);
    expect(moods).toEqual(['Second', 'First']);
  });

  it('should cap the listing at 10 by default', async () => {
    const store = new InMemoryHistoryStore(tickingClock());
    for (let i = 0; i < 12; i++) {
      await store.save('user-1', `entry ${i}`, vibe(`Mood ${i}`));
    }

    const entries = await store.listRecent('user-1');
    expect(entries).toHaveLength(10);
    expect(entries[0].mood).toBe('Mood 11');
    expect(entries[9].mood).toBe('Mood 2');
    expect(await store.listRecent('user-1', 3)).toHaveLength(3);
  });

  it('should only list entries of the given user', async () => {
    const store = new InMemoryHistoryStore(tickingClock());
    await store.save('user-1', 'mine', vibe('Mine'));
    await store.save('user-2', 'theirs', vibe('Theirs'));

    expect((await store.listRecent('user-1')).map((e) => e.mood)).toEqual(['Mine']);
  });

  it('should freeze written entries', async () => {
    const store = new InMemoryHistoryStore();
    const result = vibe('Calm');
    await store.save('user-1', 'x', result);
    result.aesthetic_keywords.push('mutated');

    const [entry] = await store.listRecent('user-1');
    expect(Object.isFrozen(entry)).toBe(true);
    expect(entry.aesthetic_keywords).toEqual(['smooth']);
  });

  it('should not let a listed entry change what is stored', async () => {
    const store = new InMemoryHistoryStore();
    await store.save('user-1', 'x', vibe('Calm'));

    const [listed] = await store.listRecent('user-1');
    listed.aesthetic_keywords.push('tampered');

    const [again] = await store.listRecent('user-1');
    expect(again.aesthetic_keywords).toEqual(['smooth']);
  });

  it('should cascade-delete entries of a removed user', async () => {
    const store = new InMemoryHistoryStore(tickingClock());
    await store.save('user-1', 'a', vibe('A'));
    await store.save('user-1', 'b', vibe('B'));
    await store.save('user-2', 'c', vibe('C'));

    expect(await store.deleteUser('user-1')).toBe(2);
    expect(await store.listRecent('user-1')).toEqual([]);
    expect(await store.listRecent('user-2')).toHaveLength(1);
  });
});
