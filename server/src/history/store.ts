// ============================================================
// Vibe Studio - History Store
// In-memory persistence of generated vibes per user
// ============================================================

import { randomUUID } from 'node:crypto';
import type { HistoryEntry, HistoryStore, VibeResult } from '@shared/types';
import { DEFAULT_CONFIG } from '@shared/types';

/**
 * Append-only vibe history. Entries are frozen once written and only
 * leave the store when their user is deleted. Listings hand out copies.
 */
export class InMemoryHistoryStore implements HistoryStore {
  private readonly entries: HistoryEntry[] = [];
  private readonly now: () => Date;

  constructor(now: () => Date = () => new Date()) {
    this.now = now;
  }

  async save(userId: string, description: string, result: VibeResult): Promise<void> {
    const entry: HistoryEntry = {
      id: randomUUID(),
      user_id: userId,
      description,
      mood: result.mood,
      genre: result.genre,
      energy_level: result.energy_level,
      aesthetic_keywords: [...result.aesthetic_keywords],
      suggested_music: result.suggested_music,
      created_at: this.now().toISOString(),
    };
    this.entries.push(Object.freeze(entry));
  }

  /** Newest first; entries with equal timestamps keep reverse insertion order. */
  async listRecent(userId: string, limit: number = DEFAULT_CONFIG.historyLimit): Promise<HistoryEntry[]> {
    return this.entries
      .filter((entry) => entry.user_id === userId)
      .reverse()
      .sort((a, b) => compareDesc(a.created_at, b.created_at))
      .slice(0, Math.max(0, limit))
      .map(copyEntry);
  }

  /** Cascade for account deletion. Returns how many entries were removed. */
  async deleteUser(userId: string): Promise<number> {
    const before = this.entries.length;
    for (let i = this.entries.length - 1; i >= 0; i--) {
      if (this.entries[i].user_id === userId) {
        this.entries.splice(i, 1);
      }
    }
    return before - this.entries.length;
  }
}

function copyEntry(entry: HistoryEntry): HistoryEntry {
  return Object.freeze({ ...entry, aesthetic_keywords: [...entry.aesthetic_keywords] });
}

function compareDesc(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? 1 : -1;
}
