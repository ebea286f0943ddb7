/**
 * Unit Tests for SqliteSessionStore
 *
 * One session per provider, usage caps, expiry and admin operations.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MEMORY_DB, SqliteSessionStore, SwitchyardDatabase, sessionInvalidReason } from '@switchyard/store';
import { createClock, type TestClock } from '../helpers/clock.js';

describe('SqliteSessionStore', () => {
  let db: SwitchyardDatabase;
  let clock: TestClock;
  let store: SqliteSessionStore;

  beforeEach(() => {
    db = new SwitchyardDatabase(MEMORY_DB);
    clock = createClock();
    store = new SqliteSessionStore(db, { now: clock.now });
  });

  afterEach(() => {
    db.close();
  });

  // ---------------------------------------------------------------------------
  // Upsert
  // ---------------------------------------------------------------------------
  describe('upsert', () => {
    it('replaces the previous session for the same provider', async () => {
      const first = await store.upsert('x', { cookie: 'B1' });
      const second = await store.upsert('x', { cookie: 'B2' });

      expect(second).not.toBe(first);
      const all = await store.list();
      expect(all).toHaveLength(1);
      expect(all[0]?.credential).toEqual({ cookie: 'B2' });
      expect(all[0]?.id).toBe(second);
    });

    it('applies defaults and resets lastUsedAt', async () => {
      await store.upsert('x', 'token', { usageCount: 7 });
      clock.advance(1_000);
      await store.upsert('x', 'token-2');

      const session = await store.get('x');
      expect(session).toMatchObject({
        provider: 'x',
        credential: 'token-2',
        usageCount: 0,
        usageCap: 50,
        expiresAt: null,
        lastUsedAt: clock.now(),
      });
    });

    it('keeps providers independent', async () => {
      await store.upsert('x', 1);
      await store.upsert('y', 2);
      expect((await store.list()).map((s) => s.provider)).toEqual(['x', 'y']);
    });
  });

  // ---------------------------------------------------------------------------
  // Usage
  // ---------------------------------------------------------------------------
  describe('incrementUsage', () => {
    it('counts atomically under concurrency', async () => {
      await store.upsert('x', 'c', { usageCap: 1000 });
      await Promise.all(Array.from({ length: 40 }, () => store.incrementUsage('x')));
      expect((await store.get('x'))?.usageCount).toBe(40);
    });

    it('returns the new count and refreshes lastUsedAt', async () => {
      await store.upsert('x', 'c');
      clock.advance(250);
      expect(await store.incrementUsage('x')).toBe(1);
      expect((await store.get('x'))?.lastUsedAt).toBe(clock.now());
    });

    it('returns null when the provider has no session', async () => {
      expect(await store.incrementUsage('missing')).toBeNull();
    });
  });

  // ---------------------------------------------------------------------------
  // Validity
  // ---------------------------------------------------------------------------
  describe('getValid', () => {
    it('returns the session while under cap and unexpired', async () => {
      await store.upsert('x', 'c', { usageCap: 2, expiresAt: clock.now() + 60_000 });
      expect((await store.getValid('x'))?.credential).toBe('c');
    });

    it('returns null at the usage cap even before expiry, and deletes the row', async () => {
      await store.upsert('x', 'c', { usageCap: 2, expiresAt: clock.now() + 3_600_000 });
      await store.incrementUsage('x');
      await store.incrementUsage('x');

      expect(await store.getValid('x')).toBeNull();
      expect(await store.get('x')).toBeNull();
    });

    it('returns null once expired even with zero usage', async () => {
      await store.upsert('x', 'c', { expiresAt: clock.now() + 1_000 });
      clock.advance(1_000);
      expect(await store.getValid('x')).toBeNull();
      expect(await store.list()).toHaveLength(0);
    });

    it('returns null for an unknown provider', async () => {
      expect(await store.getValid('nobody')).toBeNull();
    });
  });

  describe('sessionInvalidReason', () => {
    const base = {
      id: 's1',
      provider: 'x',
      credential: null,
      usageCount: 0,
      usageCap: 3,
      expiresAt: null,
      lastUsedAt: 0,
      createdAt: 0,
    };

    it('reports the cap', () => {
      expect(sessionInvalidReason({ ...base, usageCount: 3 }, 0)).toBe('usage cap reached (3/3)');
    });

    it('reports expiry', () => {
      expect(sessionInvalidReason({ ...base, expiresAt: 10 }, 10)).toBe('expired');
    });

    it('returns null for a usable session', () => {
      expect(sessionInvalidReason({ ...base, expiresAt: 11 }, 10)).toBeNull();
    });
  });

  // ---------------------------------------------------------------------------
  // Admin
  // ---------------------------------------------------------------------------
  describe('delete and clear', () => {
    it('deletes a single provider session', async () => {
      await store.upsert('x', 'c');
      expect(await store.delete('x')).toBe(true);
      expect(await store.delete('x')).toBe(false);
    });

    it('clears every session', async () => {
      await store.upsert('x', 'c');
      await store.upsert('y', 'c');
      expect(await store.clear()).toBe(2);
      expect(await store.list()).toEqual([]);
    });
  });
});
