/**
 * In-memory SQLite stores sharing one connection and one test clock.
 */
import type { ProviderKind } from '@switchyard/core';
import {
  MEMORY_DB,
  SqliteHealthStore,
  SqliteSessionStore,
  SqliteToggleStore,
  SwitchyardDatabase,
} from '@switchyard/store';
import { createClock, type TestClock } from './clock.js';

export interface TestStores {
  db: SwitchyardDatabase;
  clock: TestClock;
  health: SqliteHealthStore;
  sessions: SqliteSessionStore;
  toggles: SqliteToggleStore;
}

export async function createStores(enabled: readonly string[] = [], kind: ProviderKind = 'api'): Promise<TestStores> {
  const db = new SwitchyardDatabase(MEMORY_DB);
  const clock = createClock();
  const stores = {
    db,
    clock,
    health: new SqliteHealthStore(db, { now: clock.now }),
    sessions: new SqliteSessionStore(db, { now: clock.now }),
    toggles: new SqliteToggleStore(db, { now: clock.now }),
  };
  await stores.toggles.seed(enabled.map((provider) => ({ provider, name: provider, kind, enabled: true })));
  return stores;
}
