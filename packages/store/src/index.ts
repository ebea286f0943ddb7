/**
 * @switchyard/store - Durable state for the orchestration engine
 *
 * Public API surface:
 *   - SwitchyardDatabase  (database.ts)      -- shared SQLite connection + schema
 *   - SqliteHealthStore   (health-store.ts)  -- provider/model outcome counters
 *   - SqliteSessionStore  (session-store.ts) -- per-provider credential sessions
 *   - SqliteToggleStore   (toggle-store.ts)  -- admin enable/disable gates
 *   - All types           (types.ts)
 */

export type {
  ProviderHealth,
  HealthStore,
  ProviderSession,
  SessionUpsertOptions,
  SessionStore,
  ProviderToggle,
  ToggleStore,
} from './types.js';

export { SwitchyardDatabase, MEMORY_DB } from './database.js';
export { SqliteHealthStore, emptyHealth } from './health-store.js';
export { SqliteSessionStore, sessionInvalidReason, DEFAULT_USAGE_CAP } from './session-store.js';
export { SqliteToggleStore } from './toggle-store.js';
