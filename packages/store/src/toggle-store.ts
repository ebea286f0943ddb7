/**
 * @switchyard/store - Provider enable/disable toggles
 */

import { createLogger, type Logger, type ProviderKind } from '@switchyard/core';
import type { SwitchyardDatabase } from './database.js';
import type { ProviderToggle, ToggleRow, ToggleStore } from './types.js';

function toKind(value: string): ProviderKind {
  return value === 'browser' || value === 'terminal' ? value : 'api';
}

function rowToToggle(row: ToggleRow): ProviderToggle {
  return {
    provider: row.provider,
    name: row.name,
    kind: toKind(row.kind),
    enabled: row.enabled === 1,
  };
}

export class SqliteToggleStore implements ToggleStore {
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(
    private readonly database: SwitchyardDatabase,
    options?: { logger?: Logger; now?: () => number },
  ) {
    this.log = options?.logger ?? createLogger('switchyard:store:toggles');
    this.now = options?.now ?? Date.now;
  }

  async seed(toggles: ProviderToggle[]): Promise<number> {
    const insert = this.database.connection.prepare(
      `INSERT OR IGNORE INTO provider_toggles (provider, name, kind, enabled, updated_at)
       VALUES (?, ?, ?, ?, ?)`,
    );
    const now = this.now();

    const seedAll = this.database.connection.transaction((rows: ProviderToggle[]) => {
      let inserted = 0;
      for (const t of rows) {
        inserted += insert.run(t.provider, t.name, t.kind, t.enabled ? 1 : 0, now).changes;
      }
      return inserted;
    });

    const inserted = seedAll(toggles);
    this.log.info({ inserted, total: toggles.length }, 'Provider toggles seeded');
    return inserted;
  }

  async get(provider: string): Promise<ProviderToggle | null> {
    const row = this.database.connection
      .prepare<[string], ToggleRow>('SELECT * FROM provider_toggles WHERE provider = ?')
      .get(provider);
    return row ? rowToToggle(row) : null;
  }

  async list(): Promise<ProviderToggle[]> {
    return this.database.connection
      .prepare<[], ToggleRow>('SELECT * FROM provider_toggles ORDER BY provider')
      .all()
      .map(rowToToggle);
  }

  async setEnabled(provider: string, enabled: boolean): Promise<boolean> {
    const result = this.database.connection
      .prepare('UPDATE provider_toggles SET enabled = ?, updated_at = ? WHERE provider = ?')
      .run(enabled ? 1 : 0, this.now(), provider);

    if (result.changes === 0) {
      this.log.error({ provider }, 'Unknown provider');
      return false;
    }

    this.log.info({ provider, enabled }, `Provider ${enabled ? 'enabled' : 'disabled'}`);
    return true;
  }

  async enabledProviders(): Promise<Set<string>> {
    const rows = this.database.connection
      .prepare<[], { provider: string }>('SELECT provider FROM provider_toggles WHERE enabled = 1')
      .all();
    return new Set(rows.map((r) => r.provider));
  }
}
