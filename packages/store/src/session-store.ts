/**
 * @switchyard/store - Provider session records
 *
 * At most one session per provider: the UNIQUE(provider) constraint and
 * ON CONFLICT upsert make a second save replace the first in the same
 * statement. A session is valid while usage_count < usage_cap and it has
 * not expired; getValid deletes anything else on sight.
 */

import { nanoid } from 'nanoid';
import { createLogger, type Logger } from '@switchyard/core';
import type { SwitchyardDatabase } from './database.js';
import type {
  CredentialBlob,
  ProviderSession,
  SessionRow,
  SessionStore,
  SessionUpsertOptions,
} from './types.js';

export const DEFAULT_USAGE_CAP = 50;

function rowToSession(row: SessionRow): ProviderSession {
  return {
    id: row.id,
    provider: row.provider,
    credential: parseCredential(row.credential),
    usageCount: row.usage_count,
    usageCap: row.usage_cap,
    expiresAt: row.expires_at,
    lastUsedAt: row.last_used_at,
    createdAt: row.created_at,
  };
}

function parseCredential(value: string): CredentialBlob {
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

/**
 * Why a session is no longer usable, or null when it still is.
 */
export function sessionInvalidReason(session: ProviderSession, now: number): string | null {
  if (session.usageCount >= session.usageCap) {
    return `usage cap reached (${session.usageCount}/${session.usageCap})`;
  }
  if (session.expiresAt !== null && now >= session.expiresAt) {
    return 'expired';
  }
  return null;
}

export class SqliteSessionStore implements SessionStore {
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(
    private readonly database: SwitchyardDatabase,
    options?: { logger?: Logger; now?: () => number },
  ) {
    this.log = options?.logger ?? createLogger('switchyard:store:sessions');
    this.now = options?.now ?? Date.now;
  }

  async upsert(
    provider: string,
    credential: CredentialBlob,
    options: SessionUpsertOptions = {},
  ): Promise<string> {
    const id = nanoid();
    const now = this.now();
    const usageCap = options.usageCap ?? DEFAULT_USAGE_CAP;

    this.database.connection
      .prepare(
        `INSERT INTO provider_sessions (
           id, provider, credential, usage_count, usage_cap, expires_at, last_used_at, created_at
         ) VALUES (@id, @provider, @credential, @usageCount, @usageCap, @expiresAt, @now, @now)
         ON CONFLICT(provider) DO UPDATE SET
           id           = excluded.id,
           credential   = excluded.credential,
           usage_count  = excluded.usage_count,
           usage_cap    = excluded.usage_cap,
           expires_at   = excluded.expires_at,
           last_used_at = excluded.last_used_at,
           created_at   = excluded.created_at`,
      )
      .run({
        id,
        provider,
        credential: JSON.stringify(credential),
        usageCount: options.usageCount ?? 0,
        usageCap,
        expiresAt: options.expiresAt ?? null,
        now,
      });

    this.log.info({ provider, sessionId: id, usageCap, expiresAt: options.expiresAt ?? null }, 'Session saved');
    return id;
  }

  async incrementUsage(provider: string): Promise<number | null> {
    const row = this.database.connection
      .prepare<[number, string], { usage_count: number; usage_cap: number }>(
        `UPDATE provider_sessions
            SET usage_count = usage_count + 1, last_used_at = ?
          WHERE provider = ?
          RETURNING usage_count, usage_cap`,
      )
      .get(this.now(), provider);

    if (!row) {
      this.log.debug({ provider }, 'No session to count usage against');
      return null;
    }

    this.log.debug({ provider, usage: row.usage_count, cap: row.usage_cap }, 'Session usage incremented');
    return row.usage_count;
  }

  async getValid(provider: string): Promise<ProviderSession | null> {
    const session = await this.get(provider);
    if (!session) return null;

    const reason = sessionInvalidReason(session, this.now());
    if (reason === null) {
      return session;
    }

    // Match on id so a session saved concurrently by another request survives.
    this.database.connection
      .prepare('DELETE FROM provider_sessions WHERE provider = ? AND id = ?')
      .run(provider, session.id);
    this.log.info({ provider, sessionId: session.id, reason }, 'Stale session deleted');
    return null;
  }

  async get(provider: string): Promise<ProviderSession | null> {
    const row = this.database.connection
      .prepare<[string], SessionRow>('SELECT * FROM provider_sessions WHERE provider = ?')
      .get(provider);
    return row ? rowToSession(row) : null;
  }

  async delete(provider: string): Promise<boolean> {
    const result = this.database.connection
      .prepare('DELETE FROM provider_sessions WHERE provider = ?')
      .run(provider);

    if (result.changes > 0) {
      this.log.info({ provider }, 'Session deleted');
    }
    return result.changes > 0;
  }

  async list(): Promise<ProviderSession[]> {
    const rows = this.database.connection
      .prepare<[], SessionRow>('SELECT * FROM provider_sessions ORDER BY provider')
      .all();
    return rows.map(rowToSession);
  }

  async clear(): Promise<number> {
    const result = this.database.connection.prepare('DELETE FROM provider_sessions').run();
    this.log.info({ removed: result.changes }, 'All sessions cleared');
    return result.changes;
  }
}
