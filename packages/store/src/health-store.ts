/**
 * @switchyard/store - Provider health counters
 *
 * One row per provider/model key. recordOutcome is a single UPSERT, so two
 * concurrent outcomes for the same key both land and
 * success_count + failure_count == sample_count holds after every call.
 */

import { createLogger, type Logger } from '@switchyard/core';
import type { SwitchyardDatabase } from './database.js';
import type { HealthRow, HealthStore, ProviderHealth } from './types.js';

interface OutcomeParams {
  key: string;
  success: number;
  failure: number;
  latency: number;
  failureAt: number | null;
  successAt: number | null;
  now: number;
}

function rowToHealth(row: HealthRow): ProviderHealth {
  return {
    key: row.key,
    successCount: row.success_count,
    failureCount: row.failure_count,
    consecutiveFailures: row.consecutive_failures,
    avgLatencyMs: row.avg_latency_ms,
    totalLatencyMs: row.total_latency_ms,
    sampleCount: row.sample_count,
    lastFailureAt: row.last_failure_at,
    lastSuccessAt: row.last_success_at,
  };
}

export function emptyHealth(key: string): ProviderHealth {
  return {
    key,
    successCount: 0,
    failureCount: 0,
    consecutiveFailures: 0,
    avgLatencyMs: 0,
    totalLatencyMs: 0,
    sampleCount: 0,
    lastFailureAt: null,
    lastSuccessAt: null,
  };
}

export class SqliteHealthStore implements HealthStore {
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(
    private readonly database: SwitchyardDatabase,
    options?: { logger?: Logger; now?: () => number },
  ) {
    this.log = options?.logger ?? createLogger('switchyard:store:health');
    this.now = options?.now ?? Date.now;
  }

  async recordOutcome(key: string, success: boolean, latencyMs: number): Promise<void> {
    const now = this.now();
    const latency = Number.isFinite(latencyMs) && latencyMs > 0 ? latencyMs : 0;

    try {
      this.database.connection
        .prepare<OutcomeParams>(
          `INSERT INTO provider_health (
             key, success_count, failure_count, consecutive_failures,
             avg_latency_ms, total_latency_ms, sample_count,
             last_failure_at, last_success_at, updated_at
           ) VALUES (
             @key, @success, @failure, @failure,
             @latency, @latency, 1,
             @failureAt, @successAt, @now
           )
           ON CONFLICT(key) DO UPDATE SET
             success_count        = success_count + excluded.success_count,
             failure_count        = failure_count + excluded.failure_count,
             consecutive_failures = CASE WHEN excluded.success_count = 1 THEN 0
                                         ELSE consecutive_failures + 1 END,
             avg_latency_ms       = (total_latency_ms + excluded.total_latency_ms) / (sample_count + 1),
             total_latency_ms     = total_latency_ms + excluded.total_latency_ms,
             sample_count         = sample_count + 1,
             last_failure_at      = COALESCE(excluded.last_failure_at, last_failure_at),
             last_success_at      = COALESCE(excluded.last_success_at, last_success_at),
             updated_at           = excluded.updated_at`,
        )
        .run({
          key,
          success: success ? 1 : 0,
          failure: success ? 0 : 1,
          latency,
          failureAt: success ? null : now,
          successAt: success ? now : null,
          now,
        });

      this.log.debug({ key, success, latencyMs: latency }, 'Outcome recorded');
    } catch (err) {
      // A lost sample must never fail the caller's request.
      this.log.error({ err, key, success }, 'Failed to record outcome');
    }
  }

  async read(key: string): Promise<ProviderHealth> {
    const row = this.database.connection
      .prepare<[string], HealthRow>('SELECT * FROM provider_health WHERE key = ?')
      .get(key);
    return row ? rowToHealth(row) : emptyHealth(key);
  }

  async readAll(): Promise<Map<string, ProviderHealth>> {
    const rows = this.database.connection
      .prepare<[], HealthRow>('SELECT * FROM provider_health ORDER BY key')
      .all();
    return new Map(rows.map((row) => [row.key, rowToHealth(row)]));
  }

  async reset(key?: string): Promise<number> {
    const result = key === undefined
      ? this.database.connection.prepare('DELETE FROM provider_health').run()
      : this.database.connection.prepare('DELETE FROM provider_health WHERE key = ?').run(key);

    this.log.info({ key: key ?? '*', removed: result.changes }, 'Health counters reset');
    return result.changes;
  }

  async resetStreaks(): Promise<number> {
    const result = this.database.connection
      .prepare('UPDATE provider_health SET consecutive_failures = 0, updated_at = ? WHERE consecutive_failures > 0')
      .run(this.now());

    this.log.warn({ cleared: result.changes }, 'Failure streaks reset');
    return result.changes;
  }
}
