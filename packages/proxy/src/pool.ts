/**
 * @switchyard/proxy - ProxyPool
 *
 * Durable set of outbound proxies backed by the `proxies` table.
 *
 * - select() prefers the default row among active & working proxies, then
 *   the active proxy that succeeded most recently.
 * - setDefault() flips every row's is_default in one UPDATE, so there is
 *   never a moment with two defaults.
 * - recordProbe() biases toward fast recovery: one success marks a proxy
 *   working again, but it takes `failureThreshold` consecutive failures to
 *   mark it down and `demoteAfter` to deactivate it.
 */

import { performance } from 'node:perf_hooks';
import { createLogger, errorMessage, type Logger } from '@switchyard/core';
import type { SwitchyardDatabase } from '@switchyard/store';
import { ProxyNotFoundError, ProxyUnavailableError } from './errors.js';
import type {
  NewProxy,
  ProbeResult,
  ProxyEndpoint,
  ProxyPoolOptions,
  ProxyProber,
  ProxyProtocol,
  ProxyRow,
  ProxyStats,
} from './types.js';

function toProtocol(value: string): ProxyProtocol {
  return value === 'https' || value === 'socks5' ? value : 'http';
}

function rowToProxy(row: ProxyRow): ProxyEndpoint {
  return {
    id: row.id,
    name: row.name,
    address: row.address,
    port: row.port,
    protocol: toProtocol(row.protocol),
    auth:
      row.username !== null && row.password !== null
        ? { username: row.username, password: row.password }
        : null,
    isActive: row.is_active === 1,
    isDefault: row.is_default === 1,
    isWorking: row.is_working === 1,
    consecutiveFailures: row.consecutive_failures,
    consecutiveSuccesses: row.consecutive_successes,
    totalFailures: row.total_failures,
    totalSuccesses: row.total_successes,
    responseTimeMs: row.response_time_ms,
    lastTestedAt: row.last_tested_at,
    lastSuccessAt: row.last_success_at,
    createdAt: row.created_at,
  };
}

export class ProxyPool {
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly failureThreshold: number;
  private readonly demoteAfter: number;
  private readonly probeTimeoutMs: number;
  private readonly prober: ProxyProber | undefined;

  constructor(
    private readonly database: SwitchyardDatabase,
    options: ProxyPoolOptions & { logger?: Logger; now?: () => number } = {},
  ) {
    this.log = options.logger ?? createLogger('switchyard:proxy:pool');
    this.now = options.now ?? Date.now;
    this.failureThreshold = options.failureThreshold ?? 3;
    this.demoteAfter = options.demoteAfter ?? 10;
    this.probeTimeoutMs = options.probeTimeoutMs ?? 5000;
    this.prober = options.prober;
  }

  // -----------------------------------------------------------------------
  // Selection
  // -----------------------------------------------------------------------

  async select(): Promise<ProxyEndpoint> {
    const conn = this.database.connection;

    const preferred = conn
      .prepare<[], ProxyRow>(
        `SELECT * FROM proxies
          WHERE is_default = 1 AND is_active = 1 AND is_working = 1
          LIMIT 1`,
      )
      .get();
    if (preferred) return rowToProxy(preferred);

    const recent = conn
      .prepare<[], ProxyRow>(
        `SELECT * FROM proxies
          WHERE is_active = 1 AND last_success_at IS NOT NULL
          ORDER BY last_success_at DESC, id ASC
          LIMIT 1`,
      )
      .get();
    if (recent) {
      this.log.debug({ proxyId: recent.id }, 'No usable default, using most recently successful proxy');
      return rowToProxy(recent);
    }

    throw new ProxyUnavailableError();
  }

  /**
   * Make `id` the only default. The target is activated in the same write.
   */
  async setDefault(id: number): Promise<ProxyEndpoint> {
    const conn = this.database.connection;

    const apply = conn.transaction((targetId: number): ProxyRow => {
      const exists = conn.prepare<[number], { id: number }>('SELECT id FROM proxies WHERE id = ?').get(targetId);
      if (!exists) {
        throw new ProxyNotFoundError(targetId);
      }

      conn
        .prepare(
          `UPDATE proxies
              SET is_default = CASE WHEN id = @id THEN 1 ELSE 0 END,
                  is_active  = CASE WHEN id = @id THEN 1 ELSE is_active END`,
        )
        .run({ id: targetId });

      const row = conn.prepare<[number], ProxyRow>('SELECT * FROM proxies WHERE id = ?').get(targetId);
      if (!row) {
        throw new ProxyNotFoundError(targetId);
      }
      return row;
    });

    const proxy = rowToProxy(apply(id));
    this.log.info({ proxyId: id }, 'Default proxy set');
    return proxy;
  }

  /**
   * Advance the default to the next active, working proxy by id, wrapping
   * around. With a single candidate that candidate stays the default.
   */
  async rotate(): Promise<ProxyEndpoint> {
    const candidates = this.database.connection
      .prepare<[], ProxyRow>('SELECT * FROM proxies WHERE is_active = 1 AND is_working = 1 ORDER BY id')
      .all();

    if (candidates.length === 0) {
      throw new ProxyUnavailableError('No active working proxy to rotate to');
    }

    const current = candidates.findIndex((row) => row.is_default === 1);
    const next = candidates[(current + 1) % candidates.length] ?? candidates[0];
    if (!next) {
      throw new ProxyUnavailableError('No active working proxy to rotate to');
    }

    this.log.info(
      { from: current >= 0 ? candidates[current]?.id : null, to: next.id, pool: candidates.length },
      'Rotating default proxy',
    );
    return this.setDefault(next.id);
  }

  // -----------------------------------------------------------------------
  // Health
  // -----------------------------------------------------------------------

  /**
   * Apply one health observation. Returns the updated row, or null when the
   * proxy has been removed in the meantime.
   */
  async recordProbe(id: number, success: boolean, latencyMs: number): Promise<ProxyEndpoint | null> {
    const now = this.now();
    const conn = this.database.connection;

    const row = success
      ? conn
          .prepare<{ id: number; now: number; latency: number }, ProxyRow>(
            `UPDATE proxies
                SET is_working            = 1,
                    consecutive_successes = consecutive_successes + 1,
                    consecutive_failures  = 0,
                    total_successes       = total_successes + 1,
                    response_time_ms      = @latency,
                    last_tested_at        = @now,
                    last_success_at       = @now
              WHERE id = @id
              RETURNING *`,
          )
          .get({ id, now, latency: Math.max(0, latencyMs) })
      : conn
          .prepare<{ id: number; now: number; threshold: number; demote: number }, ProxyRow>(
            `UPDATE proxies
                SET consecutive_failures  = consecutive_failures + 1,
                    consecutive_successes = 0,
                    total_failures        = total_failures + 1,
                    is_working = CASE WHEN consecutive_failures + 1 >= @threshold THEN 0 ELSE is_working END,
                    is_active  = CASE WHEN consecutive_failures + 1 >= @demote THEN 0 ELSE is_active END,
                    last_tested_at        = @now
              WHERE id = @id
              RETURNING *`,
          )
          .get({ id, now, threshold: this.failureThreshold, demote: this.demoteAfter });

    if (!row) {
      this.log.warn({ proxyId: id }, 'Outcome reported for unknown proxy');
      return null;
    }

    const proxy = rowToProxy(row);
    if (!success) {
      if (!proxy.isActive) {
        this.log.warn({ proxyId: id, consecutiveFailures: proxy.consecutiveFailures }, 'Proxy demoted');
      } else if (!proxy.isWorking) {
        this.log.warn({ proxyId: id, consecutiveFailures: proxy.consecutiveFailures }, 'Proxy marked not working');
      }
    }
    return proxy;
  }

  /**
   * Test one proxy with the configured prober and record the outcome.
   * A prober failure is reported in the result; a missing prober, an
   * unknown id or a failed write rejects.
   */
  async probe(id: number): Promise<ProbeResult> {
    if (!this.prober) {
      throw new Error('ProxyPool has no prober configured');
    }

    const proxy = await this.get(id);
    if (!proxy) {
      throw new ProxyNotFoundError(id);
    }

    const start = performance.now();
    let error: string | undefined;
    try {
      await this.prober(proxy, AbortSignal.timeout(this.probeTimeoutMs));
    } catch (err) {
      error = errorMessage(err);
    }
    const latencyMs = Math.round(performance.now() - start);

    if (error === undefined) {
      await this.recordProbe(id, true, latencyMs);
      this.log.info({ proxyId: id, latencyMs }, 'Proxy probe passed');
      return { id, success: true, latencyMs };
    }

    await this.recordProbe(id, false, latencyMs);
    this.log.info({ proxyId: id, latencyMs, error }, 'Proxy probe failed');
    return { id, success: false, latencyMs, error };
  }

  /** Probe every active proxy concurrently. */
  async probeAll(): Promise<ProbeResult[]> {
    const active = (await this.list()).filter((p) => p.isActive);
    return Promise.all(active.map((p) => this.probe(p.id)));
  }

  // -----------------------------------------------------------------------
  // Administration
  // -----------------------------------------------------------------------

  async add(input: NewProxy): Promise<ProxyEndpoint> {
    const conn = this.database.connection;
    const row = conn
      .prepare<
        {
          name: string | null;
          address: string;
          port: number;
          protocol: ProxyProtocol;
          username: string | null;
          password: string | null;
          active: number;
          now: number;
        },
        ProxyRow
      >(
        `INSERT INTO proxies (name, address, port, protocol, username, password, is_active, created_at)
         VALUES (@name, @address, @port, @protocol, @username, @password, @active, @now)
         RETURNING *`,
      )
      .get({
        name: input.name ?? null,
        address: input.address,
        port: input.port,
        protocol: input.protocol ?? 'http',
        username: input.auth?.username ?? null,
        password: input.auth?.password ?? null,
        active: input.isActive === false ? 0 : 1,
        now: this.now(),
      });

    if (!row) {
      throw new Error(`Failed to insert proxy ${input.address}:${input.port}`);
    }

    this.log.info({ proxyId: row.id, address: row.address, port: row.port }, 'Proxy added');
    return input.isDefault ? this.setDefault(row.id) : rowToProxy(row);
  }

  async remove(id: number): Promise<boolean> {
    const result = this.database.connection.prepare('DELETE FROM proxies WHERE id = ?').run(id);
    if (result.changes > 0) {
      this.log.info({ proxyId: id }, 'Proxy removed');
    }
    return result.changes > 0;
  }

  async setActive(id: number, active: boolean): Promise<ProxyEndpoint> {
    const row = this.database.connection
      .prepare<[number, number], ProxyRow>('UPDATE proxies SET is_active = ? WHERE id = ? RETURNING *')
      .get(active ? 1 : 0, id);
    if (!row) {
      throw new ProxyNotFoundError(id);
    }
    this.log.info({ proxyId: id, active }, `Proxy ${active ? 'activated' : 'deactivated'}`);
    return rowToProxy(row);
  }

  async get(id: number): Promise<ProxyEndpoint | null> {
    const row = this.database.connection
      .prepare<[number], ProxyRow>('SELECT * FROM proxies WHERE id = ?')
      .get(id);
    return row ? rowToProxy(row) : null;
  }

  async list(): Promise<ProxyEndpoint[]> {
    return this.database.connection
      .prepare<[], ProxyRow>('SELECT * FROM proxies ORDER BY id')
      .all()
      .map(rowToProxy);
  }

  async stats(): Promise<ProxyStats> {
    const row = this.database.connection
      .prepare<[], { total: number; active: number | null; working: number | null; default_id: number | null }>(
        `SELECT COUNT(*)                                         AS total,
                SUM(is_active)                                   AS active,
                SUM(CASE WHEN is_active = 1 THEN is_working END) AS working,
                MAX(CASE WHEN is_default = 1 THEN id END)        AS default_id
           FROM proxies`,
      )
      .get();

    return {
      total: row?.total ?? 0,
      active: row?.active ?? 0,
      working: row?.working ?? 0,
      defaultId: row?.default_id ?? null,
    };
  }
}
