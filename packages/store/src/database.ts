/**
 * @switchyard/store - Database layer
 *
 * Owns the SQLite connection shared by every store. Four independent
 * keyed tables: provider_health, provider_sessions, provider_toggles,
 * proxies. No query joins across them.
 *
 * Every counter change is a single SQL statement, so concurrent requests
 * never lose an increment and no lock spans two keys.
 */

import { dirname } from 'node:path';
import { existsSync, mkdirSync } from 'node:fs';
import Database from 'better-sqlite3';
import { buildPaths, createLogger, type Logger } from '@switchyard/core';

export const MEMORY_DB = ':memory:';

export class SwitchyardDatabase {
  readonly connection: Database.Database;
  readonly path: string;
  private readonly log: Logger;

  constructor(dbPath?: string, options?: { logger?: Logger }) {
    this.path = dbPath ?? buildPaths().database;
    this.log = options?.logger ?? createLogger('switchyard:store:database');

    if (this.path !== MEMORY_DB) {
      const dir = dirname(this.path);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.connection = new Database(this.path);
    if (this.path !== MEMORY_DB) {
      this.connection.pragma('journal_mode = WAL');
    }
    this.connection.pragma('busy_timeout = 5000');

    this.initSchema();
    this.log.info({ dbPath: this.path }, 'SwitchyardDatabase initialized');
  }

  // -------------------------------------------------------------------------
  // Schema
  // -------------------------------------------------------------------------

  private initSchema(): void {
    this.connection.exec(`
      CREATE TABLE IF NOT EXISTS provider_health (
        key                  TEXT PRIMARY KEY,
        success_count        INTEGER NOT NULL DEFAULT 0,
        failure_count        INTEGER NOT NULL DEFAULT 0,
        consecutive_failures INTEGER NOT NULL DEFAULT 0,
        avg_latency_ms       REAL    NOT NULL DEFAULT 0,
        total_latency_ms     REAL    NOT NULL DEFAULT 0,
        sample_count         INTEGER NOT NULL DEFAULT 0,
        last_failure_at      INTEGER,
        last_success_at      INTEGER,
        updated_at           INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS provider_sessions (
        id           TEXT PRIMARY KEY,
        provider     TEXT NOT NULL UNIQUE,
        credential   TEXT NOT NULL,
        usage_count  INTEGER NOT NULL DEFAULT 0,
        usage_cap    INTEGER NOT NULL DEFAULT 50,
        expires_at   INTEGER,
        last_used_at INTEGER NOT NULL,
        created_at   INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS provider_toggles (
        provider   TEXT PRIMARY KEY,
        name       TEXT NOT NULL,
        kind       TEXT NOT NULL DEFAULT 'api',
        enabled    INTEGER NOT NULL DEFAULT 1,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS proxies (
        id                    INTEGER PRIMARY KEY AUTOINCREMENT,
        name                  TEXT,
        address               TEXT NOT NULL,
        port                  INTEGER NOT NULL,
        protocol              TEXT NOT NULL DEFAULT 'http',
        username              TEXT,
        password              TEXT,
        is_active             INTEGER NOT NULL DEFAULT 1,
        is_default            INTEGER NOT NULL DEFAULT 0,
        is_working            INTEGER NOT NULL DEFAULT 1,
        consecutive_failures  INTEGER NOT NULL DEFAULT 0,
        consecutive_successes INTEGER NOT NULL DEFAULT 0,
        total_failures        INTEGER NOT NULL DEFAULT 0,
        total_successes       INTEGER NOT NULL DEFAULT 0,
        response_time_ms      REAL,
        last_tested_at        INTEGER,
        last_success_at       INTEGER,
        created_at            INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_sessions_expires ON provider_sessions(expires_at);
      CREATE INDEX IF NOT EXISTS idx_proxies_active   ON proxies(is_active, is_working);
      CREATE INDEX IF NOT EXISTS idx_proxies_default  ON proxies(is_default) WHERE is_default = 1;
    `);
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  close(): void {
    if (this.connection.open) {
      this.connection.close();
      this.log.info({ dbPath: this.path }, 'SwitchyardDatabase closed');
    }
  }
}
