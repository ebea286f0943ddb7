/**
 * @switchyard/store - Types for every persisted record set
 *
 * All `...At` fields are Unix epoch milliseconds.
 */

import type { CredentialBlob, JsonValue, ProviderKind } from '@switchyard/core';

export type { CredentialBlob, JsonValue };

// ---------------------------------------------------------------------------
// Provider health
// ---------------------------------------------------------------------------

export interface ProviderHealth {
  key: string;
  successCount: number;
  failureCount: number;
  /** Reset to 0 on any success, incremented on each failure. */
  consecutiveFailures: number;
  avgLatencyMs: number;
  totalLatencyMs: number;
  /** Always successCount + failureCount. */
  sampleCount: number;
  lastFailureAt: number | null;
  lastSuccessAt: number | null;
}

export interface HealthStore {
  /** Atomic per-key update. Never rejects; store errors are logged. */
  recordOutcome(key: string, success: boolean, latencyMs: number): Promise<void>;
  /** Current snapshot, zero-valued when the key has never been seen. */
  read(key: string): Promise<ProviderHealth>;
  readAll(): Promise<Map<string, ProviderHealth>>;
  /** Delete the counters of one key, or of every key when omitted. */
  reset(key?: string): Promise<number>;
  /** Zero every failure streak without touching the long-run counters. */
  resetStreaks(): Promise<number>;
}

// ---------------------------------------------------------------------------
// Provider sessions
// ---------------------------------------------------------------------------

export interface ProviderSession {
  id: string;
  provider: string;
  credential: CredentialBlob;
  usageCount: number;
  usageCap: number;
  expiresAt: number | null;
  lastUsedAt: number;
  createdAt: number;
}

export interface SessionUpsertOptions {
  usageCount?: number;
  usageCap?: number;
  expiresAt?: number | null;
}

export interface SessionStore {
  /** Replace any existing session for the provider. Returns the new session id. */
  upsert(provider: string, credential: CredentialBlob, options?: SessionUpsertOptions): Promise<string>;
  /** Atomic +1; returns the new count, or null when no session exists. */
  incrementUsage(provider: string): Promise<number | null>;
  /** The session if under its cap and unexpired; stale records are deleted. */
  getValid(provider: string): Promise<ProviderSession | null>;
  /** Stored record regardless of validity. */
  get(provider: string): Promise<ProviderSession | null>;
  delete(provider: string): Promise<boolean>;
  list(): Promise<ProviderSession[]>;
  clear(): Promise<number>;
}

// ---------------------------------------------------------------------------
// Provider toggles
// ---------------------------------------------------------------------------

export interface ProviderToggle {
  provider: string;
  name: string;
  kind: ProviderKind;
  enabled: boolean;
}

export interface ToggleStore {
  /** Insert rows that do not exist yet; existing rows keep their admin state. */
  seed(toggles: ProviderToggle[]): Promise<number>;
  get(provider: string): Promise<ProviderToggle | null>;
  list(): Promise<ProviderToggle[]>;
  /** Returns false when the provider has no toggle row. */
  setEnabled(provider: string, enabled: boolean): Promise<boolean>;
  enabledProviders(): Promise<Set<string>>;
}

// ---------------------------------------------------------------------------
// Raw rows
// ---------------------------------------------------------------------------

export interface HealthRow {
  key: string;
  success_count: number;
  failure_count: number;
  consecutive_failures: number;
  avg_latency_ms: number;
  total_latency_ms: number;
  sample_count: number;
  last_failure_at: number | null;
  last_success_at: number | null;
}

export interface SessionRow {
  id: string;
  provider: string;
  credential: string;
  usage_count: number;
  usage_cap: number;
  expires_at: number | null;
  last_used_at: number;
  created_at: number;
}

export interface ToggleRow {
  provider: string;
  name: string;
  kind: string;
  enabled: number;
}
