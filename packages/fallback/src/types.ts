/**
 * @switchyard/fallback - Types
 */

import type { Logger, ProviderErrorKind } from '@switchyard/core';
import type { ProxyEndpoint } from '@switchyard/proxy';
import type { HealthStore, ProviderHealth, ToggleStore } from '@switchyard/store';

/** One provider/model pair the router may try. */
export interface Candidate {
  provider: string;
  /** Provider-specific model id. */
  model: string;
  /** Health key, `provider/model`. */
  key: string;
  /** Public catalog label. */
  label: string;
}

export interface RankedCandidate extends Candidate {
  score: number;
  health: ProviderHealth;
  /** Breaker cooled down; admitted at the bottom for one probe. */
  halfOpen: boolean;
}

export type ExclusionReason = 'disabled' | 'circuit_open';

export interface ExcludedCandidate extends Candidate {
  reason: ExclusionReason;
  /** When an open breaker admits the candidate again. */
  retryAt: number | null;
}

export interface Ranking {
  ranked: RankedCandidate[];
  excluded: ExcludedCandidate[];
}

export interface RankingWeights {
  /** Penalty per consecutive failure. */
  failureStreak: number;
  /** Multiplier for s / (s + f + 1). */
  successRate: number;
  /** Penalty per ms of average latency. */
  latency: number;
}

export interface BreakerPolicy {
  threshold: number;
  cooldownMs: number;
}

/** Record of a single attempt within a failover pass. */
export interface FailoverAttempt {
  provider: string;
  model: string;
  key: string;
  label: string;
  success: boolean;
  reason?: string;
  kind?: ProviderErrorKind;
  durationMs: number;
  proxyId: number | null;
  /** Second try after a session refresh. */
  sessionRetry: boolean;
}

export interface AttemptContext {
  candidate: RankedCandidate;
  proxy: ProxyEndpoint | null;
  /** Aborted when the attempt times out. Caller cancellation does not abort it. */
  signal: AbortSignal;
  sessionRetry: boolean;
}

export type AttemptExecutor<T> = (ctx: AttemptContext) => Promise<T>;

export interface RouteOptions {
  /** Caller cancellation for this pass only. */
  signal?: AbortSignal;
  /**
   * Replace the candidate's session after a session_expired failure. `proxy`
   * is the one the retry will use.
   */
  refreshSession?: (candidate: RankedCandidate, proxy: ProxyEndpoint | null) => Promise<void>;
}

export interface RouteResult<T> {
  value: T;
  candidate: RankedCandidate;
  attempts: FailoverAttempt[];
  latencyMs: number;
}

/** The slice of ProxyPool the router reports to. */
export interface ProxySource {
  select(): Promise<ProxyEndpoint>;
  recordProbe(id: number, success: boolean, latencyMs: number): Promise<ProxyEndpoint | null>;
}

export interface FailoverRouterOptions {
  health: HealthStore;
  toggles: ToggleStore;
  proxies?: ProxySource | null;
  weights?: Partial<RankingWeights>;
  breaker?: Partial<BreakerPolicy>;
  /** Per-attempt timeout (default 60 000). */
  attemptTimeoutMs?: number;
  /** Called whenever the pass moves from one candidate to the next. */
  onFallback?: (from: string, to: string, reason: string) => void;
  logger?: Logger;
  now?: () => number;
}
