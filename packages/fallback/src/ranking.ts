/**
 * @switchyard/fallback - Candidate ranking
 *
 *   score = -consecutiveFailures * W1 + s / (s + f + 1) * W2 - avgLatencyMs * W3
 *
 * A tripped breaker (streak >= threshold) excludes the candidate until
 * `cooldownMs` after its last failure; afterwards it is ranked below every
 * closed candidate until one outcome resets or re-trips it.
 */

import { emptyHealth, type ProviderHealth } from '@switchyard/store';
import type {
  BreakerPolicy,
  Candidate,
  ExcludedCandidate,
  RankedCandidate,
  Ranking,
  RankingWeights,
} from './types.js';

export const DEFAULT_WEIGHTS: RankingWeights = {
  failureStreak: 10,
  successRate: 100,
  latency: 0.001,
};

export const DEFAULT_BREAKER: BreakerPolicy = {
  threshold: 5,
  cooldownMs: 60_000,
};

export function score(health: ProviderHealth, weights: RankingWeights): number {
  const s = health.successCount;
  const f = health.failureCount;
  return (
    -health.consecutiveFailures * weights.failureStreak +
    (s / (s + f + 1)) * weights.successRate -
    health.avgLatencyMs * weights.latency
  );
}

/** Time at which an open breaker admits the candidate again, or null when closed. */
export function breakerOpenUntil(health: ProviderHealth, breaker: BreakerPolicy): number | null {
  if (health.consecutiveFailures < breaker.threshold || health.lastFailureAt === null) {
    return null;
  }
  return health.lastFailureAt + breaker.cooldownMs;
}

export function rankCandidates(
  candidates: readonly Candidate[],
  health: ReadonlyMap<string, ProviderHealth>,
  enabled: ReadonlySet<string>,
  weights: RankingWeights,
  breaker: BreakerPolicy,
  now: number,
): Ranking {
  const closed: RankedCandidate[] = [];
  const halfOpen: RankedCandidate[] = [];
  const excluded: ExcludedCandidate[] = [];

  for (const candidate of candidates) {
    if (!enabled.has(candidate.provider)) {
      excluded.push({ ...candidate, reason: 'disabled', retryAt: null });
      continue;
    }

    const h = health.get(candidate.key) ?? emptyHealth(candidate.key);
    const openUntil = breakerOpenUntil(h, breaker);

    if (openUntil !== null && now < openUntil) {
      excluded.push({ ...candidate, reason: 'circuit_open', retryAt: openUntil });
      continue;
    }

    const tripped = h.consecutiveFailures >= breaker.threshold;
    const ranked: RankedCandidate = { ...candidate, score: score(h, weights), health: h, halfOpen: tripped };
    (tripped ? halfOpen : closed).push(ranked);
  }

  // Array#sort is stable, so equal scores keep catalog order.
  const byScore = (a: RankedCandidate, b: RankedCandidate) => b.score - a.score;
  return {
    ranked: [...closed.sort(byScore), ...halfOpen.sort(byScore)],
    excluded,
  };
}
