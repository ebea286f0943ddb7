/**
 * @switchyard/fallback - Health-ranked failover router
 *
 * Public API surface:
 *   - FailoverRouter  (router.ts)  -- sequential failover pass with health recording
 *   - rankCandidates  (ranking.ts) -- scoring and circuit breaker
 *   - Errors          (errors.ts)
 *   - All types       (types.ts)
 */

export { FailoverRouter } from './router.js';
export { rankCandidates, score, breakerOpenUntil, DEFAULT_WEIGHTS, DEFAULT_BREAKER } from './ranking.js';
export { AttemptTimeoutError, AllProvidersExhaustedError, DispatchAbortedError } from './errors.js';
export { ProviderError, isProviderError, classifyError, type ProviderErrorKind } from '@switchyard/core';
export type {
  Candidate,
  RankedCandidate,
  ExclusionReason,
  ExcludedCandidate,
  Ranking,
  RankingWeights,
  BreakerPolicy,
  FailoverAttempt,
  AttemptContext,
  AttemptExecutor,
  RouteOptions,
  RouteResult,
  ProxySource,
  FailoverRouterOptions,
} from './types.js';
