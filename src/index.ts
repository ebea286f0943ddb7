/**
 * Switchyard - provider orchestration and session lifecycle engine
 *
 * One uniform interface over unreliable chat providers: health-ranked
 * failover, persisted sessions within usage limits, disposable identities
 * and an outbound proxy pool.
 *
 * @packageDocumentation
 */

export { createSwitchyard, startSwitchyard, type Switchyard, type SwitchyardOptions, type DisposableProviderSpec } from './switchyard.js';
export * from './orchestrator/index.js';
export { AdminService, type AdminServiceOptions, type SessionSummary } from './admin.js';
export * from './providers/index.js';

export * from '@switchyard/core';
export * from '@switchyard/store';
export * from '@switchyard/proxy';
export * from '@switchyard/disposable';
export {
  FailoverRouter,
  rankCandidates,
  score,
  breakerOpenUntil,
  DEFAULT_WEIGHTS,
  DEFAULT_BREAKER,
  AttemptTimeoutError,
  type Candidate,
  type RankedCandidate,
  type ExclusionReason,
  type ExcludedCandidate,
  type Ranking,
  type RankingWeights,
  type BreakerPolicy,
  type FailoverAttempt,
  type AttemptContext,
  type AttemptExecutor,
  type RouteOptions,
  type RouteResult,
  type ProxySource,
  type FailoverRouterOptions,
} from '@switchyard/fallback';
