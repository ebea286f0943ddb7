/**
 * @switchyard/fallback - FailoverRouter
 *
 * Ranks candidates from the current health snapshot and tries them one at
 * a time until one succeeds. Every attempt is recorded to the health store
 * and, when a proxy carried it, to the proxy pool.
 *
 * ```ts
 * const router = new FailoverRouter({ health, toggles, proxies: pool });
 * const { value, candidate, attempts } = await router.route(candidates, async (ctx) => {
 *   return provider.invoke(request, { proxy: ctx.proxy, signal: ctx.signal });
 * });
 * ```
 */

import { performance } from 'node:perf_hooks';
import { classifyError, createLogger, errorMessage, type Logger, type ProviderErrorKind } from '@switchyard/core';
import { ProxyUnavailableError, type ProxyEndpoint } from '@switchyard/proxy';
import type { HealthStore, ToggleStore } from '@switchyard/store';
import { AllProvidersExhaustedError, AttemptTimeoutError, DispatchAbortedError } from './errors.js';
import { DEFAULT_BREAKER, DEFAULT_WEIGHTS, rankCandidates } from './ranking.js';
import type {
  AttemptExecutor,
  BreakerPolicy,
  Candidate,
  FailoverAttempt,
  FailoverRouterOptions,
  ProxySource,
  RankedCandidate,
  Ranking,
  RankingWeights,
  RouteOptions,
  RouteResult,
} from './types.js';

type AttemptOutcome<T> =
  | { ok: true; value: T; durationMs: number }
  | { ok: false; error: unknown; kind: ProviderErrorKind; durationMs: number };

// ---------------------------------------------------------------------------
// Timeout / abort helpers
// ---------------------------------------------------------------------------

/**
 * Race a promise against a timeout. Aborts `controller` and rejects with
 * AttemptTimeoutError when the timeout fires first.
 */
function withTimeout<T>(promise: Promise<T>, ms: number, key: string, controller: AbortController): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      const error = new AttemptTimeoutError(key, ms);
      controller.abort(error);
      reject(error);
    }, ms);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

/**
 * Reject with DispatchAbortedError as soon as `signal` fires. `work` keeps
 * running; only the caller stops waiting for it.
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new DispatchAbortedError(signal.reason));
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new DispatchAbortedError(signal.reason));
    signal.addEventListener('abort', onAbort, { once: true });

    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}

// ---------------------------------------------------------------------------
// FailoverRouter
// ---------------------------------------------------------------------------

export class FailoverRouter {
  private readonly health: HealthStore;
  private readonly toggles: ToggleStore;
  private readonly proxies: ProxySource | null;
  private readonly weights: RankingWeights;
  private readonly breaker: BreakerPolicy;
  private readonly timeoutMs: number;
  private readonly onFallback?: (from: string, to: string, reason: string) => void;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(options: FailoverRouterOptions) {
    this.health = options.health;
    this.toggles = options.toggles;
    this.proxies = options.proxies ?? null;
    this.weights = { ...DEFAULT_WEIGHTS, ...options.weights };
    this.breaker = { ...DEFAULT_BREAKER, ...options.breaker };
    this.timeoutMs = options.attemptTimeoutMs ?? 60_000;
    this.onFallback = options.onFallback;
    this.log = options.logger ?? createLogger('switchyard:fallback:router');
    this.now = options.now ?? Date.now;
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  /**
   * Order `candidates` for a pass without running anything.
   */
  async rank(candidates: readonly Candidate[]): Promise<Ranking> {
    const [health, enabled] = await Promise.all([this.health.readAll(), this.toggles.enabledProviders()]);
    return rankCandidates(candidates, health, enabled, this.weights, this.breaker, this.now());
  }

  /**
   * Run one failover pass. Resolves with the first successful result or
   * rejects with AllProvidersExhaustedError carrying every attempt.
   */
  async route<T>(
    candidates: readonly Candidate[],
    execute: AttemptExecutor<T>,
    options: RouteOptions = {},
  ): Promise<RouteResult<T>> {
    const { signal, refreshSession } = options;
    const passStart = performance.now();
    const { ranked, excluded } = await this.rank(candidates);

    if (excluded.length > 0) {
      this.log.debug(
        { excluded: excluded.map((c) => ({ key: c.key, reason: c.reason, retryAt: c.retryAt })) },
        'Candidates excluded from pass',
      );
    }

    const attempts: FailoverAttempt[] = [];
    // Providers that failed permanently in this pass.
    const skipped = new Set<string>();

    for (let i = 0; i < ranked.length; i++) {
      const candidate = ranked[i];
      if (!candidate) continue;

      if (skipped.has(candidate.provider)) {
        this.log.debug({ key: candidate.key }, 'Provider failed permanently this pass, skipping');
        continue;
      }

      if (signal?.aborted) {
        throw new DispatchAbortedError(signal.reason);
      }

      let outcome = await this.attempt(candidate, execute, false, attempts, signal);
      if (outcome.ok) {
        return { value: outcome.value, candidate, attempts, latencyMs: Math.round(performance.now() - passStart) };
      }

      if (outcome.kind === 'session_expired') {
        // Refresh and retry share one proxy so the new session's egress matches.
        const proxy = refreshSession ? await this.pickProxy() : null;
        if (refreshSession && (await this.refresh(candidate, proxy, refreshSession, attempts))) {
          outcome = await this.attempt(candidate, execute, true, attempts, signal, proxy);
          if (outcome.ok) {
            return {
              value: outcome.value,
              candidate,
              attempts,
              latencyMs: Math.round(performance.now() - passStart),
            };
          }
          if (outcome.kind !== 'transient') {
            skipped.add(candidate.provider);
          }
        } else {
          // A session that cannot be renewed is dead for this pass.
          skipped.add(candidate.provider);
        }
      } else if (outcome.kind === 'permanent') {
        skipped.add(candidate.provider);
      }

      const next = ranked.slice(i + 1).find((c) => !skipped.has(c.provider));
      if (next && this.onFallback) {
        this.onFallback(candidate.key, next.key, attempts.at(-1)?.reason ?? 'unknown');
      }
    }

    this.log.warn(
      { attempts: attempts.length, excluded: excluded.length, candidates: candidates.length },
      'All providers exhausted',
    );
    throw new AllProvidersExhaustedError(attempts, excluded);
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private async attempt<T>(
    candidate: RankedCandidate,
    execute: AttemptExecutor<T>,
    sessionRetry: boolean,
    attempts: FailoverAttempt[],
    signal: AbortSignal | undefined,
    proxy?: ProxyEndpoint | null,
  ): Promise<AttemptOutcome<T>> {
    const chosen = proxy === undefined ? await this.pickProxy() : proxy;
    const work = this.runAttempt(candidate, chosen, execute, sessionRetry, attempts);
    return signal ? untilAborted(work, signal) : work;
  }

  /**
   * Execute and record one attempt. Never rejects, so an attempt the caller
   * stopped waiting for still lands in the health store.
   */
  private async runAttempt<T>(
    candidate: RankedCandidate,
    proxy: ProxyEndpoint | null,
    execute: AttemptExecutor<T>,
    sessionRetry: boolean,
    attempts: FailoverAttempt[],
  ): Promise<AttemptOutcome<T>> {
    const controller = new AbortController();
    const start = performance.now();
    const base = {
      provider: candidate.provider,
      model: candidate.model,
      key: candidate.key,
      label: candidate.label,
      proxyId: proxy?.id ?? null,
      sessionRetry,
    };

    try {
      const value = await withTimeout(
        execute({ candidate, proxy, signal: controller.signal, sessionRetry }),
        this.timeoutMs,
        candidate.key,
        controller,
      );
      const durationMs = Math.round(performance.now() - start);
      await this.record(candidate.key, proxy, true, durationMs);
      attempts.push({ ...base, success: true, durationMs });
      this.log.info({ key: candidate.key, durationMs, halfOpen: candidate.halfOpen }, 'Provider succeeded');
      return { ok: true, value, durationMs };
    } catch (err) {
      const durationMs = Math.round(performance.now() - start);
      const kind = classifyError(err);
      const reason = errorMessage(err);
      await this.record(candidate.key, proxy, false, durationMs);
      attempts.push({ ...base, success: false, reason, kind, durationMs });
      this.log.warn({ key: candidate.key, durationMs, kind, error: reason }, 'Provider failed');
      return { ok: false, error: err, kind, durationMs };
    }
  }

  private async refresh(
    candidate: RankedCandidate,
    proxy: ProxyEndpoint | null,
    refreshSession: NonNullable<RouteOptions['refreshSession']>,
    attempts: FailoverAttempt[],
  ): Promise<boolean> {
    try {
      await refreshSession(candidate, proxy);
      this.log.info({ provider: candidate.provider }, 'Session refreshed, retrying');
      return true;
    } catch (err) {
      const reason = `session refresh failed: ${errorMessage(err)}`;
      attempts.push({
        provider: candidate.provider,
        model: candidate.model,
        key: candidate.key,
        label: candidate.label,
        success: false,
        reason,
        kind: classifyError(err),
        durationMs: 0,
        proxyId: proxy?.id ?? null,
        sessionRetry: true,
      });
      this.log.warn({ provider: candidate.provider, error: errorMessage(err) }, 'Session refresh failed');
      return false;
    }
  }

  private async pickProxy(): Promise<ProxyEndpoint | null> {
    if (!this.proxies) return null;
    try {
      return await this.proxies.select();
    } catch (err) {
      if (err instanceof ProxyUnavailableError) {
        this.log.debug('No proxy available, attempting direct');
        return null;
      }
      throw err;
    }
  }

  private async record(key: string, proxy: ProxyEndpoint | null, success: boolean, durationMs: number): Promise<void> {
    await this.health.recordOutcome(key, success, durationMs);
    if (!proxy || !this.proxies) return;

    try {
      await this.proxies.recordProbe(proxy.id, success, durationMs);
    } catch (err) {
      this.log.warn({ proxyId: proxy.id, error: errorMessage(err) }, 'Failed to record proxy outcome');
    }
  }
}
