/**
 * Orchestrator - the single entry point callers use.
 *
 * Resolves a logical request to catalog candidates, runs one failover pass
 * over them, and takes care of provider sessions along the way: a stored
 * credential is reused until it is spent, a missing one is opened and
 * saved, and a session_expired failure replaces it before one retry.
 */

import { performance } from 'node:perf_hooks';
import { Value } from '@sinclair/typebox/value';
import {
  DispatchRequestSchema,
  ProviderError,
  createLogger,
  type CatalogEntry,
  type DispatchRequest,
  type Logger,
  type ProviderResponse,
  type ProxyHandle,
} from '@switchyard/core';
import {
  AllProvidersExhaustedError,
  type AttemptContext,
  type Candidate,
  type FailoverAttempt,
  type FailoverRouter,
  type RankedCandidate,
  type Ranking,
} from '@switchyard/fallback';
import { proxyUrl, type ProxyEndpoint } from '@switchyard/proxy';
import type { ProviderRegistry } from '../providers/registry.js';
import { resolveCandidates } from './catalog.js';
import { InvalidDispatchRequestError } from './errors.js';
import type { SessionBroker } from './sessions.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DispatchResult {
  content: string;
  provider: string;
  model: string;
  label: string;
  attempts: FailoverAttempt[];
  latencyMs: number;
}

export interface DispatchOptions {
  /** Cancels this request only. */
  signal?: AbortSignal;
}

export type LivenessStatus = 'ok' | 'failed' | 'skipped';

export interface LivenessResult {
  label: string;
  provider: string;
  model: string;
  key: string;
  status: LivenessStatus;
  latencyMs: number | null;
  error?: string;
}

export interface OrchestratorOptions {
  router: FailoverRouter;
  registry: ProviderRegistry;
  sessions: SessionBroker;
  catalog: readonly CatalogEntry[];
  /** Budget for opening a replacement session (default 60 000). */
  sessionOpenTimeoutMs?: number;
  logger?: Logger;
}

function toHandle(proxy: ProxyEndpoint | null): ProxyHandle | null {
  return proxy ? { id: proxy.id, url: proxyUrl(proxy) } : null;
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class Orchestrator {
  private readonly router: FailoverRouter;
  private readonly registry: ProviderRegistry;
  private readonly sessions: SessionBroker;
  private readonly catalog: readonly CatalogEntry[];
  private readonly sessionOpenTimeoutMs: number;
  private readonly log: Logger;

  constructor(options: OrchestratorOptions) {
    this.router = options.router;
    this.registry = options.registry;
    this.sessions = options.sessions;
    this.catalog = options.catalog;
    this.sessionOpenTimeoutMs = options.sessionOpenTimeoutMs ?? 60_000;
    this.log = options.logger ?? createLogger('switchyard:orchestrator');
  }

  /**
   * Serve one request. Throws UnknownModelError for an unserved
   * provider/model and AllProvidersExhaustedError, unchanged, when every
   * candidate fails.
   */
  async dispatch(request: DispatchRequest, options: DispatchOptions = {}): Promise<DispatchResult> {
    if (!Value.Check(DispatchRequestSchema, request)) {
      const problems = [...Value.Errors(DispatchRequestSchema, request)].map(
        (e) => `${e.path || '/'}: ${e.message}`,
      );
      throw new InvalidDispatchRequestError(problems);
    }

    const candidates = resolveCandidates(request, this.catalog);
    const result = await this.router.route(candidates, (ctx) => this.execute(request, ctx), {
      signal: options.signal,
      refreshSession: (candidate, proxy) => this.refreshSession(candidate, proxy),
    });

    this.log.info(
      { label: result.candidate.label, key: result.candidate.key, attempts: result.attempts.length, latencyMs: result.latencyMs },
      'Dispatch served',
    );

    return {
      content: result.value.content,
      provider: result.candidate.provider,
      model: result.value.model ?? result.candidate.model,
      label: result.candidate.label,
      attempts: result.attempts,
      latencyMs: result.latencyMs,
    };
  }

  /**
   * Ranking the router would use for `request` right now.
   */
  async preview(request: Pick<DispatchRequest, 'provider' | 'model'> = {}): Promise<Ranking> {
    return this.router.rank(resolveCandidates(request, this.catalog));
  }

  /**
   * Send a short prompt to every catalog entry in parallel. Outcomes land
   * in the health store like any other attempt.
   */
  async testAll(prompt = 'Reply with OK.'): Promise<LivenessResult[]> {
    if (this.catalog.length === 0) {
      return [];
    }

    const candidates = resolveCandidates({}, this.catalog);
    this.log.info({ candidates: candidates.length }, 'Testing all catalog entries');
    const results = await Promise.all(candidates.map((c) => this.probe(c, prompt)));

    const ok = results.filter((r) => r.status === 'ok').length;
    this.log.info({ ok, total: results.length }, 'Liveness sweep finished');
    return results;
  }

  // -----------------------------------------------------------------------
  // Internals
  // -----------------------------------------------------------------------

  private async execute(request: DispatchRequest, ctx: AttemptContext): Promise<ProviderResponse> {
    const provider = this.registry.require(ctx.candidate.provider);
    const proxy = toHandle(ctx.proxy);

    const credential = provider.session ? await this.sessions.acquire(provider, { proxy, signal: ctx.signal }) : null;

    const response = await provider.invoke(
      { prompt: request.prompt, systemPrompt: request.systemPrompt, model: ctx.candidate.model },
      { credential, proxy, signal: ctx.signal },
    );

    if (response.content.trim() === '') {
      throw ProviderError.transient(`Provider "${provider.id}" returned an empty response`, provider.id);
    }

    if (provider.session) {
      await this.sessions.recordUse(provider.id);
    }
    return response;
  }

  private async refreshSession(candidate: RankedCandidate, proxy: ProxyEndpoint | null): Promise<void> {
    const provider = this.registry.require(candidate.provider);
    if (!provider.session) {
      throw new Error(`Provider "${provider.id}" reported an expired session but keeps none`);
    }
    await this.sessions.refresh(provider, {
      proxy: toHandle(proxy),
      signal: AbortSignal.timeout(this.sessionOpenTimeoutMs),
    });
  }

  private async probe(candidate: Candidate, prompt: string): Promise<LivenessResult> {
    const base = { label: candidate.label, provider: candidate.provider, model: candidate.model, key: candidate.key };

    try {
      const result = await this.router.route([candidate], (ctx) => this.execute({ prompt }, ctx), {
        refreshSession: (c, proxy) => this.refreshSession(c, proxy),
      });
      return { ...base, status: 'ok', latencyMs: result.attempts.at(-1)?.durationMs ?? result.latencyMs };
    } catch (err) {
      if (!(err instanceof AllProvidersExhaustedError)) {
        throw err;
      }
      const last = err.attempts.at(-1);
      if (!last) {
        return { ...base, status: 'skipped', latencyMs: null, error: err.excluded[0]?.reason ?? 'excluded' };
      }
      return { ...base, status: 'failed', latencyMs: last.durationMs, error: last.reason };
    }
  }
}
