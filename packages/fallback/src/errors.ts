/**
 * @switchyard/fallback - Router errors
 */

import type { ExcludedCandidate, FailoverAttempt } from './types.js';

export class AttemptTimeoutError extends Error {
  constructor(
    public readonly key: string,
    public readonly timeoutMs: number,
  ) {
    super(`Provider "${key}" timed out after ${timeoutMs}ms`);
    this.name = 'AttemptTimeoutError';
  }
}

/**
 * Every eligible candidate failed. Carries the ordered attempt trail and
 * the candidates that were never tried.
 */
export class AllProvidersExhaustedError extends Error {
  constructor(
    public readonly attempts: FailoverAttempt[],
    public readonly excluded: ExcludedCandidate[] = [],
  ) {
    const last = attempts.at(-1);
    super(
      attempts.length === 0
        ? `No eligible provider (${excluded.length} excluded)`
        : `All ${attempts.length} attempts failed. Last error: ${last?.reason ?? 'unknown'}`,
    );
    this.name = 'AllProvidersExhaustedError';
  }
}

/** The caller cancelled the request. */
export class DispatchAbortedError extends Error {
  constructor(reason?: unknown) {
    super(reason instanceof Error ? `Dispatch aborted: ${reason.message}` : 'Dispatch aborted', { cause: reason });
    this.name = 'DispatchAbortedError';
  }
}
