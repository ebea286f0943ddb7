/**
 * @switchyard/core - Provider failure taxonomy
 *
 * transient        timeout, connection refused, rate limited
 * permanent        auth rejected, provider disabled; skip the provider for this pass
 * session_expired  credential no longer accepted; refresh and retry once
 */

export type ProviderErrorKind = 'transient' | 'permanent' | 'session_expired';

export class ProviderError extends Error {
  constructor(
    message: string,
    public readonly kind: ProviderErrorKind = 'transient',
    public readonly provider?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'ProviderError';
  }

  static transient(message: string, provider?: string): ProviderError {
    return new ProviderError(message, 'transient', provider);
  }

  static permanent(message: string, provider?: string): ProviderError {
    return new ProviderError(message, 'permanent', provider);
  }

  static sessionExpired(message: string, provider?: string): ProviderError {
    return new ProviderError(message, 'session_expired', provider);
  }
}

export function isProviderError(err: unknown): err is ProviderError {
  return err instanceof ProviderError;
}

/** Kind of any thrown value. Anything that is not a ProviderError is transient. */
export function classifyError(err: unknown): ProviderErrorKind {
  return isProviderError(err) ? err.kind : 'transient';
}
