export { DispatchAbortedError, AllProvidersExhaustedError } from '@switchyard/fallback';

export type UnknownTarget = 'provider' | 'model';

/** The request names a provider or model the catalog does not serve. */
export class UnknownModelError extends Error {
  constructor(
    public readonly target: UnknownTarget,
    public readonly value: string,
  ) {
    super(target === 'provider' ? `Unknown provider "${value}"` : `Unknown model "${value}"`);
    this.name = 'UnknownModelError';
  }
}

export class InvalidDispatchRequestError extends Error {
  constructor(public readonly problems: string[]) {
    super(`Invalid dispatch request: ${problems.join('; ')}`);
    this.name = 'InvalidDispatchRequestError';
  }
}
