export type ResetStep = 'start';

/**
 * The new identity could not be brought up. The controller stays in the
 * `resetting` state and the next dispatch retries the reset.
 */
export class DisposableResetError extends Error {
  constructor(
    public readonly provider: string,
    public readonly step: ResetStep,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Disposable reset for ${provider} failed at ${step}: ${detail}`, { cause });
    this.name = 'DisposableResetError';
  }
}
