/**
 * @switchyard/core - Common utilities
 *
 * Shared helper functions used across the Switchyard packages.
 */

import { randomBytes } from 'node:crypto';

// ---------------------------------------------------------------------------
// Async helpers
// ---------------------------------------------------------------------------

/**
 * Sleep for a given number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Retry a function with exponential backoff.
 *
 * @returns The result of the function
 * @throws The last error if all retries are exhausted
 */
export async function retry<T>(
  fn: () => Promise<T>,
  options: {
    maxRetries?: number;
    initialDelayMs?: number;
    maxDelayMs?: number;
    backoffMultiplier?: number;
    onRetry?: (error: Error, attempt: number) => void;
  } = {},
): Promise<T> {
  const {
    maxRetries = 3,
    initialDelayMs = 1000,
    maxDelayMs = 30000,
    backoffMultiplier = 2,
    onRetry,
  } = options;

  let lastError: Error | undefined;
  let delay = initialDelayMs;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));

      if (attempt < maxRetries) {
        onRetry?.(lastError, attempt + 1);

        if (delay > 0) {
          // Add jitter: +/- 25% of delay
          const jitter = delay * 0.25 * (Math.random() * 2 - 1);
          await sleep(Math.min(delay + jitter, maxDelayMs));
        }

        delay = Math.min(delay * backoffMultiplier, maxDelayMs);
      }
    }
  }

  throw lastError ?? new Error('retry() exhausted without an error');
}

/**
 * Normalise any thrown value into a message string.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Random tokens
// ---------------------------------------------------------------------------

/**
 * Lower-case hex token of exactly `length` characters.
 */
export function randomHex(length: number): string {
  return randomBytes(Math.ceil(length / 2)).toString('hex').slice(0, length);
}

// ---------------------------------------------------------------------------
// Model keys
// ---------------------------------------------------------------------------

/**
 * Build the health key for a provider/model pair.
 */
export function modelKey(provider: string, model: string): string {
  return `${provider}/${model}`;
}

// ---------------------------------------------------------------------------
// Object helpers
// ---------------------------------------------------------------------------

/**
 * Check if a value is a non-null object (not an array).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
