/**
 * Session broker: hands providers a valid credential, opening and saving a
 * new one when the stored session is missing or spent.
 */

import {
  createLogger,
  errorMessage,
  type CredentialBlob,
  type Logger,
  type ProviderCapability,
  type SessionOpenContext,
  type SessionsConfig,
} from '@switchyard/core';
import type { SessionStore } from '@switchyard/store';

const HOUR_MS = 3_600_000;

export interface SessionPolicyResult {
  usageCap: number;
  expiresAt: number | null;
}

export class SessionBroker {
  private readonly log: Logger;
  private readonly now: () => number;
  /** In-flight opens by provider id; concurrent callers share one login. */
  private readonly opening = new Map<string, Promise<CredentialBlob>>();

  constructor(
    private readonly store: SessionStore,
    private readonly config: SessionsConfig,
    options: { logger?: Logger; now?: () => number } = {},
  ) {
    this.log = options.logger ?? createLogger('switchyard:orchestrator:sessions');
    this.now = options.now ?? Date.now;
  }

  /**
   * Cap and expiry for a new session. Configuration overrides the
   * provider's own policy, which overrides the global defaults.
   */
  policyFor(provider: ProviderCapability): SessionPolicyResult {
    const configured = this.config.providers[provider.id];
    const usageCap = configured?.usageCap ?? provider.session?.usageCap ?? this.config.defaultUsageCap;
    const ttlHours = configured?.ttlHours ?? provider.session?.ttlHours ?? this.config.defaultTtlHours;
    return {
      usageCap,
      expiresAt: ttlHours > 0 ? this.now() + ttlHours * HOUR_MS : null,
    };
  }

  async acquire(provider: ProviderCapability, ctx: SessionOpenContext): Promise<CredentialBlob> {
    const existing = await this.store.getValid(provider.id);
    if (existing) {
      return existing.credential;
    }
    return this.open(provider, ctx);
  }

  async recordUse(providerId: string): Promise<void> {
    await this.store.incrementUsage(providerId);
  }

  /**
   * Drop the stored session, close its credential and open a fresh one.
   */
  async refresh(provider: ProviderCapability, ctx: SessionOpenContext): Promise<void> {
    const old = await this.store.get(provider.id);
    await this.store.delete(provider.id);

    if (old) {
      try {
        await provider.closeSession(old.credential);
      } catch (err) {
        this.log.warn({ provider: provider.id, sessionId: old.id, error: errorMessage(err) }, 'Closing expired session failed');
      }
    }

    await this.open(provider, ctx);
  }

  private open(provider: ProviderCapability, ctx: SessionOpenContext): Promise<CredentialBlob> {
    const inFlight = this.opening.get(provider.id);
    if (inFlight) {
      return inFlight;
    }

    const pending = this.openAndStore(provider, ctx).finally(() => {
      this.opening.delete(provider.id);
    });
    this.opening.set(provider.id, pending);
    return pending;
  }

  private async openAndStore(provider: ProviderCapability, ctx: SessionOpenContext): Promise<CredentialBlob> {
    const credential = await provider.openSession(ctx);
    const policy = this.policyFor(provider);
    const sessionId = await this.store.upsert(provider.id, credential, policy);
    this.log.info({ provider: provider.id, sessionId, ...policy }, 'Opened new provider session');
    return credential;
  }
}
