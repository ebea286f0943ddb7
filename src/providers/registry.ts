/**
 * Registry of provider capabilities keyed by provider id.
 */

import { createLogger, type Logger, type ProviderCapability } from '@switchyard/core';

export class ProviderNotRegisteredError extends Error {
  constructor(public readonly provider: string) {
    super(`Provider "${provider}" is not registered`);
    this.name = 'ProviderNotRegisteredError';
  }
}

export class ProviderRegistry {
  private readonly providers = new Map<string, ProviderCapability>();
  private readonly log: Logger;

  constructor(providers: readonly ProviderCapability[] = [], logger?: Logger) {
    this.log = logger ?? createLogger('switchyard:providers:registry');
    for (const provider of providers) {
      this.register(provider);
    }
  }

  /**
   * Register (or replace) a provider.
   */
  register(provider: ProviderCapability): void {
    if (this.providers.has(provider.id)) {
      this.log.warn({ provider: provider.id }, 'Replacing registered provider');
    }
    this.providers.set(provider.id, provider);
    this.log.info(
      { provider: provider.id, kind: provider.kind, models: provider.models.length, session: provider.session !== undefined },
      'Registered provider',
    );
  }

  get(id: string): ProviderCapability | undefined {
    return this.providers.get(id);
  }

  require(id: string): ProviderCapability {
    const provider = this.providers.get(id);
    if (!provider) {
      throw new ProviderNotRegisteredError(id);
    }
    return provider;
  }

  has(id: string): boolean {
    return this.providers.has(id);
  }

  list(): ProviderCapability[] {
    return Array.from(this.providers.values());
  }
}
