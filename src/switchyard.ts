/**
 * Switchyard - wiring
 *
 * Builds every component from one configuration:
 *   1. Open the SQLite store and the health, session and toggle stores
 *   2. Seed provider toggles (missing rows only)
 *   3. Wrap disposable backends in controllers
 *   4. Create the proxy pool, failover router and orchestrator
 */

import {
  buildPaths,
  createLogger,
  loadConfig,
  type Logger,
  type ProviderCapability,
  type SwitchyardConfig,
} from '@switchyard/core';
import {
  DisposableProvider,
  DisposableSessionController,
  type DisposableBackend,
  type DisposableProviderInfo,
} from '@switchyard/disposable';
import { FailoverRouter, type FailoverRouterOptions } from '@switchyard/fallback';
import { ProxyPool, createHttpProber, type ProxyProber } from '@switchyard/proxy';
import {
  SqliteHealthStore,
  SqliteSessionStore,
  SqliteToggleStore,
  SwitchyardDatabase,
  type ProviderToggle,
} from '@switchyard/store';
import { AdminService } from './admin.js';
import { Orchestrator, SessionBroker, buildCatalog } from './orchestrator/index.js';
import { ProviderRegistry } from './providers/index.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DisposableProviderSpec extends DisposableProviderInfo {
  id: string;
  backend: DisposableBackend;
}

export interface SwitchyardOptions {
  config: SwitchyardConfig;
  providers?: readonly ProviderCapability[];
  disposable?: readonly DisposableProviderSpec[];
  /** Defaults to `config.database.path`, then the state directory. */
  database?: SwitchyardDatabase;
  prober?: ProxyProber;
  onFallback?: FailoverRouterOptions['onFallback'];
  now?: () => number;
  logger?: Logger;
}

export interface Switchyard {
  config: SwitchyardConfig;
  database: SwitchyardDatabase;
  registry: ProviderRegistry;
  orchestrator: Orchestrator;
  admin: AdminService;
  proxies: ProxyPool | null;
  disposables: ReadonlyMap<string, DisposableSessionController>;
  close(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

export async function createSwitchyard(options: SwitchyardOptions): Promise<Switchyard> {
  const { config, now } = options;
  const log = options.logger ?? createLogger('switchyard');

  const database = options.database ?? new SwitchyardDatabase(config.database.path ?? buildPaths().database);
  const health = new SqliteHealthStore(database, { now });
  const sessionStore = new SqliteSessionStore(database, { now });
  const toggles = new SqliteToggleStore(database, { now });

  // ---- Providers ----

  const disposables = new Map<string, DisposableSessionController>();
  const registry = new ProviderRegistry(options.providers ?? []);

  for (const spec of options.disposable ?? []) {
    const controller = new DisposableSessionController(spec.id, spec.backend, {
      maxMessages: config.disposable.maxMessages,
      resetConversationBetweenMessages: config.disposable.resetConversationBetweenMessages,
      cleanupRetries: config.disposable.cleanupRetries,
      sessions: sessionStore,
      now,
    });
    disposables.set(spec.id, controller);
    registry.register(new DisposableProvider(controller, spec));
  }

  // Configured entries win; providers the config does not mention start enabled.
  const declared = new Set(config.providers.map((p) => p.id));
  const seeds: ProviderToggle[] = [
    ...config.providers.map((p) => ({ provider: p.id, name: p.name, kind: p.kind, enabled: p.enabled })),
    ...registry
      .list()
      .filter((p) => !declared.has(p.id))
      .map((p) => ({ provider: p.id, name: p.name, kind: p.kind, enabled: true })),
  ];
  await toggles.seed(seeds);

  for (const entry of config.providers) {
    if (!registry.has(entry.id)) {
      log.warn({ provider: entry.id }, 'Provider configured but not registered');
    }
  }

  // ---- Routing ----

  const proxies = config.proxy.enabled
    ? new ProxyPool(database, {
        failureThreshold: config.proxy.failureThreshold,
        demoteAfter: config.proxy.demoteAfter,
        probeTimeoutMs: config.proxy.probeTimeoutMs,
        prober: options.prober ?? createHttpProber(config.proxy.testUrl),
        now,
      })
    : null;

  const router = new FailoverRouter({
    health,
    toggles,
    proxies,
    weights: config.router.weights,
    breaker: config.router.breaker,
    attemptTimeoutMs: config.router.attemptTimeoutMs,
    onFallback: options.onFallback,
    now,
  });

  const catalog = buildCatalog(config.catalog, registry.list());
  const dropped = config.catalog.length - catalog.length;
  if (config.catalog.length > 0 && dropped > 0) {
    log.warn({ dropped }, 'Catalog entries for unregistered providers ignored');
  }

  const orchestrator = new Orchestrator({
    router,
    registry,
    sessions: new SessionBroker(sessionStore, config.sessions, { now }),
    catalog,
    sessionOpenTimeoutMs: config.router.attemptTimeoutMs,
  });

  const admin = new AdminService({
    orchestrator,
    health,
    toggles,
    sessions: sessionStore,
    proxies,
    disposables,
  });

  log.info(
    { providers: registry.list().length, catalog: catalog.length, disposable: disposables.size, proxies: proxies !== null },
    'Switchyard ready',
  );

  return {
    config,
    database,
    registry,
    orchestrator,
    admin,
    proxies,
    disposables,
    async close() {
      await Promise.all(Array.from(disposables.values(), (c) => c.shutdown()));
      database.close();
      log.info('Switchyard closed');
    },
  };
}

/**
 * Load switchyard.json (created with defaults when missing) and build the
 * engine from it. Validation problems are logged; the engine still starts
 * on the defaulted configuration.
 */
export async function startSwitchyard(
  options: Omit<SwitchyardOptions, 'config'> & { configPath?: string },
): Promise<Switchyard> {
  const log = options.logger ?? createLogger('switchyard');
  const { config, validation } = loadConfig(options.configPath);

  if (!validation.valid) {
    for (const err of validation.errors) {
      log.error({ path: err.path, message: err.message }, 'Config validation error');
    }
  }
  for (const warn of validation.warnings) {
    log.warn({ path: warn.path, message: warn.message }, 'Config warning');
  }

  return createSwitchyard({ ...options, config });
}
