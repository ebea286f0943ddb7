/**
 * @switchyard/core - TypeBox schema for switchyard.json
 *
 * Sections: database, router, sessions, disposable, proxy, providers, catalog
 */

import { Type, type Static } from '@sinclair/typebox';

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

export const ProviderKindSchema = Type.Union([
  Type.Literal('api'),
  Type.Literal('browser'),
  Type.Literal('terminal'),
]);
export type ProviderKind = Static<typeof ProviderKindSchema>;

const DatabaseSchema = Type.Object({
  path: Type.Optional(Type.String({ description: 'SQLite file; ":memory:" for a throwaway store' })),
});

const RouterSchema = Type.Object({
  weights: Type.Object({
    failureStreak: Type.Number({ minimum: 0, default: 10 }),
    successRate: Type.Number({ minimum: 0, default: 100 }),
    latency: Type.Number({ minimum: 0, default: 0.001, description: 'Penalty per ms of average latency' }),
  }),
  breaker: Type.Object({
    threshold: Type.Number({ minimum: 1, default: 5 }),
    cooldownMs: Type.Number({ minimum: 0, default: 60_000 }),
  }),
  attemptTimeoutMs: Type.Number({ minimum: 1, default: 60_000 }),
});

const SessionPolicySchema = Type.Object({
  usageCap: Type.Optional(Type.Number({ minimum: 1 })),
  ttlHours: Type.Optional(Type.Number({ minimum: 0 })),
});

const SessionsSchema = Type.Object({
  defaultUsageCap: Type.Number({ minimum: 1, default: 50 }),
  defaultTtlHours: Type.Number({ minimum: 0, default: 24 }),
  providers: Type.Record(Type.String(), SessionPolicySchema, { default: {} }),
});

const DisposableSchema = Type.Object({
  maxMessages: Type.Number({ minimum: 1, default: 20 }),
  resetConversationBetweenMessages: Type.Boolean({ default: true }),
  cleanupRetries: Type.Number({ minimum: 0, default: 2 }),
});

const ProxySchema = Type.Object({
  enabled: Type.Boolean({ default: true }),
  failureThreshold: Type.Number({ minimum: 1, default: 3 }),
  demoteAfter: Type.Number({ minimum: 1, default: 10 }),
  testUrl: Type.String({ default: 'http://httpbin.org/ip' }),
  probeTimeoutMs: Type.Number({ minimum: 1, default: 5000 }),
});

const ProviderEntrySchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  name: Type.String(),
  kind: ProviderKindSchema,
  enabled: Type.Boolean({ default: true }),
});

const CatalogEntrySchema = Type.Object({
  label: Type.String({ minLength: 1, description: 'Public model name, e.g. hf-llama-3.3-70b' }),
  provider: Type.String({ minLength: 1 }),
  model: Type.String({ minLength: 1, description: 'Provider-specific model id' }),
});
export type CatalogEntry = Static<typeof CatalogEntrySchema>;

// ---------------------------------------------------------------------------
// Root config schema
// ---------------------------------------------------------------------------

export const SwitchyardConfigSchema = Type.Object({
  $schema: Type.Optional(Type.String()),
  version: Type.Number({ default: 1 }),
  database: DatabaseSchema,
  router: RouterSchema,
  sessions: SessionsSchema,
  disposable: DisposableSchema,
  proxy: ProxySchema,
  providers: Type.Array(ProviderEntrySchema, { default: [] }),
  catalog: Type.Array(CatalogEntrySchema, { default: [] }),
});

export type SwitchyardConfig = Static<typeof SwitchyardConfigSchema>;
export type RouterConfig = SwitchyardConfig['router'];
export type SessionsConfig = SwitchyardConfig['sessions'];
export type DisposableConfig = SwitchyardConfig['disposable'];
export type ProxyConfig = SwitchyardConfig['proxy'];
export type ProviderEntry = SwitchyardConfig['providers'][number];

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: SwitchyardConfig = {
  version: 1,
  database: {},
  router: {
    weights: { failureStreak: 10, successRate: 100, latency: 0.001 },
    breaker: { threshold: 5, cooldownMs: 60_000 },
    attemptTimeoutMs: 60_000,
  },
  sessions: {
    defaultUsageCap: 50,
    defaultTtlHours: 24,
    providers: {},
  },
  disposable: {
    maxMessages: 20,
    resetConversationBetweenMessages: true,
    cleanupRetries: 2,
  },
  proxy: {
    enabled: true,
    failureThreshold: 3,
    demoteAfter: 10,
    testUrl: 'http://httpbin.org/ip',
    probeTimeoutMs: 5000,
  },
  providers: [],
  catalog: [],
};
