/**
 * @switchyard/core - Request and response types shared by the router,
 * the disposable controller and the orchestration facade.
 */

import { Type, type Static } from '@sinclair/typebox';

// ---------------------------------------------------------------------------
// Logical request
// ---------------------------------------------------------------------------

export const DispatchRequestSchema = Type.Object({
  prompt: Type.String({ minLength: 1 }),
  systemPrompt: Type.Optional(Type.String()),
  /** Catalog label or provider model id. Omitted or "auto" means any model. */
  model: Type.Optional(Type.String({ minLength: 1 })),
  /** Provider id. Omitted or "auto" means any provider. */
  provider: Type.Optional(Type.String({ minLength: 1 })),
});
export type DispatchRequest = Static<typeof DispatchRequestSchema>;

/** What a single provider invocation receives. */
export interface ProviderRequest {
  prompt: string;
  systemPrompt?: string;
  /** Provider-specific model id. */
  model: string;
}

/** What a single provider invocation returns. */
export interface ProviderResponse {
  content: string;
  /** Model id the provider reports having used, when it differs. */
  model?: string;
}

export type {
  JsonValue,
  CredentialBlob,
  ProxyHandle,
  ProviderContext,
  SessionOpenContext,
  SessionPolicy,
  ProviderCapability,
} from './provider.js';
