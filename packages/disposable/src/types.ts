/**
 * @switchyard/disposable - Types
 */

import type { Logger, ProviderRequest, ProviderResponse } from '@switchyard/core';
import type { SessionStore } from '@switchyard/store';
import type { DeviceIdentity } from './identity.js';

export type DisposableState = 'uninitialized' | 'active' | 'resetting';

/**
 * The underlying connection a disposable provider drives (a browser page,
 * a terminal process). Implemented per provider.
 */
export interface DisposableBackend {
  /** Bring up a connection presenting `identity`. */
  start(identity: DeviceIdentity): Promise<void>;
  /** Close the connection. Called before every reset. */
  stop(): Promise<void>;
  /** Start a new conversation so no earlier turn leaks into the next message. */
  resetConversation(): Promise<void>;
  send(request: ProviderRequest, signal?: AbortSignal): Promise<ProviderResponse>;
  /** Delete caches, temp files and anything else tied to `identity`. */
  purgeArtifacts(identity: DeviceIdentity): Promise<void>;
}

export interface DisposableControllerOptions {
  maxMessages?: number;
  resetConversationBetweenMessages?: boolean;
  /** Extra attempts per cleanup step before it is logged and skipped. */
  cleanupRetries?: number;
  cleanupRetryDelayMs?: number;
  /** Stored session for this provider is deleted on every reset. */
  sessions?: SessionStore;
  logger?: Logger;
  now?: () => number;
}

export interface DisposableStatus {
  provider: string;
  state: DisposableState;
  messageCount: number;
  maxMessages: number;
  messagesRemaining: number;
  isRunning: boolean;
  /** A reset will run before the next message. */
  resetPending: boolean;
  startedAt: number | null;
  /** First 16 chars followed by "...", or null before the first start. */
  deviceId: string | null;
  /** Number of identities started so far. */
  epoch: number;
}
