/**
 * @switchyard/disposable - DisposableSessionController
 *
 * Keeps a provider that must look like a fresh device on a short leash:
 *
 *   uninitialized ──first use──▶ active ──maxMessages / reset()──▶ resetting ──▶ active
 *
 * Every message opens a new conversation, is forwarded, and then counted.
 * Once the count reaches `maxMessages` the next dispatch resets before it
 * forwards anything. Dispatches and resets share one SerialQueue, so a reset
 * never interleaves with a message on the same instance.
 */

import {
  createLogger,
  errorMessage,
  retry,
  type Logger,
  type ProviderRequest,
  type ProviderResponse,
} from '@switchyard/core';
import type { SessionStore } from '@switchyard/store';
import { DisposableResetError } from './errors.js';
import { generateIdentity, maskDeviceId, type DeviceIdentity } from './identity.js';
import { SerialQueue } from './serial-queue.js';
import type {
  DisposableBackend,
  DisposableControllerOptions,
  DisposableState,
  DisposableStatus,
} from './types.js';

export const DEFAULT_MAX_MESSAGES = 20;

export class DisposableSessionController {
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly queue = new SerialQueue();
  private readonly sessions: SessionStore | undefined;

  readonly maxMessages: number;
  private readonly resetConversationBetweenMessages: boolean;
  private readonly cleanupRetries: number;
  private readonly cleanupRetryDelayMs: number;

  private state: DisposableState = 'uninitialized';
  private messageCount = 0;
  private startedAt: number | null = null;
  private identity: DeviceIdentity | null = null;
  private armed = false;
  private epoch = 0;

  constructor(
    readonly provider: string,
    private readonly backend: DisposableBackend,
    options: DisposableControllerOptions = {},
  ) {
    this.log = options.logger ?? createLogger('switchyard:disposable:controller');
    this.now = options.now ?? Date.now;
    this.sessions = options.sessions;
    this.maxMessages = options.maxMessages ?? DEFAULT_MAX_MESSAGES;
    this.resetConversationBetweenMessages = options.resetConversationBetweenMessages ?? true;
    this.cleanupRetries = options.cleanupRetries ?? 2;
    this.cleanupRetryDelayMs = options.cleanupRetryDelayMs ?? 500;
  }

  // -----------------------------------------------------------------------
  // Public API
  // -----------------------------------------------------------------------

  /**
   * Send one message, resetting first when the message budget is spent.
   */
  dispatch(request: ProviderRequest, signal?: AbortSignal): Promise<ProviderResponse> {
    return this.queue.run(async () => {
      signal?.throwIfAborted();

      if (this.state === 'uninitialized') {
        await this.start();
      } else if (this.state === 'resetting' || this.messageCount >= this.maxMessages) {
        await this.performReset(this.state === 'resetting' ? 'retry' : 'message limit');
      }

      if (this.resetConversationBetweenMessages) {
        await this.backend.resetConversation();
      }

      const response = await this.backend.send(request, signal);
      this.messageCount++;

      if (this.messageCount >= this.maxMessages) {
        this.armed = true;
        this.log.info(
          { provider: this.provider, messageCount: this.messageCount },
          'Message limit reached, reset scheduled before next message',
        );
      }

      return response;
    });
  }

  /**
   * Wipe the current identity and start over. Waits for any in-flight
   * dispatch to finish first.
   */
  reset(): Promise<DisposableStatus> {
    return this.queue.run(async () => {
      await this.performReset('manual');
      return this.status();
    });
  }

  /** Close the backend and return to `uninitialized`. */
  shutdown(): Promise<void> {
    return this.queue.run(async () => {
      if (this.state === 'uninitialized') return;
      await this.cleanupStep('close', () => this.backend.stop());
      this.state = 'uninitialized';
      this.startedAt = null;
      this.log.info({ provider: this.provider }, 'Disposable session shut down');
    });
  }

  status(): DisposableStatus {
    return {
      provider: this.provider,
      state: this.state,
      messageCount: this.messageCount,
      maxMessages: this.maxMessages,
      messagesRemaining: Math.max(0, this.maxMessages - this.messageCount),
      isRunning: this.state === 'active',
      resetPending: this.armed,
      startedAt: this.startedAt,
      deviceId: this.identity ? maskDeviceId(this.identity.deviceId) : null,
      epoch: this.epoch,
    };
  }

  // -----------------------------------------------------------------------
  // Transitions
  // -----------------------------------------------------------------------

  private async start(): Promise<void> {
    const identity = generateIdentity();
    try {
      await this.backend.start(identity);
    } catch (err) {
      this.log.error({ provider: this.provider, error: errorMessage(err) }, 'Disposable session failed to start');
      throw new DisposableResetError(this.provider, 'start', err);
    }
    this.activate(identity);
    this.log.info(
      { provider: this.provider, deviceId: maskDeviceId(identity.deviceId) },
      'Disposable session started',
    );
  }

  private async performReset(reason: string): Promise<void> {
    const previous = this.identity;
    this.state = 'resetting';
    this.armed = true;

    this.log.info(
      { provider: this.provider, reason, messageCount: this.messageCount, epoch: this.epoch },
      'Resetting disposable session',
    );

    // Cleanup failures are logged and skipped so later steps still run.
    await this.cleanupStep('close', () => this.backend.stop());
    if (previous) {
      await this.cleanupStep('purge', () => this.backend.purgeArtifacts(previous));
    }
    const sessions = this.sessions;
    if (sessions) {
      await this.cleanupStep('session', async () => {
        await sessions.delete(this.provider);
      });
    }

    const identity = generateIdentity();
    try {
      await this.backend.start(identity);
    } catch (err) {
      this.log.error(
        { provider: this.provider, error: errorMessage(err) },
        'Could not start under new identity, staying in resetting',
      );
      throw new DisposableResetError(this.provider, 'start', err);
    }

    this.activate(identity);
    this.log.info(
      {
        provider: this.provider,
        epoch: this.epoch,
        from: previous ? maskDeviceId(previous.deviceId) : null,
        to: maskDeviceId(identity.deviceId),
      },
      'Disposable session reset complete',
    );
  }

  private activate(identity: DeviceIdentity): void {
    this.identity = identity;
    this.messageCount = 0;
    this.startedAt = this.now();
    this.armed = false;
    this.epoch++;
    this.state = 'active';
  }

  private async cleanupStep(step: string, fn: () => Promise<void>): Promise<void> {
    try {
      await retry(fn, {
        maxRetries: this.cleanupRetries,
        initialDelayMs: this.cleanupRetryDelayMs,
        onRetry: (error, attempt) => {
          this.log.warn({ provider: this.provider, step, attempt, error: error.message }, 'Retrying cleanup step');
        },
      });
    } catch (err) {
      this.log.error({ provider: this.provider, step, error: errorMessage(err) }, 'Cleanup step failed, continuing');
    }
  }
}
