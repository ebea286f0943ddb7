/**
 * Scriptable DisposableBackend that records every call.
 */
import type { ProviderRequest, ProviderResponse } from '@switchyard/core';
import type { DeviceIdentity, DisposableBackend } from '@switchyard/disposable';

export class FakeBackend implements DisposableBackend {
  readonly events: string[] = [];
  readonly started: DeviceIdentity[] = [];
  readonly purged: DeviceIdentity[] = [];
  current: DeviceIdentity | null = null;

  /** Remaining failures per step before it starts succeeding. */
  failures: Partial<Record<'start' | 'stop' | 'purge', number>> = {};
  /** Replaces the default echo reply. */
  reply: ((request: ProviderRequest) => Promise<ProviderResponse>) | null = null;

  async start(identity: DeviceIdentity): Promise<void> {
    this.events.push('start');
    this.fail('start');
    this.current = identity;
    this.started.push(identity);
  }

  async stop(): Promise<void> {
    this.events.push('stop');
    this.fail('stop');
  }

  async resetConversation(): Promise<void> {
    this.events.push('new-chat');
  }

  async send(request: ProviderRequest): Promise<ProviderResponse> {
    this.events.push(`send:${request.prompt}`);
    if (this.reply) return this.reply(request);
    return { content: `${this.current?.deviceId ?? 'none'}:${request.prompt}` };
  }

  async purgeArtifacts(identity: DeviceIdentity): Promise<void> {
    this.events.push('purge');
    this.fail('purge');
    this.purged.push(identity);
  }

  private fail(step: 'start' | 'stop' | 'purge'): void {
    const remaining = this.failures[step] ?? 0;
    if (remaining > 0) {
      this.failures[step] = remaining - 1;
      throw new Error(`${step} failed`);
    }
  }
}
