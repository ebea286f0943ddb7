/**
 * AdminService - operations an outer admin layer exposes.
 *
 * Toggles, health snapshots and resets, proxy control, disposable resets
 * and status, and stored sessions. Credentials never leave this surface.
 */

import { createLogger, type DispatchRequest, type Logger } from '@switchyard/core';
import type { DisposableSessionController, DisposableStatus } from '@switchyard/disposable';
import type { Ranking } from '@switchyard/fallback';
import type { ProbeResult, ProxyEndpoint, ProxyPool, ProxyStats } from '@switchyard/proxy';
import type { HealthStore, ProviderHealth, ProviderToggle, SessionStore, ToggleStore } from '@switchyard/store';
import type { LivenessResult, Orchestrator } from './orchestrator/index.js';

export interface SessionSummary {
  id: string;
  provider: string;
  usageCount: number;
  usageCap: number;
  expiresAt: number | null;
  lastUsedAt: number;
  createdAt: number;
}

export interface AdminServiceOptions {
  orchestrator: Orchestrator;
  health: HealthStore;
  toggles: ToggleStore;
  sessions: SessionStore;
  proxies: ProxyPool | null;
  disposables: ReadonlyMap<string, DisposableSessionController>;
  logger?: Logger;
}

export class AdminService {
  private readonly log: Logger;

  constructor(private readonly deps: AdminServiceOptions) {
    this.log = deps.logger ?? createLogger('switchyard:admin');
  }

  // -----------------------------------------------------------------------
  // Toggles
  // -----------------------------------------------------------------------

  async listToggles(): Promise<ProviderToggle[]> {
    return this.deps.toggles.list();
  }

  /** Returns false when the provider has no toggle row. */
  async setProviderEnabled(provider: string, enabled: boolean): Promise<boolean> {
    const changed = await this.deps.toggles.setEnabled(provider, enabled);
    if (changed) {
      this.log.info({ provider, enabled }, 'Provider toggle changed');
    }
    return changed;
  }

  // -----------------------------------------------------------------------
  // Health
  // -----------------------------------------------------------------------

  async healthSnapshot(): Promise<ProviderHealth[]> {
    const all = await this.deps.health.readAll();
    return Array.from(all.values()).sort((a, b) => a.key.localeCompare(b.key));
  }

  async health(key: string): Promise<ProviderHealth> {
    return this.deps.health.read(key);
  }

  async resetStats(key?: string): Promise<number> {
    const removed = await this.deps.health.reset(key);
    this.log.info({ key: key ?? '*', removed }, 'Health stats reset');
    return removed;
  }

  async resetFailureStreaks(): Promise<number> {
    return this.deps.health.resetStreaks();
  }

  async previewRanking(request: Pick<DispatchRequest, 'provider' | 'model'> = {}): Promise<Ranking> {
    return this.deps.orchestrator.preview(request);
  }

  async testAll(): Promise<LivenessResult[]> {
    return this.deps.orchestrator.testAll();
  }

  // -----------------------------------------------------------------------
  // Proxies
  // -----------------------------------------------------------------------

  async listProxies(): Promise<ProxyEndpoint[]> {
    return this.pool().list();
  }

  async setDefaultProxy(id: number): Promise<ProxyEndpoint> {
    return this.pool().setDefault(id);
  }

  async rotateProxy(): Promise<ProxyEndpoint> {
    return this.pool().rotate();
  }

  async probeProxies(): Promise<ProbeResult[]> {
    return this.pool().probeAll();
  }

  async proxyStats(): Promise<ProxyStats> {
    return this.pool().stats();
  }

  // -----------------------------------------------------------------------
  // Disposable providers
  // -----------------------------------------------------------------------

  async resetDisposable(provider: string): Promise<DisposableStatus> {
    this.log.info({ provider }, 'Manual disposable reset requested');
    return this.disposable(provider).reset();
  }

  disposableStatus(provider: string): DisposableStatus {
    return this.disposable(provider).status();
  }

  listDisposableStatus(): DisposableStatus[] {
    return Array.from(this.deps.disposables.values(), (c) => c.status());
  }

  // -----------------------------------------------------------------------
  // Sessions
  // -----------------------------------------------------------------------

  async listSessions(): Promise<SessionSummary[]> {
    const sessions = await this.deps.sessions.list();
    return sessions.map(({ credential: _credential, ...summary }) => summary);
  }

  async deleteSession(provider: string): Promise<boolean> {
    return this.deps.sessions.delete(provider);
  }

  async clearSessions(): Promise<number> {
    return this.deps.sessions.clear();
  }

  // -----------------------------------------------------------------------
  // Internal
  // -----------------------------------------------------------------------

  private pool(): ProxyPool {
    if (!this.deps.proxies) {
      throw new Error('Proxy pool is disabled (proxy.enabled = false)');
    }
    return this.deps.proxies;
  }

  private disposable(provider: string): DisposableSessionController {
    const controller = this.deps.disposables.get(provider);
    if (!controller) {
      throw new Error(`No disposable provider "${provider}"`);
    }
    return controller;
  }
}
