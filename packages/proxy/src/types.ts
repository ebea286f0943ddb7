/**
 * @switchyard/proxy - Types
 */

export type ProxyProtocol = 'http' | 'https' | 'socks5';

export interface ProxyAuth {
  username: string;
  password: string;
}

export interface ProxyEndpoint {
  id: number;
  name: string | null;
  address: string;
  port: number;
  protocol: ProxyProtocol;
  auth: ProxyAuth | null;
  isActive: boolean;
  /** At most one row has this set. */
  isDefault: boolean;
  isWorking: boolean;
  consecutiveFailures: number;
  consecutiveSuccesses: number;
  totalFailures: number;
  totalSuccesses: number;
  responseTimeMs: number | null;
  lastTestedAt: number | null;
  lastSuccessAt: number | null;
  createdAt: number;
}

export interface NewProxy {
  address: string;
  port: number;
  protocol?: ProxyProtocol;
  name?: string;
  auth?: ProxyAuth;
  isActive?: boolean;
  isDefault?: boolean;
}

/**
 * Resolves when the proxy carried a test request, rejects otherwise.
 */
export type ProxyProber = (proxy: ProxyEndpoint, signal: AbortSignal) => Promise<void>;

export interface ProbeResult {
  id: number;
  success: boolean;
  latencyMs: number;
  error?: string;
}

export interface ProxyStats {
  total: number;
  active: number;
  working: number;
  defaultId: number | null;
}

export interface ProxyPoolOptions {
  /** Consecutive failures after which a proxy is marked not working. Default 3. */
  failureThreshold?: number;
  /** Consecutive failures after which a proxy is deactivated. Default 10. */
  demoteAfter?: number;
  probeTimeoutMs?: number;
  prober?: ProxyProber;
}

export interface ProxyRow {
  id: number;
  name: string | null;
  address: string;
  port: number;
  protocol: string;
  username: string | null;
  password: string | null;
  is_active: number;
  is_default: number;
  is_working: number;
  consecutive_failures: number;
  consecutive_successes: number;
  total_failures: number;
  total_successes: number;
  response_time_ms: number | null;
  last_tested_at: number | null;
  last_success_at: number | null;
  created_at: number;
}
