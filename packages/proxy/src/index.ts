/**
 * @switchyard/proxy - Outbound proxy pool
 *
 * Default selection, rotation, and health probing over the `proxies` table.
 *
 * @packageDocumentation
 */

export { ProxyPool } from './pool.js';
export { createHttpProber, proxyUrl } from './prober.js';
export { ProxyUnavailableError, ProxyNotFoundError } from './errors.js';
export type {
  ProxyProtocol,
  ProxyAuth,
  ProxyEndpoint,
  NewProxy,
  ProxyProber,
  ProbeResult,
  ProxyStats,
  ProxyPoolOptions,
} from './types.js';
