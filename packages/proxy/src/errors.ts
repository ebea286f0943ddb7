/** No active proxy qualifies for selection. */
export class ProxyUnavailableError extends Error {
  constructor(message = 'No active working proxy is available') {
    super(message);
    this.name = 'ProxyUnavailableError';
  }
}

export class ProxyNotFoundError extends Error {
  constructor(public readonly proxyId: number) {
    super(`Proxy ${proxyId} does not exist`);
    this.name = 'ProxyNotFoundError';
  }
}
