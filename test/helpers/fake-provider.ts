/**
 * Scriptable ProviderCapability that records what it was handed.
 */
import type {
  CredentialBlob,
  ProviderCapability,
  ProviderContext,
  ProviderKind,
  ProviderRequest,
  ProviderResponse,
  SessionPolicy,
} from '@switchyard/core';

export type InvokeHandler = (request: ProviderRequest, ctx: ProviderContext) => Promise<ProviderResponse>;

export interface FakeProviderOptions {
  kind?: ProviderKind;
  session?: SessionPolicy;
  handler?: InvokeHandler;
}

export class FakeProvider implements ProviderCapability {
  readonly name: string;
  readonly kind: ProviderKind;
  readonly session?: SessionPolicy;

  handler: InvokeHandler;
  readonly calls: Array<{ request: ProviderRequest; credential: CredentialBlob | null; proxyId: number | null }> = [];
  readonly opened: CredentialBlob[] = [];
  readonly closed: CredentialBlob[] = [];
  /** Makes the next openSession calls reject. */
  openFailures = 0;
  closeFails = false;

  constructor(
    readonly id: string,
    readonly models: readonly string[],
    options: FakeProviderOptions = {},
  ) {
    this.name = id.toUpperCase();
    this.kind = options.kind ?? 'api';
    this.session = options.session;
    this.handler = options.handler ?? (async (request) => ({ content: `${id}:${request.prompt}` }));
  }

  async invoke(request: ProviderRequest, ctx: ProviderContext): Promise<ProviderResponse> {
    this.calls.push({ request, credential: ctx.credential, proxyId: ctx.proxy?.id ?? null });
    return this.handler(request, ctx);
  }

  async openSession(): Promise<CredentialBlob> {
    if (this.openFailures > 0) {
      this.openFailures--;
      throw new Error('login failed');
    }
    const credential = { token: `${this.id}-token-${this.opened.length + 1}` };
    this.opened.push(credential);
    return credential;
  }

  async closeSession(credential: CredentialBlob): Promise<void> {
    this.closed.push(credential);
    if (this.closeFails) {
      throw new Error('logout failed');
    }
  }
}
