import { describe, it, expect } from 'vitest';
import { ProviderError, type ProviderCapability } from '@switchyard/core';
import { DisposableProvider, DisposableSessionController } from '@switchyard/disposable';
import { FakeBackend } from '../helpers/fake-backend.js';

function setup(backend = new FakeBackend()) {
  const controller = new DisposableSessionController('hc', backend, { cleanupRetryDelayMs: 0 });
  const provider = new DisposableProvider(controller, { name: 'HuggingChat guest', models: ['hc-model'] });
  return { backend, controller, provider };
}

const ctx = () => ({ credential: null, proxy: null, signal: new AbortController().signal });

describe('DisposableProvider', () => {
  it('takes its id from the controller and keeps no session', () => {
    const { provider } = setup();
    const capability: ProviderCapability = provider;
    expect(capability.id).toBe('hc');
    expect(capability.kind).toBe('browser');
    expect(capability.session).toBeUndefined();
  });

  it('forwards requests through the controller', async () => {
    const { backend, provider, controller } = setup();
    backend.reply = async (request) => ({ content: `echo ${request.prompt}` });

    const response = await provider.invoke({ prompt: 'hi', model: 'hc-model' }, ctx());

    expect(response).toEqual({ content: 'echo hi' });
    expect(controller.status().messageCount).toBe(1);
  });

  it('turns a failed identity start into a transient provider error', async () => {
    const backend = new FakeBackend();
    backend.failures.start = 1;
    const { provider } = setup(backend);

    const err = await provider.invoke({ prompt: 'hi', model: 'hc-model' }, ctx()).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProviderError);
    if (err instanceof ProviderError) {
      expect(err.kind).toBe('transient');
      expect(err.message).toBe('Disposable reset for hc failed at start: start failed');
    }
  });

  it('passes backend send errors through unchanged', async () => {
    const { backend, provider } = setup();
    const expired = ProviderError.sessionExpired('guest quota used', 'hc');
    backend.reply = async () => {
      throw expired;
    };

    await expect(provider.invoke({ prompt: 'hi', model: 'hc-model' }, ctx())).rejects.toBe(expired);
  });
});
