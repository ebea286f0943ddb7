/**
 * Unit Tests for DisposableSessionController
 *
 * Message budget, reset sequence, cleanup retries, start failures,
 * serialization and the status projection.
 */
import { describe, it, expect, beforeEach } from 'vitest';
import {
  DisposableResetError,
  DisposableSessionController,
  generateIdentity,
  maskDeviceId,
} from '@switchyard/disposable';
import { MEMORY_DB, SqliteSessionStore, SwitchyardDatabase } from '@switchyard/store';
import { FakeBackend } from '../helpers/fake-backend.js';
import { deferred } from '../helpers/deferred.js';
import { createClock, type TestClock } from '../helpers/clock.js';

const msg = (prompt: string) => ({ prompt, model: 'default' });

describe('DisposableSessionController', () => {
  let backend: FakeBackend;
  let clock: TestClock;
  let controller: DisposableSessionController;

  beforeEach(() => {
    backend = new FakeBackend();
    clock = createClock();
    controller = new DisposableSessionController('zai', backend, {
      maxMessages: 3,
      cleanupRetries: 1,
      cleanupRetryDelayMs: 0,
      now: clock.now,
    });
  });

  // ---------------------------------------------------------------------------
  // Identity
  // ---------------------------------------------------------------------------
  describe('identity', () => {
    it('generates hex tokens of fixed lengths', () => {
      const id = generateIdentity();
      expect(id.deviceId).toMatch(/^[0-9a-f]{32}$/);
      expect(id.sessionId).toMatch(/^[0-9a-f]{16}$/);
      expect(id.fingerprint).toMatch(/^[0-9a-f]{24}$/);
    });

    it('masks device ids to 16 characters', () => {
      expect(maskDeviceId('0123456789abcdef0123456789abcdef')).toBe('0123456789abcdef...');
    });
  });

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------
  it('starts uninitialized and activates on first use', async () => {
    expect(controller.status()).toMatchObject({ state: 'uninitialized', isRunning: false, deviceId: null, epoch: 0 });

    await controller.dispatch(msg('hello'));

    expect(backend.events).toEqual(['start', 'new-chat', 'send:hello']);
    expect(controller.status()).toMatchObject({
      state: 'active',
      isRunning: true,
      messageCount: 1,
      messagesRemaining: 2,
      startedAt: clock.now(),
      epoch: 1,
    });
  });

  it('opens a new conversation before every message', async () => {
    await controller.dispatch(msg('a'));
    await controller.dispatch(msg('b'));
    expect(backend.events).toEqual(['start', 'new-chat', 'send:a', 'new-chat', 'send:b']);
  });

  it('skips the conversation reset when disabled', async () => {
    controller = new DisposableSessionController('zai', backend, { resetConversationBetweenMessages: false });
    await controller.dispatch(msg('a'));
    expect(backend.events).toEqual(['start', 'send:a']);
  });

  it('resets before the message that follows the last allowed one', async () => {
    for (const p of ['1', '2', '3']) await controller.dispatch(msg(p));
    const before = backend.current;
    expect(controller.status()).toMatchObject({ messageCount: 3, messagesRemaining: 0, resetPending: true });

    backend.events.length = 0;
    clock.advance(10_000);
    const reply = await controller.dispatch(msg('4'));

    expect(backend.events).toEqual(['stop', 'purge', 'start', 'new-chat', 'send:4']);
    expect(backend.purged).toEqual([before]);
    expect(backend.current?.deviceId).not.toBe(before?.deviceId);
    expect(reply.content).toBe(`${backend.current?.deviceId}:4`);
    expect(controller.status()).toMatchObject({
      state: 'active',
      messageCount: 1,
      resetPending: false,
      startedAt: clock.now(),
      epoch: 2,
    });
  });

  it('does not count failed sends', async () => {
    backend.reply = async () => {
      throw new Error('upstream 502');
    };
    await expect(controller.dispatch(msg('x'))).rejects.toThrow('upstream 502');
    expect(controller.status().messageCount).toBe(0);
  });

  // ---------------------------------------------------------------------------
  // Reset sequence
  // ---------------------------------------------------------------------------
  describe('reset', () => {
    it('resets manually and reports the new status', async () => {
      await controller.dispatch(msg('a'));
      const first = controller.status().deviceId;

      const status = await controller.reset();
      expect(status).toMatchObject({ state: 'active', messageCount: 0, epoch: 2 });
      expect(status.deviceId).not.toBe(first);
    });

    it('deletes the stored session for the provider', async () => {
      const db = new SwitchyardDatabase(MEMORY_DB);
      const sessions = new SqliteSessionStore(db);
      await sessions.upsert('zai', { cookie: 'c' });
      await sessions.upsert('other', { cookie: 'o' });

      controller = new DisposableSessionController('zai', backend, { sessions, cleanupRetryDelayMs: 0 });
      await controller.dispatch(msg('a'));
      await controller.reset();

      expect((await sessions.list()).map((s) => s.provider)).toEqual(['other']);
      db.close();
    });

    it('retries a failing cleanup step', async () => {
      await controller.dispatch(msg('a'));
      backend.events.length = 0;
      backend.failures = { stop: 1 };

      await controller.reset();
      expect(backend.events).toEqual(['stop', 'stop', 'purge', 'start']);
    });

    it('skips a cleanup step that keeps failing and still finishes', async () => {
      await controller.dispatch(msg('a'));
      backend.events.length = 0;
      backend.failures = { stop: 5, purge: 5 };

      const status = await controller.reset();
      expect(backend.events).toEqual(['stop', 'stop', 'purge', 'purge', 'start']);
      expect(status.state).toBe('active');
    });

    it('stays in resetting when the new identity cannot start, then recovers', async () => {
      await controller.dispatch(msg('a'));
      backend.failures = { start: 1 };

      const err = await controller.reset().catch((e: unknown) => e);
      expect(err).toBeInstanceOf(DisposableResetError);
      expect(controller.status()).toMatchObject({ state: 'resetting', isRunning: false, resetPending: true });

      backend.events.length = 0;
      await controller.dispatch(msg('b'));
      expect(backend.events).toEqual(['stop', 'purge', 'start', 'new-chat', 'send:b']);
      expect(controller.status()).toMatchObject({ state: 'active', messageCount: 1 });
    });

    it('surfaces a failed first start and stays uninitialized', async () => {
      backend.failures = { start: 1 };
      await expect(controller.dispatch(msg('a'))).rejects.toBeInstanceOf(DisposableResetError);
      expect(controller.status().state).toBe('uninitialized');
      expect(backend.events).toEqual(['start']);
    });
  });

  // ---------------------------------------------------------------------------
  // Serialization
  // ---------------------------------------------------------------------------
  describe('serialization', () => {
    it('lets an in-flight dispatch finish on the old identity before a reset', async () => {
      await controller.dispatch(msg('warmup'));
      const oldDevice = backend.current?.deviceId;

      const gate = deferred<void>();
      backend.reply = async (request) => {
        const device = backend.current?.deviceId;
        await gate.promise;
        return { content: `${device}:${request.prompt}` };
      };

      const inFlight = controller.dispatch(msg('slow'));
      await Promise.resolve();
      const resetting = controller.reset();

      gate.resolve();
      expect((await inFlight).content).toBe(`${oldDevice}:slow`);
      await resetting;

      backend.reply = null;
      const next = await controller.dispatch(msg('after'));
      expect(next.content).not.toBe(`${oldDevice}:after`);
      expect(next.content).toBe(`${backend.current?.deviceId}:after`);
    });

    it('holds messages queued behind a reset until it completes', async () => {
      await controller.dispatch(msg('warmup'));
      backend.events.length = 0;

      const gate = deferred<void>();
      const originalStart = backend.start.bind(backend);
      backend.start = async (identity) => {
        await gate.promise;
        await originalStart(identity);
      };

      const resetting = controller.reset();
      const queued = controller.dispatch(msg('queued'));
      await new Promise((r) => setTimeout(r, 5));
      expect(backend.events).toEqual(['stop', 'purge']);

      gate.resolve();
      await resetting;
      await queued;
      expect(backend.events).toEqual(['stop', 'purge', 'start', 'new-chat', 'send:queued']);
    });
  });

  it('shuts down and starts fresh on the next message', async () => {
    await controller.dispatch(msg('a'));
    await controller.shutdown();
    expect(controller.status()).toMatchObject({ state: 'uninitialized', startedAt: null });

    backend.events.length = 0;
    await controller.dispatch(msg('b'));
    expect(backend.events).toEqual(['start', 'new-chat', 'send:b']);
  });
});
