import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { AuthorizationHandle } from '@credential-keeper/models';
import { TokenOrchestrator } from '../../orchestrator/token-orchestrator.js';
import { MemoryCredentialStore } from '../../implementations/memory-credential-store.js';
import { CredentialError, CredentialErrorCode } from '../../errors/credential-error.js';
import { createHandle, createRecord, FakeExchangeClient, NOW } from '../test-utils.js';

const MINUTE_MS = 60 * 1000;

describe('TokenOrchestrator - concurrency', () => {
  let exchange: FakeExchangeClient;
  let store: MemoryCredentialStore;
  let orchestrator: TokenOrchestrator;

  beforeEach(() => {
    exchange = new FakeExchangeClient();
    store = new MemoryCredentialStore();
    orchestrator = new TokenOrchestrator({ store, exchange, now: () => NOW });
  });

  it('should start a single authorization flow for parallel callers', async () => {
    const tokens = await Promise.all([orchestrator.ensureToken(), orchestrator.ensureToken(), orchestrator.ensureToken()]);

    expect(tokens).toEqual(['authorized-access', 'authorized-access', 'authorized-access']);
    expect(exchange.startAuthorization).toHaveBeenCalledTimes(1);
    expect(exchange.completeAuthorization).toHaveBeenCalledTimes(1);
  });

  it('should refresh once for parallel callers', async () => {
    await store.write(createRecord(-MINUTE_MS));

    await Promise.all([orchestrator.ensureToken(), orchestrator.ensureToken()]);

    expect(exchange.refresh).toHaveBeenCalledTimes(1);
  });

  it('should keep serving after a failed call', async () => {
    exchange.completeAuthorization.mockRejectedValueOnce(CredentialError.authFlowTimeout(1000));

    const results = await Promise.allSettled([orchestrator.ensureToken(), orchestrator.ensureToken()]);

    expect(results[0].status).toBe('rejected');
    expect(results[1]).toEqual({ status: 'fulfilled', value: 'authorized-access' });
  });
});

describe('TokenOrchestrator - cancellation', () => {
  it('should write nothing when the wait is abandoned', async () => {
    const exchange = new FakeExchangeClient();
    const store = new MemoryCredentialStore();
    const controller = new AbortController();
    exchange.completeAuthorization.mockImplementationOnce(async (_handle, options) => {
      await new Promise<void>((resolve) => {
        if (options?.signal?.aborted) resolve();
        else options?.signal?.addEventListener('abort', () => resolve());
      });
      throw CredentialError.authFlowCancelled();
    });
    const orchestrator = new TokenOrchestrator({ store, exchange, now: () => NOW });

    const pending = orchestrator.ensureToken({
      signal: controller.signal,
      onAuthorizationRequired: () => controller.abort(),
    });

    await expect(pending).rejects.toMatchObject({ code: CredentialErrorCode.AUTH_FLOW_CANCELLED });
    await expect(store.read()).resolves.toBeNull();
  });
});

describe('TokenOrchestrator - events', () => {
  let exchange: FakeExchangeClient;

  beforeEach(() => {
    exchange = new FakeExchangeClient();
  });

  it('should announce the authorization URL before waiting', async () => {
    const orchestrator = new TokenOrchestrator({ store: new MemoryCredentialStore(), exchange, now: () => NOW });
    const order: string[] = [];
    const seen: AuthorizationHandle[] = [];
    orchestrator.on('authorization:required', (handle) => {
      order.push('event');
      seen.push(handle);
    });
    exchange.completeAuthorization.mockImplementationOnce(async () => {
      order.push('wait');
      return createRecord(60 * MINUTE_MS);
    });

    await orchestrator.ensureToken({ onAuthorizationRequired: () => void order.push('callback') });

    expect(order).toEqual(['event', 'callback', 'wait']);
    expect(seen).toEqual([createHandle()]);
  });

  it('should emit token:authorized and token:refreshed', async () => {
    const store = new MemoryCredentialStore(createRecord(-MINUTE_MS));
    const orchestrator = new TokenOrchestrator({ store, exchange, now: () => NOW });
    const refreshed = vi.fn();
    const authorized = vi.fn();
    orchestrator.on('token:refreshed', refreshed);
    orchestrator.on('token:authorized', authorized);

    await orchestrator.ensureToken();
    await orchestrator.clearCredentials();
    await orchestrator.ensureToken();

    expect(refreshed).toHaveBeenCalledWith({ expiresAt: new Date(NOW.getTime() + 60 * MINUTE_MS), rotated: false });
    expect(authorized).toHaveBeenCalledTimes(1);
  });

  it('should emit credentials:cleared', async () => {
    const orchestrator = new TokenOrchestrator({ store: new MemoryCredentialStore(), exchange });
    const cleared = vi.fn();
    const unsubscribe = orchestrator.on('credentials:cleared', cleared);

    await orchestrator.clearCredentials();
    unsubscribe();
    await orchestrator.clearCredentials();

    expect(cleared).toHaveBeenCalledTimes(1);
  });

  it('should not fail the call when a listener throws', async () => {
    const orchestrator = new TokenOrchestrator({ store: new MemoryCredentialStore(), exchange, now: () => NOW });
    orchestrator.on('authorization:required', () => {
      throw new Error('listener broke');
    });

    await expect(orchestrator.ensureToken()).resolves.toBe('authorized-access');
  });
});
