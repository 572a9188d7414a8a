import { describe, it, expect } from 'vitest';
import { CredentialError } from '@credential-keeper/auth';
import { CheckStatus } from '../../tools/check-status/index.js';
import { ClearCredentials } from '../../tools/clear-credentials/index.js';
import { EnsureToken } from '../../tools/ensure-token/index.js';
import { ForceRefresh } from '../../tools/force-refresh/index.js';
import { GetOAuthEndpoints } from '../../tools/get-oauth-endpoints/index.js';
import { createRecord, createTestKeeper, NOW, OAUTH_BASE_URL, resultJson } from '../test-utils.js';

const HOUR_MS = 60 * 60 * 1000;

describe('credential tools', () => {
  describe('check_status', () => {
    it('should describe the stored record without token material', async () => {
      const record = createRecord();
      const { context } = createTestKeeper({ record });

      const result = await new CheckStatus().handle({}, context);

      expect(result.isError).toBeUndefined();
      expect(resultJson(result)).toEqual({
        state: 'valid',
        credentialsPath: 'memory',
        expiresAt: record.expires_at,
        expiresInSeconds: 3600,
        hasRefreshToken: true,
        tokenType: 'Bearer',
        scope: record.scope,
      });
      expect(JSON.stringify(result)).not.toContain('test-access');
    });
  });

  describe('ensure_token', () => {
    it('should report a valid token without network calls', async () => {
      const record = createRecord();
      const { context, exchange } = createTestKeeper({ record });

      const result = await new EnsureToken().handle({}, context);

      expect(resultJson(result)).toEqual({
        ok: true,
        state: 'valid',
        refreshed: false,
        expiresAt: record.expires_at,
        expiresInSeconds: 3600,
        hasRefreshToken: true,
        credentialsPath: 'memory',
      });
      expect(exchange.refresh).not.toHaveBeenCalled();
    });

    it('should authorize when nothing is stored and never return the token', async () => {
      const { context, exchange } = createTestKeeper();

      const result = await new EnsureToken().handle({}, context);

      expect(exchange.startAuthorization).toHaveBeenCalledTimes(1);
      expect(resultJson(result)).toMatchObject({ ok: true, state: 'valid', refreshed: true });
      expect(JSON.stringify(result)).not.toContain('authorized-access');
      expect(JSON.stringify(result)).not.toContain('authorized-refresh');
    });

    it('should return the error code and action when authorization fails', async () => {
      const { context, exchange } = createTestKeeper();
      exchange.completeAuthorization.mockRejectedValueOnce(CredentialError.authFlowFailed('access_denied'));

      const result = await new EnsureToken().handle({}, context);

      expect(result.isError).toBe(true);
      expect(resultJson(result)).toEqual({
        name: 'CredentialError',
        code: 'auth_flow_failed',
        message: 'Authorization failed: access_denied',
        action: CredentialError.authFlowFailed('access_denied').action,
        remoteError: 'access_denied',
      });
    });

    it('should report ok for a refreshed token that is already inside the skew window', async () => {
      const { context, exchange } = createTestKeeper({ record: createRecord(-60_000) });
      exchange.refresh.mockResolvedValueOnce(createRecord(60_000, { access_token: 'short-lived-access' }));

      const result = await new EnsureToken().handle({}, context);

      expect(result.isError).toBeUndefined();
      expect(resultJson(result)).toEqual({
        ok: true,
        state: 'expired',
        refreshed: true,
        expiresAt: new Date(NOW.getTime() + 60_000).toISOString(),
        expiresInSeconds: 60,
        hasRefreshToken: true,
        credentialsPath: 'memory',
      });
    });

    it('should pass the request signal to the orchestrator', async () => {
      const { context, exchange } = createTestKeeper();
      const controller = new AbortController();

      await new EnsureToken().handle({}, { ...context, signal: controller.signal });

      expect(exchange.startAuthorization).toHaveBeenCalledWith(controller.signal);
    });
  });

  describe('force_refresh', () => {
    it('should refresh a valid token', async () => {
      const { context, exchange } = createTestKeeper({ record: createRecord() });

      const result = await new ForceRefresh().handle({}, context);

      expect(exchange.refresh).toHaveBeenCalledWith('test-refresh', undefined);
      expect(resultJson(result)).toEqual({
        ok: true,
        state: 'valid',
        refreshed: true,
        expiresAt: new Date(NOW.getTime() + 2 * HOUR_MS).toISOString(),
        expiresInSeconds: 7200,
        hasRefreshToken: true,
        credentialsPath: 'memory',
      });
    });
  });

  describe('clear_credentials', () => {
    it('should remove the record', async () => {
      const { context, store } = createTestKeeper({ record: createRecord() });

      const result = await new ClearCredentials().handle({}, context);

      expect(resultJson(result)).toEqual({ cleared: true, credentialsPath: 'memory' });
      await expect(store.read()).resolves.toBeNull();
    });
  });

  describe('get_oauth_endpoints', () => {
    it('should list the helper endpoints', async () => {
      const { context } = createTestKeeper();

      const result = await new GetOAuthEndpoints().handle({}, context);

      expect(resultJson(result)).toEqual({
        baseUrl: OAUTH_BASE_URL,
        start: `${OAUTH_BASE_URL}/start`,
        getToken: `${OAUTH_BASE_URL}/get-token`,
        refreshToken: `${OAUTH_BASE_URL}/refresh-token`,
      });
    });
  });

  it('should advertise an object input schema for every tool', () => {
    for (const tool of [new CheckStatus(), new EnsureToken(), new ForceRefresh(), new ClearCredentials()]) {
      expect(tool.tool.name).toBe(tool.name);
      expect(tool.tool.inputSchema.type).toBe('object');
    }
  });
});
