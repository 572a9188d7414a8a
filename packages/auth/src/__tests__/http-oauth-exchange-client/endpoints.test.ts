import { describe, it, expect, vi } from 'vitest';
import { HttpOAuthExchangeClient } from '../../implementations/http-oauth-exchange-client.js';
import { CredentialError, CredentialErrorCode } from '../../errors/credential-error.js';

describe('HttpOAuthExchangeClient - getEndpoints', () => {
  it('should build absolute URLs without network calls', () => {
    const fetchMock = vi.fn();
    const client = new HttpOAuthExchangeClient({ baseUrl: 'https://oauth.example.com/' }, fetchMock);

    expect(client.getEndpoints()).toEqual({
      baseUrl: 'https://oauth.example.com',
      start: 'https://oauth.example.com/start',
      getToken: 'https://oauth.example.com/get-token',
      refreshToken: 'https://oauth.example.com/refresh-token',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should keep a base path and accept custom paths', () => {
    const client = new HttpOAuthExchangeClient({
      baseUrl: 'https://example.com/oauth',
      paths: { start: 'begin', refreshToken: '/renew' },
    });

    expect(client.getEndpoints()).toEqual({
      baseUrl: 'https://example.com/oauth',
      start: 'https://example.com/oauth/begin',
      getToken: 'https://example.com/oauth/get-token',
      refreshToken: 'https://example.com/oauth/renew',
    });
  });

  it('should reject an invalid base URL', () => {
    let caught: unknown;
    try {
      new HttpOAuthExchangeClient({ baseUrl: 'oauth.example.com' });
    } catch (error) {
      caught = error;
    }

    expect(CredentialError.is(caught, CredentialErrorCode.CONFIGURATION_ERROR)).toBe(true);
  });

  it('should reject a non-positive timeout', () => {
    expect(() => new HttpOAuthExchangeClient({ baseUrl: 'https://oauth.example.com', authTimeoutMs: 0 })).toThrow(
      'Invalid configuration: authTimeoutMs must be a positive number of milliseconds, got 0',
    );
  });
});
