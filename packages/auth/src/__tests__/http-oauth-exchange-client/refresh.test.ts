import { describe, it, expect, vi } from 'vitest';
import { HttpOAuthExchangeClient } from '../../implementations/http-oauth-exchange-client.js';
import { CredentialErrorCode } from '../../errors/credential-error.js';
import { BASE_URL, createFetchMock, jsonResponse, NOW } from '../test-utils.js';

describe('HttpOAuthExchangeClient - refresh', () => {
  const now = () => NOW;

  it('should post the refresh token and return the new record', async () => {
    const fetchMock = createFetchMock(jsonResponse(200, { access_token: 'new-access', expires_in: 3600 }));
    const client = new HttpOAuthExchangeClient({ baseUrl: BASE_URL, now }, fetchMock);

    await expect(client.refresh('test-refresh')).resolves.toEqual({
      access_token: 'new-access',
      expires_at: '2030-01-01T01:00:00.000Z',
      token_type: 'Bearer',
      scope: '',
    });

    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe(`${BASE_URL}/refresh-token`);
    expect(init.method).toBe('POST');
    expect(JSON.parse(String(init.body))).toEqual({ refresh_token: 'test-refresh' });
  });

  it('should return a rotated refresh token', async () => {
    const client = new HttpOAuthExchangeClient(
      { baseUrl: BASE_URL, now },
      createFetchMock(jsonResponse(200, { access_token: 'a', refresh_token: 'rotated', expires_at: 1893459600 })),
    );

    await expect(client.refresh('test-refresh')).resolves.toMatchObject({
      refresh_token: 'rotated',
      expires_at: '2030-01-01T01:00:00.000Z',
    });
  });

  it('should fall back to expires_in when expires_at is beyond the range of a date', async () => {
    const client = new HttpOAuthExchangeClient(
      { baseUrl: BASE_URL, now },
      createFetchMock(jsonResponse(200, { access_token: 'a', expires_at: '99999999999999', expires_in: 60 })),
    );

    await expect(client.refresh('test-refresh')).resolves.toMatchObject({ expires_at: '2030-01-01T00:01:00.000Z' });
  });

  it('should name the offending field of a malformed body', async () => {
    const client = new HttpOAuthExchangeClient(
      { baseUrl: BASE_URL, now },
      createFetchMock(jsonResponse(200, { access_token: 'a', expires_in: 1e13 })),
    );

    await expect(client.refresh('test-refresh')).rejects.toMatchObject({
      code: CredentialErrorCode.TRANSPORT_ERROR,
      message: expect.stringContaining('refresh-token returned a malformed body (expires_in:'),
    });
  });

  it('should report a rejected grant as invalid_grant', async () => {
    const client = new HttpOAuthExchangeClient(
      { baseUrl: BASE_URL },
      createFetchMock(jsonResponse(400, { error: 'invalid_grant', error_description: 'Token has been revoked.' })),
    );

    await expect(client.refresh('test-refresh')).rejects.toMatchObject({
      code: CredentialErrorCode.INVALID_GRANT,
      remoteError: 'invalid_grant',
    });
  });

  it('should treat a bare 401 as invalid_grant', async () => {
    const client = new HttpOAuthExchangeClient({ baseUrl: BASE_URL }, createFetchMock(jsonResponse(401)));

    await expect(client.refresh('test-refresh')).rejects.toMatchObject({
      code: CredentialErrorCode.INVALID_GRANT,
      remoteError: 'invalid_grant',
    });
  });

  it.each([
    ['a server error', () => jsonResponse(503)],
    ['a forbidden response', () => jsonResponse(403, { error: 'access_denied' })],
    ['a body without access_token', () => jsonResponse(200, { expires_in: 10 })],
    ['an expires_in no date can hold', () => jsonResponse(200, { access_token: 'a', expires_in: '99999999999999' })],
    ['a network failure', () => new TypeError('fetch failed')],
  ])('should report %s as transport_error', async (_label, respond) => {
    const client = new HttpOAuthExchangeClient({ baseUrl: BASE_URL }, createFetchMock(respond()));

    await expect(client.refresh('test-refresh')).rejects.toMatchObject({
      code: CredentialErrorCode.TRANSPORT_ERROR,
    });
  });

  it('should bound the request by the request timeout', async () => {
    const fetchMock = vi.fn(
      (_url: string, init: RequestInit) =>
        new Promise<Response>((_resolve, reject) => {
          init.signal?.addEventListener('abort', () => reject(init.signal?.reason));
        }),
    );
    const client = new HttpOAuthExchangeClient({ baseUrl: BASE_URL, requestTimeoutMs: 20 }, fetchMock);

    await expect(client.refresh('test-refresh')).rejects.toMatchObject({
      code: CredentialErrorCode.TRANSPORT_ERROR,
    });
  });
});
