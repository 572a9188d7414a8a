import { OAuthErrorCodes, type AuthorizationHandle, type CredentialRecord, type OAuthEndpoints } from '@credential-keeper/models';
import {
  logEvent,
  RequestUtils,
  ValidationUtils,
  type CompleteAuthorizationOptions,
  type IOAuthExchangeClient,
} from '@credential-keeper/core';
import {
  FailedStatusSchema,
  OAuthErrorBodySchema,
  PendingStatusSchema,
  StartResponseSchema,
  TokenResponseSchema,
} from '@credential-keeper/schemas';
import { CredentialError, toError } from '../errors/credential-error.js';
import { delay, discardBody, readJsonBody } from '../utils/http/index.js';
import { toCredentialRecord } from '../utils/token/index.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/**
 * Paths of the hosted helper's three endpoints, relative to the base URL
 */
export interface OAuthExchangePaths {
  start: string;
  getToken: string;
  refreshToken: string;
}

export interface HttpOAuthExchangeClientOptions {
  /** Base URL of the hosted OAuth helper */
  baseUrl: string;
  paths?: Partial<OAuthExchangePaths>;
  /** Scope requested when starting a flow */
  scope?: string;
  /** Bound on every single request (default 30s) */
  requestTimeoutMs?: number;
  /** Default bound on waiting for the user (default 300s) */
  authTimeoutMs?: number;
  /** Poll interval when the start response carries none (default 2s) */
  pollIntervalMs?: number;
  now?: () => Date;
}

export const DEFAULT_EXCHANGE_PATHS: OAuthExchangePaths = {
  start: '/start',
  getToken: '/get-token',
  refreshToken: '/refresh-token',
};

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_AUTH_TIMEOUT_MS = 300_000;
export const DEFAULT_POLL_INTERVAL_MS = 2_000;

type PollOutcome = { status: 'pending' } | { status: 'done'; record: CredentialRecord };

/**
 * Why a request never produced a response
 * @internal
 */
type SendFailure = { kind: 'cancelled'; cause: Error } | { kind: 'timeout'; cause: Error } | { kind: 'network'; cause: Error };

class RequestNotSent extends Error {
  public constructor(public readonly failure: SendFailure) {
    super(failure.cause.message);
    this.name = 'RequestNotSent';
  }
}

/**
 * Client of the hosted OAuth helper that performs the authorization-code
 * exchange on the keeper's behalf.
 *
 * - `POST {base}/start` begins a flow and returns the consent URL plus a state handle
 * - `GET {base}/get-token?state=` is polled until the user finishes
 * - `POST {base}/refresh-token` mints a new access token
 * @example
 * ```typescript
 * const client = new HttpOAuthExchangeClient({ baseUrl: 'https://oauth.example.com' });
 * const handle = await client.startAuthorization();
 * console.error(`Open ${handle.authorizationUrl}`);
 * const record = await client.completeAuthorization(handle);
 * ```
 * @public
 */
export class HttpOAuthExchangeClient implements IOAuthExchangeClient {
  private readonly endpoints: OAuthEndpoints;
  private readonly scope?: string;
  private readonly requestTimeoutMs: number;
  private readonly authTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly now: () => Date;

  public constructor(
    options: HttpOAuthExchangeClientOptions,
    private readonly fetchFn: FetchLike = (input, init) => fetch(input, init),
  ) {
    try {
      ValidationUtils.validateUrl(options.baseUrl, 'OAuth base URL');
      ValidationUtils.validatePositiveDuration(options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS, 'requestTimeoutMs');
      ValidationUtils.validatePositiveDuration(options.authTimeoutMs ?? DEFAULT_AUTH_TIMEOUT_MS, 'authTimeoutMs');
      ValidationUtils.validatePositiveDuration(options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS, 'pollIntervalMs');
    } catch (error) {
      throw CredentialError.configurationError([toError(error).message]);
    }

    const baseUrl = options.baseUrl.replace(/\/+$/, '');
    const paths = { ...DEFAULT_EXCHANGE_PATHS, ...options.paths };
    const join = (path: string) => `${baseUrl}${path.startsWith('/') ? path : `/${path}`}`;
    this.endpoints = {
      baseUrl,
      start: join(paths.start),
      getToken: join(paths.getToken),
      refreshToken: join(paths.refreshToken),
    };
    this.scope = options.scope;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.authTimeoutMs = options.authTimeoutMs ?? DEFAULT_AUTH_TIMEOUT_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.now = options.now ?? (() => new Date());
  }

  public getEndpoints(): OAuthEndpoints {
    return { ...this.endpoints };
  }

  /**
   * Begin a hosted authorization flow
   * @throws {CredentialError} auth_flow_unavailable on any failure, auth_flow_cancelled on abort
   */
  public async startAuthorization(signal?: AbortSignal): Promise<AuthorizationHandle> {
    const requestId = RequestUtils.generateRequestId('start');
    let response: Response;
    try {
      response = await this.send(
        this.endpoints.start,
        { method: 'POST', body: JSON.stringify(this.scope ? { scope: this.scope } : {}) },
        requestId,
        signal,
      );
    } catch (error) {
      throw this.mapSendFailure(error, (detail, cause) => CredentialError.authFlowUnavailable(detail, cause));
    }

    if (!response.ok) {
      const remote = await this.readOAuthError(response);
      throw CredentialError.authFlowUnavailable(
        `start returned HTTP ${response.status}${remote ? ` (${remote.error})` : ''}`,
      );
    }

    const parsed = StartResponseSchema.safeParse(await readJsonBody(response));
    if (!parsed.success) {
      throw CredentialError.authFlowUnavailable(`start returned a malformed body (${parsed.error.issues[0]?.message})`);
    }

    const handle: AuthorizationHandle = {
      authorizationUrl: parsed.data.authorizationUrl,
      state: parsed.data.state,
      startedAt: this.now(),
      pollIntervalMs:
        parsed.data.intervalSeconds !== undefined ? parsed.data.intervalSeconds * 1000 : this.pollIntervalMs,
    };
    logEvent('info', 'auth:authorization_started', { requestId, pollIntervalMs: handle.pollIntervalMs });
    return handle;
  }

  /**
   * Poll get-token until the flow finishes
   * @throws {CredentialError} auth_flow_timeout, auth_flow_failed, auth_flow_cancelled or transport_error
   */
  public async completeAuthorization(
    handle: AuthorizationHandle,
    options: CompleteAuthorizationOptions = {},
  ): Promise<CredentialRecord> {
    const { signal } = options;
    const timeoutMs = options.timeoutMs ?? this.authTimeoutMs;
    const deadline = this.now().getTime() + timeoutMs;
    let attempts = 0;

    for (;;) {
      if (signal?.aborted) {
        throw CredentialError.authFlowCancelled(toError(signal.reason));
      }

      attempts++;
      const outcome = await this.pollOnce(handle, signal);
      if (outcome.status === 'done') {
        logEvent('info', 'auth:authorization_completed', { attempts, expiresAt: outcome.record.expires_at });
        return outcome.record;
      }

      const remaining = deadline - this.now().getTime();
      if (remaining <= 0) {
        logEvent('warn', 'auth:authorization_timeout', { attempts, timeoutMs });
        throw CredentialError.authFlowTimeout(timeoutMs);
      }

      try {
        await delay(Math.min(handle.pollIntervalMs, remaining), signal);
      } catch (reason) {
        throw CredentialError.authFlowCancelled(toError(reason));
      }
    }
  }

  /**
   * Exchange a refresh token for a new access token
   * @throws {CredentialError} invalid_grant on 400/401, transport_error otherwise
   */
  public async refresh(refreshToken: string, signal?: AbortSignal): Promise<CredentialRecord> {
    const requestId = RequestUtils.generateRequestId('refresh');
    let response: Response;
    try {
      response = await this.send(
        this.endpoints.refreshToken,
        { method: 'POST', body: JSON.stringify({ refresh_token: refreshToken }) },
        requestId,
        signal,
      );
    } catch (error) {
      throw this.mapSendFailure(error, (detail, cause) => CredentialError.transportError(detail, cause));
    }

    if (response.status === 400 || response.status === 401) {
      const remote = await this.readOAuthError(response);
      logEvent('warn', 'auth:refresh_rejected', { requestId, status: response.status, error: remote?.error });
      throw CredentialError.invalidGrant(remote?.error ?? OAuthErrorCodes.INVALID_GRANT, remote?.error_description);
    }

    if (!response.ok) {
      const remote = await this.readOAuthError(response);
      throw CredentialError.transportError(
        `refresh-token returned HTTP ${response.status}${remote ? ` (${remote.error})` : ''}`,
      );
    }

    const parsed = TokenResponseSchema.safeParse(await readJsonBody(response));
    if (!parsed.success) {
      throw CredentialError.transportError(
        `refresh-token returned a malformed body (${parsed.error.issues[0]?.path.join('.') || 'body'}: ${parsed.error.issues[0]?.message})`,
      );
    }

    const record = toCredentialRecord(parsed.data, this.now());
    logEvent('info', 'auth:token_refreshed', {
      requestId,
      expiresAt: record.expires_at,
      rotated: Boolean(record.refresh_token),
    });
    return record;
  }

  private async pollOnce(handle: AuthorizationHandle, signal?: AbortSignal): Promise<PollOutcome> {
    const requestId = RequestUtils.generateRequestId('poll');
    const url = `${this.endpoints.getToken}?${new URLSearchParams({ state: handle.state }).toString()}`;

    let response: Response;
    try {
      response = await this.send(url, { method: 'GET' }, requestId, signal);
    } catch (error) {
      throw this.mapSendFailure(error, (detail, cause) => CredentialError.transportError(detail, cause));
    }

    if (response.status === 202) {
      await discardBody(response);
      return { status: 'pending' };
    }

    if (response.status >= 500) {
      await discardBody(response);
      throw CredentialError.transportError(`get-token returned HTTP ${response.status}`);
    }

    const body = await readJsonBody(response);

    if (!response.ok) {
      const remote = OAuthErrorBodySchema.safeParse(body);
      const error = remote.success ? remote.data.error : `http_${response.status}`;
      if (error === OAuthErrorCodes.AUTHORIZATION_PENDING || error === OAuthErrorCodes.SLOW_DOWN) {
        return { status: 'pending' };
      }
      logEvent('warn', 'auth:authorization_failed', { requestId, status: response.status, error });
      throw CredentialError.authFlowFailed(error, remote.success ? remote.data.error_description : undefined);
    }

    if (PendingStatusSchema.safeParse(body).success) {
      return { status: 'pending' };
    }

    const failed = FailedStatusSchema.safeParse(body);
    if (failed.success) {
      const error =
        failed.data.error ??
        (failed.data.status === 'denied' ? OAuthErrorCodes.ACCESS_DENIED : OAuthErrorCodes.SERVER_ERROR);
      logEvent('warn', 'auth:authorization_failed', { requestId, status: response.status, error });
      throw CredentialError.authFlowFailed(error, failed.data.error_description);
    }

    const token = TokenResponseSchema.safeParse(body);
    if (!token.success) {
      throw CredentialError.authFlowFailed(
        'invalid_response',
        `get-token returned a malformed body (${token.error.issues[0]?.path.join('.') || 'body'}: ${token.error.issues[0]?.message})`,
      );
    }
    return { status: 'done', record: toCredentialRecord(token.data, this.now()) };
  }

  /**
   * Sends one request bounded by the request timeout and the caller's signal
   * @throws {RequestNotSent} when no response arrives
   */
  private async send(
    url: string,
    init: { method: 'GET' | 'POST'; body?: string },
    requestId: string,
    signal?: AbortSignal,
  ): Promise<Response> {
    const timeout = AbortSignal.timeout(this.requestTimeoutMs);
    const headers: Record<string, string> = {
      Accept: 'application/json',
      'X-Request-ID': requestId,
    };
    if (init.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    logEvent('debug', 'auth:exchange_request', { requestId, method: init.method, url: url.split('?')[0] });
    try {
      return await this.fetchFn(url, {
        method: init.method,
        headers,
        body: init.body,
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      });
    } catch (error) {
      const cause = toError(error);
      if (signal?.aborted) {
        throw new RequestNotSent({ kind: 'cancelled', cause });
      }
      if (timeout.aborted) {
        throw new RequestNotSent({ kind: 'timeout', cause });
      }
      throw new RequestNotSent({ kind: 'network', cause });
    }
  }

  private mapSendFailure(error: unknown, toFailure: (detail: string, cause: Error) => CredentialError): Error {
    if (!(error instanceof RequestNotSent)) {
      return toError(error);
    }
    const { failure } = error;
    switch (failure.kind) {
      case 'cancelled':
        return CredentialError.authFlowCancelled(failure.cause);
      case 'timeout':
        return toFailure(`no response within ${Math.round(this.requestTimeoutMs / 1000)}s`, failure.cause);
      case 'network':
        logEvent('warn', 'auth:exchange_unreachable', { error: failure.cause.message });
        return toFailure(failure.cause.message, failure.cause);
    }
  }

  private async readOAuthError(response: Response) {
    const parsed = OAuthErrorBodySchema.safeParse(await readJsonBody(response));
    return parsed.success ? parsed.data : undefined;
  }
}
