import Emittery from 'emittery';
import type {
  AuthorizationHandle,
  CredentialRecord,
  CredentialStatus,
  OAuthEndpoints,
  TokenAssessment,
} from '@credential-keeper/models';
import { logEvent, OperationQueue, type ICredentialStore, type IOAuthExchangeClient } from '@credential-keeper/core';
import { CredentialError, CredentialErrorCode } from '../errors/credential-error.js';
import { classifyTokenState, DEFAULT_SKEW_WINDOW_MS } from '../evaluator/classify-token-state.js';

export interface TokenOrchestratorOptions {
  store: ICredentialStore;
  exchange: IOAuthExchangeClient;
  /** Tokens closer than this to expiry are renewed (default 5 minutes) */
  skewWindowMs?: number;
  /** Bound on waiting for the user; the exchange client's default when omitted */
  authTimeoutMs?: number;
  now?: () => Date;
}

export interface EnsureTokenOptions {
  /** Abandons a pending authorization wait */
  signal?: AbortSignal;
  /** Called once a flow has started, with the URL the user must open */
  onAuthorizationRequired?: (handle: AuthorizationHandle) => void | Promise<void>;
}

export interface TokenOrchestratorEvents {
  'authorization:required': AuthorizationHandle;
  'token:refreshed': { expiresAt: Date; rotated: boolean };
  'token:authorized': { expiresAt: Date };
  'credentials:cleared': undefined;
}

type AuthorizationReason = 'absent' | 'corrupted' | 'no_refresh_token' | 'refresh_rejected';

/**
 * Keeps one credential record valid.
 *
 * Decides from the stored state whether to reuse, refresh or re-authorize,
 * and performs the hosted authorization flow when needed. Mutating operations
 * run one at a time, so concurrent callers share a single flow.
 * @example
 * ```typescript
 * const orchestrator = new TokenOrchestrator({
 *   store: new FileCredentialStore(path),
 *   exchange: new HttpOAuthExchangeClient({ baseUrl }),
 * });
 * orchestrator.on('authorization:required', (handle) => {
 *   console.error(`Open ${handle.authorizationUrl} to authorize`);
 * });
 * const token = await orchestrator.ensureToken();
 * ```
 * @public
 */
export class TokenOrchestrator {
  private readonly store: ICredentialStore;
  private readonly exchange: IOAuthExchangeClient;
  private readonly skewWindowMs: number;
  private readonly authTimeoutMs?: number;
  private readonly now: () => Date;
  private readonly queue = new OperationQueue();
  private readonly events = new Emittery<TokenOrchestratorEvents>();

  public constructor(options: TokenOrchestratorOptions) {
    this.store = options.store;
    this.exchange = options.exchange;
    this.skewWindowMs = options.skewWindowMs ?? DEFAULT_SKEW_WINDOW_MS;
    this.authTimeoutMs = options.authTimeoutMs;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Subscribe to lifecycle events
   * @returns Unsubscribe function
   */
  public on<Name extends keyof TokenOrchestratorEvents>(
    name: Name,
    listener: (data: TokenOrchestratorEvents[Name]) => void | Promise<void>,
  ): () => void {
    return this.events.on(name, listener);
  }

  /**
   * Return a valid access token, refreshing or re-authorizing as needed
   * @throws {CredentialError} ensure_token_failed when a refresh cannot reach the service; auth_flow_* when authorization fails
   */
  public async ensureToken(options: EnsureTokenOptions = {}): Promise<string> {
    const record = await this.queue.run(() => this.obtain(options, false));
    return record.access_token;
  }

  /**
   * Like {@link ensureToken} but never reuses the current access token
   */
  public async forceRefresh(options: EnsureTokenOptions = {}): Promise<string> {
    const record = await this.queue.run(() => this.obtain(options, true));
    return record.access_token;
  }

  /**
   * Authorization header for the downstream API
   */
  public async getAuthorizationHeaders(options: EnsureTokenOptions = {}): Promise<Record<string, string>> {
    const record = await this.queue.run(() => this.obtain(options, false));
    return { Authorization: `${record.token_type} ${record.access_token}` };
  }

  /**
   * Classify the stored record without network calls or writes
   */
  public async checkStatus(): Promise<CredentialStatus> {
    const now = this.now();
    const assessment = await this.assess(now);
    const status: CredentialStatus = {
      state: assessment.state,
      credentialsPath: this.store.location,
      hasRefreshToken: false,
    };

    switch (assessment.state) {
      case 'absent':
        return status;
      case 'corrupted':
        return { ...status, reason: assessment.reason };
      case 'expired':
      case 'valid':
        return {
          ...status,
          expiresAt: assessment.record.expires_at,
          expiresInSeconds: Math.floor((assessment.expiresAt.getTime() - now.getTime()) / 1000),
          hasRefreshToken: Boolean(assessment.record.refresh_token),
          tokenType: assessment.record.token_type,
          scope: assessment.record.scope,
        };
    }
  }

  /**
   * Remove stored credentials; the next ensureToken re-authorizes
   */
  public async clearCredentials(): Promise<void> {
    await this.queue.run(async () => {
      await this.store.clear();
      await this.notify('credentials:cleared', undefined);
    });
  }

  public getOAuthEndpoints(): OAuthEndpoints {
    return this.exchange.getEndpoints();
  }

  private async obtain(options: EnsureTokenOptions, force: boolean): Promise<CredentialRecord> {
    const assessment = await this.assess(this.now());
    logEvent('debug', 'auth:token_state', { state: assessment.state, force });

    switch (assessment.state) {
      case 'valid':
        return force ? this.renew(assessment.record, options) : assessment.record;
      case 'expired':
        return this.renew(assessment.record, options);
      case 'absent':
        return this.authorize(options, 'absent');
      case 'corrupted':
        logEvent('warn', 'auth:credentials_corrupted', { reason: assessment.reason });
        await this.store.clear();
        return this.authorize(options, 'corrupted');
    }
  }

  private async assess(now: Date): Promise<TokenAssessment> {
    try {
      return classifyTokenState(await this.store.read(), now, this.skewWindowMs);
    } catch (error) {
      if (CredentialError.is(error, CredentialErrorCode.CORRUPTED_RECORD)) {
        return { state: 'corrupted', reason: error.message };
      }
      throw error;
    }
  }

  private async renew(record: CredentialRecord, options: EnsureTokenOptions): Promise<CredentialRecord> {
    if (!record.refresh_token) {
      return this.authorize(options, 'no_refresh_token');
    }

    let refreshed: CredentialRecord;
    try {
      refreshed = await this.exchange.refresh(record.refresh_token, options.signal);
    } catch (error) {
      if (CredentialError.is(error, CredentialErrorCode.INVALID_GRANT)) {
        logEvent('warn', 'auth:refresh_rejected', { remoteError: error.remoteError });
        return this.authorize(options, 'refresh_rejected');
      }
      if (CredentialError.is(error, CredentialErrorCode.TRANSPORT_ERROR)) {
        throw CredentialError.ensureTokenFailed(error);
      }
      throw error;
    }

    const rotated = refreshed.refresh_token !== undefined && refreshed.refresh_token !== record.refresh_token;
    const merged: CredentialRecord = {
      ...refreshed,
      refresh_token: refreshed.refresh_token ?? record.refresh_token,
      scope: refreshed.scope || record.scope,
    };
    await this.store.write(merged);
    await this.notify('token:refreshed', { expiresAt: new Date(merged.expires_at), rotated });
    return merged;
  }

  private async authorize(options: EnsureTokenOptions, reason: AuthorizationReason): Promise<CredentialRecord> {
    const handle = await this.exchange.startAuthorization(options.signal);
    logEvent('info', 'auth:authorization_required', { reason, pollIntervalMs: handle.pollIntervalMs });

    await this.notify('authorization:required', handle);
    if (options.onAuthorizationRequired) {
      try {
        await options.onAuthorizationRequired(handle);
      } catch (error) {
        logEvent('warn', 'auth:authorization_callback_failed', {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    const record = await this.exchange.completeAuthorization(handle, {
      signal: options.signal,
      timeoutMs: this.authTimeoutMs,
    });
    await this.store.write(record);
    await this.notify('token:authorized', { expiresAt: new Date(record.expires_at) });
    return record;
  }

  private async notify<Name extends keyof TokenOrchestratorEvents>(
    name: Name,
    data: TokenOrchestratorEvents[Name],
  ): Promise<void> {
    try {
      await this.events.emit(name, data);
    } catch (error) {
      logEvent('warn', 'auth:listener_failed', {
        event: name,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
