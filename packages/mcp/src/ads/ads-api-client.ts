import { z } from 'zod';
import { CredentialError, readJsonBody, toError, type EnsureTokenOptions, type FetchLike } from '@credential-keeper/auth';
import { logEvent, RequestUtils, ValidationUtils } from '@credential-keeper/core';
import {
  AccessibleCustomersSchema,
  KeywordIdeasResponseSchema,
  SearchPageSchema,
  type KeywordIdeasResponse,
  type SearchPage,
} from '@credential-keeper/schemas';
import { AdsApiError } from './ads-api-error.js';
import { normalizeCustomerId } from './customer-id.js';

export const DEFAULT_ADS_REQUEST_TIMEOUT_MS = 60_000;
export const MAX_PAGE_SIZE = 10_000;

export interface AdsApiClientOptions {
  /** e.g. https://googleads.googleapis.com */
  baseUrl: string;
  /** e.g. v22 */
  version: string;
  developerToken?: string;
  requestTimeoutMs?: number;
}

/**
 * Supplies the Authorization header; may run an OAuth flow first
 */
export type AuthorizationProvider = (options: EnsureTokenOptions) => Promise<Record<string, string>>;

export interface AdsRequestOptions extends EnsureTokenOptions {
  /** Manager account used to reach the customer */
  loginCustomerId?: string;
}

export interface SearchAllOptions extends AdsRequestOptions {
  pageSize?: number;
  maxPages?: number;
}

export interface SearchAllResult {
  results: SearchPage['results'];
  pages: number;
  /** Set when maxPages stopped the paging early */
  nextPageToken?: string;
}

/**
 * Thin Google Ads REST client. Queries and result rows pass through unchanged.
 * @example
 * ```typescript
 * const ads = new AdsApiClient(
 *   { baseUrl: 'https://googleads.googleapis.com', version: 'v22', developerToken },
 *   (options) => orchestrator.getAuthorizationHeaders(options),
 * );
 * const names = await ads.listAccessibleCustomers();
 * ```
 * @public
 */
export class AdsApiClient {
  private readonly baseUrl: string;
  private readonly developerToken?: string;
  private readonly requestTimeoutMs: number;

  public constructor(
    options: AdsApiClientOptions,
    private readonly authorize: AuthorizationProvider,
    private readonly fetchFn: FetchLike = (input, init) => fetch(input, init),
  ) {
    ValidationUtils.validateUrl(options.baseUrl, 'Ads API base URL');
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_ADS_REQUEST_TIMEOUT_MS;
    ValidationUtils.validatePositiveDuration(this.requestTimeoutMs, 'requestTimeoutMs');
    this.baseUrl = `${options.baseUrl.replace(/\/+$/, '')}/${options.version}`;
    this.developerToken = options.developerToken;
  }

  /**
   * Resource names (`customers/1234567890`) the signed-in user can reach
   */
  public async listAccessibleCustomers(options: AdsRequestOptions = {}): Promise<string[]> {
    const body = await this.request(
      'listAccessibleCustomers',
      'GET',
      'customers:listAccessibleCustomers',
      AccessibleCustomersSchema,
      undefined,
      options,
    );
    return body.resourceNames;
  }

  /**
   * One page of a query
   */
  public async search(
    customerId: string,
    request: { query: string; pageSize?: number; pageToken?: string },
    options: AdsRequestOptions = {},
  ): Promise<SearchPage> {
    return this.request(
      'search',
      'POST',
      `customers/${normalizeCustomerId(customerId)}/googleAds:search`,
      SearchPageSchema,
      request,
      options,
    );
  }

  /**
   * Follows nextPageToken until the last page or `maxPages`
   */
  public async searchAll(customerId: string, query: string, options: SearchAllOptions = {}): Promise<SearchAllResult> {
    const maxPages = options.maxPages ?? 10;
    const pageSize = options.pageSize;
    if (pageSize !== undefined && (pageSize < 1 || pageSize > MAX_PAGE_SIZE)) {
      throw new RangeError(`pageSize must be between 1 and ${MAX_PAGE_SIZE}, got ${pageSize}`);
    }

    const results: SearchPage['results'] = [];
    let pageToken: string | undefined;
    let pages = 0;

    while (pages < maxPages) {
      const page = await this.search(customerId, { query, pageSize, pageToken }, options);
      results.push(...page.results);
      pages += 1;
      pageToken = page.nextPageToken || undefined;
      if (!pageToken) break;
    }

    return { results, pages, ...(pageToken && { nextPageToken: pageToken }) };
  }

  public async generateKeywordIdeas(
    customerId: string,
    request: Record<string, unknown>,
    options: AdsRequestOptions = {},
  ): Promise<KeywordIdeasResponse> {
    return this.request(
      'generateKeywordIdeas',
      'POST',
      `customers/${normalizeCustomerId(customerId)}:generateKeywordIdeas`,
      KeywordIdeasResponseSchema,
      request,
      options,
    );
  }

  private async headers(options: AdsRequestOptions): Promise<Record<string, string>> {
    if (!this.developerToken) {
      throw CredentialError.configurationError(['KEEPER_DEVELOPER_TOKEN: required for Google Ads requests']);
    }
    const headers: Record<string, string> = {
      ...(await this.authorize({ signal: options.signal, onAuthorizationRequired: options.onAuthorizationRequired })),
      'developer-token': this.developerToken,
      Accept: 'application/json',
    };
    if (options.loginCustomerId) {
      headers['login-customer-id'] = normalizeCustomerId(options.loginCustomerId);
    }
    return headers;
  }

  private async request<T>(
    operation: string,
    method: 'GET' | 'POST',
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body: unknown,
    options: AdsRequestOptions,
  ): Promise<T> {
    const headers = await this.headers(options);
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    const requestId = RequestUtils.generateRequestId('ads');
    headers['X-Request-ID'] = requestId;

    const timeout = AbortSignal.timeout(this.requestTimeoutMs);
    logEvent('debug', 'ads:request', { requestId, operation, path });

    let response: Response;
    try {
      response = await this.fetchFn(`${this.baseUrl}/${path}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: options.signal ? AbortSignal.any([options.signal, timeout]) : timeout,
      });
    } catch (error) {
      const cause = toError(error);
      if (options.signal?.aborted) {
        throw new AdsApiError(`${operation} was cancelled`, { cause });
      }
      const detail = timeout.aborted ? `no response within ${Math.round(this.requestTimeoutMs / 1000)}s` : cause.message;
      throw new AdsApiError(`${operation} request failed: ${detail}`, { cause });
    }

    const json = await readJsonBody(response);
    if (!response.ok) {
      logEvent('warn', 'ads:request_failed', { requestId, operation, status: response.status });
      throw AdsApiError.fromResponse(operation, response.status, json);
    }

    const parsed = schema.safeParse(json ?? {});
    if (!parsed.success) {
      throw new AdsApiError(`${operation} returned an unexpected body`, { status: response.status });
    }
    return parsed.data;
  }
}
