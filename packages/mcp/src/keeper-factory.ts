import {
  CredentialStoreFactory,
  HttpOAuthExchangeClient,
  TokenOrchestrator,
  type CredentialStoreType,
  type FetchLike,
} from '@credential-keeper/auth';
import { AdsApiClient } from './ads/ads-api-client.js';
import type { ResolvedKeeperConfig } from './config-loader.js';

export interface KeeperComponents {
  orchestrator: TokenOrchestrator;
  ads: AdsApiClient;
}

export interface CreateKeeperOptions {
  store?: CredentialStoreType;
  fetchFn?: FetchLike;
}

/**
 * Wires store, exchange client, orchestrator and Ads client from configuration.
 * @public
 */
export function createKeeper(config: ResolvedKeeperConfig, options: CreateKeeperOptions = {}): KeeperComponents {
  const fetchFn: FetchLike = options.fetchFn ?? ((input, init) => fetch(input, init));
  const store = CredentialStoreFactory.create(options.store ?? 'file', config.credentialsPath);
  const exchange = new HttpOAuthExchangeClient(
    {
      baseUrl: config.oauthBaseUrl,
      scope: config.scope,
      requestTimeoutMs: config.requestTimeoutMs,
      authTimeoutMs: config.authTimeoutMs,
      pollIntervalMs: config.pollIntervalMs,
    },
    fetchFn,
  );
  const orchestrator = new TokenOrchestrator({
    store,
    exchange,
    skewWindowMs: config.skewWindowMs,
    authTimeoutMs: config.authTimeoutMs,
  });
  const ads = new AdsApiClient(
    {
      baseUrl: config.adsApiBase,
      version: config.adsApiVersion,
      developerToken: config.developerToken,
      requestTimeoutMs: config.requestTimeoutMs,
    },
    (options) => orchestrator.getAuthorizationHeaders(options),
    fetchFn,
  );
  return { orchestrator, ads };
}
