/**
 * Types describing the hosted OAuth helper the keeper talks to
 */
export * from './AuthorizationHandle.js';
export * from './OAuthEndpoints.js';
export * from './TokenResponse.js';
