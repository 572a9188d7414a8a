// Errors
export * from './errors/credential-error.js';

// Implementations
export * from './implementations/file-credential-store.js';
export * from './implementations/memory-credential-store.js';
export * from './implementations/http-oauth-exchange-client.js';

// Factory
export * from './credential-store-factory.js';

export * from './evaluator/index.js';
export * from './orchestrator/index.js';

export { parseExpiresAt, resolveExpiresAt, toCredentialRecord, DEFAULT_EXPIRY_SECONDS } from './utils/token/index.js';
export { readJsonBody } from './utils/http/index.js';
