export * from './ads-api-client.js';
export * from './ads-api-error.js';
export * from './customer-id.js';
