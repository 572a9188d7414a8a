export * from './credentials/index.js';
export * from './oauth/index.js';
