export * from './classify-token-state.js';
