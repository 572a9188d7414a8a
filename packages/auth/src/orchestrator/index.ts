export * from './token-orchestrator.js';
