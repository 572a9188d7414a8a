export * from './delay.js';
export * from './discard-body.js';
export * from './read-json-body.js';
