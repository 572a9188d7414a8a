export * from './enums/auth.js';
export * from './types/index.js';
