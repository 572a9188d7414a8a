export * from './StartResponseSchema.js';
export * from './TokenResponseSchema.js';
export * from './PollStatusSchema.js';
