export * from './logging/index.js';
export * from './validation-utils.js';
export * from './auth/index.js';
export * from './paths.js';
export { OperationQueue } from './utils/operation-queue.js';

export * as RequestUtils from './utils/request/index.js';
