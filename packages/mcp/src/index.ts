export * from './config-loader.js';
export * from './keeper-factory.js';
export * from './ads/index.js';
export * from './tools/index.js';
export * from './server/index.js';
export { jsonResult, errorResult, describeFailure, type ToolFailure } from './utils/responses.js';
