export * from './KeeperConfigSchema.js';
