export * from './keeper-server.js';
