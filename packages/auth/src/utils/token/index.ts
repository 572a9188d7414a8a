export * from './parse-expires-at.js';
export * from './to-credential-record.js';
