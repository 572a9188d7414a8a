export * from './AdsResponseSchemas.js';
