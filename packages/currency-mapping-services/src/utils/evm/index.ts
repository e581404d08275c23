export * from './token-metadata.js';
