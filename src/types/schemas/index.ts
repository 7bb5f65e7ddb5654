export * from './config.js';
export * from './client.js';
