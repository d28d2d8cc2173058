export * from './command-helpers.js';
export * from './config-helpers.js';
export * from './error-handler.js';
