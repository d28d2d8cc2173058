export * from './errors.js';
export * from './github-cli.js';
export * from './logger.js';
export * from './parser.js';
