export { ConfigLoader, type ConfigOverrides, CONFIG_MODULE_NAME, DEFAULT_RUNNER_IMAGE } from './config-loader.js';
