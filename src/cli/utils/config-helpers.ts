import { ConfigLoader, type ConfigOverrides } from '../../lib/config/index.js';
import { GitHubClient } from '../../lib/github/index.js';
import { Reconciler } from '../../lib/reconciler/index.js';
import { DockerRuntime } from '../../lib/runtime/index.js';
import type { ReconcilerConfig } from '../../types/index.js';
import { getTokenType } from '../../utils/github-cli.js';
import { logger } from '../../utils/logger.js';

export interface CommonOptions {
  config?: string;
}

/**
 * Load configuration and apply its log level
 */
export async function loadConfig(
  options: CommonOptions,
  overrides: ConfigOverrides = {},
): Promise<ReconcilerConfig> {
  const config = await new ConfigLoader().load(options.config, overrides);
  logger.setLevel(config.logging.level);
  logger.debug(`Using ${getTokenType(config.github.token)}`);
  return config;
}

export function createRuntime(config: ReconcilerConfig): DockerRuntime {
  return new DockerRuntime(config.runner);
}

export function createReconciler(config: ReconcilerConfig): Reconciler {
  return new Reconciler(config, {
    github: new GitHubClient(config.github),
    runtime: createRuntime(config),
  });
}
