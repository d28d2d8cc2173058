import * as p from '@clack/prompts';
import { Command } from 'commander';
import color from 'picocolors';
import type { RunnerContainer } from '../../types/index.js';
import { isLive } from '../../lib/runtime/index.js';
import { stringifyRepository } from '../../utils/index.js';
import { logger } from '../../utils/logger.js';
import {
  createRuntime,
  createSpinner,
  getContainerStateDisplay,
  loadConfig,
  logInfo,
  logSuccess,
  logWarning,
  withErrorHandling,
} from '../utils/index.js';

interface StatusOptions {
  config?: string;
}

export const statusCommand = new Command('status')
  .description('Show runner containers in the container runtime')
  .option('-c, --config <file>', 'Configuration file path')
  .action(
    withErrorHandling(async (options: StatusOptions) => {
      p.intro(color.cyan('Runner Reconciler - Runner Status'));

      const config = await loadConfig(options);
      const spinner = createSpinner();
      spinner.start('Listing runner containers...');

      let containers: RunnerContainer[];
      try {
        containers = await createRuntime(config).listRunnerContainers();
      } finally {
        spinner.stop();
      }

      if (containers.length === 0) {
        logInfo('No runner containers found');
        p.outro(color.dim('Run "runner-reconciler reconcile" to start runners'));
        return;
      }

      logger.emptyLine();
      for (const container of containers) {
        const { indicator, text } = getContainerStateDisplay(container);
        const repoKey = color.bold(stringifyRepository(container.repository));
        const id = color.dim(`(${container.id.slice(0, 12)})`);
        logger.plain(`  ${indicator} ${repoKey} - ${text} ${id}`);
      }
      logger.emptyLine();

      const live = containers.filter(isLive).length;
      const stale = containers.length - live;
      logSuccess(`Total: ${containers.length} container(s) (${live} live, ${stale} stale)`);
      if (stale > 0) {
        logWarning('Stale containers are removed on the next reconcile pass');
      }

      p.outro(color.green('Done!'));
    }),
  );
