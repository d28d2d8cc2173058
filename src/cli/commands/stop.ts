import * as p from '@clack/prompts';
import { Command } from 'commander';
import color from 'picocolors';
import { parseRepository, stringifyRepository } from '../../utils/index.js';
import {
  createRuntime,
  createSpinner,
  loadConfig,
  logSuccess,
  logWarning,
  withErrorHandling,
} from '../utils/index.js';

interface StopOptions {
  config?: string;
}

export const stopCommand = new Command('stop')
  .description("Stop a single repository's runner container")
  .argument('<repository>', 'owner/repo or GitHub URL')
  .option('-c, --config <file>', 'Configuration file path')
  .action(
    withErrorHandling(async (repositoryInput: string, options: StopOptions) => {
      p.intro(color.cyan('Runner Reconciler - Stop Runner'));

      const repository = parseRepository(repositoryInput);
      const repoKey = stringifyRepository(repository);
      const config = await loadConfig(options);

      const spinner = createSpinner();
      spinner.start(`Stopping runner for ${repoKey}...`);
      let found: boolean;
      try {
        found = await createRuntime(config).stopRunner(repository);
      } finally {
        spinner.stop();
      }

      if (found) {
        logSuccess(`Runner for ${repoKey} stopped`);
      } else {
        logWarning(`No runner container for ${repoKey}, already stopped`);
      }
      p.outro(color.green('Done!'));
    }),
  );
