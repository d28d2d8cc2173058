import * as p from '@clack/prompts';
import { Command } from 'commander';
import color from 'picocolors';
import { checkCancel, handleCancel, withErrorHandling } from '../utils/index.js';
import { runReconcile } from './reconcile.js';

interface TeardownOptions {
  config?: string;
  owner?: string;
  yes?: boolean;
}

export const teardownCommand = new Command('teardown')
  .description('Stop every runner container of the owner')
  .option('-c, --config <file>', 'Configuration file path')
  .option('--owner <owner>', 'Repository owner (user or organization, or @me)')
  .option('-y, --yes', 'Skip confirmation')
  .action(
    withErrorHandling(async (options: TeardownOptions) => {
      p.intro(color.cyan('Runner Reconciler - Teardown'));

      if (!options.yes) {
        const confirmed = await p.confirm({
          message: color.yellow('Stop and remove all runner containers?'),
          initialValue: false,
        });
        checkCancel(confirmed);
        if (!confirmed) {
          handleCancel('Teardown cancelled');
        }
      }

      await runReconcile({ config: options.config, owner: options.owner, teardown: true });
      p.outro(color.green('Done!'));
    }),
  );
