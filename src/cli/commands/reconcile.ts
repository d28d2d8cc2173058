import * as p from '@clack/prompts';
import { Command } from 'commander';
import color from 'picocolors';
import type { PassSummary } from '../../types/index.js';
import {
  createReconciler,
  displaySummary,
  loadConfig,
  logSuccess,
  logWarning,
  withErrorHandling,
} from '../utils/index.js';

export interface ReconcileCommandOptions {
  config?: string;
  owner?: string;
  threshold?: string;
  image?: string;
  concurrency?: string;
  teardown?: boolean;
  dryRun?: boolean;
}

/**
 * Run one pass and report it. A pass with per-repository failures sets exit code 1.
 */
export async function runReconcile(options: ReconcileCommandOptions): Promise<PassSummary> {
  const config = await loadConfig(options, {
    owner: options.owner,
    threshold: options.threshold,
    image: options.image,
    concurrency: options.concurrency,
    teardown: options.teardown,
  });

  // No spinner: the pass writes its own progress lines
  p.log.step(`Reconciling runners for ${config.owner}`);
  const summary = await createReconciler(config).run({ dryRun: options.dryRun });

  displaySummary(summary);

  if (summary.failures.length > 0) {
    logWarning(`${summary.failures.length} operation(s) failed`);
    process.exitCode = 1;
  } else {
    logSuccess(summary.dryRun ? 'Dry run complete' : 'Runners reconciled');
  }

  return summary;
}

export const reconcileCommand = new Command('reconcile')
  .description('Start and stop runner containers to match repository activity')
  .option('-c, --config <file>', 'Configuration file path')
  .option('--owner <owner>', 'Repository owner (user or organization, or @me)')
  .option('--threshold <duration>', 'Activity window, e.g. 7d, 36h')
  .option('--image <image>', 'Runner container image')
  .option('--concurrency <n>', 'Maximum concurrent requests')
  .option('--teardown', 'Stop every runner container')
  .option('--dry-run', 'Compute the plan without starting or stopping containers')
  .action(
    withErrorHandling(async (options: ReconcileCommandOptions) => {
      p.intro(color.cyan('Runner Reconciler'));
      await runReconcile(options);
      p.outro(color.green('Done!'));
    }),
  );
