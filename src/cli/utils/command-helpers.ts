import * as p from '@clack/prompts';
import color from 'picocolors';
import type { PassSummary, RepositoryIdentity, RunnerContainer } from '../../types/index.js';
import { stringifyRepository } from '../../utils/index.js';
import { logger } from '../../utils/logger.js';

/**
 * Create a spinner with consistent styling
 */
export function createSpinner() {
  return p.spinner();
}

export function logSuccess(message: string): void {
  p.log.success(color.green(`✓ ${message}`));
}

export function logWarning(message: string): void {
  p.log.warn(color.yellow(`! ${message}`));
}

export function logInfo(message: string): void {
  p.log.info(color.cyan(`i ${message}`));
}

export function logError(message: string): void {
  p.log.error(color.red(`× ${message}`));
}

function formatList(repositories: RepositoryIdentity[]): string {
  return repositories.length > 0
    ? repositories.map(stringifyRepository).join(', ')
    : color.dim('none');
}

export function getContainerStateDisplay(container: RunnerContainer): {
  indicator: string;
  text: string;
} {
  switch (container.state) {
    case 'running':
      return { indicator: color.green('●'), text: color.green('Running') };
    case 'created':
    case 'restarting':
    case 'paused':
      return { indicator: color.yellow('●'), text: color.yellow(container.state) };
    default:
      return { indicator: color.red('✗'), text: color.red(container.state) };
  }
}

/**
 * Display the outcome of a reconcile pass
 */
export function displaySummary(summary: PassSummary): void {
  const { plan } = summary;

  logger.emptyLine();
  logger.plain(`  ${color.bold('Owner:')}        ${plan.owner}`);
  logger.plain(`  ${color.bold('Evaluated:')}    ${plan.evaluated}`);
  logger.plain(`  ${color.bold('Self-hosted:')}  ${plan.selfHosted.length}`);
  logger.plain(`  ${color.bold('Active:')}       ${formatList(plan.desired)}`);

  if (summary.dryRun) {
    logger.plain(`  ${color.bold('Would start:')}  ${formatList(plan.toStart)}`);
    logger.plain(`  ${color.bold('Would stop:')}   ${formatList(plan.toStop)}`);
  } else {
    logger.plain(`  ${color.bold('Started:')}      ${formatList(summary.started)}`);
    logger.plain(`  ${color.bold('Stopped:')}      ${formatList(summary.stopped)}`);
  }
  logger.plain(`  ${color.bold('Unchanged:')}    ${formatList(plan.unchanged)}`);

  if (plan.undetermined.length > 0) {
    logger.plain(`  ${color.bold('Undetermined:')} ${formatList(plan.undetermined)}`);
  }
  if (summary.removedStale.length > 0) {
    logger.plain(`  ${color.bold('Removed stale:')} ${formatList(summary.removedStale)}`);
  }
  logger.emptyLine();

  for (const warning of plan.warnings) {
    logWarning(
      `${stringifyRepository(warning.repository)} [${warning.operation}]: ${warning.message}`,
    );
  }
  for (const failure of summary.failures) {
    logError(
      `${stringifyRepository(failure.repository)} [${failure.operation}]: ${failure.message}`,
    );
  }
}
