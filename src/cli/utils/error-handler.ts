import * as p from '@clack/prompts';
import color from 'picocolors';
import {
  CLIError,
  ErrorCodes,
  formatError,
  isTimeoutError,
  RuntimeError,
  TransportError,
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export function exitCodeFor(error: unknown): number {
  if (error instanceof CLIError) {
    return error.exitCode;
  }
  if (error instanceof TransportError) {
    return isTimeoutError(error.cause) ? ErrorCodes.TIMEOUT : ErrorCodes.NETWORK_ERROR;
  }
  return ErrorCodes.GENERAL_ERROR;
}

/**
 * Wraps a command action: reports what went wrong and exits with the code of its kind.
 */
export function withErrorHandling<T extends unknown[]>(
  action: (...args: T) => Promise<void> | void,
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      p.log.error(formatError(error));

      if (error instanceof CLIError && error.details) {
        logger.dim(`  ${error.details}`);
      } else if (error instanceof RuntimeError) {
        logger.dim(`  Container: ${error.containerName}`);
      }
      if (process.env.DEBUG && error instanceof Error && error.stack) {
        logger.plain(color.dim(error.stack));
      }

      process.exit(exitCodeFor(error));
    }
  };
}

export function handleCancel(message = 'Operation cancelled'): never {
  p.cancel(message);
  process.exit(0);
}

export function checkCancel<T>(value: T | symbol): asserts value is T {
  if (p.isCancel(value)) {
    handleCancel();
  }
}
