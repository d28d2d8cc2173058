#!/usr/bin/env node

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { logger } from '../utils/index.js';
import { reconcileCommand } from './commands/reconcile.js';
import { statusCommand } from './commands/status.js';
import { stopCommand } from './commands/stop.js';
import { teardownCommand } from './commands/teardown.js';

dotenv.config();

const __dirname = dirname(fileURLToPath(import.meta.url));

const packageJson: unknown = JSON.parse(
  readFileSync(join(__dirname, '..', '..', 'package.json'), 'utf-8'),
);
const version =
  typeof packageJson === 'object' &&
  packageJson !== null &&
  'version' in packageJson &&
  typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

const program = new Command();

program
  .name('runner-reconciler')
  .description('Keep self-hosted GitHub Actions runner containers in step with repository activity')
  .version(version);

program.addCommand(reconcileCommand, { isDefault: true });
program.addCommand(statusCommand);
program.addCommand(stopCommand);
program.addCommand(teardownCommand);

async function main() {
  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (error instanceof Error) {
      logger.error(error.message);
    }
    process.exit(1);
  }
}

void main();
