import { describe, expect, it } from 'vitest';
import { reconcileCommand } from '../../../../src/cli/commands/reconcile.js';
import { statusCommand } from '../../../../src/cli/commands/status.js';
import { stopCommand } from '../../../../src/cli/commands/stop.js';
import { teardownCommand } from '../../../../src/cli/commands/teardown.js';

describe('reconcile command', () => {
  it('should have correct command properties', () => {
    expect(reconcileCommand.name()).toBe('reconcile');
    expect(reconcileCommand.description()).toBe(
      'Start and stop runner containers to match repository activity',
    );
    expect(reconcileCommand.options.map((option) => option.flags)).toEqual([
      '-c, --config <file>',
      '--owner <owner>',
      '--threshold <duration>',
      '--image <image>',
      '--concurrency <n>',
      '--teardown',
      '--dry-run',
    ]);
  });
});

describe('status command', () => {
  it('should have correct command properties', () => {
    expect(statusCommand.name()).toBe('status');
    expect(statusCommand.description()).toBe('Show runner containers in the container runtime');
    expect(statusCommand.options.map((option) => option.flags)).toEqual(['-c, --config <file>']);
  });
});

describe('stop command', () => {
  it('should take a repository argument', () => {
    expect(stopCommand.name()).toBe('stop');
    expect(stopCommand.registeredArguments.map((argument) => argument.name())).toEqual([
      'repository',
    ]);
    expect(stopCommand.registeredArguments[0]?.required).toBe(true);
    expect(stopCommand.options.map((option) => option.flags)).toEqual(['-c, --config <file>']);
  });
});

describe('teardown command', () => {
  it('should offer a confirmation bypass', () => {
    expect(teardownCommand.name()).toBe('teardown');
    expect(teardownCommand.options.map((option) => option.flags)).toEqual([
      '-c, --config <file>',
      '--owner <owner>',
      '-y, --yes',
    ]);
  });
});
