import { describe, expect, it } from 'vitest';
import {
  ContainerNameCodec,
  DEFAULT_NAME_PREFIX,
} from '../../../../src/lib/runtime/container-name.js';

describe('ContainerNameCodec', () => {
  const codec = new ContainerNameCodec();

  it('should use the default prefix', () => {
    expect(DEFAULT_NAME_PREFIX).toBe('actions-runner');
    expect(codec.marker).toBe('actions-runner_');
  });

  it('should encode the owner length before the owner', () => {
    expect(codec.encode({ owner: 'acme', repo: 'api' })).toBe('actions-runner_4_acme_api');
  });

  it('should decode what it encodes', () => {
    const repositories = [
      { owner: 'acme', repo: 'api' },
      { owner: 'a', repo: 'b' },
      { owner: 'my-org', repo: 'web.site' },
      { owner: 'emu_user', repo: 'my_repo_2' },
      { owner: 'acme_1', repo: 'x' },
      { owner: 'acme', repo: '1_x' },
    ];

    for (const repository of repositories) {
      expect(codec.decode(codec.encode(repository))).toEqual(repository);
    }
  });

  it('should keep owners and repositories containing the separator apart', () => {
    const first = codec.encode({ owner: 'acme_1', repo: 'x' });
    const second = codec.encode({ owner: 'acme', repo: '1_x' });

    expect(first).toBe('actions-runner_6_acme_1_x');
    expect(second).toBe('actions-runner_4_acme_1_x');
    expect(first).not.toBe(second);
  });

  it('should accept the leading slash Docker reports', () => {
    expect(codec.decode('/actions-runner_4_acme_api')).toEqual({ owner: 'acme', repo: 'api' });
  });

  it.each([
    'other_4_acme_api',
    'actions-runner_acme_api',
    'actions-runner_0__api',
    'actions-runner_04_acme_api',
    'actions-runner_9_acme_api',
    'actions-runner_4_acme-api',
    'actions-runner_4_acme_',
    'actions-runner_4_ac$e_api',
    'actions-runner_',
  ])('should not decode "%s"', (name) => {
    expect(codec.decode(name)).toBeUndefined();
  });

  it('should honour a custom prefix', () => {
    const custom = new ContainerNameCodec('ci.runner');
    const name = custom.encode({ owner: 'acme', repo: 'api' });

    expect(name).toBe('ci.runner_4_acme_api');
    expect(custom.decode(name)).toEqual({ owner: 'acme', repo: 'api' });
    expect(codec.decode(name)).toBeUndefined();
  });

  it('should reject invalid prefixes', () => {
    expect(() => new ContainerNameCodec('_runner')).toThrowError('Invalid container name prefix');
    expect(() => new ContainerNameCodec('')).toThrowError('Invalid container name prefix');
  });

  it('should refuse to encode invalid repositories', () => {
    expect(() => codec.encode({ owner: 'acme', repo: 'bad/name' })).toThrowError(
      'Cannot encode container name for invalid repository acme/bad/name',
    );
  });
});
