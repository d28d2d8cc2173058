import { beforeEach, describe, expect, it, vi } from 'vitest';

// Mock child_process
vi.mock('child_process', () => ({
  execSync: vi.fn(),
}));

// Mock logger
vi.mock('../../../src/utils/logger.js', () => ({
  logger: {
    debug: vi.fn(),
  },
}));

import { execSync } from 'child_process';
import {
  getTokenType,
  isGitHubCLIInstalled,
  readGitHubCLIToken,
} from '../../../src/utils/github-cli.js';

describe('github-cli', () => {
  beforeEach(() => {
    vi.mocked(execSync).mockReset();
  });

  describe('isGitHubCLIInstalled', () => {
    it('should return true if GitHub CLI is installed', () => {
      vi.mocked(execSync).mockReturnValue('/usr/local/bin/gh');

      expect(isGitHubCLIInstalled()).toBe(true);
      expect(execSync).toHaveBeenCalledWith('which gh', { encoding: 'utf8', stdio: 'pipe' });
    });

    it('should return true on Windows if GitHub CLI is installed', () => {
      vi.mocked(execSync).mockImplementation((cmd) => {
        if (cmd === 'which gh') {
          throw new Error('Command not found');
        }
        return 'C:\\Program Files\\GitHub CLI\\gh.exe';
      });

      expect(isGitHubCLIInstalled()).toBe(true);
      expect(execSync).toHaveBeenCalledWith('where gh', { encoding: 'utf8', stdio: 'pipe' });
    });

    it('should return false if GitHub CLI is not installed', () => {
      vi.mocked(execSync).mockImplementation(() => {
        throw new Error('Command not found');
      });

      expect(isGitHubCLIInstalled()).toBe(false);
    });
  });

  describe('readGitHubCLIToken', () => {
    it('should return the trimmed token of the current session', () => {
      vi.mocked(execSync).mockImplementation((cmd) =>
        cmd === 'gh auth token' ? 'test-cli-token\n' : '/usr/local/bin/gh',
      );

      expect(readGitHubCLIToken()).toBe('test-cli-token');
    });

    it('should return null when not authenticated', () => {
      vi.mocked(execSync).mockImplementation((cmd) => {
        if (cmd === 'gh auth token') {
          throw new Error('no oauth token found');
        }
        return '/usr/local/bin/gh';
      });

      expect(readGitHubCLIToken()).toBeNull();
    });

    it('should return null when the CLI is missing', () => {
      vi.mocked(execSync).mockImplementation(() => {
        throw new Error('Command not found');
      });

      expect(readGitHubCLIToken()).toBeNull();
      expect(execSync).not.toHaveBeenCalledWith('gh auth token', expect.anything());
    });
  });

  describe('getTokenType', () => {
    it('should recognise token prefixes', () => {
      expect(getTokenType('ghp_placeholder')).toBe('Personal Access Token (classic)');
      expect(getTokenType('github_pat_placeholder')).toBe('Personal Access Token (fine-grained)');
      expect(getTokenType('gho_placeholder')).toBe('OAuth token');
      expect(getTokenType('ghs_placeholder')).toBe('GitHub App installation token');
      expect(getTokenType('ghu_placeholder')).toBe('GitHub App user token');
      expect(getTokenType('test-token')).toBe('GitHub token');
    });
  });
});
