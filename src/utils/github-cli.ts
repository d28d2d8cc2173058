import { execSync } from 'child_process';
import { logger } from './logger.js';

export function isGitHubCLIInstalled(): boolean {
  try {
    execSync('which gh', { encoding: 'utf8', stdio: 'pipe' });
    return true;
  } catch {
    try {
      execSync('where gh', { encoding: 'utf8', stdio: 'pipe' });
      return true;
    } catch {
      return false;
    }
  }
}

/**
 * Read the token of an already authenticated GitHub CLI session. Never prompts.
 */
export function readGitHubCLIToken(): string | null {
  if (!isGitHubCLIInstalled()) {
    logger.debug('GitHub CLI (gh) is not installed');
    return null;
  }

  try {
    const token = execSync('gh auth token', { encoding: 'utf-8', stdio: 'pipe' }).trim();
    return token || null;
  } catch {
    logger.debug('GitHub CLI is installed but not authenticated');
    return null;
  }
}

/**
 * GitHub tokens have specific prefixes:
 * - ghp_: Personal Access Token (classic)
 * - github_pat_: Personal Access Token (fine-grained)
 * - gho_: OAuth token (GitHub CLI)
 * - ghs_: GitHub App installation token
 * - ghu_: GitHub App user token
 */
export function getTokenType(token: string): string {
  if (token.startsWith('ghp_')) {
    return 'Personal Access Token (classic)';
  } else if (token.startsWith('github_pat_')) {
    return 'Personal Access Token (fine-grained)';
  } else if (token.startsWith('gho_')) {
    return 'OAuth token';
  } else if (token.startsWith('ghs_')) {
    return 'GitHub App installation token';
  } else if (token.startsWith('ghu_')) {
    return 'GitHub App user token';
  }
  return 'GitHub token';
}
