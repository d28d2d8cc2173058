import type { RepositoryIdentity } from '../types/index.js';

// Characters GitHub accepts in logins and repository names. Enterprise managed users
// may carry an underscore in the login, so it is accepted there too.
const OWNER_PATTERN = /^[A-Za-z0-9](?:[A-Za-z0-9_-]{0,38})$/;
const REPO_PATTERN = /^[A-Za-z0-9._-]{1,100}$/;

/**
 * Validate an owner or repository name against the GitHub alphabet
 * @throws Error when the component is empty or carries characters outside it
 */
export function validateComponent(component: string, componentType: 'owner' | 'repo'): string {
  if (!component) {
    throw new Error(`Invalid repository ${componentType}: cannot be empty`);
  }

  if (componentType === 'owner' && !OWNER_PATTERN.test(component)) {
    throw new Error(
      `Invalid repository owner "${component}": must be alphanumeric with hyphens or underscores`,
    );
  }

  if (componentType === 'repo') {
    if (!REPO_PATTERN.test(component)) {
      throw new Error(
        `Invalid repository repo "${component}": must contain only alphanumeric characters, hyphens, underscores, and dots`,
      );
    }
    if (component === '.' || component === '..') {
      throw new Error(`Invalid repository repo "${component}": reserved name`);
    }
  }

  return component;
}

export function isValidRepositoryIdentity(owner: string, repo: string): boolean {
  try {
    validateComponent(owner, 'owner');
    validateComponent(repo, 'repo');
    return true;
  } catch {
    return false;
  }
}

export function toRepositoryIdentity(owner: string, repo: string): RepositoryIdentity {
  return {
    owner: validateComponent(owner, 'owner'),
    repo: validateComponent(repo, 'repo'),
  };
}

/**
 * Accepts `owner/repo`, `https://github.com/owner/repo(.git)`, `git@github.com:owner/repo.git`
 */
export function parseRepository(repoString: string): RepositoryIdentity {
  const trimmed = repoString.trim();

  const urlPatterns = [
    /^https?:\/\/github\.com\/([^/]+)\/([^/\s]+?)(?:\.git)?\/?$/,
    /^git@github\.com:([^/]+)\/([^/\s]+?)(?:\.git)?$/,
    /^github\.com\/([^/]+)\/([^/\s]+?)(?:\.git)?$/,
  ];

  for (const pattern of urlPatterns) {
    const match = trimmed.match(pattern);
    if (match?.[1] && match[2]) {
      return toRepositoryIdentity(match[1], match[2]);
    }
  }

  const parts = trimmed.split('/');
  if (parts.length === 2 && parts[0] && parts[1]) {
    return toRepositoryIdentity(parts[0], parts[1]);
  }

  throw new Error(
    `Invalid repository format: ${repoString}\n` +
      `Expected formats:\n` +
      `  - owner/repo\n` +
      `  - https://github.com/owner/repo\n` +
      `  - git@github.com:owner/repo.git`,
  );
}

export function stringifyRepository(repo: RepositoryIdentity): string {
  return `${repo.owner}/${repo.repo}`;
}
