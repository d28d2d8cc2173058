import { Octokit } from '@octokit/rest';
import type { GitHubConfig, RepositoryIdentity } from '../../types/index.js';
import { parseTimestamp } from '../activity/index.js';
import {
  authenticationError,
  CLIError,
  formatError,
  getErrorStatus,
  isTimeoutError,
  isValidRepositoryIdentity,
  logger,
  stringifyRepository,
  TransportError,
} from '../../utils/index.js';

export const WORKFLOWS_DIRECTORY = '.github/workflows';
export const MAX_REPOSITORIES = 1000;
const PAGE_SIZE = 100;

interface RetryOptions {
  maxRetries?: number;
  retryDelay?: number;
  backoffMultiplier?: number;
}

interface RepositorySummary {
  name: string;
  archived?: boolean;
  owner: { login: string };
}

/**
 * Read-only queries against one owner's repositories, plus registration tokens.
 */
export interface SourceControlGateway {
  getAuthenticatedLogin(): Promise<string>;
  listRepositories(owner: string): Promise<RepositoryIdentity[]>;
  latestCommitTimestamp(repo: RepositoryIdentity): Promise<Date | undefined>;
  latestWorkflowRunTimestamp(repo: RepositoryIdentity): Promise<Date | undefined>;
  listWorkflowFiles(repo: RepositoryIdentity): Promise<string[]>;
  fetchFileContent(repo: RepositoryIdentity, path: string): Promise<string>;
  requestRegistrationToken(repo: RepositoryIdentity): Promise<string>;
}

export class GitHubClient implements SourceControlGateway {
  private octokit: Octokit;
  private login: string | undefined;
  private readonly timeoutMs: number;
  private defaultRetryOptions: Required<RetryOptions>;

  constructor(config: GitHubConfig) {
    this.octokit = new Octokit({
      auth: config.token,
      baseUrl: config.baseUrl,
    });
    this.timeoutMs = config.timeoutMs;
    this.defaultRetryOptions = {
      maxRetries: config.retries + 1,
      retryDelay: 1000,
      backoffMultiplier: 2,
    };
  }

  private request(): { signal: AbortSignal } {
    return { signal: AbortSignal.timeout(this.timeoutMs) };
  }

  /** Paginated listings get one timeout per page they may fetch. */
  private listingRequest(limit: number): { signal: AbortSignal } {
    const pages = Math.max(1, Math.ceil(limit / PAGE_SIZE));
    return { signal: AbortSignal.timeout(this.timeoutMs * pages) };
  }

  private async retryOperation<T>(
    operation: () => Promise<T>,
    operationName: string,
    options?: RetryOptions,
  ): Promise<T> {
    const { maxRetries, retryDelay, backoffMultiplier } = {
      ...this.defaultRetryOptions,
      ...options,
    };

    let lastError: unknown;
    let delay = retryDelay;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      try {
        return await operation();
      } catch (error) {
        lastError = error;

        if (!this.isRetryableError(error)) {
          throw error;
        }

        if (attempt < maxRetries) {
          logger.warn(
            `${operationName} failed (attempt ${attempt}/${maxRetries}), retrying in ${delay}ms...`,
            { error: formatError(error) },
          );

          await new Promise((resolve) => setTimeout(resolve, delay));
          delay *= backoffMultiplier;
        }
      }
    }

    throw lastError;
  }

  private isRetryableError(error: unknown): boolean {
    if (!(error instanceof Error)) {
      return false;
    }

    if (
      isTimeoutError(error) ||
      error.message.includes('ECONNREFUSED') ||
      error.message.includes('ECONNRESET') ||
      error.message.includes('ENOTFOUND') ||
      error.message.includes('ENETUNREACH')
    ) {
      return true;
    }

    const status = getErrorStatus(error);
    if (status) {
      return status >= 500 || status === 429 || status === 408;
    }

    return false;
  }

  private toTransportError(error: unknown, operationName: string): TransportError {
    if (error instanceof TransportError) {
      return error;
    }
    const status = getErrorStatus(error);
    return new TransportError(
      `${operationName} failed${status ? ` (HTTP ${status})` : ''}: ${formatError(error)}`,
      operationName,
      status,
      error,
    );
  }

  /**
   * Run a read query, mapping 404/409 to `fallback` and everything else to TransportError.
   */
  private async query<T>(
    operation: () => Promise<T>,
    operationName: string,
    fallback: () => T,
  ): Promise<T> {
    try {
      return await this.retryOperation(operation, operationName);
    } catch (error) {
      const transportError = this.toTransportError(error, operationName);
      if (transportError.isSoft) {
        logger.debug(`${operationName}: no data (HTTP ${transportError.status})`);
        return fallback();
      }
      throw transportError;
    }
  }

  async getAuthenticatedLogin(): Promise<string> {
    if (this.login) {
      return this.login;
    }

    try {
      const response = await this.retryOperation(
        () => this.octokit.users.getAuthenticated({ request: this.request() }),
        'getAuthenticatedLogin',
      );
      this.login = response.data.login;
      logger.debug(`Authenticated as ${this.login}`);
      return this.login;
    } catch (error) {
      const status = getErrorStatus(error);
      if (status === 401 || status === 403) {
        throw authenticationError('The GitHub token was rejected. It may be invalid or expired.');
      }
      throw this.toTransportError(error, 'getAuthenticatedLogin');
    }
  }

  /**
   * All non-archived repositories owned by `owner`, up to `limit`.
   */
  async listRepositories(owner: string, limit = MAX_REPOSITORIES): Promise<RepositoryIdentity[]> {
    const operationName = `listRepositories for ${owner}`;

    try {
      const login = await this.getAuthenticatedLogin();

      if (login.toLowerCase() === owner.toLowerCase()) {
        return await this.retryOperation(
          () =>
            this.collectRepositories(
              this.octokit.paginate.iterator(this.octokit.repos.listForAuthenticatedUser, {
                affiliation: 'owner',
                per_page: PAGE_SIZE,
                request: this.listingRequest(limit),
              }),
              limit,
            ),
          operationName,
        );
      }

      const account = await this.retryOperation(
        () => this.octokit.users.getByUsername({ username: owner, request: this.request() }),
        `resolve account ${owner}`,
      );

      if (account.data.type === 'Organization') {
        return await this.retryOperation(
          () =>
            this.collectRepositories(
              this.octokit.paginate.iterator(this.octokit.repos.listForOrg, {
                org: owner,
                type: 'all',
                per_page: PAGE_SIZE,
                request: this.listingRequest(limit),
              }),
              limit,
            ),
          operationName,
        );
      }

      return await this.retryOperation(
        () =>
          this.collectRepositories(
            this.octokit.paginate.iterator(this.octokit.repos.listForUser, {
              username: owner,
              type: 'owner',
              per_page: PAGE_SIZE,
              request: this.listingRequest(limit),
            }),
            limit,
          ),
        operationName,
      );
    } catch (error) {
      if (error instanceof CLIError) {
        throw error;
      }
      throw this.toTransportError(error, operationName);
    }
  }

  private async collectRepositories(
    pages: AsyncIterable<{ data: RepositorySummary[] }>,
    limit: number,
  ): Promise<RepositoryIdentity[]> {
    const repositories: RepositoryIdentity[] = [];

    for await (const page of pages) {
      for (const item of page.data) {
        if (item.archived) {
          continue;
        }
        if (!isValidRepositoryIdentity(item.owner.login, item.name)) {
          logger.warn(`Skipping repository with unsupported name: ${item.owner.login}/${item.name}`);
          continue;
        }

        repositories.push({ owner: item.owner.login, repo: item.name });
        if (repositories.length >= limit) {
          logger.warn(`Repository listing truncated at ${limit} repositories`);
          return repositories;
        }
      }
    }

    return repositories;
  }

  async latestCommitTimestamp(repo: RepositoryIdentity): Promise<Date | undefined> {
    return this.query(
      async () => {
        const response = await this.octokit.repos.listCommits({
          owner: repo.owner,
          repo: repo.repo,
          per_page: 1,
          request: this.request(),
        });
        const commit = response.data[0]?.commit;
        return parseTimestamp(commit?.committer?.date ?? commit?.author?.date);
      },
      `latestCommitTimestamp for ${stringifyRepository(repo)}`,
      () => undefined,
    );
  }

  async latestWorkflowRunTimestamp(repo: RepositoryIdentity): Promise<Date | undefined> {
    return this.query(
      async () => {
        const response = await this.octokit.actions.listWorkflowRunsForRepo({
          owner: repo.owner,
          repo: repo.repo,
          per_page: 1,
          request: this.request(),
        });
        return parseTimestamp(response.data.workflow_runs[0]?.updated_at);
      },
      `latestWorkflowRunTimestamp for ${stringifyRepository(repo)}`,
      () => undefined,
    );
  }

  /**
   * YAML files directly under `.github/workflows`; empty when the directory is missing.
   */
  async listWorkflowFiles(repo: RepositoryIdentity): Promise<string[]> {
    return this.query(
      async () => {
        const response = await this.octokit.repos.getContent({
          owner: repo.owner,
          repo: repo.repo,
          path: WORKFLOWS_DIRECTORY,
          request: this.request(),
        });

        if (!Array.isArray(response.data)) {
          return [];
        }

        return response.data
          .filter((entry) => entry.type === 'file' && /\.ya?ml$/i.test(entry.name))
          .map((entry) => entry.path);
      },
      `listWorkflowFiles for ${stringifyRepository(repo)}`,
      () => [],
    );
  }

  async fetchFileContent(repo: RepositoryIdentity, path: string): Promise<string> {
    const operationName = `fetchFileContent ${path} for ${stringifyRepository(repo)}`;

    try {
      const response = await this.retryOperation(
        () =>
          this.octokit.repos.getContent({
            owner: repo.owner,
            repo: repo.repo,
            path,
            request: this.request(),
          }),
        operationName,
      );
      const data = response.data;

      if (Array.isArray(data) || data.type !== 'file' || !('content' in data)) {
        throw new TransportError(`${operationName} failed: ${path} is not a file`, operationName);
      }
      if (data.encoding !== 'base64' || !data.content) {
        throw new TransportError(
          `${operationName} failed: unsupported content encoding "${data.encoding}"`,
          operationName,
        );
      }

      return Buffer.from(data.content, 'base64').toString('utf8');
    } catch (error) {
      throw this.toTransportError(error, operationName);
    }
  }

  /**
   * Short-lived token for registering one runner. Not retried and never cached.
   */
  async requestRegistrationToken(repo: RepositoryIdentity): Promise<string> {
    const operationName = `requestRegistrationToken for ${stringifyRepository(repo)}`;

    try {
      const response = await this.octokit.actions.createRegistrationTokenForRepo({
        owner: repo.owner,
        repo: repo.repo,
        request: this.request(),
      });
      logger.debug(`Received registration token for ${stringifyRepository(repo)}`, {
        length: response.data.token.length,
      });
      return response.data.token;
    } catch (error) {
      throw this.toTransportError(error, operationName);
    }
  }
}
