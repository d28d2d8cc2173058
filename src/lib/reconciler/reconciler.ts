import pLimit from 'p-limit';
import type {
  ActivitySignal,
  PassFailure,
  PassOperation,
  PassPlan,
  PassSummary,
  ReconcilerConfig,
  RepositoryIdentity,
  RunnerContainer,
} from '../../types/index.js';
import { formatError, logger, stringifyRepository } from '../../utils/index.js';
import { isActive } from '../activity/index.js';
import type { SourceControlGateway } from '../github/index.js';
import { isLive, type RuntimeGateway } from '../runtime/index.js';
import { WorkflowClassifier } from '../workflow/index.js';

export const AUTHENTICATED_OWNER = '@me';

export interface ReconcilerDependencies {
  github: SourceControlGateway;
  runtime: RuntimeGateway;
  classifier?: WorkflowClassifier;
  now?: () => Date;
}

export interface RunOptions {
  dryRun?: boolean;
}

type Evaluation =
  | { kind: 'active' }
  | { kind: 'inactive' }
  | { kind: 'undetermined'; message: string };

function byKey(a: RepositoryIdentity, b: RepositoryIdentity): number {
  return stringifyRepository(a).localeCompare(stringifyRepository(b));
}

function uniqueSorted(repositories: RepositoryIdentity[]): RepositoryIdentity[] {
  const seen = new Map<string, RepositoryIdentity>();
  for (const repository of repositories) {
    seen.set(stringifyRepository(repository), repository);
  }
  return [...seen.values()].sort(byKey);
}

function keysOf(repositories: RepositoryIdentity[]): Set<string> {
  return new Set(repositories.map(stringifyRepository));
}

function failure(
  repository: RepositoryIdentity,
  operation: PassOperation,
  error: unknown,
): PassFailure {
  return { repository, operation, message: formatError(error) };
}

/**
 * Converges the runner containers in the runtime on the set of repositories that are
 * active and declare self-hosted jobs. Holds no state between passes.
 */
export class Reconciler {
  private readonly github: SourceControlGateway;
  private readonly runtime: RuntimeGateway;
  private readonly classifier: WorkflowClassifier;
  private readonly now: () => Date;

  constructor(
    private readonly config: ReconcilerConfig,
    dependencies: ReconcilerDependencies,
  ) {
    this.github = dependencies.github;
    this.runtime = dependencies.runtime;
    this.classifier =
      dependencies.classifier ??
      new WorkflowClassifier(dependencies.github, config.reconcile.classification);
    this.now = dependencies.now ?? (() => new Date());
  }

  async run(options: RunOptions = {}): Promise<PassSummary> {
    const plan = await this.plan();

    if (options.dryRun) {
      logger.info('Dry run: no containers were started or stopped');
      return { plan, started: [], stopped: [], removedStale: [], failures: [], dryRun: true };
    }

    return this.apply(plan);
  }

  /**
   * Discover, classify, evaluate and diff. Only authentication, repository listing and
   * container listing failures escape; everything else is absorbed per repository.
   */
  async plan(): Promise<PassPlan> {
    const login = await this.github.getAuthenticatedLogin();
    const owner = this.config.owner === AUTHENTICATED_OWNER ? login : this.config.owner;
    const warnings: PassFailure[] = [];

    let repositories: RepositoryIdentity[] = [];
    if (this.config.reconcile.teardown) {
      logger.warn('Teardown mode: every runner container will be stopped');
    } else {
      logger.info(`Discovering repositories for ${owner}...`);
      repositories = await this.github.listRepositories(owner);
      logger.debug(`Found ${repositories.length} repositories`);
    }

    const limit = pLimit(this.config.reconcile.concurrency);

    // Filtering on workflows first saves two activity queries per irrelevant repository
    const classified = await Promise.all(
      repositories.map((repository) =>
        limit(async () => ({
          repository,
          selfHosted: await this.classify(repository),
        })),
      ),
    );
    const selfHosted = classified
      .filter((entry) => entry.selfHosted)
      .map((entry) => entry.repository);

    const now = this.now();
    const evaluations = await Promise.all(
      selfHosted.map((repository) =>
        limit(async () => ({
          repository,
          evaluation: await this.evaluate(repository, now),
        })),
      ),
    );

    const desired: RepositoryIdentity[] = [];
    const undetermined: RepositoryIdentity[] = [];
    for (const { repository, evaluation } of evaluations) {
      if (evaluation.kind === 'active') {
        desired.push(repository);
      } else if (evaluation.kind === 'undetermined') {
        undetermined.push(repository);
        warnings.push({ repository, operation: 'evaluate', message: evaluation.message });
      }
    }

    const containers = await this.observe(owner);
    const current = uniqueSorted(
      containers.filter(isLive).map((container) => container.repository),
    );
    const currentKeys = keysOf(current);
    const stale = containers.filter(
      (container) =>
        !isLive(container) && !currentKeys.has(stringifyRepository(container.repository)),
    );

    const desiredKeys = keysOf(desired);
    const undeterminedKeys = keysOf(undetermined);

    const plan: PassPlan = {
      owner,
      evaluated: repositories.length,
      selfHosted: uniqueSorted(selfHosted),
      desired: uniqueSorted(desired),
      current,
      undetermined: uniqueSorted(undetermined),
      stale,
      toStop: current.filter((repo) => {
        const key = stringifyRepository(repo);
        return !desiredKeys.has(key) && !undeterminedKeys.has(key);
      }),
      toStart: uniqueSorted(desired).filter(
        (repo) => !currentKeys.has(stringifyRepository(repo)),
      ),
      unchanged: current.filter((repo) => desiredKeys.has(stringifyRepository(repo))),
      warnings,
    };

    logger.info(
      `${plan.evaluated} evaluated, ${plan.selfHosted.length} self-hosted, ${plan.desired.length} active`,
    );
    logger.info(`Runners to stop: ${plan.toStop.map(stringifyRepository).join(', ') || 'none'}`);
    logger.info(`Runners to start: ${plan.toStart.map(stringifyRepository).join(', ') || 'none'}`);

    return plan;
  }

  /**
   * Stops first to free capacity, then starts. Each repository succeeds or fails alone.
   */
  async apply(plan: PassPlan): Promise<PassSummary> {
    const limit = pLimit(this.config.reconcile.concurrency);
    const failures: PassFailure[] = [];
    const stopped: RepositoryIdentity[] = [];
    const removedStale: RepositoryIdentity[] = [];
    const started: RepositoryIdentity[] = [];

    await Promise.all([
      ...plan.toStop.map((repository) =>
        limit(async () => {
          if (await this.stop(repository, failures)) {
            stopped.push(repository);
          }
        }),
      ),
      ...plan.stale.map((container) =>
        limit(async () => {
          logger.debug(`Removing stale container ${container.name} (${container.state})`);
          if (await this.stop(container.repository, failures)) {
            removedStale.push(container.repository);
          }
        }),
      ),
    ]);

    await Promise.all(
      plan.toStart.map((repository) =>
        limit(async () => {
          if (await this.start(repository, failures)) {
            started.push(repository);
          }
        }),
      ),
    );

    const summary: PassSummary = {
      plan,
      started: started.sort(byKey),
      stopped: stopped.sort(byKey),
      removedStale: removedStale.sort(byKey),
      failures: failures.sort((a, b) => byKey(a.repository, b.repository)),
      dryRun: false,
    };

    logger.info(
      `Pass complete: ${summary.started.length} started, ${summary.stopped.length} stopped, ${summary.failures.length} failed`,
    );

    return summary;
  }

  private async classify(repository: RepositoryIdentity): Promise<boolean> {
    try {
      return await this.classifier.usesSelfHosted(repository);
    } catch (error) {
      logger.warn(`${stringifyRepository(repository)}: classification failed`, {
        error: formatError(error),
      });
      return false;
    }
  }

  private async evaluate(repository: RepositoryIdentity, now: Date): Promise<Evaluation> {
    const repoKey = stringifyRepository(repository);

    let signal: ActivitySignal;
    try {
      const [lastCommitAt, lastWorkflowRunAt] = await Promise.all([
        this.github.latestCommitTimestamp(repository),
        this.github.latestWorkflowRunTimestamp(repository),
      ]);
      signal = { lastCommitAt, lastWorkflowRunAt };
    } catch (error) {
      const message = formatError(error);
      logger.warn(`${repoKey}: activity could not be determined, leaving its runner as is`, {
        error: message,
      });
      return { kind: 'undetermined', message };
    }

    logger.debug(`${repoKey} activity`, {
      commit: signal.lastCommitAt?.toISOString() ?? null,
      run: signal.lastWorkflowRunAt?.toISOString() ?? null,
    });

    if (isActive(signal, this.config.activity.thresholdMs, now)) {
      logger.info(`${repoKey} marked active`);
      return { kind: 'active' };
    }
    return { kind: 'inactive' };
  }

  private async observe(owner: string): Promise<RunnerContainer[]> {
    const containers = await this.runtime.listRunnerContainers();
    const ownerKey = owner.toLowerCase();

    return containers.filter((container) => {
      if (container.repository.owner.toLowerCase() === ownerKey) {
        return true;
      }
      logger.debug(`Ignoring container ${container.name} of another owner`);
      return false;
    });
  }

  private async stop(repository: RepositoryIdentity, failures: PassFailure[]): Promise<boolean> {
    const repoKey = stringifyRepository(repository);
    try {
      logger.info(`Stopping runner container for ${repoKey}`);
      const found = await this.runtime.stopRunner(repository);
      if (!found) {
        logger.warn(`Runner container for ${repoKey} not found, already stopped?`);
      }
      return true;
    } catch (error) {
      logger.error(`Failed to stop runner for ${repoKey}`, error);
      failures.push(failure(repository, 'stop', error));
      return false;
    }
  }

  private async start(repository: RepositoryIdentity, failures: PassFailure[]): Promise<boolean> {
    const repoKey = stringifyRepository(repository);

    let token: string;
    try {
      token = await this.github.requestRegistrationToken(repository);
    } catch (error) {
      logger.error(`Failed to obtain a registration token for ${repoKey}`, error);
      failures.push(failure(repository, 'register', error));
      return false;
    }

    try {
      logger.info(`Starting runner container for ${repoKey}`);
      await this.runtime.startRunner(repository, token);
      return true;
    } catch (error) {
      logger.error(`Failed to start runner for ${repoKey}`, error);
      failures.push(failure(repository, 'start', error));
      return false;
    }
  }
}
