import Docker from 'dockerode';
import type {
  ContainerState,
  RepositoryIdentity,
  RunnerContainer,
  RunnerOptions,
} from '../../types/index.js';
import {
  formatError,
  getErrorStatus,
  logger,
  RuntimeError,
  stringifyRepository,
} from '../../utils/index.js';
import { ContainerNameCodec } from './container-name.js';

export const MANAGED_BY_LABEL = 'managed-by';
export const MANAGED_BY_VALUE = 'runner-reconciler';
export const OWNER_LABEL = 'runner-reconciler.owner';
export const REPO_LABEL = 'runner-reconciler.repo';

const LIVE_STATES: ReadonlySet<ContainerState> = new Set(['running', 'paused', 'restarting']);

const KNOWN_STATES: ReadonlySet<string> = new Set([
  ...LIVE_STATES,
  'created',
  'removing',
  'exited',
  'dead',
]);

function isContainerState(value: string): value is ContainerState {
  return KNOWN_STATES.has(value);
}

/** Containers that never started, exited or died do not provision a runner. */
export function isLive(container: RunnerContainer): boolean {
  return LIVE_STATES.has(container.state);
}

/**
 * Container engine operations the reconciler needs.
 */
export interface RuntimeGateway {
  listRunnerContainers(): Promise<RunnerContainer[]>;
  startRunner(repo: RepositoryIdentity, token: string): Promise<RunnerContainer>;
  /** Resolves false when no container exists for the repository. */
  stopRunner(repo: RepositoryIdentity): Promise<boolean>;
}

// The registration token is read from the environment so it never shows up in the
// container's command line.
const RUNNER_SCRIPT =
  './config.sh --url "$RUNNER_URL" --token "$REG_TOKEN" --name "$RUNNER_NAME" ' +
  '--labels "$RUNNER_LABELS" --unattended --replace $RUNNER_EXTRA_FLAGS && ./run.sh';

export class DockerRuntime implements RuntimeGateway {
  private readonly docker: Docker;
  private readonly codec: ContainerNameCodec;

  constructor(
    private readonly options: RunnerOptions,
    dockerClient?: Docker,
  ) {
    this.docker = dockerClient ?? new Docker();
    this.codec = new ContainerNameCodec(options.namePrefix);
  }

  async listRunnerContainers(): Promise<RunnerContainer[]> {
    let infos: Docker.ContainerInfo[];
    try {
      infos = await this.docker.listContainers({
        all: true,
        filters: { name: [this.codec.marker] },
      });
    } catch (error) {
      throw new RuntimeError(
        `Failed to list containers: ${formatError(error)}`,
        this.codec.marker,
        error,
      );
    }

    const runners: RunnerContainer[] = [];

    for (const info of infos) {
      // The engine's name filter is a substring match, so decode every name
      const name = (info.Names[0] ?? '').replace(/^\//, '');
      if (!name.startsWith(this.codec.marker)) {
        continue;
      }

      const repository = this.codec.decode(name);
      if (!repository) {
        logger.warn(`Skipping container ${name}: name does not decode to a repository`);
        continue;
      }

      const state = isContainerState(info.State) ? info.State : 'dead';
      runners.push({ id: info.Id, name, repository, state });
      logger.debug(`Found runner container ${name}`, {
        repository: stringifyRepository(repository),
        state,
      });
    }

    return runners;
  }

  async startRunner(repo: RepositoryIdentity, token: string): Promise<RunnerContainer> {
    const name = this.codec.encode(repo);
    const url = `${this.options.serverUrl.replace(/\/+$/, '')}/${repo.owner}/${repo.repo}`;

    await this.ensureImage(name);

    const binds = this.options.mountDockerSocket
      ? ['/var/run/docker.sock:/var/run/docker.sock']
      : [];

    let container: Docker.Container;
    try {
      container = await this.docker.createContainer({
        name,
        Image: this.options.image,
        Cmd: ['sh', '-c', RUNNER_SCRIPT],
        Env: [
          `REG_TOKEN=${token}`,
          `RUNNER_URL=${url}`,
          `RUNNER_NAME=${name}`,
          `RUNNER_LABELS=${this.options.labels.join(',')}`,
          `RUNNER_EXTRA_FLAGS=${this.options.ephemeral ? '--ephemeral' : ''}`,
        ],
        Labels: {
          [MANAGED_BY_LABEL]: MANAGED_BY_VALUE,
          [OWNER_LABEL]: repo.owner,
          [REPO_LABEL]: repo.repo,
        },
        HostConfig: {
          AutoRemove: this.options.autoRemove,
          Binds: binds,
        },
      });
    } catch (error) {
      throw new RuntimeError(
        `Failed to start runner container ${name}: ${formatError(error)}`,
        name,
        error,
      );
    }

    try {
      await container.start();
    } catch (error) {
      // A container that never ran is not auto-removed
      await this.discardUnstarted(container, name);
      throw new RuntimeError(
        `Failed to start runner container ${name}: ${formatError(error)}`,
        name,
        error,
      );
    }

    logger.debug(`Container ${name} started`, { id: container.id.slice(0, 12) });
    return { id: container.id, name, repository: repo, state: 'running' };
  }

  async stopRunner(repo: RepositoryIdentity): Promise<boolean> {
    const name = this.codec.encode(repo);
    const container = this.docker.getContainer(name);

    let running: boolean;
    try {
      const info = await container.inspect();
      running = info.State.Running;
    } catch (error) {
      if (getErrorStatus(error) === 404) {
        logger.debug(`Container ${name} not found, already stopped`);
        return false;
      }
      throw new RuntimeError(`Failed to inspect ${name}: ${formatError(error)}`, name, error);
    }

    if (running) {
      try {
        await container.stop({ t: this.options.stopTimeoutSeconds });
      } catch (error) {
        const status = getErrorStatus(error);
        // 304: already stopped, 404: removed while stopping
        if (status !== 304 && status !== 404) {
          throw new RuntimeError(`Failed to stop ${name}: ${formatError(error)}`, name, error);
        }
      }
    }

    // Auto-removed containers disappear on exit; anything else is removed explicitly
    if (!this.options.autoRemove || !running) {
      await this.removeContainer(container, name);
    }

    return true;
  }

  private async removeContainer(container: Docker.Container, name: string): Promise<void> {
    try {
      await container.remove({ force: true });
    } catch (error) {
      const status = getErrorStatus(error);
      // 404: already gone, 409: removal already in progress
      if (status !== 404 && status !== 409) {
        throw new RuntimeError(`Failed to remove ${name}: ${formatError(error)}`, name, error);
      }
    }
  }

  private async discardUnstarted(container: Docker.Container, name: string): Promise<void> {
    try {
      await this.removeContainer(container, name);
    } catch (error) {
      logger.warn(`Could not remove ${name} after a failed start`, {
        error: formatError(error),
      });
    }
  }

  private async ensureImage(containerName: string): Promise<void> {
    const image = this.options.image;

    try {
      await this.docker.getImage(image).inspect();
      return;
    } catch (error) {
      if (getErrorStatus(error) !== 404) {
        throw new RuntimeError(
          `Failed to inspect image ${image}: ${formatError(error)}`,
          containerName,
          error,
        );
      }
    }

    logger.info(`Pulling runner image ${image}...`);
    try {
      const stream = await this.docker.pull(image);
      await new Promise<void>((resolve, reject) => {
        this.docker.modem.followProgress(stream, (error: Error | null) =>
          error ? reject(error) : resolve(),
        );
      });
    } catch (error) {
      throw new RuntimeError(
        `Failed to pull image ${image}: ${formatError(error)}`,
        containerName,
        error,
      );
    }
  }
}
