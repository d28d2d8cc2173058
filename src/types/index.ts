export interface GitHubConfig {
  token: string;
  baseUrl?: string;
  timeoutMs: number;
  retries: number;
}

/**
 * Owner login plus repository name. Unique per repository and immutable once read
 * from the source-control listing.
 */
export interface RepositoryIdentity {
  owner: string;
  repo: string;
}

/** Both timestamps are UTC instants; absence is a normal state, not an error. */
export interface ActivitySignal {
  lastCommitAt?: Date;
  lastWorkflowRunAt?: Date;
}

export type ContainerState =
  | 'created'
  | 'running'
  | 'paused'
  | 'restarting'
  | 'removing'
  | 'exited'
  | 'dead';

export interface RunnerContainer {
  id: string;
  name: string;
  repository: RepositoryIdentity;
  state: ContainerState;
}

export type ClassificationMode = 'structural' | 'substring';

export interface RunnerOptions {
  image: string;
  serverUrl: string;
  namePrefix: string;
  labels: string[];
  ephemeral: boolean;
  mountDockerSocket: boolean;
  autoRemove: boolean;
  stopTimeoutSeconds: number;
}

export interface ReconcileOptions {
  concurrency: number;
  teardown: boolean;
  classification: ClassificationMode;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface ReconcilerConfig {
  owner: string;
  github: GitHubConfig;
  activity: {
    threshold: string;
    thresholdMs: number;
  };
  runner: RunnerOptions;
  reconcile: ReconcileOptions;
  logging: {
    level: LogLevel;
  };
}

export type PassOperation = 'register' | 'start' | 'stop' | 'evaluate';

export interface PassFailure {
  repository: RepositoryIdentity;
  operation: PassOperation;
  message: string;
}

export interface PassPlan {
  owner: string;
  evaluated: number;
  selfHosted: RepositoryIdentity[];
  desired: RepositoryIdentity[];
  current: RepositoryIdentity[];
  undetermined: RepositoryIdentity[];
  stale: RunnerContainer[];
  toStart: RepositoryIdentity[];
  toStop: RepositoryIdentity[];
  unchanged: RepositoryIdentity[];
  warnings: PassFailure[];
}

export interface PassSummary {
  plan: PassPlan;
  started: RepositoryIdentity[];
  stopped: RepositoryIdentity[];
  removedStale: RepositoryIdentity[];
  failures: PassFailure[];
  dryRun: boolean;
}
