// Main classes and functions

export { ConfigLoader, type ConfigOverrides } from './lib/config/index.js';
export { GitHubClient, type SourceControlGateway } from './lib/github/index.js';
export { Reconciler, type ReconcilerDependencies } from './lib/reconciler/index.js';
export { ContainerNameCodec, DockerRuntime, type RuntimeGateway } from './lib/runtime/index.js';
export { WorkflowClassifier, type WorkflowSource } from './lib/workflow/index.js';
export { isActive, parseDuration } from './lib/activity/index.js';
// Types that are used in public APIs
export type {
  PassFailure,
  PassPlan,
  PassSummary,
  ReconcilerConfig,
  RepositoryIdentity,
  RunnerContainer,
} from './types/index.js';
// Utilities
export { logger, parseRepository } from './utils/index.js';
