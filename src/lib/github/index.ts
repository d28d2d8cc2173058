export {
  GitHubClient,
  MAX_REPOSITORIES,
  type SourceControlGateway,
  WORKFLOWS_DIRECTORY,
} from './client.js';
