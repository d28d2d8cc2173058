export { ContainerNameCodec, DEFAULT_NAME_PREFIX } from './container-name.js';
export {
  DockerRuntime,
  isLive,
  MANAGED_BY_LABEL,
  MANAGED_BY_VALUE,
  OWNER_LABEL,
  REPO_LABEL,
  type RuntimeGateway,
} from './docker-runtime.js';
