import type { RepositoryIdentity } from '../../types/index.js';
import { isValidRepositoryIdentity } from '../../utils/index.js';

export const DEFAULT_NAME_PREFIX = 'actions-runner';

const SEPARATOR = '_';
const PREFIX_PATTERN = /^[A-Za-z0-9][A-Za-z0-9.-]*$/;

/**
 * Container names take the form `<prefix>_<ownerLength>_<owner>_<repo>`.
 *
 * The owner length keeps decoding unambiguous when the owner or repository contains `_`.
 * Only characters Docker accepts in names are produced.
 */
export class ContainerNameCodec {
  constructor(private readonly prefix: string = DEFAULT_NAME_PREFIX) {
    if (!PREFIX_PATTERN.test(prefix)) {
      throw new Error(
        `Invalid container name prefix "${prefix}": must start with an alphanumeric character and contain only alphanumerics, dots and hyphens`,
      );
    }
  }

  /** Leading text every managed container name starts with. */
  get marker(): string {
    return `${this.prefix}${SEPARATOR}`;
  }

  encode(repo: RepositoryIdentity): string {
    if (!isValidRepositoryIdentity(repo.owner, repo.repo)) {
      throw new Error(
        `Cannot encode container name for invalid repository ${repo.owner}/${repo.repo}`,
      );
    }
    return `${this.marker}${repo.owner.length}${SEPARATOR}${repo.owner}${SEPARATOR}${repo.repo}`;
  }

  /**
   * Inverse of `encode`. Returns undefined for names outside the convention or with
   * components that do not add up.
   */
  decode(containerName: string): RepositoryIdentity | undefined {
    // Docker reports names with a leading slash
    const name = containerName.startsWith('/') ? containerName.slice(1) : containerName;

    if (!name.startsWith(this.marker)) {
      return undefined;
    }

    const rest = name.slice(this.marker.length);
    const lengthEnd = rest.indexOf(SEPARATOR);
    if (lengthEnd <= 0) {
      return undefined;
    }

    const lengthText = rest.slice(0, lengthEnd);
    if (!/^[1-9]\d*$/.test(lengthText)) {
      return undefined;
    }

    const ownerLength = Number(lengthText);
    const ownerStart = lengthEnd + 1;
    const owner = rest.slice(ownerStart, ownerStart + ownerLength);
    const separatorIndex = ownerStart + ownerLength;

    if (owner.length !== ownerLength || rest[separatorIndex] !== SEPARATOR) {
      return undefined;
    }

    const repo = rest.slice(separatorIndex + 1);
    if (!isValidRepositoryIdentity(owner, repo)) {
      return undefined;
    }

    return { owner, repo };
  }
}
