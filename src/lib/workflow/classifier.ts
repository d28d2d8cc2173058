import { parse } from 'yaml';
import type { ClassificationMode, RepositoryIdentity } from '../../types/index.js';
import { formatError, logger, ParseError, stringifyRepository } from '../../utils/index.js';

export const SELF_HOSTED_LABEL = 'self-hosted';

/**
 * The slice of the source-control gateway the classifier reads from.
 */
export interface WorkflowSource {
  listWorkflowFiles(repo: RepositoryIdentity): Promise<string[]>;
  fetchFileContent(repo: RepositoryIdentity, path: string): Promise<string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSelfHostedLabel(value: unknown): boolean {
  return typeof value === 'string' && value.trim().toLowerCase() === SELF_HOSTED_LABEL;
}

/**
 * `runs-on` accepts a label, a list of labels, or `{ group, labels }`.
 */
export function runsOnSelfHosted(runsOn: unknown): boolean {
  if (Array.isArray(runsOn)) {
    return runsOn.some(isSelfHostedLabel);
  }
  if (isRecord(runsOn)) {
    return runsOnSelfHosted(runsOn.labels);
  }
  return isSelfHostedLabel(runsOn);
}

/**
 * Inspect every job of a parsed workflow document for a self-hosted `runs-on`.
 * @throws ParseError when the document is not valid YAML
 */
export function declaresSelfHosted(content: string, source = 'workflow'): boolean {
  let document: unknown;
  try {
    document = parse(content);
  } catch (error) {
    throw new ParseError(`Invalid YAML in ${source}: ${formatError(error)}`, source);
  }

  if (!isRecord(document) || !isRecord(document.jobs)) {
    return false;
  }

  return Object.values(document.jobs).some(
    (job) => isRecord(job) && runsOnSelfHosted(job['runs-on']),
  );
}

/**
 * Looser heuristic for when structured parsing is not wanted: any mention of the label.
 */
export function mentionsSelfHosted(content: string): boolean {
  return content.includes(SELF_HOSTED_LABEL);
}

export class WorkflowClassifier {
  constructor(
    private readonly source: WorkflowSource,
    private readonly mode: ClassificationMode = 'structural',
  ) {}

  /**
   * Whether any workflow file of the repository declares a self-hosted job.
   * Unreadable or malformed files count as not declaring one.
   */
  async usesSelfHosted(repo: RepositoryIdentity): Promise<boolean> {
    const repoKey = stringifyRepository(repo);

    let files: string[];
    try {
      files = await this.source.listWorkflowFiles(repo);
    } catch (error) {
      logger.warn(`${repoKey}: could not list workflow files, assuming no self-hosted jobs`, {
        error: formatError(error),
      });
      return false;
    }

    if (files.length === 0) {
      logger.debug(`${repoKey}: no workflow files`);
      return false;
    }

    for (const path of files) {
      let content: string;
      try {
        content = await this.source.fetchFileContent(repo, path);
      } catch (error) {
        logger.debug(`${repoKey}: failed to fetch ${path}`, { error: formatError(error) });
        continue;
      }

      if (this.matches(content, `${repoKey}:${path}`)) {
        logger.debug(`${repoKey}: ${path} declares a self-hosted job`);
        return true;
      }
    }

    logger.debug(`${repoKey}: no self-hosted job found in ${files.length} workflow file(s)`);
    return false;
  }

  private matches(content: string, source: string): boolean {
    if (this.mode === 'substring') {
      return mentionsSelfHosted(content);
    }

    try {
      return declaresSelfHosted(content, source);
    } catch (error) {
      logger.debug(`Skipping ${source}`, { error: formatError(error) });
      return false;
    }
  }
}
