import { type CosmiconfigResult, cosmiconfig } from 'cosmiconfig';
import yaml from 'yaml';
import type { ClassificationMode, LogLevel, ReconcilerConfig } from '../../types/index.js';
import {
  FatalConfigError,
  formatError,
  isLogLevel,
  logger,
  readGitHubCLIToken,
  validateComponent,
} from '../../utils/index.js';
import { DEFAULT_ACTIVITY_THRESHOLD, parseDuration } from '../activity/index.js';
import { AUTHENTICATED_OWNER } from '../reconciler/index.js';
import { DEFAULT_NAME_PREFIX } from '../runtime/index.js';

export const CONFIG_MODULE_NAME = 'runner-reconciler';
export const DEFAULT_RUNNER_IMAGE = 'ghcr.io/actions/actions-runner:latest';
export const DEFAULT_API_URL = 'https://api.github.com';
export const DEFAULT_SERVER_URL = 'https://github.com';

const CLASSIFICATION_MODES: readonly ClassificationMode[] = ['structural', 'substring'];

/**
 * Values given on the command line; they win over the file and the environment.
 */
export interface ConfigOverrides {
  owner?: string;
  threshold?: string;
  image?: string;
  concurrency?: string;
  teardown?: boolean;
}

type ConfigRecord = Record<string, unknown>;

function isObject(value: unknown): value is ConfigRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(config: ConfigRecord, key: string, errors: string[]): ConfigRecord {
  const value = config[key];
  if (value === undefined || value === null) {
    return {};
  }
  if (!isObject(value)) {
    errors.push(`${key}: must be an object`);
    return {};
  }
  return value;
}

function parseBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
    if (['0', 'false', 'no', 'off', ''].includes(normalized)) return false;
  }
  return undefined;
}

function parseInteger(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return Number(value.trim());
  }
  return undefined;
}

function firstDefined<T>(...values: (T | undefined)[]): T | undefined {
  return values.find((value) => value !== undefined);
}

/**
 * Builds the single configuration object handed to every component. Sources, from
 * lowest to highest precedence: defaults, config file, environment, overrides.
 */
export class ConfigLoader {
  private readonly explorer: ReturnType<typeof cosmiconfig>;

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {
    this.explorer = cosmiconfig(CONFIG_MODULE_NAME, {
      searchPlaces: [
        `${CONFIG_MODULE_NAME}.yml`,
        `${CONFIG_MODULE_NAME}.yaml`,
        `.${CONFIG_MODULE_NAME}rc.yml`,
        `.config/${CONFIG_MODULE_NAME}.yml`,
      ],
      loaders: {
        '.yml': (_filepath: string, content: string): unknown => yaml.parse(content),
        '.yaml': (_filepath: string, content: string): unknown => yaml.parse(content),
      },
    });
  }

  async load(filepath?: string, overrides: ConfigOverrides = {}): Promise<ReconcilerConfig> {
    const fileConfig = await this.readFile(filepath);
    const expanded = this.processEnvVars(fileConfig);
    return this.resolve(expanded, overrides);
  }

  private async readFile(filepath?: string): Promise<unknown> {
    let result: CosmiconfigResult;

    try {
      result = filepath ? await this.explorer.load(filepath) : await this.explorer.search();
    } catch (error) {
      throw new FatalConfigError(
        `Failed to read configuration${filepath ? ` from ${filepath}` : ''}`,
        formatError(error),
      );
    }

    if (!result || result.isEmpty) {
      logger.debug('No configuration file found, using environment and defaults');
      return {};
    }

    logger.debug(`Loaded configuration from ${result.filepath}`);
    return result.config;
  }

  /**
   * Replace `${VAR}` placeholders in string values. An unset GITHUB_TOKEN falls back to
   * the GitHub CLI session.
   */
  private processEnvVars(value: unknown): unknown {
    if (typeof value === 'string') {
      return value.replace(/\$\{([^}]+)\}/g, (_, envVar: string) => {
        let resolved = this.env[envVar];

        if (!resolved && envVar === 'GITHUB_TOKEN') {
          resolved = readGitHubCLIToken() ?? undefined;
        }

        if (!resolved) {
          throw new FatalConfigError(
            `Environment variable ${envVar} is not set`,
            envVar === 'GITHUB_TOKEN'
              ? "Run 'gh auth login' to authenticate with GitHub CLI, or export GITHUB_TOKEN"
              : undefined,
          );
        }
        return resolved;
      });
    }

    if (Array.isArray(value)) {
      return value.map((item) => this.processEnvVars(item));
    }

    if (isObject(value)) {
      return Object.fromEntries(
        Object.entries(value).map(([key, item]) => [key, this.processEnvVars(item)]),
      );
    }

    return value;
  }

  private resolve(fileConfig: unknown, overrides: ConfigOverrides): ReconcilerConfig {
    const errors: string[] = [];

    if (!isObject(fileConfig)) {
      throw new FatalConfigError('Configuration must be an object');
    }

    const github = section(fileConfig, 'github', errors);
    const activity = section(fileConfig, 'activity', errors);
    const runner = section(fileConfig, 'runner', errors);
    const reconcile = section(fileConfig, 'reconcile', errors);
    const logging = section(fileConfig, 'logging', errors);
    const env = this.env;

    // owner
    const owner = firstDefined(
      overrides.owner,
      env.GH_OWNER,
      this.optionalString(fileConfig, 'owner', errors),
    );
    if (!owner) {
      throw new FatalConfigError(
        'Repository owner is not configured',
        'Set GH_OWNER, pass --owner, or add "owner" to the configuration file',
      );
    }
    if (owner !== AUTHENTICATED_OWNER) {
      try {
        validateComponent(owner, 'owner');
      } catch (error) {
        errors.push(`owner: ${formatError(error)}`);
      }
    }

    // github
    const baseUrl = firstDefined(
      env.GITHUB_API_URL,
      this.optionalString(github, 'baseUrl', errors, 'github.'),
    );
    const timeoutMs = this.integer(github.timeoutMs, 'github.timeoutMs', 30_000, 1, errors);
    const retries = this.integer(github.retries, 'github.retries', 2, 0, errors);

    // activity
    const abandonDays = parseInteger(env.ABANDON_DAYS);
    if (env.ABANDON_DAYS !== undefined && abandonDays === undefined) {
      errors.push('ABANDON_DAYS: must be a whole number of days');
    }
    const threshold =
      firstDefined(
        overrides.threshold,
        env.ACTIVITY_THRESHOLD,
        abandonDays !== undefined ? `${abandonDays}d` : undefined,
        this.optionalString(activity, 'threshold', errors, 'activity.'),
      ) ?? DEFAULT_ACTIVITY_THRESHOLD;

    let thresholdMs = 0;
    try {
      thresholdMs = parseDuration(threshold);
    } catch (error) {
      errors.push(`activity.threshold: ${formatError(error)}`);
    }

    // runner
    const image =
      firstDefined(
        overrides.image,
        env.RUNNER_IMAGE,
        this.optionalString(runner, 'image', errors, 'runner.'),
      ) ?? DEFAULT_RUNNER_IMAGE;
    const serverUrl =
      firstDefined(
        env.GITHUB_SERVER_URL,
        this.optionalString(runner, 'serverUrl', errors, 'runner.'),
      ) ?? this.serverUrlFor(baseUrl);
    const namePrefix =
      this.optionalString(runner, 'namePrefix', errors, 'runner.') ?? DEFAULT_NAME_PREFIX;
    if (!/^[A-Za-z0-9][A-Za-z0-9.-]*$/.test(namePrefix)) {
      errors.push(
        'runner.namePrefix: must start with an alphanumeric character and contain only alphanumerics, dots and hyphens',
      );
    }
    const labels = this.labels(env.RUNNER_LABELS ?? runner.labels, errors);
    const ephemeral = this.boolean(runner.ephemeral, 'runner.ephemeral', false, errors);
    const mountDockerSocket = this.boolean(
      runner.mountDockerSocket,
      'runner.mountDockerSocket',
      false,
      errors,
    );
    const autoRemove = this.boolean(runner.autoRemove, 'runner.autoRemove', true, errors);
    const stopTimeoutSeconds = this.integer(
      runner.stopTimeoutSeconds,
      'runner.stopTimeoutSeconds',
      10,
      0,
      errors,
    );

    // reconcile
    const concurrency = this.integer(
      firstDefined<unknown>(
        overrides.concurrency,
        env.RECONCILE_CONCURRENCY,
        reconcile.concurrency,
      ),
      'reconcile.concurrency',
      4,
      1,
      errors,
    );
    const teardown = this.boolean(
      firstDefined<unknown>(overrides.teardown, env.RUNNER_TEARDOWN, reconcile.teardown),
      'reconcile.teardown',
      false,
      errors,
    );
    const classification = reconcile.classification ?? 'structural';
    if (!CLASSIFICATION_MODES.some((mode) => mode === classification)) {
      errors.push(`reconcile.classification: must be one of ${CLASSIFICATION_MODES.join(', ')}`);
    }

    // logging
    const levelInput = firstDefined<unknown>(env.LOG_LEVEL, logging.level) ?? 'info';
    const normalizedLevel = typeof levelInput === 'string' ? levelInput.toLowerCase() : '';
    let level: LogLevel = 'info';
    if (isLogLevel(normalizedLevel)) {
      level = normalizedLevel;
    } else {
      errors.push('logging.level: must be one of error, warn, info, debug');
    }

    // token last, so invalid files fail before the GitHub CLI is consulted
    if (errors.length > 0) {
      throw new FatalConfigError('Invalid configuration', errors.map((e) => `  - ${e}`).join('\n'));
    }

    const token =
      firstDefined(this.optionalString(github, 'token', errors, 'github.'), env.GITHUB_TOKEN) ||
      readGitHubCLIToken();
    if (!token) {
      throw new FatalConfigError(
        'No GitHub token available',
        "Set GITHUB_TOKEN, add github.token to the configuration file, or run 'gh auth login'",
      );
    }

    return {
      owner,
      github: { token, baseUrl, timeoutMs, retries },
      activity: { threshold, thresholdMs },
      runner: {
        image,
        serverUrl,
        namePrefix,
        labels,
        ephemeral,
        mountDockerSocket,
        autoRemove,
        stopTimeoutSeconds,
      },
      reconcile: {
        concurrency,
        teardown,
        classification: classification === 'substring' ? 'substring' : 'structural',
      },
      logging: { level },
    };
  }

  private serverUrlFor(baseUrl: string | undefined): string {
    if (!baseUrl || baseUrl.replace(/\/+$/, '') === DEFAULT_API_URL) {
      return DEFAULT_SERVER_URL;
    }
    // GitHub Enterprise Server serves the API under /api/v3
    return baseUrl.replace(/\/api\/v3\/?$/, '').replace(/\/+$/, '');
  }

  private optionalString(
    config: ConfigRecord,
    key: string,
    errors: string[],
    path = '',
  ): string | undefined {
    const value = config[key];
    if (value === undefined || value === null) {
      return undefined;
    }
    if (typeof value !== 'string' || !value.trim()) {
      errors.push(`${path}${key}: must be a non-empty string`);
      return undefined;
    }
    return value.trim();
  }

  private integer(
    value: unknown,
    path: string,
    fallback: number,
    minimum: number,
    errors: string[],
  ): number {
    if (value === undefined || value === null) {
      return fallback;
    }
    const parsed = parseInteger(value);
    if (parsed === undefined || parsed < minimum) {
      errors.push(`${path}: must be an integer of at least ${minimum}`);
      return fallback;
    }
    return parsed;
  }

  private boolean(value: unknown, path: string, fallback: boolean, errors: string[]): boolean {
    if (value === undefined || value === null) {
      return fallback;
    }
    const parsed = parseBoolean(value);
    if (parsed === undefined) {
      errors.push(`${path}: must be a boolean`);
      return fallback;
    }
    return parsed;
  }

  private labels(value: unknown, errors: string[]): string[] {
    if (value === undefined || value === null) {
      return ['self-hosted'];
    }

    const labels =
      typeof value === 'string'
        ? value.split(',').map((label) => label.trim())
        : Array.isArray(value)
          ? value
          : null;

    if (!labels) {
      errors.push('runner.labels: must be an array or a comma-separated string');
      return ['self-hosted'];
    }

    const valid: string[] = [];
    labels.forEach((label, index) => {
      if (typeof label !== 'string' || !label.trim()) {
        errors.push(`runner.labels[${index}]: must be a non-empty string`);
      } else {
        valid.push(label.trim());
      }
    });

    return valid;
  }
}
