/**
 * Custom error class for CLI errors with exit codes
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1,
    public readonly details?: string,
  ) {
    super(message);
    this.name = 'CLIError';
  }
}

/**
 * Error types with specific exit codes
 */
export const ErrorCodes = {
  GENERAL_ERROR: 1,
  INVALID_INPUT: 2,
  AUTHENTICATION_ERROR: 3,
  NETWORK_ERROR: 4,
  CONFIGURATION_ERROR: 6,
  NOT_FOUND: 8,
  TIMEOUT: 10,
} as const;

/**
 * Required configuration is missing or invalid. Aborts the pass before any remote call.
 */
export class FatalConfigError extends CLIError {
  constructor(message: string, details?: string) {
    super(message, ErrorCodes.CONFIGURATION_ERROR, details);
    this.name = 'FatalConfigError';
  }
}

/**
 * A remote query against the source-control API failed.
 */
export class TransportError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly status?: number,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'TransportError';
  }

  /** 404 and 409 (empty repository) mean "no data" rather than a failure. */
  get isSoft(): boolean {
    return isSoftStatus(this.status);
  }
}

/**
 * A container engine operation failed for one runner.
 */
export class RuntimeError extends Error {
  constructor(
    message: string,
    public readonly containerName: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = 'RuntimeError';
  }
}

/**
 * A remote payload (YAML, JSON, base64) could not be decoded.
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly source: string,
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

/**
 * Create authentication error
 */
export function authenticationError(details?: string): CLIError {
  return new CLIError(
    'Authentication failed',
    ErrorCodes.AUTHENTICATION_ERROR,
    details || 'Please check your GitHub token or use GitHub CLI authentication',
  );
}

export function isSoftStatus(status: number | undefined): boolean {
  return status === 404 || status === 409;
}

/**
 * Read the HTTP status carried by Octokit and dockerode errors
 */
export function getErrorStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

/**
 * Check if an error is a timeout error
 */
export function isTimeoutError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  if ('code' in error && error.code === 'ETIMEDOUT') {
    return true;
  }
  if (error.name === 'TimeoutError' || error.name === 'AbortError') {
    return true;
  }

  const message = error.message.toLowerCase();
  return message.includes('timeout') || message.includes('timed out');
}

/**
 * Format error for display
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === 'string') {
    return error;
  }

  return 'An unknown error occurred';
}
