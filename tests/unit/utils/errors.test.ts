import { describe, expect, it } from 'vitest';
import {
  authenticationError,
  CLIError,
  ErrorCodes,
  FatalConfigError,
  formatError,
  getErrorStatus,
  isSoftStatus,
  isTimeoutError,
  ParseError,
  RuntimeError,
  TransportError,
} from '../../../src/utils/errors.js';

describe('errors', () => {
  describe('CLIError', () => {
    it('should create error with message and exit code', () => {
      const error = new CLIError('Test error', 5, 'more detail');

      expect(error).toBeInstanceOf(Error);
      expect(error.message).toBe('Test error');
      expect(error.exitCode).toBe(5);
      expect(error.details).toBe('more detail');
      expect(error.name).toBe('CLIError');
    });

    it('should default exit code to 1', () => {
      expect(new CLIError('Test error').exitCode).toBe(1);
    });
  });

  describe('FatalConfigError', () => {
    it('should be a CLIError with the configuration exit code', () => {
      const error = new FatalConfigError('Repository owner is not configured');

      expect(error).toBeInstanceOf(CLIError);
      expect(error.exitCode).toBe(ErrorCodes.CONFIGURATION_ERROR);
      expect(error.name).toBe('FatalConfigError');
    });
  });

  describe('TransportError', () => {
    it('should keep the operation, status and cause', () => {
      const cause = new Error('Not Found');
      const error = new TransportError('listWorkflowFiles failed', 'listWorkflowFiles', 404, cause);

      expect(error.operation).toBe('listWorkflowFiles');
      expect(error.status).toBe(404);
      expect(error.cause).toBe(cause);
      expect(error.name).toBe('TransportError');
    });

    it('should classify 404 and 409 as soft', () => {
      expect(new TransportError('x', 'op', 404).isSoft).toBe(true);
      expect(new TransportError('x', 'op', 409).isSoft).toBe(true);
      expect(new TransportError('x', 'op', 403).isSoft).toBe(false);
      expect(new TransportError('x', 'op').isSoft).toBe(false);
    });
  });

  describe('RuntimeError and ParseError', () => {
    it('should name the container or source', () => {
      expect(new RuntimeError('start failed', 'actions-runner_4_acme_api')).toMatchObject({
        name: 'RuntimeError',
        containerName: 'actions-runner_4_acme_api',
      });
      expect(new ParseError('bad yaml', 'acme/api:ci.yml')).toMatchObject({
        name: 'ParseError',
        source: 'acme/api:ci.yml',
      });
    });
  });

  describe('authenticationError', () => {
    it('should use the authentication exit code', () => {
      const error = authenticationError('Token expired');

      expect(error.message).toBe('Authentication failed');
      expect(error.exitCode).toBe(3);
      expect(error.details).toBe('Token expired');
    });

    it('should provide default details', () => {
      expect(authenticationError().details).toBe(
        'Please check your GitHub token or use GitHub CLI authentication',
      );
    });
  });

  describe('isSoftStatus', () => {
    it('should only accept not-found and conflict', () => {
      expect(isSoftStatus(404)).toBe(true);
      expect(isSoftStatus(409)).toBe(true);
      expect(isSoftStatus(500)).toBe(false);
      expect(isSoftStatus(undefined)).toBe(false);
    });
  });

  describe('getErrorStatus', () => {
    it('should read Octokit and dockerode status fields', () => {
      expect(getErrorStatus(Object.assign(new Error('x'), { status: 403 }))).toBe(403);
      expect(getErrorStatus({ statusCode: 404 })).toBe(404);
    });

    it('should return undefined when there is no numeric status', () => {
      expect(getErrorStatus(new Error('x'))).toBeUndefined();
      expect(getErrorStatus({ status: '500' })).toBeUndefined();
      expect(getErrorStatus('error')).toBeUndefined();
      expect(getErrorStatus(null)).toBeUndefined();
    });
  });

  describe('isTimeoutError', () => {
    it('should return true for timeout errors', () => {
      expect(isTimeoutError(Object.assign(new Error(), { code: 'ETIMEDOUT' }))).toBe(true);
      expect(isTimeoutError(new Error('Request timeout'))).toBe(true);
      expect(isTimeoutError(new Error('Operation timed out'))).toBe(true);
    });

    it('should recognise aborted requests', () => {
      const error = new Error('The operation was aborted due to timeout');
      error.name = 'TimeoutError';

      expect(isTimeoutError(error)).toBe(true);
    });

    it('should return false for other errors and non-Error values', () => {
      expect(isTimeoutError(new Error('Some other error'))).toBe(false);
      expect(isTimeoutError('string error')).toBe(false);
      expect(isTimeoutError(null)).toBe(false);
      expect(isTimeoutError(123)).toBe(false);
    });
  });

  describe('formatError', () => {
    it('should format Error objects and strings', () => {
      expect(formatError(new Error('Test error'))).toBe('Test error');
      expect(formatError('String error')).toBe('String error');
    });

    it('should fall back for unknown values', () => {
      expect(formatError({ custom: 'error' })).toBe('An unknown error occurred');
      expect(formatError(null)).toBe('An unknown error occurred');
    });
  });
});
