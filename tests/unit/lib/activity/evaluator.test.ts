import { describe, expect, it } from 'vitest';
import {
  DEFAULT_ACTIVITY_THRESHOLD,
  isActive,
  parseDuration,
  parseTimestamp,
} from '../../../../src/lib/activity/evaluator.js';

const HOUR = 60 * 60 * 1000;
const DAY = 24 * HOUR;

describe('parseDuration', () => {
  it('should parse single-unit durations', () => {
    expect(parseDuration('7d')).toBe(7 * DAY);
    expect(parseDuration('36h')).toBe(36 * HOUR);
    expect(parseDuration('90m')).toBe(90 * 60 * 1000);
    expect(parseDuration('45s')).toBe(45_000);
    expect(parseDuration('250ms')).toBe(250);
    expect(parseDuration('2w')).toBe(14 * DAY);
  });

  it('should read a bare number as days', () => {
    expect(parseDuration('3')).toBe(3 * DAY);
    expect(parseDuration('0.5')).toBe(12 * HOUR);
  });

  it('should sum compound durations', () => {
    expect(parseDuration('1w2d')).toBe(9 * DAY);
    expect(parseDuration('1d12h')).toBe(36 * HOUR);
  });

  it('should ignore case and surrounding whitespace', () => {
    expect(parseDuration(' 7D ')).toBe(7 * DAY);
  });

  it('should parse the default threshold', () => {
    expect(parseDuration(DEFAULT_ACTIVITY_THRESHOLD)).toBe(7 * DAY);
  });

  it.each(['', 'abc', 'd', '7x', '7d3', '-1d', '7 d'])('should reject "%s"', (input) => {
    expect(() => parseDuration(input)).toThrowError(`Invalid duration "${input}"`);
  });
});

describe('isActive', () => {
  const now = new Date('2024-06-15T12:00:00Z');
  const threshold = 7 * DAY;

  it('should be active when the latest commit is within the threshold', () => {
    expect(
      isActive({ lastCommitAt: new Date('2024-06-14T12:00:00Z') }, threshold, now),
    ).toBe(true);
  });

  it('should be active when only the latest workflow run is within the threshold', () => {
    expect(
      isActive(
        {
          lastCommitAt: new Date('2024-01-01T00:00:00Z'),
          lastWorkflowRunAt: new Date('2024-06-10T00:00:00Z'),
        },
        threshold,
        now,
      ),
    ).toBe(true);
  });

  it('should be inactive when both timestamps are older than the threshold', () => {
    expect(
      isActive(
        {
          lastCommitAt: new Date('2024-06-01T00:00:00Z'),
          lastWorkflowRunAt: new Date('2024-06-02T00:00:00Z'),
        },
        threshold,
        now,
      ),
    ).toBe(false);
  });

  it('should be inactive when no timestamps are known', () => {
    expect(isActive({}, threshold, now)).toBe(false);
  });

  it('should treat a timestamp exactly at the threshold as active', () => {
    expect(
      isActive({ lastCommitAt: new Date('2024-06-08T12:00:00Z') }, threshold, now),
    ).toBe(true);
    expect(
      isActive({ lastCommitAt: new Date('2024-06-08T11:59:59Z') }, threshold, now),
    ).toBe(false);
  });

  it('should treat timestamps in the future as active', () => {
    expect(
      isActive({ lastWorkflowRunAt: new Date('2024-06-16T00:00:00Z') }, threshold, now),
    ).toBe(true);
  });

  it('should ignore invalid dates', () => {
    expect(isActive({ lastCommitAt: new Date('not a date') }, threshold, now)).toBe(false);
  });
});

describe('parseTimestamp', () => {
  it('should parse UTC timestamps', () => {
    expect(parseTimestamp('2024-06-15T12:00:00Z')?.toISOString()).toBe(
      '2024-06-15T12:00:00.000Z',
    );
  });

  it('should normalize explicit offsets to UTC', () => {
    expect(parseTimestamp('2024-06-15T12:00:00+02:00')?.toISOString()).toBe(
      '2024-06-15T10:00:00.000Z',
    );
  });

  it('should read timestamps without a zone as UTC', () => {
    expect(parseTimestamp('2024-06-15T12:00:00')?.toISOString()).toBe(
      '2024-06-15T12:00:00.000Z',
    );
  });

  it('should return undefined for missing or invalid values', () => {
    expect(parseTimestamp(undefined)).toBeUndefined();
    expect(parseTimestamp(null)).toBeUndefined();
    expect(parseTimestamp('')).toBeUndefined();
    expect(parseTimestamp('yesterday')).toBeUndefined();
  });
});
