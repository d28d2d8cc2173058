import type { ActivitySignal } from '../../types/index.js';

const UNIT_MS = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000,
} as const;

type DurationUnit = keyof typeof UNIT_MS;

function isDurationUnit(value: string): value is DurationUnit {
  return value in UNIT_MS;
}

export const DEFAULT_ACTIVITY_THRESHOLD = '7d';

/**
 * Parse a duration such as `7d`, `36h`, `90m` or `1w2d` into milliseconds.
 * A bare number is read as days.
 */
export function parseDuration(input: string): number {
  const value = input.trim().toLowerCase();

  if (/^\d+(\.\d+)?$/.test(value)) {
    return Number(value) * UNIT_MS.d;
  }

  const pattern = /(\d+(?:\.\d+)?)(ms|s|m|h|d|w)/g;
  let total = 0;
  let consumed = 0;

  for (const match of value.matchAll(pattern)) {
    const [whole, amount, unit] = match;
    if (match.index !== consumed || !amount || !unit || !isDurationUnit(unit)) {
      break;
    }
    total += Number(amount) * UNIT_MS[unit];
    consumed += whole.length;
  }

  if (consumed === 0 || consumed !== value.length) {
    throw new Error(`Invalid duration "${input}": expected a value like 7d, 36h or 90m`);
  }

  return total;
}

function isRecent(timestamp: Date | undefined, thresholdMs: number, now: Date): boolean {
  if (!timestamp || Number.isNaN(timestamp.getTime())) {
    return false;
  }
  return now.getTime() - timestamp.getTime() <= thresholdMs;
}

/**
 * A repository is active when its latest commit or its latest workflow run is no older
 * than the threshold. Missing timestamps fail their clause.
 */
export function isActive(signal: ActivitySignal, thresholdMs: number, now: Date): boolean {
  return (
    isRecent(signal.lastCommitAt, thresholdMs, now) ||
    isRecent(signal.lastWorkflowRunAt, thresholdMs, now)
  );
}

/**
 * Normalize ISO-8601 timestamps (with `Z` or an explicit offset) to a UTC Date.
 * Timestamps without any zone designator are read as UTC.
 */
export function parseTimestamp(value: string | null | undefined): Date | undefined {
  if (!value) {
    return undefined;
  }

  const hasZone = /(?:z|[+-]\d{2}:?\d{2})$/i.test(value.trim());
  const date = new Date(hasZone ? value : `${value}Z`);
  return Number.isNaN(date.getTime()) ? undefined : date;
}
