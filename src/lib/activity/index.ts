export { DEFAULT_ACTIVITY_THRESHOLD, isActive, parseDuration, parseTimestamp } from './evaluator.js';
