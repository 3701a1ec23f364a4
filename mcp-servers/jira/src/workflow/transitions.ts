import type { RawTransition, Transition } from '../types/index.js';
import { compareInstants, parseTimestamp } from './timestamp.js';

export const UNKNOWN_AUTHOR = 'Unknown';

/**
 * Parse a raw transition. A malformed timestamp throws; nothing is dropped silently.
 */
export function toTransition(raw: RawTransition): Transition {
  return Object.freeze({
    timestamp: parseTimestamp(raw.timestamp),
    fromStatus: raw.fromStatus,
    toStatus: raw.toStatus,
    author: raw.author?.trim() ? raw.author : UNKNOWN_AUTHOR,
  });
}

export function isChronological(transitions: readonly Transition[]): boolean {
  for (let index = 1; index < transitions.length; index++) {
    if (compareInstants(transitions[index - 1].timestamp, transitions[index].timestamp) > 0) {
      return false;
    }
  }
  return true;
}

/**
 * Stable chronological order; ties keep their input order.
 * Returns a new array and leaves the input untouched.
 */
export function sortTransitions<T extends Transition>(transitions: readonly T[]): T[] {
  if (isChronological(transitions)) {
    return [...transitions];
  }
  return [...transitions].sort((a, b) => compareInstants(a.timestamp, b.timestamp));
}
