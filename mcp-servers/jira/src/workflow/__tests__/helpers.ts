import type { Instant, Transition } from '../../types/index';
import { parseTimestamp } from '../timestamp';
import { toTransition } from '../transitions';

export function transition(fromStatus: string, toStatus: string, timestamp: string, author: string = 'Alice'): Transition {
  return toTransition({ timestamp, fromStatus, toStatus, author });
}

export function at(timestamp: string): Instant {
  return parseTimestamp(timestamp);
}

export function fixedClock(timestamp: string): () => Instant {
  const instant = parseTimestamp(timestamp);
  return () => instant;
}
