/**
 * Time-in-State Reconstructor
 * Turns a sparse transition log into gap-free, non-overlapping occupancy periods
 * covering [origin, now].
 */

import type { Instant, StatePeriod, Transition } from '../types/index.js';
import { hoursBetween, isBefore, nowInstant } from './timestamp.js';
import { roundHalfEven } from '../utils/rounding.js';
import { sortTransitions } from './transitions.js';
import { normalizeStage } from './workflow-model.js';

function period(status: string, entered: Instant, exited: Instant): StatePeriod {
  return Object.freeze({
    status,
    entered,
    exited,
    durationHours: hoursBetween(entered, exited),
  });
}

/**
 * Reconstruct the periods a ticket spent in each status.
 *
 * @param createdAt - Creation instant; a leading period in the first `fromStatus` is
 *   emitted only when it is strictly earlier than the first transition
 * @param now - End of the open, current period. Read once per call.
 */
export function reconstructTimeInStates(
  transitions: readonly Transition[],
  createdAt?: Instant,
  now: Instant = nowInstant()
): StatePeriod[] {
  if (transitions.length === 0) {
    return [];
  }

  const ordered = sortTransitions(transitions);
  const periods: StatePeriod[] = [];
  const first = ordered[0];

  if (createdAt && isBefore(createdAt, first.timestamp)) {
    periods.push(period(first.fromStatus, createdAt, first.timestamp));
  }

  ordered.forEach((transition, index) => {
    const next = ordered[index + 1];
    periods.push(period(transition.toStatus, transition.timestamp, next ? next.timestamp : now));
  });

  return periods;
}

/**
 * Total hours per status, keyed by normalized status name, in first-seen order
 */
export function hoursByStatus(periods: readonly StatePeriod[]): Map<string, number> {
  const totals = new Map<string, number>();
  for (const { status, durationHours } of periods) {
    const key = normalizeStage(status);
    totals.set(key, (totals.get(key) ?? 0) + durationHours);
  }
  for (const [key, hours] of totals) {
    totals.set(key, roundHalfEven(hours));
  }
  return totals;
}
