/**
 * Bounce-Back Detector
 * Flags backward moves through the workflow and every entry into a blocked stage
 */

import type { BounceBackEvent, Transition } from '../types/index.js';
import { sortTransitions } from './transitions.js';
import type { WorkflowModel } from './workflow-model.js';

/**
 * Detect bounce-backs and blocked entries, in chronological order.
 *
 * The backward-move and blocked-entry checks run independently and are never merged.
 * Since blocked labels never classify to a forward position, a blocked entry is
 * reported once as blocked. Unknown stages never count as a backward move.
 */
export function detectBounceBacks(transitions: readonly Transition[], model: WorkflowModel): BounceBackEvent[] {
  const events: BounceBackEvent[] = [];

  for (const transition of sortTransitions(transitions)) {
    const from = model.classify(transition.fromStatus);
    const to = model.classify(transition.toStatus);

    // Position 0 has nothing earlier to bounce back to
    if (from.kind === 'position' && from.position > 0 && to.kind === 'position' && to.position < from.position) {
      events.push({ ...transition, isBlocked: false });
    }

    if (to.kind === 'blocked') {
      events.push({ ...transition, isBlocked: true });
    }
  }

  return events;
}

export function countBounceBacks(events: readonly BounceBackEvent[]): { backward: number; blocked: number } {
  let backward = 0;
  let blocked = 0;
  for (const event of events) {
    if (event.isBlocked) blocked++;
    else backward++;
  }
  return { backward, blocked };
}
