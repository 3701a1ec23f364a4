/**
 * Workflow Model
 * Forward-ordered stage names plus the set of blocked stage names.
 * Bound into the analyzer at construction; never read from a global.
 */

import { ConfigurationError } from '@review-tracker/shared';
import type { StageClassification } from '../types/index.js';

export const DEFAULT_WORKFLOW_STAGES = ['To Do', 'In Progress', 'In Review', 'Done'] as const;
export const DEFAULT_BLOCKED_STAGES = ['Blocked'] as const;

export function normalizeStage(label: string): string {
  return label.trim().toLowerCase();
}

export class WorkflowModel {
  private readonly positions: ReadonlyMap<string, number>;
  private readonly blocked: ReadonlySet<string>;
  readonly stages: readonly string[];
  readonly blockedStages: readonly string[];

  constructor(
    stages: readonly string[] = DEFAULT_WORKFLOW_STAGES,
    blockedStages: readonly string[] = DEFAULT_BLOCKED_STAGES
  ) {
    const normalizedStages = stages.map(normalizeStage).filter(Boolean);
    if (normalizedStages.length === 0) {
      throw new ConfigurationError('Workflow must define at least one stage');
    }

    const positions = new Map<string, number>();
    normalizedStages.forEach((stage, index) => {
      if (positions.has(stage)) {
        throw new ConfigurationError(`Duplicate workflow stage: "${stage}"`);
      }
      positions.set(stage, index);
    });

    this.positions = positions;
    this.blocked = new Set(blockedStages.map(normalizeStage).filter(Boolean));
    this.stages = normalizedStages;
    this.blockedStages = Array.from(this.blocked);
  }

  /**
   * Classify a stage label. Blocked wins over forward membership.
   */
  classify(label: string): StageClassification {
    const normalized = normalizeStage(label);
    if (this.blocked.has(normalized)) {
      return { kind: 'blocked' };
    }
    const position = this.positions.get(normalized);
    if (position === undefined) {
      return { kind: 'unclassified' };
    }
    return { kind: 'position', position };
  }

  isBlocked(label: string): boolean {
    return this.classify(label).kind === 'blocked';
  }

  /**
   * Human-readable forward order, e.g. "to do → in progress → done"
   */
  describe(): string {
    return this.stages.join(' → ');
  }
}

export const DEFAULT_WORKFLOW = new WorkflowModel();
