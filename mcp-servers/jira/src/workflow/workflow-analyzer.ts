/**
 * Workflow Analyzer
 * Stateless analyzer bound to one workflow model and one clock.
 * Raw transitions in; sorted transitions, bounce-backs, time-in-state periods and references out.
 */

import type { Instant, TicketHistoryInput, WorkflowAnalysis } from '../types/index.js';
import { detectBounceBacks } from './bounce-back-detector.js';
import { findTestimReferences } from './reference-extractor.js';
import { reconstructTimeInStates } from './time-in-state.js';
import { nowInstant, parseTimestamp } from './timestamp.js';
import { sortTransitions, toTransition } from './transitions.js';
import { DEFAULT_WORKFLOW, WorkflowModel } from './workflow-model.js';

export type Clock = () => Instant;

export interface WorkflowAnalyzerOptions {
  model?: WorkflowModel;
  clock?: Clock;
}

export class WorkflowAnalyzer {
  readonly model: WorkflowModel;
  private readonly clock: Clock;

  constructor(options: WorkflowAnalyzerOptions = {}) {
    this.model = options.model ?? DEFAULT_WORKFLOW;
    this.clock = options.clock ?? nowInstant;
  }

  /**
   * Analyze one ticket's history.
   * Throws MalformedTimestampError if any timestamp cannot be parsed; no partial result is returned.
   */
  analyze(input: TicketHistoryInput): WorkflowAnalysis {
    const analyzedAt = this.clock();
    const createdAt = input.createdAt ? parseTimestamp(input.createdAt) : undefined;
    const transitions = sortTransitions(input.transitions.map(toTransition));

    return {
      transitions,
      bounceBacks: detectBounceBacks(transitions, this.model),
      timeInStates: reconstructTimeInStates(transitions, createdAt, analyzedAt),
      references: findTestimReferences(input.descriptionText ?? '', input.commentTexts ?? []),
      analyzedAt,
    };
  }
}
