/**
 * Type definitions for the Jira workflow server
 * Raw Jira REST v3 payloads on one side, analyzed workflow structures on the other
 */

import type { ApiUser } from '@review-tracker/shared';

// ============================================
// Jira REST API payloads
// ============================================

/**
 * Atlassian Document Format node (descriptions and comment bodies in API v3)
 */
export interface AdfNode {
  type: string;
  text?: string;
  content?: AdfNode[];
  attrs?: Record<string, unknown>;
}

/** A rich-text body: ADF document, legacy plain string, or absent */
export type JiraRichText = AdfNode | string | null | undefined;

export interface JiraComment {
  id: string;
  author?: ApiUser;
  body?: JiraRichText;
  created: string;
}

export interface JiraIssue {
  id: string;
  key: string;
  fields: {
    summary?: string;
    status?: {
      name: string;
      id?: string;
    } | null;
    assignee?: ApiUser | null;
    description?: JiraRichText;
    comment?: {
      comments: JiraComment[];
      total?: number;
    };
    created?: string;
  };
}

/**
 * One changelog history entry as returned by /issue/{key}/changelog.
 * Fields stay unknown until the changelog adapter validates them.
 */
export interface JiraChangelogHistory {
  id?: string;
  created?: unknown;
  author?: unknown;
  items?: unknown;
}

export interface JiraWorklog {
  id: string;
  author?: ApiUser;
  timeSpentSeconds?: number;
  started?: string;
}

/** Offset-paginated response shapes used by Jira */
export interface JiraChangelogPage {
  values: JiraChangelogHistory[];
  startAt: number;
  maxResults: number;
  total: number;
  isLast?: boolean;
}

export interface JiraWorklogPage {
  worklogs: JiraWorklog[];
  startAt: number;
  maxResults: number;
  total: number;
}

// ============================================
// Workflow analysis structures
// ============================================

/**
 * An absolute point in time with microsecond precision.
 * `offsetMinutes` only affects rendering; comparisons use `epochMicros`.
 */
export interface Instant {
  readonly epochMicros: number;
  readonly offsetMinutes: number;
}

/**
 * A status change as it arrives from the changelog adapter, timestamp still textual
 */
export interface RawTransition {
  timestamp: string;
  fromStatus: string;
  toStatus: string;
  author?: string;
}

/**
 * One observed state change
 */
export interface Transition {
  readonly timestamp: Instant;
  readonly fromStatus: string;
  readonly toStatus: string;
  readonly author: string;
}

/**
 * A transition flagged as a backward move (isBlocked=false) or entry into a blocked stage (isBlocked=true)
 */
export interface BounceBackEvent extends Transition {
  readonly isBlocked: boolean;
}

/**
 * A contiguous interval during which the ticket held one status
 */
export interface StatePeriod {
  readonly status: string;
  readonly entered: Instant;
  readonly exited: Instant;
  readonly durationHours: number;
}

export type StageClassification =
  | { kind: 'position'; position: number }
  | { kind: 'blocked' }
  | { kind: 'unclassified' };

export interface TicketHistoryInput {
  createdAt?: string | null;
  transitions: RawTransition[];
  descriptionText?: string;
  commentTexts?: string[];
}

export interface WorkflowAnalysis {
  transitions: Transition[];
  bounceBacks: BounceBackEvent[];
  timeInStates: StatePeriod[];
  references: string[];
  analyzedAt: Instant;
}

/**
 * Everything known about one ticket after fetching and analysis
 */
export interface TicketReport {
  key: string;
  summary: string;
  assignee: string;
  status: string;
  hoursLogged: number;
  descriptionText: string;
  skippedHistoryEntries: number;
  analysis: WorkflowAnalysis;
}

export interface TicketFailure {
  key: string;
  message: string;
}

export interface BatchAnalysisResult {
  reports: TicketReport[];
  failures: TicketFailure[];
}
