/**
 * Changelog Adapter
 * Converts loosely-typed Jira payloads into the typed records the analyzer expects.
 * Histories missing required fields are skipped and counted, never passed on half-filled.
 */

import { z } from 'zod';
import type { AdfNode, JiraChangelogHistory, JiraIssue, JiraRichText, JiraWorklog, RawTransition } from '../types/index.js';
import { UNKNOWN_AUTHOR } from '../workflow/transitions.js';
import { STATUS_FIELD } from './patterns.js';
import { roundHalfEven } from './rounding.js';

const ChangelogItemSchema = z.object({
  field: z.string(),
}).passthrough();

const ChangelogHistorySchema = z.object({
  created: z.string().min(1),
  author: z.object({ displayName: z.string().optional() }).passthrough().nullish(),
  items: z.array(ChangelogItemSchema),
});

export interface ChangelogExtraction {
  transitions: RawTransition[];
  skippedEntries: number;
}

/**
 * Own string property of a record; "toString" must not fall through to Object.prototype
 */
function ownString(record: object, key: string): string {
  const value: unknown = Object.getOwnPropertyDescriptor(record, key)?.value;
  return typeof value === 'string' ? value : '';
}

/**
 * Keep only status changes from a changelog, in the order Jira returned them
 */
export function extractStatusTransitions(histories: readonly JiraChangelogHistory[]): ChangelogExtraction {
  const transitions: RawTransition[] = [];
  let skippedEntries = 0;

  for (const history of histories) {
    const parsed = ChangelogHistorySchema.safeParse(history);
    if (!parsed.success) {
      skippedEntries++;
      console.error(`⚠️ Skipping changelog entry ${history.id ?? '(no id)'}: ${parsed.error.issues.map(issue => `${issue.path.join('.') || 'entry'} ${issue.message}`).join('; ')}`);
      continue;
    }

    const { created, author, items } = parsed.data;
    const authorName = author?.displayName || UNKNOWN_AUTHOR;

    for (const item of items) {
      if (item.field !== STATUS_FIELD) continue;
      transitions.push({
        timestamp: created,
        fromStatus: ownString(item, 'fromString'),
        toStatus: ownString(item, 'toString'),
        author: authorName,
      });
    }
  }

  return { transitions, skippedEntries };
}

function isAdfNode(value: unknown): value is AdfNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Flatten an Atlassian Document Format body to plain text.
 * Text nodes are collected depth-first and joined by single spaces.
 */
export function extractDescriptionText(body: JiraRichText): string {
  if (body === null || body === undefined) return '';
  if (typeof body === 'string') return body;

  const parts: string[] = [];
  const walk = (node: unknown): void => {
    if (Array.isArray(node)) {
      node.forEach(walk);
      return;
    }
    if (!isAdfNode(node)) return;
    if (node.type === 'text') {
      parts.push(node.text ?? '');
    }
    if (Array.isArray(node.content)) {
      node.content.forEach(walk);
    }
  };

  walk(body);
  return parts.join(' ');
}

/**
 * Plain text of every non-empty comment on an issue
 */
export function extractCommentsText(issue: JiraIssue): string[] {
  const comments = issue.fields.comment?.comments ?? [];
  return comments
    .map(comment => extractDescriptionText(comment.body))
    .filter(text => text.length > 0);
}

/**
 * Total logged time in hours, rounded to two decimals
 */
export function totalWorklogHours(worklogs: readonly JiraWorklog[]): number {
  const totalSeconds = worklogs.reduce((sum, entry) => sum + (entry.timeSpentSeconds ?? 0), 0);
  return roundHalfEven(totalSeconds / 3600);
}
