/**
 * Ticket Analysis Service
 * Fetch → adapt → analyze for one ticket, and a bounded-concurrency batch over many.
 * A failing ticket is reported with its key and never aborts the rest of the batch.
 */

import { getErrorMessage } from '@review-tracker/shared';
import type { TicketSource } from '../clients/jira-client.js';
import type { BatchAnalysisResult, TicketFailure, TicketReport } from '../types/index.js';
import {
  extractCommentsText,
  extractDescriptionText,
  extractStatusTransitions,
  totalWorklogHours,
} from '../utils/changelog.js';
import type { WorkflowAnalyzer } from '../workflow/workflow-analyzer.js';

export const DEFAULT_CONCURRENCY = 4;

export class TicketAnalysisService {
  private readonly concurrency: number;

  constructor(
    private source: TicketSource,
    private analyzer: WorkflowAnalyzer,
    concurrency: number = DEFAULT_CONCURRENCY
  ) {
    this.concurrency = Math.max(1, Math.floor(concurrency));
  }

  async analyzeTicket(issueKey: string): Promise<TicketReport> {
    const [issue, changelog, worklogs] = await Promise.all([
      this.source.getIssue(issueKey),
      this.source.getChangelog(issueKey),
      this.source.getWorklogs(issueKey),
    ]);

    const { fields } = issue;
    const { transitions, skippedEntries } = extractStatusTransitions(changelog);
    const descriptionText = extractDescriptionText(fields.description);

    const analysis = this.analyzer.analyze({
      createdAt: fields.created,
      transitions,
      descriptionText,
      commentTexts: extractCommentsText(issue),
    });

    return {
      key: issue.key || issueKey,
      summary: fields.summary ?? '',
      assignee: fields.assignee?.displayName || 'Unassigned',
      status: fields.status?.name || 'Unknown',
      hoursLogged: totalWorklogHours(worklogs),
      descriptionText,
      skippedHistoryEntries: skippedEntries,
      analysis,
    };
  }

  /**
   * Analyze many tickets, at most `concurrency` in flight.
   * Duplicate keys are analyzed once; output keeps first-occurrence request order.
   */
  async analyzeTickets(issueKeys: readonly string[]): Promise<BatchAnalysisResult> {
    const keys = Array.from(new Set(issueKeys));
    const reports: TicketReport[] = [];
    const failures: TicketFailure[] = [];

    for (let start = 0; start < keys.length; start += this.concurrency) {
      const window = keys.slice(start, start + this.concurrency);
      const results = await Promise.allSettled(window.map(key => this.analyzeTicket(key)));

      results.forEach((result, index) => {
        const key = window[index];
        if (result.status === 'fulfilled') {
          reports.push(result.value);
        } else {
          const message = getErrorMessage(result.reason);
          console.error(`❌ Could not analyze ${key}: ${message}`);
          failures.push({ key, message });
        }
      });
    }

    return { reports, failures };
  }
}
