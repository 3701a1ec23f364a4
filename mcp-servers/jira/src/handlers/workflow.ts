/**
 * Workflow Operations Handler
 * Handles analyze_ticket, analyze_tickets, find_test_references, get_workflow_model
 */

import { z } from 'zod';
import { createErrorResponse, createSuccessResponse, type MCPResponse } from '@review-tracker/shared';
import { BaseHandler } from './base-handler.js';
import type { TicketAnalysisService } from '../services/ticket-analysis.service.js';
import type { WorkflowReportFormatter } from '../services/report-formatter.js';
import type { WorkflowModel } from '../workflow/workflow-model.js';
import { findTestimReferences } from '../workflow/reference-extractor.js';
import { ISSUE_KEY_PATTERN } from '../utils/patterns.js';

export const MAX_BATCH_SIZE = 100;

const IssueKeySchema = z.string().trim().regex(ISSUE_KEY_PATTERN, 'must look like PROJ-123');

export const AnalyzeTicketArgsSchema = z.object({
  issueKey: IssueKeySchema,
});

export const AnalyzeTicketsArgsSchema = z.object({
  issueKeys: z.array(IssueKeySchema).min(1).max(MAX_BATCH_SIZE),
});

export const FindReferencesArgsSchema = z.object({
  text: z.string(),
  comments: z.array(z.string()).default([]),
});

export class WorkflowHandler extends BaseHandler {
  constructor(
    private analysisService: TicketAnalysisService,
    private formatter: WorkflowReportFormatter,
    private model: WorkflowModel
  ) {
    super();
  }

  async analyzeTicket(args: unknown): Promise<MCPResponse> {
    const { issueKey } = this.parseArgs(AnalyzeTicketArgsSchema, args);

    try {
      const report = await this.analysisService.analyzeTicket(issueKey);
      return this.formatResponse(this.formatter.formatTicketReport(report));
    } catch (error) {
      this.handleError(error, `analyze ticket ${issueKey}`);
    }
  }

  async analyzeTickets(args: unknown): Promise<MCPResponse> {
    const { issueKeys } = this.parseArgs(AnalyzeTicketsArgsSchema, args);

    try {
      const result = await this.analysisService.analyzeTickets(issueKeys);
      if (result.reports.length === 0) {
        return createErrorResponse(
          `No tickets could be analyzed\n\n${result.failures.map(f => `• ${f.key}: ${f.message}`).join('\n')}`
        );
      }
      return createSuccessResponse(
        `Analyzed ${result.reports.length} of ${result.reports.length + result.failures.length} ticket(s)`,
        this.formatter.formatBatchReport(result)
      );
    } catch (error) {
      this.handleError(error, 'analyze tickets');
    }
  }

  findTestReferences(args: unknown): MCPResponse {
    const { text, comments } = this.parseArgs(FindReferencesArgsSchema, args);
    const references = findTestimReferences(text, comments);

    if (references.length === 0) {
      return createErrorResponse('No Testim references found');
    }
    return createSuccessResponse(
      `Found ${references.length} Testim reference(s)`,
      this.formatter.formatReferences(references)
    );
  }

  getWorkflowModel(): MCPResponse {
    const blocked = this.model.blockedStages.length > 0 ? this.model.blockedStages.join(', ') : 'None';
    return this.formatResponse(
      `**Workflow order:** ${this.model.describe()}\n` +
      `**Blocked states:** ${blocked}\n` +
      `A bounce-back is any move to an earlier stage (e.g. ${this.exampleBounceBack()}).`
    );
  }

  private exampleBounceBack(): string {
    const { stages } = this.model;
    if (stages.length < 2) return 'none possible with a single stage';
    const from = stages[Math.min(2, stages.length - 1)];
    const to = stages[Math.min(1, stages.length - 2)];
    return `${from} → ${to}`;
  }
}
