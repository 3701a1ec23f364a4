/**
 * TicketAnalysisService Unit Tests
 * Runs the real analyzer over an in-memory ticket source
 */

import { ApiError } from '@review-tracker/shared';
import type { TicketSource } from '../../clients/jira-client';
import type { JiraChangelogHistory, JiraIssue, JiraWorklog } from '../../types/index';
import { parseTimestamp } from '../../workflow/timestamp';
import { WorkflowAnalyzer } from '../../workflow/workflow-analyzer';
import { TicketAnalysisService } from '../ticket-analysis.service';

interface FakeTicket {
  issue: JiraIssue;
  changelog: JiraChangelogHistory[];
  worklogs: JiraWorklog[];
}

class InMemoryTicketSource implements TicketSource {
  readonly requested: string[] = [];
  inFlight = 0;
  maxInFlight = 0;

  constructor(private tickets: Record<string, FakeTicket>) {}

  private async lookup(key: string): Promise<FakeTicket> {
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    await Promise.resolve();
    this.inFlight--;
    const ticket = this.tickets[key];
    if (!ticket) {
      throw new ApiError(`Failed to get issue ${key}: Issue does not exist`, 404);
    }
    return ticket;
  }

  async getIssue(key: string): Promise<JiraIssue> {
    this.requested.push(key);
    return (await this.lookup(key)).issue;
  }

  async getChangelog(key: string): Promise<JiraChangelogHistory[]> {
    return (await this.lookup(key)).changelog;
  }

  async getWorklogs(key: string): Promise<JiraWorklog[]> {
    return (await this.lookup(key)).worklogs;
  }
}

function ticket(key: string, overrides: Partial<JiraIssue['fields']> = {}): FakeTicket {
  return {
    issue: {
      id: key,
      key,
      fields: {
        summary: `Summary of ${key}`,
        status: { name: 'In Progress' },
        assignee: { displayName: 'Alice' },
        description: 'Covered by Testim: smoke-suite',
        created: '2024-01-15T08:00:00.000+0000',
        comment: { comments: [] },
        ...overrides,
      },
    },
    changelog: [
      {
        id: '1',
        created: '2024-01-15T10:00:00.000+0000',
        author: { displayName: 'Alice' },
        items: [{ field: 'status', fromString: 'To Do', toString: 'In Progress' }],
      },
    ],
    worklogs: [{ id: '1', timeSpentSeconds: 5400 }],
  };
}

describe('TicketAnalysisService', () => {
  const now = parseTimestamp('2024-01-15T12:00:00Z');
  const analyzer = new WorkflowAnalyzer({ clock: () => now });
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  describe('analyzeTicket', () => {
    it('should build a report from the fetched issue', async () => {
      const service = new TicketAnalysisService(new InMemoryTicketSource({ 'PROJ-1': ticket('PROJ-1') }), analyzer);

      const report = await service.analyzeTicket('PROJ-1');

      expect(report).toMatchObject({
        key: 'PROJ-1',
        summary: 'Summary of PROJ-1',
        assignee: 'Alice',
        status: 'In Progress',
        hoursLogged: 1.5,
        descriptionText: 'Covered by Testim: smoke-suite',
        skippedHistoryEntries: 0,
      });
      expect(report.analysis.timeInStates.map(p => [p.status, p.durationHours])).toEqual([
        ['To Do', 2],
        ['In Progress', 2],
      ]);
      expect(report.analysis.references).toEqual(['Testim: smoke-suite']);
    });

    it('should fill in defaults for missing issue fields', async () => {
      const bare = ticket('PROJ-2', { summary: undefined, status: null, assignee: null });
      const service = new TicketAnalysisService(new InMemoryTicketSource({ 'PROJ-2': bare }), analyzer);

      const report = await service.analyzeTicket('PROJ-2');

      expect([report.summary, report.assignee, report.status]).toEqual(['', 'Unassigned', 'Unknown']);
    });

    it('should propagate a malformed timestamp', async () => {
      const broken = ticket('PROJ-3', { created: '15 Jan 2024' });
      const service = new TicketAnalysisService(new InMemoryTicketSource({ 'PROJ-3': broken }), analyzer);

      await expect(service.analyzeTicket('PROJ-3')).rejects.toThrow('Malformed timestamp: "15 Jan 2024"');
    });
  });

  describe('analyzeTickets', () => {
    it('should keep going past a failing ticket and report it', async () => {
      const source = new InMemoryTicketSource({ 'PROJ-1': ticket('PROJ-1'), 'PROJ-3': ticket('PROJ-3') });
      const service = new TicketAnalysisService(source, analyzer);

      const result = await service.analyzeTickets(['PROJ-1', 'PROJ-2', 'PROJ-3']);

      expect(result.reports.map(r => r.key)).toEqual(['PROJ-1', 'PROJ-3']);
      expect(result.failures).toEqual([
        { key: 'PROJ-2', message: 'Failed to get issue PROJ-2: Issue does not exist' },
      ]);
      expect(errorSpy).toHaveBeenCalledWith('❌ Could not analyze PROJ-2: Failed to get issue PROJ-2: Issue does not exist');
    });

    it('should analyze duplicate keys once, in first-seen order', async () => {
      const source = new InMemoryTicketSource({ 'PROJ-1': ticket('PROJ-1'), 'PROJ-2': ticket('PROJ-2') });
      const service = new TicketAnalysisService(source, analyzer);

      const result = await service.analyzeTickets(['PROJ-2', 'PROJ-1', 'PROJ-2']);

      expect(result.reports.map(r => r.key)).toEqual(['PROJ-2', 'PROJ-1']);
      expect(source.requested).toEqual(['PROJ-2', 'PROJ-1']);
    });

    it('should keep at most the configured number of tickets in flight', async () => {
      const keys = ['PROJ-1', 'PROJ-2', 'PROJ-3', 'PROJ-4', 'PROJ-5'];
      const source = new InMemoryTicketSource(Object.fromEntries(keys.map(key => [key, ticket(key)])));
      const service = new TicketAnalysisService(source, analyzer, 2);

      const result = await service.analyzeTickets(keys);

      expect(result.reports).toHaveLength(5);
      expect(source.requested).toEqual(keys);
      // three lookups per ticket
      expect(source.maxInFlight).toBe(6);
    });

    it('should return empty results for no keys', async () => {
      const service = new TicketAnalysisService(new InMemoryTicketSource({}), analyzer);

      await expect(service.analyzeTickets([])).resolves.toEqual({ reports: [], failures: [] });
    });
  });
});
