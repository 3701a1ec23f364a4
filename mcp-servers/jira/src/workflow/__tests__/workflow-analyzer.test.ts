/**
 * Workflow Analyzer Unit Tests
 */

import { MalformedTimestampError } from '@review-tracker/shared';
import type { TicketHistoryInput } from '../../types/index';
import { WorkflowAnalyzer } from '../workflow-analyzer';
import { WorkflowModel } from '../workflow-model';
import { fixedClock } from './helpers';

const HISTORY: TicketHistoryInput = {
  createdAt: '2024-01-15T08:00:00.000+0000',
  transitions: [
    { timestamp: '2024-01-15T11:00:00.000+0000', fromStatus: 'In Progress', toStatus: 'In Review', author: 'Bob' },
    { timestamp: '2024-01-15T09:00:00.000+0000', fromStatus: 'To Do', toStatus: 'In Progress', author: 'Alice' },
    { timestamp: '2024-01-15T12:00:00.000+0000', fromStatus: 'In Review', toStatus: 'In Progress' },
  ],
  descriptionText: 'Automated in Testim: cart-total',
  commentTexts: ['Still failing, see Testim: cart-total'],
};

describe('WorkflowAnalyzer', () => {
  let analyzer: WorkflowAnalyzer;

  beforeEach(() => {
    analyzer = new WorkflowAnalyzer({ clock: fixedClock('2024-01-15T14:00:00Z') });
  });

  it('should assemble sorted transitions, bounce-backs, periods and references', () => {
    const analysis = analyzer.analyze(HISTORY);

    expect(analysis.transitions.map(t => t.author)).toEqual(['Alice', 'Bob', 'Unknown']);
    expect(analysis.bounceBacks).toHaveLength(1);
    expect(analysis.bounceBacks[0]).toMatchObject({ fromStatus: 'In Review', toStatus: 'In Progress', isBlocked: false });
    expect(analysis.timeInStates.map(p => [p.status, p.durationHours])).toEqual([
      ['To Do', 1],
      ['In Progress', 2],
      ['In Review', 1],
      ['In Progress', 2],
    ]);
    expect(analysis.references).toEqual(['Testim: cart-total']);
  });

  it('should end the open period at the instant the analysis started', () => {
    const analysis = analyzer.analyze(HISTORY);
    const last = analysis.timeInStates[analysis.timeInStates.length - 1];

    expect(last.exited).toBe(analysis.analyzedAt);
  });

  it('should give the same result for the same input and clock', () => {
    expect(analyzer.analyze(HISTORY)).toEqual(analyzer.analyze(HISTORY));
  });

  it('should use the injected workflow model', () => {
    const custom = new WorkflowAnalyzer({
      model: new WorkflowModel(['Open', 'Dev', 'QA'], ['Parked']),
      clock: fixedClock('2024-01-15T14:00:00Z'),
    });

    const analysis = custom.analyze({
      transitions: [
        { timestamp: '2024-01-15T09:00:00Z', fromStatus: 'QA', toStatus: 'Dev' },
        { timestamp: '2024-01-15T10:00:00Z', fromStatus: 'Dev', toStatus: 'Parked' },
        { timestamp: '2024-01-15T11:00:00Z', fromStatus: 'In Review', toStatus: 'In Progress' },
      ],
    });

    expect(analysis.bounceBacks.map(e => [e.toStatus, e.isBlocked])).toEqual([
      ['Dev', false],
      ['Parked', true],
    ]);
  });

  it('should handle a ticket with no transitions', () => {
    const analysis = analyzer.analyze({ createdAt: '2024-01-15T08:00:00Z', transitions: [] });

    expect(analysis.transitions).toEqual([]);
    expect(analysis.bounceBacks).toEqual([]);
    expect(analysis.timeInStates).toEqual([]);
    expect(analysis.references).toEqual([]);
  });

  it('should fail the whole ticket on a malformed timestamp', () => {
    const broken: TicketHistoryInput = {
      transitions: [
        { timestamp: '2024-01-15T09:00:00Z', fromStatus: 'To Do', toStatus: 'In Progress' },
        { timestamp: '15/01/2024 10:00', fromStatus: 'In Progress', toStatus: 'In Review' },
      ],
    };

    expect(() => analyzer.analyze(broken)).toThrow(MalformedTimestampError);
    expect(() => analyzer.analyze({ createdAt: 'soon', transitions: [] })).toThrow('Malformed timestamp: "soon"');
  });
});
