import type { BatchAnalysisResult, BounceBackEvent, StatePeriod, TicketReport, Transition } from '../types/index.js';
import { roundHalfEven } from '../utils/rounding.js';
import { countBounceBacks } from '../workflow/bounce-back-detector.js';
import { hoursByStatus } from '../workflow/time-in-state.js';
import { formatDisplayTime } from '../workflow/timestamp.js';
import type { WorkflowModel } from '../workflow/workflow-model.js';

export interface BatchMetrics {
  ticketCount: number;
  totalBounceBacks: number;
  averageBounceBacks: number;
  totalHoursLogged: number;
  /** Average hours per ticket for each forward stage, in workflow order */
  averageStageHours: Array<{ stage: string; hours: number }>;
}

export class WorkflowReportFormatter {
  constructor(private model: WorkflowModel) {}

  /**
   * Hours spent in each forward stage of the workflow, in workflow order
   */
  stageHours(periods: readonly StatePeriod[]): Array<{ stage: string; hours: number }> {
    const totals = hoursByStatus(periods);
    return this.model.stages.map(stage => ({ stage, hours: totals.get(stage) ?? 0 }));
  }

  computeMetrics(reports: readonly TicketReport[]): BatchMetrics {
    const ticketCount = reports.length;
    const totalBounceBacks = reports.reduce((sum, report) => sum + report.analysis.bounceBacks.length, 0);
    const totalHoursLogged = reports.reduce((sum, report) => sum + report.hoursLogged, 0);

    const stageTotals = this.model.stages.map(stage => ({ stage, hours: 0 }));
    for (const report of reports) {
      this.stageHours(report.analysis.timeInStates).forEach(({ hours }, index) => {
        stageTotals[index].hours += hours;
      });
    }

    return {
      ticketCount,
      totalBounceBacks,
      averageBounceBacks: ticketCount > 0 ? totalBounceBacks / ticketCount : 0,
      totalHoursLogged: roundHalfEven(totalHoursLogged),
      averageStageHours: stageTotals.map(({ stage, hours }) => ({
        stage,
        hours: ticketCount > 0 ? hours / ticketCount : 0,
      })),
    };
  }

  formatTicketReport(report: TicketReport): string {
    const { analysis } = report;
    const counts = countBounceBacks(analysis.bounceBacks);

    let output = `**${report.key}**: ${report.summary}\n\n`;
    output += `**📋 Details:**\n`;
    output += `• 👤 Assignee: ${report.assignee}\n`;
    output += `• 🔹 Status: ${report.status}\n`;
    output += `• ⏱️ Hours logged: ${report.hoursLogged}h\n`;
    output += `• 🔁 Bounce-backs: ${counts.backward} | 🚧 Blocked: ${counts.blocked}\n`;
    output += `• 🧪 Testim references: ${analysis.references.length}\n`;
    if (report.skippedHistoryEntries > 0) {
      output += `• ⚠️ Skipped changelog entries: ${report.skippedHistoryEntries}\n`;
    }

    output += `\n**🔀 Status Transitions:**\n${this.formatTransitions(analysis.transitions)}\n`;
    output += `\n**⏳ Time in Each State:**\n${this.formatPeriods(analysis.timeInStates)}\n`;
    output += `\n**↩️ Bounce-back Events:**\n${this.formatBounceBacks(analysis.bounceBacks)}\n`;

    if (analysis.references.length > 0) {
      output += `\n**🧪 Testim References:**\n${this.formatReferences(analysis.references)}\n`;
    }

    return output.trimEnd();
  }

  formatBatchReport(result: BatchAnalysisResult): string {
    const metrics = this.computeMetrics(result.reports);

    let output = `**📊 Summary:**\n`;
    output += `• Tickets analyzed: ${metrics.ticketCount}\n`;
    output += `• Total bounce-backs: ${metrics.totalBounceBacks}\n`;
    output += `• Avg bounce-backs / ticket: ${metrics.averageBounceBacks.toFixed(1)}\n`;
    output += `• Total hours logged: ${metrics.totalHoursLogged.toFixed(1)}h\n`;
    for (const { stage, hours } of metrics.averageStageHours) {
      output += `• Avg hours in ${stage}: ${hours.toFixed(1)}h\n`;
    }

    if (result.reports.length > 0) {
      const lines = result.reports.map((report, index) => {
        const stageText = this.stageHours(report.analysis.timeInStates)
          .map(({ stage, hours }) => `${stage} ${hours.toFixed(1)}h`)
          .join(' | ');
        return `${index + 1}. **${report.key}** - ${report.summary}\n` +
          `   🔹 ${report.status} | 👤 ${report.assignee} | 🔁 ${report.analysis.bounceBacks.length} | ` +
          `⏳ ${stageText} | ⏱️ ${report.hoursLogged.toFixed(1)}h logged | 🧪 ${report.analysis.references.length}`;
      });
      output += `\n**🎫 Tickets:**\n${lines.join('\n\n')}\n`;
    }

    if (result.failures.length > 0) {
      output += `\n**⚠️ Failed tickets (${result.failures.length}):**\n`;
      output += result.failures.map(failure => `• ${failure.key}: ${failure.message}`).join('\n');
      output += '\n';
    }

    return output.trimEnd();
  }

  formatTransitions(transitions: readonly Transition[]): string {
    if (transitions.length === 0) return 'None';
    return transitions
      .map(t => `• ${formatDisplayTime(t.timestamp)} | ${t.fromStatus} → ${t.toStatus} | by ${t.author}`)
      .join('\n');
  }

  formatPeriods(periods: readonly StatePeriod[]): string {
    if (periods.length === 0) return 'None';
    return periods
      .map(p => `• ${p.status} | ${formatDisplayTime(p.entered)} → ${formatDisplayTime(p.exited)} | ${p.durationHours.toFixed(2)}h`)
      .join('\n');
  }

  formatBounceBacks(events: readonly BounceBackEvent[]): string {
    if (events.length === 0) return 'None';
    return events
      .map(e => `• ${e.isBlocked ? 'BLOCKED' : 'BOUNCE-BACK'} | ${formatDisplayTime(e.timestamp)} | ${e.fromStatus} → ${e.toStatus} | by ${e.author}`)
      .join('\n');
  }

  formatReferences(references: readonly string[]): string {
    if (references.length === 0) return 'None';
    return references.map(reference => `• \`${reference}\``).join('\n');
  }
}
