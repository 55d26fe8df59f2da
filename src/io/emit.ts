import { round2 } from '../distance';
import type { Report } from '../types';
import { BEST_AGENT_KEY } from '../types';

export interface ReportEntry {
  packages_delivered: number;
  total_distance: number;
  efficiency: number;
}

export type ReportDocument = Record<string, ReportEntry | string | null>;

/**
 * Report as written to disk: agents in registration order, then best_agent.
 * Entries are defined rather than assigned, so an id such as `__proto__`
 * stays an ordinary key.
 */
export function toReportDocument(report: Report): ReportDocument {
  return Object.fromEntries<ReportEntry | string | null>([
    ...report.agents.map((m): [string, ReportEntry] => [
      m.agentId,
      {
        packages_delivered: m.packagesDelivered,
        total_distance: round2(m.totalDistance),
        efficiency: round2(m.efficiency),
      },
    ]),
    [BEST_AGENT_KEY, report.bestAgent],
  ]);
}

export function emitReportJson(report: Report): string {
  return JSON.stringify(toReportDocument(report), null, 2);
}

/** Human-readable final report, one line per entry. */
export function formatReport(report: Report): string[] {
  const lines = ['='.repeat(50), 'FINAL REPORT', '='.repeat(50)];
  for (const m of report.agents) {
    lines.push(
      '',
      `Agent ${m.agentId}:`,
      `  Packages delivered: ${m.packagesDelivered}`,
      `  Total distance: ${round2(m.totalDistance)}`,
      `  Efficiency: ${round2(m.efficiency)}`,
    );
  }
  lines.push('', `Best Agent: ${report.bestAgent ?? 'none'}`);
  return lines;
}

export function formatRunSummary(report: Report): string {
  const distance = report.agents.reduce((sum, m) => sum + m.totalDistance, 0);
  return [
    'Simulation',
    `agents=${report.agents.length}`,
    `packages=${report.totalPackages}`,
    `delivered=${report.packagesDelivered}`,
    `distance=${distance.toFixed(2)}`,
    `best=${report.bestAgent ?? 'none'}`,
  ].join(' | ');
}
