import { round2 } from '../distance';
import type { Report } from '../types';

export const TOP_PERFORMER_HEADER = [
  'agent_id',
  'packages_delivered',
  'total_distance',
  'efficiency',
  'timestamp',
];

function escapeCsv(value: string): string {
  if (/[",\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Serialize the best performer to CSV. Returns `undefined` when no agent
 * delivered anything.
 */
export function emitTopPerformerCsv(
  report: Report,
  timestamp: string,
): string | undefined {
  if (report.bestAgent === null) return undefined;
  const best = report.agents.find((m) => m.agentId === report.bestAgent);
  if (!best) return undefined;
  const row = [
    escapeCsv(best.agentId),
    String(best.packagesDelivered),
    String(round2(best.totalDistance)),
    String(round2(best.efficiency)),
    timestamp,
  ];
  return [TOP_PERFORMER_HEADER.join(','), row.join(',')].join('\n') + '\n';
}

export default emitTopPerformerCsv;
