import { round2 } from './distance';
import type { Agent, AgentMetrics, ID, Report } from './types';

/** Efficiency reported for agents that delivered nothing. */
export const NO_DELIVERY_EFFICIENCY = 0;

export function agentMetrics(agent: Agent): AgentMetrics {
  return {
    agentId: agent.id,
    packagesDelivered: agent.packagesDelivered,
    totalDistance: agent.totalDistance,
    efficiency:
      agent.packagesDelivered > 0
        ? agent.totalDistance / agent.packagesDelivered
        : NO_DELIVERY_EFFICIENCY,
  };
}

/**
 * Lowest efficiency among agents that delivered, compared at the precision
 * the report is written with. Ties go to the lowest id.
 */
export function pickBestAgent(metrics: readonly AgentMetrics[]): ID | null {
  const best = metrics.reduce<AgentMetrics | undefined>((acc, m) => {
    if (m.packagesDelivered === 0) return acc;
    if (!acc) return m;
    const a = round2(m.efficiency);
    const b = round2(acc.efficiency);
    if (a < b || (a === b && m.agentId < acc.agentId)) return m;
    return acc;
  }, undefined);
  return best ? best.agentId : null;
}

export function buildReport(
  agents: readonly Agent[],
  totalPackages: number,
): Report {
  const metrics = agents.map(agentMetrics);
  const delivered = metrics.reduce((sum, m) => sum + m.packagesDelivered, 0);
  return Object.freeze({
    agents: Object.freeze(metrics.map((m) => Object.freeze(m))),
    bestAgent: pickBestAgent(metrics),
    totalPackages,
    packagesDelivered: delivered,
  });
}
