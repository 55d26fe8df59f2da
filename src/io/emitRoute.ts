import { formatPoint } from '../distance';
import { UnknownAgentError } from '../errors';
import type { FleetRegistry } from '../fleet';
import type { ID, LegKind } from '../types';

const ACTIONS: Record<LegKind, string> = {
  'to-warehouse': 'Traveling to warehouse',
  deliver: 'Delivering package',
};

/** ASCII listing of an agent's legs followed by a summary. */
export function renderRoute(fleet: FleetRegistry, agentId: ID): string {
  const agent = fleet.agent(agentId);
  if (!agent) throw new UnknownAgentError(agentId);

  const lines = [`Route Visualization for Agent ${agent.id}:`, '='.repeat(50)];
  if (agent.legs.length === 0) {
    lines.push('(no legs)');
  }
  agent.legs.forEach((leg, i) => {
    lines.push(
      `${i + 1}. [${leg.kind}] ${ACTIONS[leg.kind]} ${leg.packageId}`,
      `   From: ${formatPoint(leg.from)} -> To: ${formatPoint(leg.to)}`,
      `   Distance: ${leg.distance.toFixed(2)} units`,
      '-'.repeat(40),
    );
  });
  lines.push(
    '',
    `Summary for ${agent.id}:`,
    `   Total packages delivered: ${agent.packagesDelivered}`,
    `   Total distance traveled: ${agent.totalDistance.toFixed(2)}`,
    '='.repeat(50),
  );
  return lines.join('\n');
}
