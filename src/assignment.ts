import { distance } from './distance';
import {
  EmptyFleetError,
  EmptyWarehouseError,
  MalformedInputError,
} from './errors';
import type { FleetRegistry } from './fleet';
import type { Agent, ID, Package, Point } from './types';

/**
 * Agent whose starting location is closest to `target`. Strict comparison
 * keeps the first registered agent on ties.
 */
export function nearestAgent(
  agents: readonly Agent[],
  target: Point,
): Agent | undefined {
  let best: Agent | undefined;
  let bestDist = Infinity;
  for (const agent of agents) {
    const d = distance(agent.origin, target);
    if (d < bestDist) {
      bestDist = d;
      best = agent;
    }
  }
  return best;
}

/**
 * Greedy nearest-agent assignment. Each package is appended to the chosen
 * agent's queue in input order; agents registered later receive nothing.
 */
export function assignPackages(
  fleet: FleetRegistry,
  packages: readonly Package[],
): Map<ID, ID> {
  if (fleet.agentCount === 0) throw new EmptyFleetError();
  if (fleet.warehouseCount === 0) throw new EmptyWarehouseError();

  const agents = fleet.agents();
  const targets = packages.map((pkg) => {
    const warehouse = fleet.warehouse(pkg.warehouseId);
    if (!warehouse) {
      throw new MalformedInputError(
        `Package ${pkg.id} references unknown warehouse ${pkg.warehouseId}`,
      );
    }
    return warehouse.location;
  });

  const assignment = new Map<ID, ID>();
  packages.forEach((pkg, i) => {
    const agent = nearestAgent(agents, targets[i]);
    if (!agent) throw new EmptyFleetError();
    agent.assigned.push(pkg);
    assignment.set(pkg.id, agent.id);
  });
  return assignment;
}
