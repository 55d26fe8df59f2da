import { distance } from './distance';
import { MalformedInputError } from './errors';
import type { FleetRegistry } from './fleet';
import { delayMultiplier, type Rng } from './random';
import type { Agent, LegKind, Point, RouteLeg } from './types';

export type LegObserver = (agent: Agent, leg: RouteLeg, index: number) => void;

export interface SimulateOptions {
  enableDelays?: boolean;
  rng: Rng;
  onLeg?: LegObserver;
}

function walkLeg(
  agent: Agent,
  kind: LegKind,
  packageId: string,
  to: Point,
  opts: SimulateOptions,
): RouteLeg {
  const from = agent.position;
  const rawDistance = distance(from, to);
  // one draw per leg
  const multiplier = opts.enableDelays ? delayMultiplier(opts.rng) : 1;
  const leg: RouteLeg = {
    kind,
    packageId,
    from,
    to,
    rawDistance,
    multiplier,
    distance: rawDistance * multiplier,
  };
  agent.legs.push(leg);
  agent.totalDistance += leg.distance;
  agent.position = to;
  opts.onLeg?.(agent, leg, agent.legs.length - 1);
  return leg;
}

/** Walk one agent's queue: warehouse pickup then delivery, per package. */
export function simulateAgent(
  agent: Agent,
  fleet: FleetRegistry,
  opts: SimulateOptions,
): void {
  for (const pkg of agent.assigned) {
    const warehouse = fleet.warehouse(pkg.warehouseId);
    if (!warehouse) {
      throw new MalformedInputError(
        `Package ${pkg.id} references unknown warehouse ${pkg.warehouseId}`,
      );
    }
    walkLeg(agent, 'to-warehouse', pkg.id, warehouse.location, opts);
    walkLeg(agent, 'deliver', pkg.id, pkg.destination, opts);
    agent.packagesDelivered += 1;
  }
}

/** Simulate every agent in registration order. */
export function simulateRoutes(
  fleet: FleetRegistry,
  opts: SimulateOptions,
): void {
  for (const agent of fleet.agents()) {
    simulateAgent(agent, fleet, opts);
  }
}
