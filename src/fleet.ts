import { DuplicateIdError } from './errors';
import { uniform, type Rng } from './random';
import type { Agent, ID, Point, Warehouse } from './types';

export interface Bounds {
  minX: number;
  maxX: number;
  minY: number;
  maxY: number;
}

export const DEFAULT_JOIN_BOUNDS: Bounds = {
  minX: 0,
  maxX: 100,
  minY: 0,
  maxY: 100,
};

/**
 * Canonical agent and warehouse collections for one run. Iteration follows
 * registration order, which is also the tie-break order for assignment.
 */
export class FleetRegistry {
  private readonly agentsById = new Map<ID, Agent>();
  private readonly warehousesById = new Map<ID, Warehouse>();

  addWarehouse(id: ID, location: Point): Warehouse {
    if (this.warehousesById.has(id)) {
      throw new DuplicateIdError('warehouse', id);
    }
    const warehouse: Warehouse = { id, location };
    this.warehousesById.set(id, warehouse);
    return warehouse;
  }

  addAgent(id: ID, location: Point): Agent {
    if (this.agentsById.has(id)) {
      throw new DuplicateIdError('agent', id);
    }
    const agent: Agent = {
      id,
      origin: location,
      position: location,
      assigned: [],
      legs: [],
      totalDistance: 0,
      packagesDelivered: 0,
    };
    this.agentsById.set(id, agent);
    return agent;
  }

  /**
   * Register a new agent at a random location. The id is `A<count+1>`,
   * bumped past any id the input already uses.
   */
  joinMidDay(rng: Rng, bounds: Bounds = DEFAULT_JOIN_BOUNDS): Agent {
    let n = this.agentsById.size + 1;
    while (this.agentsById.has(`A${n}`)) n++;
    const x = uniform(rng, bounds.minX, bounds.maxX);
    const y = uniform(rng, bounds.minY, bounds.maxY);
    const agent = this.addAgent(`A${n}`, [x, y]);
    agent.joinedMidDay = true;
    return agent;
  }

  agent(id: ID): Agent | undefined {
    return this.agentsById.get(id);
  }

  warehouse(id: ID): Warehouse | undefined {
    return this.warehousesById.get(id);
  }

  agents(): Agent[] {
    return [...this.agentsById.values()];
  }

  warehouses(): Warehouse[] {
    return [...this.warehousesById.values()];
  }

  get agentCount(): number {
    return this.agentsById.size;
  }

  get warehouseCount(): number {
    return this.warehousesById.size;
  }
}
