export type ID = string;

/** Report key holding the best agent; not usable as an agent id. */
export const BEST_AGENT_KEY = 'best_agent';

export type Point = readonly [number, number];

export interface Warehouse {
  id: ID;
  location: Point;
}

export interface AgentSpec {
  id: ID;
  location: Point;
}

export interface Package {
  id: ID;
  warehouseId: ID;
  destination: Point;
}

export type LegKind = 'to-warehouse' | 'deliver';

export interface RouteLeg {
  kind: LegKind;
  packageId: ID;
  from: Point;
  to: Point;
  rawDistance: number;
  multiplier: number;
  distance: number;
}

export interface Agent {
  id: ID;
  origin: Point;
  position: Point;
  assigned: Package[];
  legs: RouteLeg[];
  totalDistance: number;
  packagesDelivered: number;
  joinedMidDay?: boolean;
}

export type MidDayJoinPhase = 'before-assignment' | 'after-assignment';

export interface SimulationConfig {
  enableDelays?: boolean;
  newAgentMidDay?: boolean;
  midDayJoin?: MidDayJoinPhase;
  seed?: number | string;
}

export interface SimulationInput {
  config: SimulationConfig;
  warehouses: Warehouse[];
  agents: AgentSpec[];
  packages: Package[];
}

export interface AgentMetrics {
  agentId: ID;
  packagesDelivered: number;
  totalDistance: number;
  efficiency: number;
}

export interface Report {
  readonly agents: readonly AgentMetrics[];
  readonly bestAgent: ID | null;
  readonly totalPackages: number;
  readonly packagesDelivered: number;
}
