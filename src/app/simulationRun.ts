import { assignPackages } from '../assignment';
import { InvalidPhaseError } from '../errors';
import { FleetRegistry, type Bounds } from '../fleet';
import { buildReport } from '../metrics';
import { createRng, type Rng } from '../random';
import { simulateRoutes, type LegObserver } from '../simulate';
import type {
  Agent,
  ID,
  MidDayJoinPhase,
  Package,
  Report,
  SimulationInput,
} from '../types';

export interface SimulationOptions {
  enableDelays?: boolean;
  newAgentMidDay?: boolean;
  midDayJoin?: MidDayJoinPhase;
  seed?: number | string;
  /** Overrides `seed` when given. */
  rng?: Rng;
  joinBounds?: Bounds;
  onLeg?: LegObserver;
  onJoin?: (agent: Agent) => void;
}

export type RunPhase = 'loaded' | 'assigned' | 'simulated';

/**
 * Owns the mutable state of one simulation: the fleet, the package list and
 * the generator. Phases only move forward.
 */
export class SimulationRun {
  readonly fleet = new FleetRegistry();
  readonly packages: readonly Package[];
  readonly rng: Rng;
  private currentPhase: RunPhase = 'loaded';
  private joined?: Agent;
  private assignment = new Map<ID, ID>();

  constructor(
    input: SimulationInput,
    readonly options: SimulationOptions = {},
  ) {
    for (const w of input.warehouses) this.fleet.addWarehouse(w.id, w.location);
    for (const a of input.agents) this.fleet.addAgent(a.id, a.location);
    this.packages = input.packages;
    this.rng = options.rng ?? createRng(options.seed);
  }

  get phase(): RunPhase {
    return this.currentPhase;
  }

  get joinedAgent(): Agent | undefined {
    return this.joined;
  }

  /**
   * Add the mid-day agent. Joining after assignment leaves the new agent
   * without packages, since assignment never runs twice.
   */
  joinMidDay(): Agent {
    if (this.joined) {
      throw new InvalidPhaseError(`Agent ${this.joined.id} already joined mid-day`);
    }
    const agent = this.fleet.joinMidDay(this.rng, this.options.joinBounds);
    this.joined = agent;
    this.options.onJoin?.(agent);
    return agent;
  }

  assign(): ReadonlyMap<ID, ID> {
    if (this.currentPhase !== 'loaded') {
      throw new InvalidPhaseError(
        `Packages already assigned (phase ${this.currentPhase})`,
      );
    }
    this.assignment = assignPackages(this.fleet, this.packages);
    this.currentPhase = 'assigned';
    return this.assignment;
  }

  simulate(): void {
    if (this.currentPhase !== 'assigned') {
      throw new InvalidPhaseError(`Cannot simulate in phase ${this.currentPhase}`);
    }
    simulateRoutes(this.fleet, {
      enableDelays: this.options.enableDelays,
      rng: this.rng,
      onLeg: this.options.onLeg,
    });
    this.currentPhase = 'simulated';
  }

  report(): Report {
    if (this.currentPhase !== 'simulated') {
      throw new InvalidPhaseError(`Cannot build report in phase ${this.currentPhase}`);
    }
    return buildReport(this.fleet.agents(), this.packages.length);
  }

  assignmentOf(packageId: ID): ID | undefined {
    return this.assignment.get(packageId);
  }

  /**
   * load → join → assign → simulate → report. The mid-day join only happens
   * when there is something to deliver.
   */
  run(): Report {
    const { newAgentMidDay, midDayJoin = 'before-assignment' } = this.options;
    const wantsJoin = Boolean(newAgentMidDay) && this.packages.length > 0;
    if (wantsJoin && midDayJoin === 'before-assignment') this.joinMidDay();
    this.assign();
    if (wantsJoin && midDayJoin === 'after-assignment') this.joinMidDay();
    this.simulate();
    return this.report();
  }
}
