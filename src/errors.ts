import type { ID } from './types';

export type SimulationErrorCode =
  | 'MALFORMED_INPUT'
  | 'EMPTY_FLEET'
  | 'EMPTY_WAREHOUSES'
  | 'UNKNOWN_AGENT'
  | 'DUPLICATE_ID'
  | 'INVALID_PHASE';

export class SimulationError extends Error {
  readonly code: SimulationErrorCode;

  constructor(code: SimulationErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class MalformedInputError extends SimulationError {
  constructor(message: string, options?: ErrorOptions) {
    super('MALFORMED_INPUT', message, options);
  }
}

export class EmptyFleetError extends SimulationError {
  constructor() {
    super('EMPTY_FLEET', 'No agents registered; at least one agent is required');
  }
}

export class EmptyWarehouseError extends SimulationError {
  constructor() {
    super(
      'EMPTY_WAREHOUSES',
      'No warehouses registered; at least one warehouse is required',
    );
  }
}

export class UnknownAgentError extends SimulationError {
  readonly agentId: ID;

  constructor(agentId: ID) {
    super('UNKNOWN_AGENT', `Agent ${agentId} not found`);
    this.agentId = agentId;
  }
}

export class DuplicateIdError extends SimulationError {
  readonly entity: string;
  readonly id: ID;

  constructor(entity: string, id: ID) {
    super('DUPLICATE_ID', `Duplicate ${entity} id: ${id}`);
    this.entity = entity;
    this.id = id;
  }
}

/** A run step called out of order, or a second mid-day join. */
export class InvalidPhaseError extends SimulationError {
  constructor(message: string) {
    super('INVALID_PHASE', message);
  }
}

export function isSimulationError(err: unknown): err is SimulationError {
  return err instanceof SimulationError;
}
