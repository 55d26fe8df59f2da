import { DuplicateIdError, MalformedInputError } from '../errors';
import type {
  AgentSpec,
  ID,
  MidDayJoinPhase,
  Package,
  Point,
  SimulationConfig,
  SimulationInput,
  Warehouse,
} from '../types';
import { BEST_AGENT_KEY } from '../types';

type PlainObj = Record<string, unknown>;

/**
 * Collections arrive either as arrays of records or as objects keyed by id.
 * Both are reduced to an ordered list of `[id | undefined, value]` entries.
 */
type RawCollection =
  | { kind: 'array'; items: unknown[] }
  | { kind: 'mapping'; entries: [string, unknown][] };

interface RawEntry {
  key?: ID;
  value: unknown;
}

function isPlainObj(value: unknown): value is PlainObj {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function classify(value: unknown, name: string): RawCollection {
  if (value === undefined) return { kind: 'array', items: [] };
  if (Array.isArray(value)) return { kind: 'array', items: value };
  if (isPlainObj(value)) return { kind: 'mapping', entries: Object.entries(value) };
  throw new MalformedInputError(`${name} must be an array or an object keyed by id`);
}

function entries(collection: RawCollection): RawEntry[] {
  switch (collection.kind) {
    case 'array':
      return collection.items.map((value) => ({ value }));
    case 'mapping':
      return collection.entries.map(([key, value]) => ({ key, value }));
  }
}

function toNumber(value: unknown, what: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new MalformedInputError(`${what} must be a finite number`);
  }
  return value;
}

function parsePair(value: unknown, what: string): Point {
  if (!Array.isArray(value) || value.length !== 2) {
    throw new MalformedInputError(`${what} must be an [x, y] pair`);
  }
  return [toNumber(value[0], `${what} x`), toNumber(value[1], `${what} y`)];
}

function resolveId(entry: RawEntry, label: string): ID {
  const raw = isPlainObj(entry.value) ? entry.value.id : undefined;
  if (raw !== undefined && typeof raw !== 'string' && typeof raw !== 'number') {
    throw new MalformedInputError(`${label} id must be a string`);
  }
  const id = raw !== undefined ? String(raw) : entry.key;
  if (id === undefined || id === '') {
    throw new MalformedInputError(`${label} must have an id`);
  }
  if (entry.key !== undefined && id !== entry.key) {
    throw new MalformedInputError(
      `${label} keyed "${entry.key}" declares a different id "${id}"`,
    );
  }
  return id;
}

function parseLocated(entry: RawEntry, label: string): { id: ID; location: Point } {
  const id = resolveId(entry, label);
  const what = `${label} ${id}`;
  const v = entry.value;
  if (Array.isArray(v)) {
    return { id, location: parsePair(v, `${what} location`) };
  }
  if (!isPlainObj(v)) {
    throw new MalformedInputError(`${what} must be an object`);
  }
  if (v.location !== undefined) {
    return { id, location: parsePair(v.location, `${what} location`) };
  }
  if (v.x === undefined || v.y === undefined) {
    throw new MalformedInputError(`${what} missing coordinates`);
  }
  return { id, location: [toNumber(v.x, `${what} x`), toNumber(v.y, `${what} y`)] };
}

function parsePackage(entry: RawEntry): Package {
  const id = resolveId(entry, 'Package');
  const v = entry.value;
  if (!isPlainObj(v)) {
    throw new MalformedInputError(`Package ${id} must be an object`);
  }
  const warehouseId = v.warehouse_id ?? v.warehouse;
  if (typeof warehouseId !== 'string' || warehouseId === '') {
    throw new MalformedInputError(`Package ${id} missing warehouse_id`);
  }
  let destination: Point;
  if (v.destination !== undefined) {
    destination = parsePair(v.destination, `Package ${id} destination`);
  } else if (v.dest_x !== undefined && v.dest_y !== undefined) {
    destination = [
      toNumber(v.dest_x, `Package ${id} dest_x`),
      toNumber(v.dest_y, `Package ${id} dest_y`),
    ];
  } else {
    throw new MalformedInputError(`Package ${id} missing destination`);
  }
  return { id, warehouseId, destination };
}

function parseFlag(value: unknown, key: string): boolean {
  if (typeof value !== 'boolean') {
    throw new MalformedInputError(`config.${key} must be a boolean`);
  }
  return value;
}

function parseConfig(value: unknown): SimulationConfig {
  const cfg: SimulationConfig = {};
  if (value === undefined) return cfg;
  if (!isPlainObj(value)) {
    throw new MalformedInputError('config must be an object');
  }
  if (value.enable_delays !== undefined) {
    cfg.enableDelays = parseFlag(value.enable_delays, 'enable_delays');
  }
  if (value.new_agent_mid_day !== undefined) {
    cfg.newAgentMidDay = parseFlag(value.new_agent_mid_day, 'new_agent_mid_day');
  }
  if (value.mid_day_join !== undefined) {
    cfg.midDayJoin = parseJoinPhase(value.mid_day_join);
  }
  if (value.seed !== undefined) {
    if (typeof value.seed !== 'number' && typeof value.seed !== 'string') {
      throw new MalformedInputError('config.seed must be a number or string');
    }
    cfg.seed = value.seed;
  }
  return cfg;
}

export function parseJoinPhase(value: unknown): MidDayJoinPhase {
  if (value === 'before-assignment' || value === 'after-assignment') {
    return value;
  }
  throw new MalformedInputError(
    `mid_day_join must be "before-assignment" or "after-assignment": ${String(value)}`,
  );
}

function ensureUnique<T extends { id: ID }>(items: T[], entity: string): T[] {
  const seen = new Set<ID>();
  for (const item of items) {
    if (seen.has(item.id)) throw new DuplicateIdError(entity, item.id);
    seen.add(item.id);
  }
  return items;
}

/**
 * Parse simulation input JSON into canonical ordered collections.
 */
export function parseSimulationInput(json: unknown): SimulationInput {
  if (!isPlainObj(json)) {
    throw new MalformedInputError('Simulation input must be a JSON object');
  }

  const config = parseConfig(json.config);
  const warehouses: Warehouse[] = ensureUnique(
    entries(classify(json.warehouses, 'warehouses')).map((e) =>
      parseLocated(e, 'Warehouse'),
    ),
    'warehouse',
  );
  const agents: AgentSpec[] = ensureUnique(
    entries(classify(json.agents, 'agents')).map((e) => parseLocated(e, 'Agent')),
    'agent',
  );
  const packages = ensureUnique(
    entries(classify(json.packages, 'packages')).map(parsePackage),
    'package',
  );

  if (agents.some((a) => a.id === BEST_AGENT_KEY)) {
    throw new MalformedInputError(`Agent id "${BEST_AGENT_KEY}" is reserved`);
  }

  const warehouseIds = new Set(warehouses.map((w) => w.id));
  for (const pkg of packages) {
    if (!warehouseIds.has(pkg.warehouseId)) {
      throw new MalformedInputError(
        `Package ${pkg.id} references unknown warehouse ${pkg.warehouseId}`,
      );
    }
  }

  return { config, warehouses, agents, packages };
}
