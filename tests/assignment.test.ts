import { describe, it, expect } from 'vitest';
import { assignPackages, nearestAgent } from '../src/assignment';
import { FleetRegistry } from '../src/fleet';
import {
  EmptyFleetError,
  EmptyWarehouseError,
  MalformedInputError,
} from '../src/errors';
import type { Package } from '../src/types';

function buildFleet(): FleetRegistry {
  const fleet = new FleetRegistry();
  fleet.addWarehouse('W1', [0, 0]);
  fleet.addWarehouse('W2', [100, 0]);
  fleet.addAgent('A1', [10, 0]);
  fleet.addAgent('A2', [90, 0]);
  fleet.addAgent('A3', [50, 50]);
  return fleet;
}

const packages: Package[] = [
  { id: 'P1', warehouseId: 'W1', destination: [0, 30] },
  { id: 'P2', warehouseId: 'W2', destination: [100, 40] },
  { id: 'P3', warehouseId: 'W1', destination: [0, -40] },
  { id: 'P4', warehouseId: 'W2', destination: [130, 0] },
];

describe('nearestAgent', () => {
  it('breaks ties by registration order', () => {
    const fleet = new FleetRegistry();
    fleet.addAgent('A1', [0, 10]);
    fleet.addAgent('A2', [10, 0]);
    expect(nearestAgent(fleet.agents(), [0, 0])?.id).toBe('A1');
  });

  it('returns undefined without agents', () => {
    expect(nearestAgent([], [0, 0])).toBeUndefined();
  });
});

describe('assignPackages', () => {
  it('assigns every package to exactly one agent', () => {
    const fleet = buildFleet();
    const assignment = assignPackages(fleet, packages);
    expect([...assignment.entries()]).toEqual([
      ['P1', 'A1'],
      ['P2', 'A2'],
      ['P3', 'A1'],
      ['P4', 'A2'],
    ]);
    const owned = fleet.agents().flatMap((a) => a.assigned.map((p) => p.id));
    expect(owned.sort()).toEqual(['P1', 'P2', 'P3', 'P4']);
    expect(fleet.agent('A3')?.assigned).toEqual([]);
  });

  it('keeps input order instead of grouping by warehouse', () => {
    const fleet = new FleetRegistry();
    fleet.addWarehouse('W1', [0, 0]);
    fleet.addWarehouse('W2', [100, 0]);
    fleet.addAgent('solo', [50, 0]);
    assignPackages(fleet, packages);
    expect(fleet.agent('solo')?.assigned.map((p) => p.id)).toEqual([
      'P1',
      'P2',
      'P3',
      'P4',
    ]);
  });

  it('measures from the starting location, not the current position', () => {
    const fleet = buildFleet();
    const a1 = fleet.agent('A1');
    if (!a1) throw new Error('missing agent');
    a1.position = [1000, 1000];
    const assignment = assignPackages(fleet, packages);
    expect(assignment.get('P1')).toBe('A1');
  });

  it('fails on an empty fleet', () => {
    const fleet = new FleetRegistry();
    fleet.addWarehouse('W1', [0, 0]);
    expect(() => assignPackages(fleet, packages)).toThrow(EmptyFleetError);
  });

  it('fails without warehouses', () => {
    const fleet = new FleetRegistry();
    fleet.addAgent('A1', [0, 0]);
    expect(() => assignPackages(fleet, [])).toThrow(EmptyWarehouseError);
  });

  it('leaves agents untouched when a package references an unknown warehouse', () => {
    const fleet = buildFleet();
    const bad: Package[] = [
      ...packages,
      { id: 'P5', warehouseId: 'W9', destination: [0, 0] },
    ];
    expect(() => assignPackages(fleet, bad)).toThrow(MalformedInputError);
    for (const agent of fleet.agents()) {
      expect(agent.assigned).toEqual([]);
    }
  });
});
