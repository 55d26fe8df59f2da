import { describe, it, expect } from 'vitest';
import { FleetRegistry } from '../src/fleet';
import { DuplicateIdError } from '../src/errors';

describe('FleetRegistry', () => {
  it('keeps agents in registration order', () => {
    const fleet = new FleetRegistry();
    fleet.addAgent('B', [1, 1]);
    fleet.addAgent('A', [2, 2]);
    expect(fleet.agents().map((a) => a.id)).toEqual(['B', 'A']);
    expect(fleet.agentCount).toBe(2);
  });

  it('initialises agents at their origin with no history', () => {
    const fleet = new FleetRegistry();
    const agent = fleet.addAgent('A1', [3, 4]);
    expect(agent.position).toEqual([3, 4]);
    expect(agent.origin).toEqual([3, 4]);
    expect(agent.assigned).toEqual([]);
    expect(agent.legs).toEqual([]);
    expect(agent.totalDistance).toBe(0);
    expect(agent.packagesDelivered).toBe(0);
  });

  it('rejects duplicate agent and warehouse ids', () => {
    const fleet = new FleetRegistry();
    fleet.addAgent('A1', [0, 0]);
    fleet.addWarehouse('W1', [0, 0]);
    expect(() => fleet.addAgent('A1', [1, 1])).toThrow(DuplicateIdError);
    expect(() => fleet.addWarehouse('W1', [1, 1])).toThrow('Duplicate warehouse id: W1');
  });

  it('allows an agent and a warehouse to share an id', () => {
    const fleet = new FleetRegistry();
    fleet.addAgent('X', [0, 0]);
    expect(() => fleet.addWarehouse('X', [0, 0])).not.toThrow();
  });

  describe('joinMidDay', () => {
    it('names the agent after the fleet size and draws x then y', () => {
      const fleet = new FleetRegistry();
      fleet.addAgent('A1', [0, 0]);
      fleet.addAgent('A2', [0, 0]);
      const draws = [0.25, 0.75];
      const agent = fleet.joinMidDay(() => draws.shift() ?? 0);
      expect(agent.id).toBe('A3');
      expect(agent.origin).toEqual([25, 75]);
      expect(agent.joinedMidDay).toBe(true);
      expect(fleet.agents().at(-1)).toBe(agent);
    });

    it('skips ids already used by the input', () => {
      const fleet = new FleetRegistry();
      fleet.addAgent('A1', [0, 0]);
      fleet.addAgent('A3', [0, 0]);
      const agent = fleet.joinMidDay(() => 0);
      expect(agent.id).toBe('A4');
    });

    it('honours custom bounds', () => {
      const fleet = new FleetRegistry();
      const agent = fleet.joinMidDay(() => 0.5, {
        minX: 10,
        maxX: 20,
        minY: -10,
        maxY: 10,
      });
      expect(agent.id).toBe('A1');
      expect(agent.origin).toEqual([15, 0]);
    });
  });
});
