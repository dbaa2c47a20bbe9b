import { describe, it, expect, vi } from 'vitest';
import { CityMap } from '../src/map';
import { RandomStream } from '../src/random';
import { DEMAND_PROFILES, instantiateScenario, spawnProfile } from '../src/spawner';
import type { ScenarioInput } from '../src/types';
import { lineMap } from './helpers';

function scenario(overrides: Partial<ScenarioInput> = {}): ScenarioInput {
  return {
    scenarioName: 'morning',
    mapName: 'line',
    spawnOverTime: [
      {
        numAgents: 30,
        startTime: '07:00',
        endTime: '08:00',
        from: ['a'],
        to: ['b', 'c'],
        modes: { bike: 1 },
      },
    ],
    individTrips: [{ agent: 'courier', from: 'c', to: 'a', mode: 'drive', departAt: '08:15' }],
    ...overrides,
  };
}

describe('spawnProfile', () => {
  it('reproduces demand from the same seed', () => {
    const a = spawnProfile(lineMap(), RandomStream.seeded(7), 'small');
    const b = spawnProfile(lineMap(), RandomStream.seeded(7), 'small');
    expect(a).toEqual(b);
  });

  it('spreads the profile over its first hour between distinct places', () => {
    const trips = spawnProfile(lineMap(), RandomStream.seeded(3), 'big');
    expect(trips).toHaveLength(DEMAND_PROFILES.big.agents);
    trips.forEach((t, i) => {
      expect(t.id).toBe(i);
      expect(t.agent).toBe(`p${i}`);
      expect(t.from).not.toBe(t.to);
      expect(t.departAt).toBeGreaterThanOrEqual(0);
      expect(t.departAt).toBeLessThan(36000);
    });
  });

  it('never touches Math.random', () => {
    const spy = vi.spyOn(Math, 'random');
    spawnProfile(lineMap(), RandomStream.seeded(1), 'small');
    expect(spy).not.toHaveBeenCalled();
    spy.mockRestore();
  });

  it('spawns nothing on a map with one intersection', () => {
    const lonely = CityMap.fromInput(
      { name: 'dot', intersections: [{ id: 'o', x: 0, y: 0 }], roads: [], busRoutes: [], fixes: [] },
      { useMapFixes: false },
    );
    const rng = RandomStream.seeded(1);
    expect(spawnProfile(lonely, rng, 'small')).toEqual([]);
    expect(rng.position().draws).toBe(0);
  });
});

describe('instantiateScenario', () => {
  it('expands spawn blocks, then individual trips', () => {
    const trips = instantiateScenario(scenario(), lineMap(), RandomStream.seeded(5));
    expect(trips).toHaveLength(31);
    for (const t of trips.slice(0, 30)) {
      expect(t.mode).toBe('bike');
      expect(t.from).toBe('a');
      expect(['b', 'c']).toContain(t.to);
      expect(t.departAt).toBeGreaterThanOrEqual(252000);
      expect(t.departAt).toBeLessThan(288000);
    }
    expect(trips[30]).toEqual({
      id: 30,
      agent: 'courier',
      mode: 'drive',
      from: 'c',
      to: 'a',
      departAt: 297000,
    });
  });

  it('numbers trips from the given id', () => {
    const trips = instantiateScenario(scenario({ spawnOverTime: [] }), lineMap(), RandomStream.seeded(5), {
      firstTripId: 100,
    });
    expect(trips.map((t) => t.id)).toEqual([100]);
  });

  it('rejects a scenario for another map', () => {
    expect(() =>
      instantiateScenario(scenario({ mapName: 'elsewhere' }), lineMap(), RandomStream.seeded(5)),
    ).toThrow('Scenario morning is for map elsewhere, not line');
  });

  it('rejects unknown intersections', () => {
    const bad = scenario({
      individTrips: [{ from: 'a', to: 'q', mode: 'walk', departAt: '09:00' }],
    });
    expect(() => instantiateScenario(bad, lineMap(), RandomStream.seeded(5))).toThrow(
      'Scenario morning references unknown intersection q',
    );
  });
});
