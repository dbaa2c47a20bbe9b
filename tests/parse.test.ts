import { describe, it, expect } from 'vitest';
import { readdirSync } from 'node:fs';
import { join } from 'node:path';
import { LoadError } from '../src/errors';
import {
  buildMap,
  detectKind,
  loadEdits,
  loadScenario,
  parseMap,
  parseScenario,
  readJsonFile,
} from '../src/io/parse';
import { fixtureDataDir, shippedDataDir } from './helpers';

const mapPath = join(fixtureDataDir, 'maps', 'tiny.json');

function baseMap() {
  return {
    kind: 'map',
    name: 'pair',
    intersections: [
      { id: 'a', x: 0, y: 0 },
      { id: 'b', x: 30, y: 40 },
    ],
    roads: [{ id: 'ab', src: 'a', dst: 'b', speedLimitMps: 10, lanes: ['driving'] }],
  };
}

describe('parseMap', () => {
  it('fills in defaults and measures roads without a length', () => {
    const map = parseMap(baseMap(), 'pair.json');
    expect(map.roads[0].lengthM).toBe(50);
    expect(map.busRoutes).toEqual([]);
    expect(map.fixes).toEqual([]);
  });

  it('reports schema violations with their location', () => {
    const raw = { ...baseMap(), roads: [{ id: 'ab', src: 'a', dst: 'b', speedLimitMps: 10, lanes: ['tram'] }] };
    expect(() => parseMap(raw, 'pair.json')).toThrow(/^Couldn't load pair\.json: schema validation failed: \/roads\/0\/lanes\/0/);
  });

  it('rejects roads to nowhere', () => {
    const raw = { ...baseMap(), roads: [{ id: 'ax', src: 'a', dst: 'x', speedLimitMps: 10, lanes: [] }] };
    expect(() => parseMap(raw, 'pair.json')).toThrow(
      "Couldn't load pair.json: road ax connects unknown intersection x",
    );
  });

  it('rejects duplicate intersections', () => {
    const raw = { ...baseMap(), intersections: [{ id: 'a', x: 0, y: 0 }, { id: 'a', x: 1, y: 1 }] };
    expect(() => parseMap(raw, 'pair.json')).toThrow(LoadError);
  });

  it('rejects bus stops off the map', () => {
    const raw = {
      ...baseMap(),
      busRoutes: [{ name: '8', stops: ['a', 'q'], headwaySec: 600, firstDeparture: '06:00', lastDeparture: '07:00' }],
    };
    expect(() => parseMap(raw, 'pair.json')).toThrow('bus route 8 stops at unknown intersection q');
  });
});

describe('parseScenario', () => {
  it('defaults missing origin and destination lists', () => {
    const scenario = parseScenario(
      {
        kind: 'scenario',
        scenarioName: 's',
        mapName: 'pair',
        spawnOverTime: [{ numAgents: 2, startTime: '07:00', endTime: '07:30', modes: { walk: 1 } }],
      },
      's.json',
    );
    expect(scenario.spawnOverTime[0].from).toEqual([]);
    expect(scenario.spawnOverTime[0].to).toEqual([]);
    expect(scenario.individTrips).toEqual([]);
  });

  it('rejects an empty spawn window', () => {
    const raw = {
      kind: 'scenario',
      scenarioName: 's',
      mapName: 'pair',
      spawnOverTime: [{ numAgents: 2, startTime: '08:00', endTime: '08:00', modes: { walk: 1 } }],
    };
    expect(() => parseScenario(raw, 's.json')).toThrow('spawn window 08:00-08:00 is empty');
  });

  it('needs a positive mode weight when agents are spawned', () => {
    const raw = {
      kind: 'scenario',
      scenarioName: 's',
      mapName: 'pair',
      spawnOverTime: [{ numAgents: 2, startTime: '08:00', endTime: '09:00', modes: { walk: 0 } }],
    };
    expect(() => parseScenario(raw, 's.json')).toThrow('spawn block at 08:00 gives no mode a weight');
  });
});

describe('input files', () => {
  it('tell their kind apart', () => {
    expect(detectKind(readJsonFile(mapPath), mapPath)).toBe('map');
    expect(() => detectKind({ kind: 'timetable' }, 'x.json')).toThrow(
      'Couldn\'t load x.json: expected a "kind" of map, scenario, edits, savestate, prebaked',
    );
  });

  it('report missing files with their path', () => {
    expect(() => readJsonFile(join(fixtureDataDir, 'missing.json'))).toThrow(LoadError);
  });

  it('load the fixture scenario and edits', () => {
    const scenario = loadScenario(join(fixtureDataDir, 'scenarios', 'tiny', 'rush.json'));
    expect(scenario.individTrips[0].agent).toBe('courier');
    const edits = loadEdits(join(fixtureDataDir, 'edits', 'tiny', 'paint_bike_lanes.json'));
    expect(edits.commands).toHaveLength(2);
  });

  it('build a map with fixes and edits applied', () => {
    const edits = loadEdits(join(fixtureDataDir, 'edits', 'tiny', 'paint_bike_lanes.json'));
    const fixed = buildMap(fixtureDataDir, 'tiny', true, edits);
    expect(fixed.getRoad('e23').speedLimitMps).toBe(5);
    expect(fixed.getRoad('e12').lanes[1]).toBe('biking');
    expect(fixed.getRoad('e01').lengthM).toBe(200);

    const raw = buildMap(fixtureDataDir, 'tiny', false);
    expect(raw.getRoad('e23').speedLimitMps).toBe(10);
    expect(raw.getRoad('e12').lanes[1]).toBe('parking');
  });

  it('refuse edits made for another map', () => {
    expect(() =>
      buildMap(fixtureDataDir, 'tiny', true, { mapName: 'other', editsName: 'e', commands: [] }),
    ).toThrow('Edits e are for map other, not tiny');
  });
});

describe('shipped data', () => {
  it('loads montlake with its fixes applied', () => {
    expect(buildMap(shippedDataDir, 'montlake', true).getRoad('v21').speedLimitMps).toBe(11.2);
    expect(buildMap(shippedDataDir, 'montlake', false).getRoad('v21').speedLimitMps).toBe(13.4);
  });

  it('applies every montlake edit set', () => {
    const dir = join(shippedDataDir, 'edits', 'montlake');
    const files = readdirSync(dir).filter((f) => f.endsWith('.json'));
    expect(files.length).toBe(3);
    for (const file of files) {
      const edits = loadEdits(join(dir, file));
      expect(buildMap(shippedDataDir, 'montlake', true, edits).edits?.editsName).toBe(edits.editsName);
    }
  });

  it('loads the reference scenario', () => {
    const scenario = loadScenario(
      join(shippedDataDir, 'scenarios', 'montlake', 'weekday_typical_traffic_from_psrc.json'),
    );
    expect(scenario.mapName).toBe('montlake');
  });
});
