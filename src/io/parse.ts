import { readFileSync } from 'node:fs';
import { LoadError, describeError } from '../errors';
import { euclidean } from '../distance';
import { CityMap } from '../map';
import { Tick } from '../time';
import type {
  BusRoute,
  EditCommand,
  IndividualTrip,
  Intersection,
  MapEdits,
  MapInput,
  Road,
  RoadFix,
  ScenarioInput,
  SpawnOverTime,
} from '../types';
import { pathMap } from './paths';
import { compileSchema, formatErrors } from './validate';

/** On-disk shapes. Optional fields get their defaults in the parsers below. */
export interface MapFile {
  kind: 'map';
  name: string;
  intersections: Intersection[];
  roads: (Omit<Road, 'lengthM'> & { lengthM?: number })[];
  busRoutes?: BusRoute[];
  fixes?: RoadFix[];
}

export interface ScenarioFile {
  kind: 'scenario';
  scenarioName: string;
  mapName: string;
  spawnOverTime?: (Omit<SpawnOverTime, 'from' | 'to'> & { from?: string[]; to?: string[] })[];
  individTrips?: IndividualTrip[];
}

export interface EditsFile {
  kind: 'edits';
  mapName: string;
  editsName: string;
  commands: EditCommand[];
}

export type FileKind = 'map' | 'scenario' | 'edits' | 'savestate' | 'prebaked';

const FILE_KINDS: readonly string[] = ['map', 'scenario', 'edits', 'savestate', 'prebaked'];

function isFileKind(value: unknown): value is FileKind {
  return typeof value === 'string' && FILE_KINDS.includes(value);
}

export function readJsonFile(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (err) {
    throw new LoadError(path, describeError(err));
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch (err) {
    throw new LoadError(path, `invalid JSON (${describeError(err)})`);
  }
}

/** Every input file names what it is in a top-level `kind` field. */
export function detectKind(raw: unknown, path: string): FileKind {
  if (typeof raw === 'object' && raw !== null && 'kind' in raw && isFileKind(raw.kind)) {
    return raw.kind;
  }
  throw new LoadError(path, `expected a "kind" of ${FILE_KINDS.join(', ')}`);
}

function checkedTick(text: string, what: string, path: string): Tick {
  const t = Tick.parse(text);
  if (!t) {
    throw new LoadError(path, `bad ${what} time ${text}`);
  }
  return t;
}

export function parseMap(raw: unknown, path: string): MapInput {
  const validate = compileSchema<MapFile>('map');
  if (!validate(raw)) {
    throw new LoadError(path, `schema validation failed: ${formatErrors(validate.errors)}`);
  }
  const intersections = new Map<string, Intersection>();
  for (const i of raw.intersections) {
    if (intersections.has(i.id)) {
      throw new LoadError(path, `duplicate intersection ${i.id}`);
    }
    intersections.set(i.id, i);
  }
  const roadIds = new Set<string>();
  const roads: Road[] = raw.roads.map((r) => {
    if (roadIds.has(r.id)) {
      throw new LoadError(path, `duplicate road ${r.id}`);
    }
    roadIds.add(r.id);
    const src = intersections.get(r.src);
    const dst = intersections.get(r.dst);
    if (!src || !dst) {
      throw new LoadError(path, `road ${r.id} connects unknown intersection ${src ? r.dst : r.src}`);
    }
    const lengthM = r.lengthM ?? Math.max(1, euclidean(src, dst));
    return { ...r, lengthM };
  });

  const busRoutes = raw.busRoutes ?? [];
  const routeNames = new Set<string>();
  for (const route of busRoutes) {
    if (routeNames.has(route.name)) {
      throw new LoadError(path, `duplicate bus route ${route.name}`);
    }
    routeNames.add(route.name);
    for (const stop of route.stops) {
      if (!intersections.has(stop)) {
        throw new LoadError(path, `bus route ${route.name} stops at unknown intersection ${stop}`);
      }
    }
    const first = checkedTick(route.firstDeparture, 'first departure', path);
    const last = checkedTick(route.lastDeparture, 'last departure', path);
    if (last.compare(first) < 0) {
      throw new LoadError(path, `bus route ${route.name} stops running before it starts`);
    }
  }

  const fixes = raw.fixes ?? [];
  for (const fix of fixes) {
    if (!roadIds.has(fix.roadId)) {
      throw new LoadError(path, `fix for unknown road ${fix.roadId}`);
    }
  }

  return {
    name: raw.name,
    intersections: [...intersections.values()],
    roads,
    busRoutes,
    fixes,
  };
}

export function parseScenario(raw: unknown, path: string): ScenarioInput {
  const validate = compileSchema<ScenarioFile>('scenario');
  if (!validate(raw)) {
    throw new LoadError(path, `schema validation failed: ${formatErrors(validate.errors)}`);
  }
  const spawnOverTime: SpawnOverTime[] = (raw.spawnOverTime ?? []).map((block) => {
    const start = checkedTick(block.startTime, 'spawn start', path);
    const end = checkedTick(block.endTime, 'spawn end', path);
    if (end.compare(start) <= 0) {
      throw new LoadError(path, `spawn window ${block.startTime}-${block.endTime} is empty`);
    }
    const weights = Object.values(block.modes);
    if (block.numAgents > 0 && !weights.some((w) => w !== undefined && w > 0)) {
      throw new LoadError(path, `spawn block at ${block.startTime} gives no mode a weight`);
    }
    return { ...block, from: block.from ?? [], to: block.to ?? [] };
  });
  const individTrips = raw.individTrips ?? [];
  for (const t of individTrips) {
    checkedTick(t.departAt, 'departure', path);
  }
  return {
    scenarioName: raw.scenarioName,
    mapName: raw.mapName,
    spawnOverTime,
    individTrips,
  };
}

export function parseEdits(raw: unknown, path: string): MapEdits {
  const validate = compileSchema<EditsFile>('edits');
  if (!validate(raw)) {
    throw new LoadError(path, `schema validation failed: ${formatErrors(validate.errors)}`);
  }
  return { mapName: raw.mapName, editsName: raw.editsName, commands: raw.commands };
}

export function loadMapFile(path: string, useMapFixes: boolean): CityMap {
  return CityMap.fromInput(parseMap(readJsonFile(path), path), { useMapFixes });
}

export function loadScenario(path: string): ScenarioInput {
  return parseScenario(readJsonFile(path), path);
}

export function loadEdits(path: string): MapEdits {
  return parseEdits(readJsonFile(path), path);
}

/** Build the map a run uses: the named base map, with `edits` on top. */
export function buildMap(
  dataDir: string,
  mapName: string,
  useMapFixes: boolean,
  edits?: MapEdits,
): CityMap {
  const path = pathMap(dataDir, mapName);
  const base = loadMapFile(path, useMapFixes);
  if (!edits) return base;
  try {
    return base.withEdits(edits);
  } catch (err) {
    throw new LoadError(path, describeError(err));
  }
}
