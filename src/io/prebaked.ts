import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { LoadError, PersistenceError, describeError } from '../errors';
import type { BusRouteStats, DurationStats } from '../stats';
import type { TripMode } from '../types';
import type { BusRouteStatsJson, DurationStatsJson } from './emit';
import { busRoutesFromJson, busRoutesToJson, tripTimesFromJson, tripTimesToJson } from './emit';
import { readJsonFile } from './parse';
import { pathPrebaked } from './paths';
import { compileSchema, formatErrors } from './validate';

/** Baseline statistics of one map's reference scenario, recorded once. */
export interface PrebakedResults {
  readonly mapName: string;
  readonly scenarioName: string;
  readonly seed: number;
  readonly fasterTrips: ReadonlyMap<TripMode, DurationStats>;
  readonly busRoutes: ReadonlyMap<string, BusRouteStats>;
}

interface PrebakedFile {
  kind: 'prebaked';
  mapName: string;
  scenarioName: string;
  seed: number;
  fasterTrips: Partial<Record<TripMode, DurationStatsJson>>;
  busRoutes: Record<string, BusRouteStatsJson>;
}

export function writePrebaked(dataDir: string, results: PrebakedResults): string {
  const path = pathPrebaked(dataDir, results.mapName);
  const file: PrebakedFile = {
    kind: 'prebaked',
    mapName: results.mapName,
    scenarioName: results.scenarioName,
    seed: results.seed,
    fasterTrips: tripTimesToJson(results.fasterTrips),
    busRoutes: busRoutesToJson(results.busRoutes),
  };
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, `${JSON.stringify(file, null, 2)}\n`, 'utf8');
  } catch (err) {
    throw new PersistenceError(path, describeError(err));
  }
  return path;
}

export function parsePrebaked(raw: unknown, path: string): PrebakedResults {
  const validate = compileSchema<PrebakedFile>('prebaked');
  if (!validate(raw)) {
    throw new LoadError(path, `schema validation failed: ${formatErrors(validate.errors)}`);
  }
  return Object.freeze({
    mapName: raw.mapName,
    scenarioName: raw.scenarioName,
    seed: raw.seed,
    fasterTrips: tripTimesFromJson(raw.fasterTrips),
    busRoutes: busRoutesFromJson(raw.busRoutes),
  });
}

/** The stored baseline for `mapName`, or undefined when none was recorded. */
export function readPrebaked(dataDir: string, mapName: string): PrebakedResults | undefined {
  const path = pathPrebaked(dataDir, mapName);
  if (!existsSync(path)) return undefined;
  return parsePrebaked(readJsonFile(path), path);
}
