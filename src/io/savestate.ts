import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import type { EngineState } from '../engine';
import { TripEngine } from '../engine';
import { LoadError, PersistenceError, describeError } from '../errors';
import { RandomStream } from '../random';
import type { RandomPosition } from '../random';
import { Simulation } from '../sim';
import type { Duration } from '../time';
import type { MapEdits } from '../types';
import type { EditsFile } from './parse';
import { buildMap, readJsonFile } from './parse';
import { pathSavestate } from './paths';
import { compileSchema, formatErrors } from './validate';

export const SAVESTATE_VERSION = 1;

export interface SavestateFile {
  kind: 'savestate';
  version: 1;
  mapName: string;
  scenarioName: string;
  useMapFixes: boolean;
  edits: EditsFile | null;
  tick: number;
  rng: RandomPosition;
  engine: EngineState;
}

export function toSavestate(sim: Simulation): SavestateFile {
  const edits = sim.map.edits;
  return {
    kind: 'savestate',
    version: SAVESTATE_VERSION,
    mapName: sim.map.name,
    scenarioName: sim.scenarioName,
    useMapFixes: sim.map.useMapFixes,
    edits: edits ? { kind: 'edits', ...edits } : null,
    tick: sim.time.ticks,
    rng: sim.rng.position(),
    engine: sim.engine.snapshot(),
  };
}

/** Write `sim` to `save/<map>/<scenario>/<time>.json` and return the path. */
export function saveSimulation(sim: Simulation): string {
  const path = pathSavestate(sim.dataDir, sim.map.name, sim.scenarioName, sim.time);
  try {
    mkdirSync(dirname(path), { recursive: true });
    writeFileSync(path, JSON.stringify(toSavestate(sim)));
  } catch (err) {
    throw new PersistenceError(path, describeError(err));
  }
  return path;
}

export interface LoadSavestateOptions {
  dataDir: string;
  savestateEvery?: Duration;
}

export function parseSavestate(raw: unknown, path: string): SavestateFile {
  const validate = compileSchema<SavestateFile>('savestate');
  if (!validate(raw)) {
    throw new LoadError(path, `schema validation failed: ${formatErrors(validate.errors)}`);
  }
  if (raw.tick !== raw.engine.time) {
    throw new LoadError(path, `clock at ${raw.tick} but engine at ${raw.engine.time}`);
  }
  if (raw.edits && raw.edits.mapName !== raw.mapName) {
    throw new LoadError(path, `edits ${raw.edits.editsName} are for map ${raw.edits.mapName}`);
  }
  return raw;
}

/**
 * Rebuild a run from a savestate. The map is reloaded from the data
 * directory with the saved fixes flag and edits, so the continuation runs on
 * the same network the saved run did.
 */
export function loadSavestate(path: string, opts: LoadSavestateOptions): Simulation {
  const state = parseSavestate(readJsonFile(path), path);
  const edits: MapEdits | undefined = state.edits
    ? { mapName: state.edits.mapName, editsName: state.edits.editsName, commands: state.edits.commands }
    : undefined;
  const map = buildMap(opts.dataDir, state.mapName, state.useMapFixes, edits);
  let engine: TripEngine;
  try {
    engine = TripEngine.restore(map, state.engine);
  } catch (err) {
    throw new LoadError(path, describeError(err));
  }
  return new Simulation({
    map,
    engine,
    rng: RandomStream.restore(state.rng),
    scenarioName: state.scenarioName,
    dataDir: opts.dataDir,
    savestateEvery: opts.savestateEvery,
  });
}
