import { ConfigError, LoadError, describeError } from '../errors';
import { CityMap } from '../map';
import { RandomStream } from '../random';
import { Simulation } from '../sim';
import { instantiateScenario } from '../spawner';
import type { Timer } from '../timer';
import type { MapEdits, SimFlags, SimOptions, TripRequest } from '../types';
import { buildMap, detectKind, parseMap, parseScenario, readJsonFile } from '../io/parse';
import { loadSavestate } from '../io/savestate';

export type LoadedKind = 'map' | 'scenario' | 'savestate';

export interface LoadedSimulation {
  sim: Simulation;
  kind: LoadedKind;
  /** Trips queued while loading; zero for maps and savestates. */
  spawned: number;
}

/** Freeze flags once they are built; nothing downstream may change them. */
export function freezeFlags(flags: SimFlags): Readonly<SimFlags> {
  const opts: SimOptions = Object.freeze({ ...flags.opts });
  return Object.freeze({ ...flags, opts });
}

function streamFor(seed: number | undefined): RandomStream {
  return seed === undefined ? RandomStream.fromEntropy() : RandomStream.seeded(seed);
}

function applyEdits(map: CityMap, edits: MapEdits | undefined, path: string): CityMap {
  if (!edits) return map;
  try {
    return map.withEdits(edits);
  } catch (err) {
    throw new LoadError(path, describeError(err));
  }
}

/**
 * Start a run from a map, a scenario or a savestate file, told apart by the
 * file's `kind`. Maps start empty; scenarios load their map by name from the
 * data directory and queue their trips.
 */
export function loadSimulation(flags: Readonly<SimFlags>, timer?: Timer): LoadedSimulation {
  const { opts } = flags;
  timer?.start(`Loading ${flags.load}`);
  const raw = readJsonFile(flags.load);
  const kind = detectKind(raw, flags.load);
  let loaded: LoadedSimulation;
  switch (kind) {
    case 'map': {
      const base = CityMap.fromInput(parseMap(raw, flags.load), {
        useMapFixes: flags.useMapFixes,
      });
      const sim = Simulation.fresh({
        map: applyEdits(base, opts.edits, flags.load),
        rng: streamFor(flags.rngSeed),
        scenarioName: opts.runName,
        dataDir: opts.dataDir,
        savestateEvery: opts.savestateEvery,
      });
      loaded = { sim, kind, spawned: 0 };
      break;
    }
    case 'scenario': {
      const scenario = parseScenario(raw, flags.load);
      const map = buildMap(opts.dataDir, scenario.mapName, flags.useMapFixes, opts.edits);
      const sim = Simulation.fresh({
        map,
        rng: streamFor(flags.rngSeed),
        scenarioName: scenario.scenarioName,
        dataDir: opts.dataDir,
        savestateEvery: opts.savestateEvery,
      });
      let trips: TripRequest[];
      try {
        trips = instantiateScenario(scenario, map, sim.rng);
      } catch (err) {
        throw new LoadError(flags.load, describeError(err));
      }
      sim.engine.spawn(trips);
      timer?.note(`scenario=${scenario.scenarioName} | trips=${trips.length}`);
      loaded = { sim, kind, spawned: trips.length };
      break;
    }
    case 'savestate': {
      if (flags.rngSeed !== undefined || opts.edits) {
        console.warn('Savestates carry their own RNG position and edits; ignoring --rng_seed and --edits');
      }
      const sim = loadSavestate(flags.load, {
        dataDir: opts.dataDir,
        savestateEvery: opts.savestateEvery,
      });
      loaded = { sim, kind, spawned: 0 };
      break;
    }
    default:
      throw new ConfigError(`${flags.load} is a ${kind} file, not a map, scenario or savestate`);
  }
  timer?.stop(`Loading ${flags.load}`);
  return loaded;
}
