import { existsSync } from 'node:fs';
import { challengeMaps } from '../challenges';
import { runUntilDone, stopAt } from '../driver';
import { ConfigError } from '../errors';
import { writePrebaked } from '../io/prebaked';
import type { PrebakedResults } from '../io/prebaked';
import { pathScenario } from '../io/paths';
import { isValidSeed } from '../random';
import type { Simulation } from '../sim';
import { collectRunStats } from '../stats';
import type { RunStats } from '../stats';
import { Tick } from '../time';
import type { Timer } from '../timer';
import type { MapEdits } from '../types';
import { freezeFlags, loadSimulation } from './load';

/** Every baseline and every challenge rerun plays this scenario unless told otherwise. */
export const REFERENCE_SCENARIO = 'weekday_typical_traffic_from_psrc';

export interface ScenarioRunOptions {
  mapName: string;
  scenarioName: string;
  seed: number | undefined;
  dataDir: string;
  edits?: MapEdits;
  timer?: Timer;
  /** Label used in the ConfigError when the seed is missing. */
  purpose: string;
}

export interface ScenarioRun {
  sim: Simulation;
  seed: number;
  stats: RunStats;
}

/** Scored runs must be reproducible, so they never fall back to entropy. */
export function requireSeed(seed: number | undefined, purpose: string): number {
  if (!isValidSeed(seed)) {
    throw new ConfigError(`${purpose} needs an explicit integer --rng_seed, got ${seed ?? 'none'}`);
  }
  return seed;
}

/** Play a map's scenario to the end of the day with map fixes on. */
export function runScenarioToEndOfDay(opts: ScenarioRunOptions): ScenarioRun {
  const seed = requireSeed(opts.seed, opts.purpose);
  const flags = freezeFlags({
    load: pathScenario(opts.dataDir, opts.mapName, opts.scenarioName),
    useMapFixes: true,
    rngSeed: seed,
    opts: { runName: opts.scenarioName, dataDir: opts.dataDir, edits: opts.edits },
  });
  const { sim, kind } = loadSimulation(flags, opts.timer);
  if (kind !== 'scenario') {
    throw new ConfigError(`${flags.load} is not a scenario`);
  }
  if (sim.map.name !== opts.mapName) {
    throw new ConfigError(`Scenario ${opts.scenarioName} is for map ${sim.map.name}, not ${opts.mapName}`);
  }
  opts.timer?.start(`Simulating ${opts.mapName} to end of day`);
  runUntilDone(sim, [stopAt(Tick.END_OF_DAY)], { timer: opts.timer });
  opts.timer?.stop(`Simulating ${opts.mapName} to end of day`);
  return { sim, seed, stats: collectRunStats(sim.engine) };
}

export interface PrebakeOptions {
  mapName: string;
  scenarioName?: string;
  seed: number | undefined;
  dataDir: string;
  timer?: Timer;
}

export interface PrebakeResult {
  results: PrebakedResults;
  path: string;
}

export function prebake(opts: PrebakeOptions): PrebakeResult {
  const scenarioName = opts.scenarioName ?? REFERENCE_SCENARIO;
  opts.timer?.start(`Prebaking ${opts.mapName}`);
  const run = runScenarioToEndOfDay({
    mapName: opts.mapName,
    scenarioName,
    seed: opts.seed,
    dataDir: opts.dataDir,
    timer: opts.timer,
    purpose: 'Prebaking a baseline',
  });
  const results: PrebakedResults = Object.freeze({
    mapName: opts.mapName,
    scenarioName,
    seed: run.seed,
    fasterTrips: run.stats.tripTimes,
    busRoutes: run.stats.busRoutes,
  });
  const path = writePrebaked(opts.dataDir, results);
  opts.timer?.stop(`Prebaking ${opts.mapName}`);
  return { results, path };
}

/** Prebake every challenge map whose reference scenario is present. */
export function prebakeAll(
  opts: Omit<PrebakeOptions, 'mapName' | 'scenarioName'>,
): PrebakeResult[] {
  requireSeed(opts.seed, 'Prebaking a baseline');
  const done: PrebakeResult[] = [];
  for (const mapName of challengeMaps()) {
    if (!existsSync(pathScenario(opts.dataDir, mapName, REFERENCE_SCENARIO))) {
      console.warn(`Skipping ${mapName}: no ${REFERENCE_SCENARIO} scenario`);
      continue;
    }
    done.push(prebake({ ...opts, mapName }));
  }
  return done;
}
