import { saveAndStopAt, runUntilDone } from '../driver';
import type { HaltCondition, RunOutcome } from '../driver';
import { ConfigError } from '../errors';
import { spawnProfile } from '../spawner';
import type { DemandProfile } from '../spawner';
import { collectRunStats } from '../stats';
import type { RunStats } from '../stats';
import { Tick } from '../time';
import type { Duration } from '../time';
import type { Timer } from '../timer';
import type { SimFlags } from '../types';
import type { Simulation } from '../sim';
import { loadSimulation } from './load';
import type { LoadedKind } from './load';

export interface HeadlessOptions {
  flags: Readonly<SimFlags>;
  bigSim?: boolean;
  /** Save and stop once the run reaches this time. */
  saveAt?: string;
  step?: Duration;
  timer?: Timer;
  /** Extra halt conditions, checked after the built-in ones. */
  conditions?: readonly HaltCondition[];
}

export interface HeadlessResult {
  sim: Simulation;
  kind: LoadedKind;
  spawned: number;
  outcome: RunOutcome;
  stats: RunStats;
}

export function parseSaveAt(text: string): Tick {
  const t = Tick.parse(text);
  if (!t) {
    throw new ConfigError(`Couldn't parse time ${text}`);
  }
  return t;
}

/**
 * Load a run and drive it to completion. A bare map starting at midnight gets
 * generated demand, `big` or `small`; scenarios and savestates bring their own.
 */
export function headless(opts: HeadlessOptions): HeadlessResult {
  const saveAt = opts.saveAt === undefined ? undefined : parseSaveAt(opts.saveAt);
  const loaded = loadSimulation(opts.flags, opts.timer);
  const { sim } = loaded;
  let spawned = loaded.spawned;

  if (loaded.kind === 'map' && sim.time.isZero()) {
    const profile: DemandProfile = opts.bigSim ? 'big' : 'small';
    const trips = spawnProfile(sim.map, sim.rng, profile);
    sim.engine.spawn(trips);
    spawned += trips.length;
    opts.timer?.note(`profile=${profile} | trips=${trips.length}`);
  }

  const conditions: HaltCondition[] = [];
  if (saveAt) {
    conditions.push(saveAndStopAt(saveAt));
  }
  conditions.push(...(opts.conditions ?? []));

  opts.timer?.start('Running simulation');
  const outcome = runUntilDone(sim, conditions, { step: opts.step, timer: opts.timer });
  opts.timer?.stop('Running simulation');
  return { sim, kind: loaded.kind, spawned, outcome, stats: collectRunStats(sim.engine) };
}
