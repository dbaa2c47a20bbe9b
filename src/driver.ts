import { ConfigError } from './errors';
import { saveSimulation } from './io/savestate';
import type { Simulation } from './sim';
import { Duration, Tick } from './time';
import type { Timer } from './timer';

/** The engine's native resolution: one tick. */
export const TIMESTEP = Duration.fromTicks(1);

const PROGRESS_EVERY = Duration.hours(1);

export type HaltAction = 'stop' | 'save' | 'saveAndStop';

/** Read-only picture of a run, handed to custom halt conditions. */
export interface SimulationView {
  readonly time: Tick;
  readonly finishedTrips: number;
  readonly activeAgents: number;
}

export type HaltCondition =
  | { kind: 'timeBound'; at: Tick; action: HaltAction }
  | { kind: 'always'; action: HaltAction }
  | {
      kind: 'custom';
      description: string;
      predicate: (view: SimulationView) => boolean;
      action: HaltAction;
    };

export function stopAt(at: Tick): HaltCondition {
  return { kind: 'timeBound', at, action: 'stop' };
}

export function saveAndStopAt(at: Tick): HaltCondition {
  return { kind: 'timeBound', at, action: 'saveAndStop' };
}

export function describeCondition(cond: HaltCondition): string {
  switch (cond.kind) {
    case 'timeBound':
      return `${cond.action} at ${cond.at}`;
    case 'always':
      return `${cond.action} after every step`;
    case 'custom':
      return `${cond.action} when ${cond.description}`;
  }
}

export interface RunOptions {
  /** How far each loop iteration advances the engine. Defaults to one tick. */
  step?: Duration;
  timer?: Timer;
  /** Persists the run and returns where it went. Defaults to a savestate file. */
  save?: (sim: Simulation) => string;
}

export interface RunOutcome {
  reason: 'done' | 'halted';
  /** Conditions that asked to stop, in registration order. */
  haltedBy: HaltCondition[];
  time: Tick;
  steps: number;
  savedTo: string[];
}

function shouldSave(action: HaltAction): boolean {
  return action === 'save' || action === 'saveAndStop';
}

function shouldStop(action: HaltAction): boolean {
  return action === 'stop' || action === 'saveAndStop';
}

/**
 * Advance `sim` until the engine has nothing left to do or a halt condition
 * asks to stop. Conditions are checked after every step, in order; saving
 * only ever happens between steps, so every savestate is a complete state.
 * Nothing but the engine running out of events ends the loop on its own:
 * demand that never stops needs a time bound.
 */
export function runUntilDone(
  sim: Simulation,
  conditions: readonly HaltCondition[],
  opts: RunOptions = {},
): RunOutcome {
  const step = opts.step ?? TIMESTEP;
  if (step.ticks <= 0) {
    throw new ConfigError(`Step must be positive, got ${step}`);
  }
  const save = opts.save ?? saveSimulation;
  const every = sim.savestateEvery;
  const fired = new Set<number>();
  conditions.forEach((cond, idx) => {
    if (cond.kind === 'timeBound' && cond.at.compare(sim.time) <= 0) {
      console.warn(`Ignoring halt condition "${describeCondition(cond)}": run starts at ${sim.time}`);
      fired.add(idx);
    }
  });
  const savedTo: string[] = [];
  let steps = 0;
  let nextProgress = sim.time.ticks + PROGRESS_EVERY.ticks;

  const finish = (reason: RunOutcome['reason'], haltedBy: HaltCondition[]): RunOutcome => ({
    reason,
    haltedBy,
    time: sim.time,
    steps,
    savedTo,
  });

  const persist = () => {
    const path = save(sim);
    opts.timer?.note(`Wrote ${path}`);
    savedTo.push(path);
  };

  const triggered = (cond: HaltCondition, idx: number): boolean => {
    switch (cond.kind) {
      case 'timeBound':
        if (fired.has(idx) || sim.time.compare(cond.at) < 0) return false;
        fired.add(idx);
        return true;
      case 'always':
        return true;
      case 'custom':
        return cond.predicate({
          time: sim.time,
          finishedTrips: sim.engine.ledger.size,
          activeAgents: sim.engine.activeAgents(),
        });
    }
  };

  while (!sim.isDone()) {
    let dt = step.ticks;
    conditions.forEach((cond, idx) => {
      if (cond.kind === 'timeBound' && !fired.has(idx)) {
        dt = Math.min(dt, cond.at.ticks - sim.time.ticks);
      }
    });
    if (every && every.ticks > 0) {
      const nextSave = (Math.floor(sim.time.ticks / every.ticks) + 1) * every.ticks;
      dt = Math.min(dt, nextSave - sim.time.ticks);
    }
    sim.step(Duration.fromTicks(dt));
    steps++;

    let saved = false;
    if (every && sim.time.isMultipleOf(every)) {
      persist();
      saved = true;
    }

    const haltedBy: HaltCondition[] = [];
    conditions.forEach((cond, idx) => {
      if (!triggered(cond, idx)) return;
      if (shouldSave(cond.action) && !saved) {
        persist();
        saved = true;
      }
      if (shouldStop(cond.action)) {
        haltedBy.push(cond);
      }
    });
    if (haltedBy.length > 0) {
      opts.timer?.note(`halted at ${sim.time} by ${haltedBy.map(describeCondition).join(', ')}`);
      return finish('halted', haltedBy);
    }

    if (opts.timer && sim.time.ticks >= nextProgress) {
      nextProgress += PROGRESS_EVERY.ticks;
      opts.timer.note(
        [
          `time ${sim.time}`,
          `finished=${sim.engine.ledger.size}`,
          `active=${sim.engine.activeAgents()}`,
        ].join(' | '),
      );
    }
  }

  opts.timer?.note(`done at ${sim.time} | finished=${sim.engine.ledger.size}`);
  return finish('done', []);
}
