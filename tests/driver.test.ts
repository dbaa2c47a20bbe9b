import { describe, it, expect, vi } from 'vitest';
import { runUntilDone, saveAndStopAt, stopAt } from '../src/driver';
import type { HaltCondition } from '../src/driver';
import { ConfigError } from '../src/errors';
import { RandomStream } from '../src/random';
import { Simulation } from '../src/sim';
import { aggregateTrips } from '../src/stats';
import { Duration, Tick } from '../src/time';
import type { TripMode } from '../src/types';
import { lineMap } from './helpers';

function simWith(
  trips: [TripMode, string, string][],
  savestateEvery?: Duration,
): Simulation {
  const sim = Simulation.fresh({
    map: lineMap(),
    rng: RandomStream.seeded(1),
    scenarioName: 'driver',
    dataDir: 'unused',
    savestateEvery,
  });
  sim.engine.spawn(
    trips.map(([mode, from, to], id) => ({ id, agent: `p${id}`, mode, from, to, departAt: 0 })),
  );
  return sim;
}

function recorder() {
  const savedAt: number[] = [];
  const save = (sim: Simulation) => {
    savedAt.push(sim.time.ticks);
    return `mem:${sim.time.ticks}`;
  };
  return { savedAt, save };
}

describe('runUntilDone', () => {
  it('finishes at once with no demand', () => {
    const sim = simWith([]);
    const outcome = runUntilDone(sim, []);
    expect(outcome.reason).toBe('done');
    expect(outcome.steps).toBe(0);
    expect(sim.engine.ledger.size).toBe(0);
    expect(aggregateTrips(sim.engine.ledger).size).toBe(0);
  });

  it('runs one tick at a time until the engine is idle', () => {
    const sim = simWith([['drive', 'a', 'c']]);
    const outcome = runUntilDone(sim, []);
    expect(outcome).toMatchObject({ reason: 'done', steps: 200, haltedBy: [], savedTo: [] });
    expect(sim.time.ticks).toBe(200);
  });

  it('stops at a time bound and resumes', () => {
    const sim = simWith([['drive', 'a', 'c']]);
    const bound = stopAt(Tick.fromTicks(150));
    const halted = runUntilDone(sim, [bound]);
    expect(halted.reason).toBe('halted');
    expect(halted.haltedBy).toEqual([bound]);
    expect(halted.time.ticks).toBe(150);
    expect(sim.engine.ledger.size).toBe(0);

    const done = runUntilDone(sim, []);
    expect(done.reason).toBe('done');
    expect(sim.engine.finishedTrips()[0].duration.ticks).toBe(200);
  });

  it('never steps past a pending time bound', () => {
    const sim = simWith([['drive', 'a', 'c']]);
    const outcome = runUntilDone(sim, [stopAt(Tick.fromTicks(150))], { step: Duration.seconds(100) });
    expect(outcome.time.ticks).toBe(150);
    expect(outcome.steps).toBe(1);
  });

  it('saves before stopping', () => {
    const sim = simWith([['drive', 'a', 'c']]);
    const { savedAt, save } = recorder();
    const outcome = runUntilDone(sim, [saveAndStopAt(Tick.fromTicks(150))], { save });
    expect(savedAt).toEqual([150]);
    expect(outcome.savedTo).toEqual(['mem:150']);
  });

  it('keeps running after a save-only condition', () => {
    const sim = simWith([['drive', 'a', 'c']]);
    const { savedAt, save } = recorder();
    const outcome = runUntilDone(sim, [{ kind: 'timeBound', at: Tick.fromTicks(50), action: 'save' }], {
      save,
    });
    expect(outcome.reason).toBe('done');
    expect(savedAt).toEqual([50]);
  });

  it('checks an always condition after the first step', () => {
    const sim = simWith([['drive', 'a', 'c']]);
    const outcome = runUntilDone(sim, [{ kind: 'always', action: 'stop' }]);
    expect(outcome.time.ticks).toBe(1);
    expect(outcome.steps).toBe(1);
  });

  it('evaluates custom predicates against the run', () => {
    const sim = simWith([
      ['drive', 'a', 'b'],
      ['drive', 'a', 'c'],
    ]);
    const firstArrival: HaltCondition = {
      kind: 'custom',
      description: 'someone arrives',
      predicate: (view) => view.finishedTrips >= 1,
      action: 'stop',
    };
    const outcome = runUntilDone(sim, [firstArrival]);
    expect(outcome.reason).toBe('halted');
    expect(outcome.time.ticks).toBe(100);
  });

  it('ignores time bounds the run has already passed', () => {
    const sim = simWith([['drive', 'a', 'c']]);
    sim.step(Duration.fromTicks(50));
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const outcome = runUntilDone(sim, [stopAt(Tick.fromTicks(10))]);
    expect(warn).toHaveBeenCalledWith(
      'Ignoring halt condition "stop at 00:00:01.0": run starts at 00:00:05.0',
    );
    expect(outcome.reason).toBe('done');
    warn.mockRestore();
  });

  it('saves periodically, once per step', () => {
    const sim = simWith([['drive', 'a', 'c']], Duration.fromTicks(100));
    const { savedAt, save } = recorder();
    runUntilDone(sim, [{ kind: 'timeBound', at: Tick.fromTicks(100), action: 'save' }], {
      save,
      step: Duration.seconds(60),
    });
    expect(savedAt).toEqual([100, 200]);
  });

  it('rejects a step that does not move time forward', () => {
    const sim = simWith([]);
    expect(() => runUntilDone(sim, [], { step: Duration.ZERO })).toThrow(ConfigError);
  });
});
