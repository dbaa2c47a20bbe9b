import { TripEngine } from './engine';
import type { CityMap } from './map';
import type { RandomStream } from './random';
import type { Duration, Tick } from './time';

export interface SimulationInit {
  map: CityMap;
  engine: TripEngine;
  rng: RandomStream;
  /** Names savestates; a scenario's own name, or the run name for bare maps. */
  scenarioName: string;
  dataDir: string;
  savestateEvery?: Duration;
}

/**
 * One run: the engine, the map it runs on and the random stream feeding it.
 * A run owns all three exclusively; starting another run means building a
 * new Simulation, never reusing this one.
 */
export class Simulation {
  readonly map: CityMap;
  readonly engine: TripEngine;
  readonly rng: RandomStream;
  readonly scenarioName: string;
  readonly dataDir: string;
  readonly savestateEvery?: Duration;

  constructor(init: SimulationInit) {
    this.map = init.map;
    this.engine = init.engine;
    this.rng = init.rng;
    this.scenarioName = init.scenarioName;
    this.dataDir = init.dataDir;
    this.savestateEvery = init.savestateEvery;
  }

  static fresh(init: Omit<SimulationInit, 'engine'>): Simulation {
    return new Simulation({ ...init, engine: TripEngine.create(init.map) });
  }

  get time(): Tick {
    return this.engine.time;
  }

  step(dt: Duration): void {
    this.engine.step(dt);
  }

  isDone(): boolean {
    return this.engine.isDone();
  }
}
