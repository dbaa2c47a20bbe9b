import type { CityMap } from './map';
import type { RandomStream } from './random';
import { Duration, Tick } from './time';
import { TRIP_MODES } from './types';
import type { ID, ScenarioInput, TripMode, TripRequest } from './types';

export type DemandProfile = 'small' | 'big';

export interface DemandProfileSpec {
  agents: number;
  /** Departures are spread uniformly over this window from the start tick. */
  window: Duration;
  mix: Record<TripMode, number>;
}

export const DEMAND_PROFILES: Readonly<Record<DemandProfile, DemandProfileSpec>> = {
  small: {
    agents: 100,
    window: Duration.hours(1),
    mix: { walk: 0.4, bike: 0.1, transit: 0.1, drive: 0.4 },
  },
  big: {
    agents: 1000,
    window: Duration.hours(1),
    mix: { walk: 0.4, bike: 0.1, transit: 0.1, drive: 0.4 },
  },
};

export interface SpawnOptions {
  startAt?: Tick;
  /** Trip ids are numbered from here, so several batches can share an engine. */
  firstTripId?: number;
}

function requireTick(text: string, what: string): Tick {
  const t = Tick.parse(text);
  if (!t) {
    throw new Error(`Couldn't parse ${what} time ${text}`);
  }
  return t;
}

function pickMode(rng: RandomStream, mix: Partial<Record<TripMode, number>>): TripMode {
  return TRIP_MODES[rng.weighted(TRIP_MODES.map((m) => mix[m] ?? 0))];
}

function pickDestination(rng: RandomStream, candidates: readonly ID[], from: ID): ID {
  const others = candidates.filter((id) => id !== from);
  return rng.pick(others.length > 0 ? others : candidates);
}

/**
 * Random trips between any two intersections. All randomness comes from
 * `rng`, so the same seed reproduces the same demand.
 */
export function spawnProfile(
  map: CityMap,
  rng: RandomStream,
  profile: DemandProfile,
  opts: SpawnOptions = {},
): TripRequest[] {
  const spec = DEMAND_PROFILES[profile];
  const ids = map.allIntersections().map((i) => i.id);
  if (ids.length < 2) {
    return [];
  }
  const start = (opts.startAt ?? Tick.zero()).ticks;
  const firstId = opts.firstTripId ?? 0;
  const trips: TripRequest[] = [];
  for (let i = 0; i < spec.agents; i++) {
    const from = rng.pick(ids);
    const to = pickDestination(rng, ids, from);
    const mode = pickMode(rng, spec.mix);
    const departAt = start + rng.uniformInt(0, spec.window.ticks);
    const id = firstId + i;
    trips.push({ id, agent: `p${id}`, mode, from, to, departAt });
  }
  return trips;
}

/** Expand a scenario's spawn blocks and individual trips into trip requests. */
export function instantiateScenario(
  scenario: ScenarioInput,
  map: CityMap,
  rng: RandomStream,
  opts: Pick<SpawnOptions, 'firstTripId'> = {},
): TripRequest[] {
  if (scenario.mapName !== map.name) {
    throw new Error(
      `Scenario ${scenario.scenarioName} is for map ${scenario.mapName}, not ${map.name}`,
    );
  }
  const checkIntersection = (id: ID) => {
    if (!map.hasIntersection(id)) {
      throw new Error(
        `Scenario ${scenario.scenarioName} references unknown intersection ${id}`,
      );
    }
  };
  const allIds = map.allIntersections().map((i) => i.id);
  const trips: TripRequest[] = [];
  let nextId = opts.firstTripId ?? 0;

  for (const block of scenario.spawnOverTime) {
    const start = requireTick(block.startTime, 'spawn start');
    const end = requireTick(block.endTime, 'spawn end');
    if (end.compare(start) <= 0) {
      throw new Error(`Spawn window ${block.startTime}-${block.endTime} is empty`);
    }
    const from = block.from.length > 0 ? block.from : allIds;
    const to = block.to.length > 0 ? block.to : allIds;
    from.forEach(checkIntersection);
    to.forEach(checkIntersection);
    for (let i = 0; i < block.numAgents; i++) {
      const origin = rng.pick(from);
      const destination = pickDestination(rng, to, origin);
      const mode = pickMode(rng, block.modes);
      const departAt = rng.uniformInt(start.ticks, end.ticks);
      const id = nextId++;
      trips.push({ id, agent: `p${id}`, mode, from: origin, to: destination, departAt });
    }
  }

  for (const t of scenario.individTrips) {
    checkIntersection(t.from);
    checkIntersection(t.to);
    const id = nextId++;
    trips.push({
      id,
      agent: t.agent ?? `p${id}`,
      mode: t.mode,
      from: t.from,
      to: t.to,
      departAt: requireTick(t.departAt, 'departure').ticks,
    });
  }
  return trips;
}
