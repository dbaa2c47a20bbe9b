import { congestedTicks, sharesTraffic, type Mover } from './distance';
import { TripLedger } from './ledger';
import type { CityMap } from './map';
import { Pathfinder, type PathStep } from './pathfinding';
import type { GridlockStats, RunStatsSource } from './stats';
import { Duration, Tick } from './time';
import type { ID, TripMode, TripRecord, TripRequest } from './types';

/**
 * What the core needs from a micro-simulation: advance it, ask what time it
 * is, whether anything is left to happen, and which trips have finished.
 */
export interface SimulationEngine {
  readonly time: Tick;
  step(dt: Duration): void;
  isDone(): boolean;
  finishedTrips(): readonly TripRecord[];
}

export type SimEvent =
  | { kind: 'depart'; at: number; seq: number; trip: number }
  | { kind: 'exitRoad'; at: number; seq: number; agent: number }
  | { kind: 'dispatchBus'; at: number; seq: number; route: string };

export interface AgentState {
  id: number;
  mover: Mover;
  /** Person trip being travelled, or null for a bus. */
  trip: number | null;
  route: string | null;
  path: PathStep[];
  leg: number;
  nextStop: number;
  lastStopAt: number;
}

export interface FinishedTripState {
  tripId: number;
  agent: ID;
  mode: TripMode;
  duration: number;
}

/** Plain-data copy of everything the engine needs to carry on later. */
export interface EngineState {
  time: number;
  seq: number;
  nextAgent: number;
  trips: TripRequest[];
  events: SimEvent[];
  agents: AgentState[];
  occupancy: Record<ID, number>;
  finished: FinishedTripState[];
  aborted: number;
  busSegments: Record<string, number[]>;
}

function eventBefore(a: SimEvent, b: SimEvent): boolean {
  return a.at < b.at || (a.at === b.at && a.seq < b.seq);
}

const clone = <T>(value: T): T => structuredClone(value);

/**
 * Event-driven trip simulator. Each agent crosses its path one road at a
 * time; vehicles in general traffic slow each other down, buses in a bus lane
 * and cyclists don't. Events at the same tick run in scheduling order.
 */
export class TripEngine implements SimulationEngine, RunStatsSource {
  readonly ledger = new TripLedger();
  private readonly pathfinder: Pathfinder;
  private now = 0;
  private seq = 0;
  private nextAgent = 0;
  private readonly trips = new Map<number, TripRequest>();
  private events: SimEvent[] = [];
  private readonly agents = new Map<number, AgentState>();
  private readonly occupancy = new Map<ID, number>();
  private aborted = 0;
  private readonly segments = new Map<string, number[]>();

  private constructor(readonly map: CityMap) {
    this.pathfinder = new Pathfinder(map);
  }

  /** A fresh engine at tick zero with every bus route's service scheduled. */
  static create(map: CityMap): TripEngine {
    const engine = new TripEngine(map);
    for (const route of map.busRoutes) {
      const first = Tick.parse(route.firstDeparture);
      const last = Tick.parse(route.lastDeparture);
      if (!first || !last) {
        throw new Error(`Bad service window for bus route ${route.name}`);
      }
      const headway = Duration.seconds(route.headwaySec);
      if (headway.ticks <= 0) {
        throw new Error(`Headway must be positive for bus route ${route.name}`);
      }
      engine.segments.set(route.name, []);
      for (let at = first.ticks; at <= last.ticks; at += headway.ticks) {
        engine.schedule({ kind: 'dispatchBus', at, seq: 0, route: route.name });
      }
    }
    return engine;
  }

  static restore(map: CityMap, state: EngineState): TripEngine {
    const engine = new TripEngine(map);
    engine.now = state.time;
    engine.seq = state.seq;
    engine.nextAgent = state.nextAgent;
    for (const t of state.trips) engine.trips.set(t.id, { ...t });
    engine.events = clone(state.events);
    for (const a of state.agents) engine.agents.set(a.id, clone(a));
    for (const [road, n] of Object.entries(state.occupancy)) {
      engine.occupancy.set(road, n);
    }
    for (const f of state.finished) {
      engine.ledger.record({
        tripId: f.tripId,
        agent: f.agent,
        mode: f.mode,
        duration: Duration.fromTicks(f.duration),
      });
    }
    engine.aborted = state.aborted;
    for (const [route, segs] of Object.entries(state.busSegments)) {
      engine.segments.set(route, [...segs]);
    }
    return engine;
  }

  snapshot(): EngineState {
    const occupancy: Record<ID, number> = {};
    for (const [road, n] of this.occupancy) occupancy[road] = n;
    const busSegments: Record<string, number[]> = {};
    for (const [route, segs] of this.segments) busSegments[route] = [...segs];
    return {
      time: this.now,
      seq: this.seq,
      nextAgent: this.nextAgent,
      trips: [...this.trips.values()].map((t) => ({ ...t })),
      events: clone(this.events),
      agents: [...this.agents.values()].map(clone),
      occupancy,
      finished: this.ledger.all().map((r) => ({
        tripId: r.tripId,
        agent: r.agent,
        mode: r.mode,
        duration: r.duration.ticks,
      })),
      aborted: this.aborted,
      busSegments,
    };
  }

  get time(): Tick {
    return Tick.fromTicks(this.now);
  }

  /** Queue trips for departure. Departures may not lie in the past. */
  spawn(requests: readonly TripRequest[]): void {
    for (const req of requests) {
      if (this.trips.has(req.id)) {
        throw new Error(`Duplicate trip id: ${req.id}`);
      }
      if (req.departAt < this.now) {
        throw new Error(
          `Trip ${req.id} departs at ${Tick.fromTicks(req.departAt)}, before ${this.time}`,
        );
      }
      this.trips.set(req.id, { ...req });
      this.schedule({ kind: 'depart', at: req.departAt, seq: 0, trip: req.id });
    }
  }

  step(dt: Duration): void {
    if (dt.ticks < 0) {
      throw new RangeError(`Cannot step backwards by ${dt}`);
    }
    const target = this.time.add(dt).ticks;
    while (this.events.length > 0 && this.events[0].at <= target) {
      const ev = this.events.shift();
      if (!ev) break;
      this.now = ev.at;
      this.handle(ev);
    }
    this.now = target;
  }

  isDone(): boolean {
    return this.events.length === 0;
  }

  finishedTrips(): readonly TripRecord[] {
    return this.ledger.all();
  }

  activeAgents(): number {
    return this.agents.size;
  }

  busSegments(): ReadonlyMap<string, readonly number[]> {
    return this.segments;
  }

  gridlockStats(): GridlockStats {
    return {
      abortedTrips: this.aborted,
      unfinishedTrips: this.trips.size - this.ledger.size - this.aborted,
    };
  }

  private schedule(ev: SimEvent): void {
    const placed = { ...ev, seq: this.seq++ };
    let lo = 0;
    let hi = this.events.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (eventBefore(this.events[mid], placed)) lo = mid + 1;
      else hi = mid;
    }
    this.events.splice(lo, 0, placed);
  }

  private handle(ev: SimEvent): void {
    switch (ev.kind) {
      case 'depart':
        this.depart(ev.trip);
        break;
      case 'exitRoad':
        this.exitRoad(ev.agent);
        break;
      case 'dispatchBus':
        this.dispatchBus(ev.route);
        break;
    }
  }

  private depart(tripId: number): void {
    const trip = this.trips.get(tripId);
    if (!trip) {
      throw new Error(`Unknown trip id: ${tripId}`);
    }
    const path = this.pathfinder.findPath(trip.from, trip.to, trip.mode);
    if (path === null) {
      this.aborted++;
      return;
    }
    if (path.length === 0) {
      this.finishTrip(trip);
      return;
    }
    const agent: AgentState = {
      id: this.nextAgent++,
      mover: trip.mode,
      trip: trip.id,
      route: null,
      path,
      leg: 0,
      nextStop: 0,
      lastStopAt: this.now,
    };
    this.agents.set(agent.id, agent);
    this.enterRoad(agent);
  }

  private dispatchBus(routeName: string): void {
    const route = this.map.getBusRoute(routeName);
    if (!route) {
      throw new Error(`Unknown bus route: ${routeName}`);
    }
    const path: PathStep[] = [];
    for (let i = 0; i + 1 < route.stops.length; i++) {
      const leg = this.pathfinder.findPath(route.stops[i], route.stops[i + 1], 'bus');
      if (leg === null) {
        // The route can't run on this network; the bus never leaves.
        return;
      }
      path.push(...leg);
    }
    if (path.length === 0) return;
    const agent: AgentState = {
      id: this.nextAgent++,
      mover: 'bus',
      trip: null,
      route: route.name,
      path,
      leg: 0,
      nextStop: 1,
      lastStopAt: this.now,
    };
    this.agents.set(agent.id, agent);
    this.enterRoad(agent);
  }

  private enterRoad(agent: AgentState): void {
    const road = this.map.getRoad(agent.path[agent.leg].roadId);
    const occupied = this.occupancy.get(road.id) ?? 0;
    const ticks = congestedTicks(road, agent.mover, occupied);
    if (sharesTraffic(road, agent.mover)) {
      this.occupancy.set(road.id, occupied + 1);
    }
    this.schedule({ kind: 'exitRoad', at: this.now + ticks, seq: 0, agent: agent.id });
  }

  private exitRoad(agentId: number): void {
    const agent = this.agents.get(agentId);
    if (!agent) {
      throw new Error(`Unknown agent id: ${agentId}`);
    }
    const step = agent.path[agent.leg];
    const road = this.map.getRoad(step.roadId);
    if (sharesTraffic(road, agent.mover)) {
      const left = (this.occupancy.get(road.id) ?? 1) - 1;
      if (left > 0) this.occupancy.set(road.id, left);
      else this.occupancy.delete(road.id);
    }
    if (agent.route !== null) {
      this.maybeRecordStop(agent, step.to);
    }

    agent.leg++;
    if (agent.leg < agent.path.length) {
      this.enterRoad(agent);
      return;
    }
    this.agents.delete(agent.id);
    if (agent.trip !== null) {
      const trip = this.trips.get(agent.trip);
      if (!trip) {
        throw new Error(`Unknown trip id: ${agent.trip}`);
      }
      this.finishTrip(trip);
    }
  }

  private maybeRecordStop(agent: AgentState, at: ID): void {
    const route = agent.route === null ? undefined : this.map.getBusRoute(agent.route);
    if (!route || agent.nextStop >= route.stops.length) return;
    if (route.stops[agent.nextStop] !== at) return;
    this.segments.get(route.name)?.push(this.now - agent.lastStopAt);
    agent.lastStopAt = this.now;
    agent.nextStop++;
  }

  private finishTrip(trip: TripRequest): void {
    this.ledger.record({
      tripId: trip.id,
      agent: trip.agent,
      mode: trip.mode,
      duration: Duration.fromTicks(this.now - trip.departAt),
    });
  }
}
