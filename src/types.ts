import type { Duration } from './time';

export type ID = string;

export type TripMode = 'walk' | 'bike' | 'transit' | 'drive';

export const TRIP_MODES: readonly TripMode[] = ['walk', 'bike', 'transit', 'drive'];

export type LaneType = 'driving' | 'parking' | 'sidewalk' | 'biking' | 'bus';

export interface Intersection {
  id: ID;
  x: number; // meters
  y: number;
}

/** Roads are two-way; `lanes` lists every lane across both directions. */
export interface Road {
  id: ID;
  src: ID;
  dst: ID;
  lengthM: number;
  speedLimitMps: number;
  lanes: LaneType[];
}

export interface BusRoute {
  name: string;
  /** Intersections the route stops at, in order. */
  stops: ID[];
  headwaySec: number;
  firstDeparture: string; // "HH:MM"
  lastDeparture: string;
}

/** Manual correction shipped with a map and applied when map fixes are on. */
export interface RoadFix {
  roadId: ID;
  lanes?: LaneType[];
  speedLimitMps?: number;
}

export interface MapInput {
  name: string;
  intersections: Intersection[];
  roads: Road[];
  busRoutes: BusRoute[];
  fixes: RoadFix[];
}

export type EditCommand =
  | { type: 'changeLaneType'; roadId: ID; lane: number; laneType: LaneType }
  | { type: 'changeSpeedLimit'; roadId: ID; speedLimitMps: number }
  | { type: 'closeRoad'; roadId: ID };

export interface MapEdits {
  mapName: string;
  editsName: string;
  commands: EditCommand[];
}

export interface SpawnOverTime {
  numAgents: number;
  startTime: string;
  endTime: string;
  from: ID[];
  to: ID[];
  modes: Partial<Record<TripMode, number>>;
}

export interface IndividualTrip {
  agent?: ID;
  from: ID;
  to: ID;
  mode: TripMode;
  departAt: string;
}

export interface ScenarioInput {
  scenarioName: string;
  mapName: string;
  spawnOverTime: SpawnOverTime[];
  individTrips: IndividualTrip[];
}

/** A trip handed to the engine; `departAt` is in ticks. */
export interface TripRequest {
  id: number;
  agent: ID;
  mode: TripMode;
  from: ID;
  to: ID;
  departAt: number;
}

export interface TripRecord {
  readonly tripId: number;
  readonly agent: ID;
  readonly mode: TripMode;
  readonly duration: Duration;
}

export interface SimOptions {
  /** Names the run in logs and in savestate paths when no scenario is loaded. */
  runName: string;
  dataDir: string;
  savestateEvery?: Duration;
  edits?: MapEdits;
}

export interface SimFlags {
  /** Map, scenario or savestate file. */
  load: string;
  useMapFixes: boolean;
  rngSeed?: number;
  opts: SimOptions;
}
