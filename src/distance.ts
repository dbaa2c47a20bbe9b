import { TICKS_PER_SECOND } from './time';
import type { LaneType, Road, TripMode } from './types';

/** Meters per second. */
export const WALK_SPEED = 1.25;
export const BIKE_SPEED_SHARED = 4;
export const BIKE_SPEED_ON_LANE = 5;

/** Road space one queued vehicle takes, used for capacity. */
export const VEHICLE_LENGTH_M = 7.5;

/** Buses share this classification with transit riders. */
export type Mover = TripMode | 'bus';

export function countLanes(road: Road, type: LaneType): number {
  return road.lanes.filter((l) => l === type).length;
}

export function canUse(road: Road, mover: Mover): boolean {
  switch (mover) {
    case 'walk':
      return countLanes(road, 'sidewalk') > 0;
    case 'bike':
      return countLanes(road, 'biking') > 0 || countLanes(road, 'driving') > 0;
    case 'drive':
      return countLanes(road, 'driving') > 0;
    case 'transit':
    case 'bus':
      return countLanes(road, 'bus') > 0 || countLanes(road, 'driving') > 0;
  }
}

export function speedOn(road: Road, mover: Mover): number {
  switch (mover) {
    case 'walk':
      return Math.min(WALK_SPEED, road.speedLimitMps);
    case 'bike':
      return Math.min(
        countLanes(road, 'biking') > 0 ? BIKE_SPEED_ON_LANE : BIKE_SPEED_SHARED,
        road.speedLimitMps,
      );
    case 'drive':
    case 'transit':
    case 'bus':
      return road.speedLimitMps;
  }
}

/** Whether this mover rides in general traffic and so feels congestion. */
export function sharesTraffic(road: Road, mover: Mover): boolean {
  switch (mover) {
    case 'drive':
      return true;
    case 'transit':
    case 'bus':
      return countLanes(road, 'bus') === 0;
    case 'walk':
    case 'bike':
      return false;
  }
}

/** Ticks to cross the road with nobody else on it. Never less than one. */
export function freeFlowTicks(road: Road, mover: Mover): number {
  const speed = speedOn(road, mover);
  if (speed <= 0) {
    throw new Error(`Speed must be greater than 0 m/s on road ${road.id}: ${speed}`);
  }
  return Math.max(1, Math.ceil((road.lengthM * TICKS_PER_SECOND) / speed));
}

/** How many vehicles the general traffic lanes hold before doubling travel time. */
export function capacity(road: Road): number {
  const perLane = Math.max(1, Math.floor(road.lengthM / VEHICLE_LENGTH_M));
  return Math.max(1, countLanes(road, 'driving')) * perLane;
}

/**
 * Travel ticks for a vehicle entering a road that already carries `occupancy`
 * vehicles, inflated linearly with load.
 */
export function congestedTicks(road: Road, mover: Mover, occupancy: number): number {
  const free = freeFlowTicks(road, mover);
  if (!sharesTraffic(road, mover) || occupancy <= 0) {
    return free;
  }
  const cap = capacity(road);
  return Math.ceil((free * (cap + occupancy)) / cap);
}

/** Straight-line distance in meters. */
export function euclidean(a: { x: number; y: number }, b: { x: number; y: number }): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}
