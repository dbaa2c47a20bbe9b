import type {
  BusRoute,
  EditCommand,
  ID,
  Intersection,
  MapEdits,
  MapInput,
  Road,
} from './types';

export interface MapBuildOptions {
  useMapFixes: boolean;
}

/**
 * Immutable road network. Edits never change a map in place; they build a
 * new one, so two runs can't alias each other's network.
 */
export class CityMap {
  private readonly intersectionById = new Map<ID, Intersection>();
  private readonly roadById = new Map<ID, Road>();
  private readonly roadsAt = new Map<ID, Road[]>();

  private constructor(
    readonly name: string,
    intersections: readonly Intersection[],
    roads: readonly Road[],
    readonly busRoutes: readonly BusRoute[],
    readonly useMapFixes: boolean,
    readonly edits?: MapEdits,
  ) {
    for (const i of intersections) {
      this.intersectionById.set(i.id, i);
      this.roadsAt.set(i.id, []);
    }
    for (const r of roads) {
      this.roadById.set(r.id, r);
      this.roadsAt.get(r.src)?.push(r);
      if (r.dst !== r.src) {
        this.roadsAt.get(r.dst)?.push(r);
      }
    }
  }

  static fromInput(input: MapInput, opts: MapBuildOptions): CityMap {
    let roads = input.roads.map((r) => ({ ...r, lanes: [...r.lanes] }));
    if (opts.useMapFixes) {
      const fixes = new Map(input.fixes.map((f) => [f.roadId, f]));
      roads = roads.map((r) => {
        const fix = fixes.get(r.id);
        if (!fix) return r;
        return {
          ...r,
          lanes: fix.lanes ? [...fix.lanes] : r.lanes,
          speedLimitMps: fix.speedLimitMps ?? r.speedLimitMps,
        };
      });
    }
    return new CityMap(
      input.name,
      input.intersections,
      roads,
      input.busRoutes,
      opts.useMapFixes,
    );
  }

  /** A new map with `edits` applied on top of this one. */
  withEdits(edits: MapEdits): CityMap {
    if (edits.mapName !== this.name) {
      throw new Error(
        `Edits ${edits.editsName} are for map ${edits.mapName}, not ${this.name}`,
      );
    }
    const roads = new Map<ID, Road>();
    for (const r of this.roadById.values()) {
      roads.set(r.id, { ...r, lanes: [...r.lanes] });
    }
    for (const cmd of edits.commands) {
      const road = roads.get(cmd.roadId);
      if (!road) {
        throw new Error(`Edit ${cmd.type} references unknown road ${cmd.roadId}`);
      }
      roads.set(road.id, applyEdit(road, cmd));
    }
    return new CityMap(
      this.name,
      [...this.intersectionById.values()],
      [...roads.values()],
      this.busRoutes,
      this.useMapFixes,
      edits,
    );
  }

  getRoad(id: ID): Road {
    const road = this.roadById.get(id);
    if (!road) {
      throw new Error(`Unknown road id: ${id}`);
    }
    return road;
  }

  hasIntersection(id: ID): boolean {
    return this.intersectionById.has(id);
  }

  allIntersections(): Intersection[] {
    return [...this.intersectionById.values()];
  }

  /** Roads touching an intersection, in map order. */
  roadsTouching(id: ID): readonly Road[] {
    return this.roadsAt.get(id) ?? [];
  }

  getBusRoute(name: string): BusRoute | undefined {
    return this.busRoutes.find((r) => r.name === name);
  }
}

function applyEdit(road: Road, cmd: EditCommand): Road {
  switch (cmd.type) {
    case 'changeLaneType': {
      if (cmd.lane < 0 || cmd.lane >= road.lanes.length) {
        throw new Error(`Road ${road.id} has no lane ${cmd.lane}`);
      }
      const lanes = [...road.lanes];
      lanes[cmd.lane] = cmd.laneType;
      return { ...road, lanes };
    }
    case 'changeSpeedLimit':
      return { ...road, speedLimitMps: cmd.speedLimitMps };
    case 'closeRoad':
      return { ...road, lanes: [] };
  }
}
