import { canUse, freeFlowTicks, type Mover } from './distance';
import type { CityMap } from './map';
import type { ID } from './types';

export interface PathStep {
  roadId: ID;
  /** Intersection reached at the end of this step. */
  to: ID;
}

interface Frontier {
  id: ID;
  cost: number;
  order: number;
}

/**
 * Cheapest free-flow route per mover. Ties go to whichever route was found
 * first, and roads are explored in map order, so results are reproducible.
 */
export class Pathfinder {
  private readonly cache = new Map<string, PathStep[] | null>();

  constructor(private readonly map: CityMap) {}

  findPath(from: ID, to: ID, mover: Mover): PathStep[] | null {
    const key = `${mover}|${from}|${to}`;
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached === null ? null : cached.slice();
    }
    const path = this.search(from, to, mover);
    this.cache.set(key, path);
    return path === null ? null : path.slice();
  }

  private search(from: ID, to: ID, mover: Mover): PathStep[] | null {
    if (!this.map.hasIntersection(from) || !this.map.hasIntersection(to)) {
      return null;
    }
    if (from === to) {
      return [];
    }
    const best = new Map<ID, number>([[from, 0]]);
    const parent = new Map<ID, PathStep & { from: ID }>();
    const done = new Set<ID>();
    const open: Frontier[] = [{ id: from, cost: 0, order: 0 }];
    let pushed = 1;

    while (open.length > 0) {
      let bestIdx = 0;
      for (let i = 1; i < open.length; i++) {
        const a = open[i];
        const b = open[bestIdx];
        if (a.cost < b.cost || (a.cost === b.cost && a.order < b.order)) {
          bestIdx = i;
        }
      }
      const current = open.splice(bestIdx, 1)[0];
      if (done.has(current.id)) continue;
      done.add(current.id);
      if (current.id === to) break;

      for (const road of this.map.roadsTouching(current.id)) {
        if (!canUse(road, mover)) continue;
        const next = road.src === current.id ? road.dst : road.src;
        if (done.has(next)) continue;
        const cost = current.cost + freeFlowTicks(road, mover);
        const known = best.get(next);
        if (known === undefined || cost < known) {
          best.set(next, cost);
          parent.set(next, { roadId: road.id, to: next, from: current.id });
          open.push({ id: next, cost, order: pushed++ });
        }
      }
    }

    if (!done.has(to)) {
      return null;
    }
    const steps: PathStep[] = [];
    let at = to;
    while (at !== from) {
      const p = parent.get(at);
      if (!p) return null;
      steps.push({ roadId: p.roadId, to: p.to });
      at = p.from;
    }
    return steps.reverse();
  }
}
