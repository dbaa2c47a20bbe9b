import { cpSync, mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { CityMap } from '../src/map';
import type { BusRoute, Intersection, LaneType, Road } from '../src/types';

const here = dirname(fileURLToPath(import.meta.url));
export const repoRoot = join(here, '..');
export const fixtureDataDir = join(repoRoot, 'fixtures', 'data');
export const shippedDataDir = join(repoRoot, 'data');

export const STREET: LaneType[] = ['sidewalk', 'parking', 'driving', 'driving', 'parking', 'sidewalk'];

export function road(
  id: string,
  src: string,
  dst: string,
  lengthM = 100,
  lanes: LaneType[] = STREET,
  speedLimitMps = 10,
): Road {
  return { id, src, dst, lengthM, speedLimitMps, lanes };
}

/**
 * a - b - c along the x axis, 100 m apart, plus an isolated `z`.
 * Cars cross each road in 100 ticks, walkers in 800, cyclists in 250.
 */
export function lineMap(busRoutes: BusRoute[] = []): CityMap {
  const intersections: Intersection[] = [
    { id: 'a', x: 0, y: 0 },
    { id: 'b', x: 100, y: 0 },
    { id: 'c', x: 200, y: 0 },
    { id: 'z', x: 0, y: 500 },
  ];
  return CityMap.fromInput(
    {
      name: 'line',
      intersections,
      roads: [road('ab', 'a', 'b'), road('bc', 'b', 'c')],
      busRoutes,
      fixes: [],
    },
    { useMapFixes: true },
  );
}

/** A scratch copy of a data directory, safe to write savestates and baselines into. */
export function scratchDataDir(from: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'citysim-'));
  cpSync(from, dir, { recursive: true });
  return dir;
}
