import { join } from 'node:path';
import type { Tick } from '../time';

export const DATA_DIR_ENV = 'CITYSIM_DATA_DIR';
export const DEFAULT_DATA_DIR = 'data';

/** Flag first, then the environment, then `data` under the working directory. */
export function resolveDataDir(flag?: string, env: NodeJS.ProcessEnv = process.env): string {
  return flag ?? env[DATA_DIR_ENV] ?? DEFAULT_DATA_DIR;
}

export function pathMap(dataDir: string, mapName: string): string {
  return join(dataDir, 'maps', `${mapName}.json`);
}

export function pathScenario(dataDir: string, mapName: string, scenarioName: string): string {
  return join(dataDir, 'scenarios', mapName, `${scenarioName}.json`);
}

// Colons aren't allowed in file names everywhere.
export function pathSavestate(
  dataDir: string,
  mapName: string,
  scenarioName: string,
  tick: Tick,
): string {
  const stamp = tick.toString().replace(/:/g, '_');
  return join(dataDir, 'save', mapName, scenarioName, `${stamp}.json`);
}

export function pathPrebaked(dataDir: string, mapName: string): string {
  return join(dataDir, 'prebaked_results', `${mapName}.json`);
}
