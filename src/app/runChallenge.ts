import type { Challenge } from '../challenges';
import { ChallengeError } from '../errors';
import { evaluateChallenge, needsBaseline, requireBaseline } from '../evaluate';
import type { Verdict } from '../evaluate';
import { readPrebaked } from '../io/prebaked';
import type { PrebakedResults } from '../io/prebaked';
import type { RunStats } from '../stats';
import type { Timer } from '../timer';
import type { MapEdits } from '../types';
import { REFERENCE_SCENARIO, runScenarioToEndOfDay } from './prebake';

export interface RunChallengeOptions {
  challenge: Challenge;
  scenarioName?: string;
  seed: number | undefined;
  edits?: MapEdits;
  dataDir: string;
  timer?: Timer;
}

export interface ChallengeRun {
  verdict: Verdict;
  stats: RunStats;
  baseline?: PrebakedResults;
}

/**
 * Rerun the challenge's map with the player's edits and score it. The rerun
 * replays the baseline's demand, so it takes the baseline's seed.
 */
export function runChallenge(opts: RunChallengeOptions): ChallengeRun {
  const { challenge } = opts;
  const baseline = readPrebaked(opts.dataDir, challenge.mapName);
  if (needsBaseline(challenge)) {
    const recorded = requireBaseline(challenge, baseline);
    if (opts.seed !== undefined && opts.seed !== recorded.seed) {
      throw new ChallengeError(
        `The ${challenge.mapName} baseline was recorded with --rng_seed ${recorded.seed}, not ${opts.seed}`,
      );
    }
  }
  const run = runScenarioToEndOfDay({
    mapName: challenge.mapName,
    scenarioName: opts.scenarioName ?? baseline?.scenarioName ?? REFERENCE_SCENARIO,
    seed: opts.seed ?? baseline?.seed,
    dataDir: opts.dataDir,
    edits: opts.edits,
    timer: opts.timer,
    purpose: 'Scoring a challenge',
  });
  const verdict = evaluateChallenge(challenge, run.stats, baseline);
  return { verdict, stats: run.stats, baseline };
}
