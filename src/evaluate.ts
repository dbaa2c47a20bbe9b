import type { Challenge } from './challenges';
import { describeGameplay } from './challenges';
import { ChallengeError } from './errors';
import type { PrebakedResults } from './io/prebaked';
import { badness } from './stats';
import type { RunStats } from './stats';

export type Verdict = { kind: 'pass'; detail: string } | { kind: 'fail'; reason: string };

export function requireBaseline(
  challenge: Challenge,
  baseline: PrebakedResults | undefined,
): PrebakedResults {
  if (!baseline) {
    throw new ChallengeError(
      `No baseline recorded for map ${challenge.mapName}; prebake it before playing "${challenge.title}"`,
    );
  }
  if (baseline.mapName !== challenge.mapName) {
    throw new ChallengeError(
      `Baseline is for map ${baseline.mapName}, but "${challenge.title}" is played on ${challenge.mapName}`,
    );
  }
  return baseline;
}

/** The gridlock goal is the only one scored without a baseline. */
export function needsBaseline(challenge: Challenge): boolean {
  return challenge.goal.kind !== 'increaseBadnessAbove';
}

function mismatch(challenge: Challenge): ChallengeError {
  return new ChallengeError(
    `Challenge "${challenge.title}" can't score ${describeGameplay(challenge.gameplay)} with a ${challenge.goal.kind} goal`,
  );
}

/**
 * Score a finished run. Trip and bus goals compare against the map's
 * baseline; the gridlock goal looks at the current run alone.
 */
export function evaluateChallenge(
  challenge: Challenge,
  current: RunStats,
  baseline?: PrebakedResults,
): Verdict {
  const { gameplay, goal } = challenge;
  switch (goal.kind) {
    case 'reduceMedianBy': {
      if (gameplay.kind !== 'fasterTrips' || gameplay.mode !== goal.mode) {
        throw mismatch(challenge);
      }
      const base = requireBaseline(challenge, baseline).fasterTrips.get(goal.mode);
      if (!base) {
        throw new ChallengeError(`Baseline for ${challenge.mapName} has no ${goal.mode} trips`);
      }
      const now = current.tripTimes.get(goal.mode);
      if (!now) {
        return { kind: 'fail', reason: `No ${goal.mode} trips finished` };
      }
      const target = base.p50.sub(goal.by);
      const summary = `${goal.mode} median ${now.p50} vs baseline ${base.p50}, needed ${target} or less`;
      return now.p50.compare(target) <= 0
        ? { kind: 'pass', detail: summary }
        : { kind: 'fail', reason: summary };
    }
    case 'reduceAverageWaitBy': {
      if (gameplay.kind !== 'optimizeBus' || gameplay.route !== goal.route) {
        throw mismatch(challenge);
      }
      const base = requireBaseline(challenge, baseline).busRoutes.get(goal.route);
      if (!base) {
        throw new ChallengeError(`Baseline for ${challenge.mapName} has no buses on route ${goal.route}`);
      }
      const now = current.busRoutes.get(goal.route);
      if (!now) {
        return { kind: 'fail', reason: `No buses on route ${goal.route} reached a stop` };
      }
      const target = base.averageBetweenStops.sub(goal.by);
      const summary = `route ${goal.route} averages ${now.averageBetweenStops} between stops vs baseline ${base.averageBetweenStops}, needed ${target} or less`;
      return now.averageBetweenStops.compare(target) <= 0
        ? { kind: 'pass', detail: summary }
        : { kind: 'fail', reason: summary };
    }
    case 'increaseBadnessAbove': {
      if (gameplay.kind !== 'createGridlock') {
        throw mismatch(challenge);
      }
      const score = badness(current.gridlock);
      const summary = `badness ${score} (aborted=${current.gridlock.abortedTrips} | unfinished=${current.gridlock.unfinishedTrips}), needed more than ${goal.threshold}`;
      return score > goal.threshold
        ? { kind: 'pass', detail: summary }
        : { kind: 'fail', reason: summary };
    }
  }
}
