import { Duration } from './time';
import type { TripMode } from './types';

/** What a challenge measures. */
export type GameplayMode =
  | { kind: 'optimizeBus'; route: string }
  | { kind: 'createGridlock' }
  | { kind: 'fasterTrips'; mode: TripMode };

/** How a challenge is scored, with its threshold as data. */
export type ChallengeGoal =
  | { kind: 'reduceMedianBy'; mode: TripMode; by: Duration }
  | { kind: 'reduceAverageWaitBy'; route: string; by: Duration }
  | { kind: 'increaseBadnessAbove'; threshold: number };

export interface Challenge {
  readonly title: string;
  readonly description: string;
  readonly mapName: string;
  readonly gameplay: Readonly<GameplayMode>;
  readonly goal: Readonly<ChallengeGoal>;
}

function challenge(c: Challenge): Challenge {
  return Object.freeze({
    ...c,
    gameplay: Object.freeze({ ...c.gameplay }),
    goal: Object.freeze({ ...c.goal }),
  });
}

const CATALOG: readonly Challenge[] = Object.freeze([
  challenge({
    title: 'Speed up route 48 (just Montlake area)',
    description:
      "Decrease the average waiting time between all of route 48's stops by at least 30s",
    mapName: 'montlake',
    gameplay: { kind: 'optimizeBus', route: '48' },
    goal: { kind: 'reduceAverageWaitBy', route: '48', by: Duration.seconds(30) },
  }),
  challenge({
    title: 'Speed up route 48 (larger section)',
    description: "Decrease the average waiting time between all of 48's stops by at least 30s",
    mapName: '23rd',
    gameplay: { kind: 'optimizeBus', route: '48' },
    goal: { kind: 'reduceAverageWaitBy', route: '48', by: Duration.seconds(30) },
  }),
  challenge({
    title: 'Gridlock all of the everything',
    description: 'Make traffic as BAD as possible!',
    mapName: 'montlake',
    gameplay: { kind: 'createGridlock' },
    // Any trip that fails to finish by end of day counts.
    goal: { kind: 'increaseBadnessAbove', threshold: 0 },
  }),
  challenge({
    title: 'Speed up all bike trips',
    description: 'Reduce the 50%ile trip times of bikes by at least 1 minute',
    mapName: 'montlake',
    gameplay: { kind: 'fasterTrips', mode: 'bike' },
    goal: { kind: 'reduceMedianBy', mode: 'bike', by: Duration.minutes(1) },
  }),
  challenge({
    title: 'Speed up all car trips',
    description: 'Reduce the 50%ile trip times of drivers by at least 5 minutes',
    mapName: 'montlake',
    gameplay: { kind: 'fasterTrips', mode: 'drive' },
    goal: { kind: 'reduceMedianBy', mode: 'drive', by: Duration.minutes(5) },
  }),
]);

export function allChallenges(): readonly Challenge[] {
  return CATALOG;
}

export function findChallenge(title: string): Challenge | undefined {
  return CATALOG.find((c) => c.title === title);
}

/** Maps that at least one challenge is played on, in catalog order. */
export function challengeMaps(): string[] {
  return [...new Set(CATALOG.map((c) => c.mapName))];
}

export function describeGameplay(mode: GameplayMode): string {
  switch (mode.kind) {
    case 'optimizeBus':
      return `optimize bus route ${mode.route}`;
    case 'createGridlock':
      return 'create gridlock';
    case 'fasterTrips':
      return `faster ${mode.mode} trips`;
  }
}
