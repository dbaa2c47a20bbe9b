import { Duration } from './time';
import type { TripLedger } from './ledger';
import type { TripMode } from './types';

export interface DurationStats {
  readonly count: number;
  readonly min: Duration;
  readonly p50: Duration;
  readonly p90: Duration;
  readonly p99: Duration;
  readonly max: Duration;
}

/**
 * Multiset of observed durations. Only counts per value are kept, so the
 * order values arrive in can't affect the result.
 */
export class DurationHistogram {
  private readonly counts = new Map<number, number>();
  private total = 0;

  add(d: Duration): void {
    this.counts.set(d.ticks, (this.counts.get(d.ticks) ?? 0) + 1);
    this.total++;
  }

  get count(): number {
    return this.total;
  }

  /** Nearest-rank percentile; `p` in (0, 100]. */
  percentile(p: number): Duration {
    if (this.total === 0) {
      throw new RangeError('Percentile of an empty histogram');
    }
    const rank = Math.max(1, Math.ceil((p / 100) * this.total));
    let seen = 0;
    const keys = [...this.counts.keys()].sort((a, b) => a - b);
    for (const ticks of keys) {
      seen += this.counts.get(ticks) ?? 0;
      if (seen >= rank) {
        return Duration.fromTicks(ticks);
      }
    }
    return Duration.fromTicks(keys[keys.length - 1]);
  }

  toStats(): DurationStats {
    const keys = [...this.counts.keys()].sort((a, b) => a - b);
    if (keys.length === 0) {
      throw new RangeError('No durations recorded');
    }
    return Object.freeze({
      count: this.total,
      min: Duration.fromTicks(keys[0]),
      p50: this.percentile(50),
      p90: this.percentile(90),
      p99: this.percentile(99),
      max: Duration.fromTicks(keys[keys.length - 1]),
    });
  }
}

/**
 * Stats per travel mode. Modes with no finished trips are left out, so an
 * empty ledger yields an empty map.
 */
export function aggregateTrips(ledger: TripLedger): Map<TripMode, DurationStats> {
  const histograms = new Map<TripMode, DurationHistogram>();
  for (const trip of ledger.all()) {
    let h = histograms.get(trip.mode);
    if (!h) {
      h = new DurationHistogram();
      histograms.set(trip.mode, h);
    }
    h.add(trip.duration);
  }
  const stats = new Map<TripMode, DurationStats>();
  for (const [mode, h] of histograms) {
    stats.set(mode, h.toStats());
  }
  return stats;
}

export interface BusRouteStats {
  /** Stop-to-stop legs observed. */
  readonly segments: number;
  readonly averageBetweenStops: Duration;
}

export function summarizeBusSegments(segmentTicks: readonly number[]): BusRouteStats | undefined {
  if (segmentTicks.length === 0) return undefined;
  const sum = segmentTicks.reduce((acc, t) => acc + t, 0);
  return Object.freeze({
    segments: segmentTicks.length,
    averageBetweenStops: Duration.fromTicks(Math.round(sum / segmentTicks.length)),
  });
}

export interface GridlockStats {
  /** Trips that never found a route. */
  readonly abortedTrips: number;
  /** Trips still travelling or waiting to depart when stats were taken. */
  readonly unfinishedTrips: number;
}

export function badness(g: GridlockStats): number {
  return g.abortedTrips + g.unfinishedTrips;
}

export interface RunStats {
  readonly tripTimes: Map<TripMode, DurationStats>;
  readonly busRoutes: Map<string, BusRouteStats>;
  readonly gridlock: GridlockStats;
}

/** What the engine needs to expose for a run to be summarized. */
export interface RunStatsSource {
  ledger: TripLedger;
  busSegments(): ReadonlyMap<string, readonly number[]>;
  gridlockStats(): GridlockStats;
}

export function collectRunStats(source: RunStatsSource): RunStats {
  const busRoutes = new Map<string, BusRouteStats>();
  for (const [route, segments] of source.busSegments()) {
    const s = summarizeBusSegments(segments);
    if (s) busRoutes.set(route, s);
  }
  return {
    tripTimes: aggregateTrips(source.ledger),
    busRoutes,
    gridlock: source.gridlockStats(),
  };
}
