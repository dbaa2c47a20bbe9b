import type { RunOutcome } from '../driver';
import { badness } from '../stats';
import type { BusRouteStats, DurationStats, RunStats } from '../stats';
import { Duration } from '../time';
import { TRIP_MODES } from '../types';
import type { TripMode } from '../types';

/** DurationStats as written to disk, every duration in seconds. */
export interface DurationStatsJson {
  count: number;
  min: number;
  p50: number;
  p90: number;
  p99: number;
  max: number;
}

export interface BusRouteStatsJson {
  segments: number;
  averageBetweenStops: number;
}

export function tripTimesToJson(
  stats: ReadonlyMap<TripMode, DurationStats>,
): Partial<Record<TripMode, DurationStatsJson>> {
  const out: Partial<Record<TripMode, DurationStatsJson>> = {};
  for (const mode of TRIP_MODES) {
    const s = stats.get(mode);
    if (!s) continue;
    out[mode] = {
      count: s.count,
      min: s.min.inSeconds(),
      p50: s.p50.inSeconds(),
      p90: s.p90.inSeconds(),
      p99: s.p99.inSeconds(),
      max: s.max.inSeconds(),
    };
  }
  return out;
}

export function tripTimesFromJson(
  json: Partial<Record<TripMode, DurationStatsJson>>,
): Map<TripMode, DurationStats> {
  const out = new Map<TripMode, DurationStats>();
  for (const mode of TRIP_MODES) {
    const s = json[mode];
    if (!s) continue;
    out.set(
      mode,
      Object.freeze({
        count: s.count,
        min: Duration.seconds(s.min),
        p50: Duration.seconds(s.p50),
        p90: Duration.seconds(s.p90),
        p99: Duration.seconds(s.p99),
        max: Duration.seconds(s.max),
      }),
    );
  }
  return out;
}

export function busRoutesToJson(
  stats: ReadonlyMap<string, BusRouteStats>,
): Record<string, BusRouteStatsJson> {
  const out: Record<string, BusRouteStatsJson> = {};
  for (const name of [...stats.keys()].sort()) {
    const s = stats.get(name);
    if (!s) continue;
    out[name] = { segments: s.segments, averageBetweenStops: s.averageBetweenStops.inSeconds() };
  }
  return out;
}

export function busRoutesFromJson(
  json: Record<string, BusRouteStatsJson>,
): Map<string, BusRouteStats> {
  const out = new Map<string, BusRouteStats>();
  for (const [name, s] of Object.entries(json)) {
    out.set(
      name,
      Object.freeze({
        segments: s.segments,
        averageBetweenStops: Duration.seconds(s.averageBetweenStops),
      }),
    );
  }
  return out;
}

export interface RunReportInput {
  mapName: string;
  scenarioName: string;
  seed: number;
  edits?: string;
  outcome: RunOutcome;
  stats: RunStats;
}

export interface RunReport {
  runTimestamp: string;
  mapName: string;
  scenarioName: string;
  seed: number;
  edits: string | null;
  endedAt: string;
  reason: RunOutcome['reason'];
  savedTo: string[];
  tripTimes: Partial<Record<TripMode, DurationStatsJson>>;
  busRoutes: Record<string, BusRouteStatsJson>;
  gridlock: { abortedTrips: number; unfinishedTrips: number; badness: number };
}

export function buildRunReport(
  input: RunReportInput,
  runTimestamp = new Date().toISOString(),
): RunReport {
  const { gridlock } = input.stats;
  return {
    runTimestamp,
    mapName: input.mapName,
    scenarioName: input.scenarioName,
    seed: input.seed,
    edits: input.edits ?? null,
    endedAt: input.outcome.time.toString(),
    reason: input.outcome.reason,
    savedTo: [...input.outcome.savedTo],
    tripTimes: tripTimesToJson(input.stats.tripTimes),
    busRoutes: busRoutesToJson(input.stats.busRoutes),
    gridlock: {
      abortedTrips: gridlock.abortedTrips,
      unfinishedTrips: gridlock.unfinishedTrips,
      badness: badness(gridlock),
    },
  };
}

export function emitJson(report: RunReport): string {
  return JSON.stringify(report, null, 2);
}

const fmt = (seconds: number) => Duration.seconds(seconds).toString();

/** Trip-time table plus bus and gridlock notes. */
export function emitMarkdown(report: RunReport): string {
  const lines: string[] = [
    `# Run Summary: ${report.mapName} / ${report.scenarioName}`,
    '',
    `Seed ${report.seed}, ended at ${report.endedAt} (${report.reason}).`,
    '',
    '| Mode | Trips | Min | Median | p90 | p99 | Max |',
    '| ---- | -----:| ---:| ------:| ---:| ---:| ---:|',
  ];
  for (const mode of TRIP_MODES) {
    const s = report.tripTimes[mode];
    if (!s) continue;
    lines.push(
      `| ${mode} | ${s.count} | ${fmt(s.min)} | ${fmt(s.p50)} | ${fmt(s.p90)} | ${fmt(s.p99)} | ${fmt(s.max)} |`,
    );
  }
  lines.push('', '## Bus Routes', '');
  const routes = Object.entries(report.busRoutes);
  if (routes.length === 0) {
    lines.push('_None_');
  }
  for (const [name, r] of routes) {
    lines.push(`- **${name}** – ${fmt(r.averageBetweenStops)} between stops over ${r.segments} legs`);
  }
  lines.push(
    '',
    '## Gridlock',
    '',
    `- aborted=${report.gridlock.abortedTrips} | unfinished=${report.gridlock.unfinishedTrips} | badness=${report.gridlock.badness}`,
    '',
  );
  return lines.join('\n');
}
