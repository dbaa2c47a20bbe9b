import { readFileSync } from 'node:fs';
import Mustache from 'mustache';
import { Duration } from '../time';
import { TRIP_MODES } from '../types';
import type { RunReport } from './emit';

const defaultTemplate = readFileSync(new URL('./templates/run.mustache', import.meta.url), 'utf8');
const defaultPartials = {
  modeRow: readFileSync(new URL('./templates/modeRow.mustache', import.meta.url), 'utf8'),
};

export interface EmitHtmlOptions {
  /** Override the base template */
  template?: string;
  /** Override or add partials */
  partials?: Record<string, string>;
}

interface ViewModel {
  mapName: string;
  scenarioName: string;
  seed: number;
  edits?: string;
  endedAt: string;
  reason: string;
  hasModes: boolean;
  modes: {
    mode: string;
    count: number;
    min: string;
    p50: string;
    p90: string;
    p99: string;
    max: string;
  }[];
  busRoutes: { name: string; average: string; segments: number }[];
  abortedTrips: number;
  unfinishedTrips: number;
  badness: number;
}

const fmt = (seconds: number) => Duration.seconds(seconds).toString();

export function emitHtml(report: RunReport, opts: EmitHtmlOptions = {}): string {
  const modes: ViewModel['modes'] = [];
  for (const mode of TRIP_MODES) {
    const s = report.tripTimes[mode];
    if (!s) continue;
    modes.push({
      mode,
      count: s.count,
      min: fmt(s.min),
      p50: fmt(s.p50),
      p90: fmt(s.p90),
      p99: fmt(s.p99),
      max: fmt(s.max),
    });
  }
  const view: ViewModel = {
    mapName: report.mapName,
    scenarioName: report.scenarioName,
    seed: report.seed,
    edits: report.edits ?? undefined,
    endedAt: report.endedAt,
    reason: report.reason,
    hasModes: modes.length > 0,
    modes,
    busRoutes: Object.entries(report.busRoutes).map(([name, r]) => ({
      name,
      average: fmt(r.averageBetweenStops),
      segments: r.segments,
    })),
    abortedTrips: report.gridlock.abortedTrips,
    unfinishedTrips: report.gridlock.unfinishedTrips,
    badness: report.gridlock.badness,
  };
  const template = opts.template ?? defaultTemplate;
  const partials = opts.partials ?? defaultPartials;
  return Mustache.render(template, view, partials);
}
