import { describe, it, expect } from 'vitest';
import type { RunOutcome } from '../src/driver';
import { buildRunReport, emitJson, emitMarkdown } from '../src/io/emit';
import { emitHtml } from '../src/io/emitHtml';
import type { DurationStats, RunStats } from '../src/stats';
import { Duration, Tick } from '../src/time';
import type { TripMode } from '../src/types';

function stats(...seconds: [number, number, number, number, number]): DurationStats {
  const [min, p50, p90, p99, max] = seconds.map((s) => Duration.seconds(s));
  return { count: 4, min, p50, p90, p99, max };
}

const runStats: RunStats = {
  tripTimes: new Map<TripMode, DurationStats>([
    ['drive', stats(60, 90, 120, 150, 150)],
    ['walk', stats(300, 600, 900, 1200, 1200.5)],
  ]),
  busRoutes: new Map([['48', { segments: 6, averageBetweenStops: Duration.seconds(125) }]]),
  gridlock: { abortedTrips: 1, unfinishedTrips: 2 },
};

const outcome: RunOutcome = {
  reason: 'done',
  haltedBy: [],
  time: Tick.fromTicks(36000),
  steps: 36000,
  savedTo: [],
};

const report = buildRunReport(
  { mapName: 'montlake', scenarioName: 'rush', seed: 7, outcome, stats: runStats },
  '2024-01-01T00:00:00.000Z',
);

describe('run reports', () => {
  it('write durations in seconds, modes in a fixed order', () => {
    const parsed = JSON.parse(emitJson(report));
    expect(Object.keys(parsed.tripTimes)).toEqual(['walk', 'drive']);
    expect(parsed.tripTimes.walk).toEqual({ count: 4, min: 300, p50: 600, p90: 900, p99: 1200, max: 1200.5 });
    expect(parsed.busRoutes).toEqual({ '48': { segments: 6, averageBetweenStops: 125 } });
    expect(parsed.gridlock).toEqual({ abortedTrips: 1, unfinishedTrips: 2, badness: 3 });
    expect(parsed.endedAt).toBe('01:00:00.0');
    expect(parsed.edits).toBeNull();
  });

  it('summarize as Markdown', () => {
    const lines = emitMarkdown(report).split('\n');
    expect(lines[0]).toBe('# Run Summary: montlake / rush');
    expect(lines).toContain('| drive | 4 | 00:01:00.0 | 00:01:30.0 | 00:02:00.0 | 00:02:30.0 | 00:02:30.0 |');
    expect(lines).toContain('- **48** – 00:02:05.0 between stops over 6 legs');
    expect(lines).toContain('- aborted=1 | unfinished=2 | badness=3');
  });

  it('render HTML rows per mode', () => {
    const html = emitHtml(report);
    expect(html).toContain(
      '<tr><td>walk</td><td>4</td><td>00:05:00.0</td><td>00:10:00.0</td><td>00:15:00.0</td><td>00:20:00.0</td><td>00:20:00.5</td></tr>',
    );
    expect(html).toContain('<li>48: 00:02:05.0 between stops over 6 legs</li>');
    expect(html).toContain('<p>Aborted 1, unfinished 2, badness 3.</p>');
  });

  it('accept a replacement template', () => {
    expect(emitHtml(report, { template: '{{mapName}}:{{#modes}}{{mode}};{{/modes}}' })).toBe(
      'montlake:walk;drive;',
    );
  });
});
