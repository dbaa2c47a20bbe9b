import { Command } from 'commander';
import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { headless } from './app/headless';
import { prebake, prebakeAll } from './app/prebake';
import { runChallenge } from './app/runChallenge';
import { freezeFlags } from './app/load';
import { allChallenges, findChallenge } from './challenges';
import { ConfigError, SimError } from './errors';
import { buildRunReport, emitJson, emitMarkdown } from './io/emit';
import { emitHtml } from './io/emitHtml';
import { loadEdits } from './io/parse';
import { resolveDataDir } from './io/paths';
import type { RunStats } from './stats';
import { isValidSeed } from './random';
import { Duration, formatTimestampToken } from './time';
import { Timer } from './timer';
import { TRIP_MODES } from './types';

interface HeadlessCliOptions {
  rng_seed?: string;
  save_at?: string;
  big_sim?: boolean;
  scenario_name: string;
  data_dir?: string;
  edits?: string;
  no_map_fixes?: boolean;
  savestate_every?: string;
  out?: string;
  html?: string | boolean;
}

interface PrebakeCliOptions {
  map?: string;
  scenario?: string;
  rng_seed?: string;
  data_dir?: string;
}

interface ChallengeCliOptions {
  scenario?: string;
  rng_seed?: string;
  edits?: string;
  data_dir?: string;
}

function parseSeed(text: string | undefined): number | undefined {
  if (text === undefined) return undefined;
  const seed = Number(text);
  if (!/^\d+$/.test(text.trim()) || !isValidSeed(seed)) {
    throw new ConfigError(`--rng_seed must be a non-negative integer, got ${text}`);
  }
  return seed;
}

function parseInterval(text: string | undefined): Duration | undefined {
  if (text === undefined) return undefined;
  const d = Duration.parse(text);
  if (!d || d.ticks <= 0) {
    throw new ConfigError(`--savestate_every must be a positive time like 00:30:00, got ${text}`);
  }
  return d;
}

function writeOutput(path: string, contents: string): void {
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, contents, 'utf8');
  console.log(`Wrote ${path}`);
}

function printStats(stats: RunStats): void {
  for (const mode of TRIP_MODES) {
    const s = stats.tripTimes.get(mode);
    if (!s) continue;
    console.log(
      [`mode=${mode}`, `trips=${s.count}`, `p50=${s.p50}`, `p90=${s.p90}`, `max=${s.max}`].join(' | '),
    );
  }
  const { abortedTrips, unfinishedTrips } = stats.gridlock;
  console.log(`aborted=${abortedTrips} | unfinished=${unfinishedTrips}`);
}

/** Library errors are reported; anything else is a bug and propagates. */
function reportErrors(action: () => void): void {
  try {
    action();
  } catch (err) {
    if (!(err instanceof SimError)) throw err;
    console.error(`error [${err.code}]: ${err.message}`);
    process.exitCode = 1;
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('citysim')
    .description('Headless traffic simulation runs, baselines and challenges')
    .version('0.1.0')
    .showHelpAfterError();

  program
    .command('headless', { isDefault: true })
    .description('Run a map, scenario or savestate to completion')
    .argument('<load>', 'Map, scenario or savestate JSON file')
    .option('--rng_seed <n>', 'Seed for the random stream')
    .option('--save_at <time>', 'Save and stop at this simulated time (HH:MM:SS)')
    .option('--big_sim', 'Spawn the big demand profile on a bare map')
    .option('--scenario_name <name>', 'Name for runs that load a bare map', 'headless')
    .option('--data_dir <dir>', 'Data directory (maps, scenarios, saves)')
    .option('--edits <file>', 'Apply these map edits before running')
    .option('--no_map_fixes', 'Skip the fixes shipped with the map')
    .option('--savestate_every <time>', 'Save periodically at this interval')
    .option('--out <file>', 'Write the run report JSON to this path (overwrite)')
    .option('--html [file]', 'Write the HTML run report to this path (or stdout)')
    .action((load: string, opts: HeadlessCliOptions) =>
      reportErrors(() => {
        const dataDir = resolveDataDir(opts.data_dir);
        const edits = opts.edits ? loadEdits(opts.edits) : undefined;
        const flags = freezeFlags({
          load,
          useMapFixes: !opts.no_map_fixes,
          rngSeed: parseSeed(opts.rng_seed),
          opts: {
            runName: opts.scenario_name,
            dataDir,
            savestateEvery: parseInterval(opts.savestate_every),
            edits,
          },
        });
        const timer = new Timer('headless');
        const result = headless({ flags, bigSim: opts.big_sim, saveAt: opts.save_at, timer });
        const runTs = new Date().toISOString();
        const report = buildRunReport(
          {
            mapName: result.sim.map.name,
            scenarioName: result.sim.scenarioName,
            seed: result.sim.rng.seed,
            edits: edits?.editsName,
            outcome: result.outcome,
            stats: result.stats,
          },
          runTs,
        );
        const tsToken = formatTimestampToken(runTs);
        const tokenize = (s: string): string => s.replace(/\$\{timestamp\}/g, tsToken);

        printStats(result.stats);
        if (opts.out) {
          writeOutput(tokenize(opts.out), emitJson(report));
        }
        if (opts.html !== undefined) {
          const html = emitHtml(report);
          if (typeof opts.html === 'string') {
            writeOutput(tokenize(opts.html), html);
          } else {
            console.log(html);
          }
        }
        console.log(emitMarkdown(report));
      }),
    );

  program
    .command('prebake')
    .description('Record baseline statistics for challenge scoring')
    .option('--map <name>', 'Map to prebake (default: every challenge map)')
    .option('--scenario <name>', 'Scenario to run (default: the reference scenario)')
    .option('--rng_seed <n>', 'Seed for the random stream (required)')
    .option('--data_dir <dir>', 'Data directory (maps, scenarios, saves)')
    .action((opts: PrebakeCliOptions) =>
      reportErrors(() => {
        const dataDir = resolveDataDir(opts.data_dir);
        const seed = parseSeed(opts.rng_seed);
        const timer = new Timer('prebake');
        const results = opts.map
          ? [prebake({ mapName: opts.map, scenarioName: opts.scenario, seed, dataDir, timer })]
          : prebakeAll({ seed, dataDir, timer });
        for (const r of results) {
          console.log(`Wrote ${r.path}`);
        }
      }),
    );

  program
    .command('challenges')
    .description('List the challenge catalog')
    .action(() => {
      for (const c of allChallenges()) {
        console.log(`${c.title} | map=${c.mapName} | ${c.description}`);
      }
    });

  program
    .command('challenge')
    .description('Rerun a challenge map with edits and score it against the baseline')
    .argument('<title>', 'Challenge title, as listed by `challenges`')
    .option('--scenario <name>', 'Scenario to run (default: the baseline scenario)')
    .option('--rng_seed <n>', 'Seed for the random stream (default: the seed of the baseline)')
    .option('--edits <file>', 'Map edits to play')
    .option('--data_dir <dir>', 'Data directory (maps, scenarios, saves)')
    .action((title: string, opts: ChallengeCliOptions) =>
      reportErrors(() => {
        const challenge = findChallenge(title);
        if (!challenge) {
          throw new ConfigError(`No challenge titled "${title}"`);
        }
        const result = runChallenge({
          challenge,
          scenarioName: opts.scenario,
          seed: parseSeed(opts.rng_seed),
          edits: opts.edits ? loadEdits(opts.edits) : undefined,
          dataDir: resolveDataDir(opts.data_dir),
          timer: new Timer('challenge'),
        });
        printStats(result.stats);
        console.log(
          result.verdict.kind === 'pass'
            ? `PASS: ${result.verdict.detail}`
            : `FAIL: ${result.verdict.reason}`,
        );
      }),
    );

  return program;
}

export const program = buildProgram();

/** Parse `argv` with a fresh program so repeated runs don't share option state. */
export function run(argv: readonly string[] = process.argv): Command {
  const cli = buildProgram();
  cli.parse([...argv]);
  return cli;
}

if (process.argv[1] && fileURLToPath(import.meta.url) === process.argv[1]) {
  run();
}
