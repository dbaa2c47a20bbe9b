/** Simulated time is counted in ticks of a tenth of a second. */
export const TICKS_PER_SECOND = 10;

function checked(value: number, what: string): number {
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`${what} out of range: ${value}`);
  }
  return value;
}

const pad = (n: number, width = 2) => String(n).padStart(width, '0');

function formatTicks(ticks: number): string {
  const tenths = ticks % TICKS_PER_SECOND;
  const totalSec = Math.floor(ticks / TICKS_PER_SECOND);
  const h = Math.floor(totalSec / 3600);
  const m = Math.floor((totalSec % 3600) / 60);
  const s = totalSec % 60;
  return `${pad(h)}:${pad(m)}:${pad(s)}.${tenths}`;
}

function parseTicks(text: string): number | undefined {
  const str = text.trim();
  const full = str.match(/^(\d+):([0-5]\d):([0-5]\d)(?:\.(\d))?$/);
  const short = full ? null : str.match(/^(\d+):([0-5]\d)$/);
  const m = full ?? short;
  if (!m) return undefined;
  const hours = Number(m[1]);
  const minutes = Number(m[2]);
  const seconds = full ? Number(m[3]) : 0;
  const tenths = full && m[4] !== undefined ? Number(m[4]) : 0;
  const ticks =
    ((hours * 3600 + minutes * 60 + seconds) * TICKS_PER_SECOND) + tenths;
  return Number.isSafeInteger(ticks) ? ticks : undefined;
}

/** A signed span of simulated time. */
export class Duration {
  static readonly ZERO = new Duration(0);

  private constructor(readonly ticks: number) {}

  static fromTicks(ticks: number): Duration {
    return new Duration(checked(ticks, 'Duration'));
  }

  static seconds(s: number): Duration {
    return Duration.fromTicks(Math.round(s * TICKS_PER_SECOND));
  }

  static minutes(m: number): Duration {
    return Duration.seconds(m * 60);
  }

  static hours(h: number): Duration {
    return Duration.seconds(h * 3600);
  }

  /** Parses the same text as {@link Tick.parse}, read as an offset from midnight. */
  static parse(text: string): Duration | undefined {
    const ticks = parseTicks(text);
    return ticks === undefined ? undefined : new Duration(ticks);
  }

  add(other: Duration): Duration {
    return Duration.fromTicks(this.ticks + other.ticks);
  }

  sub(other: Duration): Duration {
    return Duration.fromTicks(this.ticks - other.ticks);
  }

  compare(other: Duration): number {
    return this.ticks - other.ticks;
  }

  equals(other: Duration): boolean {
    return this.ticks === other.ticks;
  }

  inSeconds(): number {
    return this.ticks / TICKS_PER_SECOND;
  }

  toString(): string {
    return this.ticks < 0 ? `-${formatTicks(-this.ticks)}` : formatTicks(this.ticks);
  }

  static readonly END_OF_DAY = Duration.hours(24);
}

/** A point on the simulated timeline, counted from the start of the run. */
export class Tick {
  private constructor(readonly ticks: number) {}

  static zero(): Tick {
    return new Tick(0);
  }

  static fromTicks(ticks: number): Tick {
    checked(ticks, 'Tick');
    if (ticks < 0) {
      throw new RangeError(`Tick cannot be negative: ${ticks}`);
    }
    return new Tick(ticks);
  }

  static fromSeconds(s: number): Tick {
    return Tick.fromTicks(Math.round(s * TICKS_PER_SECOND));
  }

  /**
   * Parse `HH:MM:SS.T`, `HH:MM:SS` or `HH:MM`. Returns undefined on malformed
   * text; callers decide how to report it.
   */
  static parse(text: string): Tick | undefined {
    const ticks = parseTicks(text);
    return ticks === undefined ? undefined : new Tick(ticks);
  }

  static readonly END_OF_DAY = Tick.fromTicks(Duration.END_OF_DAY.ticks);

  add(d: Duration): Tick {
    return Tick.fromTicks(this.ticks + d.ticks);
  }

  /** Time elapsed since `earlier`. */
  sub(earlier: Tick): Duration {
    return Duration.fromTicks(this.ticks - earlier.ticks);
  }

  compare(other: Tick): number {
    return this.ticks - other.ticks;
  }

  equals(other: Tick): boolean {
    return this.ticks === other.ticks;
  }

  isZero(): boolean {
    return this.ticks === 0;
  }

  /** True when this tick lands on a whole multiple of `interval`. */
  isMultipleOf(interval: Duration): boolean {
    return interval.ticks > 0 && this.ticks % interval.ticks === 0;
  }

  inSeconds(): number {
    return this.ticks / TICKS_PER_SECOND;
  }

  toString(): string {
    return formatTicks(this.ticks);
  }
}

/** Wall-clock token used when expanding `${timestamp}` in output paths. */
export function formatTimestampToken(ts: string): string {
  const d = new Date(ts);
  return `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(
    d.getUTCDate(),
  )}T${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}`;
}
