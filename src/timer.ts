import { performance } from 'node:perf_hooks';

export type LogFn = (line: string) => void;

interface Phase {
  name: string;
  startedAt: number;
}

/** Nested phase timings and progress lines for long batch jobs. */
export class Timer {
  private readonly phases: Phase[] = [];

  constructor(
    readonly name: string,
    private readonly log: LogFn = (line) => console.log(line),
  ) {}

  static silent(name: string): Timer {
    return new Timer(name, () => {});
  }

  start(phase: string): void {
    this.log(`${this.indent()}${phase}...`);
    this.phases.push({ name: phase, startedAt: performance.now() });
  }

  stop(phase: string): number {
    const top = this.phases.pop();
    if (!top || top.name !== phase) {
      throw new Error(
        `Timer ${this.name}: stopped ${phase} while ${top?.name ?? 'nothing'} was running`,
      );
    }
    const seconds = (performance.now() - top.startedAt) / 1000;
    this.log(`${this.indent()}${phase} took ${seconds.toFixed(2)}s`);
    return seconds;
  }

  note(line: string): void {
    this.log(`${this.indent()}${line}`);
  }

  private indent(): string {
    return '  '.repeat(this.phases.length);
  }
}
