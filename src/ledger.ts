import type { TripRecord } from './types';

/** Append-only history of the trips finished in one run. */
export class TripLedger {
  private readonly records: TripRecord[] = [];

  record(trip: TripRecord): void {
    this.records.push(Object.freeze({ ...trip }));
  }

  /** Trips in completion order. */
  all(): readonly TripRecord[] {
    return this.records.slice();
  }

  get size(): number {
    return this.records.length;
  }
}
