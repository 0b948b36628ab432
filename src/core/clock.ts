import { z } from "zod";

/**
 * Time source injected into the collaboration components so expiry and
 * liveness can be driven deterministically.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

/**
 * Clock that only moves when told to
 */
export class ManualClock implements Clock {
  private current: number;

  constructor(start: Date | string = "2024-01-01T00:00:00.000Z") {
    this.current = new Date(start).getTime();
  }

  now(): Date {
    return new Date(this.current);
  }

  advance(ms: number): Date {
    this.current += ms;
    return this.now();
  }

  set(time: Date | string): void {
    this.current = new Date(time).getTime();
  }
}

export function addMs(time: Date, ms: number): Date {
  return new Date(time.getTime() + ms);
}

/**
 * ISO-8601 UTC timestamp, normalized to `Date#toISOString` form so stored
 * values order correctly as strings
 */
export const IsoTimestampSchema = z
  .string()
  .datetime({ offset: true })
  .transform((value) => new Date(value).toISOString());
