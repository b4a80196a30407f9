/**
 * Time source for the dispatch engine. Tests pass a fixed clock.
 */
export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date()
};

/**
 * Clock that always reports the given instant until moved
 */
export class FixedClock implements Clock {
  private current: Date;

  constructor(start: Date | string) {
    this.current = new Date(start);
  }

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(instant: Date | string): void {
    this.current = new Date(instant);
  }

  advanceMinutes(minutes: number): void {
    this.current = new Date(this.current.getTime() + minutes * 60 * 1000);
  }
}

/**
 * YYYY-MM-DD of the instant in UTC
 */
export function utcDay(instant: Date | string): string {
  return new Date(instant).toISOString().slice(0, 10);
}
