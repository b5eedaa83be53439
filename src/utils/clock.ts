/** Source of "now" in whole seconds, the resolution draws are timed in. */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};

/** Clock that only moves when told to. Used by tests and local tooling. */
export class ManualClock implements Clock {
  constructor(private current: number = 1_700_000_000) {}

  now(): number {
    return this.current;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }

  set(timestamp: number): void {
    this.current = timestamp;
  }
}
