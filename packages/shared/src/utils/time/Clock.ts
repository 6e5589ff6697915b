export interface Clock {
  /** Milliseconds since the epoch */
  now(): number;
  date(): Date;
}

export class SystemClock implements Clock {
  now(): number {
    return Date.now();
  }

  date(): Date {
    return new Date();
  }
}

/**
 * Clock that only moves when told to. Used for replays and tests.
 */
export class ManualClock implements Clock {
  private currentTime: number;

  constructor(startTime: number) {
    this.currentTime = startTime;
  }

  now(): number {
    return this.currentTime;
  }

  date(): Date {
    return new Date(this.currentTime);
  }

  setTime(time: number): void {
    if (time < this.currentTime) {
      throw new Error('Cannot move time backwards');
    }
    this.currentTime = time;
  }

  advance(ms: number): void {
    this.setTime(this.currentTime + ms);
  }
}

/**
 * Whole seconds since the epoch, the resolution signal timestamps use
 */
export function epochSeconds(clock: Clock): number {
  return Math.floor(clock.now() / 1000);
}
