import { performance } from "perf_hooks";

/**
 * Paired reading of the two local clock domains taken at one measurement point.
 *
 * `monoNs` only ever moves forward and is relative to the clock's creation;
 * `wallUs` is microseconds since the Unix epoch (UTC) and may jump.
 */
export interface ClockStamp {
  monoNs: number;
  wallUs: number;
}

export interface Clock {
  stamp(): ClockStamp;
  sleep(ms: number): Promise<void>;
}

export class SystemClock implements Clock {
  private readonly origin: bigint = process.hrtime.bigint();

  stamp(): ClockStamp {
    const monoNs = Number(process.hrtime.bigint() - this.origin);
    const wallUs = Math.round((performance.timeOrigin + performance.now()) * 1000);
    return { monoNs, wallUs };
  }

  sleep(ms: number): Promise<void> {
    if (ms <= 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Deterministic clock for tests: time only moves through `advance`/`set`,
 * and `sleep` advances time instead of waiting.
 */
export class ManualClock implements Clock {
  private monoNs: number;
  private wallUs: number;
  readonly sleeps: number[] = [];

  constructor(start: ClockStamp = { monoNs: 0, wallUs: 1_700_000_000_000_000 }) {
    this.monoNs = start.monoNs;
    this.wallUs = start.wallUs;
  }

  stamp(): ClockStamp {
    return { monoNs: this.monoNs, wallUs: this.wallUs };
  }

  advanceUs(us: number): void {
    if (us < 0) {
      throw new Error('Cannot move time backwards');
    }
    this.monoNs += us * 1000;
    this.wallUs += us;
  }

  /**
   * Shift only the wall clock, e.g. to simulate an NTP step.
   */
  shiftWallUs(us: number): void {
    this.wallUs += us;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    if (ms > 0) {
      this.advanceUs(ms * 1000);
    }
  }
}

/**
 * RFC 3339 UTC rendering with microsecond precision.
 */
export function wallUsToIso(wallUs: number): string {
  const ms = Math.floor(wallUs / 1000);
  const micros = wallUs - ms * 1000;
  const iso = new Date(ms).toISOString();
  return `${iso.slice(0, -1)}${String(micros).padStart(3, '0')}Z`;
}
