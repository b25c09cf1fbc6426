import { performance } from 'perf_hooks';

export interface Tick {
  id: string;         // mem_YYYYMMDDHHMMSSffffff
  timestamp: string;  // YYYY-MM-DDTHH:MM:SS.ffffffZ
}

// Wall-clock milliseconds, with the sub-millisecond digits taken from
// performance.now()
function wallClock(): number {
  return Date.now() + (performance.now() % 1);
}

/**
 * Microsecond clock that never repeats itself: if the time source stalls or
 * goes backwards, the next tick is one microsecond after the previous one.
 * Ids and timestamps from the same clock are therefore unique and sort in
 * creation order.
 */
export class MonotonicClock {
  private last = 0n;

  constructor(
    private readonly source: () => number = wallClock
  ) {}

  tick(): Tick {
    let micros = BigInt(Math.floor(this.source() * 1000));
    if (micros <= this.last) {
      micros = this.last + 1n;
    }
    this.last = micros;

    const iso = new Date(Number(micros / 1000n)).toISOString();
    const fraction = iso.slice(20, 23) + (micros % 1000n).toString().padStart(3, '0');

    return {
      id: 'mem_' + iso.slice(0, 19).replace(/[-:T]/g, '') + fraction,
      timestamp: `${iso.slice(0, 19)}.${fraction}Z`,
    };
  }
}

// Shared by every store that is not given its own clock, so ids stay unique
// across stores in one process.
export const systemClock = new MonotonicClock();
