import { describe, it, expect } from 'vitest';
import { MonotonicClock } from '../../src/memory/clock.js';

const NOON = Date.UTC(2026, 9, 19, 12, 0, 0, 123);

describe('MonotonicClock', () => {
  it('formats ids and timestamps with microseconds', () => {
    const clock = new MonotonicClock(() => NOON);
    expect(clock.tick()).toEqual({
      id: 'mem_20261019120000123000',
      timestamp: '2026-10-19T12:00:00.123000Z',
    });
  });

  it('advances one microsecond when the source stalls', () => {
    const clock = new MonotonicClock(() => NOON);
    clock.tick();
    expect(clock.tick()).toEqual({
      id: 'mem_20261019120000123001',
      timestamp: '2026-10-19T12:00:00.123001Z',
    });
  });

  it('never goes backwards', () => {
    let now = NOON;
    const clock = new MonotonicClock(() => now);
    const first = clock.tick();
    now = NOON - 5000;
    const second = clock.tick();
    expect(second.timestamp > first.timestamp).toBe(true);
    expect(second.id > first.id).toBe(true);
  });

  it('follows the time source when it jumps forward', () => {
    let now = NOON;
    const clock = new MonotonicClock(() => now);
    clock.tick();
    now = NOON + 2 * 60 * 60 * 1000 + 1000;
    expect(clock.tick()).toEqual({
      id: 'mem_20261019140001123000',
      timestamp: '2026-10-19T14:00:01.123000Z',
    });
  });

  it('defaults to wall-clock time', () => {
    const before = Date.now();
    const { timestamp } = new MonotonicClock().tick();
    const after = Date.now();
    const stamped = Date.parse(timestamp);
    expect(stamped).toBeGreaterThanOrEqual(before);
    expect(stamped).toBeLessThanOrEqual(after + 1);
  });

  it('keeps sub-millisecond precision from the source', () => {
    const clock = new MonotonicClock(() => NOON + 0.5);
    expect(clock.tick().timestamp).toBe('2026-10-19T12:00:00.123500Z');
  });

  it('produces unique, increasing ids with the real time source', () => {
    const clock = new MonotonicClock();
    const ids = Array.from({ length: 500 }, () => clock.tick().id);
    expect(new Set(ids).size).toBe(500);
    expect([...ids].sort()).toEqual(ids);
  });
});
