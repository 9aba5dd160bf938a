import { ManualClock, SystemClock, wallUsToIso } from '../../../src/utils/time/Clock';

describe('ManualClock', () => {
  it('should start at the given stamp', () => {
    const clock = new ManualClock({ monoNs: 42, wallUs: 1_000 });

    expect(clock.stamp()).toEqual({ monoNs: 42, wallUs: 1_000 });
  });

  it('should advance both domains together', () => {
    const clock = new ManualClock();

    clock.advanceUs(250);

    expect(clock.stamp()).toEqual({ monoNs: 250_000, wallUs: 1_700_000_000_000_250 });
  });

  it('should refuse to move time backwards', () => {
    const clock = new ManualClock();

    expect(() => clock.advanceUs(-1)).toThrow('Cannot move time backwards');
  });

  it('should shift only the wall clock', () => {
    const clock = new ManualClock();

    clock.shiftWallUs(-5_000);

    expect(clock.stamp()).toEqual({ monoNs: 0, wallUs: 1_699_999_999_995_000 });
  });

  it('should record sleeps and advance instead of waiting', async () => {
    const clock = new ManualClock();

    await clock.sleep(500);
    await clock.sleep(0);

    expect(clock.sleeps).toEqual([500, 0]);
    expect(clock.stamp().monoNs).toBe(500_000_000);
  });
});

describe('SystemClock', () => {
  it('should never go backwards on the monotonic domain', () => {
    const clock = new SystemClock();

    const first = clock.stamp();
    const second = clock.stamp();

    expect(second.monoNs).toBeGreaterThanOrEqual(first.monoNs);
    expect(first.monoNs).toBeGreaterThanOrEqual(0);
  });

  it('should report wall time in microseconds since the epoch', () => {
    const clock = new SystemClock();

    const before = Date.now() * 1000;
    const { wallUs } = clock.stamp();

    expect(Math.abs(wallUs - before)).toBeLessThan(1_000_000);
  });

  it('should resolve a zero sleep immediately', async () => {
    await expect(new SystemClock().sleep(0)).resolves.toBeUndefined();
  });
});

describe('wallUsToIso', () => {
  it('should keep microsecond precision', () => {
    expect(wallUsToIso(1_700_000_000_123_456)).toBe('2023-11-14T22:13:20.123456Z');
  });

  it('should zero-pad the microsecond digits', () => {
    expect(wallUsToIso(1_700_000_000_000_007)).toBe('2023-11-14T22:13:20.000007Z');
  });
});
