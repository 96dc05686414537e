import { afterEach, describe, expect, it, vi } from "vitest";

import { computeOracleValue, fallbackOracleSeed, startOracleTicker } from "./oracle";
import { createRandom } from "./random";

describe("computeOracleValue", () => {
  it("should read the first 8 hex digits of the digest", () => {
    expect(computeOracleValue(1234, 1700000000000)).toBe(0x11d44d60);
    expect(computeOracleValue(1234, 1700000000000)).toBe(299126112);
  });

  it("should change from one millisecond value to the next", () => {
    expect(computeOracleValue(1234, 1700000001000)).toBe(2298146836);
    expect(computeOracleValue(0, 0)).toBe(579083939);
  });

  it("should keep leading zero digits", () => {
    expect(computeOracleValue(65535, 1700000000000)).toBe(0x0296d944);
  });
});

describe("fallbackOracleSeed", () => {
  it("should draw a 16-bit seed", () => {
    const random = createRandom(8);
    for (let i = 0; i < 50; i++) {
      const seed = fallbackOracleSeed(random);
      expect(Number.isInteger(seed)).toBe(true);
      expect(seed).toBeGreaterThanOrEqual(0);
      expect(seed).toBeLessThanOrEqual(65535);
    }
  });
});

describe("startOracleTicker", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should publish a value per interval until stopped", () => {
    vi.useFakeTimers();
    const values: number[] = [];
    let millis = 1700000000000;
    const stop = startOracleTicker({
      getSeed: () => 1234,
      onValue: (value) => values.push(value),
      now: () => millis,
    });

    vi.advanceTimersByTime(1000);
    millis += 1000;
    vi.advanceTimersByTime(1000);
    stop();
    vi.advanceTimersByTime(5000);

    expect(values).toEqual([299126112, 2298146836]);
  });
});
