import { beforeEach, describe, expect, it, vi } from "vitest";

import {
  ITERATION_BASE_FIELD,
  JULIA_CONSTANT_FIELD,
  NumericField,
  parseNumericField,
  RENDER_SCALE_FIELD,
  SIGIL_SCALE_FIELD,
} from "./numeric-fields";

describe("parseNumericField", () => {
  it.each([
    ["2.5", 2.5],
    [" 3 ", 3],
    [".75", 0.75],
    ["0.1", 0.5],
    ["-4", 0.5],
    ["25", 10],
    ["1e400", 10],
    ["7.", 7],
    ["1e-1", 0.5],
  ])("should clamp render scale %j to %d", (text, expected) => {
    expect(parseNumericField(text, RENDER_SCALE_FIELD)).toBe(expected);
  });

  it.each(["", "abc", "1.2.3", "Infinity", "NaN", "0x10", "1,5", "--1"])(
    "should reject render scale %j",
    (text) => {
      expect(parseNumericField(text, RENDER_SCALE_FIELD)).toBeNull();
    }
  );

  it("should only take whole numbers for the iteration base", () => {
    expect(parseNumericField("120", ITERATION_BASE_FIELD)).toBe(120);
    expect(parseNumericField("+45", ITERATION_BASE_FIELD)).toBe(45);
    expect(parseNumericField("5", ITERATION_BASE_FIELD)).toBe(10);
    expect(parseNumericField("5000", ITERATION_BASE_FIELD)).toBe(1000);
    expect(parseNumericField("45.5", ITERATION_BASE_FIELD)).toBeNull();
    expect(parseNumericField("1e2", ITERATION_BASE_FIELD)).toBeNull();
  });

  it("should clamp the sigil scale to [1, 500]", () => {
    expect(parseNumericField("0", SIGIL_SCALE_FIELD)).toBe(1);
    expect(parseNumericField("150", SIGIL_SCALE_FIELD)).toBe(150);
    expect(parseNumericField("999", SIGIL_SCALE_FIELD)).toBe(500);
  });

  it("should leave the Julia constant unbounded but finite", () => {
    expect(parseNumericField("-0.7", JULIA_CONSTANT_FIELD)).toBe(-0.7);
    expect(parseNumericField("12.5", JULIA_CONSTANT_FIELD)).toBe(12.5);
    expect(parseNumericField("1e400", JULIA_CONSTANT_FIELD)).toBeNull();
  });
});

describe("NumericField", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  it("should accept and store a new value", () => {
    const field = new NumericField(RENDER_SCALE_FIELD, 1.5);
    expect(field.submit("2")).toEqual({ accepted: true, changed: true, value: 2 });
    expect(field.current).toBe(2);
    expect(field.text).toBe("2");
  });

  it("should keep the last valid value on invalid input", () => {
    const field = new NumericField(ITERATION_BASE_FIELD, 45);
    expect(field.submit("lots")).toEqual({ accepted: false, changed: false, value: 45 });
    expect(field.text).toBe("45");
    expect(console.warn).toHaveBeenCalledWith('Invalid input for base max iterations: "lots"');
  });

  it("should report no change for the same value", () => {
    const field = new NumericField(ITERATION_BASE_FIELD, 45);
    expect(field.submit("45")).toEqual({ accepted: true, changed: false, value: 45 });
  });

  it("should ignore real-valued changes below the epsilon", () => {
    const field = new NumericField(RENDER_SCALE_FIELD, 1.5);
    expect(field.submit("1.500001")).toEqual({ accepted: true, changed: false, value: 1.5 });
  });

  it("should show the clamped value after saturating", () => {
    const field = new NumericField(RENDER_SCALE_FIELD, 1.5);
    field.submit("40");
    expect(field.text).toBe("10");
  });
});
