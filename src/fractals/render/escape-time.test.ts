import { describe, expect, it } from "vitest";

import type { GridRequest } from "../types";
import { createRowBands } from "./chunks";
import { computeIterationGrid, computeIterationRows } from "./escape-time";

const baseRequest: GridRequest = {
  viewport: { reSpan: 3.5, reCenter: -0.5, imCenter: 0 },
  width: 100,
  height: 100,
  maxIterations: 50,
  family: { type: "mandelbrot" },
};

describe("computeIterationGrid", () => {
  it("should report the full budget inside the main cardioid", () => {
    const grid = computeIterationGrid(baseRequest);
    // pixel (50, 50) maps to (-0.5, 0)
    expect(grid.values[50 * 100 + 50]).toBe(50);
  });

  it("should escape immediately at the top-left corner", () => {
    const grid = computeIterationGrid(baseRequest);
    // pixel (0, 0) maps to (-2.25, -1.75)
    expect(grid.values[0]).toBe(1);
  });

  it("should keep every count within [0, maxIterations]", () => {
    const { values } = computeIterationGrid(baseRequest);
    expect(values.length).toBe(100 * 100);
    for (const count of values) {
      expect(count).toBeGreaterThanOrEqual(0);
      expect(count).toBeLessThanOrEqual(50);
    }
  });

  it("should produce different grids for Burning Ship and Mandelbrot", () => {
    const mandelbrot = computeIterationGrid(baseRequest);
    const burningShip = computeIterationGrid({ ...baseRequest, family: { type: "burning-ship" } });
    expect(Array.from(burningShip.values)).not.toEqual(Array.from(mandelbrot.values));
  });

  it("should write into a target of matching shape", () => {
    const target = { width: 100, height: 100, values: new Int32Array(100 * 100) };
    expect(computeIterationGrid(baseRequest, target)).toBe(target);
  });

  it("should allocate when the target shape differs", () => {
    const target = { width: 10, height: 10, values: new Int32Array(100) };
    const grid = computeIterationGrid(baseRequest, target);
    expect(grid).not.toBe(target);
    expect(grid.values.length).toBe(10000);
  });
});

describe("computeIterationRows", () => {
  it("should match the full grid band by band", () => {
    const request: GridRequest = { ...baseRequest, width: 37, height: 23 };
    const full = computeIterationGrid(request);
    const assembled = new Int32Array(37 * 23);

    for (const band of createRowBands(23, { preferredNumber: 5, minRows: 1 })) {
      assembled.set(computeIterationRows(request, band.startRow, band.rowCount), band.startRow * 37);
    }

    expect(Array.from(assembled)).toEqual(Array.from(full.values));
  });
});

describe("createRowBands", () => {
  it("should cover every row exactly once", () => {
    expect(createRowBands(23, { preferredNumber: 5, minRows: 1 })).toEqual([
      { startRow: 0, rowCount: 5 },
      { startRow: 5, rowCount: 5 },
      { startRow: 10, rowCount: 5 },
      { startRow: 15, rowCount: 5 },
      { startRow: 20, rowCount: 3 },
    ]);
  });

  it("should respect the minimum band height", () => {
    expect(createRowBands(10, { preferredNumber: 10, minRows: 4 })).toEqual([
      { startRow: 0, rowCount: 4 },
      { startRow: 4, rowCount: 4 },
      { startRow: 8, rowCount: 2 },
    ]);
  });

  it("should return no bands for an empty grid", () => {
    expect(createRowBands(0)).toEqual([]);
  });
});
