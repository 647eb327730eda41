import { describe, expect, it } from "vitest";

import { buildGridIndex, buildTimeGrid, countGridPoints, Duration, InvalidRequestError, MAX_GRID_POINTS } from "../src";

const H = 3_600_000;
const T0 = Date.UTC(2021, 0, 1);

describe("buildTimeGrid", () => {
  it("spans the window inclusively at the resolution", () => {
    const grid = buildTimeGrid(T0, T0 + 24 * H, Duration.parse("1H"));

    expect(grid.rowCount).toBe(25);
    expect(grid.columnCount).toBe(0);
    expect(grid.index[0]).toBe(T0);
    expect(grid.index[24]).toBe(T0 + 24 * H);
  });

  it("stops at the last step not after the end", () => {
    const index = buildGridIndex(T0, T0 + 40 * 60_000, Duration.parse("15min"));

    expect(index).toEqual([T0, T0 + 15 * 60_000, T0 + 30 * 60_000]);
  });

  it("falls back to the window boundaries without a resolution", () => {
    expect(buildGridIndex(T0, T0 + 24 * H)).toEqual([T0, T0 + 24 * H]);
    expect(buildGridIndex(T0, T0)).toEqual([T0]);
  });

  it("counts points without building the grid", () => {
    expect(countGridPoints(T0, T0 + 40 * 60_000, Duration.parse("15min"))).toBe(3);
    expect(countGridPoints(T0, T0 + 24 * H)).toBe(2);
    expect(countGridPoints(T0, T0)).toBe(1);
  });

  it("refuses grids above the point limit", () => {
    expect(() => buildGridIndex(T0, T0 + MAX_GRID_POINTS * 1000, Duration.parse("1s"))).toThrow(
      `A 1s grid over this window has ${MAX_GRID_POINTS + 1} points; the limit is ${MAX_GRID_POINTS}`,
    );
  });

  it("rejects an end before the start", () => {
    expect(() => buildGridIndex(T0, T0 - H, Duration.parse("1H"))).toThrow(InvalidRequestError);
  });
});
