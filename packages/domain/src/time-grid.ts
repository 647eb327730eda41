import { Duration } from "./duration";
import { InvalidRequestError } from "./errors";
import { TimeSeriesTable } from "./time-series-table";

/** Upper bound on grid points per request; ten years at a 5 minute resolution fits. */
export const MAX_GRID_POINTS = 1_100_000;

/** Number of points `buildGridIndex` would return for the same arguments. */
export function countGridPoints(start: number, end: number, resolution?: Duration | null): number {
  if (end < start) {
    return 0;
  }
  if (!resolution) {
    return start === end ? 1 : 2;
  }
  return Math.floor((end - start) / resolution.milliseconds) + 1;
}

/**
 * Timestamps from `start` to `end` inclusive in steps of `resolution`. Without
 * a resolution only the two boundaries are returned (one point when they
 * coincide).
 */
export function buildGridIndex(start: number, end: number, resolution?: Duration | null): number[] {
  if (end < start) {
    throw new InvalidRequestError(
      `End ${new Date(end).toISOString()} lies before start ${new Date(start).toISOString()}`,
    );
  }
  if (!resolution) {
    return start === end ? [start] : [start, end];
  }
  const points = countGridPoints(start, end, resolution);
  if (points > MAX_GRID_POINTS) {
    throw new InvalidRequestError(
      `A ${resolution.toString()} grid over this window has ${points} points; the limit is ${MAX_GRID_POINTS}`,
    );
  }
  const step = resolution.milliseconds;
  const index: number[] = [];
  for (let ts = start; ts <= end; ts += step) {
    index.push(ts);
  }
  return index;
}

/** The zero-column join target every predictor group is merged onto. */
export function buildTimeGrid(start: number, end: number, resolution?: Duration | null): TimeSeriesTable {
  return TimeSeriesTable.empty(buildGridIndex(start, end, resolution));
}
