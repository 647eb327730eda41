import { Duration } from "./duration";
import { type CellValue, TimeSeriesTable } from "./time-series-table";

export type FillPolicy =
  | { kind: "forward-fill" }
  | { kind: "linear"; limit: number };

interface Observation {
  ts: number;
  value: number;
}

/**
 * Largest run of synthesized grid points that still bridges one native
 * interval of the source: a 3 h source on a 15 min grid has 11 points between
 * two observations, a 1 h source has 3.
 */
export function interpolationLimit(nativeCadence: Duration, resolution: Duration): number {
  return Math.max(1, nativeCadence.stepsOf(resolution) - 1);
}

export function resampleTable(table: TimeSeriesTable, grid: readonly number[], policy: FillPolicy): TimeSeriesTable {
  const columns: Record<string, CellValue[]> = {};
  for (const name of table.columns) {
    const values = table.column(name);
    columns[name] =
      policy.kind === "forward-fill"
        ? forwardFill(table.index, values, grid)
        : interpolateLinear(table.index, values, grid, policy.limit);
  }
  return TimeSeriesTable.fromColumns(grid, columns);
}

/** Each grid point takes the latest non-missing value observed at or before it. */
export function forwardFill(
  index: readonly number[],
  values: readonly CellValue[],
  grid: readonly number[],
): CellValue[] {
  const out: CellValue[] = [];
  let cursor = 0;
  let last: CellValue = null;
  for (const ts of grid) {
    while (cursor < index.length && index[cursor] <= ts) {
      const value = values[cursor];
      if (value !== null) {
        last = value;
      }
      cursor += 1;
    }
    out.push(last);
  }
  return out;
}

/**
 * Time-weighted linear interpolation between numeric observations. Only the
 * first `limit` grid points after an observation are filled; the rest of a
 * longer gap stays null, as does anything before the first or after the last
 * observation.
 */
export function interpolateLinear(
  index: readonly number[],
  values: readonly CellValue[],
  grid: readonly number[],
  limit: number,
): CellValue[] {
  const observations: Observation[] = [];
  index.forEach((ts, position) => {
    const value = values[position];
    if (typeof value === "number" && Number.isFinite(value)) {
      observations.push({ts, value});
    }
  });

  const out: CellValue[] = [];
  let next = 0;
  let runLength = 0;
  let runAnchor: number | null = null;
  for (const ts of grid) {
    while (next < observations.length && observations[next].ts < ts) {
      next += 1;
    }
    const upper: Observation | undefined = observations[next];
    if (upper && upper.ts === ts) {
      out.push(upper.value);
      continue;
    }
    const lower = next > 0 ? observations[next - 1] : undefined;
    if (!lower || !upper) {
      out.push(null);
      continue;
    }
    if (runAnchor !== lower.ts) {
      runAnchor = lower.ts;
      runLength = 0;
    }
    runLength += 1;
    if (runLength > limit) {
      out.push(null);
      continue;
    }
    out.push(lower.value + ((upper.value - lower.value) * (ts - lower.ts)) / (upper.ts - lower.ts));
  }
  return out;
}
