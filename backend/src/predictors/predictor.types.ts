import type { Duration, TimeSeriesTable } from "@voltcast/domain";

/** The part of a request every predictor group needs to fetch and resample. */
export interface PredictorWindow {
  start: number;
  end: number;
  resolution: Duration | null;
}

export function pickMeasurement(result: Record<string, TimeSeriesTable>, measurement: string): TimeSeriesTable | null {
  return Object.hasOwn(result, measurement) ? result[measurement] : null;
}
