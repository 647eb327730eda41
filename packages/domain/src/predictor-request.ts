import { Duration } from "./duration";
import { ConfigurationError, InvalidRequestError } from "./errors";
import { PredictorGroup, resolvePredictorGroups } from "./predictor-group";
import { MAX_GRID_POINTS, countGridPoints } from "./time-grid";
import { parseUtcTimestamp, type TimestampInput, toIsoString } from "./timestamp";

/** A city name understood by the weather provider, or a `[latitude, longitude]` pair. */
export type WeatherLocation = string | readonly [number, number];

export interface PredictorRequestInput {
  start: TimestampInput;
  end: TimestampInput;
  resolution?: string | Duration | null;
  location?: WeatherLocation | null;
  groups?: readonly string[] | null;
}

export class PredictorRequest {
  readonly start: number;
  readonly end: number;
  readonly resolution: Duration | null;
  readonly location: WeatherLocation | null;
  readonly groups: readonly PredictorGroup[];

  private constructor(
    start: number,
    end: number,
    resolution: Duration | null,
    location: WeatherLocation | null,
    groups: readonly PredictorGroup[],
  ) {
    this.start = start;
    this.end = end;
    this.resolution = resolution;
    this.location = location;
    this.groups = Object.freeze([...groups]);
    Object.freeze(this);
  }

  /**
   * Validates everything that can be checked without touching a data source.
   * Group identifiers are parsed first, then the location requirement is
   * checked, and only then the window and resolution.
   */
  static from(input: PredictorRequestInput): PredictorRequest {
    const groups = resolvePredictorGroups(input.groups);
    const location = normalizeLocation(input.location);
    if (groups.includes(PredictorGroup.WEATHER_DATA) && location === null) {
      throw new ConfigurationError("Need to provide a location when weather data predictors are requested.");
    }

    const start = parseUtcTimestamp(input.start, "start");
    const end = parseUtcTimestamp(input.end, "end");
    if (end < start) {
      throw new InvalidRequestError(`end ${toIsoString(end)} lies before start ${toIsoString(start)}`);
    }

    const resolution =
      input.resolution === undefined || input.resolution === null
        ? null
        : input.resolution instanceof Duration
          ? input.resolution
          : Duration.parse(input.resolution);
    if (resolution && resolution.milliseconds === 0) {
      throw new InvalidRequestError("resolution must be longer than zero");
    }
    const points = countGridPoints(start, end, resolution);
    if (points > MAX_GRID_POINTS) {
      throw new InvalidRequestError(`Requested grid has ${points} points; the limit is ${MAX_GRID_POINTS}`);
    }

    return new PredictorRequest(start, end, resolution, location, groups);
  }

  includes(group: PredictorGroup): boolean {
    return this.groups.includes(group);
  }

  describe(): string {
    const resolution = this.resolution ? this.resolution.toString() : "native";
    return `${toIsoString(this.start)}..${toIsoString(this.end)} @ ${resolution} [${this.groups.join(", ")}]`;
  }
}

function normalizeLocation(location: WeatherLocation | null | undefined): WeatherLocation | null {
  if (location === undefined || location === null) {
    return null;
  }
  if (typeof location === "string") {
    const trimmed = location.trim();
    return trimmed.length ? trimmed : null;
  }
  const [latitude, longitude] = location;
  if (!Number.isFinite(latitude) || latitude < -90 || latitude > 90) {
    throw new InvalidRequestError(`Latitude ${latitude} is out of range`);
  }
  if (!Number.isFinite(longitude) || longitude < -180 || longitude > 180) {
    throw new InvalidRequestError(`Longitude ${longitude} is out of range`);
  }
  return [latitude, longitude];
}
