import { describe, expect, it } from "vitest";

import {
  ConfigurationError,
  InvalidPredictorGroupError,
  InvalidRequestError,
  PredictorGroup,
  PredictorRequest,
  parsePredictorGroup,
  tryParsePredictorGroup,
} from "../src";

describe("parsePredictorGroup", () => {
  it("accepts wire values and variant names", () => {
    expect(parsePredictorGroup("market_data")).toBe(PredictorGroup.MARKET_DATA);
    expect(parsePredictorGroup("LOAD_PROFILES")).toBe(PredictorGroup.LOAD_PROFILES);
    expect(parsePredictorGroup(" weather_data ")).toBe(PredictorGroup.WEATHER_DATA);
  });

  it("returns null from the non-throwing variant", () => {
    expect(tryParsePredictorGroup("Market_Data")).toBe(PredictorGroup.MARKET_DATA);
    expect(tryParsePredictorGroup("solar")).toBeNull();
  });

  it("rejects anything else", () => {
    expect(() => parsePredictorGroup("solar")).toThrow(InvalidPredictorGroupError);
    expect(() => parsePredictorGroup("solar")).toThrow(
      "Unknown predictor group 'solar'; expected one of weather_data, market_data, load_profiles",
    );
  });
});

describe("PredictorRequest.from", () => {
  it("selects every group in merge order by default", () => {
    const request = PredictorRequest.from({start: "2021-01-01", end: "2021-01-02", location: "Arnhem"});

    expect(request.groups).toEqual(["weather_data", "market_data", "load_profiles"]);
    expect(request.start).toBe(Date.UTC(2021, 0, 1));
    expect(request.end).toBe(Date.UTC(2021, 0, 2));
    expect(request.resolution).toBeNull();
    expect(request.location).toBe("Arnhem");
  });

  it("orders and deduplicates explicit groups", () => {
    const request = PredictorRequest.from({
      start: "2021-01-01",
      end: "2021-01-02",
      groups: ["load_profiles", "MARKET_DATA", "market_data"],
    });

    expect(request.groups).toEqual([PredictorGroup.MARKET_DATA, PredictorGroup.LOAD_PROFILES]);
  });

  it("requires a location for weather data", () => {
    expect(() =>
      PredictorRequest.from({start: "2021-01-01", end: "2021-01-02", groups: ["weather_data"]}),
    ).toThrow(ConfigurationError);
    expect(() =>
      PredictorRequest.from({start: "2021-01-01", end: "2021-01-02", groups: ["weather_data"], location: "  "}),
    ).toThrow(ConfigurationError);
    expect(() => PredictorRequest.from({start: "2021-01-01", end: "2021-01-02"})).toThrow(
      "Need to provide a location when weather data predictors are requested.",
    );
  });

  it("reports a missing location before checking the window or resolution", () => {
    expect(() =>
      PredictorRequest.from({start: "2021-01-02", end: "2021-01-01", groups: ["weather_data"]}),
    ).toThrow(ConfigurationError);
    expect(() =>
      PredictorRequest.from({start: "not-a-date", end: "2021-01-01", groups: ["weather_data"]}),
    ).toThrow(ConfigurationError);
    expect(() =>
      PredictorRequest.from({start: "2021-01-01", end: "2021-01-02", resolution: "fortnightly"}),
    ).toThrow(ConfigurationError);
  });

  it("rejects grids with more points than the limit", () => {
    const oversized = () =>
      PredictorRequest.from({start: "1970-01-01", end: "9999-12-31", resolution: "1ms", groups: ["market_data"]});

    expect(oversized).toThrow(InvalidRequestError);
    expect(oversized).toThrow("the limit is 1100000");
  });

  it("reports an unknown group before a missing location", () => {
    expect(() =>
      PredictorRequest.from({start: "2021-01-01", end: "2021-01-02", groups: ["weather_data", "tides"]}),
    ).toThrow(InvalidPredictorGroupError);
  });

  it("parses resolution and coordinates", () => {
    const request = PredictorRequest.from({
      start: "2021-01-01",
      end: "2021-01-02",
      resolution: "15T",
      location: [52.1, 5.2],
    });

    expect(request.resolution?.milliseconds).toBe(15 * 60_000);
    expect(request.location).toEqual([52.1, 5.2]);
    expect(request.describe()).toBe(
      "2021-01-01T00:00:00.000Z..2021-01-02T00:00:00.000Z @ 15min [weather_data, market_data, load_profiles]",
    );
  });

  it("rejects inverted windows, bad resolutions and impossible coordinates", () => {
    expect(() => PredictorRequest.from({start: "2021-01-02", end: "2021-01-01", groups: []})).toThrow(
      InvalidRequestError,
    );
    expect(() =>
      PredictorRequest.from({start: "2021-01-01", end: "2021-01-02", resolution: "fortnightly", groups: []}),
    ).toThrow(InvalidRequestError);
    expect(() =>
      PredictorRequest.from({start: "2021-01-01", end: "2021-01-02", location: [91, 0]}),
    ).toThrow("Latitude 91 is out of range");
  });

  it("is immutable", () => {
    const request = PredictorRequest.from({start: "2021-01-01", end: "2021-01-02", groups: ["market_data"]});

    expect(Object.isFrozen(request)).toBe(true);
    expect(Object.isFrozen(request.groups)).toBe(true);
  });
});
