import { beforeEach, describe, expect, it } from "vitest";

import { Duration, TimeSeriesTable } from "@voltcast/domain";
import type { RuntimeConfigService } from "../src/config/runtime-config.service";
import { LoadProfileService } from "../src/predictors/load-profile.service";
import { FakeInflux, H, installTestConfig, M, T0 } from "./support/fakes";

const QUARTER = Duration.parse("15min");

describe("LoadProfileService", () => {
  let configState: RuntimeConfigService;

  beforeEach(() => {
    configState = installTestConfig();
  });

  it("interpolates hourly profiles onto a quarter-hour grid", async () => {
    const profiles = TimeSeriesTable.fromColumns([T0, T0 + H], {sjvE1A: [0, 4], sjvE3A: [8, 4]});
    const service = new LoadProfileService(new FakeInflux({sjv: profiles}), configState);

    const result = await service.collect({start: T0, end: T0 + H, resolution: QUARTER});

    expect(result.columns).toEqual(["sjvE1A", "sjvE3A"]);
    expect(result.column("sjvE1A")).toEqual([0, 1, 2, 3, 4]);
    expect(result.column("sjvE3A")).toEqual([8, 7, 6, 5, 4]);
  });

  it("synthesizes at most three points into a longer outage", async () => {
    const profiles = TimeSeriesTable.fromColumns([T0, T0 + 2 * H], {sjvE1A: [0, 8]});
    const service = new LoadProfileService(new FakeInflux({sjv: profiles}), configState);

    const result = await service.collect({start: T0, end: T0 + 2 * H, resolution: QUARTER});

    expect(result.column("sjvE1A")).toEqual([0, 1, 2, 3, null, null, null, null, 8]);
  });

  it("scales the cap with the configured native cadence", async () => {
    configState = installTestConfig({predictors: {load_profile_native_cadence: "2h"}});
    const profiles = TimeSeriesTable.fromColumns([T0, T0 + 2 * H], {sjvE1A: [0, 8]});
    const service = new LoadProfileService(new FakeInflux({sjv: profiles}), configState);

    const result = await service.collect({start: T0, end: T0 + 2 * H, resolution: QUARTER});

    expect(result.column("sjvE1A")).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
  });

  it("returns source-native rows without a resolution", async () => {
    const profiles = TimeSeriesTable.fromColumns([T0 + 10 * M, T0 + 70 * M], {sjvE1A: [1, 2]});
    const service = new LoadProfileService(new FakeInflux({sjv: profiles}), configState);

    const result = await service.collect({start: T0, end: T0 + 2 * H, resolution: null});

    expect(result).toBe(profiles);
  });

  it("returns an empty table when the measurement is absent", async () => {
    const influx = new FakeInflux();
    const service = new LoadProfileService(influx, configState);

    const result = await service.collect({start: T0, end: T0 + H, resolution: QUARTER});

    expect(result.isEmpty).toBe(true);
    expect(influx.queries).toEqual([
      "SELECT /^sjv/ FROM \"realised\"..\"sjv\" WHERE time >= '2021-01-01T00:00:00.000Z' AND time <= '2021-01-01T01:00:00.000Z'",
    ]);
  });
});
