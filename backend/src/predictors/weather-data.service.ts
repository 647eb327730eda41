import { Inject, Injectable, Logger } from "@nestjs/common";

import {
  buildGridIndex,
  interpolationLimit,
  resampleTable,
  TimeSeriesTable,
  type WeatherLocation,
} from "@voltcast/domain";
import { RuntimeConfigService } from "../config/runtime-config.service";
import { WEATHER_PROVIDER, type WeatherProvider } from "../datasources/datasource.types";
import { formatLocation } from "../datasources/weather.client";
import type { PredictorWindow } from "./predictor.types";

export const WEATHER_PARAMETERS = [
  "clouds",
  "radiation",
  "temp",
  "winddeg",
  "windspeed",
  "windspeed_100m",
  "pressure",
  "humidity",
  "rain",
  "mxlD",
  "snowDepth",
  "clearSky_ulf",
  "clearSky_dlf",
  "ssrunoff",
] as const;

export const PROVENANCE_COLUMNS = ["source", "source_1", "input_city", "input_city_1"] as const;

/**
 * Strips the provider's provenance columns. A `source_1` column replaces
 * `source` before both go; either spelling of the input city is dropped.
 */
export function normalizeWeatherColumns(table: TimeSeriesTable): TimeSeriesTable {
  let normalized = table;
  if (normalized.hasColumn("source_1")) {
    normalized = normalized.withColumn("source", normalized.column("source_1")).dropColumns(["source_1"]);
  }
  if (normalized.hasColumn("source")) {
    normalized = normalized.dropColumns(["source"]);
  }
  if (normalized.hasColumn("input_city_1")) {
    normalized = normalized.dropColumns(["input_city_1"]);
  }
  if (normalized.hasColumn("input_city")) {
    normalized = normalized.dropColumns(["input_city"]);
  }
  return normalized;
}

@Injectable()
export class WeatherDataService {
  private readonly logger = new Logger(WeatherDataService.name);

  constructor(
    @Inject(WEATHER_PROVIDER) private readonly provider: WeatherProvider,
    @Inject(RuntimeConfigService) private readonly configState: RuntimeConfigService,
  ) {
  }

  async collect(window: PredictorWindow, location: WeatherLocation): Promise<TimeSeriesTable> {
    const raw = await this.provider.getWeatherData({
      location,
      parameters: WEATHER_PARAMETERS,
      start: new Date(window.start),
      end: new Date(window.end),
      source: this.configState.getDocumentRef().weather.source,
    });
    const weatherData = normalizeWeatherColumns(raw);
    this.logger.verbose(
      `Weather for ${formatLocation(location)} returned ${weatherData.rowCount} rows, ${weatherData.columnCount} parameters`,
    );

    if (!window.resolution || weatherData.isEmpty) {
      return weatherData;
    }
    // one native interval is the longest gap worth bridging
    const limit = interpolationLimit(this.configState.weatherNativeCadence, window.resolution);
    const grid = buildGridIndex(window.start, window.end, window.resolution);
    return resampleTable(weatherData, grid, {kind: "linear", limit});
  }
}
