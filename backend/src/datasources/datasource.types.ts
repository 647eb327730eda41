import type { TimeSeriesTable, WeatherLocation } from "@voltcast/domain";

export const RELATIONAL_QUERY_EXECUTOR = Symbol("RELATIONAL_QUERY_EXECUTOR");
export const TIMESERIES_QUERY_EXECUTOR = Symbol("TIMESERIES_QUERY_EXECUTOR");
export const WEATHER_PROVIDER = Symbol("WEATHER_PROVIDER");

/** Relational store; rows come back ordered by the query and indexed on `datetime`. */
export interface RelationalQueryExecutor {
  execSqlQuery(query: string): Promise<TimeSeriesTable>;
}

/** Time-series store; the result is keyed by measurement name. */
export interface TimeSeriesQueryExecutor {
  execInfluxQuery(query: string): Promise<Record<string, TimeSeriesTable>>;
}

export interface WeatherDataQuery {
  location: WeatherLocation;
  parameters: readonly string[];
  start: Date;
  end: Date;
  source: string;
}

/**
 * Weather observations for one location. The table may carry provenance
 * columns (`source`, `source_1`, `input_city`, `input_city_1`) next to the
 * requested parameters.
 */
export interface WeatherProvider {
  getWeatherData(query: WeatherDataQuery): Promise<TimeSeriesTable>;
}
