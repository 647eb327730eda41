import { Module } from "@nestjs/common";

import { RuntimeConfigService } from "../config/runtime-config.service";
import { InfluxQueryService } from "./influx-query.service";
import { SqlQueryService } from "./sql-query.service";
import { WeatherClient } from "./weather.client";
import { RELATIONAL_QUERY_EXECUTOR, TIMESERIES_QUERY_EXECUTOR, WEATHER_PROVIDER } from "./datasource.types";

@Module({
  providers: [
    RuntimeConfigService,
    SqlQueryService,
    InfluxQueryService,
    WeatherClient,
    {provide: RELATIONAL_QUERY_EXECUTOR, useExisting: SqlQueryService},
    {provide: TIMESERIES_QUERY_EXECUTOR, useExisting: InfluxQueryService},
    {provide: WEATHER_PROVIDER, useExisting: WeatherClient},
  ],
  exports: [
    RuntimeConfigService,
    SqlQueryService,
    RELATIONAL_QUERY_EXECUTOR,
    TIMESERIES_QUERY_EXECUTOR,
    WEATHER_PROVIDER,
  ],
})
export class DatasourcesModule {
}
