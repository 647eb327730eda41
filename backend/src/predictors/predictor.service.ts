import { Inject, Injectable, Logger } from "@nestjs/common";

import {
  buildTimeGrid,
  ColumnCollisionError,
  ConfigurationError,
  PredictorGroup,
  PredictorRequest,
  type PredictorRequestInput,
  TimeSeriesTable,
} from "@voltcast/domain";
import { RuntimeConfigService } from "../config/runtime-config.service";
import { LoadProfileService } from "./load-profile.service";
import { MarketDataService } from "./market-data.service";
import { WeatherDataService } from "./weather-data.service";

interface GroupResult {
  group: PredictorGroup;
  table: TimeSeriesTable;
}

/**
 * Assembles the predictor table for one request: validates it, fetches every
 * requested group concurrently and merges the results onto the requested grid
 * in the fixed group order.
 */
@Injectable()
export class PredictorService {
  private readonly logger = new Logger(PredictorService.name);

  constructor(
    @Inject(WeatherDataService) private readonly weatherData: WeatherDataService,
    @Inject(MarketDataService) private readonly marketData: MarketDataService,
    @Inject(LoadProfileService) private readonly loadProfiles: LoadProfileService,
    @Inject(RuntimeConfigService) private readonly configState: RuntimeConfigService,
  ) {
  }

  /**
   * Invalid input throws before anything is fetched: an unknown group raises
   * `InvalidPredictorGroupError`, weather data without a location raises
   * `ConfigurationError`. Data source failures reject the returned promise
   * unchanged.
   */
  assemble(input: PredictorRequestInput | PredictorRequest): Promise<TimeSeriesTable> {
    const request =
      input instanceof PredictorRequest
        ? input
        : PredictorRequest.from({...input, groups: input.groups ?? this.configState.defaultGroups});
    this.logger.log(`Assembling predictors ${request.describe()}`);
    return this.collect(request);
  }

  private async collect(request: PredictorRequest): Promise<TimeSeriesTable> {
    const results = await Promise.all(request.groups.map((group) => this.fetchGroup(group, request)));

    let predictors = buildTimeGrid(request.start, request.end, request.resolution);
    const owners = new Map<string, PredictorGroup>();
    for (const {group, table} of results) {
      for (const column of table.columns) {
        const owner = owners.get(column);
        if (owner !== undefined) {
          throw new ColumnCollisionError(column, owner, group);
        }
        owners.set(column, group);
      }
      predictors = predictors.join(table);
    }

    this.logger.verbose(`Assembled ${predictors.rowCount} rows x ${predictors.columnCount} predictors`);
    return predictors;
  }

  private async fetchGroup(group: PredictorGroup, request: PredictorRequest): Promise<GroupResult> {
    switch (group) {
      case PredictorGroup.WEATHER_DATA: {
        if (request.location === null) {
          throw new ConfigurationError("Need to provide a location when weather data predictors are requested.");
        }
        return {group, table: await this.weatherData.collect(request, request.location)};
      }
      case PredictorGroup.MARKET_DATA:
        return {group, table: await this.marketData.collect(request)};
      case PredictorGroup.LOAD_PROFILES:
        return {group, table: await this.loadProfiles.collect(request)};
    }
  }
}
