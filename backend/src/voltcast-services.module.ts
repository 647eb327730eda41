import { Module } from "@nestjs/common";

import { ConfigFileService } from "./config/config-file.service";
import { DatasourcesModule } from "./datasources/datasources.module";
import { LoadProfileService } from "./predictors/load-profile.service";
import { MarketDataService } from "./predictors/market-data.service";
import { PredictorService } from "./predictors/predictor.service";
import { WeatherDataService } from "./predictors/weather-data.service";

@Module({
  imports: [DatasourcesModule],
  providers: [
    ConfigFileService,
    MarketDataService,
    LoadProfileService,
    WeatherDataService,
    PredictorService,
  ],
  exports: [
    ConfigFileService,
    MarketDataService,
    LoadProfileService,
    WeatherDataService,
    PredictorService,
  ],
})
export class VoltcastServicesModule {}
