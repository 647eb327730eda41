import { Inject, Injectable, Logger } from "@nestjs/common";

import { buildGridIndex, resampleTable, TimeSeriesTable, toIsoString } from "@voltcast/domain";
import {
  RELATIONAL_QUERY_EXECUTOR,
  type RelationalQueryExecutor,
  TIMESERIES_QUERY_EXECUTOR,
  type TimeSeriesQueryExecutor,
} from "../datasources/datasource.types";
import { pickMeasurement, type PredictorWindow } from "./predictor.types";

export const ELECTRICITY_PRICE_COLUMN = "APX";
export const GAS_PRICE_COLUMN = "Elba";
const ELECTRICITY_MEASUREMENT = "marketprices";

/**
 * Day-ahead electricity price and gas price. Both are step functions fixed per
 * settlement period, so they are only ever forward-filled onto the grid.
 */
@Injectable()
export class MarketDataService {
  private readonly logger = new Logger(MarketDataService.name);

  constructor(
    @Inject(TIMESERIES_QUERY_EXECUTOR) private readonly influx: TimeSeriesQueryExecutor,
    @Inject(RELATIONAL_QUERY_EXECUTOR) private readonly sql: RelationalQueryExecutor,
  ) {
  }

  async collect(window: PredictorWindow): Promise<TimeSeriesTable> {
    const [electricityPrice, gasPrice] = await Promise.all([
      this.getElectricityPrice(window),
      this.getGasPrice(window),
    ]);

    if (!electricityPrice.isEmpty && gasPrice.isEmpty) {
      this.logger.verbose("Gas price unavailable; market data carries electricity price only");
      return electricityPrice;
    }
    if (electricityPrice.isEmpty && !gasPrice.isEmpty) {
      this.logger.verbose("Electricity price unavailable; market data carries gas price only");
      return gasPrice;
    }
    if (electricityPrice.isEmpty && gasPrice.isEmpty) {
      this.logger.warn(`No market prices between ${toIsoString(window.start)} and ${toIsoString(window.end)}`);
      return TimeSeriesTable.empty(buildGridIndex(window.start, window.end, window.resolution));
    }
    return electricityPrice.join(gasPrice, {left: "electricity price", right: "gas price"});
  }

  async getElectricityPrice(window: PredictorWindow): Promise<TimeSeriesTable> {
    const query =
      `SELECT "Price" FROM "forecast_latest".."${ELECTRICITY_MEASUREMENT}" ` +
      `WHERE "Name" = 'APX' AND time >= '${toIsoString(window.start)}' AND time <= '${toIsoString(window.end)}'`;
    const result = await this.influx.execInfluxQuery(query);
    const raw = pickMeasurement(result, ELECTRICITY_MEASUREMENT) ?? TimeSeriesTable.empty();
    const electricityPrice = raw.renameColumns({Price: ELECTRICITY_PRICE_COLUMN});
    this.logger.verbose(`Electricity price returned ${electricityPrice.rowCount} rows`);
    return this.forwardFill(electricityPrice, window);
  }

  async getGasPrice(window: PredictorWindow): Promise<TimeSeriesTable> {
    const query =
      "SELECT datetime, price FROM marketprices WHERE name = 'gasPrice' " +
      `AND datetime BETWEEN '${toIsoString(window.start)}' AND '${toIsoString(window.end)}' ORDER BY datetime asc`;
    const raw = await this.sql.execSqlQuery(query);
    const gasPrice = raw.renameColumns({price: GAS_PRICE_COLUMN});
    this.logger.verbose(`Gas price returned ${gasPrice.rowCount} rows`);
    return this.forwardFill(gasPrice, window);
  }

  private forwardFill(table: TimeSeriesTable, window: PredictorWindow): TimeSeriesTable {
    if (!window.resolution || table.isEmpty) {
      return table;
    }
    const grid = buildGridIndex(window.start, window.end, window.resolution);
    return resampleTable(table, grid, {kind: "forward-fill"});
  }
}
