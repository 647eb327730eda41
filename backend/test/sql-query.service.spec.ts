import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { Duration } from "@voltcast/domain";
import { SqlQueryService } from "../src/datasources/sql-query.service";
import { MarketDataService } from "../src/predictors/market-data.service";
import { FakeInflux, H, installTestConfig, T0 } from "./support/fakes";

describe("SqlQueryService", () => {
  let sql: SqlQueryService;

  beforeEach(() => {
    sql = new SqlQueryService(installTestConfig());
    sql.appendMarketPrices("gasPrice", [
      {datetime: T0 + 6 * H, price: 22},
      {datetime: T0 - H, price: 19},
      {datetime: T0, price: 20},
    ]);
    sql.appendMarketPrices("coalPrice", [{datetime: T0, price: 90}]);
  });

  afterEach(() => {
    sql.onModuleDestroy();
  });

  it("indexes query rows on their datetime column", async () => {
    const table = await sql.execSqlQuery("SELECT datetime, price FROM marketprices WHERE name = 'gasPrice' ORDER BY datetime asc");

    expect(table.columns).toEqual(["price"]);
    expect(table.index).toEqual([T0 - H, T0, T0 + 6 * H]);
    expect(table.column("price")).toEqual([19, 20, 22]);
  });

  it("serves the gas price for the requested window only", async () => {
    const service = new MarketDataService(new FakeInflux(), sql);

    const gasPrice = await service.getGasPrice({start: T0, end: T0 + 12 * H, resolution: null});

    expect(gasPrice.columns).toEqual(["Elba"]);
    expect(gasPrice.index).toEqual([T0, T0 + 6 * H]);
    expect(gasPrice.column("Elba")).toEqual([20, 22]);
  });

  it("forward-fills the stored gas price onto the grid", async () => {
    const service = new MarketDataService(new FakeInflux(), sql);

    const result = await service.collect({start: T0, end: T0 + 12 * H, resolution: Duration.parse("3h")});

    expect(result.columns).toEqual(["Elba"]);
    expect(result.column("Elba")).toEqual([20, 20, 22, 22, 22]);
  });

  it("returns an empty table when nothing matches", async () => {
    const table = await sql.execSqlQuery("SELECT datetime, price FROM marketprices WHERE name = 'unknown'");

    expect(table.isEmpty).toBe(true);
  });
});
