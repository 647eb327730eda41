import { mkdirSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { Inject, Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import type { Database } from "better-sqlite3";
import DatabaseConstructor from "better-sqlite3";

import { TimeSeriesTable, toIsoString } from "@voltcast/domain";
import { RuntimeConfigService } from "../config/runtime-config.service";
import type { RelationalQueryExecutor } from "./datasource.types";

const IN_MEMORY = ":memory:";

export interface MarketPriceRecord {
  datetime: number;
  price: number;
}

@Injectable()
export class SqlQueryService implements RelationalQueryExecutor, OnModuleDestroy {
  private readonly dbPath: string;
  private readonly db: Database;
  private readonly logger = new Logger(SqlQueryService.name);

  constructor(@Inject(RuntimeConfigService) configState: RuntimeConfigService) {
    const configured = configState.getDocumentRef().sql.path;
    this.dbPath = configured === IN_MEMORY ? IN_MEMORY : resolve(process.cwd(), configured);
    if (this.dbPath !== IN_MEMORY) {
      mkdirSync(dirname(this.dbPath), {recursive: true});
    }
    this.db = new DatabaseConstructor(this.dbPath);
    if (this.dbPath !== IN_MEMORY) {
      this.db.pragma("journal_mode = WAL");
    }
    this.migrate();
    this.logger.log(`Relational store opened at ${this.dbPath}`);
  }

  onModuleDestroy(): void {
    this.db.close();
    this.logger.verbose("Relational store connection closed");
  }

  execSqlQuery(query: string): Promise<TimeSeriesTable> {
    this.logger.debug(`SQL ${query.replace(/\s+/g, " ").trim()}`);
    const rows = this.db.prepare(query).all().filter(isRecord);
    this.logger.verbose(`SQL query returned ${rows.length} rows`);
    return Promise.resolve(TimeSeriesTable.fromRecords(rows, "datetime"));
  }

  /**
   * Ingest entry point for the relational price store: whatever loads gas or
   * other commodity prices writes through here, and so do the test fixtures.
   * Read access goes through `execSqlQuery` only.
   */
  appendMarketPrices(name: string, records: readonly MarketPriceRecord[]): void {
    if (!records.length) {
      return;
    }
    const insert = this.db.prepare("INSERT INTO marketprices (datetime, name, price) VALUES (?, ?, ?)");
    const txn = this.db.transaction((entries: readonly MarketPriceRecord[]) => {
      for (const entry of entries) {
        insert.run(toIsoString(entry.datetime), name, entry.price);
      }
    });
    txn(records);
    this.logger.verbose(`Stored ${records.length} '${name}' price rows`);
  }

  private migrate(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS marketprices (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        datetime TEXT NOT NULL,
        name TEXT NOT NULL,
        price REAL
      );
      CREATE INDEX IF NOT EXISTS idx_marketprices_name_datetime ON marketprices(name, datetime);
    `);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
