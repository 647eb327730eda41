import { Inject, Injectable, Logger } from "@nestjs/common";
import { z } from "zod";

import { type CellValue, CollaboratorError, TimeSeriesTable } from "@voltcast/domain";
import { RuntimeConfigService } from "../config/runtime-config.service";
import type { InfluxConfig } from "../config/schemas";
import type { TimeSeriesQueryExecutor } from "./datasource.types";

const cellSchema = z.union([z.number(), z.string(), z.boolean(), z.null()]);

const seriesSchema = z.object({
  name: z.string(),
  columns: z.array(z.string()),
  values: z.array(z.array(cellSchema)).default([]),
});

const influxResponseSchema = z.object({
  results: z
    .array(
      z.object({
        statement_id: z.number().optional(),
        series: z.array(seriesSchema).optional(),
        error: z.string().optional(),
      }),
    )
    .default([]),
  error: z.string().optional(),
});

type InfluxSeries = z.infer<typeof seriesSchema>;

/**
 * Reads from an InfluxDB 1.x `/query` endpoint. Timestamps are requested as
 * epoch milliseconds; series of the same measurement returned by several
 * statements are concatenated.
 */
@Injectable()
export class InfluxQueryService implements TimeSeriesQueryExecutor {
  private readonly logger = new Logger(InfluxQueryService.name);
  private readonly cfg: InfluxConfig;

  constructor(@Inject(RuntimeConfigService) configState: RuntimeConfigService) {
    this.cfg = configState.getDocumentRef().influx;
  }

  async execInfluxQuery(query: string): Promise<Record<string, TimeSeriesTable>> {
    const payload = await this.fetchJson(query);
    const parsed = influxResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new CollaboratorError("influx", `unexpected response shape (${parsed.error.issues[0]?.message ?? "invalid"})`);
    }
    if (parsed.data.error) {
      throw new CollaboratorError("influx", parsed.data.error);
    }

    const grouped = new Map<string, InfluxSeries[]>();
    for (const result of parsed.data.results) {
      if (result.error) {
        throw new CollaboratorError("influx", result.error);
      }
      for (const series of result.series ?? []) {
        const bucket = grouped.get(series.name) ?? [];
        bucket.push(series);
        grouped.set(series.name, bucket);
      }
    }

    const tables: Record<string, TimeSeriesTable> = {};
    for (const [name, seriesList] of grouped) {
      tables[name] = toTable(seriesList);
      this.logger.verbose(`Influx measurement ${name} returned ${tables[name].rowCount} rows`);
    }
    return tables;
  }

  private async fetchJson(query: string): Promise<unknown> {
    const url = new URL("query", this.cfg.url.endsWith("/") ? this.cfg.url : `${this.cfg.url}/`);
    url.searchParams.set("q", query.replace(/\s+/g, " ").trim());
    url.searchParams.set("epoch", "ms");
    const headers: Record<string, string> = {Accept: "application/json"};
    if (this.cfg.username) {
      const token = Buffer.from(`${this.cfg.username}:${this.cfg.password ?? ""}`).toString("base64");
      headers.Authorization = `Basic ${token}`;
    }

    this.logger.debug(`Influx GET ${url.pathname}?q=${url.searchParams.get("q") ?? ""}`);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.cfg.timeout_ms);
    try {
      const response = await fetch(url, {headers, signal: controller.signal});
      if (!response.ok) {
        throw new CollaboratorError("influx", `HTTP ${response.status} ${response.statusText}`);
      }
      return (await response.json()) as unknown;
    } finally {
      clearTimeout(timer);
    }
  }
}

function toTable(seriesList: readonly InfluxSeries[]): TimeSeriesTable {
  const rows: Record<string, unknown>[] = [];
  for (const series of seriesList) {
    for (const values of series.values) {
      const row: Record<string, unknown> = {};
      series.columns.forEach((column, position) => {
        row[column] = toCell(values[position]);
      });
      rows.push(row);
    }
  }
  if (!rows.length) {
    const columns: Record<string, CellValue[]> = {};
    for (const column of seriesList[0]?.columns ?? []) {
      if (column !== "time") {
        columns[column] = [];
      }
    }
    return TimeSeriesTable.fromColumns([], columns);
  }
  return TimeSeriesTable.fromRecords(rows, "time");
}

function toCell(value: string | number | boolean | null | undefined): CellValue {
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  return value ?? null;
}
