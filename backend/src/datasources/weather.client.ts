import { Inject, Injectable, Logger } from "@nestjs/common";
import { z } from "zod";

import { CollaboratorError, TimeSeriesTable, toIsoString, type WeatherLocation } from "@voltcast/domain";
import { RuntimeConfigService } from "../config/runtime-config.service";
import type { WeatherConfig } from "../config/schemas";
import type { WeatherDataQuery, WeatherProvider } from "./datasource.types";

const weatherResponseSchema = z.union([
  z.array(z.record(z.unknown())),
  z.object({data: z.array(z.record(z.unknown()))}).transform((value) => value.data),
]);

@Injectable()
export class WeatherClient implements WeatherProvider {
  private readonly logger = new Logger(WeatherClient.name);
  private readonly cfg: WeatherConfig;

  constructor(@Inject(RuntimeConfigService) configState: RuntimeConfigService) {
    this.cfg = configState.getDocumentRef().weather;
  }

  async getWeatherData(query: WeatherDataQuery): Promise<TimeSeriesTable> {
    const url = new URL("weather", this.cfg.base_url.endsWith("/") ? this.cfg.base_url : `${this.cfg.base_url}/`);
    url.searchParams.set("location", formatLocation(query.location));
    url.searchParams.set("parameters", query.parameters.join(","));
    url.searchParams.set("start", query.start.toISOString());
    url.searchParams.set("end", query.end.toISOString());
    url.searchParams.set("source", query.source);

    this.logger.log(`Fetching weather for ${formatLocation(query.location)} (${toIsoString(query.start.getTime())}..${toIsoString(query.end.getTime())})`);
    const payload = await this.fetchJson(url);
    const parsed = weatherResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new CollaboratorError("weather", "unexpected response shape");
    }
    return TimeSeriesTable.fromRecords(parsed.data, "datetime");
  }

  private async fetchJson(url: URL): Promise<unknown> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.cfg.timeout_ms);
    try {
      const response = await fetch(url, {headers: {Accept: "application/json"}, signal: controller.signal});
      if (!response.ok) {
        throw new CollaboratorError("weather", `HTTP ${response.status} ${response.statusText}`);
      }
      return (await response.json()) as unknown;
    } finally {
      clearTimeout(timer);
    }
  }
}

export function formatLocation(location: WeatherLocation): string {
  return typeof location === "string" ? location : `${location[0]},${location[1]}`;
}
