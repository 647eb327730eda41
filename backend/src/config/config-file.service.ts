import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { resolve } from "node:path";
import { Injectable, Logger } from "@nestjs/common";

import { type ConfigDocument, parseConfigDocument } from "./schemas";

const DEFAULT_CANDIDATES = ["config.json", "../config.json"];

@Injectable()
export class ConfigFileService {
  private readonly logger = new Logger(ConfigFileService.name);

  resolvePath(): string {
    const override = process.env.VOLTCAST_CONFIG?.trim();
    if (override && override.length > 0) {
      return resolve(process.cwd(), override);
    }
    for (const candidate of DEFAULT_CANDIDATES) {
      const path = resolve(process.cwd(), candidate);
      if (existsSync(path)) {
        return path;
      }
    }
    throw new Error(`No configuration file found (looked for ${DEFAULT_CANDIDATES.join(", ")}); set VOLTCAST_CONFIG`);
  }

  async loadDocument(path: string): Promise<ConfigDocument> {
    this.logger.verbose(`Reading configuration from ${path}`);
    const text = await readFile(path, "utf-8");
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new Error(`Configuration file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    const document = parseConfigDocument(raw);
    const sqlOverride = process.env.VOLTCAST_SQL_PATH?.trim();
    if (sqlOverride && sqlOverride.length > 0) {
      document.sql = {...document.sql, path: sqlOverride};
    }
    return document;
  }
}
