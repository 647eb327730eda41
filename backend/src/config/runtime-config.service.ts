import { Injectable } from "@nestjs/common";

import { Duration } from "@voltcast/domain";
import type { ConfigDocument } from "./schemas";
import { getRuntimeConfig } from "./runtime-config";

@Injectable()
export class RuntimeConfigService {
  private readonly document: ConfigDocument;

  constructor() {
    const config = getRuntimeConfig();
    if (!config) {
      throw new Error("Runtime configuration not initialised");
    }
    this.document = config;
  }

  getDocumentRef(): ConfigDocument {
    return this.document;
  }

  get weatherNativeCadence(): Duration {
    return Duration.parse(this.document.predictors.weather_native_cadence);
  }

  get loadProfileNativeCadence(): Duration {
    return Duration.parse(this.document.predictors.load_profile_native_cadence);
  }

  get defaultGroups(): string[] | undefined {
    const groups = this.document.predictors.default_groups;
    return groups ? [...groups] : undefined;
  }
}
