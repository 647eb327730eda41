import { Inject, Injectable, Logger } from "@nestjs/common";

import { buildGridIndex, interpolationLimit, resampleTable, TimeSeriesTable, toIsoString } from "@voltcast/domain";
import { RuntimeConfigService } from "../config/runtime-config.service";
import { TIMESERIES_QUERY_EXECUTOR, type TimeSeriesQueryExecutor } from "../datasources/datasource.types";
import { pickMeasurement, type PredictorWindow } from "./predictor.types";

const LOAD_PROFILE_DATABASE = "realised";
const LOAD_PROFILE_MEASUREMENT = "sjv";

/**
 * Standard load profiles (typical yearly consumption curves). Every field of
 * the measurement whose name starts with `sjv` is a profile; the measurement
 * also carries tags that are not selected.
 */
@Injectable()
export class LoadProfileService {
  private readonly logger = new Logger(LoadProfileService.name);

  constructor(
    @Inject(TIMESERIES_QUERY_EXECUTOR) private readonly influx: TimeSeriesQueryExecutor,
    @Inject(RuntimeConfigService) private readonly configState: RuntimeConfigService,
  ) {
  }

  async collect(window: PredictorWindow): Promise<TimeSeriesTable> {
    const query =
      `SELECT /^${LOAD_PROFILE_MEASUREMENT}/ FROM "${LOAD_PROFILE_DATABASE}".."${LOAD_PROFILE_MEASUREMENT}" ` +
      `WHERE time >= '${toIsoString(window.start)}' AND time <= '${toIsoString(window.end)}'`;
    const result = await this.influx.execInfluxQuery(query);
    const loadProfiles = pickMeasurement(result, LOAD_PROFILE_MEASUREMENT) ?? TimeSeriesTable.empty();
    this.logger.verbose(`Load profiles returned ${loadProfiles.rowCount} rows, ${loadProfiles.columnCount} profiles`);

    if (!window.resolution || loadProfiles.isEmpty) {
      return loadProfiles;
    }
    const limit = interpolationLimit(this.configState.loadProfileNativeCadence, window.resolution);
    const grid = buildGridIndex(window.start, window.end, window.resolution);
    return resampleTable(loadProfiles, grid, {kind: "linear", limit});
  }
}
