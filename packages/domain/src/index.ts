export { Duration } from "./duration";
export {
  describeError,
  CollaboratorError,
  ColumnCollisionError,
  ConfigurationError,
  InvalidPredictorGroupError,
  InvalidRequestError,
  PredictorError,
} from "./errors";
export { parseUtcTimestamp, tryParseUtcTimestamp, toIsoString } from "./timestamp";
export type { TimestampInput } from "./timestamp";
export { TimeSeriesTable } from "./time-series-table";
export type { CellValue, TableRow } from "./time-series-table";
export { buildGridIndex, buildTimeGrid, countGridPoints, MAX_GRID_POINTS } from "./time-grid";
export { forwardFill, interpolateLinear, interpolationLimit, resampleTable } from "./resample";
export type { FillPolicy } from "./resample";
export {
  PredictorGroup,
  PREDICTOR_GROUP_ORDER,
  parsePredictorGroup,
  resolvePredictorGroups,
  tryParsePredictorGroup,
} from "./predictor-group";
export { PredictorRequest } from "./predictor-request";
export type { PredictorRequestInput, WeatherLocation } from "./predictor-request";
