import { InvalidPredictorGroupError } from "./errors";

export const PredictorGroup = {
  WEATHER_DATA: "weather_data",
  MARKET_DATA: "market_data",
  LOAD_PROFILES: "load_profiles",
} as const;

export type PredictorGroup = (typeof PredictorGroup)[keyof typeof PredictorGroup];

/** Merge order, and therefore output column order. */
export const PREDICTOR_GROUP_ORDER: readonly PredictorGroup[] = [
  PredictorGroup.WEATHER_DATA,
  PredictorGroup.MARKET_DATA,
  PredictorGroup.LOAD_PROFILES,
];

const BY_NAME = new Map<string, PredictorGroup>(
  Object.entries(PredictorGroup).flatMap(([name, value]): [string, PredictorGroup][] => [
    [name.toLowerCase(), value],
    [value, value],
  ]),
);

/** Accepts either the wire value (`market_data`) or the variant name (`MARKET_DATA`). */
export function parsePredictorGroup(identifier: string): PredictorGroup {
  const group = tryParsePredictorGroup(identifier);
  if (group === null) {
    throw new InvalidPredictorGroupError(identifier, PREDICTOR_GROUP_ORDER);
  }
  return group;
}

export function tryParsePredictorGroup(identifier: string): PredictorGroup | null {
  return BY_NAME.get(identifier.trim().toLowerCase()) ?? null;
}

/**
 * Parses and deduplicates the requested groups and returns them in merge
 * order. `undefined` selects every group.
 */
export function resolvePredictorGroups(groups?: readonly string[] | null): PredictorGroup[] {
  if (groups === undefined || groups === null) {
    return [...PREDICTOR_GROUP_ORDER];
  }
  const requested = new Set(groups.map((identifier) => parsePredictorGroup(identifier)));
  return PREDICTOR_GROUP_ORDER.filter((group) => requested.has(group));
}
