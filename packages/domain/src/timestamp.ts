import { InvalidRequestError } from "./errors";

export type TimestampInput = Date | string | number;

const OFFSET_SUFFIX = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * Resolves a timestamp to epoch milliseconds. Strings without a zone designator
 * are read as UTC wall time, so `2021-01-01` and `2021-01-01T00:00` both mean
 * midnight UTC regardless of the host's local zone.
 */
export function parseUtcTimestamp(value: TimestampInput, label = "timestamp"): number {
  let ms: number;
  if (value instanceof Date) {
    ms = value.getTime();
  } else if (typeof value === "number") {
    ms = value;
  } else {
    const text = value.trim();
    if (!text.length) {
      throw new InvalidRequestError(`${label} must not be empty`);
    }
    const normalized = text.includes("T") || !text.includes(" ") ? text : text.replace(" ", "T");
    ms = Date.parse(OFFSET_SUFFIX.test(normalized) || !normalized.includes("T") ? normalized : `${normalized}Z`);
  }
  if (!Number.isFinite(ms)) {
    throw new InvalidRequestError(`${label} '${String(value)}' is not a valid timestamp`);
  }
  return ms;
}

/** Lenient variant for collaborator payloads: unreadable values become null. */
export function tryParseUtcTimestamp(value: unknown): number | null {
  if (value instanceof Date || typeof value === "number" || typeof value === "string") {
    try {
      return parseUtcTimestamp(value);
    } catch (error) {
      if (error instanceof InvalidRequestError) {
        return null;
      }
      throw error;
    }
  }
  return null;
}

export function toIsoString(ms: number): string {
  return new Date(ms).toISOString();
}
