import { InvalidRequestError } from "./errors";

const MS_PER_SECOND = 1000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;
const MS_PER_DAY = 24 * MS_PER_HOUR;

const ALIAS_UNITS: ReadonlyMap<string, number> = new Map([
  ["ms", 1],
  ["l", 1],
  ["s", MS_PER_SECOND],
  ["t", MS_PER_MINUTE],
  ["min", MS_PER_MINUTE],
  ["h", MS_PER_HOUR],
  ["d", MS_PER_DAY],
]);

const ALIAS_PATTERN = /^(\d+)?\s*([a-z]+)$/i;
const ISO_PATTERN = /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/i;

export class Duration {
  private readonly _milliseconds: number;

  private constructor(milliseconds: number) {
    if (!Number.isFinite(milliseconds) || milliseconds < 0) {
      throw new RangeError("Duration requires a finite, non-negative number of milliseconds");
    }
    this._milliseconds = milliseconds;
  }

  static fromMilliseconds(value: number): Duration {
    return new Duration(value);
  }

  static fromMinutes(value: number): Duration {
    return new Duration(value * MS_PER_MINUTE);
  }

  static fromHours(value: number): Duration {
    return new Duration(value * MS_PER_HOUR);
  }

  static zero(): Duration {
    return new Duration(0);
  }

  /**
   * Reads a grid resolution such as `15min`, `15T`, `1H`, `H`, `30s` or
   * `PT15M`. Zero-length resolutions are rejected.
   */
  static parse(value: string): Duration {
    const parsed = Duration.tryParse(value);
    if (parsed === null) {
      throw new InvalidRequestError(`Unsupported resolution '${value}'`);
    }
    return parsed;
  }

  /** Like `parse`, but returns `null` for anything `parse` rejects. */
  static tryParse(value: string): Duration | null {
    const text = value.trim();
    const parsed = Duration.parseAlias(text) ?? Duration.parseIso(text);
    if (parsed === null || parsed._milliseconds === 0) {
      return null;
    }
    return parsed;
  }

  get milliseconds(): number {
    return this._milliseconds;
  }

  get minutes(): number {
    return this._milliseconds / MS_PER_MINUTE;
  }

  get hours(): number {
    return this._milliseconds / MS_PER_HOUR;
  }

  /** How many steps of `step` fit in this duration, rounded up. */
  stepsOf(step: Duration): number {
    if (step._milliseconds === 0) {
      throw new RangeError("Cannot divide by a zero duration");
    }
    return Math.ceil(this._milliseconds / step._milliseconds);
  }

  equals(other: Duration | null | undefined): boolean {
    return other instanceof Duration && other._milliseconds === this._milliseconds;
  }

  toJSON(): number {
    return this._milliseconds;
  }

  toString(): string {
    if (this._milliseconds % MS_PER_HOUR === 0) {
      return `${this._milliseconds / MS_PER_HOUR}h`;
    }
    if (this._milliseconds % MS_PER_MINUTE === 0) {
      return `${this._milliseconds / MS_PER_MINUTE}min`;
    }
    if (this._milliseconds % MS_PER_SECOND === 0) {
      return `${this._milliseconds / MS_PER_SECOND}s`;
    }
    return `${this._milliseconds}ms`;
  }

  private static parseAlias(text: string): Duration | null {
    const match = ALIAS_PATTERN.exec(text);
    if (!match) {
      return null;
    }
    const unit = ALIAS_UNITS.get(match[2].toLowerCase());
    if (unit === undefined) {
      return null;
    }
    const count = match[1] === undefined ? 1 : Number(match[1]);
    const milliseconds = count * unit;
    return Number.isSafeInteger(milliseconds) ? new Duration(milliseconds) : null;
  }

  private static parseIso(text: string): Duration | null {
    const match = ISO_PATTERN.exec(text);
    if (!match || text.toUpperCase() === "P" || text.toUpperCase().endsWith("T")) {
      return null;
    }
    const [, days, hours, minutes, seconds] = match;
    const total =
      Number(days ?? 0) * MS_PER_DAY +
      Number(hours ?? 0) * MS_PER_HOUR +
      Number(minutes ?? 0) * MS_PER_MINUTE +
      Number(seconds ?? 0) * MS_PER_SECOND;
    return Number.isSafeInteger(total) ? new Duration(total) : null;
  }
}
