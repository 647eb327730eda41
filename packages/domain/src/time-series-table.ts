import { ColumnCollisionError, InvalidRequestError } from "./errors";
import { toIsoString, tryParseUtcTimestamp } from "./timestamp";

export type CellValue = number | string | null;

export type TableRow = { timestamp: string } & Record<string, CellValue>;

type ColumnMap = ReadonlyMap<string, readonly CellValue[]>;

/**
 * Immutable, time-indexed table. The index holds UTC epoch milliseconds in
 * strictly ascending order; every column has one cell per index entry and
 * `null` marks a missing value.
 */
export class TimeSeriesTable {
  private readonly _index: readonly number[];
  private readonly _columns: ColumnMap;

  private constructor(index: readonly number[], columns: ColumnMap) {
    this._index = index;
    this._columns = columns;
  }

  static empty(index: readonly number[] = []): TimeSeriesTable {
    return TimeSeriesTable.fromColumns(index, {});
  }

  /**
   * Builds a table from parallel arrays. The index is sorted and duplicate
   * timestamps collapse onto their first occurrence.
   */
  static fromColumns(index: readonly number[], columns: Record<string, readonly CellValue[]>): TimeSeriesTable {
    for (const [name, values] of Object.entries(columns)) {
      if (values.length !== index.length) {
        throw new InvalidRequestError(
          `Column '${name}' has ${values.length} values for an index of ${index.length} timestamps`,
        );
      }
    }
    for (const ts of index) {
      if (!Number.isFinite(ts)) {
        throw new InvalidRequestError(`Index contains an invalid timestamp (${ts})`);
      }
    }

    const order = index
      .map((ts, position) => ({ts, position}))
      .sort((a, b) => a.ts - b.ts || a.position - b.position);
    const kept: number[] = [];
    for (const entry of order) {
      const previous = kept.length ? index[kept[kept.length - 1]] : undefined;
      if (previous !== entry.ts) {
        kept.push(entry.position);
      }
    }

    const sortedIndex = kept.map((position) => index[position]);
    const sortedColumns = new Map<string, readonly CellValue[]>();
    for (const [name, values] of Object.entries(columns)) {
      sortedColumns.set(name, kept.map((position) => values[position]));
    }
    return new TimeSeriesTable(sortedIndex, sortedColumns);
  }

  /**
   * Reads row objects as returned by query collaborators. `timeKey` names the
   * field holding the timestamp; rows without a readable timestamp are skipped.
   * Column order follows first appearance across the rows.
   */
  static fromRecords(rows: readonly Record<string, unknown>[], timeKey: string): TimeSeriesTable {
    const names: string[] = [];
    const seen = new Set<string>();
    for (const row of rows) {
      for (const key of Object.keys(row)) {
        if (key !== timeKey && !seen.has(key)) {
          seen.add(key);
          names.push(key);
        }
      }
    }

    const index: number[] = [];
    const columns: Record<string, CellValue[]> = {};
    for (const name of names) {
      columns[name] = [];
    }
    for (const row of rows) {
      const ts = tryParseUtcTimestamp(row[timeKey]);
      if (ts === null) {
        continue;
      }
      index.push(ts);
      for (const name of names) {
        columns[name].push(toCell(row[name]));
      }
    }
    return TimeSeriesTable.fromColumns(index, columns);
  }

  get index(): readonly number[] {
    return this._index;
  }

  get timestamps(): Date[] {
    return this._index.map((ts) => new Date(ts));
  }

  get columns(): string[] {
    return [...this._columns.keys()];
  }

  get rowCount(): number {
    return this._index.length;
  }

  get columnCount(): number {
    return this._columns.size;
  }

  /** True when there is nothing to read: no rows or no columns. */
  get isEmpty(): boolean {
    return this.rowCount === 0 || this.columnCount === 0;
  }

  hasColumn(name: string): boolean {
    return this._columns.has(name);
  }

  column(name: string): readonly CellValue[] {
    const values = this._columns.get(name);
    if (!values) {
      throw new InvalidRequestError(`Unknown column '${name}'`);
    }
    return values;
  }

  valueAt(name: string, timestamp: number): CellValue | undefined {
    const position = this._index.indexOf(timestamp);
    if (position < 0) {
      return undefined;
    }
    return this.column(name)[position];
  }

  renameColumns(mapping: Record<string, string>): TimeSeriesTable {
    const renamed = new Map<string, readonly CellValue[]>();
    for (const [name, values] of this._columns) {
      renamed.set(mapping[name] ?? name, values);
    }
    return new TimeSeriesTable(this._index, renamed);
  }

  dropColumns(names: readonly string[]): TimeSeriesTable {
    const dropped = new Set(names);
    const remaining = new Map([...this._columns].filter(([name]) => !dropped.has(name)));
    return new TimeSeriesTable(this._index, remaining);
  }

  /** Replaces `name` in place when it exists, otherwise appends it. */
  withColumn(name: string, values: readonly CellValue[]): TimeSeriesTable {
    if (values.length !== this._index.length) {
      throw new InvalidRequestError(`Column '${name}' must have ${this._index.length} values`);
    }
    const next = new Map(this._columns);
    next.set(name, values);
    return new TimeSeriesTable(this._index, next);
  }

  /**
   * Outer join on time. The index becomes the sorted union of both indexes;
   * cells missing on either side are null. A column present on both sides is
   * rejected with a `ColumnCollisionError` carrying the given owner labels.
   */
  join(other: TimeSeriesTable, owners: { left?: string; right?: string } = {}): TimeSeriesTable {
    for (const name of other._columns.keys()) {
      if (this._columns.has(name)) {
        throw new ColumnCollisionError(name, owners.left ?? "left table", owners.right ?? "right table");
      }
    }

    const union = sameIndex(this._index, other._index)
      ? this._index
      : [...new Set([...this._index, ...other._index])].sort((a, b) => a - b);
    const joined = new Map<string, readonly CellValue[]>();
    for (const [name, values] of this._columns) {
      joined.set(name, align(this._index, values, union));
    }
    for (const [name, values] of other._columns) {
      joined.set(name, align(other._index, values, union));
    }
    return new TimeSeriesTable(union, joined);
  }

  toRows(): TableRow[] {
    const names = this.columns;
    return this._index.map((ts, position) => {
      const row: TableRow = {timestamp: toIsoString(ts)};
      for (const name of names) {
        row[name] = this.column(name)[position];
      }
      return row;
    });
  }
}

function toCell(value: unknown): CellValue {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  return null;
}

function sameIndex(a: readonly number[], b: readonly number[]): boolean {
  return a.length === b.length && a.every((ts, position) => ts === b[position]);
}

function align(source: readonly number[], values: readonly CellValue[], target: readonly number[]): CellValue[] {
  if (sameIndex(source, target)) {
    return [...values];
  }
  const lookup = new Map<number, number>();
  source.forEach((ts, position) => lookup.set(ts, position));
  return target.map((ts) => {
    const position = lookup.get(ts);
    return position === undefined ? null : values[position];
  });
}
