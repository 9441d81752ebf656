import { Row, valuesEqual } from './row';

import type { FieldInfo, RawResult } from '../types';

/**
 * Fields named by position, for drivers that do not describe their columns
 */
function positionalFields(width: number): FieldInfo[] {
  return Array.from({ length: width }, (_, i) => ({ name: `column${i}`, type: 'unknown' }));
}

/**
 * Immutable outcome of a completed statement.
 */
export class Result implements Iterable<Row> {
  readonly rows: readonly Row[];
  readonly fields: readonly FieldInfo[];
  readonly rowCount: number;
  readonly lastInsertId: number | bigint | null;
  readonly command?: string;

  constructor(init: {
    rows?: readonly Row[];
    fields?: readonly FieldInfo[];
    rowCount?: number;
    lastInsertId?: number | bigint | null;
    command?: string;
  }) {
    this.rows = Object.freeze([...(init.rows ?? [])]);
    this.fields = Object.freeze((init.fields ?? []).map((field) => Object.freeze({ ...field })));
    this.rowCount = init.rowCount ?? this.rows.length;
    this.lastInsertId = init.lastInsertId ?? null;
    if (init.command !== undefined) {
      this.command = init.command;
    }
    Object.freeze(this);
  }

  /**
   * Wrap a driver result. Drivers that report no affected-row count get the
   * number of rows returned.
   */
  static from(raw: RawResult): Result {
    const width = raw.rows[0]?.length;
    const fields =
      width === undefined || raw.fields?.length === width
        ? (raw.fields ?? [])
        : positionalFields(width);
    const columns = fields.map((field) => field.name);
    const rows = raw.rows.map((values) =>
      new Row(values, columns.length === values.length ? columns : values.map((_, i) => `column${i}`)),
    );

    return new Result({
      rows,
      fields,
      rowCount: raw.rowCount ?? rows.length,
      lastInsertId: raw.lastInsertId ?? null,
      ...(raw.command === undefined ? {} : { command: raw.command }),
    });
  }

  get columns(): string[] {
    return this.fields.map((field) => field.name);
  }

  get isEmpty(): boolean {
    return this.rows.length === 0;
  }

  first(): Row | null {
    return this.rows[0] ?? null;
  }

  toObjects(): Array<Record<string, unknown>> {
    return this.rows.map((row) => row.toObject());
  }

  equals(other: Result): boolean {
    if (this === other) {
      return true;
    }

    return (
      this.rowCount === other.rowCount &&
      valuesEqual(this.lastInsertId, other.lastInsertId) &&
      this.fields.length === other.fields.length &&
      this.fields.every((field, i) => {
        const theirs = other.fields[i];
        return (
          theirs !== undefined &&
          field.name === theirs.name &&
          field.type === theirs.type &&
          field.nullable === theirs.nullable
        );
      }) &&
      this.rows.length === other.rows.length &&
      this.rows.every((row, i) => {
        const theirs = other.rows[i];
        return theirs !== undefined && row.equals(theirs);
      })
    );
  }

  [Symbol.iterator](): Iterator<Row> {
    return this.rows[Symbol.iterator]();
  }
}
