/**
 * Row
 *
 * A frozen tuple of column values that can also be read by column name.
 *
 * @example
 * ```typescript
 * const row = new Row([1, 'alice'], ['id', 'name']);
 * row.at(0);        // 1
 * row.get('name');  // 'alice'
 * row.toObject();   // { id: 1, name: 'alice' }
 * ```
 */

import { ValidationError } from '../errors';

export type ColumnMapper = (value: unknown) => unknown;

export function valuesEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) {
    return true;
  }
  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime();
  }
  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    return a.length === b.length && a.every((byte, i) => byte === b[i]);
  }
  return false;
}

export class Row implements Iterable<unknown> {
  readonly values: readonly unknown[];
  readonly columns: readonly string[];
  private readonly index: ReadonlyMap<string, number>;

  constructor(values: readonly unknown[], columns: readonly string[]) {
    if (values.length !== columns.length) {
      throw new ValidationError(
        `Row has ${values.length} values but ${columns.length} columns`,
        'columns',
      );
    }

    this.values = Object.freeze([...values]);
    this.columns = Object.freeze([...columns]);

    // first occurrence wins for duplicate column names
    const index = new Map<string, number>();
    this.columns.forEach((name, i) => {
      if (!index.has(name)) {
        index.set(name, i);
      }
    });
    this.index = index;
    Object.freeze(this);
  }

  get length(): number {
    return this.values.length;
  }

  at(position: number): unknown {
    return this.values.at(position);
  }

  has(column: string): boolean {
    return this.index.has(column);
  }

  /**
   * Value of the named column, or `fallback` when the row has no such column
   */
  get(column: string, fallback?: unknown): unknown {
    const position = this.index.get(column);
    return position === undefined ? fallback : this.values[position];
  }

  toObject(): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [name, position] of this.index) {
      // plain assignment to "__proto__" would set the prototype instead
      Object.defineProperty(result, name, {
        value: this.values[position],
        enumerable: true,
        writable: true,
        configurable: true,
      });
    }
    return result;
  }

  /**
   * Copy of this row with the given columns passed through a mapper
   */
  map(mappers: Readonly<Record<string, ColumnMapper>>): Row {
    const mapped = this.values.map((value, i) => {
      const name = this.columns[i];
      const mapper = name !== undefined && Object.hasOwn(mappers, name) ? mappers[name] : undefined;
      return mapper ? mapper(value) : value;
    });
    return new Row(mapped, this.columns);
  }

  equals(other: Row): boolean {
    return (
      this.length === other.length &&
      this.columns.every((name, i) => name === other.columns[i]) &&
      this.values.every((value, i) => valuesEqual(value, other.values[i]))
    );
  }

  [Symbol.iterator](): Iterator<unknown> {
    return this.values[Symbol.iterator]();
  }
}
