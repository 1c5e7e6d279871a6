// api/src/market/table/column-table.ts
import { DecodeError, EmptyTableError, OutOfRangeError } from '../market.errors';

export type Cell = string | number | null;
export type Row = readonly Cell[];

export interface DecodeOptions {
  /** Zero rows is an EmptyTableError instead of an empty table */
  required?: boolean;
  symbol?: string;
}

/**
 * Column-oriented table: names given once, values as positional rows.
 *
 * ```json
 * { "columns": ["SECID", "LAST"], "data": [["SBER", 301.5], ["GAZP", null]] }
 * ```
 */
export class ColumnTable {
  readonly columns: readonly string[];
  readonly rows: readonly Row[];

  /** Throws DecodeError when a row's width differs from the column count */
  constructor(columns: readonly string[], rows: readonly Row[]) {
    rows.forEach((r, i) => {
      if (r.length !== columns.length) {
        throw new DecodeError(`Row ${i} has ${r.length} cells, expected ${columns.length}`);
      }
    });
    this.columns = Object.freeze([...columns]);
    this.rows = Object.freeze(rows.map((r) => Object.freeze([...r])));
  }

  get rowCount(): number {
    return this.rows.length;
  }

  /** -1 when the column is not present */
  columnIndex(name: string): number {
    for (let i = 0; i < this.columns.length; i++) {
      if (this.columns[i] === name) return i;
    }
    return -1;
  }

  row(i: number): Row {
    if (!Number.isInteger(i) || i < 0 || i >= this.rows.length) {
      throw new OutOfRangeError(i, this.rows.length);
    }
    return this.rows[i];
  }

  /** First row (top to bottom) whose `column` cell equals `value` */
  findRowWhere(column: string, value: Cell): Row | undefined {
    const idx = this.columnIndex(column);
    if (idx < 0) return undefined;
    return this.rows.find((r) => r[idx] !== null && r[idx] === value);
  }

  cell(row: Row, index: number): Cell | undefined {
    if (index < 0 || index >= row.length) return undefined;
    return row[index];
  }

  asDouble(row: Row, index: number): number | undefined {
    const v = this.cell(row, index);
    if (typeof v === 'number') return Number.isFinite(v) ? v : undefined;
    if (typeof v === 'string' && v.trim() !== '') {
      const n = Number(v);
      return Number.isFinite(n) ? n : undefined;
    }
    return undefined;
  }

  asLong(row: Row, index: number): number | undefined {
    const n = this.asDouble(row, index);
    return n === undefined ? undefined : Math.trunc(n);
  }

  asString(row: Row, index: number): string | undefined {
    const v = this.cell(row, index);
    if (typeof v === 'string') return v;
    if (typeof v === 'number') return Number.isFinite(v) ? String(v) : undefined;
    return undefined;
  }

  /* By-name shorthands used by the resolvers */

  double(row: Row, column: string): number | undefined {
    return this.asDouble(row, this.columnIndex(column));
  }

  long(row: Row, column: string): number | undefined {
    return this.asLong(row, this.columnIndex(column));
  }

  string(row: Row, column: string): string | undefined {
    return this.asString(row, this.columnIndex(column));
  }
}

/**
 * Decode `document[key]` into a ColumnTable.
 * Throws DecodeError on any shape mismatch.
 */
export function decodeTable(
  document: unknown,
  key: string,
  options: DecodeOptions = {},
): ColumnTable {
  const where = options.symbol ? ` for ${options.symbol}` : '';

  if (!isRecord(document)) {
    throw new DecodeError(`Response${where} is not a JSON object`, { symbol: options.symbol });
  }
  const block = document[key];
  if (!isRecord(block)) {
    throw new DecodeError(`Missing "${key}" table${where}`, { symbol: options.symbol });
  }

  const { columns, data } = block;
  if (!Array.isArray(columns) || !columns.every((c): c is string => typeof c === 'string')) {
    throw new DecodeError(`"${key}.columns" must be an array of strings${where}`, {
      symbol: options.symbol,
    });
  }
  if (!Array.isArray(data)) {
    throw new DecodeError(`"${key}.data" must be an array${where}`, { symbol: options.symbol });
  }

  const rows: Row[] = [];
  data.forEach((raw: unknown, i) => {
    if (!Array.isArray(raw)) {
      throw new DecodeError(`"${key}.data[${i}]" is not an array${where}`, {
        symbol: options.symbol,
      });
    }
    if (raw.length !== columns.length) {
      throw new DecodeError(
        `"${key}.data[${i}]" has ${raw.length} cells, expected ${columns.length}${where}`,
        { symbol: options.symbol },
      );
    }
    if (!raw.every(isCell)) {
      throw new DecodeError(`"${key}.data[${i}]" holds a non-scalar cell${where}`, {
        symbol: options.symbol,
      });
    }
    rows.push(raw);
  });

  if (options.required && rows.length === 0) {
    throw new EmptyTableError(key, { symbol: options.symbol });
  }

  return new ColumnTable(columns, rows);
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

function isCell(v: unknown): v is Cell {
  return v === null || typeof v === 'string' || typeof v === 'number';
}
