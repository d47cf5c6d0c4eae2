import Papa from 'papaparse';
import { DataLoadError } from '../utils/errors.ts';

export type ColumnType = 'integer' | 'number' | 'boolean' | 'string';

/** A parsed cell. Empty cells are missing values. */
export type Cell = string | number | boolean | null;

export interface Column {
  name: string;
  type: ColumnType;
}

/**
 * An uploaded dataset. Rows are positional and aligned with `columns`.
 * Never mutated after parsing; a new upload produces a new table.
 */
export interface Table {
  readonly columns: readonly Column[];
  readonly rows: readonly (readonly Cell[])[];
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const BOOLEAN_PATTERN = /^(true|false)$/i;

function uniqueColumnNames(header: string[]): string[] {
  const used = new Set<string>();
  const suffixes = new Map<string, number>();

  return header.map((raw, index) => {
    const base = raw.trim() || `column_${index + 1}`;
    let suffix = suffixes.get(base) ?? 0;
    let name = suffix === 0 ? base : `${base}.${suffix}`;
    while (used.has(name)) {
      suffix += 1;
      name = `${base}.${suffix}`;
    }
    suffixes.set(base, suffix);
    used.add(name);
    return name;
  });
}

function inferColumnType(raw: string[]): ColumnType {
  if (raw.length === 0) return 'string';
  const values = raw.map((v) => v.trim());
  if (values.every((v) => INTEGER_PATTERN.test(v))) {
    // Identifiers past 2^53 would lose digits as numbers
    return values.every((v) => Number.isSafeInteger(Number(v))) ? 'integer' : 'string';
  }
  if (values.every((v) => NUMBER_PATTERN.test(v))) return 'number';
  if (values.every((v) => BOOLEAN_PATTERN.test(v))) return 'boolean';
  return 'string';
}

function convertCell(raw: string | null, type: ColumnType): Cell {
  if (raw === null) return null;
  switch (type) {
    case 'integer':
    case 'number':
      return Number(raw.trim());
    case 'boolean':
      return raw.trim().toLowerCase() === 'true';
    case 'string':
      return raw;
  }
}

/**
 * Parses CSV text into a typed table. The first non-blank row is the header.
 *
 * @throws DataLoadError when the text has no columns, has unbalanced quotes,
 * or contains a row wider than the header
 */
export function parseCsv(text: string): Table {
  const source = text.startsWith('\uFEFF') ? text.slice(1) : text;
  if (!source.trim()) {
    throw new DataLoadError('No columns to parse from file.');
  }

  const result = Papa.parse<string[]>(source, { skipEmptyLines: 'greedy' });

  // A single-column file has no delimiter to detect; papaparse falls back to comma
  const [firstError] = result.errors.filter((e) => e.code !== 'UndetectableDelimiter');
  if (firstError) {
    const where = typeof firstError.row === 'number' ? ` (row ${firstError.row + 1})` : '';
    throw new DataLoadError(`Malformed CSV${where}: ${firstError.message}`);
  }

  const [header, ...body] = result.data;
  if (!header || header.length === 0) {
    throw new DataLoadError('No columns to parse from file.');
  }

  const names = uniqueColumnNames(header);
  const width = names.length;

  const rawRows = body.map((row, index) => {
    if (row.length > width) {
      throw new DataLoadError(
        `Malformed CSV: expected ${width} fields in data row ${index + 1}, saw ${row.length}.`,
      );
    }
    const cells: (string | null)[] = [];
    for (let i = 0; i < width; i++) {
      const value = row[i] ?? '';
      cells.push(value === '' ? null : value);
    }
    return cells;
  });

  const columns: Column[] = names.map((name, i) => {
    const present: string[] = [];
    for (const row of rawRows) {
      const value = row[i];
      if (value !== null && value !== undefined) present.push(value);
    }
    return { name, type: inferColumnType(present) };
  });

  const rows = rawRows.map((row) =>
    Object.freeze(row.map((raw, i) => convertCell(raw, columns[i]?.type ?? 'string'))),
  );

  return Object.freeze({
    columns: Object.freeze(columns),
    rows: Object.freeze(rows),
  });
}
