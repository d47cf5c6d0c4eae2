import Papa from 'papaparse';
import { MAX_HEAD_ROWS } from '../config.ts';
import { DataLoadError } from '../utils/errors.ts';
import type { Cell, Column, ColumnType, Table } from './table.ts';

export interface NumericStatistics {
  kind: 'numeric';
  count: number;
  missing: number;
  mean: number | null;
  std: number | null;
  min: number | null;
  p25: number | null;
  p50: number | null;
  p75: number | null;
  max: number | null;
}

export interface CategoricalStatistics {
  kind: 'categorical';
  count: number;
  missing: number;
  unique: number;
  top: string | null;
  freq: number;
}

export type ColumnStatistics = NumericStatistics | CategoricalStatistics;

export interface ColumnProfile extends Column {
  statistics?: ColumnStatistics;
}

/** Read-only summary of a table; regenerate it instead of editing it. */
export interface DatasetProfile {
  rowCount: number;
  columnCount: number;
  columns: readonly ColumnProfile[];
  head: readonly (readonly Cell[])[];
}

export interface ProfileOptions {
  /** Rows to sample from the top of the table, capped at MAX_HEAD_ROWS. */
  headRows?: number;
  includeStatistics?: boolean;
}

const NUMERIC_TYPES: ReadonlySet<ColumnType> = new Set(['integer', 'number']);

/** Integers print as-is; fractions are rounded to 4 decimals with trailing zeros dropped. */
export function formatNumber(value: number): string {
  if (Number.isInteger(value)) return String(value);
  return String(Number(value.toFixed(4)));
}

function formatCell(cell: Cell): string {
  if (cell === null) return '';
  if (typeof cell === 'number') return formatNumber(cell);
  return String(cell);
}

/** Linear interpolation between closest ranks on a sorted array. */
function quantile(sorted: number[], q: number): number | null {
  if (sorted.length === 0) return null;
  const position = (sorted.length - 1) * q;
  const lower = Math.floor(position);
  const upper = Math.ceil(position);
  const lowerValue = sorted[lower] ?? 0;
  const upperValue = sorted[upper] ?? lowerValue;
  return lowerValue + (upperValue - lowerValue) * (position - lower);
}

function numericStatistics(values: Cell[]): NumericStatistics {
  const numbers = values.filter((v): v is number => typeof v === 'number');
  const count = numbers.length;
  const sorted = [...numbers].sort((a, b) => a - b);

  let mean: number | null = null;
  let std: number | null = null;
  if (count > 0) {
    mean = numbers.reduce((sum, v) => sum + v, 0) / count;
    if (count > 1) {
      const m = mean;
      const variance = numbers.reduce((sum, v) => sum + (v - m) ** 2, 0) / (count - 1);
      std = Math.sqrt(variance);
    }
  }

  return {
    kind: 'numeric',
    count,
    missing: values.length - count,
    mean,
    std,
    min: sorted[0] ?? null,
    p25: quantile(sorted, 0.25),
    p50: quantile(sorted, 0.5),
    p75: quantile(sorted, 0.75),
    max: sorted[sorted.length - 1] ?? null,
  };
}

function categoricalStatistics(values: Cell[]): CategoricalStatistics {
  const frequencies = new Map<string, number>();
  let count = 0;
  for (const value of values) {
    if (value === null) continue;
    count += 1;
    const key = formatCell(value);
    frequencies.set(key, (frequencies.get(key) ?? 0) + 1);
  }

  // Map preserves insertion order, so ties resolve to the first value seen
  let top: string | null = null;
  let freq = 0;
  for (const [value, n] of frequencies) {
    if (n > freq) {
      top = value;
      freq = n;
    }
  }

  return {
    kind: 'categorical',
    count,
    missing: values.length - count,
    unique: frequencies.size,
    top,
    freq,
  };
}

/**
 * Derives a profile from a table. Pure: the same table always yields the same profile.
 *
 * @throws DataLoadError when the table has no columns
 */
export function profileTable(table: Table, options: ProfileOptions = {}): DatasetProfile {
  if (table.columns.length === 0) {
    throw new DataLoadError('The dataset has no columns.');
  }

  const headRows = Math.min(Math.max(options.headRows ?? MAX_HEAD_ROWS, 0), MAX_HEAD_ROWS);
  const includeStatistics = options.includeStatistics ?? true;

  const columns = table.columns.map((column, index): ColumnProfile => {
    if (!includeStatistics) return { ...column };
    const values = table.rows.map((row) => row[index] ?? null);
    return {
      ...column,
      statistics: NUMERIC_TYPES.has(column.type)
        ? numericStatistics(values)
        : categoricalStatistics(values),
    };
  });

  return {
    rowCount: table.rows.length,
    columnCount: table.columns.length,
    columns,
    head: table.rows.slice(0, headRows),
  };
}

function renderStatistics(stats: ColumnStatistics): string {
  const show = (value: number | null) => (value === null ? 'n/a' : formatNumber(value));
  if (stats.kind === 'numeric') {
    return [
      `count=${stats.count}`,
      `missing=${stats.missing}`,
      `mean=${show(stats.mean)}`,
      `std=${show(stats.std)}`,
      `min=${show(stats.min)}`,
      `25%=${show(stats.p25)}`,
      `50%=${show(stats.p50)}`,
      `75%=${show(stats.p75)}`,
      `max=${show(stats.max)}`,
    ].join(', ');
  }
  return [
    `count=${stats.count}`,
    `missing=${stats.missing}`,
    `unique=${stats.unique}`,
    `top=${stats.top ?? 'n/a'}`,
    `freq=${stats.freq}`,
  ].join(', ');
}

/**
 * Renders a profile as the text block sent to the model.
 * Column names and the column list are never truncated.
 */
export function renderProfile(profile: DatasetProfile): string {
  const names = profile.columns.map((c) => c.name);
  const lines = [
    'Dataset Overview:',
    `- Shape: ${profile.rowCount} rows, ${profile.columnCount} columns`,
    `- Columns: ${names.join(', ')}`,
    `- Data types: ${profile.columns.map((c) => `${c.name}: ${c.type}`).join(', ')}`,
  ];

  if (profile.head.length > 0) {
    const sample = Papa.unparse(
      {
        fields: names,
        data: profile.head.map((row) => row.map(formatCell)),
      },
      { newline: '\n' },
    );
    lines.push('', `First ${profile.head.length} rows:`, sample);
  }

  const withStatistics = profile.columns.filter(
    (c): c is ColumnProfile & { statistics: ColumnStatistics } => c.statistics !== undefined,
  );
  if (withStatistics.length > 0) {
    lines.push('', 'Summary statistics:');
    for (const column of withStatistics) {
      lines.push(`- ${column.name}: ${renderStatistics(column.statistics)}`);
    }
  }

  return lines.join('\n');
}
