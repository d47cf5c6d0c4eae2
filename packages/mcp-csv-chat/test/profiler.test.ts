import { describe, expect, it } from 'vitest';
import { formatNumber, profileTable, renderProfile } from '../src/core/profiler.ts';
import { parseCsv, type Table } from '../src/core/table.ts';
import { DataLoadError } from '../src/utils/errors.ts';

const SALES_CSV = 'region,sales\nNorth,100\nSouth,200\nEast,300\n';

describe('profileTable', () => {
  it('computes numeric and categorical statistics', () => {
    const profile = profileTable(parseCsv(SALES_CSV));

    expect(profile.rowCount).toBe(3);
    expect(profile.columnCount).toBe(2);
    expect(profile.columns[0]?.statistics).toEqual({
      kind: 'categorical',
      count: 3,
      missing: 0,
      unique: 3,
      top: 'North',
      freq: 1,
    });
    expect(profile.columns[1]?.statistics).toEqual({
      kind: 'numeric',
      count: 3,
      missing: 0,
      mean: 200,
      std: 100,
      min: 100,
      p25: 150,
      p50: 200,
      p75: 250,
      max: 300,
    });
  });

  it('counts missing values and ignores them in numeric statistics', () => {
    const profile = profileTable(parseCsv('n,label\n4,a\n,b\n8,c\n'));
    expect(profile.columns[0]?.statistics).toMatchObject({ count: 2, missing: 1, mean: 6, min: 4, max: 8 });
  });

  it('breaks ties for the most frequent value by first appearance', () => {
    const profile = profileTable(parseCsv('k\nb\na\nb\na\n'));
    expect(profile.columns[0]?.statistics).toMatchObject({ unique: 2, top: 'b', freq: 2 });
  });

  it('caps the head sample at ten rows', () => {
    const csv = `n\n${Array.from({ length: 12 }, (_, i) => i + 1).join('\n')}\n`;
    const table = parseCsv(csv);

    expect(profileTable(table).head).toHaveLength(10);
    expect(profileTable(table, { headRows: 3 }).head).toHaveLength(3);
    expect(profileTable(table, { headRows: 50 }).head).toHaveLength(10);
  });

  it('omits statistics when asked to', () => {
    const profile = profileTable(parseCsv(SALES_CSV), { includeStatistics: false });
    expect(profile.columns.every((c) => c.statistics === undefined)).toBe(true);
  });

  it('rejects a table without columns', () => {
    const empty: Table = { columns: [], rows: [] };
    expect(() => profileTable(empty)).toThrow(DataLoadError);
  });
});

describe('renderProfile', () => {
  it('renders shape, columns, sample and statistics', () => {
    const text = renderProfile(profileTable(parseCsv(SALES_CSV)));

    expect(text).toBe(
      [
        'Dataset Overview:',
        '- Shape: 3 rows, 2 columns',
        '- Columns: region, sales',
        '- Data types: region: string, sales: integer',
        '',
        'First 3 rows:',
        'region,sales',
        'North,100',
        'South,200',
        'East,300',
        '',
        'Summary statistics:',
        '- region: count=3, missing=0, unique=3, top=North, freq=1',
        '- sales: count=3, missing=0, mean=200, std=100, min=100, 25%=150, 50%=200, 75%=250, max=300',
      ].join('\n'),
    );
  });

  it('is deterministic for the same table', () => {
    const table = parseCsv('city,temp,rain\nOslo,3.5,true\nRome,18.25,false\nOslo,,true\n');
    expect(renderProfile(profileTable(table))).toBe(renderProfile(profileTable(table)));
  });

  it('never truncates column names', () => {
    const longName = `measurement_${'x'.repeat(120)}`;
    const text = renderProfile(profileTable(parseCsv(`${longName},b\n1,2\n`)));
    expect(text.split('\n')[2]).toBe(`- Columns: ${longName}, b`);
  });

  it('renders a header-only table without a sample', () => {
    const text = renderProfile(profileTable(parseCsv('a\n')));
    expect(text).toBe(
      [
        'Dataset Overview:',
        '- Shape: 0 rows, 1 columns',
        '- Columns: a',
        '- Data types: a: string',
        '',
        'Summary statistics:',
        '- a: count=0, missing=0, unique=0, top=n/a, freq=0',
      ].join('\n'),
    );
  });

  it('leaves out the statistics section when they were not computed', () => {
    const text = renderProfile(profileTable(parseCsv(SALES_CSV), { includeStatistics: false }));
    expect(text.split('\n').at(-1)).toBe('East,300');
  });
});

describe('formatNumber', () => {
  it('prints integers as-is and rounds fractions to four decimals', () => {
    expect(formatNumber(7)).toBe('7');
    expect(formatNumber(1.5)).toBe('1.5');
    expect(formatNumber(2 / 3)).toBe('0.6667');
  });
});
