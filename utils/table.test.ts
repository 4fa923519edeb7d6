import { describe, it, expect } from 'vitest';
import { filterRows, formatValue, nextSort, pageCount, paginate, sortRows } from './table';
import type { DisplayRow } from '../types';

const row = (gene_id: string, symbol: string | null, logCPM: number | null): DisplayRow => ({
  gene_id,
  symbol,
  gene_biotype: symbol ? 'protein_coding' : null,
  logCPM,
  log2_fold_change: 1,
  FDR: 0.01,
});

const rows = [row('G1', 'TP53', 4.5), row('G2', null, null), row('G3', 'ACTB', 9.1), row('G4', 'MYC', 1.2)];

describe('formatValue', () => {
  it('shows missing values as NA and pads numbers', () => {
    expect(formatValue(null, 3)).toBe('NA');
    expect(formatValue(1.5, 3)).toBe('1.500');
    expect(formatValue('lncRNA', 3)).toBe('lncRNA');
  });
});

describe('filterRows', () => {
  it('matches gene id, symbol or biotype case-insensitively', () => {
    expect(filterRows(rows, 'tp5').map(r => r.gene_id)).toEqual(['G1']);
    expect(filterRows(rows, 'g2').map(r => r.gene_id)).toEqual(['G2']);
    expect(filterRows(rows, 'PROTEIN').map(r => r.gene_id)).toEqual(['G1', 'G3', 'G4']);
  });

  it('returns every row for a blank query', () => {
    expect(filterRows(rows, '  ')).toBe(rows);
  });
});

describe('sortRows', () => {
  it('sorts numbers in both directions with nulls last', () => {
    expect(sortRows(rows, { key: 'logCPM', direction: 'asc' }).map(r => r.gene_id)).toEqual(['G4', 'G1', 'G3', 'G2']);
    expect(sortRows(rows, { key: 'logCPM', direction: 'desc' }).map(r => r.gene_id)).toEqual(['G3', 'G1', 'G4', 'G2']);
  });

  it('sorts text columns alphabetically', () => {
    expect(sortRows(rows, { key: 'symbol', direction: 'asc' }).map(r => r.symbol)).toEqual(['ACTB', 'MYC', 'TP53', null]);
  });

  it('does not reorder the input array', () => {
    sortRows(rows, { key: 'logCPM', direction: 'asc' });
    expect(rows.map(r => r.gene_id)).toEqual(['G1', 'G2', 'G3', 'G4']);
  });
});

describe('nextSort', () => {
  it('starts ascending and toggles on the same column', () => {
    const first = nextSort(null, 'FDR');
    expect(first).toEqual({ key: 'FDR', direction: 'asc' });
    expect(nextSort(first, 'FDR')).toEqual({ key: 'FDR', direction: 'desc' });
    expect(nextSort(first, 'symbol')).toEqual({ key: 'symbol', direction: 'asc' });
  });
});

describe('pagination', () => {
  it('always has at least one page', () => {
    expect(pageCount(0, 10)).toBe(1);
    expect(pageCount(10, 10)).toBe(1);
    expect(pageCount(11, 10)).toBe(2);
  });

  it('slices one page of rows', () => {
    const items = Array.from({ length: 12 }, (_, i) => i);
    expect(paginate(items, 1, 10)).toEqual([10, 11]);
  });
});
