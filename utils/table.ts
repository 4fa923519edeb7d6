import type { DisplayRow, SortDirection } from '../types';

export type SortKey = keyof DisplayRow;

export interface SortState {
  key: SortKey;
  direction: SortDirection;
}

export const formatValue = (value: string | number | null, decimals: number) => {
  if (value === null) return 'NA';
  return typeof value === 'number' ? value.toFixed(decimals) : value;
};

export const filterRows = (rows: DisplayRow[], query: string): DisplayRow[] => {
  const q = query.trim().toLowerCase();
  if (!q) return rows;
  return rows.filter(r =>
    [r.gene_id, r.symbol, r.gene_biotype].some(v => v !== null && v.toLowerCase().includes(q))
  );
};

// Nulls sort last in either direction
export const sortRows = (rows: DisplayRow[], sort: SortState | null): DisplayRow[] => {
  if (!sort) return rows;
  const sign = sort.direction === 'asc' ? 1 : -1;
  return [...rows].sort((a, b) => {
    const x = a[sort.key];
    const y = b[sort.key];
    if (x === null || y === null) {
      return x === y ? 0 : x === null ? 1 : -1;
    }
    if (typeof x === 'number' && typeof y === 'number') return (x - y) * sign;
    return String(x).localeCompare(String(y)) * sign;
  });
};

export const nextSort = (current: SortState | null, key: SortKey): SortState =>
  current && current.key === key
    ? { key, direction: current.direction === 'asc' ? 'desc' : 'asc' }
    : { key, direction: 'asc' };

export const pageCount = (total: number, pageSize: number) => Math.max(1, Math.ceil(total / pageSize));

export const paginate = <T>(rows: T[], page: number, pageSize: number): T[] =>
  rows.slice(page * pageSize, (page + 1) * pageSize);
