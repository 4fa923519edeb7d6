import React from 'react';
import { describe, it, expect } from 'vitest';
import { renderToStaticMarkup } from 'react-dom/server';
import DataTable from './DataTable';
import type { DisplayRow } from '../types';

const NUMERIC_CELL = 'class="px-6 py-4 font-mono text-slate-600"';

const row = (i: number): DisplayRow => ({
  gene_id: `G${i}`,
  symbol: `SYM${i}`,
  gene_biotype: 'protein_coding',
  logCPM: i + 0.5,
  log2_fold_change: 1.25,
  FDR: 0.012,
});

describe('DataTable', () => {
  it('prints numbers with three decimals and missing values as NA', () => {
    const html = renderToStaticMarkup(
      <DataTable
        rows={[{ gene_id: 'G1', symbol: null, gene_biotype: null, logCPM: 8.412, log2_fold_change: 3.1, FDR: null }]}
      />
    );
    expect(html).toContain(`<td ${NUMERIC_CELL}>8.412</td>`);
    expect(html).toContain(`<td ${NUMERIC_CELL}>3.100</td>`);
    expect(html).toContain(`<td ${NUMERIC_CELL}>NA</td>`);
    expect(html).toContain('<td class="px-6 py-4 text-slate-900">NA</td>');
  });

  it('shows the first page of ten rows', () => {
    const html = renderToStaticMarkup(<DataTable rows={Array.from({ length: 12 }, (_, i) => row(i))} />);
    expect(html.match(/<tr class="bg-white border-b/g)).toHaveLength(10);
    expect(html).toContain('<span>12 entries</span>');
    expect(html).toContain('<span>Page 1 of 2</span>');
    expect(html).toContain('>G9</td>');
    expect(html).not.toContain('>G10</td>');
  });

  it('renders an empty state without rows', () => {
    const html = renderToStaticMarkup(<DataTable rows={[]} />);
    expect(html).toContain('No data available');
  });
});
