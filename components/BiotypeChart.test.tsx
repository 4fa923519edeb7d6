import React from 'react';
import { describe, it, expect } from 'vitest';
import { renderToStaticMarkup } from 'react-dom/server';
import BiotypeChart, { chartTitle, smallBarLabel } from './BiotypeChart';

const shares = [
  { gene_biotype: 'protein_coding', label: 'protein coding', count: 6, pct: 85.71 },
  { gene_biotype: 'lncRNA', label: 'lncRNA', count: 1, pct: 14.29 },
];

describe('BiotypeChart', () => {
  it('titles the chart with the number of genes', () => {
    expect(chartTitle(shares)).toBe('Gene Types (n = 7)');
  });

  it('labels only bars below ten percent', () => {
    expect(smallBarLabel(9.5)).toBe(9.5);
    expect(smallBarLabel(10)).toBe('');
    expect(smallBarLabel(85.71)).toBe('');
  });

  it('renders nothing before a dataset is loaded', () => {
    expect(renderToStaticMarkup(<BiotypeChart data={[]} />)).toBe('');
  });
});
