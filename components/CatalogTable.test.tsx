import React from 'react';
import { describe, it, expect } from 'vitest';
import { renderToStaticMarkup } from 'react-dom/server';
import CatalogTable from './CatalogTable';
import type { CatalogEntry } from '../types';

const catalog: CatalogEntry[] = [
  { data_id: 'a.csv', species: 'Homo sapiens', tissue: 'NULL', cell_line: 'HeLa', condition: 'wild type', extra: { description: 'first' } },
  { data_id: 'b.csv', species: 'Mus musculus', tissue: 'liver', cell_line: 'NULL', condition: 'fasting', extra: { description: 'second' } },
];

const noop = () => undefined;

describe('CatalogTable', () => {
  it('lists the catalog columns without the extra ones', () => {
    const html = renderToStaticMarkup(<CatalogTable catalog={catalog} selected={new Set()} onToggle={noop} />);
    expect(html).toContain('<th class="px-6 py-3">condition</th>');
    expect(html).toContain('<td class="px-6 py-3 text-slate-700">b.csv</td>');
    expect(html).not.toContain('description');
    expect(html).not.toContain('first');
  });

  it('checks only the selected rows', () => {
    const html = renderToStaticMarkup(<CatalogTable catalog={catalog} selected={new Set([1])} onToggle={noop} />);
    expect(html.match(/checked=""/g)).toHaveLength(1);
    expect(html).toContain('<tr class="border-b transition-colors bg-indigo-50">');
  });
});
