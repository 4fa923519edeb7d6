import type { CatalogEntry, CatalogSummary, Selection, SelectionField } from '../types';
import { NOT_APPLICABLE } from '../constants';

// Upstream fields come first; each select is narrowed by every field before it
export const SELECTION_FIELDS: SelectionField[] = ['species', 'tissue', 'cell_line', 'condition'];

const EMPTY_SELECTION: Selection = { species: '', tissue: '', cell_line: '', condition: '' };

const unique = (values: string[]) => Array.from(new Set(values));

const upstreamOf = (field: SelectionField) => SELECTION_FIELDS.slice(0, SELECTION_FIELDS.indexOf(field));

const matchesUpstream = (entry: CatalogEntry, selection: Selection, field: SelectionField) =>
  upstreamOf(field).every(f => entry[f] === selection[f]);

/** Values offered for `field`, given the choices already made upstream of it. */
export const optionsFor = (
  catalog: CatalogEntry[],
  selection: Selection,
  field: SelectionField
): string[] => unique(catalog.filter(e => matchesUpstream(e, selection, field)).map(e => e[field]));

export const speciesOptions = (catalog: CatalogEntry[]) =>
  optionsFor(catalog, EMPTY_SELECTION, 'species');

export const tissueOptions = (catalog: CatalogEntry[], species: string) =>
  optionsFor(catalog, { ...EMPTY_SELECTION, species }, 'tissue');

export const cellLineOptions = (catalog: CatalogEntry[], species: string, tissue: string) =>
  optionsFor(catalog, { ...EMPTY_SELECTION, species, tissue }, 'cell_line');

export const conditionOptions = (
  catalog: CatalogEntry[],
  species: string,
  tissue: string,
  cell_line: string
) => optionsFor(catalog, { species, tissue, cell_line, condition: '' }, 'condition');

/**
 * Re-derives every field downstream of `changed`. A downstream value survives
 * when it is still offered; otherwise it falls back to the first option.
 */
export const cascadeSelection = (
  catalog: CatalogEntry[],
  selection: Selection,
  changed: SelectionField
): Selection => {
  const next = { ...selection };
  SELECTION_FIELDS.slice(SELECTION_FIELDS.indexOf(changed) + 1).forEach(field => {
    const options = optionsFor(catalog, next, field);
    next[field] = options.includes(next[field]) ? next[field] : options[0] ?? '';
  });
  return next;
};

export const initialSelection = (catalog: CatalogEntry[]): Selection => {
  const species = speciesOptions(catalog)[0] ?? '';
  return cascadeSelection(catalog, { ...EMPTY_SELECTION, species }, 'species');
};

export const findDataset = (catalog: CatalogEntry[], selection: Selection): CatalogEntry | null =>
  catalog.find(e => SELECTION_FIELDS.every(f => e[f] === selection[f])) ?? null;

export const summarizeCatalog = (catalog: CatalogEntry[]): CatalogSummary => {
  const applicable = (values: string[]) => unique(values).filter(v => v !== NOT_APPLICABLE).length;
  return {
    datasets: catalog.length,
    species: unique(catalog.map(e => e.species)).length,
    tissueAndCellLineTypes:
      applicable(catalog.map(e => e.tissue)) + applicable(catalog.map(e => e.cell_line)),
  };
};
