import Papa from 'papaparse';
import type {
  CatalogEntry,
  DatasetResult,
  GeneAnnotation,
  MeasurementRow,
  StartupData,
} from '../types';
import {
  ANNOTATION_COLUMNS,
  CATALOG_COLUMNS,
  DATA_BASE_URL,
  DATA_FILES,
  MEASUREMENT_COLUMNS,
} from '../constants';
import { biotypeBreakdown, joinAnnotations, toDisplayRows } from '../utils/stats';
import { createLogger } from '../utils/logger';

const log = createLogger('datasetService');

type RawRow = Record<string, string | undefined>;

export class DataLoadError extends Error {
  readonly file: string;

  constructor(file: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to load ${file}: ${message}`, options);
    this.name = 'DataLoadError';
    this.file = file;
  }
}

const dataUrl = (file: string) => `${DATA_BASE_URL}/${encodeURIComponent(file)}`;

const request = async (file: string): Promise<Response> => {
  let response: Response;
  try {
    response = await fetch(dataUrl(file));
  } catch (error) {
    throw new DataLoadError(file, 'network request failed', { cause: error });
  }
  if (!response.ok) {
    throw new DataLoadError(file, `HTTP ${response.status}`);
  }
  return response;
};

const fetchText = async (file: string) => (await request(file)).text();

export const fetchDatasetFile = async (file: string) => (await request(file)).arrayBuffer();

// --- CSV parsing ---

const parseCsv = (file: string, text: string, required: readonly string[]): RawRow[] => {
  const result = Papa.parse<RawRow>(text, {
    header: true,
    delimiter: ',',
    skipEmptyLines: 'greedy',
    dynamicTyping: false,
    transformHeader: (header: string) => header.trim(),
  });

  if (result.errors.length > 0) {
    const first = result.errors[0];
    const where = first.row !== undefined ? ` (row ${first.row + 1})` : '';
    throw new DataLoadError(file, `${first.message}${where}`);
  }

  const fields = result.meta.fields ?? [];
  const missing = required.filter(col => !fields.includes(col));
  if (missing.length > 0) {
    throw new DataLoadError(file, `missing column(s) ${missing.join(', ')}`);
  }

  return result.data;
};

const requireValue = (file: string, row: RawRow, index: number, column: string): string => {
  const value = row[column]?.trim();
  if (!value) {
    throw new DataLoadError(file, `empty ${column} in row ${index + 1}`);
  }
  return value;
};

const optionalValue = (row: RawRow, column: string): string | null => row[column]?.trim() || null;

// NA, blanks and anything non-numeric become null
export const parseNumber = (raw: string | undefined): number | null => {
  const text = raw?.trim() ?? '';
  if (text === '' || text === 'NA') return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
};

// --- Typed loaders ---

const toCatalog = (file: string, rows: RawRow[]): CatalogEntry[] =>
  rows.map((row, i) => {
    const extra: Record<string, string> = {};
    Object.entries(row).forEach(([key, value]) => {
      if (!(CATALOG_COLUMNS as readonly string[]).includes(key)) extra[key] = value ?? '';
    });
    return {
      data_id: requireValue(file, row, i, 'data_id'),
      species: requireValue(file, row, i, 'species'),
      tissue: requireValue(file, row, i, 'tissue'),
      cell_line: requireValue(file, row, i, 'cell_line'),
      condition: requireValue(file, row, i, 'condition'),
      extra,
    };
  });

export const loadCatalog = async (): Promise<CatalogEntry[]> => {
  const file = DATA_FILES.catalog;
  const catalog = toCatalog(file, parseCsv(file, await fetchText(file), CATALOG_COLUMNS));
  if (catalog.length === 0) {
    throw new DataLoadError(file, 'catalog has no datasets');
  }
  // data_id doubles as the file name inside the download archive
  const seen = new Set<string>();
  catalog.forEach((entry, i) => {
    if (seen.has(entry.data_id)) {
      throw new DataLoadError(file, `duplicate data_id ${entry.data_id} in row ${i + 1}`);
    }
    seen.add(entry.data_id);
  });
  log.info(`loaded ${catalog.length} datasets`);
  return catalog;
};

export const loadGeneAnnotations = async (): Promise<GeneAnnotation[]> => {
  const file = DATA_FILES.annotations;
  const rows = parseCsv(file, await fetchText(file), ANNOTATION_COLUMNS);
  const annotations: GeneAnnotation[] = [];
  rows.forEach((row, i) => {
    const geneId = optionalValue(row, 'gene_id');
    if (!geneId) {
      log.warn(`${file}: skipping row ${i + 1} without gene_id`);
      return;
    }
    annotations.push({
      gene_id: geneId,
      symbol: optionalValue(row, 'symbol'),
      gene_biotype: optionalValue(row, 'gene_biotype'),
    });
  });
  log.info(`loaded ${annotations.length} gene annotations`);
  return annotations;
};

export const loadStartupData = async (): Promise<StartupData> => {
  const [catalog, annotations] = await Promise.all([loadCatalog(), loadGeneAnnotations()]);
  return { catalog, annotations };
};

export const loadMeasurements = async (dataId: string): Promise<MeasurementRow[]> => {
  const rows = parseCsv(dataId, await fetchText(dataId), MEASUREMENT_COLUMNS);
  const measurements: MeasurementRow[] = [];
  rows.forEach((row, i) => {
    const geneId = optionalValue(row, 'gene_id');
    if (!geneId) {
      log.warn(`${dataId}: skipping row ${i + 1} without gene_id`);
      return;
    }
    measurements.push({
      gene_id: geneId,
      logCPM: parseNumber(row.logCPM),
      log2_fold_change: parseNumber(row.log2_fold_change),
      FDR: parseNumber(row.FDR),
    });
  });
  return measurements;
};

/** Loads one dataset and derives everything the NAD-RNA view shows. Never cached. */
export const loadDatasetResult = async (
  entry: CatalogEntry,
  annotations: GeneAnnotation[]
): Promise<DatasetResult> => {
  const joined = joinAnnotations(await loadMeasurements(entry.data_id), annotations);
  log.info(`${entry.data_id}: ${joined.length} genes`);
  return {
    entry,
    biotypes: biotypeBreakdown(joined),
    rows: toDisplayRows(joined),
  };
};
