export interface CatalogEntry {
  data_id: string; // file name under the data directory
  species: string;
  tissue: string; // "NULL" when the dataset is a cell line
  cell_line: string; // "NULL" when the dataset is a tissue
  condition: string;
  extra: Record<string, string>; // columns not shown in the catalog table
}

export interface GeneAnnotation {
  gene_id: string;
  symbol: string | null;
  gene_biotype: string | null;
}

export interface MeasurementRow {
  gene_id: string;
  logCPM: number | null;
  log2_fold_change: number | null;
  FDR: number | null;
}

export interface AnnotatedRow extends MeasurementRow {
  symbol: string | null;
  gene_biotype: string | null;
}

export type DisplayRow = AnnotatedRow;

export interface BiotypeShare {
  gene_biotype: string;
  label: string;
  count: number;
  pct: number;
}

export interface Selection {
  species: string;
  tissue: string;
  cell_line: string;
  condition: string;
}

export type SelectionField = keyof Selection;

export interface CatalogSummary {
  datasets: number;
  species: number;
  tissueAndCellLineTypes: number;
}

export interface StartupData {
  catalog: CatalogEntry[];
  annotations: GeneAnnotation[];
}

export interface DatasetResult {
  entry: CatalogEntry;
  biotypes: BiotypeShare[];
  rows: DisplayRow[];
}

export enum AppView {
  HOME = 'HOME',
  NAD_RNA = 'NAD_RNA',
  DOWNLOADS = 'DOWNLOADS',
  CONTACT = 'CONTACT'
}

export type SortDirection = 'asc' | 'desc';
