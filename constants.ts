export const DATA_BASE_URL: string = import.meta.env.VITE_DATA_BASE_URL || '/data';

export const DATA_FILES = {
  catalog: 'catalog.csv',
  annotations: 'gene_features.csv',
};

export const CATALOG_COLUMNS = ['data_id', 'species', 'tissue', 'cell_line', 'condition'] as const;
export const ANNOTATION_COLUMNS = ['gene_id', 'symbol', 'gene_biotype'] as const;
export const MEASUREMENT_COLUMNS = ['gene_id', 'logCPM', 'log2_fold_change', 'FDR'] as const;

// Marks a tissue or cell line that does not apply to a dataset
export const NOT_APPLICABLE = 'NULL';

// Biotype label used for genes missing from the annotation table
export const MISSING_BIOTYPE = 'NA';

export const DISPLAY_CONFIG = {
  decimals: 3,
  pctDecimals: 2,
  pageSize: 10,
  smallBarPct: 10, // bars under this get a value label
};

export const CHART_CONFIG = {
  barColor: '#347ABF',
  height: 250,
};

export const ARCHIVE_PREFIX = 'nadepot_data_';

export const CONTACT_EMAIL = 'lida@sioc.ac.cn';

export const INTRO_IMAGE = { src: '/img/nad-rna.svg', alt: 'NAD-capped RNA' };
