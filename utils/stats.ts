import type { AnnotatedRow, BiotypeShare, DisplayRow, GeneAnnotation, MeasurementRow } from '../types';
import { DISPLAY_CONFIG, MISSING_BIOTYPE } from '../constants';

// --- Rounding ---

// Exact ties go to the even digit (3.125 -> 3.12); anything else to the nearest
export const roundTo = (value: number, digits: number): number => {
  const factor = Math.pow(10, digits);
  const scaled = Math.abs(value) * factor;
  const lower = Math.floor(scaled);
  const units = scaled - lower === 0.5 ? (lower % 2 === 0 ? lower : lower + 1) : Math.round(scaled);
  const rounded = units / factor;
  return value < 0 && rounded !== 0 ? -rounded : rounded;
};

const roundOrNull = (value: number | null, digits: number) =>
  value === null ? null : roundTo(value, digits);

// --- Join ---

export const joinAnnotations = (
  rows: MeasurementRow[],
  annotations: GeneAnnotation[]
): AnnotatedRow[] => {
  const byId = new Map<string, GeneAnnotation>();
  annotations.forEach(a => {
    if (!byId.has(a.gene_id)) byId.set(a.gene_id, a);
  });

  return rows.map(row => {
    const anno = byId.get(row.gene_id);
    return {
      ...row,
      symbol: anno ? anno.symbol : null,
      gene_biotype: anno ? anno.gene_biotype : null,
    };
  });
};

// --- Gene type breakdown ---

export const biotypeLabel = (biotype: string) => biotype.replace(/_/g, ' ');

export const biotypeBreakdown = (rows: AnnotatedRow[]): BiotypeShare[] => {
  const counts = new Map<string, number>();
  rows.forEach(r => {
    const key = r.gene_biotype ?? MISSING_BIOTYPE;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  });

  const total = rows.length;
  if (total === 0) return [];

  const shares = Array.from(counts, ([gene_biotype, count]) => ({
    gene_biotype,
    label: biotypeLabel(gene_biotype),
    count,
    pct: roundTo((count / total) * 100, DISPLAY_CONFIG.pctDecimals),
  }));

  // Stable sort keeps first-seen order among equal shares
  return shares.sort((a, b) => b.pct - a.pct);
};

export const totalCount = (shares: BiotypeShare[]) => shares.reduce((acc, s) => acc + s.count, 0);

// --- Table projection ---

export const toDisplayRows = (
  rows: AnnotatedRow[],
  digits: number = DISPLAY_CONFIG.decimals
): DisplayRow[] =>
  rows.map(r => ({
    gene_id: r.gene_id,
    symbol: r.symbol,
    gene_biotype: r.gene_biotype,
    logCPM: roundOrNull(r.logCPM, digits),
    log2_fold_change: roundOrNull(r.log2_fold_change, digits),
    FDR: roundOrNull(r.FDR, digits),
  }));
