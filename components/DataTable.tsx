import React, { useMemo, useState } from 'react';
import { Search, ArrowUp, ArrowDown } from 'lucide-react';
import type { DisplayRow } from '../types';
import { DISPLAY_CONFIG } from '../constants';
import {
  type SortKey,
  type SortState,
  filterRows,
  formatValue,
  nextSort,
  pageCount,
  paginate,
  sortRows,
} from '../utils/table';
import Pagination from './Pagination';

interface DataTableProps {
  rows: DisplayRow[];
}

const COLUMNS: { key: SortKey; label: string; numeric: boolean }[] = [
  { key: 'gene_id', label: 'Gene ID', numeric: false },
  { key: 'symbol', label: 'Symbol', numeric: false },
  { key: 'gene_biotype', label: 'Gene Biotype', numeric: false },
  { key: 'logCPM', label: 'logCPM', numeric: true },
  { key: 'log2_fold_change', label: 'Log2 FC', numeric: true },
  { key: 'FDR', label: 'FDR', numeric: true },
];

const DataTable: React.FC<DataTableProps> = ({ rows }) => {
  const [filter, setFilter] = useState('');
  const [sort, setSort] = useState<SortState | null>(null);
  const [page, setPage] = useState(0);

  const visible = useMemo(() => sortRows(filterRows(rows, filter), sort), [rows, filter, sort]);
  const pages = pageCount(visible.length, DISPLAY_CONFIG.pageSize);
  const current = Math.min(page, pages - 1);
  const pageRows = paginate(visible, current, DISPLAY_CONFIG.pageSize);

  return (
    <div className="bg-white rounded-xl shadow-sm border border-slate-200 overflow-hidden flex flex-col">
      <div className="p-4 border-b border-slate-200 flex justify-between items-center bg-slate-50">
        <h3 className="text-lg font-semibold text-slate-800">NAD-RNA Genes</h3>
        <div className="relative">
          <Search className="absolute left-3 top-1/2 transform -translate-y-1/2 text-slate-400" size={16} />
          <input
            type="text"
            placeholder="Search gene..."
            className="pl-9 pr-4 py-2 border border-slate-300 rounded-lg text-sm focus:outline-none focus:ring-2 focus:ring-indigo-500"
            value={filter}
            onChange={(e) => { setFilter(e.target.value); setPage(0); }}
          />
        </div>
      </div>
      <div className="overflow-auto flex-1">
        <table className="w-full text-sm text-left">
          <thead className="text-xs text-slate-500 uppercase bg-slate-50 sticky top-0 z-10">
            <tr>
              {COLUMNS.map(col => (
                <th
                  key={col.key}
                  className="px-6 py-3 cursor-pointer select-none hover:text-slate-700"
                  onClick={() => setSort(nextSort(sort, col.key))}
                >
                  <span className="inline-flex items-center gap-1">
                    {col.label}
                    {sort?.key === col.key && (sort.direction === 'asc' ? <ArrowUp size={12} /> : <ArrowDown size={12} />)}
                  </span>
                </th>
              ))}
            </tr>
          </thead>
          <tbody>
            {pageRows.map((r, i) => (
              <tr key={`${r.gene_id}-${i}`} className="bg-white border-b hover:bg-slate-50 transition-colors">
                {COLUMNS.map(col => (
                  <td
                    key={col.key}
                    className={col.numeric ? 'px-6 py-4 font-mono text-slate-600' : 'px-6 py-4 text-slate-900'}
                  >
                    {formatValue(r[col.key], DISPLAY_CONFIG.decimals)}
                  </td>
                ))}
              </tr>
            ))}
            {pageRows.length === 0 && (
              <tr>
                <td colSpan={COLUMNS.length} className="text-center py-8 text-slate-400">
                  {filter ? `No genes found matching "${filter}"` : 'No data available'}
                </td>
              </tr>
            )}
          </tbody>
        </table>
      </div>
      <Pagination page={current} pages={pages} total={visible.length} onChange={setPage} />
    </div>
  );
};

export default DataTable;
