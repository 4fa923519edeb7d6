import React from 'react';
import { ChevronLeft, ChevronRight } from 'lucide-react';

interface PaginationProps {
  page: number;
  pages: number;
  total: number;
  onChange: (page: number) => void;
}

const Pagination: React.FC<PaginationProps> = ({ page, pages, total, onChange }) => (
  <div className="p-3 border-t border-slate-200 flex justify-between items-center text-xs text-slate-500 bg-slate-50">
    <span>{total} entries</span>
    <div className="flex items-center gap-2">
      <button
        onClick={() => onChange(page - 1)}
        disabled={page === 0}
        className="p-1 rounded hover:bg-slate-200 disabled:opacity-40 disabled:cursor-not-allowed"
        aria-label="Previous page"
      >
        <ChevronLeft size={16} />
      </button>
      <span>Page {page + 1} of {pages}</span>
      <button
        onClick={() => onChange(page + 1)}
        disabled={page >= pages - 1}
        className="p-1 rounded hover:bg-slate-200 disabled:opacity-40 disabled:cursor-not-allowed"
        aria-label="Next page"
      >
        <ChevronRight size={16} />
      </button>
    </div>
  </div>
);

export default Pagination;
