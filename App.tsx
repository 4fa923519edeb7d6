import React, { useEffect, useMemo, useState } from 'react';
import {
  Home,
  Dna,
  Download,
  Mail,
  AlertTriangle,
  Loader2,
} from 'lucide-react';

import introduction from './content/introduction.md?raw';
import releaseNotes from './content/release-notes.md?raw';

import { AppView } from './types';
import type { DatasetResult, Selection, SelectionField, StartupData } from './types';
import { CONTACT_EMAIL, INTRO_IMAGE } from './constants';
import SelectionPanel from './components/SelectionPanel';
import BiotypeChart from './components/BiotypeChart';
import DataTable from './components/DataTable';
import CatalogTable from './components/CatalogTable';
import CatalogStats from './components/CatalogStats';
import MarkdownPanel from './components/MarkdownPanel';
import { loadDatasetResult, loadStartupData } from './services/datasetService';
import { downloadSelected } from './services/exportService';
import { cascadeSelection, findDataset, initialSelection, summarizeCatalog } from './utils/catalog';
import { createLogger } from './utils/logger';

const log = createLogger('App');

type StartupState =
  | { status: 'loading' }
  | { status: 'ready'; data: StartupData }
  | { status: 'failed'; message: string };

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

const NAV_ITEMS = [
  { view: AppView.HOME, label: 'Home', Icon: Home },
  { view: AppView.NAD_RNA, label: 'NAD-RNA', Icon: Dna },
  { view: AppView.DOWNLOADS, label: 'Downloads', Icon: Download },
  { view: AppView.CONTACT, label: 'Contact', Icon: Mail },
];

const Browser: React.FC<{ data: StartupData }> = ({ data }) => {
  const { catalog, annotations } = data;

  const [view, setView] = useState<AppView>(AppView.HOME);

  // NAD-RNA view
  const [selection, setSelection] = useState<Selection>(() => initialSelection(catalog));
  const [submitted, setSubmitted] = useState(false);
  const [result, setResult] = useState<DatasetResult | null>(null);
  const [isLoading, setIsLoading] = useState(false);
  const [loadError, setLoadError] = useState<string | null>(null);

  // Downloads view
  const [selectedRows, setSelectedRows] = useState<Set<number>>(new Set());
  const [isExporting, setIsExporting] = useState(false);
  const [exportError, setExportError] = useState<string | null>(null);

  const summary = useMemo(() => summarizeCatalog(catalog), [catalog]);

  const handleSelectionChange = (field: SelectionField, value: string) => {
    setSelection(prev => cascadeSelection(catalog, { ...prev, [field]: value }, field));
  };

  const handleSubmit = async () => {
    setSubmitted(true);
    setLoadError(null);
    const entry = findDataset(catalog, selection);
    if (!entry) {
      setResult(null);
      return;
    }
    setIsLoading(true);
    try {
      setResult(await loadDatasetResult(entry, annotations));
    } catch (error) {
      log.error('dataset load failed:', error);
      setResult(null);
      setLoadError(errorMessage(error));
    } finally {
      setIsLoading(false);
    }
  };

  const handleToggleRows = (indices: number[], checked: boolean) => {
    setSelectedRows(prev => {
      const next = new Set(prev);
      indices.forEach(i => (checked ? next.add(i) : next.delete(i)));
      return next;
    });
  };

  const handleDownload = async () => {
    const entries = catalog.filter((_, i) => selectedRows.has(i));
    if (entries.length === 0) return;
    setIsExporting(true);
    setExportError(null);
    try {
      await downloadSelected(entries);
    } catch (error) {
      log.error('export failed:', error);
      setExportError(errorMessage(error));
    } finally {
      setIsExporting(false);
    }
  };

  const renderHome = () => (
    <div className="space-y-6">
      <MarkdownPanel title="Introduction" content={introduction} accent="#00c0ef" image={INTRO_IMAGE} />
      <CatalogStats summary={summary} />
      <MarkdownPanel title="Release Notes" content={releaseNotes} accent="#f39c12" />
    </div>
  );

  const renderNadRna = () => (
    <div className="space-y-6">
      <h2 className="text-2xl font-bold text-slate-800">NAD-RNA</h2>
      <div className="grid grid-cols-1 lg:grid-cols-3 gap-6">
        <div className="space-y-6">
          <SelectionPanel
            catalog={catalog}
            selection={selection}
            onChange={handleSelectionChange}
            onSubmit={handleSubmit}
            isLoading={isLoading}
          />
          <div className="bg-white p-4 rounded-xl shadow-sm border border-slate-200">
            <h3 className="font-bold text-slate-700 mb-2">Gene Types</h3>
            {result && <BiotypeChart data={result.biotypes} />}
          </div>
        </div>
        <div className="lg:col-span-2 space-y-4">
          {loadError && (
            <div className="px-4 py-3 rounded-lg bg-red-50 text-red-700 text-sm flex items-center gap-2">
              <AlertTriangle size={18} /> {loadError}
            </div>
          )}
          {submitted && !result && !loadError && !isLoading && (
            <p className="text-sm text-slate-400">No dataset matches this selection.</p>
          )}
          {result && <DataTable key={result.entry.data_id} rows={result.rows} />}
        </div>
      </div>
    </div>
  );

  const renderDownloads = () => (
    <div className="space-y-6">
      <h2 className="text-2xl font-bold text-slate-800">Downloads</h2>
      <div>
        <h3 className="font-bold text-slate-700 mb-2">Available Datasets</h3>
        <CatalogTable catalog={catalog} selected={selectedRows} onToggle={handleToggleRows} />
      </div>
      <div className="bg-white p-5 rounded-xl shadow-sm border border-slate-200 flex items-center gap-4">
        <button
          onClick={handleDownload}
          disabled={isExporting}
          className="px-4 py-2 bg-slate-800 text-white rounded-lg hover:bg-slate-900 font-medium flex items-center gap-2 disabled:opacity-50"
        >
          {isExporting ? <Loader2 size={18} className="animate-spin" /> : <Download size={18} />}
          Download Selected Datasets
        </button>
        <span className="text-xs text-slate-500">{selectedRows.size} selected</span>
        {exportError && <span className="text-sm text-red-600">{exportError}</span>}
      </div>
    </div>
  );

  const renderContact = () => (
    <div className="space-y-4">
      <h2 className="text-2xl font-bold text-slate-800">Contact Us</h2>
      <p className="text-slate-600">
        Contact: <a className="text-indigo-600 hover:underline" href={`mailto:${CONTACT_EMAIL}`}>{CONTACT_EMAIL}</a>
      </p>
    </div>
  );

  return (
    <div className="min-h-screen flex">
      <aside className="w-56 bg-slate-900 text-slate-300 flex flex-col">
        <div className="h-16 flex items-center px-6 text-xl font-bold text-white border-b border-slate-800">
          NADepot
        </div>
        <nav className="flex-1 py-4">
          {NAV_ITEMS.map(({ view: v, label, Icon }) => (
            <button
              key={v}
              onClick={() => setView(v)}
              className={`w-full flex items-center gap-3 px-6 py-3 text-sm transition-colors ${
                view === v ? 'bg-slate-800 text-white border-l-4 border-indigo-500' : 'hover:bg-slate-800 hover:text-white'
              }`}
            >
              <Icon size={18} /> {label}
            </button>
          ))}
        </nav>
      </aside>

      <main className="flex-1 bg-slate-50 p-6 overflow-auto">
        <div className="max-w-7xl mx-auto">
          {view === AppView.HOME && renderHome()}
          {view === AppView.NAD_RNA && renderNadRna()}
          {view === AppView.DOWNLOADS && renderDownloads()}
          {view === AppView.CONTACT && renderContact()}
        </div>
      </main>
    </div>
  );
};

const App: React.FC = () => {
  const [startup, setStartup] = useState<StartupState>({ status: 'loading' });

  useEffect(() => {
    let cancelled = false;
    loadStartupData()
      .then(data => {
        if (!cancelled) setStartup({ status: 'ready', data });
      })
      .catch((error: unknown) => {
        log.error('startup load failed:', error);
        if (!cancelled) setStartup({ status: 'failed', message: errorMessage(error) });
      });
    return () => {
      cancelled = true;
    };
  }, []);

  if (startup.status === 'loading') {
    return (
      <div className="min-h-screen flex items-center justify-center text-slate-500 gap-2">
        <Loader2 className="animate-spin" /> Loading catalog...
      </div>
    );
  }

  if (startup.status === 'failed') {
    return (
      <div className="min-h-screen flex items-center justify-center p-8">
        <div className="max-w-lg bg-white p-8 rounded-2xl shadow-sm border border-red-200 text-center">
          <AlertTriangle size={40} className="text-red-600 mx-auto mb-4" />
          <h2 className="text-xl font-bold text-slate-800 mb-2">NADepot could not start</h2>
          <p className="text-sm text-slate-600">{startup.message}</p>
        </div>
      </div>
    );
  }

  return <Browser data={startup.data} />;
};

export default App;
