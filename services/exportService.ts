import JSZip from 'jszip';
import type { CatalogEntry } from '../types';
import { ARCHIVE_PREFIX } from '../constants';
import { fetchDatasetFile } from './datasetService';
import { createLogger } from '../utils/logger';

const log = createLogger('exportService');

export type FileFetcher = (dataId: string) => Promise<ArrayBuffer>;

const pad = (n: number) => String(n).padStart(2, '0');

/** `nadepot_data_YYYYMMDDHHMMSS.zip`, local time. */
export const archiveFileName = (date: Date): string => {
  const stamp =
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${ARCHIVE_PREFIX}${stamp}.zip`;
};

/**
 * Zips the raw file of every selected dataset. Resolves to null when nothing
 * is selected, so callers produce no download at all.
 */
export const buildArchive = async (
  entries: CatalogEntry[],
  fetchFile: FileFetcher = fetchDatasetFile
): Promise<ArrayBuffer | null> => {
  if (entries.length === 0) return null;

  const zip = new JSZip();
  const files = await Promise.all(entries.map(e => fetchFile(e.data_id)));
  entries.forEach((e, i) => zip.file(e.data_id, files[i]));

  log.info(`archived ${entries.length} dataset(s)`);
  return zip.generateAsync({ type: 'arraybuffer', compression: 'DEFLATE' });
};

const saveBlob = (blob: Blob, fileName: string) => {
  const url = URL.createObjectURL(blob);
  const a = document.createElement('a');
  a.href = url;
  a.download = fileName;
  document.body.appendChild(a);
  a.click();
  document.body.removeChild(a);
  URL.revokeObjectURL(url);
};

/** Returns the archive name that was downloaded, or null when nothing was selected. */
export const downloadSelected = async (
  entries: CatalogEntry[],
  now: Date = new Date(),
  fetchFile: FileFetcher = fetchDatasetFile
): Promise<string | null> => {
  const archive = await buildArchive(entries, fetchFile);
  if (!archive) return null;
  const fileName = archiveFileName(now);
  saveBlob(new Blob([archive], { type: 'application/zip' }), fileName);
  return fileName;
};
