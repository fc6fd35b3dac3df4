/**
 * Metadata store: the JSON file every phase reads and writes
 */

import { readFile, rename, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { isNaiveDateTime, type TimestampPolicy } from './timestamp.js';
import {
  type MediaType,
  type MemoryLocation,
  type MemoryRecord,
  type MetadataBundle,
  MetadataStoreError,
  type SourceDescriptor,
  isRecord,
} from './types.js';

/**
 * One memory as stored on disk
 */
export interface StoredMemory {
  date_utc?: string;
  date_pst?: string;
  date_key: string;
  media_type: MediaType;
  location: MemoryLocation;
  url: string;
  is_get_request: boolean;
  index: number;
  filename: string;
  downloaded_file?: string;
  original_date_str?: string;
}

/**
 * Metadata file structure
 */
export interface StoredMetadata {
  extracted_at: string;
  source_json?: string;
  source_html?: string;
  total_memories: number;
  timezone?: string;
  timezone_offset?: string;
  memories: StoredMemory[];
}

/**
 * File locations derived from an input file's base name
 */
export interface WorkPaths {
  readonly metadataFile: string;
  readonly downloadDir: string;
  readonly processedDir: string;
}

/**
 * Base name shared by the metadata file and the work folders
 */
export function getBaseName(inputFile: string): string {
  return basename(inputFile, extname(inputFile)).replace(/_metadata$/, '');
}

export function getWorkPaths(inputFile: string, workDir: string = process.cwd()): WorkPaths {
  const base = getBaseName(inputFile);
  return {
    metadataFile: join(workDir, `${base}_metadata.json`),
    downloadDir: join(workDir, `${base}_downloads`),
    processedDir: join(workDir, `${base}_processed`),
  };
}

/**
 * Create a bundle for freshly derived records
 */
export function createBundle(
  records: MemoryRecord[],
  source: SourceDescriptor,
  policy: TimestampPolicy,
  extractedAt: Date = new Date()
): MetadataBundle {
  return {
    records,
    extractedAt: extractedAt.toISOString(),
    source,
    totalCount: records.length,
    timezone: policy.describe(),
  };
}

/**
 * Convert a bundle to its on-disk shape
 */
export function serializeBundle(bundle: MetadataBundle): StoredMetadata {
  const memories = bundle.records.map((record): StoredMemory => {
    const stored: StoredMemory = {
      date_key: record.dateKey,
      media_type: record.mediaType,
      location: { ...record.location },
      url: record.sourceUrl,
      is_get_request: record.isDirectRequest,
      index: record.ordinal,
      filename: record.derivedFilename,
    };
    if (bundle.timezone) {
      stored.date_pst = record.capturedAt;
    } else {
      stored.date_utc = `${record.capturedAt}Z`;
    }
    if (record.downloadedFileRef !== undefined) {
      stored.downloaded_file = record.downloadedFileRef;
    }
    if (record.originalDate !== undefined) {
      stored.original_date_str = record.originalDate;
    }
    return stored;
  });

  const data: StoredMetadata = {
    extracted_at: bundle.extractedAt,
    total_memories: bundle.totalCount,
    memories,
  };
  if (bundle.source.kind === 'json') {
    data.source_json = bundle.source.path;
  } else {
    data.source_html = bundle.source.path;
  }
  if (bundle.timezone) {
    data.timezone = bundle.timezone.timezone;
    data.timezone_offset = bundle.timezone.offset;
  }
  return data;
}

function fail(path: string, message: string): never {
  throw new MetadataStoreError('parse', path, message);
}

function requireString(entry: Record<string, unknown>, key: string, path: string, at: string): string {
  const value = entry[key];
  if (typeof value !== 'string') {
    fail(path, `${at}: "${key}" must be a string`);
  }
  return value;
}

const DATE_KEY_RE = /^\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}$/;

function parseStoredDate(entry: Record<string, unknown>, path: string, at: string): string {
  // date_utc wins when both generations of the field are present
  const utc = entry.date_utc;
  const pst = entry.date_pst;
  let key: string;
  let value: string;
  if (typeof utc === 'string') {
    key = 'date_utc';
    value = utc.replace(/Z$/, '');
  } else if (typeof pst === 'string') {
    key = 'date_pst';
    value = pst;
  } else {
    return fail(path, `${at}: missing "date_utc" or "date_pst"`);
  }

  if (!isNaiveDateTime(value)) {
    fail(path, `${at}: invalid "${key}" "${value}"`);
  }
  return value;
}

function parseDateKey(entry: Record<string, unknown>, path: string, at: string): string {
  const dateKey = requireString(entry, 'date_key', path, at);
  if (!DATE_KEY_RE.test(dateKey)) {
    fail(path, `${at}: invalid "date_key" "${dateKey}"`);
  }
  return dateKey;
}

function parseStoredLocation(value: unknown): MemoryLocation {
  if (
    !isRecord(value) ||
    typeof value.latitude !== 'number' ||
    typeof value.longitude !== 'number'
  ) {
    return { latitude: 0, longitude: 0, valid: false };
  }
  const { latitude, longitude } = value;
  const valid = typeof value.valid === 'boolean' ? value.valid : !(latitude === 0 && longitude === 0);
  return { latitude, longitude, valid: valid && !(latitude === 0 && longitude === 0) };
}

function parseStoredMemory(value: unknown, position: number, path: string): MemoryRecord {
  const at = `memories[${position}]`;
  if (!isRecord(value)) {
    return fail(path, `${at} is not an object`);
  }

  const capturedAt = parseStoredDate(value, path, at);
  const mediaType = requireString(value, 'media_type', path, at).toLowerCase();
  if (mediaType !== 'image' && mediaType !== 'video') {
    return fail(path, `${at}: unknown media_type "${mediaType}"`);
  }
  const ordinal = value.index;
  if (typeof ordinal !== 'number' || !Number.isInteger(ordinal) || ordinal < 1) {
    return fail(path, `${at}: "index" must be a positive integer`);
  }

  const record: MemoryRecord = {
    capturedAt,
    dateKey: parseDateKey(value, path, at),
    mediaType,
    location: parseStoredLocation(value.location),
    sourceUrl: requireString(value, 'url', path, at),
    isDirectRequest: value.is_get_request !== false,
    ordinal,
    derivedFilename: requireString(value, 'filename', path, at),
    ...(typeof value.original_date_str === 'string'
      ? { originalDate: value.original_date_str }
      : {}),
  };
  if (typeof value.downloaded_file === 'string') {
    record.downloadedFileRef = value.downloaded_file;
  }
  return record;
}

/**
 * Validate parsed JSON and turn it into a bundle
 */
export function parseBundle(data: unknown, path: string): MetadataBundle {
  if (!isRecord(data)) {
    return fail(path, 'expected a JSON object');
  }
  if (!Array.isArray(data.memories)) {
    return fail(path, '"memories" must be an array');
  }

  const records = data.memories.map((memory: unknown, i: number) =>
    parseStoredMemory(memory, i, path)
  );

  let source: SourceDescriptor;
  if (typeof data.source_json === 'string') {
    source = { kind: 'json', path: data.source_json };
  } else if (typeof data.source_html === 'string') {
    source = { kind: 'html', path: data.source_html };
  } else {
    source = { kind: 'json', path: '' };
  }

  const timezone =
    typeof data.timezone === 'string'
      ? {
          timezone: data.timezone,
          offset: typeof data.timezone_offset === 'string' ? data.timezone_offset : '',
        }
      : undefined;

  return {
    records,
    extractedAt: typeof data.extracted_at === 'string' ? data.extracted_at : '',
    source,
    totalCount: typeof data.total_memories === 'number' ? data.total_memories : records.length,
    ...(timezone ? { timezone } : {}),
  };
}

/**
 * Save a bundle to disk. Writes a temporary file first so a crash never
 * leaves a half-written metadata file.
 */
export async function saveBundle(bundle: MetadataBundle, path: string): Promise<void> {
  const content = JSON.stringify(serializeBundle(bundle), null, 2);
  const tempPath = `${path}.tmp`;
  await writeFile(tempPath, content, 'utf-8');
  await rename(tempPath, path);
}

/**
 * Load a bundle from disk
 */
export async function loadBundle(path: string): Promise<MetadataBundle> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new MetadataStoreError('not-found', path, 'file does not exist');
    }
    throw error;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new MetadataStoreError(
      'parse',
      path,
      error instanceof Error ? error.message : 'invalid JSON'
    );
  }

  return parseBundle(data, path);
}

/**
 * Bundle statistics for summaries
 */
export interface BundleStats {
  total: number;
  images: number;
  videos: number;
  withGps: number;
  firstDate: string | null;
  lastDate: string | null;
  uniqueDates: number;
  topDates: Array<{ date: string; count: number }>;
}

export function getBundleStats(bundle: MetadataBundle): BundleStats {
  const records = bundle.records;
  const perDay = new Map<string, number>();
  for (const record of records) {
    const day = record.dateKey.split('_')[0];
    perDay.set(day, (perDay.get(day) ?? 0) + 1);
  }
  const days = [...perDay.keys()].sort();

  return {
    total: records.length,
    images: records.filter((r) => r.mediaType === 'image').length,
    videos: records.filter((r) => r.mediaType === 'video').length,
    withGps: records.filter((r) => r.location.valid).length,
    firstDate: days[0] ?? null,
    lastDate: days[days.length - 1] ?? null,
    uniqueDates: days.length,
    topDates: [...perDay.entries()]
      .sort((a, b) => b[1] - a[1] || a[0].localeCompare(b[0]))
      .slice(0, 5)
      .map(([date, count]) => ({ date, count })),
  };
}
