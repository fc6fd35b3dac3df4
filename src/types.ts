/**
 * Core type definitions for the Snapchat memories to Immich migration tool
 */

/**
 * Media type, lower-cased from the export's free-text label
 */
export type MediaType = 'image' | 'video';

/**
 * Wall-clock timestamp without a zone, formatted `YYYY-MM-DDTHH:MM:SS`
 */
export type NaiveDateTime = string;

/**
 * GPS location as found in the export. `(0, 0)` means "no GPS".
 */
export interface MemoryLocation {
  readonly latitude: number;
  readonly longitude: number;
  readonly valid: boolean;
}

/**
 * A memory as produced by the normalizer, before identity is assigned
 */
export interface ParsedMemory {
  readonly capturedAt: NaiveDateTime;
  readonly dateKey: string;
  readonly mediaType: MediaType;
  readonly location: MemoryLocation;
  readonly sourceUrl: string;
  readonly isDirectRequest: boolean;
  readonly originalDate?: string;
}

/**
 * Canonical record for one media item of an export
 */
export interface MemoryRecord extends ParsedMemory {
  readonly ordinal: number;
  readonly derivedFilename: string;
  downloadedFileRef?: string;
}

/**
 * Where a bundle was extracted from
 */
export interface SourceDescriptor {
  readonly kind: 'json' | 'html';
  readonly path: string;
}

/**
 * Zone descriptor written by the local-time policy
 */
export interface TimezoneDescriptor {
  readonly timezone: string;
  readonly offset: string;
}

/**
 * Full export, the hand-off artifact between phases
 */
export interface MetadataBundle {
  readonly records: MemoryRecord[];
  readonly extractedAt: string; // ISO 8601 timestamp of the extraction run
  readonly source: SourceDescriptor;
  readonly totalCount: number;
  readonly timezone?: TimezoneDescriptor;
}

/**
 * Counters for the download phase
 */
export interface DownloadStats {
  total: number;
  downloaded: number;
  skipped: number;
  failed: number;
  retries: number;
}

/**
 * Counters for the processing phase
 */
export interface ProcessStats {
  total: number;
  processed: number;
  skipped: number;
  failed: number;
}

/**
 * Counters for the upload phase
 */
export interface UploadStats {
  total: number;
  uploaded: number;
  duplicates: number;
  failed: number;
}

/**
 * Base error for export normalization failures
 */
export class ParseError extends Error {
  constructor(message: string) {
    super(`Failed to parse Snapchat export: ${message}`);
    this.name = 'ParseError';
  }
}

/**
 * The export parsed but yielded no usable record
 */
export class EmptyExportError extends ParseError {
  constructor(message = 'No valid memories found') {
    super(message);
    this.name = 'EmptyExportError';
  }
}

/**
 * The export does not have the expected structure
 */
export class MalformedSchemaError extends ParseError {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedSchemaError';
  }
}

/**
 * Metadata store could not be read
 */
export class MetadataStoreError extends Error {
  constructor(
    public readonly kind: 'not-found' | 'parse',
    public readonly path: string,
    message: string
  ) {
    super(
      kind === 'not-found'
        ? `Metadata file not found: ${path}`
        : `Invalid metadata file ${path}: ${message}`
    );
    this.name = 'MetadataStoreError';
  }
}

/**
 * Custom error for download failures
 */
export class DownloadError extends Error {
  constructor(
    public readonly url: string,
    public readonly statusCode: number,
    message: string
  ) {
    super(`Failed to download ${url}: ${message} (status: ${statusCode})`);
    this.name = 'DownloadError';
  }
}

/**
 * Custom error for metadata embedding failures
 */
export class MetadataError extends Error {
  constructor(
    public readonly filePath: string,
    message: string
  ) {
    super(`Failed to embed metadata for ${filePath}: ${message}`);
    this.name = 'MetadataError';
  }
}

/**
 * Overlay compositing failed
 */
export class CompositeError extends Error {
  constructor(
    public readonly mediaType: MediaType,
    message: string
  ) {
    super(`Failed to composite ${mediaType}: ${message}`);
    this.name = 'CompositeError';
  }
}

/**
 * Immich answered with an unexpected status
 */
export class ImmichApiError extends Error {
  constructor(
    public readonly endpoint: string,
    public readonly statusCode: number,
    message: string
  ) {
    super(`Immich request ${endpoint} failed: ${message} (status: ${statusCode})`);
    this.name = 'ImmichApiError';
  }
}

/**
 * Narrow an unknown JSON value to a plain object
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
