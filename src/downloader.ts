/**
 * Downloader module for fetching Snapchat memories
 */

import { access, mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { isZipBuffer } from './archive.js';
import { saveBundle } from './store.js';
import { DownloadError, type DownloadStats, type MemoryRecord, type MetadataBundle } from './types.js';

/**
 * Default delay between downloads in milliseconds
 */
export const DEFAULT_DOWNLOAD_DELAY_MS = 500;

/**
 * Default maximum retries for failed downloads
 */
export const DEFAULT_MAX_RETRIES = 3;

/**
 * Base delay for exponential backoff in milliseconds
 */
export const BACKOFF_BASE_DELAY_MS = 1000;

/**
 * Maximum backoff delay in milliseconds (30 seconds)
 */
export const BACKOFF_MAX_DELAY_MS = 30000;

/**
 * Header the direct media endpoint expects
 */
export const ROUTE_TAG_HEADER = { 'X-Snap-Route-Tag': 'mem-dmd' } as const;

/**
 * HTTP status codes that should trigger a retry
 */
const RETRYABLE_STATUS_CODES = new Set([
  408, // Request Timeout
  429, // Too Many Requests (rate limited)
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
]);

/**
 * Download result with binary data
 */
export interface DownloadedMedia {
  readonly data: Buffer;
  readonly contentType: string;
  readonly extension: string;
}

/**
 * Determine file extension. Archives and unknown types are saved as `.bin`
 * and unpacked during processing.
 */
export function getExtension(contentType: string, data: Buffer): string {
  const type = contentType.toLowerCase();

  if (type.includes('zip') || isZipBuffer(data)) return '.bin';
  if (type.includes('video')) return '.mp4';
  if (type.includes('jpeg') || type.includes('jpg')) return '.jpg';
  if (type.includes('png')) return '.png';

  return '.bin';
}

/**
 * Calculate exponential backoff delay with jitter
 */
export function calculateBackoffDelay(
  attempt: number,
  baseDelay: number = BACKOFF_BASE_DELAY_MS
): number {
  const exponentialDelay = baseDelay * Math.pow(2, attempt);

  // Jitter (±25%) to prevent thundering herd
  const jitter = exponentialDelay * 0.25 * (Math.random() * 2 - 1);

  return Math.min(exponentialDelay + jitter, BACKOFF_MAX_DELAY_MS);
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof DownloadError) {
    return RETRYABLE_STATUS_CODES.has(error.statusCode);
  }

  // Network errors are generally retryable
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('network') ||
      message.includes('fetch failed') ||
      message.includes('timeout') ||
      message.includes('econnreset') ||
      message.includes('econnrefused') ||
      message.includes('socket')
    );
  }

  return false;
}

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface FetchOptions {
  maxRetries?: number;
  /** Base delay for backoff, mostly useful to shorten tests */
  backoffBaseMs?: number;
  onRetry?: (attempt: number, delay: number, error: Error) => void;
}

async function getOk(url: string, init?: RequestInit): Promise<Response> {
  const response = await fetch(url, init);
  if (!response.ok) {
    throw new DownloadError(url, response.status, response.statusText);
  }
  return response;
}

/**
 * Resolve a proxied download link. Snapchat's proxy takes the link's query
 * string as a form POST and answers with a signed URL.
 */
async function resolveProxyUrl(url: string): Promise<string> {
  const [baseUrl, queryString] = url.split('?');

  if (!queryString) {
    throw new DownloadError(url, 0, 'Invalid download URL format - missing query parameters');
  }

  const proxyResponse = await getOk(baseUrl, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/x-www-form-urlencoded',
    },
    body: queryString,
  });

  const signedUrl = (await proxyResponse.text()).trim();
  if (!signedUrl.startsWith('http')) {
    throw new DownloadError(url, 0, `Invalid signed URL response: ${signedUrl.substring(0, 100)}`);
  }
  return signedUrl;
}

/**
 * Download a single memory with retry logic
 *
 * Direct URLs are fetched with a GET carrying the route tag header; proxied
 * links go through {@link resolveProxyUrl} first.
 */
export async function fetchMedia(
  record: MemoryRecord,
  options: FetchOptions = {}
): Promise<DownloadedMedia> {
  const { maxRetries = DEFAULT_MAX_RETRIES, backoffBaseMs = BACKOFF_BASE_DELAY_MS, onRetry } =
    options;

  let lastError: Error | null = null;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      const fileResponse = record.isDirectRequest
        ? await getOk(record.sourceUrl, { headers: ROUTE_TAG_HEADER })
        : await getOk(await resolveProxyUrl(record.sourceUrl));

      const contentType = fileResponse.headers.get('content-type') || 'application/octet-stream';
      const data = Buffer.from(await fileResponse.arrayBuffer());

      if (data.length === 0) {
        throw new DownloadError(record.sourceUrl, fileResponse.status, 'Empty response body');
      }

      return {
        data,
        contentType,
        extension: getExtension(contentType, data),
      };
    } catch (error) {
      if (error instanceof Error && attempt < maxRetries && isRetryableError(error)) {
        lastError = error;
        const delay = calculateBackoffDelay(attempt, backoffBaseMs);

        if (onRetry) {
          onRetry(attempt + 1, delay, error);
        }

        await sleep(delay);
        continue;
      }

      throw error;
    }
  }

  throw lastError || new Error('Download failed after retries');
}

/**
 * Progress callback type
 */
export type ProgressCallback = (completed: number, total: number, record: MemoryRecord) => void;

/**
 * Download options
 */
export interface DownloadOptions extends FetchOptions {
  delay?: number;
  onProgress?: ProgressCallback;
  onFailure?: (record: MemoryRecord, error: Error) => void;
  signal?: AbortSignal;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Download every record of a bundle into downloadDir
 *
 * Each success records the file name on the record and saves the bundle, so
 * an interrupted run resumes where it stopped.
 */
export async function downloadAll(
  bundle: MetadataBundle,
  downloadDir: string,
  metadataPath: string,
  options: DownloadOptions = {}
): Promise<DownloadStats> {
  const { delay = DEFAULT_DOWNLOAD_DELAY_MS, onProgress, onFailure, signal, ...fetchOptions } =
    options;

  await mkdir(downloadDir, { recursive: true });

  const records = bundle.records;
  const stats: DownloadStats = {
    total: records.length,
    downloaded: 0,
    skipped: 0,
    failed: 0,
    retries: 0,
  };

  for (const [i, record] of records.entries()) {
    if (signal?.aborted) {
      break;
    }

    if (record.downloadedFileRef && (await fileExists(join(downloadDir, record.downloadedFileRef)))) {
      stats.skipped++;
      onProgress?.(i + 1, records.length, record);
      continue;
    }

    try {
      const media = await fetchMedia(record, {
        ...fetchOptions,
        onRetry: (attempt, retryDelay, error) => {
          stats.retries++;
          fetchOptions.onRetry?.(attempt, retryDelay, error);
        },
      });

      const fileName = `${record.derivedFilename}${media.extension}`;
      await writeFile(join(downloadDir, fileName), media.data);
      record.downloadedFileRef = fileName;
      await saveBundle(bundle, metadataPath);
      stats.downloaded++;
    } catch (error) {
      stats.failed++;
      onFailure?.(record, error instanceof Error ? error : new Error('Unknown error'));
    }

    onProgress?.(i + 1, records.length, record);

    // Rate limiting delay between downloads
    if (i < records.length - 1 && delay > 0) {
      await sleep(delay);
    }
  }

  return stats;
}
