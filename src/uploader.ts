/**
 * Upload phase: sends processed media to the photo library
 */

import { stat } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import type { PhotoLibrary } from './immich.js';
import { buildIndex } from './lookup.js';
import { listMediaFiles } from './processor.js';
import type { TimestampPolicy } from './timestamp.js';
import type { MetadataBundle, UploadStats } from './types.js';

export const UPLOAD_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.mp4', '.mov'];

export const DEFAULT_DEVICE_ID = 'memories-immich-sync';

export interface UploadOptions {
  policy: TimestampPolicy;
  deviceId?: string;
  onProgress?: (completed: number, total: number, fileName: string) => void;
  onFailure?: (fileName: string, error: Error) => void;
}

/**
 * Upload every processed file. Files that match no record fall back to their
 * modification time for the capture date.
 */
export async function uploadAll(
  bundle: MetadataBundle,
  processedDir: string,
  library: Pick<PhotoLibrary, 'uploadAsset'>,
  options: UploadOptions
): Promise<UploadStats> {
  const { policy, deviceId = DEFAULT_DEVICE_ID, onProgress, onFailure } = options;

  const index = buildIndex(bundle);
  const files = await listMediaFiles(processedDir, UPLOAD_EXTENSIONS);
  const stats: UploadStats = { total: files.length, uploaded: 0, duplicates: 0, failed: 0 };

  for (const [i, fileName] of files.entries()) {
    const filePath = join(processedDir, fileName);

    try {
      const match = index.resolve(fileName);
      const createdAt = match
        ? policy.formatForRemote(match.record.capturedAt)
        : (await stat(filePath)).mtime.toISOString();

      const outcome = await library.uploadAsset(filePath, {
        deviceAssetId: basename(fileName, extname(fileName)),
        deviceId,
        fileCreatedAt: createdAt,
        fileModifiedAt: createdAt,
      });

      if (outcome === 'duplicate') {
        stats.duplicates++;
      } else {
        stats.uploaded++;
      }
    } catch (error) {
      stats.failed++;
      onFailure?.(fileName, error instanceof Error ? error : new Error('Unknown error'));
    }

    onProgress?.(i + 1, files.length, fileName);
  }

  return stats;
}
