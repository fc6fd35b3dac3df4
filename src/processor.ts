/**
 * Processing phase: turns downloaded files into finished media with embedded
 * metadata
 */

import { copyFile, mkdir, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { basename, extname, join } from 'node:path';
import { extractMediaFromZip, isZipBuffer } from './archive.js';
import { compositeImage, compositeVideo } from './compositor.js';
import { buildIndex } from './lookup.js';
import { applyToImage, applyToVideo } from './metadata.js';
import type { TimestampPolicy } from './timestamp.js';
import type { MemoryRecord, MetadataBundle, ProcessStats } from './types.js';

export const DOWNLOADED_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.mp4', '.bin'];

export type MetadataApplier = (
  filePath: string,
  record: MemoryRecord,
  policy: TimestampPolicy
) => Promise<void>;

export interface MediaAppliers {
  readonly image: MetadataApplier;
  readonly video: MetadataApplier;
}

const DEFAULT_APPLIERS: MediaAppliers = { image: applyToImage, video: applyToVideo };

export interface ProcessOptions {
  policy: TimestampPolicy;
  appliers?: MediaAppliers;
  onProgress?: (completed: number, total: number, fileName: string) => void;
  onUnmatched?: (fileName: string) => void;
  onFailure?: (fileName: string, error: Error) => void;
}

/**
 * Media files of a folder, sorted by name
 */
export async function listMediaFiles(dir: string, extensions: readonly string[]): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && extensions.includes(extname(entry.name).toLowerCase()))
    .map((entry) => entry.name)
    .sort();
}

/**
 * Unpack a `.bin` download into outputDir, compositing the overlay when the
 * archive has one. Returns the written file.
 */
async function unpackArchive(
  sourcePath: string,
  record: MemoryRecord,
  outputDir: string
): Promise<string> {
  const stem = basename(sourcePath, extname(sourcePath));
  const data = await readFile(sourcePath);

  if (!isZipBuffer(data)) {
    // Not an archive after all: keep the payload under the record's type
    const outputPath = join(outputDir, `${stem}.${record.mediaType === 'video' ? 'mp4' : 'jpg'}`);
    await writeFile(outputPath, data);
    return outputPath;
  }

  const contents = await extractMediaFromZip(data, record.mediaType);

  if (!contents.overlay) {
    const outputPath = join(outputDir, `${stem}.${contents.baseExtension}`);
    await writeFile(outputPath, contents.baseMedia);
    return outputPath;
  }

  if (contents.baseExtension !== 'mp4') {
    const outputPath = join(outputDir, `${stem}.${contents.baseExtension}`);
    await writeFile(
      outputPath,
      await compositeImage(contents.baseMedia, contents.overlay, contents.baseExtension)
    );
    return outputPath;
  }

  const basePath = join(outputDir, `${stem}.base.mp4`);
  const outputPath = join(outputDir, `${stem}.mp4`);
  await writeFile(basePath, contents.baseMedia);
  try {
    await compositeVideo(basePath, contents.overlay, outputPath);
  } finally {
    await rm(basePath, { force: true });
  }
  return outputPath;
}

/**
 * Process every downloaded file that resolves to a record
 */
export async function processAll(
  bundle: MetadataBundle,
  downloadDir: string,
  processedDir: string,
  options: ProcessOptions
): Promise<ProcessStats> {
  const { policy, appliers = DEFAULT_APPLIERS, onProgress, onUnmatched, onFailure } = options;

  await mkdir(processedDir, { recursive: true });
  const index = buildIndex(bundle);
  const files = await listMediaFiles(downloadDir, DOWNLOADED_EXTENSIONS);

  const stats: ProcessStats = { total: files.length, processed: 0, skipped: 0, failed: 0 };

  for (const [i, fileName] of files.entries()) {
    const match = index.resolve(fileName);

    if (!match) {
      stats.skipped++;
      onUnmatched?.(fileName);
    } else {
      const { record } = match;
      const sourcePath = join(downloadDir, fileName);
      try {
        let outputPath: string;
        if (extname(fileName).toLowerCase() === '.bin') {
          outputPath = await unpackArchive(sourcePath, record, processedDir);
        } else {
          outputPath = join(processedDir, fileName);
          await copyFile(sourcePath, outputPath);
        }

        const apply = record.mediaType === 'video' ? appliers.video : appliers.image;
        await apply(outputPath, record, policy);
        stats.processed++;
      } catch (error) {
        stats.failed++;
        onFailure?.(fileName, error instanceof Error ? error : new Error('Unknown error'));
      }
    }

    onProgress?.(i + 1, files.length, fileName);
  }

  return stats;
}
