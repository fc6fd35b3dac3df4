/**
 * Unpacks the ZIP archives some memories are delivered as
 *
 * An archive holds the base media (`*-main.jpg` / `*-main.mp4`) and,
 * optionally, a transparent overlay PNG.
 */

import type { IZipEntry } from 'adm-zip';
import { CompositeError, type MediaType } from './types.js';

export type BaseExtension = 'jpg' | 'png' | 'mp4';

/**
 * Contents extracted from a media ZIP file
 */
export interface ExtractedMediaContents {
  readonly baseMedia: Buffer;
  readonly baseExtension: BaseExtension;
  readonly overlay: Buffer | null;
}

/**
 * Check if a buffer starts with ZIP magic bytes
 */
export function isZipBuffer(buffer: Buffer): boolean {
  // ZIP files start with PK (0x50 0x4B)
  return buffer.length >= 2 && buffer[0] === 0x50 && buffer[1] === 0x4b;
}

function isOverlayName(name: string): boolean {
  return name.endsWith('.png') && name.includes('overlay');
}

function baseExtensionOf(name: string): BaseExtension | null {
  if (name.endsWith('.jpg') || name.endsWith('.jpeg')) return 'jpg';
  if (name.endsWith('.mp4') || name.endsWith('.mov')) return 'mp4';
  if (name.endsWith('.png')) return 'png';
  return null;
}

/**
 * Extract base media and overlay from a ZIP buffer
 */
export async function extractMediaFromZip(
  zipBuffer: Buffer,
  mediaType: MediaType
): Promise<ExtractedMediaContents> {
  // Dynamic import to avoid loading adm-zip until needed
  const AdmZip = (await import('adm-zip')).default;

  let entries: IZipEntry[];
  try {
    entries = new AdmZip(zipBuffer).getEntries().filter((entry) => !entry.isDirectory);
  } catch (error) {
    throw new CompositeError(
      mediaType,
      `Unreadable archive: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }

  let overlay: Buffer | null = null;
  let base: { data: Buffer; extension: BaseExtension } | null = null;

  for (const entry of entries) {
    const name = entry.entryName.toLowerCase();
    if (isOverlayName(name)) {
      overlay = entry.getData();
      continue;
    }
    const extension = baseExtensionOf(name);
    // The main file wins over any other media entry
    if (extension && (!base || name.includes('main'))) {
      base = { data: entry.getData(), extension };
    }
  }

  if (!base) {
    throw new CompositeError(mediaType, 'No media file found in ZIP archive');
  }

  return {
    baseMedia: base.data,
    baseExtension: base.extension,
    overlay,
  };
}
