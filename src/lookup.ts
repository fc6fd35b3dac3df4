/**
 * Multi-key lookup index
 *
 * Resolves a physical file name or a remote asset name back to its memory.
 * Tiers are tried in a fixed order, most authoritative first:
 *
 *   1. downloaded file name (set after a successful fetch)
 *   2. derived filename
 *   3. date key found in the name, disambiguated by ordinal or media type
 *   4. ordinal token found in the name
 */

import { basename, extname } from 'node:path';
import type { MediaType, MemoryRecord, MetadataBundle } from './types.js';

const DATE_KEY_RE = /(\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2})/;
const TRAILING_ORDINAL_RE = /_(\d{4})(?:_gps)?$/i;
const MEMORY_ORDINAL_RE = /memory_(\d+)/i;
const MEDIA_TYPE_RE = /(?:^|_)(image|video)(?:_|$)/i;

/**
 * Lookup tables built once per bundle
 */
export interface LookupTables {
  readonly byDownloadedFile: ReadonlyMap<string, MemoryRecord>;
  readonly byDerivedFilename: ReadonlyMap<string, MemoryRecord>;
  readonly byDateKey: ReadonlyMap<string, readonly MemoryRecord[]>;
  readonly byOrdinal: ReadonlyMap<number, MemoryRecord>;
}

export type LookupTierName = 'downloaded-file' | 'derived-filename' | 'date-key' | 'ordinal';

export type LookupTier = (candidate: string, tables: LookupTables) => MemoryRecord | null;

export interface LookupMatch {
  readonly record: MemoryRecord;
  readonly tier: LookupTierName;
}

/**
 * Strip directories and one extension: "/a/b/2024-07-01_x.jpg" -> "2024-07-01_x"
 */
export function toCandidateName(name: string): string {
  const base = basename(name.replace(/\\/g, '/'));
  const ext = extname(base);
  // Only treat short alphanumeric suffixes as extensions
  return /^\.[a-z0-9]{1,5}$/i.test(ext) ? base.slice(0, -ext.length) : base;
}

/**
 * Extract a trailing `_NNNN` or a `memory_N` ordinal token
 */
export function extractOrdinalToken(candidate: string): number | null {
  const memoryMatch = candidate.match(MEMORY_ORDINAL_RE);
  if (memoryMatch) {
    return Number(memoryMatch[1]);
  }
  const trailing = candidate.match(TRAILING_ORDINAL_RE);
  return trailing ? Number(trailing[1]) : null;
}

export function extractDateKey(candidate: string): string | null {
  const match = candidate.match(DATE_KEY_RE);
  return match ? match[1] : null;
}

export function extractMediaType(candidate: string): MediaType | null {
  const match = candidate.match(MEDIA_TYPE_RE);
  if (!match) return null;
  return match[1].toLowerCase() === 'video' ? 'video' : 'image';
}

export const matchDownloadedFile: LookupTier = (candidate, tables) =>
  tables.byDownloadedFile.get(candidate) ?? null;

export const matchDerivedFilename: LookupTier = (candidate, tables) =>
  tables.byDerivedFilename.get(candidate) ?? null;

export const matchDateKey: LookupTier = (candidate, tables) => {
  const dateKey = extractDateKey(candidate);
  if (!dateKey) return null;

  const group = tables.byDateKey.get(dateKey);
  if (!group || group.length === 0) return null;

  const ordinal = extractOrdinalToken(candidate);
  if (ordinal !== null) {
    // A conflicting ordinal is left for the ordinal tier
    return group.find((record) => record.ordinal === ordinal) ?? null;
  }

  if (group.length === 1) {
    return group[0];
  }

  const mediaType = extractMediaType(candidate);
  if (mediaType) {
    const sameType = group.filter((record) => record.mediaType === mediaType);
    if (sameType.length === 1) {
      return sameType[0];
    }
  }

  return null;
};

export const matchOrdinal: LookupTier = (candidate, tables) => {
  const ordinal = extractOrdinalToken(candidate);
  if (ordinal === null) return null;
  return tables.byOrdinal.get(ordinal) ?? null;
};

/**
 * Tier order is fixed
 */
export const LOOKUP_TIERS: ReadonlyArray<readonly [LookupTierName, LookupTier]> = [
  ['downloaded-file', matchDownloadedFile],
  ['derived-filename', matchDerivedFilename],
  ['date-key', matchDateKey],
  ['ordinal', matchOrdinal],
];

export function buildTables(records: readonly MemoryRecord[]): LookupTables {
  const byDownloadedFile = new Map<string, MemoryRecord>();
  const byDerivedFilename = new Map<string, MemoryRecord>();
  const byDateKey = new Map<string, MemoryRecord[]>();
  const byOrdinal = new Map<number, MemoryRecord>();

  for (const record of records) {
    if (record.downloadedFileRef) {
      byDownloadedFile.set(toCandidateName(record.downloadedFileRef), record);
    }
    byDerivedFilename.set(record.derivedFilename, record);

    const group = byDateKey.get(record.dateKey);
    if (group) {
      group.push(record);
    } else {
      byDateKey.set(record.dateKey, [record]);
    }

    byOrdinal.set(record.ordinal, record);
  }

  return { byDownloadedFile, byDerivedFilename, byDateKey, byOrdinal };
}

/**
 * Index over a bundle's records
 */
export class MemoryIndex {
  readonly tables: LookupTables;

  constructor(
    records: readonly MemoryRecord[],
    private readonly tiers: ReadonlyArray<readonly [LookupTierName, LookupTier]> = LOOKUP_TIERS
  ) {
    this.tables = buildTables(records);
  }

  /**
   * Resolve a file name, path or asset name. Returns null when unmatched.
   */
  resolve(name: string): LookupMatch | null {
    const candidate = toCandidateName(name);
    if (!candidate) return null;

    for (const [tier, lookup] of this.tiers) {
      const record = lookup(candidate, this.tables);
      if (record) {
        return { record, tier };
      }
    }
    return null;
  }

  /**
   * Try several names for the same item, in order
   */
  resolveAny(names: ReadonlyArray<string | null | undefined>): LookupMatch | null {
    for (const name of names) {
      if (!name) continue;
      const match = this.resolve(name);
      if (match) return match;
    }
    return null;
  }
}

export function buildIndex(bundle: MetadataBundle): MemoryIndex {
  return new MemoryIndex(bundle.records);
}
