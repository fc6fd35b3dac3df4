/**
 * Assigns ordinals and derived filenames to normalized memories
 */

import type { MemoryRecord, ParsedMemory } from './types.js';

/**
 * Build the derived filename: `{dateKey}_{mediaType}_{ordinal:04d}[_gps]`
 */
export function buildDerivedFilename(memory: ParsedMemory, ordinal: number): string {
  const base = `${memory.dateKey}_${memory.mediaType}_${String(ordinal).padStart(4, '0')}`;
  return memory.location.valid ? `${base}_gps` : base;
}

/**
 * Number memories 1..N in export order and derive their filenames.
 * Must run once the whole export has been normalized.
 */
export function deriveIdentity(memories: readonly ParsedMemory[]): MemoryRecord[] {
  return memories.map((memory, i) => ({
    ...memory,
    ordinal: i + 1,
    derivedFilename: buildDerivedFilename(memory, i + 1),
  }));
}
