/**
 * Parser module for Snapchat JSON and HTML export files
 */

import { access, readdir, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parseExportDate, toDateKey } from './timestamp.js';
import {
  EmptyExportError,
  MalformedSchemaError,
  type MediaType,
  type MemoryLocation,
  type ParsedMemory,
  ParseError,
  isRecord,
} from './types.js';

export type SourceFormat = 'json' | 'html';

export type WarningHandler = (message: string) => void;

/**
 * Result from finding the memories file
 */
export interface ExportFileResult {
  readonly path: string;
  readonly type: SourceFormat;
}

const NO_LOCATION: MemoryLocation = { latitude: 0, longitude: 0, valid: false };

const LOCATION_RE = /Latitude,\s*Longitude:\s*([-+\d.]+),\s*([-+\d.]+)/;

const ONCLICK_RE = /downloadMemories\s*\(\s*'([^']+)'\s*,\s*this\s*,\s*(true|false)\s*\)/;

const defaultWarning: WarningHandler = (message) => console.warn(message);

function roundCoordinate(value: number): number {
  return Math.round(value * 1e6) / 1e6;
}

/**
 * Parse location string from Snapchat export
 * Format: "Latitude, Longitude: 41.714947, -93.46679"
 *
 * A missing or unreadable location, and the (0, 0) sentinel, give an
 * invalid location.
 */
export function parseLocation(locationStr: string | undefined): MemoryLocation {
  if (!locationStr || locationStr.trim() === '') {
    return NO_LOCATION;
  }

  const match = locationStr.match(LOCATION_RE);
  if (!match) {
    return NO_LOCATION;
  }

  const latitude = parseFloat(match[1]);
  const longitude = parseFloat(match[2]);

  if (isNaN(latitude) || isNaN(longitude)) {
    return NO_LOCATION;
  }

  const lat = roundCoordinate(latitude);
  const lon = roundCoordinate(longitude);

  return {
    latitude: lat,
    longitude: lon,
    valid: !(lat === 0 && lon === 0),
  };
}

/**
 * Validate and lower-case the media type label
 */
export function parseMediaType(label: string | undefined): MediaType {
  const normalized = (label ?? '').trim().toLowerCase();
  if (normalized === 'image' || normalized === 'video') {
    return normalized;
  }
  throw new ParseError(`Invalid media type: ${label ?? '(missing)'}`);
}

function buildMemory(
  dateStr: string,
  mediaTypeStr: string | undefined,
  locationStr: string | undefined,
  sourceUrl: string,
  isDirectRequest: boolean
): ParsedMemory {
  const capturedAt = parseExportDate(dateStr);
  return {
    capturedAt,
    dateKey: toDateKey(capturedAt),
    mediaType: parseMediaType(mediaTypeStr),
    location: parseLocation(locationStr),
    sourceUrl,
    isDirectRequest,
    originalDate: dateStr.trim(),
  };
}

function readString(entry: Record<string, unknown>, key: string): string {
  const value = entry[key];
  return typeof value === 'string' ? value.trim() : '';
}

/**
 * Parse memories from the structured (JSON) export
 *
 * Accepts a bare array or an object wrapping it under "Saved Media". The
 * direct "Media Download Url" is preferred over the proxied "Download Link".
 */
export function parseJsonExport(
  data: unknown,
  onWarning: WarningHandler = defaultWarning
): ParsedMemory[] {
  let items: unknown = data;
  if (isRecord(data)) {
    if (!('Saved Media' in data)) {
      throw new MalformedSchemaError('Expected an array or an object with a "Saved Media" array.');
    }
    items = data['Saved Media'];
  }

  if (!Array.isArray(items)) {
    throw new MalformedSchemaError('Expected an array of memory objects.');
  }

  const memories: ParsedMemory[] = [];

  items.forEach((item: unknown, position: number) => {
    if (!isRecord(item)) {
      onWarning(`Skipping entry ${position + 1}: not an object`);
      return;
    }

    const dateStr = readString(item, 'Date');
    if (!dateStr) {
      onWarning(`Skipping entry ${position + 1}: missing date`);
      return;
    }

    const directUrl = readString(item, 'Media Download Url');
    const proxyUrl = readString(item, 'Download Link');
    const url = directUrl || proxyUrl;
    if (!url) {
      onWarning(`Skipping entry ${position + 1}: no download URL`);
      return;
    }

    try {
      memories.push(
        buildMemory(
          dateStr,
          readString(item, 'Media Type'),
          readString(item, 'Location'),
          url,
          directUrl !== ''
        )
      );
    } catch (error) {
      onWarning(
        `Skipping entry ${position + 1}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  });

  return memories;
}

/**
 * Decode HTML entities in a string
 */
export function decodeHtmlEntities(text: string): string {
  return text
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&#x27;/g, "'")
    .replace(/&#x2F;/g, '/')
    .replace(/&amp;/g, '&');
}

function stripTags(html: string): string {
  return decodeHtmlEntities(html.replace(/<[^>]*>/g, ' '))
    .replace(/\s+/g, ' ')
    .trim();
}

/**
 * Extract URL and request flag from the action element
 * Format: onclick="downloadMemories('https://...', this, true); return false;"
 */
export function extractDownloadAction(
  cellHtml: string
): { url: string; isDirectRequest: boolean } | null {
  const match = decodeHtmlEntities(cellHtml).match(ONCLICK_RE);
  if (!match) {
    return null;
  }
  return { url: match[1], isDirectRequest: match[2] === 'true' };
}

/**
 * Parse memories from the tabular (HTML) export
 * Each data row: <tr><td>date</td><td>mediaType</td><td>location</td><td>action</td></tr>
 */
export function parseHtmlExport(
  html: string,
  onWarning: WarningHandler = defaultWarning
): ParsedMemory[] {
  const memories: ParsedMemory[] = [];
  const rowRegex = /<tr[^>]*>([\s\S]*?)<\/tr>/gi;
  const cellRegex = /<td[^>]*>([\s\S]*?)<\/td>/gi;

  let rowNumber = 0;
  let match;
  while ((match = rowRegex.exec(html)) !== null) {
    const cells = Array.from(match[1].matchAll(cellRegex), (cell) => cell[1]);
    // Header rows use <th>
    if (cells.length < 4) {
      continue;
    }
    rowNumber++;

    const [dateCell, typeCell, locationCell, ...rest] = cells;
    const action = extractDownloadAction(rest.join(' '));
    if (!action) {
      onWarning(`Skipping row ${rowNumber}: could not extract download URL`);
      continue;
    }

    try {
      memories.push(
        buildMemory(
          stripTags(dateCell),
          stripTags(typeCell),
          stripTags(locationCell),
          action.url,
          action.isDirectRequest
        )
      );
    } catch (error) {
      onWarning(
        `Skipping row ${rowNumber}: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }

  return memories;
}

/**
 * Normalize either export format into parsed memories
 *
 * Individual bad records are skipped with a warning; an export with no usable
 * record is an EmptyExportError.
 */
export function normalize(
  sourceFormat: SourceFormat,
  rawInput: string,
  onWarning: WarningHandler = defaultWarning
): ParsedMemory[] {
  let memories: ParsedMemory[];

  if (sourceFormat === 'json') {
    let data: unknown;
    try {
      data = JSON.parse(rawInput);
    } catch {
      throw new MalformedSchemaError('Invalid JSON in memories export');
    }
    memories = parseJsonExport(data, onWarning);
  } else {
    memories = parseHtmlExport(rawInput, onWarning);
  }

  if (memories.length === 0) {
    throw new EmptyExportError(
      sourceFormat === 'html'
        ? 'Could not parse any memories from HTML. The file format may have changed.'
        : 'No valid memories found in JSON export.'
    );
  }

  return memories;
}

/**
 * Detect format from a file name
 */
export function detectFormat(path: string): SourceFormat {
  const lower = path.toLowerCase();
  if (lower.endsWith('.json')) return 'json';
  if (lower.endsWith('.html') || lower.endsWith('.htm')) return 'html';
  throw new ParseError(`Input file must be .json or .html, got: ${path}`);
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
 * Find the memories file (JSON or HTML) in a Snapchat export folder
 * Prefers JSON but falls back to HTML if JSON is not available
 */
export async function findExportFile(exportPath: string): Promise<ExportFileResult> {
  const roots = [exportPath];

  try {
    const entries = await readdir(exportPath, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.isDirectory() && entry.name.startsWith('mydata~')) {
        roots.push(join(exportPath, entry.name));
      }
    }
  } catch (error) {
    throw new ParseError(
      `Cannot read export folder ${exportPath}: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }

  for (const root of roots) {
    const jsonPath = join(root, 'json', 'memories_history.json');
    if (await fileExists(jsonPath)) {
      return { path: jsonPath, type: 'json' };
    }

    const htmlPath = join(root, 'html', 'memories_history.html');
    if (await fileExists(htmlPath)) {
      return { path: htmlPath, type: 'html' };
    }
  }

  throw new ParseError(
    `Could not find memories_history.json or memories_history.html in ${exportPath}. ` +
      'Expected path: <export>/json/memories_history.json, <export>/html/memories_history.html, ' +
      'or the same inside a mydata~* folder'
  );
}

/**
 * Load and normalize an export file
 */
export async function loadExport(
  file: ExportFileResult,
  onWarning: WarningHandler = defaultWarning
): Promise<ParsedMemory[]> {
  const content = await readFile(file.path, 'utf-8');
  return normalize(file.type, content, onWarning);
}
