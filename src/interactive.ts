/**
 * Interactive CLI module for guided user experience
 */

import { input, confirm, select, password } from '@inquirer/prompts';
import type { Dirent } from 'node:fs';
import { stat, readdir } from 'node:fs/promises';
import { resolve, join } from 'node:path';
import { homedir } from 'node:os';
import { DEFAULT_UTC_OFFSET, type ImmichOptions, type TimezoneOptions } from './config.js';
import { DEFAULT_DOWNLOAD_DELAY_MS, DEFAULT_MAX_RETRIES } from './downloader.js';
import { parseUtcOffset } from './timestamp.js';

export type InteractiveAction = 'run' | 'extract' | 'download' | 'process' | 'upload' | 'repair';

/**
 * Represents a found Snapchat export folder
 */
interface FoundExport {
  readonly path: string;
  readonly name: string;
  readonly timestamp: string;
}

/**
 * Interactive session configuration result
 */
export interface InteractiveConfig extends TimezoneOptions, ImmichOptions {
  readonly action: InteractiveAction;
  /** Export folder/file for run and extract, metadata file otherwise */
  readonly inputPath: string;
  readonly dryRun: boolean;
  readonly delay: string;
  readonly maxRetries: string;
}

const ACTIONS: ReadonlyArray<{ name: string; value: InteractiveAction }> = [
  { name: 'Run everything (extract, download, process, upload)', value: 'run' },
  { name: 'Extract metadata from an export', value: 'extract' },
  { name: 'Download media', value: 'download' },
  { name: 'Process downloaded media', value: 'process' },
  { name: 'Upload to Immich', value: 'upload' },
  { name: 'Repair dates and GPS already in Immich', value: 'repair' },
];

/**
 * Common locations to search for Snapchat exports
 */
function getSearchLocations(): string[] {
  const home = homedir();
  return [
    process.cwd(), // Current working directory (highest priority)
    join(home, 'Downloads'),
    join(home, 'Desktop'),
    home,
    join(home, 'Documents'),
  ];
}

/**
 * Search a directory for Snapchat export folders (mydata~*)
 * Searches the directory itself and one level of subdirectories
 */
async function searchDirectoryForExports(dir: string, depth = 0): Promise<FoundExport[]> {
  const exports: FoundExport[] = [];
  const MAX_DEPTH = 1;

  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch {
    // Directory not accessible
    return exports;
  }

  for (const entry of entries) {
    if (!entry.isDirectory()) continue;
    const fullPath = join(dir, entry.name);

    if (entry.name.startsWith('mydata~')) {
      exports.push({
        path: fullPath,
        name: entry.name,
        timestamp: entry.name.replace('mydata~', ''),
      });
    } else if (depth < MAX_DEPTH && !entry.name.startsWith('.')) {
      exports.push(...(await searchDirectoryForExports(fullPath, depth + 1)));
    }
  }

  return exports;
}

/**
 * Find all Snapchat export folders in common locations, newest first
 */
async function findSnapchatExports(): Promise<FoundExport[]> {
  const results = await Promise.all(
    getSearchLocations().map((dir) => searchDirectoryForExports(dir))
  );
  const allExports = results.flat();

  allExports.sort((a, b) => b.timestamp.localeCompare(a.timestamp));

  // Search paths overlap (cwd may be inside home)
  const seen = new Set<string>();
  return allExports.filter((exp) => {
    if (seen.has(exp.path)) return false;
    seen.add(exp.path);
    return true;
  });
}

/**
 * Metadata files written by a previous extract in the working directory
 */
async function findMetadataFiles(): Promise<string[]> {
  try {
    const entries = await readdir(process.cwd());
    return entries
      .filter((name) => name.endsWith('_metadata.json'))
      .sort()
      .map((name) => join(process.cwd(), name));
  } catch {
    return [];
  }
}

/**
 * Format a timestamp from folder name to readable date
 */
function formatExportTimestamp(timestamp: string): string {
  // Snapchat uses Unix timestamp in milliseconds
  const ms = parseInt(timestamp, 10);
  if (isNaN(ms)) return timestamp;

  const date = new Date(ms);
  if (isNaN(date.getTime())) return timestamp;

  return date.toLocaleDateString('en-US', {
    year: 'numeric',
    month: 'short',
    day: 'numeric',
    hour: '2-digit',
    minute: '2-digit',
  });
}

/**
 * Print the welcome banner
 */
function printBanner(): void {
  console.log();
  console.log('===========================================');
  console.log('     Snapchat Memories to Immich Tool      ');
  console.log('===========================================');
  console.log();
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(resolve(path.trim()));
    return true;
  } catch {
    return false;
  }
}

async function promptForPath(message: string): Promise<string> {
  const value = await input({
    message,
    validate: async (entered) => {
      const trimmed = entered.trim();
      if (!trimmed) {
        return 'Please enter a path';
      }
      if (!(await pathExists(trimmed))) {
        return 'Path does not exist';
      }
      return true;
    },
  });
  return resolve(value.trim());
}

const MANUAL_ENTRY = '__manual__';

async function chooseExport(): Promise<string> {
  console.log('  Searching for Snapchat exports...');
  const foundExports = await findSnapchatExports();

  if (foundExports.length === 0) {
    console.log('  No exports found in common locations.');
    console.log();
    return promptForPath('Path to your Snapchat export folder or memories_history file:');
  }

  console.log(`  Found ${foundExports.length} export${foundExports.length > 1 ? 's' : ''}!`);
  console.log();

  const selected = await select({
    message: 'Select a Snapchat export:',
    choices: [
      ...foundExports.map((exp) => ({
        name: `${exp.name} (${formatExportTimestamp(exp.timestamp)})`,
        value: exp.path,
      })),
      { name: 'Enter a different path...', value: MANUAL_ENTRY },
    ],
  });

  return selected === MANUAL_ENTRY
    ? promptForPath('Path to your Snapchat export folder or memories_history file:')
    : selected;
}

async function chooseMetadataFile(): Promise<string> {
  const files = await findMetadataFiles();
  if (files.length === 0) {
    return promptForPath('Path to the metadata file (written by extract):');
  }

  const selected = await select({
    message: 'Select a metadata file:',
    choices: [
      ...files.map((file) => ({ name: file, value: file })),
      { name: 'Enter a different path...', value: MANUAL_ENTRY },
    ],
  });

  return selected === MANUAL_ENTRY
    ? promptForPath('Path to the metadata file (written by extract):')
    : selected;
}

async function chooseTimezone(): Promise<TimezoneOptions> {
  const timezone = await select({
    message: 'Export dates are labelled UTC. How should they be read?',
    choices: [
      { name: 'As UTC', value: 'utc' },
      { name: 'As local time at a fixed offset (some exports are Pacific time)', value: 'local' },
    ],
    default: 'utc',
  });

  if (timezone === 'utc') {
    return { timezone };
  }

  const utcOffset = await input({
    message: 'UTC offset:',
    default: DEFAULT_UTC_OFFSET,
    validate: (value) => {
      try {
        parseUtcOffset(value);
        return true;
      } catch {
        return 'Please enter an offset such as -08:00';
      }
    },
  });

  return { timezone, utcOffset: utcOffset.trim() };
}

async function askImmich(): Promise<ImmichOptions> {
  const immichUrl = await input({
    message: 'Immich server URL:',
    default: process.env.IMMICH_URL,
    validate: (value) => (value.trim() ? true : 'Please enter a URL'),
  });

  const envKey = process.env.IMMICH_API_KEY;
  const useEnvKey = envKey
    ? await confirm({ message: 'Use the API key from IMMICH_API_KEY?', default: true })
    : false;

  const apiKey =
    useEnvKey && envKey
      ? envKey
      : await password({
          message: 'Immich API key:',
          mask: '*',
          validate: (value) => (value.trim() ? true : 'Please enter an API key'),
        });

  return { immichUrl: immichUrl.trim(), apiKey: apiKey.trim() };
}

/**
 * Run the interactive prompts and return configuration
 */
export async function runInteractivePrompts(): Promise<InteractiveConfig | null> {
  printBanner();

  const action = await select({
    message: 'What would you like to do?',
    choices: ACTIONS,
  });

  const usesExport = action === 'run' || action === 'extract';
  const inputPath = usesExport ? await chooseExport() : await chooseMetadataFile();

  const timezoneOptions = action === 'download' ? {} : await chooseTimezone();

  const needsImmich = action === 'upload' || action === 'repair' || action === 'run';
  let immichOptions: ImmichOptions = {};
  if (needsImmich) {
    const wantsImmich =
      action !== 'run' ||
      (await confirm({ message: 'Upload to Immich at the end?', default: true }));
    if (wantsImmich) {
      immichOptions = await askImmich();
    }
  }

  const dryRun =
    action === 'repair'
      ? await confirm({ message: 'Dry run (report changes without applying them)?', default: true })
      : false;

  console.log();
  console.log('-------------------------------------------');
  console.log('  Summary');
  console.log('-------------------------------------------');
  console.log(`  Action: ${ACTIONS.find((a) => a.value === action)?.name ?? action}`);
  console.log(`  Input: ${inputPath}`);
  if (timezoneOptions.timezone) {
    console.log(
      `  Dates read as: ${timezoneOptions.timezone === 'utc' ? 'UTC' : `local time ${timezoneOptions.utcOffset ?? DEFAULT_UTC_OFFSET}`}`
    );
  }
  if (immichOptions.immichUrl) {
    console.log(`  Immich: ${immichOptions.immichUrl}`);
  }
  if (action === 'repair') {
    console.log(`  Dry run: ${dryRun ? 'Yes' : 'No'}`);
  }
  console.log('-------------------------------------------');
  console.log();

  const proceed = await confirm({ message: 'Start?', default: true });
  if (!proceed) {
    console.log('  Cancelled.');
    return null;
  }

  return {
    action,
    inputPath,
    dryRun,
    delay: String(DEFAULT_DOWNLOAD_DELAY_MS),
    maxRetries: String(DEFAULT_MAX_RETRIES),
    ...timezoneOptions,
    ...immichOptions,
  };
}
