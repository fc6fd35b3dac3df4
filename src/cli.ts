/**
 * CLI module for the Snapchat memories to Immich migration tool
 */

import { Command } from 'commander';
import ora, { type Ora } from 'ora';
import cliProgress from 'cli-progress';
import { stat, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import {
  ConfigError,
  DEFAULT_UTC_OFFSET,
  describePolicyMismatch,
  findImmichConfig,
  parseIntegerOption,
  resolveImmichConfig,
  resolveTimestampPolicy,
  type ImmichOptions,
  type TimezoneOptions,
} from './config.js';
import { DEFAULT_DOWNLOAD_DELAY_MS, DEFAULT_MAX_RETRIES, downloadAll } from './downloader.js';
import { isFfmpegAvailable } from './ffmpeg.js';
import { deriveIdentity } from './identity.js';
import {
  DEFAULT_REMOTE_SHAPE,
  ImmichClient,
  loadRemoteShape,
  type RemoteAsset,
} from './immich.js';
import { InMemoryJobStore } from './jobs.js';
import { buildIndex } from './lookup.js';
import { closeExiftool, formatGpsForDisplay } from './metadata.js';
import { detectFormat, findExportFile, loadExport, type ExportFileResult } from './parser.js';
import { processAll } from './processor.js';
import { type RepairEvent, type RepairReport, runRepair } from './reconcile.js';
import {
  createBundle,
  getBundleStats,
  getWorkPaths,
  loadBundle,
  saveBundle,
} from './store.js';
import type { TimestampPolicy } from './timestamp.js';
import type { MetadataBundle } from './types.js';
import { uploadAll } from './uploader.js';

export interface ExtractOptions extends TimezoneOptions {
  output?: string;
}

export interface DownloadCommandOptions {
  delay: string;
  maxRetries: string;
}

export interface RepairCommandOptions extends ImmichOptions, TimezoneOptions {
  dryRun?: boolean;
  asset?: string;
  report?: string;
  remoteShape?: string;
}

export type UploadCommandOptions = ImmichOptions & TimezoneOptions;

export type RunCommandOptions = ExtractOptions & DownloadCommandOptions & ImmichOptions;

/**
 * Check if running in interactive mode (no arguments provided)
 */
export function shouldRunInteractive(argv: string[]): boolean {
  // argv[0] = node, argv[1] = script path
  const args = argv.slice(2);
  return args.length === 0 || args.includes('-i') || args.includes('--interactive');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

function createProgressBar(label: string): cliProgress.SingleBar {
  return new cliProgress.SingleBar(
    {
      format: `${label} |{bar}| {percentage}% | {value}/{total} | ETA: {eta_formatted}`,
      hideCursor: true,
      etaBuffer: 50,
    },
    cliProgress.Presets.shades_classic
  );
}

/**
 * Run `task` with an AbortSignal that fires on Ctrl+C
 */
async function withInterrupt<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  const onInterrupt = (): void => {
    console.error('\nStopping after the current item...');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);
  try {
    return await task(controller.signal);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

function addTimezoneOptions(command: Command): Command {
  return command
    .option('--timezone <mode>', 'How export timestamps are read: utc or local', 'utc')
    .option('--utc-offset <offset>', 'Offset for --timezone local', DEFAULT_UTC_OFFSET);
}

function addImmichOptions(command: Command): Command {
  return command
    .option('--immich-url <url>', 'Immich server URL (default: $IMMICH_URL)')
    .option('--api-key <key>', 'Immich API key (default: $IMMICH_API_KEY)');
}

function addDownloadOptions(command: Command): Command {
  return command
    .option(
      '--delay <ms>',
      'Delay between downloads in milliseconds',
      String(DEFAULT_DOWNLOAD_DELAY_MS)
    )
    .option(
      '-r, --max-retries <n>',
      'Max retries for failed downloads (with exponential backoff)',
      String(DEFAULT_MAX_RETRIES)
    );
}

/**
 * Report the error of a failed phase and mark the process as failed
 */
function reportFailure(spinner: Ora, title: string, error: unknown): void {
  if (spinner.isSpinning) {
    spinner.fail(title);
  } else {
    console.error(title);
  }
  console.error(errorMessage(error));
  process.exitCode = 1;
}

async function loadBundleWithPolicy(
  metadataPath: string,
  policy: TimestampPolicy
): Promise<MetadataBundle> {
  const bundle = await loadBundle(metadataPath);
  const mismatch = describePolicyMismatch(bundle, policy);
  if (mismatch) {
    console.warn(`Warning: ${mismatch}`);
  }
  return bundle;
}

function workPathsFor(metadataPath: string): ReturnType<typeof getWorkPaths> {
  return getWorkPaths(metadataPath, dirname(resolve(metadataPath)));
}

/**
 * Print the extraction summary
 */
export function printBundleSummary(bundle: MetadataBundle): void {
  const stats = getBundleStats(bundle);
  const percent = stats.total > 0 ? Math.round((stats.withGps / stats.total) * 100) : 0;

  console.log(`  Images: ${stats.images}`);
  console.log(`  Videos: ${stats.videos}`);
  console.log(`  With GPS location: ${stats.withGps} (${percent}%)`);
  if (stats.firstDate && stats.lastDate) {
    console.log(`  Date range: ${stats.firstDate} - ${stats.lastDate} (${stats.uniqueDates} days)`);
  }
  if (stats.topDates.length > 0) {
    console.log('  Most active dates:');
    for (const { date, count } of stats.topDates) {
      console.log(`    ${date}: ${count}`);
    }
  }
}

async function resolveExportFile(input: string): Promise<ExportFileResult> {
  const info = await stat(input);
  if (info.isDirectory()) {
    return findExportFile(input);
  }
  return { path: input, type: detectFormat(input) };
}

/**
 * Extract phase. Returns the metadata file path, or null on failure.
 */
export async function runExtractPhase(
  input: string,
  options: ExtractOptions
): Promise<string | null> {
  const spinner = ora('Loading Snapchat export...').start();

  try {
    const policy = resolveTimestampPolicy(options);
    const file = await resolveExportFile(input);
    const warnings: string[] = [];

    const memories = await loadExport(file, (message) => warnings.push(message));
    const records = deriveIdentity(memories);
    const bundle = createBundle(records, { kind: file.type, path: file.path }, policy);

    const metadataFile = options.output ?? getWorkPaths(file.path).metadataFile;
    await saveBundle(bundle, metadataFile);

    spinner.succeed(`Extracted ${records.length} memories from ${file.path}`);
    for (const warning of warnings) {
      console.warn(`  Warning: ${warning}`);
    }
    printBundleSummary(bundle);
    console.log(`  Metadata saved to: ${metadataFile}`);

    return metadataFile;
  } catch (error) {
    reportFailure(spinner, 'Extraction failed', error);
    return null;
  }
}

export async function runDownloadPhase(
  metadataPath: string,
  options: DownloadCommandOptions
): Promise<boolean> {
  const spinner = ora('Loading metadata...').start();

  try {
    const delay = parseIntegerOption(options.delay, '--delay');
    const maxRetries = parseIntegerOption(options.maxRetries, '--max-retries');
    const bundle = await loadBundle(metadataPath);
    const { downloadDir } = workPathsFor(metadataPath);
    spinner.succeed(`Downloading ${bundle.records.length} memories to ${downloadDir}`);

    const progressBar = createProgressBar('Downloading');
    progressBar.start(bundle.records.length, 0);

    const stats = await withInterrupt((signal) =>
      downloadAll(bundle, downloadDir, metadataPath, {
        delay,
        maxRetries,
        signal,
        onProgress: (completed) => progressBar.update(completed),
        onRetry: (attempt, retryDelay, error) => {
          console.error(
            `\n  Retry ${attempt}/${maxRetries} (waiting ${Math.round(retryDelay / 1000)}s, error: ${error.message.substring(0, 50)})`
          );
        },
        onFailure: (record, error) => {
          console.error(`\n  Failed ${record.derivedFilename}: ${error.message}`);
        },
      })
    );
    progressBar.stop();

    console.log();
    console.log('Download complete!');
    console.log(`  Downloaded: ${stats.downloaded}`);
    console.log(`  Skipped (existing): ${stats.skipped}`);
    console.log(`  Failed: ${stats.failed}`);
    if (stats.retries > 0) {
      console.log(`  Retries: ${stats.retries}`);
    }

    if (stats.failed > 0) {
      process.exitCode = 1;
    }
    return true;
  } catch (error) {
    reportFailure(spinner, 'Download failed', error);
    return false;
  }
}

export async function runProcessPhase(
  metadataPath: string,
  options: TimezoneOptions
): Promise<boolean> {
  const spinner = ora('Loading metadata...').start();

  try {
    const policy = resolveTimestampPolicy(options);
    const bundle = await loadBundleWithPolicy(metadataPath, policy);
    const { downloadDir, processedDir } = workPathsFor(metadataPath);

    if (!(await isFfmpegAvailable())) {
      console.warn('\n  Warning: ffmpeg not found, videos will fail to process');
    }
    spinner.succeed(`Processing ${downloadDir} into ${processedDir}`);

    const progressBar = createProgressBar('Processing');
    let started = false;

    const stats = await processAll(bundle, downloadDir, processedDir, {
      policy,
      onProgress: (completed, total) => {
        if (!started) {
          progressBar.start(total, 0);
          started = true;
        }
        progressBar.update(completed);
      },
      onUnmatched: (fileName) => {
        console.warn(`\n  Skipped ${fileName}: no matching memory`);
      },
      onFailure: (fileName, error) => {
        console.error(`\n  Failed ${fileName}: ${error.message}`);
      },
    });
    progressBar.stop();

    console.log();
    console.log('Processing complete!');
    console.log(`  Processed: ${stats.processed}`);
    console.log(`  Skipped (unmatched): ${stats.skipped}`);
    console.log(`  Failed: ${stats.failed}`);

    if (stats.failed > 0) {
      process.exitCode = 1;
    }
    return true;
  } catch (error) {
    reportFailure(spinner, 'Processing failed', error);
    return false;
  } finally {
    await closeExiftool();
  }
}

export async function runUploadPhase(
  metadataPath: string,
  options: UploadCommandOptions
): Promise<boolean> {
  const spinner = ora('Loading metadata...').start();

  try {
    const policy = resolveTimestampPolicy(options);
    const client = new ImmichClient(resolveImmichConfig(options));
    const bundle = await loadBundleWithPolicy(metadataPath, policy);
    const { processedDir } = workPathsFor(metadataPath);
    spinner.succeed(`Uploading ${processedDir} to Immich`);

    const progressBar = createProgressBar('Uploading');
    let started = false;

    const stats = await uploadAll(bundle, processedDir, client, {
      policy,
      onProgress: (completed, total) => {
        if (!started) {
          progressBar.start(total, 0);
          started = true;
        }
        progressBar.update(completed);
      },
      onFailure: (fileName, error) => {
        console.error(`\n  Failed ${fileName}: ${error.message}`);
      },
    });
    progressBar.stop();

    console.log();
    console.log('Upload complete!');
    console.log(`  Uploaded: ${stats.uploaded}`);
    console.log(`  Duplicates: ${stats.duplicates}`);
    console.log(`  Failed: ${stats.failed}`);

    if (stats.failed > 0) {
      process.exitCode = 1;
    }
    return true;
  } catch (error) {
    reportFailure(spinner, 'Upload failed', error);
    return false;
  }
}

function describeFixes(event: RepairEvent): string {
  const fixes: string[] = [];
  if (event.dateCorrect === false) fixes.push('date');
  if (event.gpsCorrect === false) {
    fixes.push(event.record ? `GPS (${formatGpsForDisplay(event.record.location)})` : 'GPS');
  }
  return fixes.join(' + ');
}

async function fetchRepairAssets(client: ImmichClient, assetName?: string): Promise<RemoteAsset[]> {
  if (!assetName) {
    return client.listAssets();
  }
  const asset = await client.findAssetByName(assetName);
  if (!asset) {
    throw new ConfigError(`No Immich asset named ${assetName}`);
  }
  return [asset];
}

export async function runRepairPhase(
  metadataPath: string,
  options: RepairCommandOptions
): Promise<RepairReport | null> {
  const spinner = ora('Loading metadata...').start();
  const jobs = new InMemoryJobStore<RepairEvent, RepairReport>();
  const dryRun = options.dryRun === true;
  const job = jobs.create(dryRun ? 'repair-dry-run' : 'repair');

  try {
    const policy = resolveTimestampPolicy(options);
    const shape = options.remoteShape
      ? await loadRemoteShape(options.remoteShape)
      : DEFAULT_REMOTE_SHAPE;
    const client = new ImmichClient(resolveImmichConfig(options), shape);
    const bundle = await loadBundleWithPolicy(metadataPath, policy);
    const index = buildIndex(bundle);

    spinner.text = 'Fetching assets from Immich...';
    const assets = await fetchRepairAssets(client, options.asset);
    spinner.succeed(`Checking ${assets.length} Immich assets${dryRun ? ' (dry run)' : ''}`);

    const progressBar = createProgressBar('Checking');
    progressBar.start(assets.length, 0);

    let report: RepairReport;
    try {
      report = await withInterrupt((signal) =>
        runRepair(assets, index, client, {
          policy,
          dryRun,
          signal,
          onEvent: (event) => {
            jobs.append(job.id, event);
            progressBar.update(event.processed);
          },
        })
      );
    } finally {
      progressBar.stop();
    }
    jobs.complete(job.id, report);

    console.log();
    for (const event of jobs.get(job.id)?.events ?? []) {
      if (event.outcome === 'would-repair') {
        console.log(`  Would fix ${event.assetName}: ${describeFixes(event)}`);
      } else if (event.outcome === 'repair-failed') {
        console.error(`  Failed ${event.assetName}: ${event.error ?? 'Unknown error'}`);
      }
    }

    console.log();
    console.log(dryRun ? 'Dry run complete!' : 'Repair complete!');
    console.log(`  Assets: ${report.total}`);
    console.log(`  Matched: ${report.checked}`);
    console.log(`  Skipped (unmatched): ${report.skipped}`);
    console.log(`  Needing repair: ${report.needsRepair}`);
    if (!dryRun) {
      console.log(`  Repaired: ${report.repaired}`);
      console.log(`  Failed: ${report.failed}`);
    } else if (report.needsRepair > 0) {
      console.log('  Run without --dry-run to apply these changes.');
    }
    if (report.cancelled) {
      console.log('  Stopped before all assets were checked.');
    }

    if (report.failed > 0) {
      process.exitCode = 1;
    }
    return report;
  } catch (error) {
    jobs.fail(job.id, errorMessage(error));
    reportFailure(spinner, 'Repair failed', error);
    return null;
  } finally {
    if (options.report) {
      await writeFile(options.report, JSON.stringify(jobs.get(job.id), null, 2), 'utf-8');
      console.log(`  Report written to: ${options.report}`);
    }
  }
}

/**
 * Extract, download, process and (when configured) upload in one go
 */
export async function runAllPhases(input: string, options: RunCommandOptions): Promise<void> {
  const metadataPath = await runExtractPhase(input, options);
  if (!metadataPath) return;

  console.log();
  if (!(await runDownloadPhase(metadataPath, options))) return;

  console.log();
  if (!(await runProcessPhase(metadataPath, options))) return;

  console.log();
  if (!findImmichConfig(options)) {
    console.log('Immich is not configured, skipping upload.');
    return;
  }
  await runUploadPhase(metadataPath, options);
}

export async function runTestConnection(options: ImmichOptions): Promise<boolean> {
  const spinner = ora('Connecting to Immich...').start();
  try {
    const config = resolveImmichConfig(options);
    const info = await new ImmichClient(config).testConnection();
    spinner.succeed(`Connected to Immich ${info.version} at ${config.baseUrl} as ${info.user}`);
    return true;
  } catch (error) {
    reportFailure(spinner, 'Connection failed', error);
    return false;
  }
}

/**
 * Create and configure the CLI program
 */
export const REPAIR_HELP = `
Assets are matched by name. The last resort is a trailing four-digit number,
so a camera upload such as IMG_0042.jpg matches memory 42. On a library that
holds more than this export, run with --dry-run first and check the list.`;

export function createProgram(): Command {
  const program = new Command();

  program
    .name('memories-immich-sync')
    .description('Move Snapchat memories into Immich with their dates and locations')
    .version('1.0.0')
    .option('-i, --interactive', 'Run in interactive mode with guided prompts');

  addTimezoneOptions(
    program
      .command('extract')
      .description('Extract memory metadata from a Snapchat export')
      .argument('<input>', 'memories_history.json / .html, or the export folder')
      .option('-o, --output <file>', 'Metadata file to write')
  ).action(async (input: string, options: ExtractOptions) => {
    await runExtractPhase(input, options);
  });

  addDownloadOptions(
    program
      .command('download')
      .description('Download the media listed in a metadata file')
      .argument('<metadata>', 'Metadata file written by extract')
  ).action(async (metadataPath: string, options: DownloadCommandOptions) => {
    await runDownloadPhase(metadataPath, options);
  });

  addTimezoneOptions(
    program
      .command('process')
      .description('Unpack overlays and embed dates and GPS into downloaded media')
      .argument('<metadata>', 'Metadata file written by extract')
  ).action(async (metadataPath: string, options: TimezoneOptions) => {
    await runProcessPhase(metadataPath, options);
  });

  addImmichOptions(
    addTimezoneOptions(
      program
        .command('upload')
        .description('Upload processed media to Immich')
        .argument('<metadata>', 'Metadata file written by extract')
    )
  ).action(async (metadataPath: string, options: UploadCommandOptions) => {
    await runUploadPhase(metadataPath, options);
  });

  addImmichOptions(
    addTimezoneOptions(
      program
        .command('repair')
        .description('Fix dates and GPS of assets already in Immich')
        .argument('<metadata>', 'Metadata file written by extract')
        .option('--dry-run', 'Report what would change without updating Immich')
        .option('--asset <name>', 'Only check the asset with this file name')
        .option('--report <file>', 'Write the run and its per-asset events as JSON')
        .option(
          '--remote-shape <file>',
          'JSON file overriding Immich field paths, search order and update date field'
        )
        .addHelpText('after', REPAIR_HELP)
    )
  ).action(async (metadataPath: string, options: RepairCommandOptions) => {
    await runRepairPhase(metadataPath, options);
  });

  addImmichOptions(
    addDownloadOptions(
      addTimezoneOptions(
        program
          .command('run')
          .description('Extract, download, process and upload')
          .argument('<input>', 'memories_history.json / .html, or the export folder')
          .option('-o, --output <file>', 'Metadata file to write')
      )
    )
  ).action(async (input: string, options: RunCommandOptions) => {
    await runAllPhases(input, options);
  });

  addImmichOptions(
    program.command('test-connection').description('Check the Immich URL and API key')
  ).action(async (options: ImmichOptions) => {
    await runTestConnection(options);
  });

  return program;
}
