/**
 * Remote reconciliation: compares what the photo library stores for each
 * asset against the export and repairs the differences
 */

import type { AssetUpdate, PhotoLibrary, RemoteAsset } from './immich.js';
import type { LookupTierName, MemoryIndex } from './lookup.js';
import { parseRemoteTimestamp, type TimestampPolicy } from './timestamp.js';
import type { MemoryRecord } from './types.js';

/**
 * Differences below these bounds count as equal
 */
export const DATE_TOLERANCE_MS = 60_000;
export const GPS_TOLERANCE_DEG = 0.0001;

export interface ReconcileResult {
  readonly record: MemoryRecord | null;
  readonly tier: LookupTierName | null;
  /** null when the asset is unmatched */
  readonly needsFix: boolean | null;
  readonly dateCorrect: boolean;
  readonly gpsCorrect: boolean;
}

/**
 * Both sides must carry a timestamp and differ by less than a minute
 */
export function checkDate(
  record: MemoryRecord,
  remoteTimestamp: string | null,
  policy: TimestampPolicy
): boolean {
  if (!remoteTimestamp) {
    return false;
  }
  const remote = parseRemoteTimestamp(remoteTimestamp);
  if (!remote) {
    return false;
  }
  const expected = policy.toInstant(record.capturedAt);
  return Math.abs(remote.getTime() - expected.getTime()) < DATE_TOLERANCE_MS;
}

/**
 * An invalid export location is correct only when the asset has no
 * coordinates either
 */
export function checkGps(record: MemoryRecord, asset: RemoteAsset): boolean {
  if (!record.location.valid) {
    return asset.latitude === null && asset.longitude === null;
  }
  if (asset.latitude === null || asset.longitude === null) {
    return false;
  }
  return (
    Math.abs(asset.latitude - record.location.latitude) < GPS_TOLERANCE_DEG &&
    Math.abs(asset.longitude - record.location.longitude) < GPS_TOLERANCE_DEG
  );
}

/**
 * Match an asset by file name, then by original path, and check it
 */
export function reconcile(
  asset: RemoteAsset,
  index: MemoryIndex,
  policy: TimestampPolicy
): ReconcileResult {
  const match = index.resolveAny([asset.fileName, asset.originalPath]);
  if (!match) {
    return { record: null, tier: null, needsFix: null, dateCorrect: false, gpsCorrect: false };
  }

  const dateCorrect = checkDate(match.record, asset.timestamp, policy);
  const gpsCorrect = checkGps(match.record, asset);

  return {
    record: match.record,
    tier: match.tier,
    needsFix: !(dateCorrect && gpsCorrect),
    dateCorrect,
    gpsCorrect,
  };
}

/**
 * Expected values for an asset. Coordinates are only sent for a valid location.
 */
export function buildUpdatePayload(record: MemoryRecord, policy: TimestampPolicy): AssetUpdate {
  const capturedAt = policy.formatForRemote(record.capturedAt);
  if (!record.location.valid) {
    return { capturedAt };
  }
  return {
    capturedAt,
    latitude: record.location.latitude,
    longitude: record.location.longitude,
  };
}

export type RepairOutcome = 'unmatched' | 'correct' | 'would-repair' | 'repaired' | 'repair-failed';

/**
 * One event per asset, in processing order
 */
export interface RepairEvent {
  readonly assetId: string;
  readonly assetName: string;
  readonly outcome: RepairOutcome;
  /** Percent of assets processed, 0-100, never decreasing */
  readonly progress: number;
  readonly processed: number;
  readonly total: number;
  readonly record?: MemoryRecord;
  readonly tier?: LookupTierName;
  readonly dateCorrect?: boolean;
  readonly gpsCorrect?: boolean;
  readonly update?: AssetUpdate;
  readonly error?: string;
}

export interface RepairReport {
  total: number;
  checked: number;
  skipped: number;
  needsRepair: number;
  repaired: number;
  failed: number;
  cancelled: boolean;
  dryRun: boolean;
}

export interface RepairOptions {
  readonly policy: TimestampPolicy;
  readonly dryRun?: boolean;
  readonly signal?: AbortSignal;
}

function describeAsset(asset: RemoteAsset): string {
  return asset.fileName ?? asset.originalPath ?? asset.id;
}

/**
 * Reconcile and repair a list of assets, yielding an event per asset and
 * returning the totals. A dry run never calls the library's update.
 */
export async function* repairAssets(
  assets: readonly RemoteAsset[],
  index: MemoryIndex,
  library: Pick<PhotoLibrary, 'updateAsset'>,
  options: RepairOptions
): AsyncGenerator<RepairEvent, RepairReport, undefined> {
  const { policy, dryRun = false, signal } = options;
  const total = assets.length;
  const report: RepairReport = {
    total,
    checked: 0,
    skipped: 0,
    needsRepair: 0,
    repaired: 0,
    failed: 0,
    cancelled: false,
    dryRun,
  };

  for (const [i, asset] of assets.entries()) {
    if (signal?.aborted) {
      report.cancelled = true;
      break;
    }

    const base = {
      assetId: asset.id,
      assetName: describeAsset(asset),
      processed: i + 1,
      total,
      progress: total === 0 ? 100 : Math.floor(((i + 1) * 100) / total),
    };

    let result: ReconcileResult;
    let update: AssetUpdate | null;
    try {
      result = reconcile(asset, index, policy);
      update = result.record ? buildUpdatePayload(result.record, policy) : null;
    } catch (checkError) {
      report.failed++;
      yield {
        ...base,
        outcome: 'repair-failed',
        error: checkError instanceof Error ? checkError.message : 'Unknown error',
      };
      continue;
    }

    if (!result.record || !result.tier || !update) {
      report.skipped++;
      yield { ...base, outcome: 'unmatched' };
      continue;
    }

    report.checked++;
    const matched = {
      ...base,
      record: result.record,
      tier: result.tier,
      dateCorrect: result.dateCorrect,
      gpsCorrect: result.gpsCorrect,
    };

    if (!result.needsFix) {
      yield { ...matched, outcome: 'correct' };
      continue;
    }

    report.needsRepair++;

    if (dryRun) {
      yield { ...matched, update, outcome: 'would-repair' };
      continue;
    }

    let error: string | undefined;
    try {
      if (await library.updateAsset(asset.id, update)) {
        report.repaired++;
        yield { ...matched, update, outcome: 'repaired' };
        continue;
      }
      error = 'Update rejected by server';
    } catch (updateError) {
      error = updateError instanceof Error ? updateError.message : 'Unknown error';
    }

    report.failed++;
    yield { ...matched, update, outcome: 'repair-failed', error };
  }

  return report;
}

/**
 * Drain {@link repairAssets}, passing each event to an optional observer
 */
export async function runRepair(
  assets: readonly RemoteAsset[],
  index: MemoryIndex,
  library: Pick<PhotoLibrary, 'updateAsset'>,
  options: RepairOptions & { onEvent?: (event: RepairEvent) => void }
): Promise<RepairReport> {
  const { onEvent, ...repairOptions } = options;
  const events = repairAssets(assets, index, library, repairOptions);

  for (;;) {
    const step = await events.next();
    if (step.done) {
      return step.value;
    }
    onEvent?.(step.value);
  }
}
