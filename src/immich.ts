/**
 * Immich photo-library client
 *
 * Requests go through @immich/sdk. The asset JSON has changed shape across
 * releases, so the field paths, the search order and the update date field
 * live in a RemoteShape that callers can override from a JSON file.
 */

import { readFile } from 'node:fs/promises';
import { File } from 'node:buffer';
import { basename } from 'node:path';
import {
  AssetMediaStatus,
  getMyUser,
  getServerVersion,
  init,
  isHttpError,
  searchAssets,
  updateAsset,
  uploadAsset,
  type MetadataSearchDto,
  type UpdateAssetDto,
} from '@immich/sdk';
import { ImmichApiError, isRecord } from './types.js';

export type FindStrategy = 'search-metadata' | 'search-original-path';

/**
 * Dotted paths into the asset JSON, tried in order
 */
export interface FieldPaths {
  readonly id: readonly string[];
  readonly fileName: readonly string[];
  readonly originalPath: readonly string[];
  readonly timestamp: readonly string[];
  readonly latitude: readonly string[];
  readonly longitude: readonly string[];
}

export interface RemoteShape {
  readonly find: readonly FindStrategy[];
  /** Field that carries the capture date in an update */
  readonly dateField: string;
  readonly pageSize: number;
  readonly fields: FieldPaths;
}

export const DEFAULT_REMOTE_SHAPE: RemoteShape = {
  find: ['search-metadata', 'search-original-path'],
  dateField: 'dateTimeOriginal',
  pageSize: 1000,
  fields: {
    id: ['id'],
    fileName: ['originalFileName'],
    originalPath: ['originalPath'],
    timestamp: ['fileCreatedAt', 'exifInfo.dateTimeOriginal'],
    latitude: ['exifInfo.latitude', 'latitude'],
    longitude: ['exifInfo.longitude', 'longitude'],
  },
};

const FIELD_KEYS = [
  'id',
  'fileName',
  'originalPath',
  'timestamp',
  'latitude',
  'longitude',
] as const satisfies ReadonlyArray<keyof FieldPaths>;

const FIND_STRATEGIES: readonly string[] = ['search-metadata', 'search-original-path'];

/**
 * Asset as the reconciliation engine sees it
 */
export interface RemoteAsset {
  readonly id: string;
  readonly fileName: string | null;
  readonly originalPath: string | null;
  readonly timestamp: string | null;
  readonly latitude: number | null;
  readonly longitude: number | null;
}

/**
 * Partial update sent to the library
 */
export interface AssetUpdate {
  readonly capturedAt: string;
  readonly latitude?: number;
  readonly longitude?: number;
}

export interface UploadFields {
  readonly deviceAssetId: string;
  readonly deviceId: string;
  readonly fileCreatedAt: string;
  readonly fileModifiedAt: string;
}

export type UploadOutcome = 'created' | 'duplicate';

/**
 * Capabilities the tool needs from a remote photo library
 */
export interface PhotoLibrary {
  listAssets(): Promise<RemoteAsset[]>;
  findAssetByName(name: string): Promise<RemoteAsset | null>;
  /** Resolves false when the library answers with a non-success status */
  updateAsset(id: string, update: AssetUpdate): Promise<boolean>;
  uploadAsset(filePath: string, fields: UploadFields): Promise<UploadOutcome>;
}

export interface ImmichConfig {
  /** Base URL ending in `/api` */
  readonly baseUrl: string;
  readonly apiKey: string;
}

export interface ConnectionInfo {
  readonly version: string;
  readonly user: string;
}

/**
 * Read a dotted path such as `exifInfo.latitude`
 */
export function getPath(value: unknown, path: string): unknown {
  let current = value;
  for (const key of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

function firstString(raw: unknown, paths: readonly string[]): string | null {
  for (const path of paths) {
    const value = getPath(raw, path);
    if (typeof value === 'string' && value !== '') {
      return value;
    }
  }
  return null;
}

function firstNumber(raw: unknown, paths: readonly string[]): number | null {
  for (const path of paths) {
    const value = getPath(raw, path);
    if (typeof value === 'number' && Number.isFinite(value)) {
      return value;
    }
    if (typeof value === 'string' && value.trim() !== '' && Number.isFinite(Number(value))) {
      return Number(value);
    }
  }
  return null;
}

/**
 * Normalize an asset from the API. Returns null when no id can be read.
 */
export function toRemoteAsset(
  raw: unknown,
  shape: RemoteShape = DEFAULT_REMOTE_SHAPE
): RemoteAsset | null {
  const { fields } = shape;
  const id = firstString(raw, fields.id);
  if (!id) {
    return null;
  }
  return {
    id,
    fileName: firstString(raw, fields.fileName),
    originalPath: firstString(raw, fields.originalPath),
    timestamp: firstString(raw, fields.timestamp),
    latitude: firstNumber(raw, fields.latitude),
    longitude: firstNumber(raw, fields.longitude),
  };
}

function stringList(value: unknown, name: string, allowed?: readonly string[]): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new Error(`Remote shape: "${name}" must be an array of strings`);
  }
  if (allowed) {
    const unknown = value.find((item) => !allowed.includes(item));
    if (unknown !== undefined) {
      throw new Error(`Remote shape: unknown ${name} strategy "${unknown}"`);
    }
  }
  return value;
}

function isFindStrategy(value: string): value is FindStrategy {
  return FIND_STRATEGIES.includes(value);
}

/**
 * Overlay a partial shape (parsed JSON) on a base shape
 */
export function mergeRemoteShape(base: RemoteShape, override: unknown): RemoteShape {
  if (!isRecord(override)) {
    throw new Error('Remote shape must be a JSON object');
  }

  const fields: { -readonly [K in keyof FieldPaths]: readonly string[] } = { ...base.fields };
  if (override.fields !== undefined) {
    const overrideFields = override.fields;
    if (!isRecord(overrideFields)) {
      throw new Error('Remote shape: "fields" must be an object');
    }
    for (const key of FIELD_KEYS) {
      if (key in overrideFields) {
        fields[key] = stringList(overrideFields[key], `fields.${key}`);
      }
    }
  }

  const data = override;
  const optionalString = (name: string, fallback: string): string => {
    const value = data[name];
    if (value === undefined) return fallback;
    if (typeof value !== 'string' || value === '') {
      throw new Error(`Remote shape: "${name}" must be a non-empty string`);
    }
    return value;
  };

  let pageSize = base.pageSize;
  const pageSizeOverride = override.pageSize;
  if (pageSizeOverride !== undefined) {
    if (
      typeof pageSizeOverride !== 'number' ||
      !Number.isInteger(pageSizeOverride) ||
      pageSizeOverride < 1
    ) {
      throw new Error('Remote shape: "pageSize" must be a positive integer');
    }
    pageSize = pageSizeOverride;
  }

  return {
    find:
      override.find === undefined
        ? base.find
        : stringList(override.find, 'find', FIND_STRATEGIES).filter(isFindStrategy),
    dateField: optionalString('dateField', base.dateField),
    pageSize,
    fields,
  };
}

/**
 * Load a remote shape override from a JSON file
 */
export async function loadRemoteShape(path: string): Promise<RemoteShape> {
  const content = await readFile(path, 'utf-8');
  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new Error(
      `Invalid remote shape file ${path}: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
  return mergeRemoteShape(DEFAULT_REMOTE_SHAPE, data);
}

/**
 * Run an SDK call, turning its HTTP errors into ImmichApiError
 */
async function call<T>(endpoint: string, request: () => Promise<T>): Promise<T> {
  try {
    return await request();
  } catch (error) {
    if (isHttpError(error)) {
      throw new ImmichApiError(endpoint, error.status, error.message);
    }
    throw error;
  }
}

/**
 * Immich client on top of @immich/sdk
 */
export class ImmichClient implements PhotoLibrary {
  constructor(
    config: ImmichConfig,
    private readonly shape: RemoteShape = DEFAULT_REMOTE_SHAPE
  ) {
    init({ baseUrl: config.baseUrl, apiKey: config.apiKey });
  }

  private toAssets(items: readonly unknown[]): RemoteAsset[] {
    const assets: RemoteAsset[] = [];
    for (const item of items) {
      const asset = toRemoteAsset(item, this.shape);
      if (asset) {
        assets.push(asset);
      }
    }
    return assets;
  }

  private async search(query: MetadataSearchDto, allPages: boolean): Promise<RemoteAsset[]> {
    const assets: RemoteAsset[] = [];
    let page: number | null = 1;

    while (page !== null) {
      const metadataSearchDto: MetadataSearchDto = {
        ...query,
        page,
        size: this.shape.pageSize,
        withExif: true,
      };
      const result = await call('POST /search/metadata', () =>
        searchAssets({ metadataSearchDto })
      );
      assets.push(...this.toAssets(result.assets.items));

      const nextPage = allPages && result.assets.nextPage ? Number(result.assets.nextPage) : null;
      page = nextPage !== null && Number.isInteger(nextPage) ? nextPage : null;
    }

    return assets;
  }

  /**
   * Fetch every asset through paged metadata search
   */
  async listAssets(): Promise<RemoteAsset[]> {
    return this.search({}, true);
  }

  async findAssetByName(name: string): Promise<RemoteAsset | null> {
    for (const strategy of this.shape.find) {
      const query: MetadataSearchDto =
        strategy === 'search-metadata' ? { originalFileName: name } : { originalPath: name };
      try {
        const [asset] = await this.search(query, false);
        if (asset) {
          return asset;
        }
      } catch (error) {
        if (!(error instanceof ImmichApiError)) {
          throw error;
        }
        // Query not supported by this server, try the next strategy
      }
    }
    return null;
  }

  async updateAsset(id: string, update: AssetUpdate): Promise<boolean> {
    const updateAssetDto: UpdateAssetDto = {};
    if (update.latitude !== undefined && update.longitude !== undefined) {
      updateAssetDto.latitude = update.latitude;
      updateAssetDto.longitude = update.longitude;
    }
    Object.assign(updateAssetDto, { [this.shape.dateField]: update.capturedAt });

    try {
      await call(`PUT /assets/${id}`, () => updateAsset({ id, updateAssetDto }));
      return true;
    } catch (error) {
      if (error instanceof ImmichApiError) {
        return false;
      }
      throw error;
    }
  }

  async uploadAsset(filePath: string, fields: UploadFields): Promise<UploadOutcome> {
    const data = await readFile(filePath);
    const filename = basename(filePath);

    try {
      const { status } = await call('POST /assets', () =>
        uploadAsset({
          assetMediaCreateDto: {
            assetData: new File([data], filename),
            deviceAssetId: fields.deviceAssetId,
            deviceId: fields.deviceId,
            fileCreatedAt: fields.fileCreatedAt,
            fileModifiedAt: fields.fileModifiedAt,
            filename,
          },
        })
      );
      return status === AssetMediaStatus.Duplicate ? 'duplicate' : 'created';
    } catch (error) {
      // Older servers answer a duplicate with 409
      if (error instanceof ImmichApiError && error.statusCode === 409) {
        return 'duplicate';
      }
      throw error;
    }
  }

  /**
   * Check the server is reachable and the API key is accepted
   */
  async testConnection(): Promise<ConnectionInfo> {
    const version = await call('GET /server/version', () => getServerVersion());
    const user = await call('GET /users/me', () => getMyUser());

    return {
      version: `${version.major}.${version.minor}.${version.patch}`,
      user: user.email || user.name || 'unknown',
    };
  }
}
