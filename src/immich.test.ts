/**
 * Tests for the Immich client
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  DEFAULT_REMOTE_SHAPE,
  ImmichClient,
  getPath,
  loadRemoteShape,
  mergeRemoteShape,
  toRemoteAsset,
} from './immich.js';
import { ImmichApiError } from './types.js';

const BASE_URL = 'http://immich.local/api';
const CONFIG = { baseUrl: BASE_URL, apiKey: 'test-secret' };

type Route = (init: RequestInit | undefined) => Response;

function json(data: unknown, status = 200): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

/**
 * Stub the fetch the SDK calls, routing on method and path
 */
function stubRoutes(routes: Record<string, Route>) {
  const fetchMock = vi.fn(async (url: string | URL, init?: RequestInit) => {
    const route = routes[`${init?.method ?? 'GET'} ${new URL(url).pathname}`];
    return route ? route(init) : new Response('Not Found', { status: 404, statusText: 'Not Found' });
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function jsonBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
}

function searchResult(items: unknown[], nextPage: string | null = null): Response {
  return json({ assets: { items, nextPage, total: items.length, count: items.length } });
}

const RAW_ASSET = {
  id: 'a1',
  originalFileName: '2024-07-01_23-13-15_image_0001_gps.jpg',
  originalPath: '/upload/library/2024-07-01_23-13-15_image_0001_gps.jpg',
  fileCreatedAt: '2024-07-01T23:13:15.000Z',
  exifInfo: { latitude: 37.5, longitude: -122.25 },
};

describe('getPath', () => {
  it('should read dotted paths', () => {
    expect(getPath(RAW_ASSET, 'exifInfo.latitude')).toBe(37.5);
    expect(getPath(RAW_ASSET, 'exifInfo.city')).toBeUndefined();
    expect(getPath(RAW_ASSET, 'id.length')).toBeUndefined();
  });
});

describe('toRemoteAsset', () => {
  it('should normalize an asset', () => {
    expect(toRemoteAsset(RAW_ASSET)).toEqual({
      id: 'a1',
      fileName: '2024-07-01_23-13-15_image_0001_gps.jpg',
      originalPath: '/upload/library/2024-07-01_23-13-15_image_0001_gps.jpg',
      timestamp: '2024-07-01T23:13:15.000Z',
      latitude: 37.5,
      longitude: -122.25,
    });
  });

  it('should fall back through the configured paths', () => {
    const asset = toRemoteAsset({
      id: 'a2',
      exifInfo: { dateTimeOriginal: '2024-07-01T23:13:15.000Z', latitude: null },
      latitude: '12.5',
      longitude: 3,
    });

    expect(asset).toEqual({
      id: 'a2',
      fileName: null,
      originalPath: null,
      timestamp: '2024-07-01T23:13:15.000Z',
      latitude: 12.5,
      longitude: 3,
    });
  });

  it('should return null without an id', () => {
    expect(toRemoteAsset({ originalFileName: 'x.jpg' })).toBeNull();
  });
});

describe('mergeRemoteShape', () => {
  it('should overlay the given keys only', () => {
    const shape = mergeRemoteShape(DEFAULT_REMOTE_SHAPE, {
      find: ['search-original-path'],
      pageSize: 250,
      fields: { fileName: ['name', 'originalFileName'] },
    });

    expect(shape.find).toEqual(['search-original-path']);
    expect(shape.dateField).toBe('dateTimeOriginal');
    expect(shape.pageSize).toBe(250);
    expect(shape.fields.fileName).toEqual(['name', 'originalFileName']);
    expect(shape.fields.latitude).toEqual(['exifInfo.latitude', 'latitude']);
  });

  it('should reject invalid overrides', () => {
    expect(() => mergeRemoteShape(DEFAULT_REMOTE_SHAPE, [])).toThrow(
      'Remote shape must be a JSON object'
    );
    expect(() => mergeRemoteShape(DEFAULT_REMOTE_SHAPE, { find: ['bogus'] })).toThrow(
      'Remote shape: unknown find strategy "bogus"'
    );
    expect(() => mergeRemoteShape(DEFAULT_REMOTE_SHAPE, { pageSize: 0 })).toThrow(
      'Remote shape: "pageSize" must be a positive integer'
    );
    expect(() => mergeRemoteShape(DEFAULT_REMOTE_SHAPE, { dateField: '' })).toThrow(
      'Remote shape: "dateField" must be a non-empty string'
    );
    expect(() => mergeRemoteShape(DEFAULT_REMOTE_SHAPE, { fields: { id: 'id' } })).toThrow(
      'Remote shape: "fields.id" must be an array of strings'
    );
  });
});

describe('loadRemoteShape', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'immich-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read an override file', async () => {
    const path = join(dir, 'shape.json');
    await writeFile(path, JSON.stringify({ dateField: 'fileCreatedAt' }));

    const shape = await loadRemoteShape(path);

    expect(shape.dateField).toBe('fileCreatedAt');
    expect(shape.find).toEqual(['search-metadata', 'search-original-path']);
  });
});

describe('ImmichClient', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'immich-test-'));
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await rm(dir, { recursive: true, force: true });
  });

  it('should page through metadata search', async () => {
    const fetchMock = stubRoutes({
      'POST /api/search/metadata': (init) =>
        getPath(jsonBody(init), 'page') === 1
          ? searchResult([RAW_ASSET], '2')
          : searchResult([{ ...RAW_ASSET, id: 'a2' }, { originalFileName: 'no-id.jpg' }]),
    });

    const assets = await new ImmichClient(CONFIG).listAssets();

    expect(assets.map((asset) => asset.id)).toEqual(['a1', 'a2']);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    const [url, init] = fetchMock.mock.calls[0];
    expect(String(url)).toBe(`${BASE_URL}/search/metadata`);
    expect(jsonBody(init)).toEqual({ page: 1, size: 1000, withExif: true });
    expect(new Headers(init?.headers).get('x-api-key')).toBe('test-secret');
  });

  it('should turn an HTTP error into ImmichApiError', async () => {
    stubRoutes({});

    const error = await new ImmichClient(CONFIG).listAssets().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ImmichApiError);
    if (error instanceof ImmichApiError) {
      expect(error.statusCode).toBe(404);
      expect(error.endpoint).toBe('POST /search/metadata');
    }
  });

  it('should find an asset by its original path', async () => {
    const fetchMock = stubRoutes({
      'POST /api/search/metadata': (init) =>
        getPath(jsonBody(init), 'originalPath') === undefined
          ? searchResult([])
          : searchResult([RAW_ASSET]),
    });

    const asset = await new ImmichClient(CONFIG).findAssetByName(RAW_ASSET.originalPath);

    expect(asset?.id).toBe('a1');
    expect(jsonBody(fetchMock.mock.calls[0][1])).toEqual({
      originalFileName: RAW_ASSET.originalPath,
      page: 1,
      size: 1000,
      withExif: true,
    });
  });

  it('should return null when no strategy finds the asset', async () => {
    stubRoutes({});

    expect(await new ImmichClient(CONFIG).findAssetByName('x.jpg')).toBeNull();
  });

  it('should send the date field and coordinates in an update', async () => {
    const fetchMock = stubRoutes({
      'PUT /api/assets/a1': () => json({ id: 'a1' }),
    });

    const updated = await new ImmichClient(CONFIG).updateAsset('a1', {
      capturedAt: '2024-07-01T23:13:15.000Z',
      latitude: 37.5,
      longitude: -122.25,
    });

    expect(updated).toBe(true);
    expect(jsonBody(fetchMock.mock.calls[0][1])).toEqual({
      dateTimeOriginal: '2024-07-01T23:13:15.000Z',
      latitude: 37.5,
      longitude: -122.25,
    });
  });

  it('should use the configured date field', async () => {
    const shape = mergeRemoteShape(DEFAULT_REMOTE_SHAPE, { dateField: 'fileCreatedAt' });
    const fetchMock = stubRoutes({
      'PUT /api/assets/a1': () => json({ id: 'a1' }),
    });

    const updated = await new ImmichClient(CONFIG, shape).updateAsset('a1', {
      capturedAt: '2024-07-01T23:13:15.000-08:00',
    });

    expect(updated).toBe(true);
    expect(jsonBody(fetchMock.mock.calls[0][1])).toEqual({
      fileCreatedAt: '2024-07-01T23:13:15.000-08:00',
    });
  });

  it('should report a rejected update', async () => {
    stubRoutes({
      'PUT /api/assets/a1': () => new Response('boom', { status: 500 }),
    });

    const updated = await new ImmichClient(CONFIG).updateAsset('a1', {
      capturedAt: '2024-07-01T23:13:15.000Z',
    });

    expect(updated).toBe(false);
  });

  it('should let connection errors through an update', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    await expect(
      new ImmichClient(CONFIG).updateAsset('a1', { capturedAt: '2024-07-01T23:13:15.000Z' })
    ).rejects.toThrow('fetch failed');
  });

  describe('uploadAsset', () => {
    const fields = {
      deviceAssetId: 'photo',
      deviceId: 'memories-immich-sync',
      fileCreatedAt: '2024-07-01T23:13:15.000Z',
      fileModifiedAt: '2024-07-01T23:13:15.000Z',
    };

    async function upload(response: () => Response) {
      const filePath = join(dir, 'photo.jpg');
      await writeFile(filePath, 'jpeg-bytes');
      const fetchMock = stubRoutes({ 'POST /api/assets': response });
      const outcome = await new ImmichClient(CONFIG).uploadAsset(filePath, fields);
      return { outcome, fetchMock };
    }

    it('should send the file and its dates', async () => {
      const { outcome, fetchMock } = await upload(() => json({ id: 'a1', status: 'created' }, 201));

      expect(outcome).toBe('created');
      const body = fetchMock.mock.calls[0][1]?.body;
      expect(body).toBeInstanceOf(FormData);
      if (body instanceof FormData) {
        expect(body.get('deviceAssetId')).toBe('photo');
        expect(body.get('fileCreatedAt')).toBe('2024-07-01T23:13:15.000Z');
        expect(body.get('filename')).toBe('photo.jpg');
        const file = body.get('assetData');
        expect(file).toBeInstanceOf(Blob);
        if (file instanceof Blob) {
          expect(await file.text()).toBe('jpeg-bytes');
        }
      }
    });

    it('should recognise duplicates', async () => {
      expect((await upload(() => new Response(null, { status: 409 }))).outcome).toBe('duplicate');
      expect((await upload(() => json({ id: 'a1', status: 'duplicate' }))).outcome).toBe(
        'duplicate'
      );
    });

    it('should throw on other statuses', async () => {
      await expect(
        upload(() => new Response('bad', { status: 400, statusText: 'Bad Request' }))
      ).rejects.toThrow(ImmichApiError);
    });
  });

  it('should describe the connection', async () => {
    stubRoutes({
      'GET /api/server/version': () => json({ major: 1, minor: 132, patch: 3 }),
      'GET /api/users/me': () => json({ email: 'user@example.com', name: 'User' }),
    });

    expect(await new ImmichClient(CONFIG).testConnection()).toEqual({
      version: '1.132.3',
      user: 'user@example.com',
    });
  });
});
