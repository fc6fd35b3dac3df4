/**
 * Tests for the processing phase
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import AdmZip from 'adm-zip';
import { mkdir, mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { deriveIdentity } from './identity.js';
import { listMediaFiles, processAll } from './processor.js';
import { createBundle } from './store.js';
import { parseAsUtc } from './timestamp.js';
import type { MediaType, MemoryRecord, ParsedMemory } from './types.js';

function memory(capturedAt: string, mediaType: MediaType): ParsedMemory {
  return {
    capturedAt,
    dateKey: capturedAt.replace('T', '_').replace(/:/g, '-'),
    mediaType,
    location: { latitude: 0, longitude: 0, valid: false },
    sourceUrl: 'https://media.example/m',
    isDirectRequest: true,
  };
}

describe('processAll', () => {
  let dir: string;
  let downloadDir: string;
  let processedDir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'processor-test-'));
    downloadDir = join(dir, 'downloads');
    processedDir = join(dir, 'processed');
    await mkdir(downloadDir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should copy, unpack and tag matched files', async () => {
    const records = deriveIdentity([
      memory('2024-07-01T23:13:15', 'image'),
      memory('2024-07-02T08:00:00', 'video'),
      memory('2024-07-03T09:00:00', 'image'),
      memory('2024-07-04T10:00:00', 'image'),
    ]);
    const bundle = createBundle(records, { kind: 'json', path: 'x.json' }, parseAsUtc);

    const zip = new AdmZip();
    zip.addFile('abc-main.mp4', Buffer.from('video-bytes'));
    await writeFile(join(downloadDir, '2024-07-01_23-13-15_image_0001.jpg'), 'jpeg');
    await writeFile(join(downloadDir, '2024-07-02_08-00-00_video_0002.bin'), zip.toBuffer());
    await writeFile(join(downloadDir, '2024-07-03_09-00-00_image_0003.jpg'), 'jpeg');
    await writeFile(join(downloadDir, '2024-07-04_10-00-00_image_0004.bin'), 'not a zip');
    await writeFile(join(downloadDir, 'holiday.jpg'), 'jpeg');
    await writeFile(join(downloadDir, 'notes.txt'), 'text');

    const image = vi.fn(async (_filePath: string, record: MemoryRecord) => {
      if (record.ordinal === 3) {
        throw new Error('exiftool crashed');
      }
    });
    const video = vi.fn(async () => {});
    const unmatched: string[] = [];
    const failures: string[] = [];

    const stats = await processAll(bundle, downloadDir, processedDir, {
      policy: parseAsUtc,
      appliers: { image, video },
      onUnmatched: (fileName) => unmatched.push(fileName),
      onFailure: (fileName, error) => failures.push(`${fileName}: ${error.message}`),
    });

    expect(stats).toEqual({ total: 5, processed: 3, skipped: 1, failed: 1 });
    expect(unmatched).toEqual(['holiday.jpg']);
    expect(failures).toEqual(['2024-07-03_09-00-00_image_0003.jpg: exiftool crashed']);

    expect(image).toHaveBeenCalledWith(
      join(processedDir, '2024-07-01_23-13-15_image_0001.jpg'),
      records[0],
      parseAsUtc
    );
    expect(video).toHaveBeenCalledWith(
      join(processedDir, '2024-07-02_08-00-00_video_0002.mp4'),
      records[1],
      parseAsUtc
    );
    expect(
      await readFile(join(processedDir, '2024-07-02_08-00-00_video_0002.mp4'), 'utf-8')
    ).toBe('video-bytes');
    expect(
      await readFile(join(processedDir, '2024-07-04_10-00-00_image_0004.jpg'), 'utf-8')
    ).toBe('not a zip');
    expect((await readdir(processedDir)).sort()).toEqual([
      '2024-07-01_23-13-15_image_0001.jpg',
      '2024-07-02_08-00-00_video_0002.mp4',
      '2024-07-03_09-00-00_image_0003.jpg',
      '2024-07-04_10-00-00_image_0004.jpg',
    ]);
  });
});

describe('listMediaFiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'processor-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should list matching files sorted by name', async () => {
    await writeFile(join(dir, 'b.MP4'), '');
    await writeFile(join(dir, 'a.jpg'), '');
    await writeFile(join(dir, 'c.txt'), '');
    await mkdir(join(dir, 'd.jpg'));

    expect(await listMediaFiles(dir, ['.jpg', '.mp4'])).toEqual(['a.jpg', 'b.MP4']);
  });
});
