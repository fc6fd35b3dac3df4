/**
 * Tests for the compositor module
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Jimp, JimpMime } from 'jimp';
import { access, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { buildVideoOverlayArgs, compositeImage, compositeVideo } from './compositor.js';
import { CompositeError } from './types.js';

describe('compositeImage', () => {
  it('should return a JPEG at the base size', async () => {
    const base = await new Jimp({ width: 8, height: 6, color: 0x3366ccff }).getBuffer(JimpMime.png);
    const overlay = await new Jimp({ width: 4, height: 3, color: 0xff000080 }).getBuffer(
      JimpMime.png
    );

    const result = await compositeImage(base, overlay);

    expect([result[0], result[1]]).toEqual([0xff, 0xd8]);
    const image = await Jimp.read(result);
    expect(image.width).toBe(8);
    expect(image.height).toBe(6);
  });

  it('should keep a PNG base as PNG and burn the overlay in', async () => {
    const base = await new Jimp({ width: 8, height: 6, color: 0x3366ccff }).getBuffer(JimpMime.png);
    const overlay = await new Jimp({ width: 8, height: 6, color: 0xff0000ff }).getBuffer(
      JimpMime.png
    );

    const result = await compositeImage(base, overlay, 'png');

    expect([result[0], result[1], result[2], result[3]]).toEqual([0x89, 0x50, 0x4e, 0x47]);
    const image = await Jimp.read(result);
    expect(image.width).toBe(8);
    expect(image.getPixelColor(0, 0)).toBe(0xff0000ff);
  });

  it('should wrap unreadable input', async () => {
    await expect(compositeImage(Buffer.from('nope'), Buffer.from('nope'))).rejects.toThrow(
      CompositeError
    );
  });
});

describe('buildVideoOverlayArgs', () => {
  it('should scale the overlay to the video', () => {
    const args = buildVideoOverlayArgs('in.mp4', 'overlay.png', 'out.mp4');

    expect(args.slice(0, 4)).toEqual(['-i', 'in.mp4', '-i', 'overlay.png']);
    expect(args[args.indexOf('-filter_complex') + 1]).toBe(
      '[1:v][0:v]scale2ref[scaled][base];[base][scaled]overlay=0:0:format=auto'
    );
    expect(args.slice(-2)).toEqual(['-y', 'out.mp4']);
  });
});

describe('compositeVideo', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'compositor-test-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should hand ffmpeg the overlay and remove it afterwards', async () => {
    let overlayPath = '';
    let overlayContent = '';
    const run = async (args: readonly string[]): Promise<void> => {
      overlayPath = args[3];
      overlayContent = await readFile(overlayPath, 'utf-8');
      await writeFile(args[args.length - 1], 'composited');
    };
    const output = join(dir, 'out.mp4');

    await compositeVideo(join(dir, 'in.mp4'), Buffer.from('overlay-bytes'), output, run);

    expect(overlayContent).toBe('overlay-bytes');
    expect(await readFile(output, 'utf-8')).toBe('composited');
    await expect(access(overlayPath)).rejects.toThrow();
  });

  it('should wrap ffmpeg failures', async () => {
    const run = async (): Promise<void> => {
      throw new Error('ffmpeg exited with code 1: Invalid data');
    };

    await expect(
      compositeVideo(join(dir, 'in.mp4'), Buffer.from('x'), join(dir, 'out.mp4'), run)
    ).rejects.toThrow('Failed to composite video: ffmpeg exited with code 1: Invalid data');
  });
});
