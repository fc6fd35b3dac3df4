/**
 * Compositor module for combining base media with overlay images
 *
 * Handles:
 * - Image compositing: base JPG or PNG + overlay PNG -> combined image, same format
 * - Video compositing: base MP4 + overlay PNG -> combined MP4 (using ffmpeg)
 */

import { Jimp, JimpMime } from 'jimp';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { BaseExtension } from './archive.js';
import { type FfmpegRunner, runFfmpeg } from './ffmpeg.js';
import { CompositeError } from './types.js';

export type StillExtension = Exclude<BaseExtension, 'mp4'>;

/**
 * Burn a memory's caption overlay into its still image with Jimp
 *
 * The result keeps the base image's format.
 */
export async function compositeImage(
  baseImage: Buffer,
  overlay: Buffer,
  extension: StillExtension = 'jpg'
): Promise<Buffer> {
  try {
    const [base, caption] = await Promise.all([Jimp.read(baseImage), Jimp.read(overlay)]);

    if (!base.width || !base.height) {
      throw new CompositeError('image', 'Could not determine base image dimensions');
    }

    // Overlays are sometimes exported at a different resolution
    if (caption.width !== base.width || caption.height !== base.height) {
      caption.resize({ w: base.width, h: base.height });
    }

    base.composite(caption, 0, 0);

    return extension === 'png'
      ? await base.getBuffer(JimpMime.png)
      : await base.getBuffer(JimpMime.jpeg, { quality: 95 });
  } catch (error) {
    if (error instanceof CompositeError) {
      throw error;
    }
    throw new CompositeError(
      'image',
      error instanceof Error ? error.message : 'Unknown error during compositing'
    );
  }
}

/**
 * ffmpeg arguments that burn an overlay into a video
 */
export function buildVideoOverlayArgs(
  videoPath: string,
  overlayPath: string,
  outputPath: string
): string[] {
  return [
    '-i',
    videoPath,
    '-i',
    overlayPath,
    '-filter_complex',
    // Scale overlay to the video's dimensions, then overlay it
    '[1:v][0:v]scale2ref[scaled][base];[base][scaled]overlay=0:0:format=auto',
    '-c:v',
    'libx264',
    '-preset',
    'fast',
    '-crf',
    '23',
    '-c:a',
    'copy',
    '-y',
    outputPath,
  ];
}

/**
 * Composite a video file with an overlay PNG using ffmpeg, writing to outputPath
 */
export async function compositeVideo(
  videoPath: string,
  overlay: Buffer,
  outputPath: string,
  run: FfmpegRunner = runFfmpeg
): Promise<void> {
  const tempDir = await mkdtemp(join(tmpdir(), 'memories-composite-'));
  const overlayPath = join(tempDir, 'overlay.png');

  try {
    await writeFile(overlayPath, overlay);
    await run(buildVideoOverlayArgs(videoPath, overlayPath, outputPath));
  } catch (error) {
    throw new CompositeError(
      'video',
      error instanceof Error ? error.message : 'Unknown error during video compositing'
    );
  } finally {
    await rm(tempDir, { recursive: true, force: true });
  }
}
