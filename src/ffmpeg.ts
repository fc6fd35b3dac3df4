/**
 * ffmpeg process helpers shared by the compositor and the metadata applier
 */

import { spawn, spawnSync } from 'node:child_process';
import { createRequire } from 'node:module';
import { isRecord } from './types.js';

/**
 * Runs ffmpeg with the given arguments; rejects on a nonzero exit
 */
export type FfmpegRunner = (args: readonly string[]) => Promise<void>;

/**
 * Get the ffmpeg path - tries bundled version first, then system ffmpeg
 */
function getFfmpegPath(): string {
  try {
    const require = createRequire(import.meta.url);
    const installer: unknown = require('@ffmpeg-installer/ffmpeg');
    if (isRecord(installer) && typeof installer.path === 'string' && installer.path) {
      return installer.path;
    }
  } catch {
    // Bundled ffmpeg not available for this platform, try system ffmpeg
  }

  const result = spawnSync('which', ['ffmpeg'], { encoding: 'utf8' });
  if (result.status === 0 && result.stdout.trim()) {
    return result.stdout.trim();
  }

  // Let it fail at runtime if not in PATH
  return 'ffmpeg';
}

let ffmpegPath: string | null = null;

function resolveFfmpegPath(): string {
  if (ffmpegPath === null) {
    ffmpegPath = getFfmpegPath();
  }
  return ffmpegPath;
}

/**
 * Run ffmpeg with the given arguments
 */
export const runFfmpeg: FfmpegRunner = (args) => {
  return new Promise((resolve, reject) => {
    const ffmpeg = spawn(resolveFfmpegPath(), [...args], {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stderr = '';

    ffmpeg.stderr.on('data', (data: Buffer) => {
      stderr += data.toString();
    });

    ffmpeg.on('error', (error) => {
      reject(new Error(`Failed to start ffmpeg: ${error.message}`));
    });

    ffmpeg.on('close', (code) => {
      if (code === 0) {
        resolve();
      } else {
        // Last few lines of stderr carry the actual error
        const errorLines = stderr.trim().split('\n').slice(-5).join('\n');
        reject(new Error(`ffmpeg exited with code ${String(code)}: ${errorLines}`));
      }
    });
  });
};

/**
 * Check if ffmpeg is available
 */
export async function isFfmpegAvailable(): Promise<boolean> {
  return new Promise((resolve) => {
    const ffmpeg = spawn(resolveFfmpegPath(), ['-version'], {
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    ffmpeg.on('error', () => {
      resolve(false);
    });

    ffmpeg.on('close', (code) => {
      resolve(code === 0);
    });
  });
}
