/**
 * Metadata module for embedding capture date and GPS into media files
 */

import { rename, rm } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { exiftool } from 'exiftool-vendored';
import { type FfmpegRunner, runFfmpeg } from './ffmpeg.js';
import type { TimestampPolicy } from './timestamp.js';
import { type MemoryLocation, MetadataError, type MemoryRecord } from './types.js';

/**
 * EXIF rational: [numerator, denominator]
 */
export type Rational = readonly [number, number];

/**
 * Convert decimal degrees to degrees/minutes/seconds rationals.
 * Seconds keep two decimals (denominator 100); the sign is dropped, the
 * hemisphere goes in the Ref tag.
 */
export function toDmsRational(value: number): [Rational, Rational, Rational] {
  const abs = Math.abs(value);
  const degrees = Math.floor(abs);
  const minutesFloat = (abs - degrees) * 60;
  const minutes = Math.floor(minutesFloat);
  const seconds = Math.floor((minutesFloat - minutes) * 60 * 100);
  return [
    [degrees, 1],
    [minutes, 1],
    [seconds, 100],
  ];
}

/**
 * DMS as exiftool accepts it: "41 42 53.8"
 */
export function formatDms(value: number): string {
  return toDmsRational(value)
    .map(([numerator, denominator]) => String(numerator / denominator))
    .join(' ');
}

export function latitudeRef(latitude: number): 'N' | 'S' {
  return latitude >= 0 ? 'N' : 'S';
}

export function longitudeRef(longitude: number): 'E' | 'W' {
  return longitude >= 0 ? 'E' : 'W';
}

/**
 * Build EXIF tags for an image. GPS is only written for a valid location so
 * the (0, 0) sentinel never ends up in a file.
 */
export function buildImageTags(
  record: MemoryRecord,
  policy: TimestampPolicy
): Record<string, unknown> {
  const tags: Record<string, unknown> = {};

  const exifDate = policy.formatExif(record.capturedAt);
  tags.DateTimeOriginal = exifDate;
  tags.CreateDate = exifDate;
  tags.ModifyDate = exifDate;
  tags.OffsetTimeOriginal = policy.offset;

  if (record.location.valid) {
    const { latitude, longitude } = record.location;
    tags.GPSLatitude = formatDms(latitude);
    tags.GPSLatitudeRef = latitudeRef(latitude);
    tags.GPSLongitude = formatDms(longitude);
    tags.GPSLongitudeRef = longitudeRef(longitude);
  }

  return tags;
}

/**
 * ISO 6709 location string used by the QuickTime/MP4 muxer: "+37.500000-122.250000/"
 */
export function formatIso6709(location: MemoryLocation): string {
  const part = (value: number, width: number): string => {
    const sign = value < 0 ? '-' : '+';
    return `${sign}${Math.abs(value).toFixed(6).padStart(width + 7, '0')}`;
  };
  return `${part(location.latitude, 2)}${part(location.longitude, 3)}/`;
}

/**
 * ffmpeg `-metadata` arguments for a video
 */
export function buildVideoMetadataArgs(record: MemoryRecord, policy: TimestampPolicy): string[] {
  const creationTime = policy.toInstant(record.capturedAt).toISOString();
  const args = ['-metadata', `creation_time=${creationTime}`];

  if (record.location.valid) {
    const location = formatIso6709(record.location);
    args.push('-metadata', `location=${location}`, '-metadata', `location-eng=${location}`);
  }

  return args;
}

/**
 * False when exiftool cannot read the file's existing metadata block
 */
async function hasReadableMetadata(filePath: string): Promise<boolean> {
  try {
    const tags = await exiftool.read(filePath);
    return (tags.errors ?? []).length === 0;
  } catch {
    return false;
  }
}

/**
 * Write capture date and GPS into an image's EXIF block
 */
export async function applyToImage(
  filePath: string,
  record: MemoryRecord,
  policy: TimestampPolicy
): Promise<void> {
  const tags = buildImageTags(record, policy);

  try {
    // A corrupt block is dropped and rebuilt from the tags above
    if (!(await hasReadableMetadata(filePath))) {
      await exiftool.deleteAllTags(filePath);
    }
    await exiftool.write(filePath, tags, {
      writeArgs: ['-overwrite_original'],
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new MetadataError(filePath, message);
  }
}

/**
 * Remux a video (stream copy) with creation time and location tags.
 * Works on a temporary file; the original is only replaced on success.
 */
export async function applyToVideo(
  filePath: string,
  record: MemoryRecord,
  policy: TimestampPolicy,
  run: FfmpegRunner = runFfmpeg
): Promise<void> {
  const tempPath = join(dirname(filePath), `temp_${basename(filePath)}`);
  const args = [
    '-i',
    filePath,
    '-map',
    '0',
    '-c',
    'copy',
    ...buildVideoMetadataArgs(record, policy),
    '-y',
    tempPath,
  ];

  try {
    await run(args);
    await rename(tempPath, filePath);
  } catch (error) {
    await rm(tempPath, { force: true });
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new MetadataError(filePath, message);
  }
}

/**
 * Format GPS coordinates for display
 */
export function formatGpsForDisplay(location: MemoryLocation): string {
  if (!location.valid) {
    return 'No GPS';
  }
  const { latitude, longitude } = location;
  return `${Math.abs(latitude).toFixed(6)}°${latitudeRef(latitude)}, ${Math.abs(longitude).toFixed(6)}°${longitudeRef(longitude)}`;
}

/**
 * Close exiftool process (call on application exit)
 */
export async function closeExiftool(): Promise<void> {
  await exiftool.end();
}
