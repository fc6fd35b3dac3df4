/**
 * Configuration resolved from CLI options and the environment
 */

import type { ImmichConfig } from './immich.js';
import { parseAsLocal, parseAsUtc, type TimestampPolicy } from './timestamp.js';
import type { MetadataBundle } from './types.js';

export const DEFAULT_UTC_OFFSET = '-08:00';

export type TimezoneMode = 'utc' | 'local';

/**
 * Invalid or missing configuration
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export interface ImmichOptions {
  immichUrl?: string;
  apiKey?: string;
}

export interface TimezoneOptions {
  timezone?: string;
  utcOffset?: string;
}

/**
 * Strip trailing slashes and make sure the URL ends in `/api`
 */
export function normalizeImmichUrl(url: string): string {
  const trimmed = url.trim().replace(/\/+$/, '');
  return trimmed.endsWith('/api') ? trimmed : `${trimmed}/api`;
}

/**
 * Immich settings from options, falling back to IMMICH_URL / IMMICH_API_KEY.
 * Returns null when neither source has a URL and a key.
 */
export function findImmichConfig(
  options: ImmichOptions,
  env: NodeJS.ProcessEnv = process.env
): ImmichConfig | null {
  const url = options.immichUrl || env.IMMICH_URL;
  const apiKey = options.apiKey || env.IMMICH_API_KEY;
  if (!url || !apiKey) {
    return null;
  }
  return { baseUrl: normalizeImmichUrl(url), apiKey };
}

export function resolveImmichConfig(
  options: ImmichOptions,
  env: NodeJS.ProcessEnv = process.env
): ImmichConfig {
  const config = findImmichConfig(options, env);
  if (!config) {
    throw new ConfigError(
      'Immich is not configured. Pass --immich-url and --api-key or set IMMICH_URL and IMMICH_API_KEY.'
    );
  }
  return config;
}

/**
 * Build the timestamp policy. UTC unless `--timezone local` is given.
 */
export function resolveTimestampPolicy(options: TimezoneOptions): TimestampPolicy {
  const mode = (options.timezone ?? 'utc').toLowerCase();
  if (mode === 'utc') {
    return parseAsUtc;
  }
  if (mode === 'local') {
    try {
      return parseAsLocal(options.utcOffset ?? DEFAULT_UTC_OFFSET);
    } catch (error) {
      throw new ConfigError(error instanceof Error ? error.message : 'Invalid UTC offset');
    }
  }
  throw new ConfigError(`Unknown timezone mode "${options.timezone ?? ''}" (expected utc or local)`);
}

/**
 * Warning text when a bundle was written under a different policy than the
 * active one, null when they agree
 */
export function describePolicyMismatch(
  bundle: MetadataBundle,
  policy: TimestampPolicy
): string | null {
  const active = policy.describe();
  const stored = bundle.timezone;

  if (!stored && !active) {
    return null;
  }
  if (stored && active && stored.offset === active.offset) {
    return null;
  }

  const storedText = stored ? `${stored.timezone} (${stored.offset})` : 'UTC';
  const activeText = active ? `local time ${policy.offset}` : 'UTC';
  return `Metadata was extracted as ${storedText} but timestamps are read as ${activeText}. Use --timezone to change this.`;
}

/**
 * Parse a non-negative integer option
 */
export function parseIntegerOption(value: string, name: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new ConfigError(`${name} must be a non-negative integer, got: ${value}`);
  }
  return parsed;
}
