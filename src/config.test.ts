/**
 * Tests for configuration resolution
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  describePolicyMismatch,
  findImmichConfig,
  normalizeImmichUrl,
  parseIntegerOption,
  resolveImmichConfig,
  resolveTimestampPolicy,
} from './config.js';
import { parseAsLocal, parseAsUtc } from './timestamp.js';
import type { MetadataBundle } from './types.js';

function bundle(timezone?: MetadataBundle['timezone']): MetadataBundle {
  return {
    records: [],
    extractedAt: '2024-08-01T12:00:00.000Z',
    source: { kind: 'json', path: 'x.json' },
    totalCount: 0,
    ...(timezone ? { timezone } : {}),
  };
}

describe('normalizeImmichUrl', () => {
  it('should end the URL in /api', () => {
    expect(normalizeImmichUrl('http://immich.local:2283/')).toBe('http://immich.local:2283/api');
    expect(normalizeImmichUrl(' http://immich.local/api/ ')).toBe('http://immich.local/api');
  });
});

describe('findImmichConfig', () => {
  it('should prefer options over the environment', () => {
    expect(
      findImmichConfig(
        { immichUrl: 'http://cli.local', apiKey: 'test-secret' },
        { IMMICH_URL: 'http://env.local', IMMICH_API_KEY: 'env-secret' }
      )
    ).toEqual({ baseUrl: 'http://cli.local/api', apiKey: 'test-secret' });
  });

  it('should fall back to the environment', () => {
    expect(
      findImmichConfig({}, { IMMICH_URL: 'http://env.local', IMMICH_API_KEY: 'test-secret' })
    ).toEqual({ baseUrl: 'http://env.local/api', apiKey: 'test-secret' });
  });

  it('should return null when a value is missing', () => {
    expect(findImmichConfig({ immichUrl: 'http://cli.local' }, {})).toBeNull();
  });
});

describe('resolveImmichConfig', () => {
  it('should require a URL and a key', () => {
    expect(() => resolveImmichConfig({}, {})).toThrow(ConfigError);
  });
});

describe('resolveTimestampPolicy', () => {
  it('should default to UTC', () => {
    expect(resolveTimestampPolicy({})).toBe(parseAsUtc);
    expect(resolveTimestampPolicy({ timezone: 'UTC' })).toBe(parseAsUtc);
  });

  it('should build a local policy', () => {
    expect(resolveTimestampPolicy({ timezone: 'local' }).offset).toBe('-08:00');
    expect(resolveTimestampPolicy({ timezone: 'local', utcOffset: '+02:00' }).offset).toBe(
      '+02:00'
    );
  });

  it('should reject unknown modes and offsets', () => {
    expect(() => resolveTimestampPolicy({ timezone: 'mars' })).toThrow(
      'Unknown timezone mode "mars" (expected utc or local)'
    );
    expect(() => resolveTimestampPolicy({ timezone: 'local', utcOffset: 'soon' })).toThrow(
      ConfigError
    );
  });
});

describe('describePolicyMismatch', () => {
  it('should accept matching policies', () => {
    expect(describePolicyMismatch(bundle(), parseAsUtc)).toBeNull();
    expect(
      describePolicyMismatch(bundle({ timezone: 'PST', offset: 'UTC-8' }), parseAsLocal('-08:00'))
    ).toBeNull();
  });

  it('should describe a mismatch', () => {
    expect(describePolicyMismatch(bundle({ timezone: 'PST', offset: 'UTC-8' }), parseAsUtc)).toBe(
      'Metadata was extracted as PST (UTC-8) but timestamps are read as UTC. Use --timezone to change this.'
    );
    expect(describePolicyMismatch(bundle(), parseAsLocal('-07:00'))).toBe(
      'Metadata was extracted as UTC but timestamps are read as local time -07:00. Use --timezone to change this.'
    );
  });
});

describe('parseIntegerOption', () => {
  it('should parse non-negative integers', () => {
    expect(parseIntegerOption('500', '--delay')).toBe(500);
    expect(parseIntegerOption('0', '--delay')).toBe(0);
  });

  it('should reject other values', () => {
    expect(() => parseIntegerOption('-1', '--delay')).toThrow(
      '--delay must be a non-negative integer, got: -1'
    );
    expect(() => parseIntegerOption('fast', '--max-retries')).toThrow(ConfigError);
  });
});
