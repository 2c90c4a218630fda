import { describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, loadConfig, parsePositiveInt, resolveConfig } from '../lib/config.js';

describe('loadConfig', () => {
  it('returns the defaults when nothing is set', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads and coerces environment values', () => {
    const config = loadConfig({
      ADEQUACY_THRESHOLD: '5',
      MAX_TURNS: ' 40 ',
      TURN_TIMEOUT_MS: '30000',
      RETRY_BASE_DELAY_MS: '0',
    });

    expect(config).toEqual({
      ...DEFAULT_CONFIG,
      adequacy_threshold: 5,
      max_turns: 40,
      turn_timeout_ms: 30_000,
      retry_base_delay_ms: 0,
    });
  });

  it('treats empty strings as unset', () => {
    expect(loadConfig({ MAX_TURNS: '', SESSION_TIMEOUT_MS: '   ' })).toEqual(DEFAULT_CONFIG);
  });

  it('rejects values outside their range', () => {
    expect(() => loadConfig({ ADEQUACY_THRESHOLD: '9' })).toThrow(/^Invalid orchestration config: ADEQUACY_THRESHOLD/);
    expect(() => loadConfig({ MAX_TURNS: '0' })).toThrow(/MAX_TURNS/);
    expect(() => loadConfig({ MAX_STAGE_ATTEMPTS: 'three' })).toThrow(/MAX_STAGE_ATTEMPTS/);
  });
});

describe('resolveConfig', () => {
  it('applies only the overrides that are defined', () => {
    const resolved = resolveConfig(DEFAULT_CONFIG, { max_turns: 12, adequacy_threshold: undefined });

    expect(resolved).toEqual({ ...DEFAULT_CONFIG, max_turns: 12 });
  });

  it('returns a copy when there are no overrides', () => {
    const resolved = resolveConfig(DEFAULT_CONFIG);

    expect(resolved).toEqual(DEFAULT_CONFIG);
    expect(resolved).not.toBe(DEFAULT_CONFIG);
  });
});

describe('parsePositiveInt', () => {
  it('falls back on missing, invalid or non-positive input', () => {
    expect(parsePositiveInt('8080', 3001)).toBe(8080);
    expect(parsePositiveInt(undefined, 3001)).toBe(3001);
    expect(parsePositiveInt('port', 3001)).toBe(3001);
    expect(parsePositiveInt('0', 3001)).toBe(3001);
  });
});

