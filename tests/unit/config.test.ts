/**
 * Unit tests for config parsing
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CONFIG_ELEMENT_ID, DEFAULT_CONFIG, loadConfig, loadPageConfig } from '../../src/config';
import { setLogLevel } from '../../src/logger';

describe('loadConfig', () => {
  beforeEach(() => {
    setLogLevel('silent');
  });

  afterEach(() => {
    setLogLevel('warn');
  });

  it('fills defaults', () => {
    expect(loadConfig({})).toEqual({
      providerCredential: undefined,
      debounceMs: 200,
      blurGraceMs: 120,
      limit: 6,
      countries: ['CA', 'US'],
      requestTimeoutMs: undefined,
      logLevel: 'warn',
    });
    expect(loadConfig(undefined)).toEqual(DEFAULT_CONFIG);
  });

  it('keeps a credential and overrides', () => {
    const config = loadConfig({ providerCredential: ' test-token ', debounceMs: 300, countries: ['US'] });

    expect(config.providerCredential).toBe('test-token');
    expect(config.debounceMs).toBe(300);
    expect(config.countries).toEqual(['US']);
  });

  it.each([[''], ['   '], [null]])('treats credential %j as absent', (providerCredential) => {
    expect(loadConfig({ providerCredential }).providerCredential).toBeUndefined();
  });

  it('replaces only the invalid fields with defaults and warns', () => {
    setLogLevel('warn');
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    const config = loadConfig({ providerCredential: 'test-token', countries: ['CAN'], limit: 50, debounceMs: 300 });

    expect(config).toEqual({ ...DEFAULT_CONFIG, providerCredential: 'test-token', debounceMs: 300 });
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy.mock.calls[0][0]).toContain('[WARN] Invalid autocomplete config fields, using their defaults');
  });

  it('uses defaults for a config that is not an object', () => {
    expect(loadConfig('test-token')).toEqual(DEFAULT_CONFIG);
    expect(loadConfig(['test-token'])).toEqual(DEFAULT_CONFIG);
  });
});

describe('loadPageConfig', () => {
  beforeEach(() => {
    setLogLevel('silent');
  });

  afterEach(() => {
    setLogLevel('warn');
  });

  it('reads the JSON config element', () => {
    document.body.innerHTML = `<script type="application/json" id="${CONFIG_ELEMENT_ID}">
      {"providerCredential": "test-token", "debounceMs": 150}
    </script>`;

    const config = loadPageConfig(document);

    expect(config.providerCredential).toBe('test-token');
    expect(config.debounceMs).toBe(150);
  });

  it('uses defaults without a config element', () => {
    document.body.innerHTML = '';

    expect(loadPageConfig(document)).toEqual(DEFAULT_CONFIG);
  });

  it('uses defaults for unreadable JSON', () => {
    document.body.innerHTML = `<script type="application/json" id="${CONFIG_ELEMENT_ID}">{not json</script>`;

    expect(loadPageConfig(document)).toEqual(DEFAULT_CONFIG);
  });
});
