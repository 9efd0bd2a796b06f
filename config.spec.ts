import { describe, expect, it } from 'vitest';
import { loadConfig, missingConfig, SEARCH_API_VERSION } from './config.js';

const env = {
  AZURE_SEARCH_ENDPOINT: 'https://search.test',
  AZURE_SEARCH_API_KEY: 'test-secret',
  AZURE_SEARCH_INDEX: 'docs',
};

describe('loadConfig', () => {
  it('reads endpoint, key and index from the environment', () => {
    const config = loadConfig(env);

    expect(config).toEqual({
      endpoint: 'https://search.test',
      apiKey: 'test-secret',
      indexName: 'docs',
      apiVersion: SEARCH_API_VERSION,
      debug: false,
    });
  });

  it('prefers the index override', () => {
    expect(loadConfig(env, 'archive').indexName).toBe('archive');
  });

  it('ignores an empty index override', () => {
    expect(loadConfig(env, '').indexName).toBe('docs');
  });

  it('enables debug unless DEBUG is 0', () => {
    expect(loadConfig({ ...env, DEBUG: '1' }).debug).toBe(true);
    expect(loadConfig({ ...env, DEBUG: 'true' }).debug).toBe(true);
    expect(loadConfig({ ...env, DEBUG: '0' }).debug).toBe(false);
    expect(loadConfig({ ...env, DEBUG: '' }).debug).toBe(false);
  });

  it('is frozen', () => {
    expect(Object.isFrozen(loadConfig(env))).toBe(true);
  });
});

describe('missingConfig', () => {
  it('returns nothing when all values are set', () => {
    expect(missingConfig(loadConfig(env))).toEqual([]);
  });

  it('lists every missing name in order', () => {
    expect(missingConfig(loadConfig({}))).toEqual([
      'AZURE_SEARCH_ENDPOINT',
      'AZURE_SEARCH_API_KEY',
      'AZURE_SEARCH_INDEX',
    ]);
  });

  it('treats blank values as missing', () => {
    const config = loadConfig({ ...env, AZURE_SEARCH_API_KEY: '' });
    expect(missingConfig(config)).toEqual(['AZURE_SEARCH_API_KEY']);
  });

  it('counts the index as present when only the override supplies it', () => {
    const config = loadConfig({ AZURE_SEARCH_ENDPOINT: 'https://search.test' }, 'archive');
    expect(missingConfig(config)).toEqual(['AZURE_SEARCH_API_KEY']);
  });
});
