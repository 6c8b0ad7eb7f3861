import { describe, it, expect } from 'vitest';
import { loadEnvConfig } from '../../../src/config/env.js';

describe('loadEnvConfig', () => {
  it('should default to silent', () => {
    expect(loadEnvConfig({})).toEqual({ logLevel: 'silent' });
  });

  it('should treat an empty value as unset', () => {
    expect(loadEnvConfig({ ADD_LOG_LEVEL: '' })).toEqual({ logLevel: 'silent' });
  });

  it('should read a known level', () => {
    expect(loadEnvConfig({ ADD_LOG_LEVEL: 'debug' })).toEqual({ logLevel: 'debug' });
  });

  it('should fall back to silent for an unknown level', () => {
    expect(loadEnvConfig({ ADD_LOG_LEVEL: 'verbose' })).toEqual({ logLevel: 'silent' });
  });
});
