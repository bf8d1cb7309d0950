import { describe, expect, it } from 'vitest';

import { loadEnv } from './env.js';

describe('loadEnv', () => {
  it('applies defaults', () => {
    const env = loadEnv({});
    expect(env).toMatchObject({ port: 3001, host: '0.0.0.0', logLevel: 'info' });
    expect(env.dataDir.endsWith('.data')).toBe(true);
  });

  it('reads overrides', () => {
    expect(loadEnv({ PORT: '8080', DATA_DIR: '/tmp/catalog', LOG_LEVEL: 'warn' })).toEqual({
      port: 8080,
      host: '0.0.0.0',
      dataDir: '/tmp/catalog',
      logLevel: 'warn',
    });
  });

  it('rejects invalid values', () => {
    expect(() => loadEnv({ PORT: 'abc' })).toThrow(/^Invalid environment configuration: PORT:/);
    expect(() => loadEnv({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
  });
});
