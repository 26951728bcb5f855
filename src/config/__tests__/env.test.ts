import { describe, it, expect } from 'vitest';
import { parseEnv } from '../env.js';

describe('parseEnv', () => {
  it('applies defaults', () => {
    const env = parseEnv({});

    expect(env.PORT).toBe(8000);
    expect(env.STORAGE).toBe('mongo');
    expect(env.ENGINE_JSON).toBe('engine.json');
    expect(env.LOG_LEVEL).toBe('info');
  });

  it('coerces numeric values', () => {
    expect(parseEnv({ PORT: '9100', STORAGE: 'memory' })).toMatchObject({ PORT: 9100, STORAGE: 'memory' });
  });

  it('rejects unknown storage backends', () => {
    expect(() => parseEnv({ STORAGE: 'redis' })).toThrow(/^Invalid environment: STORAGE:/);
  });
});
