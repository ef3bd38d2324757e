import { describe, it, expect } from 'vitest';
import { loadConfig, ConfigError } from '../src/index.js';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const cfg = loadConfig({});
    expect(cfg.mongo).toEqual({ uri: 'mongodb://127.0.0.1:27017', db: 'docquery', timeoutMs: 5000 });
    expect(cfg.model.model).toBe('gpt-4o-mini');
    expect(cfg.model.apiKey).toBeUndefined();
    expect(cfg.model.temperature).toBe(0.1);
    expect(cfg.limits).toEqual({ defaultLimit: 100, maxLimit: 1000 });
    expect(cfg.http).toEqual({ host: '0.0.0.0', port: 4000, corsOrigins: [], debugErrors: false });
  });

  it('coerces numeric variables and splits CORS origins', () => {
    const cfg = loadConfig({
      PORT: '8080',
      MAX_LIMIT: '50',
      DEFAULT_LIMIT: '10',
      CORS_ORIGIN: 'http://a.test, http://b.test ,',
      OPENAI_API_KEY: 'test-key',
      DEBUG_ERRORS: '1'
    });
    expect(cfg.http.port).toBe(8080);
    expect(cfg.limits).toEqual({ defaultLimit: 10, maxLimit: 50 });
    expect(cfg.http.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(cfg.model.apiKey).toBe('test-key');
    expect(cfg.http.debugErrors).toBe(true);
  });

  it('treats blank optional strings as unset', () => {
    const cfg = loadConfig({ OPENAI_BASE_URL: '   ', SCHEMA_PATH: '' });
    expect(cfg.model.baseURL).toBeUndefined();
    expect(cfg.schemaPath).toBeUndefined();
  });

  it('rejects invalid values with every offending variable named', () => {
    let caught: unknown;
    try {
      loadConfig({ PORT: 'abc', LOG_LEVEL: 'loud' });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      const problems = caught.details?.problems;
      expect(Array.isArray(problems)).toBe(true);
      expect(String(problems)).toContain('PORT');
      expect(String(problems)).toContain('LOG_LEVEL');
    }
  });

  it('rejects a default limit above the maximum', () => {
    expect(() => loadConfig({ DEFAULT_LIMIT: '500', MAX_LIMIT: '100' })).toThrow(/DEFAULT_LIMIT \(500\) exceeds MAX_LIMIT \(100\)/);
  });

  it('returns a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });
});
