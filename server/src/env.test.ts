import { afterEach, describe, expect, it, vi } from 'vitest';
import { loadEnv, resolveFlag, resolveInt } from './env';

describe('resolveFlag', () => {
  it('falls back when unset or unrecognised', () => {
    expect(resolveFlag(undefined, true)).toBe(true);
    expect(resolveFlag('maybe', false)).toBe(false);
  });

  it('accepts 0/1 and true/false in any case', () => {
    expect(resolveFlag('0', true)).toBe(false);
    expect(resolveFlag(' FALSE ', true)).toBe(false);
    expect(resolveFlag('1', false)).toBe(true);
    expect(resolveFlag('True', false)).toBe(true);
  });
});

describe('resolveInt', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('parses integers', () => {
    expect(resolveInt('PORT', '3000', 8080)).toBe(3000);
  });

  it('warns and falls back on garbage', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(resolveInt('PORT', 'abc', 8080)).toBe(8080);
    expect(warn).toHaveBeenCalledWith('[WARN] PORT=abc is not an integer, using 8080');
  });
});

describe('loadEnv', () => {
  it('applies defaults for an empty environment', () => {
    const env = loadEnv({});
    expect(env).toMatchObject({
      USE_ESPN_SCRAPER: true,
      ESPN_SCRAPER_HOST: 'https://lm-api-reads.fantasy.espn.com',
      ESPN_LEAGUE_ID: 24481082,
      ESPN_YEAR: 2024,
      ESPN_FREE_AGENT_LIMIT: 100,
      PGSSL: false,
      PORT: 8080,
      CORS_ORIGIN: '*',
      LOG_LEVEL: 'info',
      SYNC_ON_STARTUP: true,
    });
    expect(env.DATABASE_URL).toBeUndefined();
  });

  it('reads league settings and splits CORS origins', () => {
    const env = loadEnv({
      ESPN_LEAGUE_ID: '555',
      ESPN_YEAR: '2025',
      CORS_ORIGIN: 'http://localhost:5173, https://dash.example.com',
      LOG_LEVEL: 'DEBUG',
      SYNC_ON_STARTUP: 'false',
    });

    expect(env.ESPN_LEAGUE_ID).toBe(555);
    expect(env.ESPN_YEAR).toBe(2025);
    expect(env.CORS_ORIGIN).toEqual(['http://localhost:5173', 'https://dash.example.com']);
    expect(env.LOG_LEVEL).toBe('debug');
    expect(env.SYNC_ON_STARTUP).toBe(false);
  });

  it('ignores unknown log levels', () => {
    expect(loadEnv({ LOG_LEVEL: 'verbose' }).LOG_LEVEL).toBe('info');
  });
});
