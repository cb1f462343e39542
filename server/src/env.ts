import 'dotenv/config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type EnvConfig = {
  SWID?: string;
  ESPN_S2?: string;
  USE_ESPN_SCRAPER: boolean;
  ESPN_SCRAPER_HOST: string;
  ESPN_LEAGUE_ID: number;
  ESPN_YEAR: number;
  ESPN_FREE_AGENT_LIMIT: number;
  DATABASE_URL?: string;
  PGSSL: boolean;
  PORT: number;
  CORS_ORIGIN: string[] | '*';
  LOG_LEVEL: LogLevel;
  SYNC_ON_STARTUP: boolean;
};

type RawEnv = Record<string, string | undefined>;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const resolveFlag = (raw: string | undefined, fallback: boolean): boolean => {
  if (!raw) {
    return fallback;
  }

  const normalized = raw.trim().toLowerCase();
  if (normalized === '0' || normalized === 'false') {
    return false;
  }

  if (normalized === '1' || normalized === 'true') {
    return true;
  }

  return fallback;
};

export const resolveInt = (name: string, raw: string | undefined, fallback: number): number => {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    console.warn(`[WARN] ${name}=${raw} is not an integer, using ${fallback}`);
    return fallback;
  }

  return parsed;
};

const resolveLogLevel = (raw: string | undefined): LogLevel => {
  const normalized = raw?.trim().toLowerCase();
  const match = LOG_LEVELS.find((level) => level === normalized);
  return match ?? 'info';
};

const resolveCorsOrigin = (raw: string | undefined): string[] | '*' => {
  if (!raw || raw.trim() === '*') {
    return '*';
  }

  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
};

export function loadEnv(source: RawEnv = process.env): EnvConfig {
  return {
    SWID: source.SWID,
    ESPN_S2: source.ESPN_S2,
    USE_ESPN_SCRAPER: resolveFlag(source.USE_ESPN_SCRAPER, true),
    ESPN_SCRAPER_HOST: source.ESPN_SCRAPER_HOST ?? 'https://lm-api-reads.fantasy.espn.com',
    ESPN_LEAGUE_ID: resolveInt('ESPN_LEAGUE_ID', source.ESPN_LEAGUE_ID, 24481082),
    ESPN_YEAR: resolveInt('ESPN_YEAR', source.ESPN_YEAR, 2024),
    ESPN_FREE_AGENT_LIMIT: resolveInt('ESPN_FREE_AGENT_LIMIT', source.ESPN_FREE_AGENT_LIMIT, 100),
    DATABASE_URL: source.DATABASE_URL,
    PGSSL: resolveFlag(source.PGSSL, false),
    PORT: resolveInt('PORT', source.PORT, 8080),
    CORS_ORIGIN: resolveCorsOrigin(source.CORS_ORIGIN),
    LOG_LEVEL: resolveLogLevel(source.LOG_LEVEL),
    SYNC_ON_STARTUP: resolveFlag(source.SYNC_ON_STARTUP, true),
  };
}

const env = loadEnv();

if (!env.USE_ESPN_SCRAPER && (!env.SWID || !env.ESPN_S2)) {
  console.warn('[WARN] Missing SWID or ESPN_S2 env vars. Private leagues will not load.');
}

export default env;
