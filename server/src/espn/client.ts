import fetch from 'node-fetch';
import env from '../env';
import { EspnFantasyError } from '../errors';
import { createLogger } from '../logger';
import { DEFAULT_LEAGUE_VIEWS } from './constants';
import type { EspnKonaPlayersResponse, EspnLeagueResponse, EspnProScheduleResponse } from './types';

const log = createLogger('espn');

export type EspnFetchInit = {
  /** Sent as the x-fantasy-filter header. */
  filter?: unknown;
};

const ESPN_BASE = 'https://fantasy.espn.com/apis/v3/games/ffl';
const SCRAPER_USER_AGENT = 'gridiron-ledger/1.0';

export const buildScraperUrl = (url: string): string => {
  if (!env.USE_ESPN_SCRAPER) {
    return url;
  }

  try {
    const original = new URL(url);
    const scraperBase = new URL(env.ESPN_SCRAPER_HOST);

    if (original.hostname !== 'fantasy.espn.com') {
      return url;
    }

    const basePath = scraperBase.pathname.replace(/\/$/, '');

    original.protocol = scraperBase.protocol;
    original.host = scraperBase.host;
    original.port = scraperBase.port;
    original.pathname = `${basePath}${original.pathname}`;

    return original.toString();
  } catch (error) {
    log.warn('Failed to transform ESPN URL for scraper mode:', error);
    return url;
  }
};

export async function espnFetch<T = unknown>(url: string, init: EspnFetchInit = {}): Promise<T> {
  const requestUrl = buildScraperUrl(url);

  const headers: Record<string, string> = {
    Accept: 'application/json',
  };

  if (!env.USE_ESPN_SCRAPER) {
    headers.Cookie = `SWID=${env.SWID ?? ''}; espn_s2=${env.ESPN_S2 ?? ''}`;
  } else {
    headers['User-Agent'] = SCRAPER_USER_AGENT;

    if (env.SWID && env.ESPN_S2) {
      headers.Cookie = `SWID=${env.SWID}; espn_s2=${env.ESPN_S2}`;
    }
  }

  if (init.filter !== undefined) {
    headers['x-fantasy-filter'] = JSON.stringify(init.filter);
  }

  log.debug(`GET ${requestUrl}`);

  const response = await fetch(requestUrl, { method: 'GET', headers });
  if (!response.ok) {
    const text = await response.text();
    throw new EspnFantasyError(`ESPN ${response.status}: ${text}`);
  }

  return (await response.json()) as T;
}

const viewQuery = (views: string[]) => views.map((view) => `view=${encodeURIComponent(view)}`).join('&');

export class EspnClient {
  constructor(
    readonly leagueId: number,
    readonly year: number,
  ) {}

  private get leagueUrl(): string {
    return `${ESPN_BASE}/seasons/${this.year}/segments/0/leagues/${this.leagueId}`;
  }

  getLeague(views: string[] = DEFAULT_LEAGUE_VIEWS, scoringPeriodId?: number): Promise<EspnLeagueResponse> {
    const period = scoringPeriodId !== undefined ? `&scoringPeriodId=${scoringPeriodId}` : '';
    return espnFetch<EspnLeagueResponse>(`${this.leagueUrl}?${viewQuery(views)}${period}`);
  }

  getFreeAgents(limit: number = env.ESPN_FREE_AGENT_LIMIT): Promise<EspnKonaPlayersResponse> {
    const filter = {
      players: {
        filterStatus: { value: ['FREEAGENT', 'WAIVERS'] },
        limit,
        sortPercOwned: { sortPriority: 1, sortAsc: false },
      },
    };
    return espnFetch<EspnKonaPlayersResponse>(`${this.leagueUrl}?${viewQuery(['kona_player_info'])}`, { filter });
  }

  getProTeamSchedules(): Promise<EspnProScheduleResponse> {
    return espnFetch<EspnProScheduleResponse>(`${ESPN_BASE}/seasons/${this.year}?${viewQuery(['proTeamSchedules_wl'])}`);
  }
}

export const defaultClient = () => new EspnClient(env.ESPN_LEAGUE_ID, env.ESPN_YEAR);
