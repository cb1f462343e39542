import { insertRows, query, withTransaction, type Queryable } from '../db';
import { loadNflTeams } from '../data/nflTeams';
import { EspnFantasyError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import {
  convertLeagueData,
  fetchLeagueSnapshot,
  validateLeagueAccess,
  type LeagueData,
  type ProTeamMap,
} from './adapter';
import { defaultClient, type EspnClient } from './client';

const log = createLogger('sync');

export type SyncSummary = {
  ok: boolean;
  league?: string;
  season?: number;
  counts: Record<string, number>;
  error?: string;
};

// Children before parents so foreign keys never dangle mid-transaction.
const LEAGUE_TABLES = [
  'trade_analysis',
  'trade_items',
  'trade_proposals',
  'free_agent_recommendations',
  'waiver_priorities',
  'player_rankings',
  'player_projections',
  'team_defense_game_stats',
  'player_game_stats',
  'fantasy_team_weekly_scores',
  'fantasy_matchups',
  'roster_entries',
  'roster_positions',
  'players',
  'nfl_games',
  'fantasy_teams',
  'league_config',
] as const;

export async function clearLeagueData(tx: Queryable): Promise<void> {
  for (const table of LEAGUE_TABLES) {
    await tx.query(`DELETE FROM ${table}`);
  }
}

/** Upserts the 32 NFL teams by code and maps ESPN pro team ids to their row ids. */
export async function upsertNflTeams(tx: Queryable): Promise<ProTeamMap> {
  const seeds = loadNflTeams();
  const valuesSql = seeds
    .map((_seed, i) => `($${i * 6 + 1}, $${i * 6 + 2}, $${i * 6 + 3}, $${i * 6 + 4}, $${i * 6 + 5}, $${i * 6 + 6})`)
    .join(', ');
  const params = seeds.flatMap(({ team }) => [
    team.id,
    team.team_code,
    team.team_name,
    team.city,
    team.conference,
    team.division,
  ]);

  const { rows } = await tx.query<{ id: string; team_code: string }>(
    `
    INSERT INTO nfl_teams (id, team_code, team_name, city, conference, division)
    VALUES ${valuesSql}
    ON CONFLICT (team_code) DO UPDATE SET
      team_name = EXCLUDED.team_name,
      city = EXCLUDED.city,
      conference = EXCLUDED.conference,
      division = EXCLUDED.division,
      updated_at = NOW()
    RETURNING id, team_code
    `,
    params,
  );

  const idByCode = new Map(rows.map((row) => [row.team_code, row.id]));
  const proTeamMap: ProTeamMap = new Map();
  for (const { espnId, team } of seeds) {
    const id = idByCode.get(team.team_code);
    if (id) {
      proTeamMap.set(espnId, id);
    }
  }
  return proTeamMap;
}

export async function storeLeagueData(tx: Queryable, data: LeagueData): Promise<Record<string, number>> {
  return {
    league_config: await insertRows(tx, 'league_config', [data.leagueConfig]),
    roster_positions: await insertRows(tx, 'roster_positions', data.rosterPositions),
    fantasy_teams: await insertRows(tx, 'fantasy_teams', data.teams),
    players: await insertRows(tx, 'players', data.players),
    roster_entries: await insertRows(tx, 'roster_entries', data.rosterEntries),
    fantasy_matchups: await insertRows(tx, 'fantasy_matchups', data.matchups),
    fantasy_team_weekly_scores: await insertRows(tx, 'fantasy_team_weekly_scores', data.weeklyScores),
    nfl_games: await insertRows(tx, 'nfl_games', data.nflGames),
    player_game_stats: await insertRows(tx, 'player_game_stats', data.playerStats),
    team_defense_game_stats: await insertRows(tx, 'team_defense_game_stats', data.defenseStats),
    player_projections: await insertRows(tx, 'player_projections', data.projections),
    player_rankings: await insertRows(tx, 'player_rankings', data.rankings),
    waiver_priorities: await insertRows(tx, 'waiver_priorities', data.waiverPriorities),
    free_agent_recommendations: await insertRows(tx, 'free_agent_recommendations', data.freeAgentRecommendations),
  };
}

/**
 * Full refresh of the league from ESPN. League-derived tables are cleared and
 * reloaded in one transaction, so a failure leaves the previous data intact.
 */
export async function initEspnData(client: EspnClient = defaultClient()): Promise<SyncSummary> {
  try {
    log.info(`Syncing ESPN league ${client.leagueId} for ${client.year}`);

    if (!(await validateLeagueAccess(client))) {
      throw new EspnFantasyError(`Cannot access ESPN league ${client.leagueId}`);
    }

    const snapshot = await fetchLeagueSnapshot(client);

    const { data, counts } = await withTransaction(async (tx) => {
      await clearLeagueData(tx);
      const proTeamMap = await upsertNflTeams(tx);
      const converted = convertLeagueData(snapshot, proTeamMap);
      return { data: converted, counts: await storeLeagueData(tx, converted) };
    });

    log.info(
      `Synced ${data.leagueConfig.league_name}: ${counts.fantasy_teams} teams, ${counts.players} players, ${counts.fantasy_matchups} matchups`,
    );

    return {
      ok: true,
      league: data.leagueConfig.league_name,
      season: data.leagueConfig.season_year,
      counts,
    };
  } catch (error) {
    log.error(`ESPN sync failed: ${errorMessage(error)}`);
    return { ok: false, counts: {}, error: errorMessage(error) };
  }
}

export async function isLeagueEmpty(): Promise<boolean> {
  const { rows } = await query<{ count: number }>('SELECT COUNT(*)::int AS count FROM fantasy_teams');
  return (rows[0]?.count ?? 0) === 0;
}
