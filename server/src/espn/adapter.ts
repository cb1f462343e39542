/**
 * ESPN adapter: converts ESPN fantasy API responses into the dashboard's
 * relational records.
 *
 * Conversion is split from transport. `fetchLeagueSnapshot` performs the ESPN
 * calls, `convertLeagueData` turns a snapshot into records without I/O.
 */

import { EspnFantasyError, errorMessage } from '../errors';
import { createLogger } from '../logger';
import {
  createFantasyMatchup,
  createFantasyTeam,
  createFreeAgentRecommendation,
  createLeagueConfig,
  createNflGame,
  createPlayer,
  createPlayerGameStats,
  createPlayerProjection,
  createPlayerRanking,
  createRosterEntry,
  createRosterPosition,
  createTeamDefenseGameStats,
  createWaiverPriority,
  createWeeklyScore,
  type FantasyMatchup,
  type FantasyTeam,
  type FantasyTeamWeeklyScore,
  type FreeAgentRecommendation,
  type LeagueConfig,
  type NflGame,
  type Player,
  type PlayerGameStats,
  type PlayerProjection,
  type PlayerRanking,
  type Position,
  type RosterEntry,
  type RosterPosition,
  type RosterSlot,
  type ScoringType,
  type TeamDefenseGameStats,
  type WaiverPriority,
} from '../models';
import type { EspnClient } from './client';
import {
  ESPN_ACQUISITION_TYPES,
  ESPN_LINEUP_SLOTS,
  ESPN_POSITIONS,
  STAT,
  STAT_SOURCE_ACTUAL,
  STAT_SOURCE_PROJECTED,
} from './constants';
import type {
  EspnKonaPlayerEntry,
  EspnLeagueResponse,
  EspnMember,
  EspnPlayer,
  EspnPlayerStats,
  EspnProTeam,
  EspnScheduleItem,
  EspnTeam,
} from './types';

const log = createLogger('espn-adapter');

/** ESPN pro team id to `nfl_teams.id`. */
export type ProTeamMap = Map<number, string>;
/** ESPN id (as string) to the record id assigned during conversion. */
export type IdMap = Map<string, string>;

export type LeagueSnapshot = {
  league: EspnLeagueResponse;
  freeAgents: EspnKonaPlayerEntry[];
  proTeams: EspnProTeam[];
};

export type LeagueData = {
  leagueConfig: LeagueConfig;
  teams: FantasyTeam[];
  players: Player[];
  rosterPositions: RosterPosition[];
  rosterEntries: RosterEntry[];
  matchups: FantasyMatchup[];
  weeklyScores: FantasyTeamWeeklyScore[];
  nflGames: NflGame[];
  playerStats: PlayerGameStats[];
  defenseStats: TeamDefenseGameStats[];
  projections: PlayerProjection[];
  rankings: PlayerRanking[];
  waiverPriorities: WaiverPriority[];
  freeAgentRecommendations: FreeAgentRecommendation[];
};

const round2 = (value: number) => Math.round(value * 100) / 100;

export function determineScoringType(league: EspnLeagueResponse): ScoringType {
  const items = league.settings?.scoringSettings?.scoringItems;
  if (!Array.isArray(items)) {
    log.warn('League scoring settings unreadable, assuming Standard scoring');
    return 'Standard';
  }

  const reception = items.find((item) => item.statId === STAT.RECEPTIONS);
  if (reception?.points === 1) {
    return 'PPR';
  }
  if (reception?.points === 0.5) {
    return 'Half-PPR';
  }
  return 'Standard';
}

export const mapEspnPosition = (positionId: number | undefined): Position | undefined =>
  positionId === undefined ? undefined : ESPN_POSITIONS[positionId];

export const mapLineupSlot = (slotId: number | undefined): RosterSlot | undefined =>
  slotId === undefined ? undefined : ESPN_LINEUP_SLOTS[slotId];

export const resolveTeamName = (team: EspnTeam): string =>
  team.location && team.nickname ? `${team.location} ${team.nickname}` : team.name || `Team ${team.id}`;

export const resolvePlayerName = (player: EspnPlayer): string =>
  player.fullName || `${player.firstName ?? ''} ${player.lastName ?? ''}`.trim();

const memberName = (member: EspnMember): string | undefined =>
  member.displayName || `${member.firstName ?? ''} ${member.lastName ?? ''}`.trim() || undefined;

export function resolveOwnerName(team: EspnTeam, members: EspnMember[] = []): string {
  const owner = team.owners?.[0];
  if (owner === undefined) {
    return 'Unknown Owner';
  }

  if (typeof owner === 'string') {
    const member = members.find((m) => m.id === owner);
    return (member && memberName(member)) || owner;
  }

  return owner.displayName || 'Unknown Owner';
}

export function convertLeagueConfig(league: EspnLeagueResponse): LeagueConfig {
  try {
    const settings = league.settings ?? {};
    return createLeagueConfig({
      league_name: settings.name || `League ${league.id}`,
      platform: 'ESPN',
      platform_league_id: String(league.id),
      season_year: league.seasonId,
      scoring_type: determineScoringType(league),
      team_count: league.teams?.length || null,
      playoff_teams: settings.scheduleSettings?.playoffTeamCount ?? null,
    });
  } catch (error) {
    throw new EspnFantasyError(`Failed to convert league config: ${errorMessage(error)}`, { cause: error });
  }
}

export function convertTeam(team: EspnTeam, members: EspnMember[] = []): FantasyTeam {
  const teamName = resolveTeamName(team);
  try {
    const overall = team.record?.overall ?? {};
    return createFantasyTeam({
      owner_name: resolveOwnerName(team, members),
      team_name: teamName,
      platform_team_id: String(team.id),
      wins: overall.wins ?? 0,
      losses: overall.losses ?? 0,
      ties: overall.ties ?? 0,
      points_for: round2(overall.pointsFor ?? 0),
      points_against: round2(overall.pointsAgainst ?? 0),
    });
  } catch (error) {
    throw new EspnFantasyError(`Failed to convert team ${teamName}: ${errorMessage(error)}`, { cause: error });
  }
}

export function convertTeams(league: EspnLeagueResponse): FantasyTeam[] {
  const teams: FantasyTeam[] = [];
  for (const espnTeam of league.teams ?? []) {
    try {
      teams.push(convertTeam(espnTeam, league.members));
    } catch (error) {
      log.warn(`Skipping team conversion: ${errorMessage(error)}`);
    }
  }
  return teams;
}

const parseJersey = (jersey: string | undefined): number | null => {
  if (!jersey) {
    return null;
  }
  const parsed = Number.parseInt(jersey, 10);
  return Number.isNaN(parsed) ? null : parsed;
};

const normalizeInjuryStatus = (status: string | string[] | undefined): string | null => {
  if (Array.isArray(status)) {
    return status.length > 0 ? String(status[0]) : null;
  }
  return status ?? null;
};

export function convertPlayer(player: EspnPlayer, proTeams: ProTeamMap = new Map()): Player {
  const name = resolvePlayerName(player);
  try {
    const position = mapEspnPosition(player.defaultPositionId);
    if (!position) {
      throw new EspnFantasyError(`unsupported position id ${String(player.defaultPositionId)}`);
    }

    return createPlayer({
      name,
      position,
      espn_id: String(player.id),
      nfl_team_id: player.proTeamId !== undefined ? (proTeams.get(player.proTeamId) ?? null) : null,
      jersey_number: parseJersey(player.jersey),
      is_injured: player.injured ?? false,
      injury_status: normalizeInjuryStatus(player.injuryStatus),
      is_active: player.active ?? true,
    });
  } catch (error) {
    throw new EspnFantasyError(`Failed to convert player ${name}: ${errorMessage(error)}`, { cause: error });
  }
}

/** Rostered players first, then free agents, deduplicated by ESPN id. */
export function collectAllPlayers(league: EspnLeagueResponse, freeAgents: EspnKonaPlayerEntry[] = []): EspnPlayer[] {
  const seen = new Set<string>();
  const all: EspnPlayer[] = [];

  const add = (player: EspnPlayer | undefined) => {
    if (!player || seen.has(String(player.id))) {
      return;
    }
    seen.add(String(player.id));
    all.push(player);
  };

  for (const team of league.teams ?? []) {
    for (const entry of team.roster?.entries ?? []) {
      add(entry.playerPoolEntry?.player);
    }
  }

  for (const entry of freeAgents) {
    add(entry.player);
  }

  return all;
}

export function convertPlayers(espnPlayers: EspnPlayer[], proTeams: ProTeamMap = new Map()): Player[] {
  const players: Player[] = [];
  for (const espnPlayer of espnPlayers) {
    try {
      players.push(convertPlayer(espnPlayer, proTeams));
    } catch (error) {
      log.warn(`Skipping player conversion: ${errorMessage(error)}`);
    }
  }
  return players;
}

export function convertRosterPositions(league: EspnLeagueResponse): RosterPosition[] {
  const counts = new Map<RosterSlot, number>();
  for (const [slotId, count] of Object.entries(league.settings?.rosterSettings?.lineupSlotCounts ?? {})) {
    const slot = mapLineupSlot(Number(slotId));
    if (!slot || count <= 0) {
      continue;
    }
    counts.set(slot, (counts.get(slot) ?? 0) + count);
  }

  if (!counts.has('BN')) {
    counts.set('BN', 1);
  }

  const positions: RosterPosition[] = [];
  for (const [slot, count] of counts) {
    try {
      positions.push(createRosterPosition({ position: slot, count, is_bench: slot === 'BN' || slot === 'IR' }));
    } catch (error) {
      log.warn(`Skipping roster position ${slot}: ${errorMessage(error)}`);
    }
  }
  return positions;
}

export function convertRosterEntries(
  league: EspnLeagueResponse,
  teamMap: IdMap,
  playerMap: IdMap,
  slotMap: Map<RosterSlot, string> = new Map(),
): RosterEntry[] {
  const entries: RosterEntry[] = [];

  for (const team of league.teams ?? []) {
    const fantasyTeamId = teamMap.get(String(team.id));
    if (!fantasyTeamId) {
      continue;
    }

    for (const entry of team.roster?.entries ?? []) {
      const playerId = playerMap.get(String(entry.playerId));
      if (!playerId) {
        continue;
      }

      const slot = mapLineupSlot(entry.lineupSlotId) ?? 'BN';
      entries.push(
        createRosterEntry({
          fantasy_team_id: fantasyTeamId,
          player_id: playerId,
          roster_position_id: slotMap.get(slot) ?? slotMap.get('BN') ?? null,
          is_starting: slot !== 'BN' && slot !== 'IR',
          acquisition_type: ESPN_ACQUISITION_TYPES[entry.acquisitionType ?? ''] ?? 'Free Agent',
          acquired_date: entry.acquisitionDate ? new Date(entry.acquisitionDate).toISOString() : null,
        }),
      );
    }
  }

  return entries;
}

export function convertMatchup(item: EspnScheduleItem, teamMap: IdMap): FantasyMatchup | undefined {
  if (!item.home || !item.away) {
    return undefined;
  }

  const homeTeamId = teamMap.get(String(item.home.teamId));
  const awayTeamId = teamMap.get(String(item.away.teamId));
  if (!homeTeamId || !awayTeamId) {
    return undefined;
  }

  const winnerId = item.winner === 'HOME' ? homeTeamId : item.winner === 'AWAY' ? awayTeamId : null;

  try {
    return createFantasyMatchup({
      week: item.matchupPeriodId,
      home_team_id: homeTeamId,
      away_team_id: awayTeamId,
      home_score: item.home.totalPoints ?? 0,
      away_score: item.away.totalPoints ?? 0,
      winner_id: winnerId,
      is_playoff: item.playoffTierType !== undefined && item.playoffTierType !== 'NONE',
    });
  } catch (error) {
    log.warn(`Failed to convert matchup ${item.id}: ${errorMessage(error)}`);
    return undefined;
  }
}

export function convertMatchups(league: EspnLeagueResponse, teamMap: IdMap): FantasyMatchup[] {
  const matchups: FantasyMatchup[] = [];
  for (const item of league.schedule ?? []) {
    const matchup = convertMatchup(item, teamMap);
    if (matchup) {
      matchups.push(matchup);
    }
  }
  return matchups;
}

/** One row per team per played week, carrying the team's matchup total. */
export function convertWeeklyScores(matchups: FantasyMatchup[]): FantasyTeamWeeklyScore[] {
  return matchups
    .filter((matchup) => matchup.home_score > 0 || matchup.away_score > 0)
    .flatMap((matchup) => [
      createWeeklyScore({ fantasy_team_id: matchup.home_team_id, week: matchup.week, total_score: matchup.home_score }),
      createWeeklyScore({ fantasy_team_id: matchup.away_team_id, week: matchup.week, total_score: matchup.away_score }),
    ]);
}

export function convertNflGames(proTeams: EspnProTeam[], year: number, proTeamMap: ProTeamMap): NflGame[] {
  const seen = new Set<number>();
  const games: NflGame[] = [];

  for (const proTeam of proTeams) {
    for (const periodGames of Object.values(proTeam.proGamesByScoringPeriod ?? {})) {
      for (const game of periodGames) {
        if (seen.has(game.id)) {
          continue;
        }
        seen.add(game.id);

        const homeTeamId = proTeamMap.get(game.homeProTeamId);
        const awayTeamId = proTeamMap.get(game.awayProTeamId);
        if (!homeTeamId || !awayTeamId) {
          continue;
        }

        try {
          games.push(
            createNflGame({
              season_year: year,
              week: Number(game.scoringPeriodId),
              home_team_id: homeTeamId,
              away_team_id: awayTeamId,
              game_date: game.date ? new Date(game.date).toISOString() : null,
              game_status: game.statsOfficial ? 'Final' : 'Scheduled',
            }),
          );
        } catch (error) {
          log.warn(`Skipping NFL game ${game.id}: ${errorMessage(error)}`);
        }
      }
    }
  }

  return games;
}

/** Index games by `${week}:${nflTeamId}` for both participants. */
export function indexGamesByTeamWeek(games: NflGame[]): Map<string, string> {
  const index = new Map<string, string>();
  for (const game of games) {
    index.set(`${game.week}:${game.home_team_id}`, game.id);
    index.set(`${game.week}:${game.away_team_id}`, game.id);
  }
  return index;
}

const statValue = (stats: Record<string, number> | undefined, id: number): number =>
  Math.max(0, Math.round(stats?.[String(id)] ?? 0));

const weeklyStats = (player: EspnPlayer, sourceId: number, year: number): EspnPlayerStats[] =>
  (player.stats ?? []).filter(
    (stat) =>
      stat.statSourceId === sourceId &&
      (stat.scoringPeriodId ?? 0) > 0 &&
      (stat.seasonId === undefined || stat.seasonId === year),
  );

export type GameStatsContext = {
  playerMap: IdMap;
  proTeamMap: ProTeamMap;
  gameIndex: Map<string, string>;
  year: number;
};

export function convertGameStats(
  espnPlayers: EspnPlayer[],
  context: GameStatsContext,
): { playerStats: PlayerGameStats[]; defenseStats: TeamDefenseGameStats[] } {
  const playerStats: PlayerGameStats[] = [];
  const defenseStats: TeamDefenseGameStats[] = [];

  for (const player of espnPlayers) {
    const playerId = context.playerMap.get(String(player.id));
    const position = mapEspnPosition(player.defaultPositionId);
    if (!playerId || !position) {
      continue;
    }

    for (const stat of weeklyStats(player, STAT_SOURCE_ACTUAL, context.year)) {
      const proTeamId = stat.proTeamId ?? player.proTeamId;
      const nflTeamId = proTeamId !== undefined ? context.proTeamMap.get(proTeamId) : undefined;
      const gameId = nflTeamId ? context.gameIndex.get(`${stat.scoringPeriodId}:${nflTeamId}`) : undefined;
      if (!nflTeamId || !gameId) {
        continue;
      }

      const values = stat.stats;
      const fantasyPoints = round2(stat.appliedTotal ?? 0);

      if (position === 'DEF') {
        defenseStats.push(
          createTeamDefenseGameStats({
            nfl_team_id: nflTeamId,
            nfl_game_id: gameId,
            sacks: statValue(values, STAT.DEFENSE_SACKS),
            interceptions: statValue(values, STAT.DEFENSE_INTERCEPTIONS),
            fumbles_recovered: statValue(values, STAT.DEFENSE_FUMBLES_RECOVERED),
            safeties: statValue(values, STAT.DEFENSE_SAFETIES),
            touchdowns: statValue(values, STAT.DEFENSE_TOUCHDOWNS),
            points_allowed: statValue(values, STAT.DEFENSE_POINTS_ALLOWED),
            yards_allowed: statValue(values, STAT.DEFENSE_YARDS_ALLOWED),
            fantasy_points: fantasyPoints,
          }),
        );
        continue;
      }

      playerStats.push(
        createPlayerGameStats({
          player_id: playerId,
          nfl_game_id: gameId,
          passing_yards: statValue(values, STAT.PASSING_YARDS),
          passing_touchdowns: statValue(values, STAT.PASSING_TOUCHDOWNS),
          passing_interceptions: statValue(values, STAT.PASSING_INTERCEPTIONS),
          rushing_yards: statValue(values, STAT.RUSHING_YARDS),
          rushing_touchdowns: statValue(values, STAT.RUSHING_TOUCHDOWNS),
          receiving_yards: statValue(values, STAT.RECEIVING_YARDS),
          receiving_touchdowns: statValue(values, STAT.RECEIVING_TOUCHDOWNS),
          receptions: statValue(values, STAT.RECEPTIONS),
          targets: statValue(values, STAT.TARGETS),
          fumbles_lost: statValue(values, STAT.FUMBLES_LOST),
          field_goals_made: statValue(values, STAT.FIELD_GOALS_MADE),
          field_goals_attempted: statValue(values, STAT.FIELD_GOALS_ATTEMPTED),
          extra_points_made: statValue(values, STAT.EXTRA_POINTS_MADE),
          extra_points_attempted: statValue(values, STAT.EXTRA_POINTS_ATTEMPTED),
          fantasy_points: fantasyPoints,
        }),
      );
    }
  }

  return { playerStats, defenseStats };
}

const projected = (stats: Record<string, number> | undefined, id: number): number | null => {
  const value = stats?.[String(id)];
  return value === undefined ? null : Math.round(value);
};

export function convertProjections(espnPlayers: EspnPlayer[], playerMap: IdMap, year: number): PlayerProjection[] {
  const projections: PlayerProjection[] = [];

  for (const player of espnPlayers) {
    const playerId = playerMap.get(String(player.id));
    if (!playerId) {
      continue;
    }

    for (const stat of weeklyStats(player, STAT_SOURCE_PROJECTED, year)) {
      try {
        projections.push(
          createPlayerProjection({
            player_id: playerId,
            week: stat.scoringPeriodId ?? 0,
            season_year: year,
            source: 'ESPN',
            projected_fantasy_points: stat.appliedTotal !== undefined ? round2(stat.appliedTotal) : null,
            projected_passing_yards: projected(stat.stats, STAT.PASSING_YARDS),
            projected_passing_touchdowns: projected(stat.stats, STAT.PASSING_TOUCHDOWNS),
            projected_rushing_yards: projected(stat.stats, STAT.RUSHING_YARDS),
            projected_rushing_touchdowns: projected(stat.stats, STAT.RUSHING_TOUCHDOWNS),
            projected_receiving_yards: projected(stat.stats, STAT.RECEIVING_YARDS),
            projected_receiving_touchdowns: projected(stat.stats, STAT.RECEIVING_TOUCHDOWNS),
            projected_receptions: projected(stat.stats, STAT.RECEPTIONS),
          }),
        );
      } catch (error) {
        log.warn(`Skipping projection for player ${player.id}: ${errorMessage(error)}`);
      }
    }
  }

  return projections;
}

export function convertRankings(
  espnPlayers: EspnPlayer[],
  playerMap: IdMap,
  scoringType: ScoringType,
  year: number,
): PlayerRanking[] {
  const rankType = scoringType === 'Standard' ? 'STANDARD' : 'PPR';
  const rankings: PlayerRanking[] = [];

  for (const player of espnPlayers) {
    const playerId = playerMap.get(String(player.id));
    const position = mapEspnPosition(player.defaultPositionId);
    const rank = player.draftRanksByRankType?.[rankType]?.rank;
    if (!playerId || !position || !rank || rank < 1) {
      continue;
    }

    rankings.push(
      createPlayerRanking({
        player_id: playerId,
        position,
        source: 'ESPN',
        rank,
        season_year: year,
        notes: `${rankType} draft rank`,
      }),
    );
  }

  return rankings;
}

export function convertWaiverPriorities(league: EspnLeagueResponse, teamMap: IdMap, year: number): WaiverPriority[] {
  return (league.teams ?? [])
    .filter((team) => (team.waiverRank ?? 0) > 0 && teamMap.has(String(team.id)))
    .sort((a, b) => (a.waiverRank ?? 0) - (b.waiverRank ?? 0))
    .map((team) =>
      createWaiverPriority({
        fantasy_team_id: teamMap.get(String(team.id)) ?? '',
        priority_order: team.waiverRank ?? 0,
        season_year: year,
      }),
    );
}

export function recommendFreeAgents(
  players: Player[],
  rosterEntries: RosterEntry[],
  projections: PlayerProjection[],
  week: number,
  limit = 10,
): FreeAgentRecommendation[] {
  const rostered = new Set(rosterEntries.map((entry) => entry.player_id));
  const available = new Map(players.filter((p) => p.is_active && !rostered.has(p.id)).map((p) => [p.id, p]));

  return projections
    .filter((projection) => projection.week === week && available.has(projection.player_id))
    .filter((projection) => (projection.projected_fantasy_points ?? 0) > 0)
    .sort((a, b) => (b.projected_fantasy_points ?? 0) - (a.projected_fantasy_points ?? 0))
    .slice(0, limit)
    .map((projection, index) =>
      createFreeAgentRecommendation({
        player_id: projection.player_id,
        week,
        priority_level: Math.min(5, Math.floor(index / 2) + 1),
        recommendation_reason: `Projected ${projection.projected_fantasy_points ?? 0} pts in week ${week}`,
      }),
    );
}

export function currentWeek(league: EspnLeagueResponse): number {
  return league.status?.currentMatchupPeriod ?? league.scoringPeriodId ?? 1;
}

export function convertLeagueData(snapshot: LeagueSnapshot, proTeamMap: ProTeamMap): LeagueData {
  const { league } = snapshot;
  const year = league.seasonId;

  const leagueConfig = convertLeagueConfig(league);
  const teams = convertTeams(league);
  const espnPlayers = collectAllPlayers(league, snapshot.freeAgents);
  const players = convertPlayers(espnPlayers, proTeamMap);
  const rosterPositions = convertRosterPositions(league);

  const teamMap: IdMap = new Map(
    teams.flatMap((team) => (team.platform_team_id ? [[team.platform_team_id, team.id] as const] : [])),
  );
  const playerMap: IdMap = new Map(
    players.flatMap((player) => (player.espn_id ? [[player.espn_id, player.id] as const] : [])),
  );
  const slotMap = new Map(rosterPositions.map((position) => [position.position, position.id] as const));

  const rosterEntries = convertRosterEntries(league, teamMap, playerMap, slotMap);
  const matchups = convertMatchups(league, teamMap);
  const nflGames = convertNflGames(snapshot.proTeams, year, proTeamMap);
  const { playerStats, defenseStats } = convertGameStats(espnPlayers, {
    playerMap,
    proTeamMap,
    gameIndex: indexGamesByTeamWeek(nflGames),
    year,
  });
  const projections = convertProjections(espnPlayers, playerMap, year);

  return {
    leagueConfig,
    teams,
    players,
    rosterPositions,
    rosterEntries,
    matchups,
    weeklyScores: convertWeeklyScores(matchups),
    nflGames,
    playerStats,
    defenseStats,
    projections,
    rankings: convertRankings(espnPlayers, playerMap, leagueConfig.scoring_type, year),
    waiverPriorities: convertWaiverPriorities(league, teamMap, year),
    freeAgentRecommendations: recommendFreeAgents(players, rosterEntries, projections, currentWeek(league)),
  };
}

export async function fetchLeagueSnapshot(client: EspnClient): Promise<LeagueSnapshot> {
  let league: EspnLeagueResponse;
  try {
    league = await client.getLeague();
  } catch (error) {
    throw new EspnFantasyError(`Failed to get league data: ${errorMessage(error)}`, { cause: error });
  }

  let freeAgents: EspnKonaPlayerEntry[] = [];
  try {
    freeAgents = (await client.getFreeAgents()).players ?? [];
  } catch (error) {
    log.warn(`Could not get free agents: ${errorMessage(error)}`);
  }

  let proTeams: EspnProTeam[] = [];
  try {
    proTeams = (await client.getProTeamSchedules()).settings?.proTeams ?? [];
  } catch (error) {
    log.warn(`Could not get NFL schedule: ${errorMessage(error)}`);
  }

  return { league, freeAgents, proTeams };
}

export async function validateLeagueAccess(client: EspnClient): Promise<boolean> {
  try {
    const league = await client.getLeague(['mTeam']);
    return (league.teams?.length ?? 0) > 0;
  } catch (error) {
    log.warn(`Failed to access league ${client.leagueId}: ${errorMessage(error)}`);
    return false;
  }
}

export async function getWeeklyMatchups(client: EspnClient, week: number): Promise<FantasyMatchup[]> {
  try {
    const league = await client.getLeague(['mTeam', 'mMatchup'], week);
    const teams = convertTeams(league);
    const teamMap: IdMap = new Map(
      teams.flatMap((team) => (team.platform_team_id ? [[team.platform_team_id, team.id] as const] : [])),
    );
    return (league.schedule ?? [])
      .filter((item) => item.matchupPeriodId === week)
      .flatMap((item) => {
        const matchup = convertMatchup(item, teamMap);
        return matchup ? [matchup] : [];
      });
  } catch (error) {
    throw new EspnFantasyError(`Failed to get weekly matchups: ${errorMessage(error)}`, { cause: error });
  }
}

export async function getLeagueData(client: EspnClient, proTeamMap: ProTeamMap): Promise<LeagueData> {
  return convertLeagueData(await fetchLeagueSnapshot(client), proTeamMap);
}
