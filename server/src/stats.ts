/**
 * Derived metrics served by the dashboard endpoints. Everything here is pure
 * so routes stay a thin layer of SQL plus shaping.
 */

export type TeamRecord = {
  wins: number;
  losses: number;
  ties: number;
  points_for: number;
  points_against: number;
};

export type TeamMetrics = {
  total_games: number;
  win_percentage: number;
  average_points_for: number;
  average_points_against: number;
  point_differential: number;
};

export function teamMetrics(team: TeamRecord): TeamMetrics {
  const totalGames = team.wins + team.losses + team.ties;
  const perGame = (value: number) => (totalGames > 0 ? value / totalGames : 0);

  return {
    total_games: totalGames,
    win_percentage: perGame(team.wins),
    average_points_for: perGame(team.points_for),
    average_points_against: perGame(team.points_against),
    point_differential: team.points_for - team.points_against,
  };
}

/** Wins first, points-for second, both descending; rank starts at 1. */
export function rankStandings<T extends TeamRecord>(teams: T[]): Array<T & TeamMetrics & { rank: number }> {
  return teams
    .map((team) => ({ ...team, ...teamMetrics(team) }))
    .sort((a, b) => b.wins - a.wins || b.points_for - a.points_for)
    .map((team, index) => ({ ...team, rank: index + 1 }));
}

export type GameResult = 'W' | 'L' | 'T' | 'TBD';

export function matchupResult(teamScore: number, opponentScore: number): GameResult {
  if (teamScore === 0 && opponentScore === 0) {
    return 'TBD';
  }
  if (teamScore > opponentScore) {
    return 'W';
  }
  return teamScore < opponentScore ? 'L' : 'T';
}

export type MatchupWithTeams = {
  id: string;
  week: number;
  home_team_id: string;
  away_team_id: string;
  home_score: number;
  away_score: number;
  is_playoff: boolean;
  home_team_name: string | null;
  home_owner_name: string | null;
  away_team_name: string | null;
  away_owner_name: string | null;
};

export type ScheduleEntry = {
  week: number;
  is_home: boolean;
  opponent_id: string;
  opponent_name: string | null;
  opponent_owner: string | null;
  team_score: number;
  opponent_score: number;
  result: GameResult;
  is_playoff: boolean;
  matchup_id: string;
};

export function scheduleEntry(matchup: MatchupWithTeams, teamId: string): ScheduleEntry {
  const isHome = matchup.home_team_id === teamId;
  const teamScore = isHome ? matchup.home_score : matchup.away_score;
  const opponentScore = isHome ? matchup.away_score : matchup.home_score;

  return {
    week: matchup.week,
    is_home: isHome,
    opponent_id: isHome ? matchup.away_team_id : matchup.home_team_id,
    opponent_name: isHome ? matchup.away_team_name : matchup.home_team_name,
    opponent_owner: isHome ? matchup.away_owner_name : matchup.home_owner_name,
    team_score: teamScore,
    opponent_score: opponentScore,
    result: matchupResult(teamScore, opponentScore),
    is_playoff: matchup.is_playoff,
    matchup_id: matchup.id,
  };
}

export function groupBy<T>(rows: T[], key: (row: T) => string | number): Record<string, T[]> {
  const groups: Record<string, T[]> = {};
  for (const row of rows) {
    (groups[String(key(row))] ??= []).push(row);
  }
  return groups;
}

export function countBy<T>(rows: T[], key: (row: T) => string): Record<string, number> {
  const counts: Record<string, number> = {};
  for (const row of rows) {
    const k = key(row);
    counts[k] = (counts[k] ?? 0) + 1;
  }
  return counts;
}

export function limitGroups<T>(groups: Record<string, T[]>, limit: number): Record<string, T[]> {
  return Object.fromEntries(Object.entries(groups).map(([k, rows]) => [k, rows.slice(0, limit)]));
}

export type WeeklyScoreSummary = {
  highest_week: number;
  lowest_week: number;
  score_variance: number;
};

export function weeklyScoreSummary(scores: number[]): WeeklyScoreSummary | undefined {
  if (scores.length === 0) {
    return undefined;
  }
  const highest = Math.max(...scores);
  const lowest = Math.min(...scores);
  return { highest_week: highest, lowest_week: lowest, score_variance: highest - lowest };
}

export type SeasonSummary = {
  games_played: number;
  total_fantasy_points: number;
  average_fantasy_points: number;
};

export function seasonSummary(games: Array<{ fantasy_points: number }>): SeasonSummary {
  const total = games.reduce((sum, game) => sum + game.fantasy_points, 0);
  return {
    games_played: games.length,
    total_fantasy_points: total,
    average_fantasy_points: games.length > 0 ? total / games.length : 0,
  };
}

// Trade values: a top-ranked player is worth ~199, rank 200 and beyond nothing.
const TRADE_VALUE_CEILING = 200;
const DEFAULT_RANK = 100;
const BALANCED_THRESHOLD = 20;

export const tradeValue = (rank: number | null | undefined): number =>
  Math.max(0, TRADE_VALUE_CEILING - (rank ?? DEFAULT_RANK));

export type TradeBalance = 'Balanced' | 'Unbalanced';

export type TradeEvaluation = {
  proposing_team_value: number;
  receiving_team_value: number;
  value_difference: number;
  trade_balance: TradeBalance;
  recommendation: 'Accept' | 'Consider carefully';
};

export function evaluateTrade(
  players: Array<{ id: string; rank: number | null }>,
  proposingIds: string[],
): TradeEvaluation {
  const proposing = new Set(proposingIds);
  let proposingValue = 0;
  let receivingValue = 0;

  for (const player of players) {
    if (proposing.has(player.id)) {
      proposingValue += tradeValue(player.rank);
    } else {
      receivingValue += tradeValue(player.rank);
    }
  }

  const difference = Math.abs(proposingValue - receivingValue);
  const balance: TradeBalance = difference <= BALANCED_THRESHOLD ? 'Balanced' : 'Unbalanced';

  return {
    proposing_team_value: proposingValue,
    receiving_team_value: receivingValue,
    value_difference: difference,
    trade_balance: balance,
    recommendation: balance === 'Balanced' ? 'Accept' : 'Consider carefully',
  };
}

export type ScarcityRating = 'High' | 'Medium' | 'Low';

export const scarcityRating = (rosterPercentage: number): ScarcityRating =>
  rosterPercentage > 80 ? 'High' : rosterPercentage > 60 ? 'Medium' : 'Low';

export type PositionCounts = {
  position: string;
  total_players: number;
  rostered_players: number;
  starting_players: number;
};

export function positionalScarcity(counts: PositionCounts) {
  const rosterPercentage = counts.total_players > 0 ? (counts.rostered_players / counts.total_players) * 100 : 0;
  return {
    position: counts.position,
    total_players: counts.total_players,
    rostered_players: counts.rostered_players,
    available_players: counts.total_players - counts.rostered_players,
    starting_players: counts.starting_players,
    roster_percentage: rosterPercentage,
    scarcity_rating: scarcityRating(rosterPercentage),
  };
}

const BENCH_DISPLAY_LIMIT = 10;

/**
 * Best projected player per position starts, everyone else sits. Expects
 * players already ordered by position, then projection descending.
 */
export function optimalLineup<T extends { position: string }>(players: T[]) {
  const lineup: Record<string, T> = {};
  const bench: T[] = [];

  for (const player of players) {
    if (lineup[player.position] === undefined) {
      lineup[player.position] = player;
    } else {
      bench.push(player);
    }
  }

  return { optimal_lineup: lineup, bench_players: bench.slice(0, BENCH_DISPLAY_LIMIT) };
}

export function leagueAnalytics(
  teams: Array<TeamRecord & { team_name: string }>,
  activePlayers: Array<{ position: string }>,
) {
  const totalPointsFor = teams.reduce((sum, team) => sum + team.points_for, 0);

  let highest: (typeof teams)[number] | undefined;
  let lowest: (typeof teams)[number] | undefined;
  for (const team of teams) {
    if (!highest || team.points_for > highest.points_for) {
      highest = team;
    }
    if (!lowest || team.points_for < lowest.points_for) {
      lowest = team;
    }
  }

  return {
    league_summary: {
      total_teams: teams.length,
      total_active_players: activePlayers.length,
      total_points_scored: totalPointsFor,
      league_average_points: teams.length > 0 ? totalPointsFor / teams.length : 0,
    },
    position_distribution: countBy(activePlayers, (player) => player.position),
    team_metrics: teams.map((team) => {
      const metrics = teamMetrics(team);
      return {
        team_name: team.team_name,
        points_for: team.points_for,
        points_against: team.points_against,
        win_pct: metrics.win_percentage,
        avg_points: metrics.average_points_for,
      };
    }),
    highest_scoring_team: highest?.team_name ?? null,
    lowest_scoring_team: lowest?.team_name ?? null,
  };
}
