import { Router } from 'express';
import { query } from '../db';
import { asyncRoute, HttpError } from '../errors';
import { createLogger } from '../logger';
import {
  countBy,
  rankStandings,
  scheduleEntry,
  teamMetrics,
  weeklyScoreSummary,
  type MatchupWithTeams,
  type TeamRecord,
} from '../stats';
import { MATCHUPS_WITH_TEAMS, POSITION_ORDER, ROSTER_PLAYERS } from './sql';
import { parseId } from './validate';

const log = createLogger('teams');

type TeamRow = TeamRecord & {
  id: string;
  owner_name: string;
  team_name: string;
  platform_team_id: string | null;
};

type RosterPlayerRow = {
  id: string;
  name: string;
  position: string;
  is_starting: boolean;
};

const router = Router();

async function findTeam(rawId: string): Promise<TeamRow> {
  const id = parseId(rawId, 'Team');
  const { rows } = await query<TeamRow>('SELECT * FROM fantasy_teams WHERE id = $1', [id]);
  const team = rows[0];
  if (!team) {
    throw new HttpError(404, 'Team not found');
  }
  return team;
}

router.get(
  '/teams',
  asyncRoute(async (_req, res) => {
    const { rows } = await query<TeamRow>('SELECT * FROM fantasy_teams ORDER BY team_name');
    res.json({ teams: rows });
  }),
);

router.get(
  '/teams-with-players',
  asyncRoute(async (_req, res) => {
    const { rows: teams } = await query<TeamRow>('SELECT * FROM fantasy_teams ORDER BY points_for DESC');

    const withPlayers = [];
    for (const team of teams) {
      try {
        const { rows: players } = await query<RosterPlayerRow>(
          `${ROSTER_PLAYERS} ORDER BY ${POSITION_ORDER}, re.is_starting DESC, p.name`,
          [team.id],
        );
        withPlayers.push({
          ...team,
          players,
          player_count: players.length,
          roster_composition: countBy(players, (player) => player.position),
        });
      } catch (error) {
        log.warn(`Could not load roster for team ${team.id}:`, error);
        withPlayers.push({ ...team, players: [], player_count: 0, roster_composition: {} });
      }
    }

    res.json({ teams: withPlayers });
  }),
);

router.get(
  '/teams/standings',
  asyncRoute(async (_req, res) => {
    const { rows } = await query<TeamRow>('SELECT * FROM fantasy_teams');
    res.json({ standings: rankStandings(rows) });
  }),
);

router.get(
  '/teams/:id',
  asyncRoute(async (req, res) => {
    const team = await findTeam(req.params.id);
    const { rows: roster } = await query<RosterPlayerRow>(
      `${ROSTER_PLAYERS} ORDER BY ${POSITION_ORDER}, re.is_starting DESC, p.name`,
      [team.id],
    );

    res.json({ team: { ...team, roster, ...teamMetrics(team) } });
  }),
);

router.get(
  '/teams/:id/roster',
  asyncRoute(async (req, res) => {
    const team = await findTeam(req.params.id);
    const { rows: roster } = await query<RosterPlayerRow>(
      `${ROSTER_PLAYERS} ORDER BY re.is_starting DESC, ${POSITION_ORDER}, p.name`,
      [team.id],
    );

    const startingLineup = roster.filter((player) => player.is_starting);
    const bench = roster.filter((player) => !player.is_starting);

    res.json({
      team_id: team.id,
      starting_lineup: startingLineup,
      bench,
      total_players: roster.length,
      position_counts: countBy(roster, (player) => player.position),
      roster_composition: {
        starting_players: startingLineup.length,
        bench_players: bench.length,
      },
    });
  }),
);

router.get(
  '/teams/:id/schedule',
  asyncRoute(async (req, res) => {
    const team = await findTeam(req.params.id);
    const { rows } = await query<MatchupWithTeams>(
      `${MATCHUPS_WITH_TEAMS} WHERE m.home_team_id = $1 OR m.away_team_id = $1 ORDER BY m.week`,
      [team.id],
    );

    res.json({
      team_id: team.id,
      team_name: team.team_name,
      schedule: rows.map((matchup) => scheduleEntry(matchup, team.id)),
    });
  }),
);

router.get(
  '/teams/:id/stats',
  asyncRoute(async (req, res) => {
    const team = await findTeam(req.params.id);
    const { rows: weeklyScores } = await query<{
      week: number;
      total_score: number;
      bench_score: number;
      optimal_score: number;
    }>(
      `SELECT week, total_score, bench_score, optimal_score
       FROM fantasy_team_weekly_scores
       WHERE fantasy_team_id = $1
       ORDER BY week`,
      [team.id],
    );

    const metrics = teamMetrics(team);

    res.json({
      stats: {
        team_id: team.id,
        team_name: team.team_name,
        owner_name: team.owner_name,
        record: {
          wins: team.wins,
          losses: team.losses,
          ties: team.ties,
          total_games: metrics.total_games,
          win_percentage: metrics.win_percentage,
        },
        scoring: {
          points_for: team.points_for,
          points_against: team.points_against,
          point_differential: metrics.point_differential,
          average_points_for: metrics.average_points_for,
          average_points_against: metrics.average_points_against,
          ...weeklyScoreSummary(weeklyScores.map((score) => score.total_score)),
        },
        weekly_scores: weeklyScores,
      },
    });
  }),
);

export default router;
