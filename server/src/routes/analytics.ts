import { Router } from 'express';
import { query } from '../db';
import { asyncRoute } from '../errors';
import { leagueAnalytics, optimalLineup, positionalScarcity, type PositionCounts, type TeamRecord } from '../stats';
import { LATEST_PROJECTION } from './sql';

const router = Router();

router.get(
  '/league',
  asyncRoute(async (_req, res) => {
    const { rows: teams } = await query<TeamRecord & { team_name: string }>('SELECT * FROM fantasy_teams');
    const { rows: players } = await query<{ position: string }>('SELECT position FROM players WHERE is_active');
    res.json({ analytics: leagueAnalytics(teams, players) });
  }),
);

router.get(
  '/positional',
  asyncRoute(async (_req, res) => {
    const { rows } = await query<PositionCounts>(`
      SELECT p.position,
             COUNT(*)::int AS total_players,
             COUNT(re.player_id)::int AS rostered_players,
             COUNT(*) FILTER (WHERE re.is_starting)::int AS starting_players
      FROM players p
      LEFT JOIN roster_entries re ON re.player_id = p.id
      WHERE p.is_active
      GROUP BY p.position
      ORDER BY p.position
    `);
    res.json({ positional_analysis: rows.map(positionalScarcity) });
  }),
);

router.get(
  '/optimal-lineups',
  asyncRoute(async (_req, res) => {
    const { rows: teams } = await query<{ id: string; team_name: string }>('SELECT id, team_name FROM fantasy_teams');

    const lineups = [];
    for (const team of teams) {
      const { rows: players } = await query<{ position: string }>(
        `SELECT p.*, re.is_starting, latest.projected_fantasy_points
         FROM roster_entries re
         JOIN players p ON p.id = re.player_id
         ${LATEST_PROJECTION}
         WHERE re.fantasy_team_id = $1
         ORDER BY p.position, latest.projected_fantasy_points DESC NULLS LAST, p.name`,
        [team.id],
      );
      lineups.push({ team_id: team.id, team_name: team.team_name, ...optimalLineup(players) });
    }

    res.json({ optimal_lineups: lineups });
  }),
);

export default router;
