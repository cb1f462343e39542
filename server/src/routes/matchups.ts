import { Router } from 'express';
import { z } from 'zod';
import { query } from '../db';
import { asyncRoute, HttpError } from '../errors';
import { groupBy, type MatchupWithTeams } from '../stats';
import { MATCHUPS_WITH_TEAMS } from './sql';
import { parseId, parseInput } from './validate';

const router = Router();

const weekParamSchema = z.coerce
  .number({ invalid_type_error: 'week must be a number' })
  .int('week must be an integer');

const MATCHUP_ROSTER = `
  SELECT p.*, re.is_starting, nt.team_name AS nfl_team_name
  FROM roster_entries re
  JOIN players p ON p.id = re.player_id
  LEFT JOIN nfl_teams nt ON nt.id = p.nfl_team_id
  WHERE re.fantasy_team_id = $1
  ORDER BY re.is_starting DESC, p.position, p.name`;

router.get(
  '/',
  asyncRoute(async (_req, res) => {
    const { rows } = await query<MatchupWithTeams>(`${MATCHUPS_WITH_TEAMS} ORDER BY m.week, m.created_at`);
    res.json({
      matchups: rows,
      matchups_by_week: groupBy(rows, (matchup) => matchup.week),
      total_matchups: rows.length,
    });
  }),
);

router.get(
  '/week/:week',
  asyncRoute(async (req, res) => {
    const week = parseInput(weekParamSchema, req.params.week);
    const { rows } = await query<MatchupWithTeams>(`${MATCHUPS_WITH_TEAMS} WHERE m.week = $1 ORDER BY m.created_at`, [
      week,
    ]);
    res.json({ week, matchups: rows, total_matchups: rows.length });
  }),
);

router.get(
  '/:id',
  asyncRoute(async (req, res) => {
    const id = parseId(req.params.id, 'Matchup');
    const { rows } = await query<MatchupWithTeams>(`${MATCHUPS_WITH_TEAMS} WHERE m.id = $1`, [id]);
    const matchup = rows[0];
    if (!matchup) {
      throw new HttpError(404, 'Matchup not found');
    }

    const { rows: homeRoster } = await query(MATCHUP_ROSTER, [matchup.home_team_id]);
    const { rows: awayRoster } = await query(MATCHUP_ROSTER, [matchup.away_team_id]);

    res.json({ matchup: { ...matchup, home_roster: homeRoster, away_roster: awayRoster } });
  }),
);

export default router;
