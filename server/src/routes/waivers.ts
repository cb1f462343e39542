import { Router } from 'express';
import { query } from '../db';
import { asyncRoute } from '../errors';
import { groupBy, limitGroups } from '../stats';
import { BEST_RANKING, LATEST_PROJECTION } from './sql';

const router = Router();

const RECOMMENDATION_LIMIT = 50;
const PER_POSITION_LIMIT = 10;

router.get(
  '/recommendations',
  asyncRoute(async (_req, res) => {
    const { rows } = await query<{ position: string }>(
      `SELECT p.*, nt.team_name AS nfl_team_name,
              best.rank, best.tier, latest.projected_fantasy_points
       FROM players p
       LEFT JOIN nfl_teams nt ON nt.id = p.nfl_team_id
       LEFT JOIN roster_entries re ON re.player_id = p.id
       ${BEST_RANKING}
       ${LATEST_PROJECTION}
       WHERE re.player_id IS NULL
         AND p.is_active
         AND (best.rank IS NOT NULL OR latest.projected_fantasy_points IS NOT NULL)
       ORDER BY best.rank ASC NULLS LAST, latest.projected_fantasy_points DESC NULLS LAST
       LIMIT $1`,
      [RECOMMENDATION_LIMIT],
    );

    // Pickups scored during the last sync, best first.
    const { rows: weekly } = await query(`
      SELECT far.*, p.name, p.position
      FROM free_agent_recommendations far
      JOIN players p ON p.id = far.player_id
      ORDER BY far.week DESC, far.priority_level ASC
    `);

    res.json({
      recommendations: rows,
      recommendations_by_position: limitGroups(
        groupBy(rows, (player) => player.position),
        PER_POSITION_LIMIT,
      ),
      total_recommendations: rows.length,
      weekly_pickups: weekly,
    });
  }),
);

router.get(
  '/priority',
  asyncRoute(async (_req, res) => {
    const { rows } = await query(`
      SELECT wp.*, ft.team_name, ft.owner_name
      FROM waiver_priorities wp
      JOIN fantasy_teams ft ON ft.id = wp.fantasy_team_id
      ORDER BY wp.priority_order
    `);
    res.json({ waiver_order: rows, total_teams: rows.length });
  }),
);

export default router;
