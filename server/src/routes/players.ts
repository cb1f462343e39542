import { Router } from 'express';
import { z } from 'zod';
import { query } from '../db';
import { asyncRoute, HttpError } from '../errors';
import { POSITIONS } from '../models';
import { groupBy, seasonSummary } from '../stats';
import { isId, optionalWeek, parseId, parseInput } from './validate';

const router = Router();

type PlayerRow = {
  id: string;
  name: string;
  position: string;
  nfl_team_name: string | null;
};

const listQuerySchema = z.object({
  position: z.enum(POSITIONS).optional(),
  // An empty search box means no name filter.
  q: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() === '' ? undefined : value),
    z.string().trim().optional(),
  ),
});

const rankingsQuerySchema = z.object({
  position: z.enum(POSITIONS).optional(),
  week: optionalWeek,
});

const projectionsQuerySchema = z.object({ week: optionalWeek });

const compareBodySchema = z
  .union([
    z.array(z.string()),
    z.object({ player_ids: z.array(z.string({ invalid_type_error: 'player_ids must be strings' })) }),
  ])
  .transform((body) => (Array.isArray(body) ? body : body.player_ids));

async function findPlayer(rawId: string): Promise<{ id: string; name: string; position: string }> {
  const id = parseId(rawId, 'Player');
  const { rows } = await query<{ id: string; name: string; position: string }>(
    'SELECT id, name, position FROM players WHERE id = $1',
    [id],
  );
  const player = rows[0];
  if (!player) {
    throw new HttpError(404, 'Player not found');
  }
  return player;
}

// List players (basic filters)
router.get(
  '/',
  asyncRoute(async (req, res) => {
    const { position, q } = parseInput(listQuerySchema, req.query);
    const params: unknown[] = [];
    const where: string[] = [];
    if (position) {
      params.push(position);
      where.push(`position = $${params.length}`);
    }
    if (q) {
      params.push(`%${q}%`);
      where.push(`name ILIKE $${params.length}`);
    }

    const sql = `SELECT * FROM players ${where.length ? 'WHERE ' + where.join(' AND ') : ''} ORDER BY name ASC`;
    const { rows } = await query(sql, params);
    res.json({ players: rows });
  }),
);

router.get(
  '/available',
  asyncRoute(async (_req, res) => {
    const { rows } = await query<PlayerRow>(`
      SELECT p.*, nt.team_name AS nfl_team_name, nt.team_code AS nfl_team_code
      FROM players p
      LEFT JOIN nfl_teams nt ON nt.id = p.nfl_team_id
      LEFT JOIN roster_entries re ON re.player_id = p.id
      WHERE re.player_id IS NULL AND p.is_active
      ORDER BY p.position, p.name
    `);

    res.json({
      available_players: rows,
      available_by_position: groupBy(rows, (player) => player.position),
      total_available: rows.length,
    });
  }),
);

router.get(
  '/rankings',
  asyncRoute(async (req, res) => {
    const { position, week } = parseInput(rankingsQuerySchema, req.query);
    const params: unknown[] = [];
    let sql = `
      SELECT pr.*, p.name, p.position AS player_position,
             nt.team_name AS nfl_team_name, nt.team_code AS nfl_team_code
      FROM player_rankings pr
      JOIN players p ON p.id = pr.player_id
      LEFT JOIN nfl_teams nt ON nt.id = p.nfl_team_id
      WHERE TRUE`;
    if (position) {
      params.push(position);
      sql += ` AND pr.position = $${params.length}`;
    }
    if (week) {
      params.push(week);
      sql += ` AND pr.week = $${params.length}`;
    }
    sql += ' ORDER BY pr.position, pr.rank';

    const { rows } = await query<{ position: string }>(sql, params);
    res.json({
      rankings: rows,
      rankings_by_position: groupBy(rows, (ranking) => ranking.position),
      filters: { position: position ?? null, week: week ?? null },
    });
  }),
);

router.post(
  '/compare',
  asyncRoute(async (req, res) => {
    const playerIds = parseInput(compareBodySchema, req.body);
    if (playerIds.length < 2) {
      throw new HttpError(400, 'Must provide at least 2 player IDs');
    }

    const comparison = [];
    for (const id of playerIds.filter(isId)) {
      const { rows } = await query<PlayerRow>(
        `SELECT p.*, nt.team_name AS nfl_team_name, nt.team_code AS nfl_team_code
         FROM players p
         LEFT JOIN nfl_teams nt ON nt.id = p.nfl_team_id
         WHERE p.id = $1`,
        [id],
      );
      const player = rows[0];
      if (!player) {
        continue;
      }

      const { rows: projections } = await query(
        'SELECT * FROM player_projections WHERE player_id = $1 ORDER BY week DESC, created_at DESC LIMIT 5',
        [id],
      );
      const { rows: rankings } = await query(
        'SELECT * FROM player_rankings WHERE player_id = $1 ORDER BY created_at DESC LIMIT 3',
        [id],
      );

      comparison.push({ ...player, recent_projections: projections, rankings });
    }

    if (comparison.length < 2) {
      throw new HttpError(400, 'Could not find enough valid players to compare');
    }

    res.json({
      comparison,
      comparison_summary: {
        total_players: comparison.length,
        positions: [...new Set(comparison.map((player) => player.position))],
        teams: [
          ...new Set(comparison.flatMap((player) => (player.nfl_team_name ? [player.nfl_team_name] : []))),
        ],
      },
    });
  }),
);

router.get(
  '/:id',
  asyncRoute(async (req, res) => {
    const id = parseId(req.params.id, 'Player');
    const { rows } = await query(
      `SELECT p.*, nt.team_name AS nfl_team_name, nt.team_code AS nfl_team_code,
              nt.conference, nt.division
       FROM players p
       LEFT JOIN nfl_teams nt ON nt.id = p.nfl_team_id
       WHERE p.id = $1`,
      [id],
    );
    const player = rows[0];
    if (!player) {
      throw new HttpError(404, 'Player not found');
    }

    const { rows: roster } = await query(
      `SELECT ft.id AS fantasy_team_id, ft.team_name, ft.owner_name,
              re.is_starting, re.acquisition_type, re.acquired_date
       FROM roster_entries re
       JOIN fantasy_teams ft ON ft.id = re.fantasy_team_id
       WHERE re.player_id = $1`,
      [id],
    );

    res.json({ player: { ...player, fantasy_team: roster[0] ?? null } });
  }),
);

router.get(
  '/:id/projections',
  asyncRoute(async (req, res) => {
    const player = await findPlayer(req.params.id);
    const { week } = parseInput(projectionsQuerySchema, req.query);

    const params: unknown[] = [player.id];
    let sql = 'SELECT * FROM player_projections WHERE player_id = $1';
    if (week) {
      params.push(week);
      sql += ` AND week = $${params.length}`;
    }
    sql += ' ORDER BY week DESC, created_at DESC';

    const { rows } = await query(sql, params);
    res.json({
      player_id: player.id,
      player_name: player.name,
      projections: rows,
      total_projections: rows.length,
    });
  }),
);

router.get(
  '/:id/stats',
  asyncRoute(async (req, res) => {
    const player = await findPlayer(req.params.id);
    const { rows } = await query<{ fantasy_points: number }>(
      `SELECT pgs.*, ng.week, ng.season_year, ng.game_date,
              ht.team_name AS home_team, at.team_name AS away_team
       FROM player_game_stats pgs
       JOIN nfl_games ng ON ng.id = pgs.nfl_game_id
       JOIN nfl_teams ht ON ht.id = ng.home_team_id
       JOIN nfl_teams at ON at.id = ng.away_team_id
       WHERE pgs.player_id = $1
       ORDER BY ng.season_year DESC, ng.week DESC`,
      [player.id],
    );

    res.json({
      player_id: player.id,
      player_name: player.name,
      position: player.position,
      game_stats: rows,
      season_summary: seasonSummary(rows),
    });
  }),
);

export default router;
