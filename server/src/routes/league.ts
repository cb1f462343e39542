import { Router } from 'express';
import { query } from '../db';
import { asyncRoute, HttpError } from '../errors';

const router = Router();

router.get(
  '/',
  asyncRoute(async (_req, res) => {
    const { rows } = await query(
      'SELECT * FROM league_config WHERE is_active ORDER BY season_year DESC, created_at DESC LIMIT 1',
    );
    const league = rows[0];
    if (!league) {
      throw new HttpError(404, 'No league configured');
    }
    res.json({ league });
  }),
);

export default router;
