import { Router } from 'express';
import { migrate } from '../db';
import { asyncRoute } from '../errors';
import { initEspnData } from '../espn/sync';

const router = Router();

// Ensure the schema exists (idempotent)
router.post(
  '/migrate',
  asyncRoute(async (_req, res) => {
    await migrate();
    res.json({ ok: true });
  }),
);

// Full refresh from ESPN
router.post(
  '/sync',
  asyncRoute(async (_req, res) => {
    const summary = await initEspnData();
    res.status(summary.ok ? 200 : 502).json(summary);
  }),
);

export default router;
