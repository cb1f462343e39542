import { fileURLToPath } from 'node:url';
import cors from 'cors';
import express from 'express';
import { databaseName } from './db';
import env from './env';
import { errorHandler, notFound } from './errors';
import adminRouter from './routes/admin';
import analyticsRouter from './routes/analytics';
import leagueRouter from './routes/league';
import matchupsRouter from './routes/matchups';
import playersRouter from './routes/players';
import teamsRouter from './routes/teams';
import tradesRouter from './routes/trades';
import waiversRouter from './routes/waivers';

const STATIC_DIR = fileURLToPath(new URL('../../static/', import.meta.url));

export function createApp() {
  const app = express();
  app.use(cors({ origin: env.CORS_ORIGIN }));
  app.use(express.json());
  app.use('/static', express.static(STATIC_DIR));

  app.get('/', (_req, res) => res.sendFile('index.html', { root: STATIC_DIR }));
  app.get('/health', (_req, res) => res.json({ ok: true, status: 'healthy', database: databaseName() }));

  app.use('/api', teamsRouter);
  app.use('/api/league', leagueRouter);
  app.use('/api/players', playersRouter);
  app.use('/api/matchups', matchupsRouter);
  app.use('/api/trades', tradesRouter);
  app.use('/api/analytics', analyticsRouter);
  app.use('/api/waivers', waiversRouter);
  app.use('/admin', adminRouter);

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
