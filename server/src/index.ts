import { createApp } from './app';
import { databaseName, migrate } from './db';
import env from './env';
import { initEspnData, isLeagueEmpty } from './espn/sync';
import { createLogger } from './logger';

const log = createLogger('server');

async function start(): Promise<void> {
  await migrate();
  log.info(`Database ready: ${databaseName()}`);

  if (env.SYNC_ON_STARTUP && (await isLeagueEmpty())) {
    log.info('Database is empty, loading ESPN league data...');
    const summary = await initEspnData();
    if (!summary.ok) {
      throw new Error(
        `ESPN data initialization failed (${summary.error ?? 'unknown error'}). Check ESPN_LEAGUE_ID and ESPN_YEAR.`,
      );
    }
    log.info('ESPN data initialization complete');
  }

  createApp().listen(env.PORT, () => log.info(`🟢 Fantasy dashboard API on :${env.PORT}`));
}

start().catch((error: unknown) => {
  log.error('Startup failed:', error);
  process.exit(1);
});
