import { migrate, pool } from '../db';
import { initEspnData } from '../espn/sync';
import { createLogger } from '../logger';

const log = createLogger('sync-cli');

async function main(): Promise<number> {
  await migrate();
  const summary = await initEspnData();
  if (!summary.ok) {
    return 1;
  }

  for (const [table, count] of Object.entries(summary.counts)) {
    log.info(`${table}: ${count}`);
  }
  return 0;
}

void main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    log.error('Sync failed:', error);
    process.exitCode = 1;
  })
  .finally(() => pool.end());
