import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['server/src/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'error',
      USE_ESPN_SCRAPER: 'true',
      ESPN_SCRAPER_HOST: 'https://lm-api-reads.fantasy.espn.com',
      SWID: '{test-swid}',
      ESPN_S2: 'test-secret',
      ESPN_LEAGUE_ID: '1234',
      ESPN_YEAR: '2024',
    },
  },
});
