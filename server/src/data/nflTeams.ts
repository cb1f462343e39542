import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { CONFERENCES, DIVISIONS, createNflTeam, type NflTeam } from '../models';

const nflTeamFileSchema = z.array(
  z.object({
    espn_id: z.number().int(),
    team_code: z.string(),
    team_name: z.string(),
    city: z.string(),
    conference: z.enum(CONFERENCES),
    division: z.enum(DIVISIONS),
  }),
);

export type NflTeamSeed = {
  espnId: number;
  team: NflTeam;
};

let cached: NflTeamSeed[] | undefined;

export function loadNflTeams(): NflTeamSeed[] {
  if (cached) {
    return cached;
  }

  const raw = readFileSync(new URL('./nfl-teams.json', import.meta.url), 'utf8');
  const rows = nflTeamFileSchema.parse(JSON.parse(raw));

  cached = rows.map(({ espn_id, ...team }) => ({ espnId: espn_id, team: createNflTeam(team) }));
  return cached;
}
