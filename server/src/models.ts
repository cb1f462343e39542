import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { ValidationError } from './errors';

export const POSITIONS = ['QB', 'RB', 'WR', 'TE', 'K', 'DEF', 'FLEX', 'SUPERFLEX'] as const;
export type Position = (typeof POSITIONS)[number];

export const ROSTER_SLOTS = [...POSITIONS, 'BN', 'IR'] as const;
export type RosterSlot = (typeof ROSTER_SLOTS)[number];

export const CONFERENCES = ['AFC', 'NFC'] as const;
export type Conference = (typeof CONFERENCES)[number];

export const DIVISIONS = ['East', 'West', 'North', 'South'] as const;
export type Division = (typeof DIVISIONS)[number];

export const SCORING_TYPES = ['Standard', 'PPR', 'Half-PPR'] as const;
export type ScoringType = (typeof SCORING_TYPES)[number];

export const PLATFORMS = ['ESPN', 'Yahoo', 'Sleeper', 'Custom'] as const;
export type Platform = (typeof PLATFORMS)[number];

export const ACQUISITION_TYPES = ['Draft', 'Waiver', 'Trade', 'Free Agent'] as const;
export type AcquisitionType = (typeof ACQUISITION_TYPES)[number];

export const TRADE_STATUSES = ['Pending', 'Accepted', 'Rejected', 'Expired'] as const;
export type TradeStatus = (typeof TRADE_STATUSES)[number];

export const GAME_STATUSES = ['Scheduled', 'In Progress', 'Final'] as const;
export type GameStatus = (typeof GAME_STATUSES)[number];

const uuid = () => z.string().default(() => randomUUID());
const optional = <T extends z.ZodTypeAny>(schema: T) => schema.nullable().default(null);

const text = (label: string, max: number) =>
  z
    .string()
    .min(1, `${label} must be 1-${max} characters`)
    .max(max, `${label} must be 1-${max} characters`);

const intRange = (label: string, min: number, max: number) =>
  z.number().int().min(min, `${label} must be ${min}-${max}`).max(max, `${label} must be ${min}-${max}`);

const week = () => intRange('Week', 1, 21);
const seasonYear = () => intRange('Season year', 2000, 2030);
const nonNegative = (label: string) => z.number().min(0, `${label} must be non-negative`);
const counting = () => z.number().int().min(0, 'All stat values must be non-negative').default(0);
const improvement = () => optional(z.number().min(-100, 'Roster improvement must be -100 to 100').max(100, 'Roster improvement must be -100 to 100'));

export const nflTeamSchema = z.object({
  id: uuid(),
  team_code: text('Team code', 3),
  team_name: text('Team name', 50),
  city: text('City', 30),
  conference: z.enum(CONFERENCES),
  division: z.enum(DIVISIONS),
});

export const playerSchema = z.object({
  id: uuid(),
  name: text('Player name', 100),
  position: z.enum(POSITIONS),
  nfl_team_id: optional(z.string()),
  espn_id: optional(z.string()),
  jersey_number: optional(intRange('Jersey number', 0, 99)),
  height: optional(z.string()),
  weight: optional(intRange('Weight', 100, 400)),
  age: optional(intRange('Age', 18, 50)),
  experience_years: optional(intRange('Experience years', 0, 25)),
  college: optional(z.string()),
  is_active: z.boolean().default(true),
  is_injured: z.boolean().default(false),
  injury_status: optional(z.string()),
});

export const leagueConfigSchema = z.object({
  id: uuid(),
  league_name: text('League name', 100),
  platform: z.enum(PLATFORMS),
  platform_league_id: optional(z.string()),
  season_year: seasonYear(),
  scoring_type: z.enum(SCORING_TYPES).default('PPR'),
  team_count: optional(intRange('Team count', 2, 32)),
  playoff_teams: optional(intRange('Playoff teams', 2, 16)),
  is_active: z.boolean().default(true),
});

export const fantasyTeamSchema = z.object({
  id: uuid(),
  owner_name: text('Owner name', 100),
  team_name: text('Team name', 100),
  platform_team_id: optional(z.string()),
  wins: z.number().int().min(0, 'Record values must be non-negative').default(0),
  losses: z.number().int().min(0, 'Record values must be non-negative').default(0),
  ties: z.number().int().min(0, 'Record values must be non-negative').default(0),
  points_for: z.number().min(0, 'Points values must be non-negative').default(0),
  points_against: z.number().min(0, 'Points values must be non-negative').default(0),
});

export const rosterPositionSchema = z.object({
  id: uuid(),
  position: z.enum(ROSTER_SLOTS),
  count: intRange('Position count', 0, 10),
  is_bench: z.boolean().default(false),
});

export const rosterEntrySchema = z.object({
  id: uuid(),
  fantasy_team_id: z.string(),
  player_id: z.string(),
  roster_position_id: optional(z.string()),
  is_starting: z.boolean().default(false),
  acquired_date: optional(z.string()),
  acquisition_type: optional(z.enum(ACQUISITION_TYPES)),
});

export const nflGameSchema = z.object({
  id: uuid(),
  season_year: seasonYear(),
  week: week(),
  home_team_id: z.string(),
  away_team_id: z.string(),
  game_date: optional(z.string()),
  home_score: optional(nonNegative('Home score').int()),
  away_score: optional(nonNegative('Away score').int()),
  game_status: z.enum(GAME_STATUSES).default('Scheduled'),
});

export const playerGameStatsSchema = z.object({
  id: uuid(),
  player_id: z.string(),
  nfl_game_id: z.string(),
  passing_yards: counting(),
  passing_touchdowns: counting(),
  passing_interceptions: counting(),
  rushing_yards: counting(),
  rushing_touchdowns: counting(),
  receiving_yards: counting(),
  receiving_touchdowns: counting(),
  receptions: counting(),
  targets: counting(),
  fumbles_lost: counting(),
  field_goals_made: counting(),
  field_goals_attempted: counting(),
  extra_points_made: counting(),
  extra_points_attempted: counting(),
  fantasy_points: z.number().default(0),
});

export const teamDefenseGameStatsSchema = z.object({
  id: uuid(),
  nfl_team_id: z.string(),
  nfl_game_id: z.string(),
  sacks: counting(),
  interceptions: counting(),
  fumbles_recovered: counting(),
  safeties: counting(),
  touchdowns: counting(),
  points_allowed: counting(),
  yards_allowed: counting(),
  fantasy_points: z.number().default(0),
});

export const fantasyMatchupSchema = z.object({
  id: uuid(),
  week: week(),
  home_team_id: z.string(),
  away_team_id: z.string(),
  home_score: nonNegative('Scores').default(0),
  away_score: nonNegative('Scores').default(0),
  winner_id: optional(z.string()),
  is_playoff: z.boolean().default(false),
});

export const weeklyScoreSchema = z.object({
  id: uuid(),
  fantasy_team_id: z.string(),
  week: week(),
  total_score: nonNegative('All scores').default(0),
  bench_score: nonNegative('All scores').default(0),
  optimal_score: nonNegative('All scores').default(0),
});

export const playerProjectionSchema = z.object({
  id: uuid(),
  player_id: z.string(),
  week: week(),
  season_year: seasonYear(),
  source: text('Source', 50),
  projected_fantasy_points: optional(z.number()),
  projected_passing_yards: optional(z.number().int()),
  projected_passing_touchdowns: optional(z.number().int()),
  projected_rushing_yards: optional(z.number().int()),
  projected_rushing_touchdowns: optional(z.number().int()),
  projected_receiving_yards: optional(z.number().int()),
  projected_receiving_touchdowns: optional(z.number().int()),
  projected_receptions: optional(z.number().int()),
  confidence_rating: optional(intRange('Confidence rating', 1, 10)),
});

export const playerRankingSchema = z.object({
  id: uuid(),
  player_id: z.string(),
  position: z.enum(POSITIONS),
  source: text('Source', 50),
  rank: z.number().int().min(1, 'Rank must be positive'),
  week: optional(week()),
  season_year: optional(seasonYear()),
  tier: optional(z.number().int().min(1, 'Tier must be positive')),
  notes: optional(z.string()),
});

export const tradeProposalSchema = z.object({
  id: uuid(),
  proposing_team_id: z.string(),
  receiving_team_id: z.string(),
  status: z.enum(TRADE_STATUSES).default('Pending'),
  proposed_date: z.string().default(() => new Date().toISOString()),
  response_date: optional(z.string()),
  notes: optional(z.string()),
});

export const tradeItemSchema = z
  .object({
    id: uuid(),
    trade_proposal_id: z.string(),
    team_id: z.string(),
    player_id: optional(z.string()),
    draft_round: optional(intRange('Draft round', 1, 20)),
    draft_pick_year: optional(intRange('Draft pick year', 2000, 2030)),
  })
  .refine((item) => item.player_id !== null || (item.draft_round !== null && item.draft_pick_year !== null), {
    message: 'Must specify either player_id or draft pick details',
  });

export const tradeAnalysisSchema = z.object({
  id: uuid(),
  trade_proposal_id: z.string(),
  team_a_value: optional(z.number()),
  team_b_value: optional(z.number()),
  team_a_roster_improvement: improvement(),
  team_b_roster_improvement: improvement(),
  analysis_notes: optional(z.string()),
});

export const waiverPrioritySchema = z.object({
  id: uuid(),
  fantasy_team_id: z.string(),
  priority_order: z.number().int().min(1, 'Priority order must be positive'),
  season_year: seasonYear(),
});

export const freeAgentRecommendationSchema = z.object({
  id: uuid(),
  player_id: z.string(),
  week: week(),
  recommendation_reason: optional(z.string()),
  priority_level: optional(intRange('Priority level', 1, 5)),
  projected_roster_impact: optional(
    z.number().min(-100, 'Projected roster impact must be -100 to 100').max(100, 'Projected roster impact must be -100 to 100'),
  ),
});

export type NflTeam = z.output<typeof nflTeamSchema>;
export type Player = z.output<typeof playerSchema>;
export type LeagueConfig = z.output<typeof leagueConfigSchema>;
export type FantasyTeam = z.output<typeof fantasyTeamSchema>;
export type RosterPosition = z.output<typeof rosterPositionSchema>;
export type RosterEntry = z.output<typeof rosterEntrySchema>;
export type NflGame = z.output<typeof nflGameSchema>;
export type PlayerGameStats = z.output<typeof playerGameStatsSchema>;
export type TeamDefenseGameStats = z.output<typeof teamDefenseGameStatsSchema>;
export type FantasyMatchup = z.output<typeof fantasyMatchupSchema>;
export type FantasyTeamWeeklyScore = z.output<typeof weeklyScoreSchema>;
export type PlayerProjection = z.output<typeof playerProjectionSchema>;
export type PlayerRanking = z.output<typeof playerRankingSchema>;
export type TradeProposal = z.output<typeof tradeProposalSchema>;
export type TradeItem = z.output<typeof tradeItemSchema>;
export type TradeAnalysis = z.output<typeof tradeAnalysisSchema>;
export type WaiverPriority = z.output<typeof waiverPrioritySchema>;
export type FreeAgentRecommendation = z.output<typeof freeAgentRecommendationSchema>;

function build<Out, In>(entity: string, schema: z.ZodType<Out, z.ZodTypeDef, In>, input: In): Out {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(entity, result.error.issues);
  }
  return result.data;
}

export const createNflTeam = (input: z.input<typeof nflTeamSchema>) => build('NFL team', nflTeamSchema, input);
export const createPlayer = (input: z.input<typeof playerSchema>) => build('player', playerSchema, input);
export const createLeagueConfig = (input: z.input<typeof leagueConfigSchema>) =>
  build('league config', leagueConfigSchema, input);
export const createFantasyTeam = (input: z.input<typeof fantasyTeamSchema>) =>
  build('fantasy team', fantasyTeamSchema, input);
export const createRosterPosition = (input: z.input<typeof rosterPositionSchema>) =>
  build('roster position', rosterPositionSchema, input);
export const createRosterEntry = (input: z.input<typeof rosterEntrySchema>) =>
  build('roster entry', rosterEntrySchema, input);
export const createNflGame = (input: z.input<typeof nflGameSchema>) => build('NFL game', nflGameSchema, input);
export const createPlayerGameStats = (input: z.input<typeof playerGameStatsSchema>) =>
  build('player game stats', playerGameStatsSchema, input);
export const createTeamDefenseGameStats = (input: z.input<typeof teamDefenseGameStatsSchema>) =>
  build('team defense game stats', teamDefenseGameStatsSchema, input);
export const createFantasyMatchup = (input: z.input<typeof fantasyMatchupSchema>) =>
  build('fantasy matchup', fantasyMatchupSchema, input);
export const createWeeklyScore = (input: z.input<typeof weeklyScoreSchema>) =>
  build('weekly score', weeklyScoreSchema, input);
export const createPlayerProjection = (input: z.input<typeof playerProjectionSchema>) =>
  build('player projection', playerProjectionSchema, input);
export const createPlayerRanking = (input: z.input<typeof playerRankingSchema>) =>
  build('player ranking', playerRankingSchema, input);
export const createTradeProposal = (input: z.input<typeof tradeProposalSchema>) =>
  build('trade proposal', tradeProposalSchema, input);
export const createTradeItem = (input: z.input<typeof tradeItemSchema>) => build('trade item', tradeItemSchema, input);
export const createTradeAnalysis = (input: z.input<typeof tradeAnalysisSchema>) =>
  build('trade analysis', tradeAnalysisSchema, input);
export const createWaiverPriority = (input: z.input<typeof waiverPrioritySchema>) =>
  build('waiver priority', waiverPrioritySchema, input);
export const createFreeAgentRecommendation = (input: z.input<typeof freeAgentRecommendationSchema>) =>
  build('free agent recommendation', freeAgentRecommendationSchema, input);
