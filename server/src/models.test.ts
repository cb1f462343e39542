import { describe, expect, it } from 'vitest';
import { ValidationError } from './errors';
import {
  createFantasyMatchup,
  createFantasyTeam,
  createFreeAgentRecommendation,
  createLeagueConfig,
  createNflTeam,
  createPlayer,
  createPlayerGameStats,
  createPlayerRanking,
  createRosterPosition,
  createTradeAnalysis,
  createTradeItem,
  createWeeklyScore,
  playerSchema,
} from './models';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

describe('createPlayer', () => {
  it('fills defaults and generates an id', () => {
    const player = createPlayer({ name: 'Test Runner', position: 'RB' });

    expect(player.id).toMatch(UUID);
    expect(player.is_active).toBe(true);
    expect(player.is_injured).toBe(false);
    expect(player.nfl_team_id).toBeNull();
    expect(player.jersey_number).toBeNull();
  });

  it('keeps an explicit id', () => {
    expect(createPlayer({ id: 'fixed-id', name: 'Test Runner', position: 'RB' }).id).toBe('fixed-id');
  });

  it('rejects out-of-range jersey numbers', () => {
    expect(() => createPlayer({ name: 'Test Runner', position: 'RB', jersey_number: 100 })).toThrow(
      'Invalid player: Jersey number must be 0-99',
    );
  });

  it('rejects an empty name', () => {
    expect(() => createPlayer({ name: '', position: 'QB' })).toThrow(ValidationError);
    expect(() => createPlayer({ name: '', position: 'QB' })).toThrow('Player name must be 1-100 characters');
  });

  it('rejects unknown positions', () => {
    expect(playerSchema.safeParse({ name: 'Test Punter', position: 'P' }).success).toBe(false);
  });
});

describe('createNflTeam', () => {
  it('limits team codes to three characters', () => {
    expect(() =>
      createNflTeam({ team_code: 'ABCD', team_name: 'Testers', city: 'Test City', conference: 'AFC', division: 'East' }),
    ).toThrow('Team code must be 1-3 characters');
  });
});

describe('createLeagueConfig', () => {
  it('defaults to PPR and active', () => {
    const config = createLeagueConfig({ league_name: 'Test League', platform: 'ESPN', season_year: 2024 });
    expect(config.scoring_type).toBe('PPR');
    expect(config.is_active).toBe(true);
  });

  it('validates season year and team count', () => {
    expect(() => createLeagueConfig({ league_name: 'L', platform: 'ESPN', season_year: 1999 })).toThrow(
      'Season year must be 2000-2030',
    );
    expect(() => createLeagueConfig({ league_name: 'L', platform: 'ESPN', season_year: 2024, team_count: 1 })).toThrow(
      'Team count must be 2-32',
    );
  });
});

describe('createFantasyTeam', () => {
  it('rejects negative records and points', () => {
    expect(() => createFantasyTeam({ owner_name: 'O', team_name: 'T', wins: -1 })).toThrow(
      'Record values must be non-negative',
    );
    expect(() => createFantasyTeam({ owner_name: 'O', team_name: 'T', points_for: -0.5 })).toThrow(
      'Points values must be non-negative',
    );
  });
});

describe('createRosterPosition', () => {
  it('caps slot counts at ten', () => {
    expect(() => createRosterPosition({ position: 'BN', count: 11 })).toThrow('Position count must be 0-10');
  });
});

describe('game stats', () => {
  it('allows negative fantasy points but not negative counting stats', () => {
    const stats = createPlayerGameStats({ player_id: 'p', nfl_game_id: 'g', fantasy_points: -2.4 });
    expect(stats.fantasy_points).toBe(-2.4);
    expect(stats.receptions).toBe(0);

    expect(() => createPlayerGameStats({ player_id: 'p', nfl_game_id: 'g', rushing_yards: -3 })).toThrow(
      'All stat values must be non-negative',
    );
  });
});

describe('matchups and scores', () => {
  it('restricts weeks to 1-21', () => {
    expect(() => createFantasyMatchup({ week: 22, home_team_id: 'a', away_team_id: 'b' })).toThrow(
      'Week must be 1-21',
    );
  });

  it('rejects negative weekly scores', () => {
    expect(() => createWeeklyScore({ fantasy_team_id: 't', week: 1, bench_score: -1 })).toThrow(
      'All scores must be non-negative',
    );
  });
});

describe('createPlayerRanking', () => {
  it('requires a positive rank', () => {
    expect(() => createPlayerRanking({ player_id: 'p', position: 'WR', source: 'ESPN', rank: 0 })).toThrow(
      'Rank must be positive',
    );
  });
});

describe('createTradeItem', () => {
  it('accepts a player or a complete draft pick', () => {
    expect(createTradeItem({ trade_proposal_id: 't', team_id: 'a', player_id: 'p' }).player_id).toBe('p');
    expect(
      createTradeItem({ trade_proposal_id: 't', team_id: 'a', draft_round: 2, draft_pick_year: 2025 }).draft_round,
    ).toBe(2);
  });

  it('rejects items with neither', () => {
    expect(() => createTradeItem({ trade_proposal_id: 't', team_id: 'a', draft_round: 2 })).toThrow(
      'Must specify either player_id or draft pick details',
    );
  });
});

describe('bounded percentages', () => {
  it('limits roster improvement and projected impact to -100..100', () => {
    expect(() => createTradeAnalysis({ trade_proposal_id: 't', team_a_roster_improvement: 101 })).toThrow(
      'Roster improvement must be -100 to 100',
    );
    expect(() => createFreeAgentRecommendation({ player_id: 'p', week: 1, projected_roster_impact: -101 })).toThrow(
      'Projected roster impact must be -100 to 100',
    );
    expect(() => createFreeAgentRecommendation({ player_id: 'p', week: 1, priority_level: 6 })).toThrow(
      'Priority level must be 1-5',
    );
  });
});
