import type { AcquisitionType, Position, RosterSlot } from '../models';

export const ESPN_POSITIONS: Record<number, Position> = {
  1: 'QB',
  2: 'RB',
  3: 'WR',
  4: 'TE',
  5: 'K',
  16: 'DEF',
};

export const ESPN_LINEUP_SLOTS: Record<number, RosterSlot> = {
  0: 'QB',
  2: 'RB',
  4: 'WR',
  6: 'TE',
  7: 'SUPERFLEX',
  16: 'DEF',
  17: 'K',
  20: 'BN',
  21: 'IR',
  23: 'FLEX',
};

export const ESPN_ACQUISITION_TYPES: Record<string, AcquisitionType> = {
  DRAFT: 'Draft',
  ADD: 'Free Agent',
  WAIVER: 'Waiver',
  TRADE: 'Trade',
};

// ESPN stat ids for football
export const STAT = {
  PASSING_YARDS: 3,
  PASSING_TOUCHDOWNS: 4,
  PASSING_INTERCEPTIONS: 20,
  RUSHING_YARDS: 24,
  RUSHING_TOUCHDOWNS: 25,
  RECEIVING_YARDS: 42,
  RECEIVING_TOUCHDOWNS: 43,
  RECEPTIONS: 53,
  TARGETS: 58,
  FUMBLES_LOST: 72,
  FIELD_GOALS_MADE: 83,
  FIELD_GOALS_ATTEMPTED: 84,
  EXTRA_POINTS_MADE: 86,
  EXTRA_POINTS_ATTEMPTED: 87,
  DEFENSE_TOUCHDOWNS: 94,
  DEFENSE_INTERCEPTIONS: 95,
  DEFENSE_FUMBLES_RECOVERED: 96,
  DEFENSE_SAFETIES: 98,
  DEFENSE_SACKS: 99,
  DEFENSE_POINTS_ALLOWED: 120,
  DEFENSE_YARDS_ALLOWED: 127,
} as const;

export const STAT_SOURCE_ACTUAL = 0;
export const STAT_SOURCE_PROJECTED = 1;

export const DEFAULT_LEAGUE_VIEWS = ['mTeam', 'mRoster', 'mSettings', 'mMatchup'];
