/**
 * Shapes of the ESPN fantasy football v3 API responses, limited to the fields
 * the adapter reads. Everything ESPN may omit is optional.
 */

export interface EspnScoringItem {
  statId: number;
  points?: number;
  pointsOverrides?: Record<string, number>;
}

export interface EspnLeagueSettings {
  name?: string;
  size?: number;
  scoringSettings?: {
    scoringType?: string;
    scoringItems?: EspnScoringItem[];
  };
  scheduleSettings?: {
    playoffTeamCount?: number;
    matchupPeriodCount?: number;
  };
  rosterSettings?: {
    lineupSlotCounts?: Record<string, number>;
  };
}

export interface EspnMember {
  id: string;
  displayName?: string;
  firstName?: string;
  lastName?: string;
}

export interface EspnRecord {
  overall?: {
    wins?: number;
    losses?: number;
    ties?: number;
    pointsFor?: number;
    pointsAgainst?: number;
  };
}

export interface EspnPlayerStats {
  seasonId?: number;
  scoringPeriodId?: number;
  statSourceId?: number; // 0 = actual, 1 = projected
  statSplitTypeId?: number;
  proTeamId?: number;
  appliedTotal?: number;
  stats?: Record<string, number>;
}

export interface EspnDraftRank {
  rank?: number;
  rankType?: string;
}

export interface EspnPlayer {
  id: number;
  fullName?: string;
  firstName?: string;
  lastName?: string;
  defaultPositionId?: number;
  proTeamId?: number;
  jersey?: string;
  active?: boolean;
  injured?: boolean;
  injuryStatus?: string | string[];
  stats?: EspnPlayerStats[];
  draftRanksByRankType?: Record<string, EspnDraftRank>;
}

export interface EspnRosterEntry {
  playerId: number;
  lineupSlotId?: number;
  acquisitionType?: string;
  acquisitionDate?: number;
  injuryStatus?: string;
  playerPoolEntry?: {
    id?: number;
    player: EspnPlayer;
  };
}

export interface EspnTeam {
  id: number;
  abbrev?: string;
  location?: string;
  nickname?: string;
  name?: string;
  owners?: Array<string | { displayName?: string }>;
  primaryOwner?: string;
  waiverRank?: number;
  record?: EspnRecord;
  roster?: {
    entries?: EspnRosterEntry[];
  };
}

export interface EspnMatchupSide {
  teamId: number;
  totalPoints?: number;
}

export interface EspnScheduleItem {
  id: number;
  matchupPeriodId: number;
  playoffTierType?: string;
  winner?: 'HOME' | 'AWAY' | 'TIE' | 'UNDECIDED';
  home?: EspnMatchupSide;
  away?: EspnMatchupSide;
}

export interface EspnLeagueResponse {
  id: number;
  seasonId: number;
  scoringPeriodId?: number;
  status?: {
    currentMatchupPeriod?: number;
    latestScoringPeriod?: number;
    finalScoringPeriod?: number;
  };
  settings?: EspnLeagueSettings;
  members?: EspnMember[];
  teams?: EspnTeam[];
  schedule?: EspnScheduleItem[];
}

export interface EspnKonaPlayerEntry {
  id: number;
  onTeamId?: number;
  status?: string;
  player: EspnPlayer;
}

export interface EspnKonaPlayersResponse {
  players?: EspnKonaPlayerEntry[];
}

export interface EspnProGame {
  id: number;
  homeProTeamId: number;
  awayProTeamId: number;
  date?: number;
  scoringPeriodId: number;
  statsOfficial?: boolean;
}

export interface EspnProTeam {
  id: number;
  abbrev: string;
  location?: string;
  name?: string;
  byeWeek?: number;
  proGamesByScoringPeriod?: Record<string, EspnProGame[]>;
}

export interface EspnProScheduleResponse {
  settings?: {
    proTeams?: EspnProTeam[];
  };
}
