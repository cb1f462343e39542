export const POSITION_ORDER = `
  CASE p.position
    WHEN 'QB' THEN 1
    WHEN 'RB' THEN 2
    WHEN 'WR' THEN 3
    WHEN 'TE' THEN 4
    WHEN 'K' THEN 5
    WHEN 'DEF' THEN 6
    ELSE 7
  END`;

export const ROSTER_PLAYERS = `
  SELECT p.*, re.is_starting, re.acquisition_type, re.acquired_date,
         nt.team_name AS nfl_team_name, nt.team_code AS nfl_team_code,
         nt.conference, nt.division
  FROM roster_entries re
  JOIN players p ON p.id = re.player_id
  LEFT JOIN nfl_teams nt ON nt.id = p.nfl_team_id
  WHERE re.fantasy_team_id = $1`;

export const MATCHUPS_WITH_TEAMS = `
  SELECT m.*,
         ht.team_name AS home_team_name, ht.owner_name AS home_owner_name,
         at.team_name AS away_team_name, at.owner_name AS away_owner_name
  FROM fantasy_matchups m
  LEFT JOIN fantasy_teams ht ON ht.id = m.home_team_id
  LEFT JOIN fantasy_teams at ON at.id = m.away_team_id`;

/** Best (lowest) ranking per player. */
export const BEST_RANKING = `
  LEFT JOIN LATERAL (
    SELECT pr.rank, pr.tier
    FROM player_rankings pr
    WHERE pr.player_id = p.id
    ORDER BY pr.rank ASC
    LIMIT 1
  ) best ON TRUE`;

/** Most recent week's projection per player. */
export const LATEST_PROJECTION = `
  LEFT JOIN LATERAL (
    SELECT pp.projected_fantasy_points
    FROM player_projections pp
    WHERE pp.player_id = p.id
    ORDER BY pp.week DESC, pp.created_at DESC
    LIMIT 1
  ) latest ON TRUE`;
