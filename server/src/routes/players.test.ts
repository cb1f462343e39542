import { afterAll, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';

const { queryMock } = vi.hoisted(() => ({ queryMock: vi.fn() }));

vi.mock('../db', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../db')>();
  return { ...actual, query: queryMock };
});

import { postJson, startTestServer, type TestServer } from '../testServer';

const MAHOMES = 'aaaaaaaa-aaaa-4aaa-8aaa-aaaaaaaaaaaa';
const HENRY = 'bbbbbbbb-bbbb-4bbb-8bbb-bbbbbbbbbbbb';

let server: TestServer;

beforeAll(async () => {
  server = await startTestServer();
});

afterAll(async () => {
  await server.close();
});

beforeEach(() => {
  queryMock.mockReset();
});

describe('GET /api/players', () => {
  it('filters by position and a name fragment', async () => {
    queryMock.mockResolvedValueOnce({ rows: [{ id: HENRY, name: 'Test Runner', position: 'RB' }] });

    const res = await fetch(`${server.url}/api/players?position=RB&q=run`);

    expect(await res.json()).toEqual({ players: [{ id: HENRY, name: 'Test Runner', position: 'RB' }] });
    expect(queryMock).toHaveBeenCalledWith(
      'SELECT * FROM players WHERE position = $1 AND name ILIKE $2 ORDER BY name ASC',
      ['RB', '%run%'],
    );
  });

  it('ignores an empty search string', async () => {
    queryMock.mockResolvedValueOnce({ rows: [] });

    const res = await fetch(`${server.url}/api/players?q=`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ players: [] });
    expect(queryMock).toHaveBeenCalledWith('SELECT * FROM players  ORDER BY name ASC', []);
  });

  it('rejects unknown positions', async () => {
    const res = await fetch(`${server.url}/api/players?position=LB`);

    expect(res.status).toBe(400);
    expect(queryMock).not.toHaveBeenCalled();
  });
});

describe('GET /api/players/available', () => {
  it('groups unrostered players by position', async () => {
    queryMock.mockResolvedValueOnce({
      rows: [
        { id: 'p1', name: 'Kicker One', position: 'K', nfl_team_name: null },
        { id: 'p2', name: 'Runner One', position: 'RB', nfl_team_name: 'Chiefs' },
        { id: 'p3', name: 'Runner Two', position: 'RB', nfl_team_name: 'Ravens' },
      ],
    });

    const res = await fetch(`${server.url}/api/players/available`);

    expect(await res.json()).toMatchObject({
      total_available: 3,
      available_by_position: {
        K: [{ id: 'p1' }],
        RB: [{ id: 'p2' }, { id: 'p3' }],
      },
    });
  });
});

describe('GET /api/players/rankings', () => {
  it('echoes filters and adds them as parameters', async () => {
    queryMock.mockResolvedValueOnce({ rows: [] });

    const res = await fetch(`${server.url}/api/players/rankings?position=WR&week=3`);

    expect(await res.json()).toEqual({
      rankings: [],
      rankings_by_position: {},
      filters: { position: 'WR', week: 3 },
    });
    expect(queryMock.mock.calls[0][1]).toEqual(['WR', 3]);
  });

  it('rejects weeks outside the season', async () => {
    const res = await fetch(`${server.url}/api/players/rankings?week=30`);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'week must be 1-21' });
  });
});

describe('POST /api/players/compare', () => {
  it('needs at least two ids', async () => {
    const res = await postJson(`${server.url}/api/players/compare`, { player_ids: [MAHOMES] });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Must provide at least 2 player IDs' });
  });

  it('fails when fewer than two players exist', async () => {
    queryMock.mockResolvedValueOnce({ rows: [] }).mockResolvedValueOnce({ rows: [] });

    const res = await postJson(`${server.url}/api/players/compare`, [MAHOMES, HENRY]);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Could not find enough valid players to compare' });
  });

  it('summarises positions and NFL teams', async () => {
    queryMock
      .mockResolvedValueOnce({ rows: [{ id: MAHOMES, name: 'Test Passer', position: 'QB', nfl_team_name: 'Chiefs' }] })
      .mockResolvedValueOnce({ rows: [{ week: 2, projected_fantasy_points: 22.5 }] })
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValueOnce({ rows: [{ id: HENRY, name: 'Test Runner', position: 'RB', nfl_team_name: 'Ravens' }] })
      .mockResolvedValueOnce({ rows: [] })
      .mockResolvedValueOnce({ rows: [{ rank: 4 }] });

    const res = await postJson(`${server.url}/api/players/compare`, { player_ids: [MAHOMES, HENRY] });

    expect(await res.json()).toEqual({
      comparison: [
        {
          id: MAHOMES,
          name: 'Test Passer',
          position: 'QB',
          nfl_team_name: 'Chiefs',
          recent_projections: [{ week: 2, projected_fantasy_points: 22.5 }],
          rankings: [],
        },
        {
          id: HENRY,
          name: 'Test Runner',
          position: 'RB',
          nfl_team_name: 'Ravens',
          recent_projections: [],
          rankings: [{ rank: 4 }],
        },
      ],
      comparison_summary: { total_players: 2, positions: ['QB', 'RB'], teams: ['Chiefs', 'Ravens'] },
    });
  });
});

describe('GET /api/players/:id', () => {
  it('404s on malformed ids', async () => {
    const res = await fetch(`${server.url}/api/players/not-a-player`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Player not found' });
  });

  it('includes the owning fantasy team when rostered', async () => {
    queryMock
      .mockResolvedValueOnce({ rows: [{ id: MAHOMES, name: 'Test Passer', position: 'QB' }] })
      .mockResolvedValueOnce({ rows: [{ fantasy_team_id: 't1', team_name: 'Alpha' }] });

    const res = await fetch(`${server.url}/api/players/${MAHOMES}`);

    expect(await res.json()).toEqual({
      player: {
        id: MAHOMES,
        name: 'Test Passer',
        position: 'QB',
        fantasy_team: { fantasy_team_id: 't1', team_name: 'Alpha' },
      },
    });
  });

  it('reports free agents with a null fantasy team', async () => {
    queryMock
      .mockResolvedValueOnce({ rows: [{ id: MAHOMES, name: 'Test Passer', position: 'QB' }] })
      .mockResolvedValueOnce({ rows: [] });

    const res = await fetch(`${server.url}/api/players/${MAHOMES}`);

    expect(await res.json()).toMatchObject({ player: { fantasy_team: null } });
  });
});

describe('GET /api/players/:id/projections', () => {
  it('filters by week', async () => {
    queryMock
      .mockResolvedValueOnce({ rows: [{ id: MAHOMES, name: 'Test Passer', position: 'QB' }] })
      .mockResolvedValueOnce({ rows: [{ week: 4, projected_fantasy_points: 19 }] });

    const res = await fetch(`${server.url}/api/players/${MAHOMES}/projections?week=4`);

    expect(await res.json()).toEqual({
      player_id: MAHOMES,
      player_name: 'Test Passer',
      projections: [{ week: 4, projected_fantasy_points: 19 }],
      total_projections: 1,
    });
    expect(queryMock).toHaveBeenLastCalledWith(
      'SELECT * FROM player_projections WHERE player_id = $1 AND week = $2 ORDER BY week DESC, created_at DESC',
      [MAHOMES, 4],
    );
  });
});

describe('GET /api/players/:id/stats', () => {
  it('summarises the season from game lines', async () => {
    queryMock
      .mockResolvedValueOnce({ rows: [{ id: HENRY, name: 'Test Runner', position: 'RB' }] })
      .mockResolvedValueOnce({ rows: [{ fantasy_points: 18 }, { fantasy_points: 7 }] });

    const res = await fetch(`${server.url}/api/players/${HENRY}/stats`);

    expect(await res.json()).toEqual({
      player_id: HENRY,
      player_name: 'Test Runner',
      position: 'RB',
      game_stats: [{ fantasy_points: 18 }, { fantasy_points: 7 }],
      season_summary: { games_played: 2, total_fantasy_points: 25, average_fantasy_points: 12.5 },
    });
  });
});
