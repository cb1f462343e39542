import { beforeEach, describe, expect, it, vi } from 'vitest';

const { connectMock } = vi.hoisted(() => ({ connectMock: vi.fn() }));

vi.mock('pg', () => {
  class Pool {
    connect = connectMock;
    on = vi.fn();
    query = vi.fn();
  }
  return { default: { Pool } };
});

import { insertRows, withTransaction } from './db';

const fakeDb = () => ({ query: vi.fn().mockResolvedValue({ rows: [] }) });

describe('insertRows', () => {
  it('skips empty batches', async () => {
    const db = fakeDb();
    expect(await insertRows(db, 'players', [])).toBe(0);
    expect(db.query).not.toHaveBeenCalled();
  });

  it('writes a parameterized multi-row insert', async () => {
    const db = fakeDb();
    const count = await insertRows(db, 'waiver_priorities', [
      { id: 'a', priority_order: 1 },
      { id: 'b', priority_order: 2 },
    ]);

    expect(count).toBe(2);
    expect(db.query).toHaveBeenCalledWith('INSERT INTO waiver_priorities (id, priority_order) VALUES ($1, $2), ($3, $4)', [
      'a',
      1,
      'b',
      2,
    ]);
  });

  it('splits batches that would exceed the bind parameter limit', async () => {
    const db = fakeDb();
    const rows = Array.from({ length: 30001 }, (_, i) => ({ id: `row-${i}`, rank: i }));

    await insertRows(db, 'player_rankings', rows);

    expect(db.query).toHaveBeenCalledTimes(2);
    expect(db.query.mock.calls[0][1]).toHaveLength(60000);
    expect(db.query.mock.calls[1][1]).toEqual(['row-30000', 30000]);
  });
});

describe('withTransaction', () => {
  const client = { query: vi.fn(), release: vi.fn() };
  const statements = () => client.query.mock.calls.map(([text]) => text);

  beforeEach(() => {
    client.query.mockReset();
    client.query.mockResolvedValue({ rows: [] });
    client.release.mockReset();
    connectMock.mockReset();
    connectMock.mockResolvedValue(client);
  });

  it('commits and returns the client to the pool', async () => {
    const result = await withTransaction(async (tx) => {
      await tx.query('DELETE FROM players');
      return 'done';
    });

    expect(result).toBe('done');
    expect(statements()).toEqual(['BEGIN', 'DELETE FROM players', 'COMMIT']);
    expect(client.release).toHaveBeenCalledWith();
  });

  it('rolls back and rethrows when the work fails', async () => {
    await expect(
      withTransaction(async () => {
        throw new Error('duplicate key');
      }),
    ).rejects.toThrow('duplicate key');

    expect(statements()).toEqual(['BEGIN', 'ROLLBACK']);
    expect(client.release).toHaveBeenCalledWith();
  });

  it('keeps the original error and discards the client when rollback fails', async () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    const lost = new Error('connection terminated');
    client.query.mockImplementation(async (text: string) => {
      if (text === 'ROLLBACK') {
        throw lost;
      }
      return { rows: [] };
    });

    await expect(
      withTransaction(async () => {
        throw new Error('duplicate key');
      }),
    ).rejects.toThrow('duplicate key');

    expect(client.release).toHaveBeenCalledTimes(1);
    expect(client.release).toHaveBeenCalledWith(lost);
    error.mockRestore();
  });
});
