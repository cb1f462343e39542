import { Router } from 'express';
import { z } from 'zod';
import { insertRows, query, withTransaction } from '../db';
import { asyncRoute, HttpError } from '../errors';
import { createLogger } from '../logger';
import { createTradeAnalysis, createTradeItem, createTradeProposal } from '../models';
import { evaluateTrade } from '../stats';
import { BEST_RANKING } from './sql';
import { parseInput } from './validate';

const log = createLogger('trades');

const router = Router();

const tradeBodySchema = z.object({
  proposing_team_id: z.string().uuid('Invalid team IDs'),
  receiving_team_id: z.string().uuid('Invalid team IDs'),
  proposing_players: z.array(z.string().uuid('Invalid player ID')).default([]),
  receiving_players: z.array(z.string().uuid('Invalid player ID')).default([]),
});

const proposalBodySchema = tradeBodySchema.extend({
  notes: z.string().max(500).optional(),
});

type TradeBody = z.output<typeof tradeBodySchema>;

type TradePlayerRow = {
  id: string;
  name: string;
  position: string;
  rank: number | null;
  tier: number | null;
};

async function assertTeamsExist(body: TradeBody): Promise<void> {
  const { rows } = await query<{ id: string }>('SELECT id FROM fantasy_teams WHERE id IN ($1, $2)', [
    body.proposing_team_id,
    body.receiving_team_id,
  ]);
  if (rows.length !== 2) {
    throw new HttpError(400, 'Invalid team IDs');
  }
}

async function countOwned(playerIds: string[], teamId: string): Promise<number> {
  const { rows } = await query<{ count: number }>(
    'SELECT COUNT(*)::int AS count FROM roster_entries WHERE player_id = ANY($1::uuid[]) AND fantasy_team_id = $2',
    [playerIds, teamId],
  );
  return rows[0]?.count ?? 0;
}

async function loadTradePlayers(playerIds: string[]): Promise<TradePlayerRow[]> {
  if (playerIds.length === 0) {
    return [];
  }
  const { rows } = await query<TradePlayerRow>(
    `SELECT p.*, best.rank, best.tier
     FROM players p
     ${BEST_RANKING}
     WHERE p.id = ANY($1::uuid[])`,
    [playerIds],
  );
  return rows;
}

router.get(
  '/proposals',
  asyncRoute(async (_req, res) => {
    const { rows: proposals } = await query<{ id: string }>(`
      SELECT tp.*,
             pt.team_name AS proposing_team_name, pt.owner_name AS proposing_owner,
             rt.team_name AS receiving_team_name, rt.owner_name AS receiving_owner
      FROM trade_proposals tp
      LEFT JOIN fantasy_teams pt ON pt.id = tp.proposing_team_id
      LEFT JOIN fantasy_teams rt ON rt.id = tp.receiving_team_id
      ORDER BY tp.proposed_date DESC
    `);

    const detailed = [];
    for (const proposal of proposals) {
      const { rows: items } = await query(
        `SELECT ti.*, p.name AS player_name, p.position, ft.team_name
         FROM trade_items ti
         LEFT JOIN players p ON p.id = ti.player_id
         LEFT JOIN fantasy_teams ft ON ft.id = ti.team_id
         WHERE ti.trade_proposal_id = $1`,
        [proposal.id],
      );
      const { rows: analysis } = await query('SELECT * FROM trade_analysis WHERE trade_proposal_id = $1', [
        proposal.id,
      ]);
      detailed.push({ ...proposal, trade_items: items, analysis: analysis[0] ?? null });
    }

    res.json({ proposals: detailed, total_proposals: detailed.length });
  }),
);

router.post(
  '/proposals',
  asyncRoute(async (req, res) => {
    const body = parseInput(proposalBodySchema, req.body);
    await assertTeamsExist(body);

    if (
      body.proposing_players.length > 0 &&
      (await countOwned(body.proposing_players, body.proposing_team_id)) !== body.proposing_players.length
    ) {
      throw new HttpError(400, "Some proposing players don't belong to proposing team");
    }

    if (
      body.receiving_players.length > 0 &&
      (await countOwned(body.receiving_players, body.receiving_team_id)) !== body.receiving_players.length
    ) {
      throw new HttpError(400, "Some receiving players don't belong to receiving team");
    }

    const evaluation = evaluateTrade(
      await loadTradePlayers([...body.proposing_players, ...body.receiving_players]),
      body.proposing_players,
    );

    const proposal = createTradeProposal({
      proposing_team_id: body.proposing_team_id,
      receiving_team_id: body.receiving_team_id,
      notes: body.notes ?? null,
    });
    const items = [
      ...body.proposing_players.map((playerId) =>
        createTradeItem({ trade_proposal_id: proposal.id, team_id: body.proposing_team_id, player_id: playerId }),
      ),
      ...body.receiving_players.map((playerId) =>
        createTradeItem({ trade_proposal_id: proposal.id, team_id: body.receiving_team_id, player_id: playerId }),
      ),
    ];
    const analysis = createTradeAnalysis({
      trade_proposal_id: proposal.id,
      team_a_value: evaluation.proposing_team_value,
      team_b_value: evaluation.receiving_team_value,
      analysis_notes: `${evaluation.trade_balance}: ${evaluation.recommendation}`,
    });

    await withTransaction(async (tx) => {
      await insertRows(tx, 'trade_proposals', [proposal]);
      await insertRows(tx, 'trade_items', items);
      await insertRows(tx, 'trade_analysis', [analysis]);
    });

    log.info(`Trade proposal ${proposal.id} created with ${items.length} items`);

    res.json({
      proposal_id: proposal.id,
      status: 'created',
      message: 'Trade proposal created successfully',
      analysis: evaluation,
    });
  }),
);

router.post(
  '/analyze',
  asyncRoute(async (req, res) => {
    const body = parseInput(tradeBodySchema, req.body);
    await assertTeamsExist(body);

    const players = await loadTradePlayers([...body.proposing_players, ...body.receiving_players]);
    const proposing = new Set(body.proposing_players);
    const receiving = new Set(body.receiving_players);

    res.json({
      analysis: {
        ...evaluateTrade(players, body.proposing_players),
        proposing_players_details: players.filter((player) => proposing.has(player.id)),
        receiving_players_details: players.filter((player) => receiving.has(player.id)),
      },
    });
  }),
);

export default router;
