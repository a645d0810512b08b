import type { Pool } from 'pg';
import { z } from 'zod';
import { parseBoard } from '../game/board';
import { ConflictError, UnavailableError } from '../lib/errors';
import { inTransaction } from '../lib/db';
import { GAME_STATUSES, type Game, type GameListFilter, type GameSummary, type Move } from '../types/game';
import { clampPage, type GameRepository } from './gamesRepo';

const markSchema = z.enum(['X', 'O']);
const statusSchema = z.enum(['waiting', 'in_progress', 'finished', 'draw']);

const moveRowSchema = z.object({
  id: z.string(),
  player_id: z.string(),
  position: z.number().int(),
  symbol: markSchema,
  move_number: z.number().int(),
  created_at: z.coerce.date(),
});

const summaryRowSchema = z.object({
  id: z.string(),
  player1_id: z.string(),
  player2_id: z.string().nullable(),
  status: statusSchema,
  current_turn: markSchema,
  winner_id: z.string().nullable(),
  created_at: z.date(),
  updated_at: z.date(),
  finished_at: z.date().nullable(),
});

const gameRowSchema = summaryRowSchema.extend({
  board: z.unknown(),
  version: z.number().int(),
  moves: z.array(moveRowSchema),
});

const GAME_COLUMNS = `g.id, g.player1_id, g.player2_id, g.status, g.current_turn, g.winner_id,
       g.created_at, g.updated_at, g.finished_at`;

// Game row and its move log in one statement, so both come from the same snapshot
const LOAD_SQL = `
  select ${GAME_COLUMNS}, g.board, g.version,
         coalesce((
           select json_agg(json_build_object(
                    'id', m.id, 'player_id', m.player_id, 'position', m.position,
                    'symbol', m.symbol, 'move_number', m.move_number, 'created_at', m.created_at)
                  order by m.move_number)
             from moves m
            where m.game_id = g.id
         ), '[]'::json) as moves
    from games g
   where g.id = $1`;

const PG_UNIQUE_VIOLATION = '23505';

function isUniqueViolation(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === PG_UNIQUE_VIOLATION;
}

function ensureNotAborted(signal?: AbortSignal) {
  if (signal?.aborted) throw new UnavailableError('Store operation aborted');
}

function rowToGame(raw: unknown): Game {
  const row = gameRowSchema.parse(raw);
  const board = parseBoard(row.board);
  const moves: Move[] = row.moves.map((m) => ({
    id: m.id,
    gameId: row.id,
    participant: m.player_id,
    position: m.position,
    symbol: m.symbol,
    moveNumber: m.move_number,
    createdAt: m.created_at,
  }));
  const filled = board.filter((c) => c !== null).length;
  if (filled !== moves.length || moves.some((m) => board[m.position] !== m.symbol)) {
    throw new Error(`Stored board of game ${row.id} does not match its move log`);
  }
  return {
    id: row.id,
    player1: row.player1_id,
    player2: row.player2_id,
    status: row.status,
    board,
    currentTurn: row.current_turn,
    winner: row.winner_id,
    moves,
    version: row.version,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    finishedAt: row.finished_at,
  };
}

function rowToSummary(raw: unknown): GameSummary {
  const row = summaryRowSchema.parse(raw);
  return {
    id: row.id,
    player1: row.player1_id,
    player2: row.player2_id,
    status: row.status,
    currentTurn: row.current_turn,
    winner: row.winner_id,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
    finishedAt: row.finished_at ? row.finished_at.toISOString() : null,
  };
}

export class PgGameRepository implements GameRepository {
  constructor(private readonly db: Pool) {}

  async load(gameId: string, signal?: AbortSignal): Promise<Game | null> {
    const { rows } = await this.db.query(LOAD_SQL, [gameId]);
    ensureNotAborted(signal);
    return rows.length > 0 ? rowToGame(rows[0]) : null;
  }

  async create(game: Game, signal?: AbortSignal): Promise<Game> {
    ensureNotAborted(signal);
    try {
      await inTransaction(this.db, async (client) => {
        await client.query(
          `insert into games (id, player1_id, player2_id, status, board, current_turn, winner_id,
                              version, created_at, updated_at, finished_at)
           values ($1, $2, $3, $4, $5::jsonb, $6, $7, $8, $9, $10, $11)`,
          [
            game.id,
            game.player1,
            game.player2,
            game.status,
            JSON.stringify(game.board),
            game.currentTurn,
            game.winner,
            game.version,
            game.createdAt,
            game.updatedAt,
            game.finishedAt,
          ]
        );
        ensureNotAborted(signal);
      });
    } catch (err) {
      if (isUniqueViolation(err)) throw new ConflictError(game.id);
      throw err;
    }
    return game;
  }

  // Once COMMIT is sent the abort signal is no longer consulted; the caller
  // waits for the real outcome, bounded by the pool's statement_timeout.
  async commit(game: Game, move?: Move, signal?: AbortSignal): Promise<Game> {
    ensureNotAborted(signal);
    try {
      await inTransaction(this.db, async (client) => {
        const updated = await client.query(
          `update games
              set player2_id = $2, status = $3, board = $4::jsonb, current_turn = $5, winner_id = $6,
                  updated_at = $7, finished_at = $8, version = version + 1
            where id = $1 and version = $9`,
          [
            game.id,
            game.player2,
            game.status,
            JSON.stringify(game.board),
            game.currentTurn,
            game.winner,
            game.updatedAt,
            game.finishedAt,
            game.version,
          ]
        );
        if (updated.rowCount !== 1) throw new ConflictError(game.id);
        if (move) {
          await client.query(
            `insert into moves (id, game_id, player_id, position, symbol, move_number, created_at)
             values ($1, $2, $3, $4, $5, $6, $7)`,
            [move.id, move.gameId, move.participant, move.position, move.symbol, move.moveNumber, move.createdAt]
          );
        }
        // last chance to back out: the caller gave up waiting
        ensureNotAborted(signal);
      });
    } catch (err) {
      if (isUniqueViolation(err)) throw new ConflictError(game.id);
      throw err;
    }
    return { ...game, version: game.version + 1 };
  }

  async list(filter: GameListFilter, signal?: AbortSignal): Promise<GameSummary[]> {
    const { limit, offset } = clampPage(filter.limit, filter.offset);
    const where: string[] = [];
    const params: Array<string | number> = [];
    if (filter.status && GAME_STATUSES.includes(filter.status)) {
      params.push(filter.status);
      where.push(`g.status = $${params.length}`);
    }
    if (filter.participant) {
      params.push(filter.participant);
      where.push(`(g.player1_id = $${params.length} or g.player2_id = $${params.length})`);
    }
    params.push(limit, offset);
    const { rows } = await this.db.query(
      `select ${GAME_COLUMNS}
         from games g
        ${where.length > 0 ? `where ${where.join(' and ')}` : ''}
        order by g.created_at desc
        limit $${params.length - 1} offset $${params.length}`,
      params
    );
    ensureNotAborted(signal);
    return rows.map(rowToSummary);
  }
}
