import { ConflictError, NotFoundError, UnavailableError } from '../lib/errors';
import { toSummary } from '../game/snapshot';
import type { Game, GameListFilter, GameSummary, Move } from '../types/game';
import { clampPage, type GameRepository } from './gamesRepo';

function ensureNotAborted(signal?: AbortSignal) {
  if (signal?.aborted) throw new UnavailableError('Store operation aborted');
}

// In-memory store, used in development (GAME_STORE=memory) and tests
export class InMemoryGameRepository implements GameRepository {
  private readonly games = new Map<string, Game>();

  async load(gameId: string, signal?: AbortSignal): Promise<Game | null> {
    ensureNotAborted(signal);
    return this.games.get(gameId) ?? null;
  }

  async create(game: Game, signal?: AbortSignal): Promise<Game> {
    ensureNotAborted(signal);
    if (this.games.has(game.id)) throw new ConflictError(game.id);
    this.games.set(game.id, game);
    return game;
  }

  async commit(game: Game, move?: Move, signal?: AbortSignal): Promise<Game> {
    ensureNotAborted(signal);
    const stored = this.games.get(game.id);
    if (!stored) throw new NotFoundError(game.id);
    if (stored.version !== game.version) throw new ConflictError(game.id);
    if (move && game.moves[game.moves.length - 1]?.id !== move.id) {
      throw new Error(`Move ${move.id} is not the last entry of game ${game.id}`);
    }
    const next: Game = { ...game, version: game.version + 1 };
    this.games.set(game.id, next);
    return next;
  }

  async list(filter: GameListFilter, signal?: AbortSignal): Promise<GameSummary[]> {
    ensureNotAborted(signal);
    const { limit, offset } = clampPage(filter.limit, filter.offset);
    const { status, participant } = filter;
    return Array.from(this.games.values())
      .filter((g) => !status || g.status === status)
      .filter((g) => !participant || g.player1 === participant || g.player2 === participant)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(offset, offset + limit)
      .map(toSummary);
  }

  get size(): number {
    return this.games.size;
  }
}
