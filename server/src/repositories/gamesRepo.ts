import type { Game, GameListFilter, GameSummary, Move } from '../types/game';

/**
 * Durable storage for games and their move logs.
 *
 * `commit` is atomic: the new game state and the appended move become
 * visible together or not at all. It throws ConflictError when the stored
 * version no longer equals `game.version` (the version that was loaded),
 * and stores the game with `version + 1`. When `signal` is aborted before
 * the write is committed, the adapter rolls back and throws.
 */
export interface GameRepository {
  load(gameId: string, signal?: AbortSignal): Promise<Game | null>;
  create(game: Game, signal?: AbortSignal): Promise<Game>;
  commit(game: Game, move?: Move, signal?: AbortSignal): Promise<Game>;
  list(filter: GameListFilter, signal?: AbortSignal): Promise<GameSummary[]>;
}

export const MAX_PAGE_SIZE = 100;

export function clampPage(limit: number, offset: number) {
  return {
    limit: Math.max(1, Math.min(MAX_PAGE_SIZE, Math.floor(limit))),
    offset: Math.max(0, Math.floor(offset)),
  };
}
