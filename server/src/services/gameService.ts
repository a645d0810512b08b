import {
  ConflictError,
  GameError,
  NotFoundError,
  UnavailableError,
  ValidationError,
  isGameError,
} from '../lib/errors';
import { KeyedLock } from '../lib/keyedLock';
import { errorMeta, logger } from '../lib/logger';
import { withDeadline, withTimeout } from '../lib/timeout';
import { toMoveView, toSnapshot, type MoveView } from '../game/snapshot';
import * as machine from '../game/stateMachine';
import type { RealtimeHub } from '../realtime/hub';
import type { GameRepository } from '../repositories/gamesRepo';
import type { Game, GameListFilter, GameStateSnapshot, GameSummary, ParticipantId } from '../types/game';

export type ServiceResult<T> = { ok: true; value: T } | { ok: false; error: GameError };

export interface GameServiceOptions {
  repositoryTimeoutMs: number;
  locks?: KeyedLock;
  context?: () => machine.TransitionContext;
}

export interface GameDetail {
  snapshot: GameStateSnapshot;
  moves: MoveView[];
}

type Transition = (game: Game, ctx: machine.TransitionContext) => machine.TransitionResult;

function ok<T>(value: T): ServiceResult<T> {
  return { ok: true, value };
}

function fail<T>(error: GameError): ServiceResult<T> {
  return { ok: false, error };
}

/**
 * Runs game transitions against the repository. Every read-modify-write for
 * a game happens under that game's lock, and the resulting snapshot is
 * handed to the hub before the lock is released so broadcasts follow commit
 * order.
 */
export class GameService {
  private readonly locks: KeyedLock;
  private readonly context: () => machine.TransitionContext;

  constructor(
    private readonly repo: GameRepository,
    private readonly hub: RealtimeHub,
    private readonly options: GameServiceOptions
  ) {
    this.locks = options.locks ?? new KeyedLock();
    this.context = options.context ?? machine.defaultContext;
  }

  async createGame(player1: ParticipantId, player2: ParticipantId | null = null): Promise<ServiceResult<GameStateSnapshot>> {
    const created = machine.createGame(player1, player2, this.context());
    if (!created.ok) return fail(created.error);
    const { game } = created;
    return this.guard('create', game.id, async () => {
      const stored = await this.write('create', (signal) => this.repo.create(game, signal));
      logger.info('[game] created', { gameId: stored.id, status: stored.status });
      return toSnapshot(stored);
    });
  }

  joinGame(gameId: string, participant: ParticipantId): Promise<ServiceResult<GameStateSnapshot>> {
    return this.transition('join', gameId, (game, ctx) => machine.joinGame(game, participant, ctx));
  }

  applyMove(gameId: string, participant: ParticipantId, position: number): Promise<ServiceResult<GameStateSnapshot>> {
    return this.transition('move', gameId, (game, ctx) => machine.applyMove(game, participant, position, ctx));
  }

  async getSnapshot(gameId: string): Promise<ServiceResult<GameStateSnapshot>> {
    return this.guard('snapshot', gameId, async () => toSnapshot(await this.loadOrThrow(gameId)));
  }

  async getGame(gameId: string): Promise<ServiceResult<GameDetail>> {
    return this.guard('detail', gameId, async () => {
      const game = await this.loadOrThrow(gameId);
      return { snapshot: toSnapshot(game), moves: game.moves.map(toMoveView) };
    });
  }

  async getMoves(gameId: string): Promise<ServiceResult<MoveView[]>> {
    return this.guard('moves', gameId, async () => (await this.loadOrThrow(gameId)).moves.map(toMoveView));
  }

  async listGames(filter: GameListFilter): Promise<ServiceResult<GameSummary[]>> {
    return this.guard('list', undefined, () => this.store('list', (signal) => this.repo.list(filter, signal)));
  }

  // ---- internals ----

  private transition(label: string, gameId: string, apply: Transition): Promise<ServiceResult<GameStateSnapshot>> {
    return this.guard(label, gameId, () => this.locks.run(gameId, () => this.commitTransition(label, gameId, apply, 1)));
  }

  private async commitTransition(
    label: string,
    gameId: string,
    apply: Transition,
    retriesLeft: number
  ): Promise<GameStateSnapshot> {
    const current = await this.loadOrThrow(gameId);
    const result = apply(current, this.context());
    if (!result.ok) throw result.error;
    const { game: next, move } = result;

    let stored: Game;
    try {
      stored = await this.write('commit', (signal) => this.repo.commit(next, move, signal));
    } catch (err) {
      if (err instanceof ConflictError && retriesLeft > 0) {
        logger.warn('[game] stale version on commit, retrying against fresh state', { gameId, label });
        return this.commitTransition(label, gameId, apply, retriesLeft - 1);
      }
      throw err;
    }

    const snapshot = toSnapshot(stored);
    this.hub.publish(gameId, { type: 'game_update', data: snapshot });
    logger.debug('[game] transition committed', { gameId, label, status: snapshot.status, version: snapshot.version });
    return snapshot;
  }

  private async loadOrThrow(gameId: string): Promise<Game> {
    const game = await this.store('load', (signal) => this.repo.load(gameId, signal));
    if (!game) throw new NotFoundError(gameId);
    return game;
  }

  private store<T>(op: string, call: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return withTimeout(
      call,
      this.options.repositoryTimeoutMs,
      () => new UnavailableError(`Game store did not answer ${op} in time, please retry`)
    );
  }

  // Writes are awaited to the end so the lock is held until the store has
  // settled; a write that committed after the deadline still counts.
  private write<T>(op: string, call: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return withDeadline(
      call,
      this.options.repositoryTimeoutMs,
      () => new UnavailableError(`Game store did not answer ${op} in time, please retry`)
    );
  }

  /** Turns every failure into a typed result; anything unexpected is logged and reported as Unavailable. */
  private async guard<T>(label: string, gameId: string | undefined, run: () => Promise<T>): Promise<ServiceResult<T>> {
    try {
      return ok(await run());
    } catch (err) {
      if (isGameError(err)) {
        if (err.kind === 'unavailable' || err.kind === 'conflict') {
          logger.warn(`[game] ${label} failed`, { gameId, code: err.code });
        }
        return fail(err);
      }
      if (err instanceof RangeError) {
        // contract violation inside the rules; input should have been rejected earlier
        logger.error(`[game] ${label} rejected by board contract`, { gameId, ...errorMeta(err) });
        return fail(new ValidationError(err.message));
      }
      logger.error(`[game] ${label} failed unexpectedly`, { gameId, ...errorMeta(err) });
      return fail(new UnavailableError());
    }
  }
}
