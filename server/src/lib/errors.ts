export type GameErrorKind = 'validation' | 'rule_violation' | 'not_found' | 'conflict' | 'unavailable';

export type RuleViolationCode =
  | 'NOT_A_PARTICIPANT'
  | 'OUT_OF_TURN'
  | 'POSITION_TAKEN'
  | 'POSITION_OUT_OF_RANGE'
  | 'INVALID_TRANSITION';

export type GameErrorCode =
  | RuleViolationCode
  | 'INVALID_INPUT'
  | 'GAME_NOT_FOUND'
  | 'CONCURRENT_MODIFICATION'
  | 'STORE_UNAVAILABLE';

/**
 * Base of every failure the game core reports to callers. `status` is the
 * HTTP status the REST surface answers with; sockets only use `message`.
 */
export abstract class GameError extends Error {
  abstract readonly kind: GameErrorKind;
  abstract readonly status: number;
  readonly retryable: boolean = false;

  protected constructor(
    readonly code: GameErrorCode,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends GameError {
  readonly kind = 'validation';
  readonly status = 400;

  constructor(message: string) {
    super('INVALID_INPUT', message);
  }
}

export class RuleViolation extends GameError {
  declare readonly code: RuleViolationCode;
  readonly kind = 'rule_violation';
  readonly status = 422;

  constructor(code: RuleViolationCode, message: string) {
    super(code, message);
  }
}

export class NotFoundError extends GameError {
  readonly kind = 'not_found';
  readonly status = 404;

  constructor(readonly gameId: string) {
    super('GAME_NOT_FOUND', `Game ${gameId} not found`);
  }
}

export class ConflictError extends GameError {
  readonly kind = 'conflict';
  readonly status = 409;

  constructor(gameId: string) {
    super('CONCURRENT_MODIFICATION', `Game ${gameId} was modified concurrently`);
  }
}

export class UnavailableError extends GameError {
  readonly kind = 'unavailable';
  readonly status = 503;
  readonly retryable = true;

  constructor(message = 'Game store unavailable, please retry') {
    super('STORE_UNAVAILABLE', message);
  }
}

export function isGameError(err: unknown): err is GameError {
  return err instanceof GameError;
}
