import { v4 as uuid } from 'uuid';
import { RuleViolation } from '../lib/errors';
import { Game, GameStatus, Mark, Move, ParticipantId } from '../types/game';
import { checkWinner, emptyBoard, isFull, isValidPosition, placeMark } from './board';

export interface TransitionContext {
  now: Date;
  newId: () => string;
}

export type TransitionResult =
  | { ok: true; game: Game; move?: Move }
  | { ok: false; error: RuleViolation };

export function defaultContext(): TransitionContext {
  return { now: new Date(), newId: () => uuid() };
}

function reject(code: RuleViolation['code'], message: string): TransitionResult {
  return { ok: false, error: new RuleViolation(code, message) };
}

export function isTerminal(status: GameStatus): boolean {
  return status === GameStatus.Finished || status === GameStatus.Draw;
}

export function symbolOf(game: Game, participant: ParticipantId): Mark | null {
  if (participant === game.player1) return 'X';
  if (game.player2 !== null && participant === game.player2) return 'O';
  return null;
}

export function createGame(
  player1: ParticipantId,
  player2: ParticipantId | null = null,
  ctx: TransitionContext = defaultContext()
): TransitionResult {
  if (player2 !== null && player2 === player1) {
    return reject('INVALID_TRANSITION', 'You cannot play against yourself.');
  }
  return {
    ok: true,
    game: {
      id: ctx.newId(),
      player1,
      player2,
      status: player2 === null ? GameStatus.Waiting : GameStatus.InProgress,
      board: emptyBoard(),
      currentTurn: 'X',
      winner: null,
      moves: [],
      version: 0,
      createdAt: ctx.now,
      updatedAt: ctx.now,
      finishedAt: null,
    },
  };
}

export function joinGame(
  game: Game,
  player2: ParticipantId,
  ctx: TransitionContext = defaultContext()
): TransitionResult {
  if (game.status !== GameStatus.Waiting) {
    return reject('INVALID_TRANSITION', 'This game is not available to join.');
  }
  if (game.player2 !== null) {
    return reject('INVALID_TRANSITION', 'This game already has two players.');
  }
  if (player2 === game.player1) {
    return reject('INVALID_TRANSITION', 'You cannot play against yourself.');
  }
  return {
    ok: true,
    game: { ...game, player2, status: GameStatus.InProgress, updatedAt: ctx.now },
  };
}

export function applyMove(
  game: Game,
  participant: ParticipantId,
  position: number,
  ctx: TransitionContext = defaultContext()
): TransitionResult {
  if (game.status !== GameStatus.InProgress) {
    return reject('INVALID_TRANSITION', 'Game is not in progress.');
  }
  const symbol = symbolOf(game, participant);
  if (!symbol) return reject('NOT_A_PARTICIPANT', 'You are not a player in this game.');
  if (symbol !== game.currentTurn) return reject('OUT_OF_TURN', 'It is not your turn.');
  if (!isValidPosition(position)) {
    return reject('POSITION_OUT_OF_RANGE', 'Position must be between 0 and 8.');
  }
  if (game.board[position] !== null) {
    return reject('POSITION_TAKEN', `Position ${position} is not available.`);
  }

  const board = placeMark(game.board, position, symbol);
  const move: Move = {
    id: ctx.newId(),
    gameId: game.id,
    participant,
    position,
    symbol,
    moveNumber: game.moves.length + 1,
    createdAt: ctx.now,
  };
  const moved: Game = { ...game, board, moves: [...game.moves, move], updatedAt: ctx.now };

  const winningMark = checkWinner(board);
  if (winningMark) {
    return {
      ok: true,
      move,
      game: {
        ...moved,
        status: GameStatus.Finished,
        winner: winningMark === 'X' ? game.player1 : game.player2,
        finishedAt: ctx.now,
      },
    };
  }
  if (isFull(board)) {
    return { ok: true, move, game: { ...moved, status: GameStatus.Draw, finishedAt: ctx.now } };
  }
  return { ok: true, move, game: { ...moved, currentTurn: symbol === 'X' ? 'O' : 'X' } };
}
