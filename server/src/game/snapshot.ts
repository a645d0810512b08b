import type { Game, GameStateSnapshot, GameSummary, Move } from '../types/game';
import { availablePositions } from './board';

export function toSnapshot(game: Game): GameStateSnapshot {
  const last: Move | undefined = game.moves[game.moves.length - 1];
  return {
    gameId: game.id,
    board: game.board.slice(),
    status: game.status,
    currentTurn: game.currentTurn,
    player1: game.player1,
    player2: game.player2,
    winner: game.winner,
    availablePositions: availablePositions(game.board),
    lastMove: last
      ? { participant: last.participant, position: last.position, symbol: last.symbol, moveNumber: last.moveNumber }
      : null,
    version: game.version,
    createdAt: game.createdAt.toISOString(),
    finishedAt: game.finishedAt ? game.finishedAt.toISOString() : null,
  };
}

export function toSummary(game: Game): GameSummary {
  return {
    id: game.id,
    player1: game.player1,
    player2: game.player2,
    status: game.status,
    currentTurn: game.currentTurn,
    winner: game.winner,
    createdAt: game.createdAt.toISOString(),
    updatedAt: game.updatedAt.toISOString(),
    finishedAt: game.finishedAt ? game.finishedAt.toISOString() : null,
  };
}

export interface MoveView {
  id: string;
  participant: string;
  position: number;
  symbol: Move['symbol'];
  moveNumber: number;
  createdAt: string;
}

export function toMoveView(move: Move): MoveView {
  return {
    id: move.id,
    participant: move.participant,
    position: move.position,
    symbol: move.symbol,
    moveNumber: move.moveNumber,
    createdAt: move.createdAt.toISOString(),
  };
}
