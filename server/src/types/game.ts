export type Mark = 'X' | 'O';

export type Cell = Mark | null;

export type Board = readonly Cell[]; // 9 cells, row-major

/** Opaque identity handed to us by the auth provider. */
export type ParticipantId = string;

export const GameStatus = {
  Waiting: 'waiting',
  InProgress: 'in_progress',
  Finished: 'finished',
  Draw: 'draw',
} as const;

export type GameStatus = (typeof GameStatus)[keyof typeof GameStatus];

export const GAME_STATUSES: readonly GameStatus[] = Object.values(GameStatus);

export interface Move {
  readonly id: string;
  readonly gameId: string;
  readonly participant: ParticipantId;
  readonly position: number; // 0..8
  readonly symbol: Mark;
  readonly moveNumber: number; // 1-based
  readonly createdAt: Date;
}

export interface Game {
  readonly id: string;
  readonly player1: ParticipantId; // X
  readonly player2: ParticipantId | null; // O
  readonly status: GameStatus;
  readonly board: Board;
  readonly currentTurn: Mark;
  readonly winner: ParticipantId | null;
  readonly moves: readonly Move[];
  readonly version: number;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly finishedAt: Date | null;
}

export interface LastMove {
  participant: ParticipantId;
  position: number;
  symbol: Mark;
  moveNumber: number;
}

export interface GameStateSnapshot {
  gameId: string;
  board: Cell[];
  status: GameStatus;
  currentTurn: Mark;
  player1: ParticipantId;
  player2: ParticipantId | null;
  winner: ParticipantId | null;
  availablePositions: number[];
  lastMove: LastMove | null;
  version: number;
  createdAt: string; // ISO
  finishedAt: string | null; // ISO
}

export interface GameSummary {
  id: string;
  player1: ParticipantId;
  player2: ParticipantId | null;
  status: GameStatus;
  currentTurn: Mark;
  winner: ParticipantId | null;
  createdAt: string;
  updatedAt: string;
  finishedAt: string | null;
}

export interface GameListFilter {
  status?: GameStatus;
  participant?: ParticipantId;
  limit: number;
  offset: number;
}
