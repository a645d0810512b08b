import { z } from 'zod';
import type { Board, Cell, Mark } from '../types/game';

export const BOARD_SIZE = 9;

// Rows, then columns, then the two diagonals. checkWinner relies on this order.
export const WIN_LINES: ReadonlyArray<readonly [number, number, number]> = [
  [0, 1, 2],
  [3, 4, 5],
  [6, 7, 8],
  [0, 3, 6],
  [1, 4, 7],
  [2, 5, 8],
  [0, 4, 8],
  [2, 4, 6],
];

const boardSchema = z.array(z.enum(['X', 'O']).nullable()).length(BOARD_SIZE);

export function emptyBoard(): Board {
  return Array<Cell>(BOARD_SIZE).fill(null);
}

export function isValidPosition(position: number): boolean {
  return Number.isInteger(position) && position >= 0 && position < BOARD_SIZE;
}

export function isPositionAvailable(board: Board, position: number): boolean {
  return isValidPosition(position) && board[position] === null;
}

export function availablePositions(board: Board): number[] {
  const out: number[] = [];
  board.forEach((cell, i) => {
    if (cell === null) out.push(i);
  });
  return out;
}

export function isFull(board: Board): boolean {
  return board.every((c) => c !== null);
}

/** Every line whose three cells hold the same mark, in WIN_LINES order. */
export function completedLines(board: Board): Array<{ line: readonly [number, number, number]; mark: Mark }> {
  const out: Array<{ line: readonly [number, number, number]; mark: Mark }> = [];
  for (const line of WIN_LINES) {
    const [a, b, c] = line;
    const mark = board[a];
    if (mark && mark === board[b] && mark === board[c]) out.push({ line, mark });
  }
  return out;
}

/**
 * Mark of the first completed line, or null. A single move can close two
 * lines at once (a fork filled in), but both then carry the mover's mark;
 * two different marks means the board was built outside the rules.
 */
export function checkWinner(board: Board): Mark | null {
  const lines = completedLines(board);
  if (lines.length === 0) return null;
  const mark = lines[0].mark;
  if (lines.some((l) => l.mark !== mark)) {
    throw new Error('Board has winning lines for both marks');
  }
  return mark;
}

export function placeMark(board: Board, position: number, mark: Mark): Board {
  if (!isValidPosition(position)) throw new RangeError(`Position ${position} is outside the board`);
  if (board[position] !== null) throw new RangeError(`Position ${position} is already taken`);
  const next = board.slice();
  next[position] = mark;
  return next;
}

export function parseBoard(value: unknown): Board {
  return boardSchema.parse(value);
}
