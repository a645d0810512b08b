import { applyMove, createGame, isTerminal, joinGame, symbolOf } from '../../src/game/stateMachine';
import type { TransitionResult } from '../../src/game/stateMachine';
import type { Game } from '../../src/types/game';
import { fixedContext } from '../helpers/fixtures';

const ctx = fixedContext();

function expectOk(result: TransitionResult): Game {
  if (!result.ok) throw new Error(`expected success, got ${result.error.code}`);
  return result.game;
}

function expectRejected(result: TransitionResult) {
  if (result.ok) throw new Error('expected a rule violation');
  return result.error;
}

function started(): Game {
  return expectOk(createGame('alice', 'bob', ctx()));
}

function play(game: Game, moves: Array<[string, number]>): Game {
  return moves.reduce((g, [who, pos]) => expectOk(applyMove(g, who, pos, ctx())), game);
}

describe('game state machine', () => {
  describe('createGame', () => {
    it('waits for an opponent when player2 is absent', () => {
      const game = expectOk(createGame('alice', null, ctx()));
      expect(game.status).toBe('waiting');
      expect(game.player2).toBeNull();
      expect(game.currentTurn).toBe('X');
      expect(game.board).toEqual(Array(9).fill(null));
      expect(game.version).toBe(0);
      expect(game.finishedAt).toBeNull();
    });

    it('starts immediately when player2 is given', () => {
      const game = started();
      expect(game.status).toBe('in_progress');
      expect(symbolOf(game, 'alice')).toBe('X');
      expect(symbolOf(game, 'bob')).toBe('O');
      expect(symbolOf(game, 'carol')).toBeNull();
    });

    it('rejects self-play', () => {
      expect(expectRejected(createGame('alice', 'alice', ctx())).code).toBe('INVALID_TRANSITION');
    });
  });

  describe('joinGame', () => {
    it('moves a waiting game into progress', () => {
      const waiting = expectOk(createGame('alice', null, ctx()));
      const joined = expectOk(joinGame(waiting, 'bob', ctx()));
      expect(joined.status).toBe('in_progress');
      expect(joined.player2).toBe('bob');
      expect(waiting.status).toBe('waiting');
    });

    it('rejects joining a game already in progress and leaves it unchanged', () => {
      const game = started();
      const error = expectRejected(joinGame(game, 'carol', ctx()));
      expect(error.code).toBe('INVALID_TRANSITION');
      expect(game.status).toBe('in_progress');
      expect(game.player2).toBe('bob');
      expect(game.board).toEqual(Array(9).fill(null));
    });

    it('rejects the creator joining their own game', () => {
      const waiting = expectOk(createGame('alice', null, ctx()));
      expect(expectRejected(joinGame(waiting, 'alice', ctx())).message).toBe('You cannot play against yourself.');
    });

    it('rejects a waiting record that somehow already has player2', () => {
      const broken: Game = { ...expectOk(createGame('alice', null, ctx())), player2: 'bob' };
      expect(expectRejected(joinGame(broken, 'carol', ctx())).message).toBe('This game already has two players.');
    });

    it('rejects joining a finished game', () => {
      const done = play(started(), [
        ['alice', 0],
        ['bob', 3],
        ['alice', 1],
        ['bob', 4],
        ['alice', 2],
      ]);
      expect(expectRejected(joinGame(done, 'carol', ctx())).code).toBe('INVALID_TRANSITION');
    });
  });

  describe('applyMove', () => {
    it('places the mover symbol, logs the move and flips the turn', () => {
      const game = expectOk(applyMove(started(), 'alice', 4, ctx()));
      expect(game.board[4]).toBe('X');
      expect(game.currentTurn).toBe('O');
      expect(game.moves).toHaveLength(1);
      expect(game.moves[0]).toMatchObject({ participant: 'alice', position: 4, symbol: 'X', moveNumber: 1 });
    });

    it('returns the appended move alongside the game', () => {
      const game = started();
      const result = applyMove(game, 'alice', 2, ctx());
      if (!result.ok) throw new Error('move rejected');
      expect(result.move).toBe(result.game.moves[0]);
      expect(result.move?.gameId).toBe(game.id);
    });

    it('rejects moves on a waiting game', () => {
      const waiting = expectOk(createGame('alice', null, ctx()));
      expect(expectRejected(applyMove(waiting, 'alice', 0, ctx())).code).toBe('INVALID_TRANSITION');
    });

    it('rejects outsiders', () => {
      expect(expectRejected(applyMove(started(), 'mallory', 0, ctx())).code).toBe('NOT_A_PARTICIPANT');
    });

    it('rejects moves out of turn', () => {
      expect(expectRejected(applyMove(started(), 'bob', 0, ctx())).code).toBe('OUT_OF_TURN');
    });

    it('rejects positions outside the board', () => {
      expect(expectRejected(applyMove(started(), 'alice', 9, ctx())).code).toBe('POSITION_OUT_OF_RANGE');
      expect(expectRejected(applyMove(started(), 'alice', -1, ctx())).code).toBe('POSITION_OUT_OF_RANGE');
    });

    it('rejects occupied positions', () => {
      const game = play(started(), [['alice', 4]]);
      expect(expectRejected(applyMove(game, 'bob', 4, ctx())).code).toBe('POSITION_TAKEN');
    });

    it('fails when the same accepted move is replayed', () => {
      const before = started();
      const after = expectOk(applyMove(before, 'alice', 4, ctx()));
      const replay = expectRejected(applyMove(after, 'alice', 4, ctx()));
      expect(['POSITION_TAKEN', 'OUT_OF_TURN']).toContain(replay.code);
    });

    it('alternates symbols strictly', () => {
      const game = play(started(), [
        ['alice', 0],
        ['bob', 4],
        ['alice', 8],
        ['bob', 2],
        ['alice', 6],
      ]);
      expect(game.moves.map((m) => m.symbol)).toEqual(['X', 'O', 'X', 'O', 'X']);
      expect(game.moves.map((m) => m.moveNumber)).toEqual([1, 2, 3, 4, 5]);
    });

    it('A@4, B@0, A@1, B@3, A@7 wins the middle column for A', () => {
      const game = play(started(), [
        ['alice', 4],
        ['bob', 0],
        ['alice', 1],
        ['bob', 3],
        ['alice', 7],
      ]);
      expect(game.status).toBe('finished');
      expect(game.winner).toBe('alice');
      expect(game.finishedAt).toEqual(game.updatedAt);
      expect(isTerminal(game.status)).toBe(true);
      // the turn is not flipped after the winning move
      expect(game.currentTurn).toBe('X');
    });

    it('credits player2 when O completes a line', () => {
      const game = play(started(), [
        ['alice', 0],
        ['bob', 2],
        ['alice', 1],
        ['bob', 4],
        ['alice', 8],
        ['bob', 6],
      ]);
      expect(game.status).toBe('finished');
      expect(game.winner).toBe('bob');
    });

    it('ends in a draw when the board fills without a line', () => {
      // X: 0,1,5,6,8  O: 2,3,4,7
      const game = play(started(), [
        ['alice', 0],
        ['bob', 2],
        ['alice', 1],
        ['bob', 3],
        ['alice', 5],
        ['bob', 4],
        ['alice', 6],
        ['bob', 7],
        ['alice', 8],
      ]);
      expect(game.status).toBe('draw');
      expect(game.winner).toBeNull();
      expect(game.finishedAt).not.toBeNull();
      expect(game.board).toEqual(['X', 'X', 'O', 'O', 'O', 'X', 'X', 'O', 'X']);
    });

    it('accepts no move once the game is over', () => {
      const game = play(started(), [
        ['alice', 4],
        ['bob', 0],
        ['alice', 1],
        ['bob', 3],
        ['alice', 7],
      ]);
      expect(expectRejected(applyMove(game, 'bob', 2, ctx())).code).toBe('INVALID_TRANSITION');
      expect(expectRejected(applyMove(game, 'alice', 2, ctx())).code).toBe('INVALID_TRANSITION');
    });

    it('never mutates the input game', () => {
      const game = started();
      const frozenBoard = game.board.slice();
      expectOk(applyMove(game, 'alice', 0, ctx()));
      expect(game.board).toEqual(frozenBoard);
      expect(game.moves).toHaveLength(0);
    });
  });
});
