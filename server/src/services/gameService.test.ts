import { describe, it, expect } from 'vitest';
import type { GameState } from '../types/game';
import type { Command, Response } from '../types/protocol';
import { GameRuleError } from '../lib/errors';
import { getCell } from './board';
import {
  applyMove,
  connectPlayer,
  createGame,
  gamePhase,
  handleCommand,
  removePeer,
  resetGame,
  toSnapshot,
} from './gameService';

const PEER_A = '10.0.0.1/a';
const PEER_B = '10.0.0.2/b';

function twoPlayers(): GameState {
  return connectPlayer(connectPlayer(createGame(), 'A', PEER_A), 'B', PEER_B);
}

function play(game: GameState, moves: [string, number][]): GameState {
  return moves.reduce((g, [name, cell]) => applyMove(g, cell, name).game, game);
}

function ruleCode(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof GameRuleError) return err.code;
    throw err;
  }
  throw new Error('expected a rule violation');
}

describe('gameService', () => {
  describe('connect', () => {
    it('adds players without colors', () => {
      const game = twoPlayers();
      expect(game.players).toEqual([
        { address: PEER_A, name: 'A', color: null },
        { address: PEER_B, name: 'B', color: null },
      ]);
      expect(gamePhase(game)).toBe('opening');
    });

    it('rejects a third player', () => {
      expect(ruleCode(() => connectPlayer(twoPlayers(), 'C', '10.0.0.3/c'))).toBe('GameFull');
    });

    it('rejects blank and overlong names', () => {
      expect(ruleCode(() => connectPlayer(createGame(), '  ', PEER_A))).toBe('InvalidName');
      expect(ruleCode(() => connectPlayer(createGame(), 'x'.repeat(33), PEER_A))).toBe('InvalidName');
      expect(connectPlayer(createGame(), 'x'.repeat(32), PEER_A).players).toHaveLength(1);
    });

    it('stores names trimmed', () => {
      expect(connectPlayer(createGame(), ' A ', PEER_A).players[0].name).toBe('A');
    });

    it('rejects a name already in use', () => {
      const game = connectPlayer(createGame(), 'A', PEER_A);
      expect(ruleCode(() => connectPlayer(game, 'A', PEER_B))).toBe('NameTaken');
    });
  });

  describe('move', () => {
    it('needs two players', () => {
      const game = connectPlayer(createGame(), 'A', PEER_A);
      expect(gamePhase(game)).toBe('lobby');
      const { game: after, result } = handleCommand(game, { type: 'move', cellIndex: 0, name: 'A' }, PEER_A);
      expect(result).toEqual({ type: 'fail', message: 'Wait for a second player to connect', peer: PEER_A });
      expect(after).toBe(game);
      expect(getCell(after.board, 0)).toBeNull();
    });

    it.each(['A', 'B'])('lets %s take the opening move', (opener) => {
      const other = opener === 'A' ? 'B' : 'A';
      const { game, color } = applyMove(twoPlayers(), 7, opener);
      expect(color).toBe(1);
      expect(game.players.find((p) => p.name === opener)?.color).toBe(1);
      expect(game.players.find((p) => p.name === other)?.color).toBe(2);
      expect(game.players[game.activePlayer ?? -1].name).toBe(other);
      expect(getCell(game.board, 7)).toBe(1);
      expect(gamePhase(game)).toBe('in-play');
    });

    it('rejects a move out of turn and keeps the state', () => {
      const game = applyMove(twoPlayers(), 0, 'A').game;
      const { game: after, result } = handleCommand(game, { type: 'move', cellIndex: 1, name: 'A' }, PEER_A);
      expect(result).toEqual({ type: 'fail', message: "It's not your move", peer: PEER_A });
      expect(after).toBe(game);
      expect(after.activePlayer).toBe(1);
      expect(getCell(after.board, 1)).toBeNull();
    });

    it('alternates turns after the opening move', () => {
      let game = applyMove(twoPlayers(), 0, 'A').game;
      const second = applyMove(game, 1, 'B');
      expect(second.color).toBe(2);
      expect(second.game.winner).toBeNull();
      expect(second.game.activePlayer).toBe(0);
      game = applyMove(second.game, 2, 'A').game;
      expect(ruleCode(() => applyMove(game, 3, 'A'))).toBe('OutOfTurn');
    });

    it('rejects unknown names, bad cells and occupied cells', () => {
      const game = applyMove(twoPlayers(), 0, 'A').game;
      expect(ruleCode(() => applyMove(game, 1, 'C'))).toBe('UnknownPlayer');
      expect(ruleCode(() => applyMove(game, 255, 'B'))).toBe('InvalidCell');
      expect(ruleCode(() => applyMove(game, 0, 'B'))).toBe('CellOccupied');
    });

    it('reports the winner on the fifth stone of a row', () => {
      const game = play(twoPlayers(), [
        ['A', 0],
        ['B', 15],
        ['A', 1],
        ['B', 16],
        ['A', 2],
        ['B', 17],
        ['A', 3],
        ['B', 18],
      ]);
      expect(game.winner).toBeNull();
      const { game: won, result } = handleCommand(game, { type: 'move', cellIndex: 4, name: 'A' }, PEER_A);
      expect(result).toEqual({ type: 'move', cellIndex: 4, color: 1, winner: 'A' });
      expect(gamePhase(won)).toBe('won');
      expect(ruleCode(() => applyMove(won, 100, 'B'))).toBe('GameOver');
    });
  });

  describe('reset', () => {
    it('clears turn, winner and board but keeps roster and colors', () => {
      const game = play(twoPlayers(), [
        ['B', 0],
        ['A', 20],
        ['B', 1],
      ]);
      const reset = resetGame(game);
      expect(reset.activePlayer).toBeNull();
      expect(reset.winner).toBeNull();
      expect(reset.board.cells.every((c) => c === null)).toBe(true);
      expect(reset.players).toEqual(game.players);
      expect(reset.players.map((p) => p.color)).toEqual([2, 1]);
    });

    it('reassigns colors on the next opening move', () => {
      const game = resetGame(applyMove(twoPlayers(), 0, 'B').game);
      const { color, game: next } = applyMove(game, 5, 'A');
      expect(color).toBe(1);
      expect(next.players.map((p) => p.color)).toEqual([1, 2]);
    });
  });

  describe('handleCommand', () => {
    it('answers connect with ok for the peer', () => {
      const command: Command = { type: 'connect', name: 'A' };
      const { result } = handleCommand(createGame(), command, PEER_A);
      expect(result).toEqual<Response>({ type: 'ok', peer: PEER_A });
    });

    it('answers a rejected connect with fail', () => {
      const { game, result } = handleCommand(twoPlayers(), { type: 'connect', name: 'C' }, '10.0.0.3/c');
      expect(result).toEqual({ type: 'fail', message: 'Game is full', peer: '10.0.0.3/c' });
      expect(game.players).toHaveLength(2);
    });

    it('answers reset with reset', () => {
      const { game, result } = handleCommand(applyMove(twoPlayers(), 3, 'A').game, { type: 'reset' }, PEER_B);
      expect(result).toEqual({ type: 'reset' });
      expect(getCell(game.board, 3)).toBeNull();
    });
  });

  describe('removePeer', () => {
    it('resets a game that loses a participant', () => {
      const game = applyMove(twoPlayers(), 3, 'A').game;
      const { game: after, result } = removePeer(game, PEER_B);
      expect(result).toBe(true);
      expect(after.players.map((p) => p.name)).toEqual(['A']);
      expect(after.activePlayer).toBeNull();
      expect(getCell(after.board, 3)).toBeNull();
    });

    it('ignores peers without players', () => {
      const game = twoPlayers();
      expect(removePeer(game, '10.0.0.9/x')).toEqual({ game, result: false });
    });

    it('frees a lobby seat without interrupting anything', () => {
      const game = connectPlayer(createGame(), 'A', PEER_A);
      const { game: after, result } = removePeer(game, PEER_A);
      expect(result).toBe(false);
      expect(after.players).toEqual([]);
    });
  });

  it('snapshots the game for display', () => {
    const game = applyMove(twoPlayers(), 16, 'B').game;
    const snap = toSnapshot(game);
    expect(snap.phase).toBe('in-play');
    expect(snap.columns).toBe(15);
    expect(snap.rows).toBe(17);
    expect(snap.players).toEqual([
      { name: 'A', color: 2 },
      { name: 'B', color: 1 },
    ]);
    expect(snap.activePlayer).toBe('A');
    expect(snap.winner).toBeNull();
    expect(snap.board[16]).toBe(1);
  });
});
