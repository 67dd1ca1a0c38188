import { z } from 'zod';
import type { Color, GamePhase, GameSnapshot, GameState, Player, Transition } from '../types/game';
import type { Command, PeerAddress, Response } from '../types/protocol';
import { GameRuleError } from '../lib/errors';
import { boardRows, clearBoard, createBoard, getCell, isOnBoard, setCell } from './board';
import { findWinningLine } from './winDetection';

export const MAX_PLAYERS = 2;
export const MAX_NAME_LENGTH = 32;

const playerNameSchema = z.string().trim().min(1).max(MAX_NAME_LENGTH);

export function createGame(board = createBoard()): GameState {
  return {
    players: [],
    activePlayer: null,
    winner: null,
    board,
  };
}

export function gamePhase(game: GameState): GamePhase {
  if (game.winner !== null) return 'won';
  if (game.players.length < MAX_PLAYERS) return 'lobby';
  return game.activePlayer === null ? 'opening' : 'in-play';
}

export function connectPlayer(game: GameState, name: string, address: PeerAddress): GameState {
  const parsed = playerNameSchema.safeParse(name);
  if (!parsed.success) throw new GameRuleError('InvalidName');
  if (game.players.length >= MAX_PLAYERS) throw new GameRuleError('GameFull');
  if (game.players.some((p) => p.name === parsed.data)) throw new GameRuleError('NameTaken');
  const player: Player = { address, name: parsed.data, color: null };
  return { ...game, players: [...game.players, player] };
}

export interface MoveOutcome {
  game: GameState;
  color: Color;
}

export function applyMove(game: GameState, cellIndex: number, name: string): MoveOutcome {
  if (game.players.length < MAX_PLAYERS) throw new GameRuleError('NotEnoughPlayers');
  const mover = game.players.findIndex((p) => p.name === name);
  if (mover === -1) throw new GameRuleError('UnknownPlayer');
  const other = mover === 0 ? 1 : 0;
  if (game.winner !== null) throw new GameRuleError('GameOver');
  // The opening move is accepted from either participant.
  if (game.activePlayer !== null && game.activePlayer !== mover) throw new GameRuleError('OutOfTurn');
  if (!isOnBoard(game.board, cellIndex)) throw new GameRuleError('InvalidCell');
  if (getCell(game.board, cellIndex) !== null) throw new GameRuleError('CellOccupied');

  const players =
    game.activePlayer === null
      ? game.players.map((p, i): Player => {
          if (i === mover) return { ...p, color: 1 };
          if (i === other) return { ...p, color: 2 };
          return p;
        })
      : game.players;
  const color = players[mover].color;
  if (color === null) throw new Error(`player ${name} is in play without a color`);

  const board = setCell(game.board, cellIndex, color);
  const winner = findWinningLine(board, color) ? name : null;

  return {
    game: { ...game, players, board, activePlayer: other, winner },
    color,
  };
}

/** Clears the turn, the winner and the board. Roster and colors stay. */
export function resetGame(game: GameState): GameState {
  return {
    ...game,
    activePlayer: null,
    winner: null,
    board: clearBoard(game.board),
  };
}

/**
 * Drops the players bound to a disconnected peer. A two-player game that
 * loses a participant cannot continue, so it is reset (`interrupted`).
 */
export function removePeer(game: GameState, address: PeerAddress): Transition<boolean> {
  const players = game.players.filter((p) => p.address !== address);
  if (players.length === game.players.length) return { game, result: false };
  const interrupted = game.players.length >= MAX_PLAYERS;
  const next = { ...game, players };
  return interrupted ? { game: resetGame(next), result: true } : { game: next, result: false };
}

function executeCommand(game: GameState, command: Command, peer: PeerAddress): Transition<Response> {
  switch (command.type) {
    case 'connect':
      return { game: connectPlayer(game, command.name, peer), result: { type: 'ok', peer } };
    case 'move': {
      const outcome = applyMove(game, command.cellIndex, command.name);
      return {
        game: outcome.game,
        result: { type: 'move', cellIndex: command.cellIndex, color: outcome.color, winner: outcome.game.winner },
      };
    }
    case 'reset':
      return { game: resetGame(game), result: { type: 'reset' } };
  }
  const unhandled: never = command;
  throw new Error(`unhandled command ${JSON.stringify(unhandled)}`);
}

/** Applies one command. Rule violations leave the state untouched and answer `fail`. */
export function handleCommand(game: GameState, command: Command, peer: PeerAddress): Transition<Response> {
  try {
    return executeCommand(game, command, peer);
  } catch (err) {
    if (err instanceof GameRuleError) {
      return { game, result: { type: 'fail', message: err.message, peer } };
    }
    throw err;
  }
}

export function toSnapshot(game: GameState): GameSnapshot {
  return {
    phase: gamePhase(game),
    columns: game.board.columns,
    rows: boardRows(game.board),
    players: game.players.map((p) => ({ name: p.name, color: p.color })),
    activePlayer: game.activePlayer === null ? null : game.players[game.activePlayer].name,
    winner: game.winner,
    board: game.board.cells.slice(),
  };
}
