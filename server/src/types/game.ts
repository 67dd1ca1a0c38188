export type Color = 1 | 2;

export type Cell = Color | null;

export interface Board {
  columns: number;
  cells: readonly Cell[]; // rows * columns, row-major
}

export interface Player {
  address: string;
  name: string;
  color: Color | null; // assigned on the opening move
}

export interface GameState {
  players: readonly Player[];
  activePlayer: number | null; // index into players
  winner: string | null;
  board: Board;
}

export type GamePhase = 'lobby' | 'opening' | 'in-play' | 'won';

export interface GameSnapshot {
  phase: GamePhase;
  columns: number;
  rows: number;
  players: { name: string; color: Color | null }[];
  activePlayer: string | null;
  winner: string | null;
  board: Cell[];
}

/** Result of running one operation against the state: the next state and what to report. */
export interface Transition<T> {
  game: GameState;
  result: T;
}
