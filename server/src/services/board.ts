import type { Board, Cell } from '../types/game';

export const BOARD_COLUMNS = 15;
export const BOARD_ROWS = 17;

export function createBoard(rows = BOARD_ROWS, columns = BOARD_COLUMNS): Board {
  if (!Number.isInteger(rows) || !Number.isInteger(columns) || rows < 1 || columns < 1) {
    throw new RangeError(`invalid board size ${rows}x${columns}`);
  }
  return { columns, cells: Array<Cell>(rows * columns).fill(null) };
}

export function boardRows(board: Board): number {
  return board.cells.length / board.columns;
}

export function isOnBoard(board: Board, index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < board.cells.length;
}

function assertOnBoard(board: Board, index: number) {
  if (!isOnBoard(board, index)) {
    throw new RangeError(`cell index ${index} is outside the board (0..${board.cells.length - 1})`);
  }
}

export function getCell(board: Board, index: number): Cell {
  assertOnBoard(board, index);
  return board.cells[index];
}

export function setCell(board: Board, index: number, value: Cell): Board {
  assertOnBoard(board, index);
  const cells = board.cells.slice();
  cells[index] = value;
  return { ...board, cells };
}

export function clearBoard(board: Board): Board {
  return { ...board, cells: Array<Cell>(board.cells.length).fill(null) };
}
