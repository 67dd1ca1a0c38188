import type { Board, Color } from '../types/game';

export const WIN_LENGTH = 5;

/** Strides of the vertical and the two diagonal directions, relative to the row width. */
export function strideDirections(columns: number): number[] {
  return [columns, columns - 1, columns + 1];
}

export function findHorizontalLine(board: Board, color: Color, length = WIN_LENGTH): number[] | null {
  const { cells, columns } = board;
  for (let rowStart = 0; rowStart < cells.length; rowStart += columns) {
    let run: number[] = [];
    for (let idx = rowStart; idx < rowStart + columns; idx++) {
      if (cells[idx] !== color) {
        run = [];
        continue;
      }
      run.push(idx);
      if (run.length >= length) return run;
    }
  }
  return null;
}

// The step from `index` along `stride`, or null when it leaves the board or
// lands outside the neighbouring column the stride implies (row wraparound).
function nextAlong(board: Board, index: number, stride: number): number | null {
  const next = index + stride;
  if (next >= board.cells.length) return null;
  const shift = stride - board.columns;
  return next % board.columns === (index % board.columns) + shift ? next : null;
}

export function findStrideLine(board: Board, color: Color, stride: number, length = WIN_LENGTH): number[] | null {
  if (Math.abs(stride - board.columns) > 1) {
    throw new RangeError(`stride ${stride} is not a line direction for width ${board.columns}`);
  }
  for (let start = 0; start < board.cells.length; start++) {
    const line: number[] = [];
    let idx: number | null = start;
    while (idx !== null && board.cells[idx] === color) {
      line.push(idx);
      if (line.length >= length) return line;
      idx = nextAlong(board, idx, stride);
    }
  }
  return null;
}

/**
 * First run of at least `length` cells of `color`, horizontal rows first,
 * then vertical and both diagonals. Returns the cell indices of the run.
 */
export function findWinningLine(board: Board, color: Color, length = WIN_LENGTH): number[] | null {
  const horizontal = findHorizontalLine(board, color, length);
  if (horizontal) return horizontal;
  for (const stride of strideDirections(board.columns)) {
    const line = findStrideLine(board, color, stride, length);
    if (line) return line;
  }
  return null;
}
