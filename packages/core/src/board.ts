import type { Board, BoardCells, CellValue, Mark, MetaMark } from "./types/game";

/** All possible winning lines (indices into the flat board array) */
export const WIN_LINES: [number, number, number][] = [
  // Rows
  [0, 1, 2],
  [3, 4, 5],
  [6, 7, 8],
  // Columns
  [0, 3, 6],
  [1, 4, 7],
  [2, 5, 8],
  // Diagonals
  [0, 4, 8],
  [2, 4, 6],
];

export const BOARD_CELLS = 9;

export function emptyBoard(): BoardCells {
  return ["", "", "", "", "", "", "", "", ""];
}

/** Copy of `board` with `mark` written at `cell`. */
export function withMark(board: Board, cell: number, mark: Mark): Board {
  const next: BoardCells = [...board];
  next[cell] = mark;
  return next;
}

/**
 * Returns the mark owning a complete line, or "" if there is none.
 * Works on plain cells and on meta-board statuses alike; "open" and "draw"
 * entries never form a line.
 */
export function checkWinner(cells: readonly (CellValue | MetaMark)[]): CellValue {
  for (const [a, b, c] of WIN_LINES) {
    const first = cells[a];
    if ((first === "X" || first === "O") && first === cells[b] && first === cells[c]) {
      return first;
    }
  }
  return "";
}

export function isBoardFull(board: Board): boolean {
  return board.every((cell) => cell !== "");
}

export function getBoardStatus(board: Board): MetaMark {
  const winner = checkWinner(board);
  if (winner !== "") return winner;
  return isBoardFull(board) ? "draw" : "open";
}

export function otherMark(mark: Mark): Mark {
  return mark === "X" ? "O" : "X";
}

export function isValidIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < BOARD_CELLS;
}
