/** A player's mark */
export type Mark = "X" | "O";

/** Cell values: "X", "O", or "" for empty */
export type CellValue = Mark | "";

/** A 3x3 board being filled in: a flat array of 9 cells (row-major) */
export type BoardCells = [
  CellValue, CellValue, CellValue,
  CellValue, CellValue, CellValue,
  CellValue, CellValue, CellValue,
];

/** A board inside a game state. States share boards, so they are never written to. */
export type Board = Readonly<BoardCells>;

/** Status of a single board: still open, won by a mark, or drawn */
export type MetaMark = "open" | Mark | "draw";

export type Variant = "classic" | "ultimate";

/**
 * A placement. Classic moves always target board 0; ultimate moves name the
 * sub-board (0-8) and the cell inside it (0-8).
 */
export interface Move {
  readonly board: number;
  readonly cell: number;
}

export type Outcome =
  | { status: "in_progress" }
  | { status: "win"; winner: Mark }
  | { status: "draw" };

/**
 * Immutable snapshot of a game. Moves produce a new state that shares the
 * untouched boards with the previous one.
 */
export interface GameState {
  readonly variant: Variant;
  /** One board for classic, nine sub-boards for ultimate */
  readonly boards: readonly Board[];
  /** Status of each entry in `boards`, recomputed after every move */
  readonly meta: readonly MetaMark[];
  readonly activePlayer: Mark;
  /** Sub-board the next move must be played in, or null for any open board */
  readonly forcedBoard: number | null;
  readonly outcome: Outcome;
  readonly moveHistory: readonly Move[];
}
