import {
  type Board,
  type GameState,
  type MetaMark,
  type Outcome,
  checkWinner,
  emptyBoard,
  getBoardStatus,
} from "@tictacfoe/core";

export const SUB_BOARDS = 9;

export function initialUltimateState(): GameState {
  return {
    variant: "ultimate",
    boards: Array.from({ length: SUB_BOARDS }, () => emptyBoard()),
    meta: Array.from({ length: SUB_BOARDS }, (): MetaMark => "open"),
    activePlayer: "X",
    forcedBoard: null,
    outcome: { status: "in_progress" },
    moveHistory: [],
  };
}

/** Status of every sub-board, recomputed from scratch. */
export function computeMeta(boards: readonly Board[]): MetaMark[] {
  return boards.map(getBoardStatus);
}

/**
 * The next player is sent to the sub-board whose index equals the cell just
 * played, unless that sub-board is already decided.
 */
export function nextForcedBoard(meta: readonly MetaMark[], cell: number): number | null {
  return meta[cell] === "open" ? cell : null;
}

/**
 * A line of three sub-boards won by the same mark wins the game. With no
 * line and no open sub-board left the game is drawn.
 */
export function metaOutcome(meta: readonly MetaMark[]): Outcome {
  const winner = checkWinner(meta);
  if (winner !== "") return { status: "win", winner };
  if (meta.every((m) => m !== "open")) return { status: "draw" };
  return { status: "in_progress" };
}
