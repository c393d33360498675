import { type GameState, type Move, isValidIndex } from "@tictacfoe/core";
import { CLASSIC_BOARD } from "./state";

export function getLegalMovesForState(state: GameState): Move[] {
  if (state.outcome.status !== "in_progress") {
    return [];
  }

  const board = state.boards[CLASSIC_BOARD];
  const moves: Move[] = [];

  for (let i = 0; i < 9; i++) {
    if (board[i] === "") {
      moves.push({ board: CLASSIC_BOARD, cell: i });
    }
  }

  return moves;
}

export function findMoveViolation(state: GameState, move: Move): string | null {
  if (state.outcome.status !== "in_progress") {
    return "game is already over";
  }
  if (move.board !== CLASSIC_BOARD) {
    return "classic games have a single board";
  }
  if (!isValidIndex(move.cell)) {
    return "cell must be between 0 and 8";
  }
  if (state.boards[CLASSIC_BOARD][move.cell] !== "") {
    return "cell is occupied";
  }
  return null;
}
