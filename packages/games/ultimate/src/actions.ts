import { type GameState, type Move, isValidIndex } from "@tictacfoe/core";

/** Sub-boards the player to move may play in. */
export function getPlayableBoards(state: GameState): number[] {
  if (state.outcome.status !== "in_progress") {
    return [];
  }
  if (state.forcedBoard !== null) {
    return [state.forcedBoard];
  }
  const boards: number[] = [];
  for (let b = 0; b < state.meta.length; b++) {
    if (state.meta[b] === "open") boards.push(b);
  }
  return boards;
}

export function getLegalMovesForState(state: GameState): Move[] {
  const moves: Move[] = [];

  for (const b of getPlayableBoards(state)) {
    const board = state.boards[b];
    for (let cell = 0; cell < 9; cell++) {
      if (board[cell] === "") {
        moves.push({ board: b, cell });
      }
    }
  }

  return moves;
}

export function findMoveViolation(state: GameState, move: Move): string | null {
  if (state.outcome.status !== "in_progress") {
    return "game is already over";
  }
  if (!isValidIndex(move.board) || !isValidIndex(move.cell)) {
    return "board and cell must be between 0 and 8";
  }
  if (state.meta[move.board] !== "open") {
    return `sub-board ${move.board} is already decided`;
  }
  if (state.forcedBoard !== null && state.forcedBoard !== move.board) {
    return `must play in sub-board ${state.forcedBoard}`;
  }
  if (state.boards[move.board][move.cell] !== "") {
    return "cell is occupied";
  }
  return null;
}
