import {
  type Board,
  type GameState,
  type IGameModule,
  IllegalMoveError,
  type Mark,
  type Move,
  type Outcome,
  checkWinner,
  getBoardStatus,
  otherMark,
  withMark,
} from "@tictacfoe/core";
import { TicTacToeUI } from "./ui";
import { CLASSIC_BOARD, initialClassicState } from "./state";
import { findMoveViolation, getLegalMovesForState } from "./actions";

function outcomeOf(board: Board): Outcome {
  const status = getBoardStatus(board);
  if (status === "open") return { status: "in_progress" };
  if (status === "draw") return { status: "draw" };
  return { status: "win", winner: status };
}

export const TicTacToeModule: IGameModule = {
  variant: "classic",
  name: "Tic-Tac-Toe",
  description: "Classic 3x3 grid game. Get three in a row to win.",
  ui: TicTacToeUI,

  init(): GameState {
    return initialClassicState();
  },

  getLegalMoves(state: GameState): Move[] {
    return getLegalMovesForState(state);
  },

  validateMove(state: GameState, move: Move): string | null {
    return findMoveViolation(state, move);
  },

  applyMove(state: GameState, move: Move): GameState {
    const violation = findMoveViolation(state, move);
    if (violation) {
      throw new IllegalMoveError(move, violation);
    }

    const newBoard = withMark(state.boards[CLASSIC_BOARD], move.cell, state.activePlayer);

    return {
      variant: "classic",
      boards: [newBoard],
      meta: [getBoardStatus(newBoard)],
      activePlayer: otherMark(state.activePlayer),
      forcedBoard: null,
      outcome: outcomeOf(newBoard),
      moveHistory: [...state.moveHistory, { board: move.board, cell: move.cell }],
    };
  },

  isWinningPlacement(state: GameState, move: Move, mark: Mark): boolean {
    const board = state.boards[CLASSIC_BOARD];
    if (move.board !== CLASSIC_BOARD || board[move.cell] !== "") {
      return false;
    }
    return checkWinner(withMark(board, move.cell, mark)) === mark;
  },

  isTerminal(state: GameState): boolean {
    return state.outcome.status !== "in_progress";
  },

  getOutcome(state: GameState): Outcome {
    return state.outcome;
  },
};
