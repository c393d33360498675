import {
  type GameState,
  type IGameModule,
  IllegalMoveError,
  type Mark,
  type Move,
  type Outcome,
  checkWinner,
  getBoardStatus,
  isValidIndex,
  otherMark,
  withMark,
} from "@tictacfoe/core";
import { UltimateUI } from "./ui";
import { computeMeta, initialUltimateState, metaOutcome, nextForcedBoard } from "./state";
import { findMoveViolation, getLegalMovesForState } from "./actions";

export const UltimateModule: IGameModule = {
  variant: "ultimate",
  name: "Ultimate Tic-Tac-Toe",
  description:
    "Nine boards in a 3x3 grid. Your cell sends your opponent to the matching board. Win three boards in a row.",
  ui: UltimateUI,

  init(): GameState {
    return initialUltimateState();
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

    const boards = state.boards.map((board, i) =>
      i === move.board ? withMark(board, move.cell, state.activePlayer) : board
    );
    const meta = computeMeta(boards);
    const outcome = metaOutcome(meta);

    return {
      variant: "ultimate",
      boards,
      meta,
      activePlayer: otherMark(state.activePlayer),
      forcedBoard: outcome.status === "in_progress" ? nextForcedBoard(meta, move.cell) : null,
      outcome,
      moveHistory: [...state.moveHistory, { board: move.board, cell: move.cell }],
    };
  },

  isWinningPlacement(state: GameState, move: Move, mark: Mark): boolean {
    if (!isValidIndex(move.board) || !isValidIndex(move.cell)) {
      return false;
    }
    const target = state.boards[move.board];
    if (state.meta[move.board] !== "open" || target[move.cell] !== "") {
      return false;
    }
    const meta = [...state.meta];
    meta[move.board] = getBoardStatus(withMark(target, move.cell, mark));
    return checkWinner(meta) === mark;
  },

  isTerminal(state: GameState): boolean {
    return state.outcome.status !== "in_progress";
  },

  getOutcome(state: GameState): Outcome {
    return state.outcome;
  },
};
