import {
  type GameState,
  type GameUISpec,
  IllegalMoveError,
  type Mark,
  type Move,
  type Outcome,
  type Variant,
} from "@tictacfoe/core";
import { defaultRegistry } from "./GameRegistry";

export type MoveResult =
  | { ok: true; state: GameState }
  | { ok: false; error: IllegalMoveError };

export function newGame(variant: Variant): GameState {
  return defaultRegistry.get(variant).init();
}

/** Every legal move in increasing (board, cell) order; empty iff the game is over. */
export function legalMoves(state: GameState): Move[] {
  return defaultRegistry.get(state.variant).getLegalMoves(state);
}

/** Apply a move for the player to move. Throws IllegalMoveError if it is not legal. */
export function applyMove(state: GameState, move: Move): GameState {
  return defaultRegistry.get(state.variant).applyMove(state, move);
}

export function tryApplyMove(state: GameState, move: Move): MoveResult {
  try {
    return { ok: true, state: applyMove(state, move) };
  } catch (err) {
    if (err instanceof IllegalMoveError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

export function isLegalMove(state: GameState, move: Move): boolean {
  return defaultRegistry.get(state.variant).validateMove(state, move) === null;
}

export function isWinningPlacement(state: GameState, move: Move, mark: Mark): boolean {
  return defaultRegistry.get(state.variant).isWinningPlacement(state, move, mark);
}

export function getOutcome(state: GameState): Outcome {
  return defaultRegistry.get(state.variant).getOutcome(state);
}

export function isTerminal(state: GameState): boolean {
  return defaultRegistry.get(state.variant).isTerminal(state);
}

/**
 * Look up the UI specification for a variant.
 */
export function getGameUI(variant: Variant): GameUISpec {
  return defaultRegistry.get(variant).ui;
}
