import type { GameState, Mark, Move, Outcome, Variant } from "@tictacfoe/core";
import { applyMove, getOutcome, isTerminal, legalMoves, newGame } from "./rules";

export interface GameControllerOptions {
  variant: Variant;
}

/** Picks a move for the player to move, e.g. an AI strategy bound to its config. */
export type MoveChooser = (state: GameState) => Move;

export interface SubmitResult {
  state: GameState;
  terminal: boolean;
  outcome?: Outcome;
}

/**
 * Owns the authoritative state of a single game: applies moves from humans or
 * AIs, and keeps every previous state so moves can be taken back.
 */
export class GameController {
  private state: GameState;
  private past: GameState[] = [];

  constructor(opts: GameControllerOptions) {
    this.state = newGame(opts.variant);
  }

  getState(): GameState {
    return this.state;
  }

  getVariant(): Variant {
    return this.state.variant;
  }

  getActivePlayer(): Mark {
    return this.state.activePlayer;
  }

  getTurnNumber(): number {
    return this.state.moveHistory.length;
  }

  isTerminal(): boolean {
    return isTerminal(this.state);
  }

  getOutcome(): Outcome {
    return getOutcome(this.state);
  }

  legalMoves(): Move[] {
    return legalMoves(this.state);
  }

  /**
   * Apply a move for the player to move. Throws IllegalMoveError and leaves
   * the state untouched if the move is not legal.
   */
  submitMove(move: Move): SubmitResult {
    const next = applyMove(this.state, move);
    this.past.push(this.state);
    this.state = next;

    const terminal = isTerminal(next);
    return {
      state: next,
      terminal,
      outcome: terminal ? getOutcome(next) : undefined,
    };
  }

  /** Ask `choose` for a move on the AI's behalf and apply it. */
  playAi(choose: MoveChooser): SubmitResult {
    return this.submitMove(choose(this.state));
  }

  /** Take back the last move. Returns false if no move has been played. */
  undo(): boolean {
    const previous = this.past.pop();
    if (!previous) {
      return false;
    }
    this.state = previous;
    return true;
  }

  /** Start over, keeping the variant unless another one is given. */
  reset(variant: Variant = this.state.variant): void {
    this.state = newGame(variant);
    this.past = [];
  }
}
