import type { Move } from "./types/game";

/** A move that is out of range, on an occupied cell, on a closed board, off the forced board, or after the game ended. */
export class IllegalMoveError extends Error {
  readonly move: Move;
  readonly reason: string;

  constructor(move: Move, reason: string) {
    super(`Illegal move (board ${move.board}, cell ${move.cell}): ${reason}`);
    this.name = "IllegalMoveError";
    this.move = move;
    this.reason = reason;
  }
}

/** A strategy was asked to move in a finished game. */
export class NoLegalMovesError extends Error {
  constructor() {
    super("No legal moves: the game is already over");
    this.name = "NoLegalMovesError";
  }
}

/** The search budget or exploration constant cannot produce a single simulation. */
export class InvalidSearchConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidSearchConfigError";
  }
}

export class SearchAbortedError extends Error {
  constructor() {
    super("Search was aborted");
    this.name = "SearchAbortedError";
  }
}
