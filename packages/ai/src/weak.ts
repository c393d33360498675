import { type GameState, type Move, NoLegalMovesError, type Rng } from "@tictacfoe/core";
import { legalMoves } from "@tictacfoe/engine";

export function weakMove(state: GameState, rng: Rng): Move {
  const moves = legalMoves(state);
  if (moves.length === 0) {
    throw new NoLegalMovesError();
  }
  return rng.pick(moves);
}
