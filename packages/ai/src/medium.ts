import { type GameState, type Move, NoLegalMovesError, type Rng, otherMark } from "@tictacfoe/core";
import { isWinningPlacement, legalMoves } from "@tictacfoe/engine";

/**
 * One-ply lookahead: take an immediate win, otherwise block the first cell
 * where the opponent would win if they moved there now, otherwise play at
 * random. In ultimate a win means winning the whole game.
 */
export function mediumMove(state: GameState, rng: Rng): Move {
  const moves = legalMoves(state);
  if (moves.length === 0) {
    throw new NoLegalMovesError();
  }

  const me = state.activePlayer;
  const win = moves.find((m) => isWinningPlacement(state, m, me));
  if (win) {
    return win;
  }

  const opponent = otherMark(me);
  const block = moves.find((m) => isWinningPlacement(state, m, opponent));
  if (block) {
    return block;
  }

  return rng.pick(moves);
}
