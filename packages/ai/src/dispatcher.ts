import type { GameState, Move, Rng } from "@tictacfoe/core";
import type { MoveChooser } from "@tictacfoe/engine";
import { weakMove } from "./weak";
import { mediumMove } from "./medium";
import { search, searchAsync } from "./mcts";
import type { AiConfig, Strategy } from "./types";

/**
 * Pick a move for the player to move. `config` only affects "strong".
 * Throws NoLegalMovesError on a finished game and InvalidSearchConfigError
 * when a strong search cannot run.
 */
export function chooseMove(
  state: GameState,
  strategy: Strategy,
  config: AiConfig,
  rng: Rng
): Move {
  switch (strategy) {
    case "weak":
      return weakMove(state, rng);
    case "medium":
      return mediumMove(state, rng);
    case "strong":
      return search(state, config, rng).move;
  }
}

/** Like `chooseMove`, but a strong search yields to the event loop and can be aborted. */
export async function chooseMoveAsync(
  state: GameState,
  strategy: Strategy,
  config: AiConfig,
  rng: Rng,
  signal?: AbortSignal
): Promise<Move> {
  if (strategy !== "strong") {
    return chooseMove(state, strategy, config, rng);
  }
  const result = await searchAsync(state, config, rng, { signal });
  return result.move;
}

/** Bind a strategy to its config and randomness, for GameController.playAi. */
export function createPlayer(
  strategy: Strategy,
  config: AiConfig,
  rng: Rng
): MoveChooser {
  return (state) => chooseMove(state, strategy, config, rng);
}
