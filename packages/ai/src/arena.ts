import type { Mark, Move, Outcome, Variant } from "@tictacfoe/core";
import { GameController, type MoveChooser } from "@tictacfoe/engine";

export interface MatchResult {
  outcome: Outcome;
  moves: readonly Move[];
}

export interface SeriesTally {
  /** Games won by the first player of the series */
  a: number;
  /** Games won by the second player of the series */
  b: number;
  draws: number;
}

/** Play one game to the end with a chooser seated on each mark. */
export function playMatch(variant: Variant, players: Record<Mark, MoveChooser>): MatchResult {
  const game = new GameController({ variant });
  while (!game.isTerminal()) {
    game.playAi(players[game.getActivePlayer()]);
  }
  return { outcome: game.getOutcome(), moves: game.getState().moveHistory };
}

/**
 * Play `games` games between `a` and `b`, alternating who starts:
 * `a` plays X in even-numbered games and O in odd-numbered ones.
 */
export function playSeries(
  variant: Variant,
  a: MoveChooser,
  b: MoveChooser,
  games: number,
  onGame?: (index: number, result: MatchResult, aMark: Mark) => void
): SeriesTally {
  const tally: SeriesTally = { a: 0, b: 0, draws: 0 };

  for (let i = 0; i < games; i++) {
    const aMark: Mark = i % 2 === 0 ? "X" : "O";
    const players: Record<Mark, MoveChooser> = aMark === "X" ? { X: a, O: b } : { X: b, O: a };
    const result = playMatch(variant, players);

    if (result.outcome.status === "win") {
      if (result.outcome.winner === aMark) {
        tally.a++;
      } else {
        tally.b++;
      }
    } else {
      tally.draws++;
    }
    onGame?.(i, result, aMark);
  }

  return tally;
}
