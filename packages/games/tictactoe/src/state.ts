import { type GameState, emptyBoard } from "@tictacfoe/core";

/** The single board of a classic game lives at index 0 */
export const CLASSIC_BOARD = 0;

export function initialClassicState(): GameState {
  return {
    variant: "classic",
    boards: [emptyBoard()],
    meta: ["open"],
    activePlayer: "X",
    forcedBoard: null,
    outcome: { status: "in_progress" },
    moveHistory: [],
  };
}
