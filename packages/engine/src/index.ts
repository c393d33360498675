export { GameRegistry, createDefaultRegistry, defaultRegistry } from "./GameRegistry";
export { GameController } from "./GameController";
export type { GameControllerOptions, MoveChooser, SubmitResult } from "./GameController";
export {
  newGame,
  legalMoves,
  applyMove,
  tryApplyMove,
  isLegalMove,
  isWinningPlacement,
  getOutcome,
  isTerminal,
  getGameUI,
} from "./rules";
export type { MoveResult } from "./rules";
