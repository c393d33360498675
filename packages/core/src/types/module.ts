import type { GameState, Mark, Move, Outcome, Variant } from "./game";

// ---------------------------------------------------------------------------
// Game UI: shipped by each variant module for rendering
// ---------------------------------------------------------------------------

export interface PieceDisplay {
  /** Character drawn on the board (e.g. "X") */
  symbol: string;
}

/**
 * UI specification that each variant provides so that the terminal front end
 * and the benchmark log can render any variant without per-variant branches.
 */
export interface GameUISpec {
  /** Player labels in turn order */
  playerLabels: Mark[];

  /** Map of mark identifiers to display info */
  pieces: Record<Mark, PieceDisplay>;

  /** Hint text shown to the player to move */
  inputHint: string;

  /**
   * Render the board as a string. Marks are wrapped in
   * `<span class="...">` tags which the terminal maps to colors.
   * `cursor` highlights one cell.
   */
  renderBoard(state: GameState, cursor?: Move): string;

  /** Render a one-line status string, or null if nothing special. */
  renderStatus(state: GameState): string | null;

  /** Parse raw user input into a Move, or return null if it does not parse. */
  parseInput(raw: string, state: GameState): Move | null;

  /** Format a Move for the move history (e.g. "cell 5", "board 3 cell 7"). */
  formatMove(move: Move): string;
}

// ---------------------------------------------------------------------------
// Variant module: the rules every board variant implements
// ---------------------------------------------------------------------------

/**
 * Rules of one board variant.
 *
 * Every function is pure: states are never mutated, and the same inputs
 * always produce the same outputs.
 */
export interface IGameModule {
  /** Unique identifier for this variant */
  readonly variant: Variant;

  /** Human-readable name */
  readonly name: string;

  /** Short description of the variant */
  readonly description: string;

  /** UI rendering specification. */
  readonly ui: GameUISpec;

  /** Initialize a new game state, X to move */
  init(): GameState;

  /** All legal moves in increasing (board, cell) order; empty iff the game is over */
  getLegalMoves(state: GameState): Move[];

  /** Returns the reason a move is illegal, or null if it is legal */
  validateMove(state: GameState, move: Move): string | null;

  /** Apply a legal move and return the new state. Throws IllegalMoveError otherwise. */
  applyMove(state: GameState, move: Move): GameState;

  /**
   * True if `mark` placed at `move` would win the whole game outright, ignoring
   * whose turn it is and the forced-board constraint. The target cell must be empty.
   */
  isWinningPlacement(state: GameState, move: Move, mark: Mark): boolean;

  /** Check if the game has ended */
  isTerminal(state: GameState): boolean;

  getOutcome(state: GameState): Outcome;
}
