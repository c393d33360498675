import type { Mark, Move } from "@tictacfoe/core";

export type Strategy = "weak" | "medium" | "strong";

export const STRATEGIES: readonly Strategy[] = ["weak", "medium", "strong"];

/** How long a search runs: a fixed number of simulations or a wall-clock allowance. */
export type SearchBudget =
  | { kind: "iterations"; count: number }
  | { kind: "time"; ms: number };

export interface AiConfig {
  budget: SearchBudget;
  /** UCB1 exploration constant `C` */
  explorationConstant: number;
}

export const DEFAULT_AI_CONFIG: AiConfig = {
  budget: { kind: "iterations", count: 1000 },
  explorationConstant: Math.SQRT2,
};

/**
 * One node of the search tree. A node owns its children; there is no parent
 * pointer, the search keeps the path it walked instead.
 */
export interface SearchNode {
  /** Move that led here from the parent; null at the root */
  move: Move | null;
  /** Player who made `move`; scores are kept from this player's perspective */
  mover: Mark;
  visits: number;
  /** Sum of rollout scores: 1 win, 0.5 draw, 0 loss */
  wins: number;
  children: SearchNode[];
}

export interface ChildStats {
  move: Move;
  visits: number;
  wins: number;
}

export interface SearchResult {
  move: Move;
  iterations: number;
  elapsedMs: number;
  /** Statistics of the root's children, in enumeration order */
  children: ChildStats[];
  root: SearchNode;
}

export interface SearchAsyncOptions {
  signal?: AbortSignal;
  /** Iterations run between two yields to the event loop */
  sliceSize?: number;
}
