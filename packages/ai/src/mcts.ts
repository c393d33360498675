import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import {
  type GameState,
  InvalidSearchConfigError,
  type Mark,
  type Move,
  NoLegalMovesError,
  type Outcome,
  type Rng,
  SearchAbortedError,
  otherMark,
} from "@tictacfoe/core";
import { applyMove, getOutcome, legalMoves } from "@tictacfoe/engine";
import type {
  AiConfig,
  ChildStats,
  SearchAsyncOptions,
  SearchBudget,
  SearchNode,
  SearchResult,
} from "./types";

const DEFAULT_SLICE_SIZE = 64;

interface TreeNode extends SearchNode {
  state: GameState;
  /** Moves not expanded yet, in enumeration order */
  untried: Move[];
  children: TreeNode[];
}

function createNode(state: GameState, move: Move | null, mover: Mark): TreeNode {
  return {
    state,
    move,
    mover,
    visits: 0,
    wins: 0,
    untried: legalMoves(state),
    children: [],
  };
}

/** Rollout score for `mark`: 1 for a win, 0.5 for a draw, 0 for a loss. */
export function scoreFor(outcome: Outcome, mark: Mark): number {
  switch (outcome.status) {
    case "win":
      return outcome.winner === mark ? 1 : 0;
    case "draw":
      return 0.5;
    case "in_progress":
      throw new Error("Cannot score a game that is still in progress");
  }
}

function rollout(state: GameState, rng: Rng): Outcome {
  let current = state;
  for (;;) {
    const moves = legalMoves(current);
    if (moves.length === 0) {
      return getOutcome(current);
    }
    current = applyMove(current, rng.pick(moves));
  }
}

export function ucb1(child: SearchNode, parentVisits: number, explorationConstant: number): number {
  if (child.visits === 0) {
    return Infinity;
  }
  return (
    child.wins / child.visits +
    explorationConstant * Math.sqrt(Math.log(parentVisits) / child.visits)
  );
}

export function validateConfig(config: AiConfig): void {
  const { budget, explorationConstant } = config;
  if (budget.kind === "iterations") {
    if (!Number.isInteger(budget.count) || budget.count <= 0) {
      throw new InvalidSearchConfigError(
        `Iteration budget must be a positive integer, got ${budget.count}`
      );
    }
  } else if (!Number.isFinite(budget.ms) || budget.ms <= 0) {
    throw new InvalidSearchConfigError(`Time budget must be a positive number of ms, got ${budget.ms}`);
  }
  if (!Number.isFinite(explorationConstant) || explorationConstant < 0) {
    throw new InvalidSearchConfigError(
      `Exploration constant must be a finite non-negative number, got ${explorationConstant}`
    );
  }
}

function budgetSpent(budget: SearchBudget, iterations: number, startedAt: number): boolean {
  if (budget.kind === "iterations") {
    return iterations >= budget.count;
  }
  return iterations > 0 && performance.now() - startedAt >= budget.ms;
}

/**
 * Monte Carlo Tree Search over one position. Each `iterate()` call runs one
 * selection / expansion / simulation / backpropagation pass; the caller
 * decides when to stop and reads the answer from `result()`.
 */
export class MctsSearch {
  private readonly root: TreeNode;
  private iterations = 0;

  constructor(
    state: GameState,
    private readonly explorationConstant: number,
    private readonly rng: Rng
  ) {
    this.root = createNode(state, null, otherMark(state.activePlayer));
    if (this.root.untried.length === 0) {
      throw new NoLegalMovesError();
    }
  }

  get iterationCount(): number {
    return this.iterations;
  }

  iterate(): void {
    const path: TreeNode[] = [this.root];
    let node = this.root;

    while (node.untried.length === 0 && node.children.length > 0) {
      node = this.selectChild(node);
      path.push(node);
    }

    const move = node.untried.shift();
    if (move) {
      const child = createNode(applyMove(node.state, move), move, node.state.activePlayer);
      node.children.push(child);
      node = child;
      path.push(child);
    }

    const outcome = rollout(node.state, this.rng);
    for (const visited of path) {
      visited.visits += 1;
      visited.wins += scoreFor(outcome, visited.mover);
    }
    this.iterations += 1;
  }

  /** The most visited root child; ties go to the first in enumeration order. */
  result(elapsedMs: number): SearchResult {
    const children: ChildStats[] = this.root.children.flatMap((c) =>
      c.move ? [{ move: c.move, visits: c.visits, wins: c.wins }] : []
    );

    let best: ChildStats | undefined;
    for (const child of children) {
      if (!best || child.visits > best.visits) {
        best = child;
      }
    }
    if (!best) {
      throw new Error("Search has not run any iterations");
    }

    return {
      move: best.move,
      iterations: this.iterations,
      elapsedMs,
      children,
      root: this.root,
    };
  }

  private selectChild(node: TreeNode): TreeNode {
    let best = node.children[0];
    let bestScore = -Infinity;
    for (const child of node.children) {
      const score = ucb1(child, node.visits, this.explorationConstant);
      if (score > bestScore) {
        best = child;
        bestScore = score;
      }
    }
    return best;
  }
}

/**
 * Run a search to completion on the calling thread.
 * Throws InvalidSearchConfigError for a budget that cannot run a single
 * iteration and NoLegalMovesError for a finished game.
 */
export function search(state: GameState, config: AiConfig, rng: Rng): SearchResult {
  validateConfig(config);
  const startedAt = performance.now();
  const mcts = new MctsSearch(state, config.explorationConstant, rng);

  while (!budgetSpent(config.budget, mcts.iterationCount, startedAt)) {
    mcts.iterate();
  }
  return mcts.result(performance.now() - startedAt);
}

/**
 * Same search as `search`, run in slices with a yield to the event loop
 * between them so a UI keeps rendering. Rejects with SearchAbortedError once
 * `signal` fires.
 */
export async function searchAsync(
  state: GameState,
  config: AiConfig,
  rng: Rng,
  opts: SearchAsyncOptions = {}
): Promise<SearchResult> {
  validateConfig(config);
  const { signal, sliceSize = DEFAULT_SLICE_SIZE } = opts;
  if (!Number.isInteger(sliceSize) || sliceSize <= 0) {
    throw new InvalidSearchConfigError(`Slice size must be a positive integer, got ${sliceSize}`);
  }

  const startedAt = performance.now();
  const mcts = new MctsSearch(state, config.explorationConstant, rng);

  while (!budgetSpent(config.budget, mcts.iterationCount, startedAt)) {
    if (signal?.aborted) {
      throw new SearchAbortedError();
    }
    for (let i = 0; i < sliceSize && !budgetSpent(config.budget, mcts.iterationCount, startedAt); i++) {
      mcts.iterate();
    }
    await yieldToEventLoop();
  }
  if (signal?.aborted) {
    throw new SearchAbortedError();
  }
  return mcts.result(performance.now() - startedAt);
}
