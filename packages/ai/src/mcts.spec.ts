import { strict as assert } from "assert";
import {
  type GameState,
  type Move,
  InvalidSearchConfigError,
  NoLegalMovesError,
  SearchAbortedError,
  SeededRng,
} from "@tictacfoe/core";
import { applyMove, newGame } from "@tictacfoe/engine";
import { MctsSearch, scoreFor, search, searchAsync, ucb1 } from "./mcts";
import type { AiConfig, SearchBudget, SearchNode } from "./types";

function cell(c: number): Move {
  return { board: 0, cell: c };
}

function playClassic(cells: number[]): GameState {
  return cells.reduce((state, c) => applyMove(state, cell(c)), newGame("classic"));
}

function iterations(count: number): AiConfig {
  return { budget: { kind: "iterations", count }, explorationConstant: Math.SQRT2 };
}

/** Checks visit bookkeeping for every node below `node`; returns how many nodes were checked. */
function checkVisits(node: SearchNode): number {
  let checked = 0;
  for (const child of node.children) {
    assert.ok(child.visits <= node.visits);
    const childSum = child.children.reduce((sum, c) => sum + c.visits, 0);
    if (child.children.length > 0) {
      assert.equal(child.visits, 1 + childSum);
    }
    checked += 1 + checkVisits(child);
  }
  return checked;
}

describe("mcts", () => {
  describe("scoring", () => {
    it("should score outcomes from the given mark's perspective", () => {
      assert.equal(scoreFor({ status: "win", winner: "X" }, "X"), 1);
      assert.equal(scoreFor({ status: "win", winner: "X" }, "O"), 0);
      assert.equal(scoreFor({ status: "draw" }, "O"), 0.5);
      assert.throws(() => scoreFor({ status: "in_progress" }, "X"));
    });

    it("should rank unvisited children first in UCB1", () => {
      const node: SearchNode = { move: cell(0), mover: "X", visits: 0, wins: 0, children: [] };
      assert.equal(ucb1(node, 10, Math.SQRT2), Infinity);

      const visited: SearchNode = { ...node, visits: 4, wins: 3 };
      const expected = 0.75 + Math.SQRT2 * Math.sqrt(Math.log(10) / 4);
      assert.equal(ucb1(visited, 10, Math.SQRT2), expected);
      assert.equal(ucb1(visited, 10, 0), 0.75);
    });
  });

  describe("search", () => {
    it("should take an immediate win", () => {
      // X X .
      // O O .
      const result = search(playClassic([0, 3, 1, 4]), iterations(1000), new SeededRng("win"));
      assert.deepEqual(result.move, cell(2));
    });

    it("should take its own win as O rather than block", () => {
      const state: GameState = { ...playClassic([0, 3, 1, 4]), activePlayer: "O" };
      const result = search(state, iterations(1000), new SeededRng("o-win"));
      assert.deepEqual(result.move, cell(5));
    });

    it("should block an immediate threat", () => {
      // X X .
      // O . .
      const result = search(playClassic([0, 3, 1]), iterations(1000), new SeededRng("block"));
      assert.deepEqual(result.move, cell(2));
    });

    it("should return the only legal move", () => {
      // X O X
      // X O O
      // O X .
      const state = playClassic([0, 1, 2, 4, 3, 5, 7, 6]);
      const result = search(state, iterations(50), new SeededRng("single"));
      assert.deepEqual(result.move, cell(8));
      assert.equal(result.children.length, 1);
      assert.equal(result.children[0].visits, 50);
    });

    it("should report the search statistics", () => {
      const result = search(newGame("classic"), iterations(400), new SeededRng("stats"));
      assert.equal(result.iterations, 400);
      assert.equal(result.children.length, 9);
      assert.deepEqual(
        result.children.map((c) => c.move.cell),
        [0, 1, 2, 3, 4, 5, 6, 7, 8]
      );
      const best = Math.max(...result.children.map((c) => c.visits));
      const first = result.children.find((c) => c.visits === best);
      assert.deepEqual(result.move, first?.move);
    });

    it("should be reproducible from the seed", () => {
      const state = newGame("ultimate");
      const a = search(state, iterations(200), new SeededRng("repeat"));
      const b = search(state, iterations(200), new SeededRng("repeat"));
      assert.deepEqual(a.move, b.move);
      assert.deepEqual(a.children, b.children);
    });

    it("should not touch the caller's state", () => {
      const state = playClassic([4]);
      const before = JSON.stringify(state);
      search(state, iterations(200), new SeededRng("pure"));
      assert.equal(JSON.stringify(state), before);
    });

    it("should keep visit counts consistent", () => {
      for (const variant of ["classic", "ultimate"] as const) {
        const result = search(newGame(variant), iterations(300), new SeededRng(`visits-${variant}`));
        const { root } = result;

        assert.equal(root.visits, 300);
        assert.equal(
          root.children.reduce((sum, c) => sum + c.visits, 0),
          300
        );
        assert.ok(checkVisits(root) > 0);
      }
    });

    it("should run at least one iteration within a time budget", () => {
      const config: AiConfig = { budget: { kind: "time", ms: 20 }, explorationConstant: Math.SQRT2 };
      const result = search(newGame("ultimate"), config, new SeededRng("time"));
      assert.ok(result.iterations >= 1);
      assert.ok(result.elapsedMs >= 20);
      assert.equal(result.root.visits, result.iterations);
    });

    it("should reject budgets that cannot run an iteration", () => {
      const budgets: SearchBudget[] = [
        { kind: "iterations", count: 0 },
        { kind: "iterations", count: -5 },
        { kind: "iterations", count: 2.5 },
        { kind: "iterations", count: Infinity },
        { kind: "time", ms: 0 },
        { kind: "time", ms: -1 },
        { kind: "time", ms: NaN },
      ];
      for (const budget of budgets) {
        assert.throws(
          () => search(newGame("classic"), { budget, explorationConstant: 1 }, new SeededRng("bad")),
          InvalidSearchConfigError,
          JSON.stringify(budget)
        );
      }
    });

    it("should reject a negative or non-finite exploration constant", () => {
      for (const explorationConstant of [-1, NaN, Infinity]) {
        assert.throws(
          () =>
            search(
              newGame("classic"),
              { budget: { kind: "iterations", count: 10 }, explorationConstant },
              new SeededRng("bad")
            ),
          InvalidSearchConfigError
        );
      }
    });

    it("should throw NoLegalMovesError on a finished game", () => {
      const won = playClassic([0, 3, 1, 4, 2]);
      assert.throws(() => search(won, iterations(10), new SeededRng("over")), NoLegalMovesError);
    });
  });

  describe("MctsSearch", () => {
    it("should grow the tree one node per iteration", () => {
      const mcts = new MctsSearch(newGame("classic"), Math.SQRT2, new SeededRng("grow"));
      for (let i = 0; i < 9; i++) {
        mcts.iterate();
      }
      const result = mcts.result(0);
      assert.equal(mcts.iterationCount, 9);
      // Every root child is expanded once, in enumeration order, before any is revisited
      assert.deepEqual(
        result.children.map((c) => c.visits),
        [1, 1, 1, 1, 1, 1, 1, 1, 1]
      );
      assert.deepEqual(result.move, cell(0));
    });

    it("should refuse to report before any iteration", () => {
      const mcts = new MctsSearch(newGame("classic"), Math.SQRT2, new SeededRng("empty"));
      assert.throws(() => mcts.result(0), /has not run any iterations/);
    });
  });

  describe("searchAsync", () => {
    it("should match the synchronous search for the same seed", async () => {
      const state = newGame("ultimate");
      const sync = search(state, iterations(150), new SeededRng("async"));
      const sliced = await searchAsync(state, iterations(150), new SeededRng("async"), { sliceSize: 16 });
      assert.deepEqual(sliced.move, sync.move);
      assert.deepEqual(sliced.children, sync.children);
      assert.equal(sliced.iterations, 150);
    });

    it("should reject when the signal is already aborted", async () => {
      const controller = new AbortController();
      controller.abort();
      await assert.rejects(
        searchAsync(newGame("classic"), iterations(100), new SeededRng("abort"), { signal: controller.signal }),
        SearchAbortedError
      );
    });

    it("should stop a running search when aborted", async () => {
      const controller = new AbortController();
      const pending = searchAsync(newGame("ultimate"), iterations(1_000_000), new SeededRng("abort"), {
        signal: controller.signal,
        sliceSize: 4,
      });
      setTimeout(() => controller.abort(), 10);
      await assert.rejects(pending, SearchAbortedError);
    });

    it("should reject an invalid config", async () => {
      await assert.rejects(
        searchAsync(newGame("classic"), iterations(0), new SeededRng("bad")),
        InvalidSearchConfigError
      );
    });
  });
});
