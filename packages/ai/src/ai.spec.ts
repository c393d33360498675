import { strict as assert } from "assert";
import {
  type Board,
  type GameState,
  type Mark,
  type Move,
  InvalidSearchConfigError,
  NoLegalMovesError,
  SeededRng,
  emptyBoard,
} from "@tictacfoe/core";
import { applyMove, isLegalMove, newGame } from "@tictacfoe/engine";
import { computeMeta } from "@tictacfoe/game-ultimate";
import { weakMove } from "./weak";
import { mediumMove } from "./medium";
import { chooseMove, chooseMoveAsync, createPlayer } from "./dispatcher";
import { playMatch, playSeries } from "./arena";
import { type AiConfig, DEFAULT_AI_CONFIG } from "./types";

function cell(c: number): Move {
  return { board: 0, cell: c };
}

function playClassic(cells: number[]): GameState {
  return cells.reduce((state, c) => applyMove(state, cell(c)), newGame("classic"));
}

function board(cells: string): Board {
  const parsed = emptyBoard();
  for (let i = 0; i < 9; i++) {
    const c = cells[i];
    parsed[i] = c === "X" || c === "O" ? c : "";
  }
  return parsed;
}

function ultimatePosition(
  diagrams: Record<number, string>,
  activePlayer: Mark,
  forcedBoard: number | null
): GameState {
  const boards = Array.from({ length: 9 }, (_, i) => board(diagrams[i] ?? "........."));
  return { ...newGame("ultimate"), boards, meta: computeMeta(boards), activePlayer, forcedBoard };
}

// X X .
// O O .
// . . .
const XX_OO = playClassic([0, 3, 1, 4]);

describe("weak", () => {
  it("should only return legal moves", () => {
    const rng = new SeededRng("weak-legal");
    const state = playClassic([4, 0]);
    for (let i = 0; i < 100; i++) {
      assert.equal(isLegalMove(state, weakMove(state, rng)), true);
    }
  });

  it("should reach every legal move", () => {
    const rng = new SeededRng("weak-spread");
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      seen.add(weakMove(newGame("classic"), rng).cell);
    }
    assert.equal(seen.size, 9);
  });

  it("should be reproducible from the seed", () => {
    const a = new SeededRng("same");
    const b = new SeededRng("same");
    const state = newGame("ultimate");
    for (let i = 0; i < 20; i++) {
      assert.deepEqual(weakMove(state, a), weakMove(state, b));
    }
  });

  it("should throw NoLegalMovesError on a finished game", () => {
    const won = playClassic([0, 3, 1, 4, 2]);
    assert.throws(() => weakMove(won, new SeededRng("x")), NoLegalMovesError);
  });
});

describe("medium", () => {
  it("should take an immediate win", () => {
    assert.deepEqual(mediumMove(XX_OO, new SeededRng("m")), cell(2));
  });

  it("should prefer its own win over a block", () => {
    const oToMove: GameState = { ...XX_OO, activePlayer: "O" };
    assert.deepEqual(mediumMove(oToMove, new SeededRng("m")), cell(5));
  });

  it("should block the opponent's winning cell", () => {
    // X X .
    // O . .
    // . . .
    assert.deepEqual(mediumMove(playClassic([0, 3, 1]), new SeededRng("m")), cell(2));
  });

  it("should block the first threat in enumeration order", () => {
    // X X .
    // . O .
    // X . O   X threatens 2 and 3
    const state = playClassic([0, 4, 1, 8, 6]);
    assert.deepEqual(mediumMove(state, new SeededRng("m")), cell(2));
  });

  it("should win the whole ultimate game when it can", () => {
    const state = ultimatePosition({ 0: "XXX......", 1: "XXX......", 2: "XX......." }, "X", 2);
    assert.deepEqual(mediumMove(state, new SeededRng("m")), { board: 2, cell: 2 });
  });

  it("should block an ultimate game-winning cell", () => {
    const state = ultimatePosition({ 0: "XXX......", 1: "XXX......", 2: "XX......." }, "O", null);
    assert.deepEqual(mediumMove(state, new SeededRng("m")), { board: 2, cell: 2 });
  });

  it("should fall back to a random move inside the forced board", () => {
    const state = ultimatePosition({ 0: "XXX......", 1: "XXX......", 2: "XX......." }, "O", 5);
    const move = mediumMove(state, new SeededRng("m"));
    assert.equal(move.board, 5);
  });

  it("should throw NoLegalMovesError on a finished game", () => {
    const drawn = playClassic([0, 1, 2, 5, 3, 6, 4, 8, 7]);
    assert.throws(() => mediumMove(drawn, new SeededRng("x")), NoLegalMovesError);
  });
});

describe("chooseMove", () => {
  const fast: AiConfig = { budget: { kind: "iterations", count: 200 }, explorationConstant: Math.SQRT2 };

  it("should dispatch every strategy", () => {
    const rng = new SeededRng("dispatch");
    assert.deepEqual(chooseMove(XX_OO, "medium", fast, rng), cell(2));
    assert.deepEqual(chooseMove(XX_OO, "strong", fast, rng), cell(2));
    assert.equal(isLegalMove(XX_OO, chooseMove(XX_OO, "weak", fast, rng)), true);
  });

  it("should reject an unusable search config for strong only", () => {
    const broken: AiConfig = { budget: { kind: "iterations", count: 0 }, explorationConstant: 1 };
    assert.throws(() => chooseMove(XX_OO, "strong", broken, new SeededRng("c")), InvalidSearchConfigError);
    assert.deepEqual(chooseMove(XX_OO, "medium", broken, new SeededRng("c")), cell(2));
  });

  it("should throw NoLegalMovesError for every strategy on a finished game", () => {
    const won = playClassic([0, 3, 1, 4, 2]);
    for (const strategy of ["weak", "medium", "strong"] as const) {
      assert.throws(() => chooseMove(won, strategy, fast, new SeededRng("x")), NoLegalMovesError);
    }
  });

  it("should take every random choice from the generator it is given", () => {
    const state = newGame("ultimate");
    const rng = new SeededRng("threaded");
    const picked = [0, 1, 2, 3, 4].map(() => chooseMove(state, "weak", DEFAULT_AI_CONFIG, rng));

    // Legal moves of a fresh ultimate game come in (board, cell) order
    const reference = new SeededRng("threaded");
    const expected = [0, 1, 2, 3, 4].map(() => {
      const i = reference.nextInt(81);
      return { board: Math.floor(i / 9), cell: i % 9 };
    });
    assert.deepEqual(picked, expected);
  });

  it("chooseMoveAsync should agree with chooseMove for the same seed", async () => {
    const state = newGame("classic");
    const sync = chooseMove(state, "strong", fast, new SeededRng("agree"));
    const sliced = await chooseMoveAsync(state, "strong", fast, new SeededRng("agree"));
    assert.deepEqual(sliced, sync);
  });
});

describe("arena", () => {
  it("should play a game to the end", () => {
    const rng = new SeededRng("arena");
    const result = playMatch("ultimate", {
      X: createPlayer("weak", DEFAULT_AI_CONFIG, rng),
      O: createPlayer("weak", DEFAULT_AI_CONFIG, rng),
    });
    assert.notEqual(result.outcome.status, "in_progress");
    assert.ok(result.moves.length >= 17 && result.moves.length <= 81);
  });

  it("should alternate the starting player", () => {
    const starts: Mark[] = [];
    const rng = new SeededRng("alternate");
    const tally = playSeries(
      "classic",
      createPlayer("weak", DEFAULT_AI_CONFIG, rng),
      createPlayer("weak", DEFAULT_AI_CONFIG, rng),
      4,
      (_index, _result, aMark) => starts.push(aMark)
    );
    assert.deepEqual(starts, ["X", "O", "X", "O"]);
    assert.equal(tally.a + tally.b + tally.draws, 4);
  });

  describe("ranking", () => {
    it("medium should beat weak", () => {
      const rng = new SeededRng("medium-vs-weak");
      const tally = playSeries(
        "classic",
        createPlayer("medium", DEFAULT_AI_CONFIG, rng),
        createPlayer("weak", DEFAULT_AI_CONFIG, rng),
        40
      );
      assert.ok(tally.a > tally.b, `medium ${tally.a} / weak ${tally.b} / draws ${tally.draws}`);
    });

    it("strong should beat medium", () => {
      const rng = new SeededRng("strong-vs-medium");
      const config: AiConfig = { budget: { kind: "iterations", count: 1000 }, explorationConstant: Math.SQRT2 };
      const tally = playSeries(
        "classic",
        createPlayer("strong", config, rng),
        createPlayer("medium", config, rng),
        20
      );
      assert.ok(tally.a > tally.b, `strong ${tally.a} / medium ${tally.b} / draws ${tally.draws}`);
    });
  });
});
