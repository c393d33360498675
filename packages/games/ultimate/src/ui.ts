import type { GameState, GameUISpec, Move } from "@tictacfoe/core";
import { getPlayableBoards } from "./actions";

const MOVE_RE = /^\s*([1-9])\s*[\s,./-]?\s*([1-9])\s*$/;
const CELL_RE = /^\s*([1-9])\s*$/;

export const UltimateUI: GameUISpec = {
  playerLabels: ["X", "O"],

  pieces: {
    X: { symbol: "X" },
    O: { symbol: "O" },
  },

  inputHint: "Type board and cell (1-9 each, e.g. 5 3) and press Enter, or just the cell when the board is forced",

  renderBoard(state: GameState, cursor?: Move): string {
    const playable = new Set(getPlayableBoards(state));
    const cell = (b: number, c: number) => {
      const mark = state.boards[b][c];
      if (cursor !== undefined && cursor.board === b && cursor.cell === c) {
        return `<span class="ttt-cursor">${mark || "+"}</span>`;
      }
      if (mark === "X") return `<span class="ttt-x">X</span>`;
      if (mark === "O") return `<span class="ttt-o">O</span>`;
      return playable.has(b) ? "·" : " ";
    };

    const lines: string[] = [];
    for (let bigRow = 0; bigRow < 3; bigRow++) {
      if (bigRow > 0) lines.push("══════╬═══════╬══════");
      for (let row = 0; row < 3; row++) {
        const segments: string[] = [];
        for (let bigCol = 0; bigCol < 3; bigCol++) {
          const b = bigRow * 3 + bigCol;
          segments.push([0, 1, 2].map((col) => cell(b, row * 3 + col)).join(" "));
        }
        lines.push(` ${segments.join(" ║ ")} `);
      }
    }
    return lines.join("\n");
  },

  renderStatus(state: GameState): string | null {
    if (state.outcome.status === "win") return `${state.outcome.winner} wins`;
    if (state.outcome.status === "draw") return "Draw";
    const decided = state.meta
      .map((m, i) => (m === "open" ? null : `${i + 1}:${m === "draw" ? "=" : m}`))
      .filter((s): s is string => s !== null);
    const target =
      state.forcedBoard !== null ? `play in board ${state.forcedBoard + 1}` : "play in any open board";
    return decided.length > 0 ? `${target} | decided ${decided.join(" ")}` : target;
  },

  parseInput(raw: string, state: GameState): Move | null {
    const pair = MOVE_RE.exec(raw);
    if (pair) {
      return { board: parseInt(pair[1], 10) - 1, cell: parseInt(pair[2], 10) - 1 };
    }
    const single = CELL_RE.exec(raw);
    if (single && state.forcedBoard !== null) {
      return { board: state.forcedBoard, cell: parseInt(single[1], 10) - 1 };
    }
    return null;
  },

  formatMove(move: Move): string {
    return `board ${move.board + 1} cell ${move.cell + 1}`;
  },
};
