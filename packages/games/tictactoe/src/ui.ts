import type { GameState, GameUISpec, Move } from "@tictacfoe/core";
import { CLASSIC_BOARD } from "./state";

export const TicTacToeUI: GameUISpec = {
  playerLabels: ["X", "O"],

  pieces: {
    X: { symbol: "X" },
    O: { symbol: "O" },
  },

  inputHint: "Type 1-9 and press Enter",

  renderBoard(state: GameState, cursor?: Move): string {
    const board = state.boards[CLASSIC_BOARD];
    const cell = (i: number) => {
      const selected = cursor !== undefined && cursor.cell === i;
      let text = ` ${i + 1} `;
      if (board[i] === "X") text = ` <span class="ttt-x">X</span> `;
      if (board[i] === "O") text = ` <span class="ttt-o">O</span> `;
      if (selected) text = `<span class="ttt-cursor">[${board[i] || " "}]</span>`;
      return text;
    };

    return [
      `${cell(0)}│${cell(1)}│${cell(2)}`,
      "───┼───┼───",
      `${cell(3)}│${cell(4)}│${cell(5)}`,
      "───┼───┼───",
      `${cell(6)}│${cell(7)}│${cell(8)}`,
    ].join("\n");
  },

  renderStatus(state: GameState): string | null {
    if (state.outcome.status === "win") return `${state.outcome.winner} wins`;
    if (state.outcome.status === "draw") return "Draw";
    return null;
  },

  parseInput(raw: string, _state: GameState): Move | null {
    const trimmed = raw.trim();
    const num = parseInt(trimmed, 10);
    if (num >= 1 && num <= 9) {
      return { board: CLASSIC_BOARD, cell: num - 1 };
    }
    return null;
  },

  formatMove(move: Move): string {
    return `cell ${move.cell + 1}`;
  },
};
