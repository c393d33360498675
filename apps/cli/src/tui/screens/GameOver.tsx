import React from "react";
import { Box, Text, useInput } from "ink";
import type { GameState, Mark } from "@tictacfoe/core";
import { getGameUI } from "@tictacfoe/engine";
import { colors, symbols } from "../theme.js";
import { ColoredBoard } from "../components/ColoredBoard.js";

interface GameOverProps {
  state: GameState;
  /** The human's mark against an AI; null when two humans played */
  humanMark: Mark | null;
  onRematch: () => void;
  onMenu: () => void;
  onQuit: () => void;
}

export function GameOver({ state, humanMark, onRematch, onMenu, onQuit }: GameOverProps) {
  const ui = getGameUI(state.variant);
  const { outcome } = state;

  useInput((input) => {
    if (input === "r") onRematch();
    if (input === "m") onMenu();
    if (input === "q") onQuit();
  });

  let headline = "DRAW";
  let headlineColor = colors.secondary;
  if (outcome.status === "win") {
    if (humanMark === null) {
      headline = `${outcome.winner} WINS`;
      headlineColor = colors.primary;
    } else if (outcome.winner === humanMark) {
      headline = `${symbols.check} YOU WIN`;
      headlineColor = colors.primary;
    } else {
      headline = `${symbols.x} YOU LOSE`;
      headlineColor = colors.error;
    }
  }

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1} alignItems="center">
      <Text color={colors.primary} bold>
        {"═══════════════════"}
      </Text>
      <Text color={colors.primary} bold>
        {"    GAME OVER    "}
      </Text>
      <Text color={colors.primary} bold>
        {"═══════════════════"}
      </Text>

      <Text>{""}</Text>

      <Text color={headlineColor} bold>
        {headline}
      </Text>

      <Text>{""}</Text>

      <ColoredBoard html={ui.renderBoard(state)} />

      <Text>{""}</Text>
      <Text color={colors.dimmed}>Moves: {state.moveHistory.length}</Text>

      <Text>{""}</Text>
      <Text color={colors.dimmed}>[R] Rematch  [M] Menu  [Q] Quit</Text>
    </Box>
  );
}
