import React, { useState } from "react";
import { Box, useApp } from "ink";
import type { GameState, Mark, Rng, Variant } from "@tictacfoe/core";
import type { Opponent, Settings } from "../config/settings.js";
import { StatusBar } from "./components/StatusBar.js";
import { Menu } from "./screens/Menu.js";
import { GameBoard } from "./screens/GameBoard.js";
import { GameOver } from "./screens/GameOver.js";

type Screen =
  | { type: "menu" }
  | { type: "game"; round: number }
  | { type: "gameover"; state: GameState; humanMark: Mark | null };

interface AppProps {
  settings: Settings;
  rng: Rng;
  /** Go straight to the board instead of the menu */
  skipMenu: boolean;
  aiFirst: boolean;
}

export function App({ settings, rng, skipMenu, aiFirst }: AppProps) {
  const { exit } = useApp();
  const [variant, setVariant] = useState<Variant>(settings.variant);
  const [opponent, setOpponent] = useState<Opponent>(settings.opponent);
  const [screen, setScreen] = useState<Screen>(skipMenu ? { type: "game", round: 0 } : { type: "menu" });
  const [round, setRound] = useState(0);

  const startGame = () => {
    // A fresh key remounts the board with a new controller
    const next = round + 1;
    setRound(next);
    setScreen({ type: "game", round: next });
  };

  return (
    <Box flexDirection="column">
      <StatusBar variant={variant} opponent={opponent} />

      {screen.type === "menu" && (
        <Menu
          variant={variant}
          opponent={opponent}
          onStart={(v, o) => {
            setVariant(v);
            setOpponent(o);
            startGame();
          }}
          onQuit={exit}
        />
      )}

      {screen.type === "game" && (
        <GameBoard
          key={screen.round}
          variant={variant}
          opponent={opponent}
          ai={settings.ai}
          rng={rng}
          aiFirst={aiFirst && screen.round === 0}
          onGameOver={(state, humanMark) => setScreen({ type: "gameover", state, humanMark })}
          onMenu={() => setScreen({ type: "menu" })}
          onQuit={exit}
        />
      )}

      {screen.type === "gameover" && (
        <GameOver
          state={screen.state}
          humanMark={screen.humanMark}
          onRematch={startGame}
          onMenu={() => setScreen({ type: "menu" })}
          onQuit={exit}
        />
      )}
    </Box>
  );
}
