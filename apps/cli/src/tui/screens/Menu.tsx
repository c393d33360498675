import React, { useState } from "react";
import { Box, Text, useInput } from "ink";
import type { Variant } from "@tictacfoe/core";
import { defaultRegistry } from "@tictacfoe/engine";
import { OPPONENTS, type Opponent } from "../../config/settings.js";
import { colors, symbols } from "../theme.js";

interface MenuProps {
  variant: Variant;
  opponent: Opponent;
  onStart: (variant: Variant, opponent: Opponent) => void;
  onQuit: () => void;
}

const OPPONENT_LABELS: Record<Opponent, string> = {
  human: "Human (pass and play)",
  weak: "Weak AI (random)",
  medium: "Medium AI (wins and blocks)",
  strong: "Strong AI (Monte Carlo Tree Search)",
};

type Step = "variant" | "opponent";

export function Menu({ variant, opponent, onStart, onQuit }: MenuProps) {
  const games = defaultRegistry.list();
  const [step, setStep] = useState<Step>("variant");
  const [variantIdx, setVariantIdx] = useState(() =>
    Math.max(0, games.findIndex((g) => g.variant === variant))
  );
  const [opponentIdx, setOpponentIdx] = useState(() => Math.max(0, OPPONENTS.indexOf(opponent)));

  const count = step === "variant" ? games.length : OPPONENTS.length;
  const selected = step === "variant" ? variantIdx : opponentIdx;
  const setSelected = step === "variant" ? setVariantIdx : setOpponentIdx;

  useInput((input, key) => {
    if (input === "q") {
      onQuit();
      return;
    }
    if (key.upArrow || input === "k") {
      setSelected((selected - 1 + count) % count);
    } else if (key.downArrow || input === "j") {
      setSelected((selected + 1) % count);
    } else if (key.escape && step === "opponent") {
      setStep("variant");
    } else if (key.return || input === " ") {
      if (step === "variant") {
        setStep("opponent");
      } else {
        onStart(games[variantIdx].variant, OPPONENTS[opponentIdx]);
      }
    }
  });

  const options =
    step === "variant"
      ? games.map((g) => ({ label: g.name, detail: g.description }))
      : OPPONENTS.map((o) => ({ label: OPPONENT_LABELS[o], detail: "" }));

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      <Text color={colors.primary} bold>
        {step === "variant" ? "Choose a game" : `${games[variantIdx].name}: choose an opponent`}
      </Text>
      <Text>{""}</Text>

      {options.map((opt, i) => (
        <Box key={opt.label} flexDirection="column">
          <Text color={i === selected ? colors.primary : colors.text}>
            {i === selected ? `${symbols.arrow} ` : "  "}
            {opt.label}
          </Text>
          {opt.detail && i === selected && <Text color={colors.dimmed}>{`    ${opt.detail}`}</Text>}
        </Box>
      ))}

      <Text>{""}</Text>
      <Text color={colors.dimmed}>
        [↑↓] select  [enter] confirm{step === "opponent" ? "  [esc] back" : ""}  [q] quit
      </Text>
    </Box>
  );
}
