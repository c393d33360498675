import React from "react";
import { Box, Text } from "ink";
import type { Variant } from "@tictacfoe/core";
import { getConfig } from "../../config/runtime.js";
import type { Opponent } from "../../config/settings.js";
import { colors } from "../theme.js";

interface StatusBarProps {
  variant: Variant;
  opponent: Opponent;
}

export function StatusBar({ variant, opponent }: StatusBarProps) {
  const { budget, seed } = getConfig();

  return (
    <Box
      borderStyle="single"
      borderColor={colors.border}
      paddingX={1}
      flexDirection="row"
      justifyContent="space-between"
    >
      <Text color={colors.primary} bold>
        TIC-TAC-FOE v0.1.0
      </Text>
      <Text color={colors.dimmed}>
        {variant} | vs {opponent}
        {opponent === "strong" ? ` | budget ${budget}` : ""}
        {seed ? ` | seed ${seed}` : ""}
      </Text>
    </Box>
  );
}
