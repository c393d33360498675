import React, { useCallback, useEffect, useState } from "react";
import { Box, type Key, Text, useInput } from "ink";
import Spinner from "ink-spinner";
import {
  type GameState,
  IllegalMoveError,
  type Mark,
  type Move,
  type Rng,
  SearchAbortedError,
  type Variant,
  otherMark,
} from "@tictacfoe/core";
import { GameController, getGameUI } from "@tictacfoe/engine";
import { type AiConfig, chooseMoveAsync } from "@tictacfoe/ai";
import type { Opponent } from "../../config/settings.js";
import log from "../../logger.js";
import { colors, symbols } from "../theme.js";
import { ColoredBoard } from "../components/ColoredBoard.js";
import { type Direction, moveCursor, resetCursor } from "../cursor.js";
import { typeKey } from "../typedMove.js";

interface GameBoardProps {
  variant: Variant;
  opponent: Opponent;
  ai: AiConfig;
  rng: Rng;
  aiFirst: boolean;
  onGameOver: (state: GameState, humanMark: Mark | null) => void;
  onMenu: () => void;
  onQuit: () => void;
}

const CENTER: Record<Variant, Move> = {
  classic: { board: 0, cell: 4 },
  ultimate: { board: 4, cell: 4 },
};

function directionOf(input: string, key: Key): Direction | null {
  if (key.upArrow || input === "k") return "up";
  if (key.downArrow || input === "j") return "down";
  if (key.leftArrow || input === "h") return "left";
  if (key.rightArrow || input === "l") return "right";
  return null;
}

export function GameBoard({ variant, opponent, ai, rng, aiFirst, onGameOver, onMenu, onQuit }: GameBoardProps) {
  const [game] = useState(() => new GameController({ variant }));
  const [state, setState] = useState(() => game.getState());
  const [humanMark, setHumanMark] = useState<Mark>(aiFirst ? "O" : "X");
  const [cursor, setCursor] = useState(() => resetCursor(game.getState(), CENTER[variant]));
  const [thinking, setThinking] = useState(false);
  const [error, setError] = useState("");
  const [inputBuffer, setInputBuffer] = useState("");

  const ui = getGameUI(variant);
  const aiMark = opponent === "human" ? null : otherMark(humanMark);
  const humanTurn = !game.isTerminal() && state.activePlayer !== aiMark;

  const sync = useCallback(() => {
    const next = game.getState();
    setState(next);
    setCursor((c) => resetCursor(next, c));
    if (game.isTerminal()) {
      onGameOver(next, opponent === "human" ? null : humanMark);
    }
  }, [game, onGameOver, opponent, humanMark]);

  // AI turn: search off the input path and apply the result once it is ready
  useEffect(() => {
    if (opponent === "human" || game.isTerminal() || state.activePlayer !== aiMark) {
      setThinking(false);
      return;
    }

    const controller = new AbortController();
    setThinking(true);

    chooseMoveAsync(state, opponent, ai, rng, controller.signal)
      .then((move) => {
        if (controller.signal.aborted) return;
        game.submitMove(move);
        setThinking(false);
        sync();
      })
      .catch((err: unknown) => {
        if (err instanceof SearchAbortedError) return;
        log.warn({ err }, "ai move failed");
        setThinking(false);
        setError(err instanceof Error ? err.message : String(err));
      });

    return () => controller.abort();
  }, [state, aiMark]);

  const place = (move: Move) => {
    try {
      game.submitMove(move);
      setError("");
      sync();
    } catch (err) {
      if (!(err instanceof IllegalMoveError)) throw err;
      setError(`Illegal move: ${err.reason}`);
    }
  };

  useInput((input, key) => {
    if (input === "q") {
      onQuit();
      return;
    }
    if (input === "m") {
      onMenu();
      return;
    }
    if (input === "r") {
      game.reset();
      setHumanMark("X");
      setError("");
      setInputBuffer("");
      sync();
      return;
    }
    if (input === "u") {
      if (game.undo() && aiMark !== null && game.getActivePlayer() === aiMark) {
        game.undo();
      }
      setError("");
      sync();
      return;
    }
    if (input === "s") {
      if (aiMark !== null && state.moveHistory.length === 0 && humanMark === "X") {
        setHumanMark("O");
      }
      return;
    }

    if (!humanTurn) return;

    const direction = directionOf(input, key);
    if (direction) {
      setCursor(moveCursor(state, cursor, direction));
      return;
    }

    const typed = typeKey(inputBuffer, input, key);
    switch (typed.kind) {
      case "cursor":
        place(cursor);
        break;
      case "edit":
        setInputBuffer(typed.buffer);
        if (error) setError("");
        break;
      case "submit": {
        setInputBuffer("");
        const move = ui.parseInput(typed.raw, state);
        if (move) {
          place(move);
        } else {
          setError(`Could not read "${typed.raw.trim()}". ${ui.inputHint}`);
        }
        break;
      }
      case "ignore":
        break;
    }
  });

  const label = (mark: Mark) => {
    if (opponent === "human") return "Human";
    return mark === humanMark ? "You" : `${opponent} AI`;
  };
  const lastMove = state.moveHistory[state.moveHistory.length - 1];
  const status = ui.renderStatus(state);

  return (
    <Box flexDirection="column" paddingX={2} paddingY={1}>
      <Box flexDirection="row">
        {ui.playerLabels.map((mark) => (
          <Text key={mark} color={state.activePlayer === mark ? colors.primary : colors.dimmed}>
            {state.activePlayer === mark ? `${symbols.bullet} ` : "  "}
            {ui.pieces[mark].symbol}: {label(mark)}{"   "}
          </Text>
        ))}
      </Box>

      <Text>{""}</Text>

      <ColoredBoard html={ui.renderBoard(state, humanTurn ? cursor : undefined)} />

      <Text>{""}</Text>

      {status && <Text color={colors.warning} bold>{status}</Text>}
      {lastMove && (
        <Text color={colors.dimmed}>
          last move: {otherMark(state.activePlayer)} {ui.formatMove(lastMove)}
        </Text>
      )}

      {error && <Text color={colors.error}>{error}</Text>}

      {thinking ? (
        <Box>
          <Text color={colors.secondary}>
            <Spinner type="dots" />
          </Text>
          <Text color={colors.white}> {opponent} AI is thinking...</Text>
        </Box>
      ) : humanTurn ? (
        <Box flexDirection="column">
          <Text color={colors.primary} bold>
            {state.activePlayer} TO MOVE - {ui.inputHint}, or use the cursor
          </Text>
          <Box>
            <Text color={colors.secondary}>{"> "}</Text>
            <Text color={colors.text}>{inputBuffer}</Text>
            <Text color={colors.dimmed}>{"_"}</Text>
          </Box>
        </Box>
      ) : null}

      <Text>{""}</Text>
      <Text color={colors.dimmed}>
        [←↑↓→/hjkl] move  [enter] place
        {aiMark !== null && state.moveHistory.length === 0 && humanMark === "X" ? "  [s] AI first" : ""}
        {"  [u] undo  [r] reset  [m] menu  [q] quit"}
      </Text>
    </Box>
  );
}
