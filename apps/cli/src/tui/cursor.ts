import type { GameState, Move, Variant } from "@tictacfoe/core";
import { isLegalMove } from "@tictacfoe/engine";

export type Direction = "up" | "down" | "left" | "right";

interface Point {
  row: number;
  col: number;
}

/** Side of the square grid of cells the cursor moves over. */
export function gridSize(variant: Variant): number {
  return variant === "classic" ? 3 : 9;
}

export function toPoint(variant: Variant, move: Move): Point {
  if (variant === "classic") {
    return { row: Math.floor(move.cell / 3), col: move.cell % 3 };
  }
  return {
    row: Math.floor(move.board / 3) * 3 + Math.floor(move.cell / 3),
    col: (move.board % 3) * 3 + (move.cell % 3),
  };
}

export function fromPoint(variant: Variant, { row, col }: Point): Move {
  if (variant === "classic") {
    return { board: 0, cell: row * 3 + col };
  }
  return {
    board: Math.floor(row / 3) * 3 + Math.floor(col / 3),
    cell: (row % 3) * 3 + (col % 3),
  };
}

function wrap(n: number, size: number): number {
  return ((n % size) + size) % size;
}

/** 0, 1, -1, 2, -2, ... reduced to distinct offsets on a ring of `size`. */
function perpendicularOffsets(size: number): number[] {
  const seen = new Set<number>();
  const offsets: number[] = [];
  for (let k = 0; k < size; k++) {
    for (const o of k === 0 ? [0] : [k, -k]) {
      const w = wrap(o, size);
      if (!seen.has(w)) {
        seen.add(w);
        offsets.push(o);
      }
    }
  }
  return offsets;
}

/**
 * Step the cursor in `direction` to the next playable cell, wrapping at the
 * edges. When nothing in the current row (or column) is playable, the
 * neighbouring rows are searched, nearest first. Returns the cursor unchanged
 * if no cell is playable.
 */
export function moveCursor(state: GameState, cursor: Move, direction: Direction): Move {
  const size = gridSize(state.variant);
  const start = toPoint(state.variant, cursor);
  const horizontal = direction === "left" || direction === "right";
  const sign = direction === "right" || direction === "down" ? 1 : -1;

  for (const offset of perpendicularOffsets(size)) {
    // On the cursor's own line the cursor cell is the last candidate, so skip it.
    const steps = offset === 0 ? size - 1 : size;
    for (let d = 1; d <= steps; d++) {
      const point = horizontal
        ? { row: wrap(start.row + offset, size), col: wrap(start.col + sign * d, size) }
        : { row: wrap(start.row + sign * d, size), col: wrap(start.col + offset, size) };
      const move = fromPoint(state.variant, point);
      if (isLegalMove(state, move)) {
        return move;
      }
    }
  }
  return cursor;
}

/**
 * Keep `preferred` if it is playable, otherwise the first playable cell in
 * reading order.
 */
export function resetCursor(state: GameState, preferred?: Move): Move {
  if (preferred && isLegalMove(state, preferred)) {
    return preferred;
  }
  const size = gridSize(state.variant);
  for (let row = 0; row < size; row++) {
    for (let col = 0; col < size; col++) {
      const move = fromPoint(state.variant, { row, col });
      if (isLegalMove(state, move)) {
        return move;
      }
    }
  }
  return preferred ?? { board: 0, cell: 0 };
}
