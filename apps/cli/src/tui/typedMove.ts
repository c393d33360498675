import type { Key } from "ink";

/** What one key press does to the move being typed. */
export type TypedKey =
  | { kind: "edit"; buffer: string }
  | { kind: "submit"; raw: string }
  | { kind: "cursor" }
  | { kind: "ignore" };

const DIGIT = /^[0-9]$/;
// Separators the variants accept between board and cell
const SEPARATOR = /^[ ,./-]$/;

/**
 * Enter submits what has been typed, or places the cursor when nothing has.
 * Space places the cursor only while the buffer is empty; after a digit it
 * separates the board from the cell.
 */
export function typeKey(buffer: string, input: string, key: Pick<Key, "return" | "backspace" | "delete">): TypedKey {
  if (key.return) {
    return buffer.trim() ? { kind: "submit", raw: buffer } : { kind: "cursor" };
  }
  if (key.backspace || key.delete) {
    return { kind: "edit", buffer: buffer.slice(0, -1) };
  }
  if (DIGIT.test(input)) {
    return { kind: "edit", buffer: buffer + input };
  }
  if (SEPARATOR.test(input)) {
    if (buffer.trim() === "") {
      return input === " " ? { kind: "cursor" } : { kind: "ignore" };
    }
    return { kind: "edit", buffer: buffer + input };
  }
  return { kind: "ignore" };
}
