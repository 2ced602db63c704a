import type { Cell } from "../types";
import { sizeOf } from "./board";

/**
 * True when the board is full of number tiles with no equal neighbours.
 * Any powerup left on the board (joker included) keeps the game alive.
 */
export function isTerminal(board: readonly Cell[]) {
  const size = sizeOf(board);
  for (const t of board) {
    if (!t || t.kind !== "number") return false;
  }
  for (let r = 0; r < size; r++) {
    for (let c = 0; c < size; c++) {
      const v = board[r * size + c]?.value;
      if (c + 1 < size && board[r * size + c + 1]?.value === v) return false;
      if (r + 1 < size && board[(r + 1) * size + c]?.value === v) return false;
    }
  }
  return true;
}
