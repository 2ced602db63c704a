import type { Board, Cell, Tile } from "../types";
import { colOf, copyBoard, createEmptyBoard, rowOf, sizeOf } from "./board";
import { defaultRng, shuffled } from "./rng";
import type { Rng } from "./rng";

export type PowerupEffect = {
  board: Board;
  cleared: number[];
  label: string;
};

const clearCells = (board: readonly Cell[], cells: number[], label: string): PowerupEffect => {
  const next = copyBoard(board);
  for (const i of cells) next[i] = null;
  return { board: next, cleared: cells, label };
};

function bombCells(index: number, size: number) {
  const row = rowOf(index, size);
  const col = colOf(index, size);
  const out: number[] = [];
  for (let r = row - 1; r <= row + 1; r++) {
    for (let c = col - 1; c <= col + 1; c++) {
      if (r >= 0 && r < size && c >= 0 && c < size) out.push(r * size + c);
    }
  }
  return out;
}

function surgeCells(index: number, size: number) {
  const row = rowOf(index, size);
  const col = colOf(index, size);
  const out = new Set<number>();
  for (let c = 0; c < size; c++) out.add(row * size + c);
  for (let r = 0; r < size; r++) out.add(r * size + col);
  return [...out].sort((a, b) => a - b);
}

function shuffleBoard(board: readonly Cell[], index: number, rng: Rng): PowerupEffect {
  const tiles = board.filter((t, i): t is Tile => i !== index && t !== null);
  const slots = shuffled(
    board.map((_, i) => i),
    rng
  );
  const next = createEmptyBoard(sizeOf(board));
  tiles.forEach((tile, i) => {
    next[slots[i]] = tile;
  });
  return { board: next, cleared: [index], label: "Shuffle used" };
}

/**
 * Resolves a tap on `index`. Returns null when the cell holds nothing that
 * activates (empty, number or joker).
 */
export function resolvePowerup(
  board: readonly Cell[],
  index: number,
  rng: Rng = defaultRng
): PowerupEffect | null {
  if (!Number.isInteger(index) || index < 0 || index >= board.length) return null;
  const tile = board[index];
  if (!tile) return null;
  const size = sizeOf(board);

  switch (tile.kind) {
    case "bomb":
      return clearCells(board, bombCells(index, size), "Bomb used");
    case "surge":
      return clearCells(board, surgeCells(index, size), "Surge used");
    case "glass":
      return clearCells(board, [index], "Glass removed");
    case "shuffle":
      return shuffleBoard(board, index, rng);
    case "number":
    case "joker":
      return null;
  }
}
