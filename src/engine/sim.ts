import type { Cell, Dir, Tile } from "../types";
import { copyBoard, isObstacle, makeTile, sameBoard, sizeOf } from "./board";

const mergeValue = (a: Tile, b: Tile): number | null => {
  if (a.kind === "joker" || b.kind === "joker") {
    const base = Math.max(a.value, b.value);
    return (base === 0 ? 2 : base) * 2;
  }
  return a.value === b.value ? a.value * 2 : null;
};

/**
 * Slides one line toward index 0 and merges adjacent pairs once.
 * Obstacle tiles slide but never merge, and nothing merges across them.
 */
export function compactLine(line: readonly Cell[]) {
  const compacted = line.filter((t): t is Tile => t !== null);
  const out: Cell[] = [];
  const merges: number[] = [];
  let gained = 0;

  for (let i = 0; i < compacted.length; i++) {
    const current = compacted[i];
    const next = i + 1 < compacted.length ? compacted[i + 1] : null;
    const mergedValue =
      next && !isObstacle(current) && !isObstacle(next) ? mergeValue(current, next) : null;

    if (mergedValue !== null) {
      out.push(makeTile(mergedValue));
      gained += mergedValue;
      merges.push(out.length - 1);
      i++;
    } else {
      out.push(current);
    }
  }

  while (out.length < line.length) out.push(null);
  return { out, gained, merges };
}

const lineIndices = (dir: Dir, k: number, size: number): number[] => {
  const idx = Array.from({ length: size }, (_, i) =>
    dir === "left" || dir === "right" ? k * size + i : i * size + k
  );
  return dir === "right" || dir === "down" ? idx.reverse() : idx;
};

export function applyMove(board: readonly Cell[], dir: Dir) {
  const size = sizeOf(board);
  const next = copyBoard(board);
  let scoreDelta = 0;
  const mergedPositions: number[] = [];

  for (let k = 0; k < size; k++) {
    const idx = lineIndices(dir, k, size);
    const { out, gained, merges } = compactLine(idx.map((i) => board[i]));
    idx.forEach((cellIndex, i) => {
      next[cellIndex] = out[i];
    });
    scoreDelta += gained;
    merges.forEach((i) => mergedPositions.push(idx[i]));
  }

  const moved = !sameBoard(next, board);
  return { board: next, moved, scoreDelta, mergedPositions };
}
