import type { Board, Cell, Tile, TileKind } from "../types";

export const MIN_SIZE = 3;
export const MAX_SIZE = 8;

let tileSeq = 0;
export const nextTileId = () => `t${(++tileSeq).toString(36)}`;

export const makeTile = (value: number, kind: TileKind = "number"): Tile => ({
  id: nextTileId(),
  value,
  kind,
});

export const clampSize = (size: number) =>
  Math.max(MIN_SIZE, Math.min(MAX_SIZE, Math.round(size) || 4));

export const createEmptyBoard = (size: number): Board =>
  Array.from({ length: size * size }, () => null);

export const copyBoard = (board: readonly Cell[]): Board => board.slice();

export const sizeOf = (board: readonly Cell[]) => Math.round(Math.sqrt(board.length));

export const rowOf = (index: number, size: number) => Math.floor(index / size);
export const colOf = (index: number, size: number) => index % size;

export const emptyIndices = (board: readonly Cell[]): number[] => {
  const out: number[] = [];
  for (let i = 0; i < board.length; i++) if (board[i] === null) out.push(i);
  return out;
};

export const countEmpty = (board: readonly Cell[]) => emptyIndices(board).length;

export const countTiles = (board: readonly Cell[]) => board.length - countEmpty(board);

export const maxTileValue = (board: readonly Cell[]) =>
  board.reduce((mx, t) => (t && t.value > mx ? t.value : mx), 0);

export const sameBoard = (a: readonly Cell[], b: readonly Cell[]) =>
  a.length === b.length && a.every((t, i) => (t?.id ?? null) === (b[i]?.id ?? null));

export const isObstacle = (tile: Tile) => tile.kind !== "number" && tile.kind !== "joker";

/** Builds a board from a compact description, e.g. `[2, "bomb", 0, "joker"]`. */
export function boardFrom(cells: readonly (number | TileKind)[]): Board {
  return cells.map((c) => {
    if (typeof c === "number") return c === 0 ? null : makeTile(c);
    return makeTile(0, c);
  });
}
