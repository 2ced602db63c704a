import test from "node:test";
import assert from "node:assert/strict";
import { boardFrom, countTiles, createEmptyBoard, sameBoard } from "../src/engine/board.js";
import { createRng } from "../src/engine/rng.js";
import type { Rng } from "../src/engine/rng.js";
import { resolvePowerup } from "../src/engine/powerups.js";
import { applyMove, compactLine } from "../src/engine/sim.js";
import { pickPowerup, spawnTile } from "../src/engine/spawn.js";
import { isTerminal } from "../src/engine/terminal.js";
import type { Cell, SpawnPolicy } from "../src/types.js";

const show = (cells: readonly Cell[]) =>
  cells.map((t) => (t === null ? 0 : t.kind === "number" ? t.value : t.kind));

const scripted = (...values: number[]): Rng => {
  let i = 0;
  return () => values[i++ % values.length];
};

const policy = (over: Partial<SpawnPolicy> = {}): SpawnPolicy => ({
  undoRedoEnabled: true,
  masterPowerupEnabled: true,
  spawnProbability: 0.5,
  powerups: {
    bomb: { enabled: true, weight: 5 },
    joker: { enabled: true, weight: 3 },
    surge: { enabled: true, weight: 3 },
    shuffle: { enabled: true, weight: 2 },
    glass: { enabled: true, weight: 6 },
  },
  ...over,
});

test("compactLine merges numbers that follow an obstacle", () => {
  const { out, gained, merges } = compactLine(boardFrom(["bomb", 2, 2]));
  assert.deepEqual(show(out), ["bomb", 4, 0]);
  assert.equal(gained, 4);
  assert.deepEqual(merges, [1]);
});

test("compactLine never merges across an obstacle", () => {
  const line = boardFrom([2, "bomb", 2]);
  const { out, gained } = compactLine(line);
  assert.deepEqual(show(out), [2, "bomb", 2]);
  assert.equal(gained, 0);
  assert.ok(sameBoard(out, line));
});

test("compactLine slides obstacles toward the edge like any tile", () => {
  const { out, gained } = compactLine(boardFrom([0, "glass", 2, 2]));
  assert.deepEqual(show(out), ["glass", 4, 0, 0]);
  assert.equal(gained, 4);
});

test("compactLine doubles the partner of a joker", () => {
  const { out, gained } = compactLine(boardFrom(["joker", 8, 0]));
  assert.deepEqual(show(out), [16, 0, 0]);
  assert.equal(gained, 16);
  assert.equal(out[0]?.kind, "number");
});

test("compactLine merges two jokers into a 4", () => {
  const { out, gained } = compactLine(boardFrom(["joker", "joker", 0]));
  assert.deepEqual(show(out), [4, 0, 0]);
  assert.equal(gained, 4);
});

test("compactLine keeps a joker beside an obstacle", () => {
  const { out } = compactLine(boardFrom(["joker", "surge", 4]));
  assert.deepEqual(show(out), ["joker", "surge", 4]);
});

test("compactLine merges each tile at most once per pass", () => {
  assert.deepEqual(show(compactLine(boardFrom([2, 2, 4, 0])).out), [4, 4, 0, 0]);
  assert.deepEqual(show(compactLine(boardFrom([2, 2, 2, 2])).out), [4, 4, 0, 0]);

  const { out, gained } = compactLine(boardFrom([4, 4, 8, 8]));
  assert.deepEqual(show(out), [8, 16, 0, 0]);
  assert.equal(gained, 24);
});

test("compactLine pairs from the leading edge", () => {
  assert.deepEqual(show(compactLine(boardFrom([2, 2, "joker"])).out), [4, "joker", 0]);
});

test("applyMove right equals a left move on the mirrored board", () => {
  const board = boardFrom([2, 2, 0, "bomb", 4, 4, 0, "joker", 8]);
  const mirror = (b: readonly Cell[]) => [b[2], b[1], b[0], b[5], b[4], b[3], b[8], b[7], b[6]];

  const left = applyMove(board, "left");
  const right = applyMove(mirror(board), "right");

  assert.deepEqual(show(left.board), [4, 0, 0, "bomb", 8, 0, 16, 0, 0]);
  assert.deepEqual(show(mirror(right.board)), show(left.board));
  assert.equal(left.scoreDelta, 28);
  assert.equal(right.scoreDelta, 28);
});

test("applyMove compacts columns for up and down", () => {
  const board = boardFrom([2, 0, 0, 2, 0, 0, 4, 0, 0]);

  const up = applyMove(board, "up");
  assert.deepEqual(show(up.board), [4, 0, 0, 4, 0, 0, 0, 0, 0]);
  assert.deepEqual(up.mergedPositions, [0]);
  assert.equal(up.scoreDelta, 4);

  const down = applyMove(board, "down");
  assert.deepEqual(show(down.board), [0, 0, 0, 4, 0, 0, 4, 0, 0]);
  assert.deepEqual(down.mergedPositions, [3]);
  assert.equal(down.board[6], board[6]);
});

test("applyMove reports no change when pressing into a wall", () => {
  const board = boardFrom([2, 4, 0, 4, 2, 0, 0, 0, 0]);
  const res = applyMove(board, "left");
  assert.equal(res.moved, false);
  assert.equal(res.scoreDelta, 0);
  assert.ok(sameBoard(res.board, board));
});

test("a repeated move that reports no change leaves the board as the first move left it", () => {
  const first = applyMove(boardFrom([0, 2, 4, 0, 0, 0, 0, 0, 0]), "left");
  assert.equal(first.moved, true);
  const second = applyMove(first.board, "left");
  assert.equal(second.moved, false);
  assert.deepEqual(second.board, first.board);
});

test("spawnTile returns null on a full board", () => {
  const board = boardFrom([2, 4, 2, 4]);
  assert.equal(spawnTile(board, policy(), createRng(1)), null);
});

test("spawnTile picks the cell and the powerup from the random stream", () => {
  const board = createEmptyBoard(3);
  const spawned = spawnTile(board, policy(), scripted(0.5, 0.1, 0.9));
  assert.equal(spawned?.index, 4);
  assert.equal(spawned?.tile.kind, "glass");
  assert.equal(spawned?.tile.value, 0);
  assert.equal(board[4], spawned?.tile);
});

test("spawnTile rolls a 4 when the number draw is past 0.9", () => {
  const board = createEmptyBoard(3);
  const spawned = spawnTile(board, policy(), scripted(0, 0.7, 0.95));
  assert.equal(spawned?.index, 0);
  assert.equal(spawned?.tile.kind, "number");
  assert.equal(spawned?.tile.value, 4);
});

test("spawnTile always yields bombs when bomb is the only enabled powerup", () => {
  const only: SpawnPolicy = policy({
    spawnProbability: 1,
    powerups: {
      bomb: { enabled: true, weight: 1 },
      joker: { enabled: false, weight: 3 },
      surge: { enabled: false, weight: 3 },
      shuffle: { enabled: false, weight: 2 },
      glass: { enabled: false, weight: 6 },
    },
  });
  const rng = createRng(42);
  for (let i = 0; i < 1000; i++) {
    const spawned = spawnTile(createEmptyBoard(4), only, rng);
    assert.equal(spawned?.tile.kind, "bomb");
  }
});

test("spawnTile only makes numbers in hardcore or with powerups switched off", () => {
  const rng = createRng(3);
  for (const p of [policy({ spawnProbability: 1, undoRedoEnabled: false }), policy({ spawnProbability: 1, masterPowerupEnabled: false })]) {
    for (let i = 0; i < 200; i++) {
      const tile = spawnTile(createEmptyBoard(4), p, rng)?.tile;
      assert.equal(tile?.kind, "number");
      assert.ok(tile?.value === 2 || tile?.value === 4);
    }
  }
});

test("pickPowerup falls back to null when every powerup is disabled", () => {
  const none = policy();
  for (const cfg of Object.values(none.powerups)) cfg.enabled = false;
  assert.equal(pickPowerup(none, createRng(5)), null);
  const spawned = spawnTile(createEmptyBoard(3), { ...none, spawnProbability: 1 }, createRng(5));
  assert.equal(spawned?.tile.kind, "number");
});

test("spawnTile is reproducible for the same seed", () => {
  const run = (seed: number) => {
    const rng = createRng(seed);
    const board = createEmptyBoard(4);
    const out: string[] = [];
    for (let i = 0; i < 16; i++) {
      const s = spawnTile(board, policy({ spawnProbability: 0.4 }), rng);
      if (s) out.push(`${s.index}:${s.tile.kind}:${s.tile.value}`);
    }
    return out;
  };
  assert.deepEqual(run(9), run(9));
  assert.equal(run(9).length, 16);
});

test("bomb clears the 3x3 neighbourhood clipped to the board", () => {
  const board = boardFrom(["bomb", 2, 4, 8, 16, 32, 64, 128, 2, 4, 8, 16, 32, 64, 128, 256]);
  const res = resolvePowerup(board, 0);
  assert.deepEqual(res?.cleared, [0, 1, 4, 5]);
  assert.deepEqual(show(res?.board ?? []), [0, 0, 4, 8, 0, 0, 64, 128, 2, 4, 8, 16, 32, 64, 128, 256]);
  assert.equal(res?.label, "Bomb used");
});

test("surge clears its row and column", () => {
  const board = boardFrom([2, 4, 8, 16, 32, "surge", 64, 128, 256]);
  const res = resolvePowerup(board, 5);
  assert.deepEqual(res?.cleared, [2, 3, 4, 5, 8]);
  assert.deepEqual(show(res?.board ?? []), [2, 4, 0, 0, 0, 0, 64, 128, 0]);
});

test("glass clears only itself", () => {
  const board = boardFrom([2, "glass", 4, 0]);
  const res = resolvePowerup(board, 1);
  assert.deepEqual(show(res?.board ?? []), [2, 0, 4, 0]);
  assert.equal(res?.board[0], board[0]);
});

test("tapping numbers, jokers, empty or out-of-range cells does nothing", () => {
  const board = boardFrom([2, "joker", 0, 4]);
  assert.equal(resolvePowerup(board, 0), null);
  assert.equal(resolvePowerup(board, 1), null);
  assert.equal(resolvePowerup(board, 2), null);
  assert.equal(resolvePowerup(board, 9), null);
  assert.equal(resolvePowerup(board, -1), null);
});

test("shuffle keeps every other tile and consumes itself", () => {
  const board = boardFrom([2, 4, 0, "bomb", 0, "shuffle", 8, 0, "joker", 2, 0, 0, 16, 0, 0, 0]);
  const res = resolvePowerup(board, 5, createRng(11));
  if (!res) throw new Error("shuffle did not activate");

  const before = board.filter((t, i) => t !== null && i !== 5);
  const after = res.board.filter((t) => t !== null);
  const key = (cells: readonly Cell[]) => cells.map((t) => t?.id).sort();
  const pairs = (cells: readonly Cell[]) => show(cells).map(String).sort();

  assert.equal(countTiles(res.board), countTiles(board) - 1);
  assert.deepEqual(key(after), key(before));
  assert.deepEqual(pairs(after), pairs(before));
  assert.equal(res.board.some((t) => t?.kind === "shuffle"), false);
});

test("isTerminal holds for a full checkerboard of numbers", () => {
  assert.equal(isTerminal(boardFrom([2, 4, 2, 4, 2, 4, 2, 4, 2])), true);
});

test("isTerminal is false with a powerup, a gap, or an equal pair", () => {
  assert.equal(isTerminal(boardFrom([2, 4, 2, 4, "glass", 4, 2, 4, 2])), false);
  assert.equal(isTerminal(boardFrom([2, 4, 2, 4, "joker", 4, 2, 4, 2])), false);
  assert.equal(isTerminal(boardFrom([2, 4, 2, 4, 0, 4, 2, 4, 2])), false);
  assert.equal(isTerminal(boardFrom([2, 2, 4, 4, 8, 16, 2, 4, 8])), false);
  assert.equal(isTerminal(boardFrom([2, 4, 8, 2, 16, 32, 64, 16, 2])), false);
});
