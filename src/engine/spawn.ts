import { POWERUP_KINDS } from "../types";
import type { Board, PowerupKind, SpawnPolicy, Tile } from "../types";
import { emptyIndices, makeTile } from "./board";
import { defaultRng, randomIndex } from "./rng";
import type { Rng } from "./rng";

const SPAWN_4_PROB = 0.1;

export const powerupWeight = (policy: SpawnPolicy, kind: PowerupKind) => {
  const cfg = policy.powerups[kind];
  return cfg.enabled ? Math.max(0, cfg.weight) : 0;
};

export const powerupsActive = (policy: SpawnPolicy) =>
  policy.undoRedoEnabled && policy.masterPowerupEnabled;

/** Weighted pick over the enabled powerups, or null when none has weight. */
export function pickPowerup(policy: SpawnPolicy, rng: Rng): PowerupKind | null {
  const weights = POWERUP_KINDS.map((kind) => powerupWeight(policy, kind));
  const total = weights.reduce((a, w) => a + w, 0);
  if (total <= 0) return null;

  let roll = rng() * total;
  for (let i = 0; i < POWERUP_KINDS.length; i++) {
    if (roll < weights[i]) return POWERUP_KINDS[i];
    roll -= weights[i];
  }
  // rounding left roll at the upper edge; take the last kind that has weight
  for (let i = POWERUP_KINDS.length - 1; i >= 0; i--) {
    if (weights[i] > 0) return POWERUP_KINDS[i];
  }
  return null;
}

export function rollTile(policy: SpawnPolicy, rng: Rng): Tile {
  if (powerupsActive(policy) && rng() < policy.spawnProbability) {
    const kind = pickPowerup(policy, rng);
    if (kind) return makeTile(0, kind);
  }
  return makeTile(rng() < 1 - SPAWN_4_PROB ? 2 : 4);
}

/** Places one tile in a random empty cell. Mutates `board`. */
export function spawnTile(
  board: Board,
  policy: SpawnPolicy,
  rng: Rng = defaultRng
): { index: number; tile: Tile } | null {
  const empty = emptyIndices(board);
  if (!empty.length) return null;
  const index = empty[randomIndex(empty.length, rng)];
  const tile = rollTile(policy, rng);
  board[index] = tile;
  return { index, tile };
}
