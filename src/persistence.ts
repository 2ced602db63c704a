import { POWERUP_KINDS } from "./types";
import type { AppTheme, GameConfig, GameResult, PowerupConfig, PowerupKind, Settings, Stats, ThemeColor } from "./types";
import { MAX_SIZE, MIN_SIZE } from "./engine/board";
import { MAX_SPAWN_PROBABILITY } from "./game-logic";

export const SAVE_KEY = "powerup2048_state_v1";
export const HISTORY_LIMIT = 100;

export const THEME_COLORS: readonly ThemeColor[] = ["orange", "blue", "purple", "pink", "green"];

export const APP_THEMES: readonly AppTheme[] = ["system", "light", "dark"];

export const DEFAULT_POWERUPS: Record<PowerupKind, PowerupConfig> = {
  bomb: { enabled: true, weight: 5 },
  joker: { enabled: true, weight: 3 },
  surge: { enabled: true, weight: 3 },
  shuffle: { enabled: true, weight: 2 },
  glass: { enabled: true, weight: 6 },
};

export const DEFAULT_SETTINGS: Settings = {
  gridSize: 4,
  undoRedoEnabled: true,
  masterPowerupEnabled: true,
  spawnProbability: 0.05,
  powerups: DEFAULT_POWERUPS,
  themeColor: "orange",
  appTheme: "system",
  swipeThreshold: 20,
  hapticsEnabled: true,
  showTimer: true,
};

export const emptyStats = (): Stats => ({
  totalGamesPlayed: 0,
  totalMovesMade: 0,
  totalScoreAccumulated: 0,
  bestScores: {},
  history: [],
});

export type SavedState = { settings: Settings; stats: Stats };

type KeyValueStore = Pick<Storage, "getItem" | "setItem">;

const isRecord = (v: unknown): v is Record<string, unknown> =>
  typeof v === "object" && v !== null && !Array.isArray(v);

const num = (v: unknown, fallback: number, lo: number, hi: number) =>
  typeof v === "number" && Number.isFinite(v) ? Math.max(lo, Math.min(hi, v)) : fallback;

const bool = (v: unknown, fallback: boolean) => (typeof v === "boolean" ? v : fallback);

const count = (v: unknown) => Math.floor(num(v, 0, 0, Number.MAX_SAFE_INTEGER));

function sanitizePowerups(raw: unknown): Record<PowerupKind, PowerupConfig> {
  const src: Record<string, unknown> = isRecord(raw) ? raw : {};
  const out = { ...DEFAULT_POWERUPS };
  for (const kind of POWERUP_KINDS) {
    const cfg = src[kind];
    if (!isRecord(cfg)) continue;
    out[kind] = {
      enabled: bool(cfg.enabled, DEFAULT_POWERUPS[kind].enabled),
      weight: num(cfg.weight, DEFAULT_POWERUPS[kind].weight, 1, 10),
    };
  }
  return out;
}

/** Merges stored settings over the defaults, field by field. */
export function sanitizeSettings(raw: unknown): Settings {
  if (!isRecord(raw)) return DEFAULT_SETTINGS;
  const d = DEFAULT_SETTINGS;
  const theme = THEME_COLORS.find((c) => c === raw.themeColor);
  const appTheme = APP_THEMES.find((t) => t === raw.appTheme);
  return {
    gridSize: Math.round(num(raw.gridSize, d.gridSize, MIN_SIZE, MAX_SIZE)),
    undoRedoEnabled: bool(raw.undoRedoEnabled, d.undoRedoEnabled),
    masterPowerupEnabled: bool(raw.masterPowerupEnabled, d.masterPowerupEnabled),
    spawnProbability: num(raw.spawnProbability, d.spawnProbability, 0, MAX_SPAWN_PROBABILITY),
    powerups: sanitizePowerups(raw.powerups),
    themeColor: theme ?? d.themeColor,
    appTheme: appTheme ?? d.appTheme,
    swipeThreshold: num(raw.swipeThreshold, d.swipeThreshold, 10, 100),
    hapticsEnabled: bool(raw.hapticsEnabled, d.hapticsEnabled),
    showTimer: bool(raw.showTimer, d.showTimer),
  };
}

function sanitizeResult(raw: unknown): GameResult | null {
  if (!isRecord(raw)) return null;
  const gridSize = raw.gridSize;
  if (typeof gridSize !== "number" || gridSize < MIN_SIZE || gridSize > MAX_SIZE) return null;
  return {
    score: count(raw.score),
    moveCount: count(raw.moveCount),
    durationMs: count(raw.durationMs),
    gridSize,
    timestamp: count(raw.timestamp),
  };
}

export function sanitizeStats(raw: unknown): Stats {
  if (!isRecord(raw)) return emptyStats();
  const bestScores: Record<string, number> = {};
  if (isRecord(raw.bestScores)) {
    for (let size = MIN_SIZE; size <= MAX_SIZE; size++) {
      const v = count(raw.bestScores[String(size)]);
      if (v > 0) bestScores[String(size)] = v;
    }
  }
  const history = Array.isArray(raw.history)
    ? raw.history.map(sanitizeResult).filter((r): r is GameResult => r !== null)
    : [];
  return {
    totalGamesPlayed: count(raw.totalGamesPlayed),
    totalMovesMade: count(raw.totalMovesMade),
    totalScoreAccumulated: count(raw.totalScoreAccumulated),
    bestScores,
    history: history.slice(0, HISTORY_LIMIT),
  };
}

export function loadSaved(storage: Pick<Storage, "getItem"> = localStorage): SavedState {
  try {
    const s = storage.getItem(SAVE_KEY);
    if (!s) return { settings: DEFAULT_SETTINGS, stats: emptyStats() };
    const parsed: unknown = JSON.parse(s);
    const obj: Record<string, unknown> = isRecord(parsed) ? parsed : {};
    return { settings: sanitizeSettings(obj.settings), stats: sanitizeStats(obj.stats) };
  } catch (err) {
    console.warn("Failed to load saved state, using defaults", err);
    return { settings: DEFAULT_SETTINGS, stats: emptyStats() };
  }
}

export const saveSaved = (state: SavedState, storage: KeyValueStore = localStorage) =>
  storage.setItem(SAVE_KEY, JSON.stringify(state));

export const toGameConfig = (settings: Settings): GameConfig => ({
  gridSize: settings.gridSize,
  undoRedoEnabled: settings.undoRedoEnabled,
  masterPowerupEnabled: settings.masterPowerupEnabled,
  spawnProbability: settings.spawnProbability,
  powerups: settings.powerups,
});

export const bestScoreFor = (stats: Stats, size: number) => stats.bestScores[String(size)] ?? 0;

export function updateBestScore(stats: Stats, size: number, score: number): Stats {
  if (score <= bestScoreFor(stats, size)) return stats;
  return { ...stats, bestScores: { ...stats.bestScores, [String(size)]: score } };
}

/** Counted per accepted move, so undone and unfinished games still add up. */
export const countMove = (stats: Stats): Stats => ({ ...stats, totalMovesMade: stats.totalMovesMade + 1 });

export function recordResult(stats: Stats, result: GameResult): Stats {
  const next = updateBestScore(stats, result.gridSize, result.score);
  return {
    ...next,
    totalGamesPlayed: stats.totalGamesPlayed + 1,
    totalScoreAccumulated: stats.totalScoreAccumulated + result.score,
    history: [result, ...stats.history].slice(0, HISTORY_LIMIT),
  };
}

export const resetHighScores = (stats: Stats): Stats => ({ ...stats, bestScores: {} });

export const averageScore = (stats: Stats) =>
  stats.totalGamesPlayed > 0 ? stats.totalScoreAccumulated / stats.totalGamesPlayed : 0;
