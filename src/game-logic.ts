import type { Board, Dir, GameConfig, GameResult, GameSnapshot } from "./types";
import { clampSize, copyBoard, createEmptyBoard, maxTileValue } from "./engine/board";
import { clearHistory, createHistory, recordForUndo, stepBack, stepForward, takeSnapshot } from "./engine/history";
import type { History } from "./engine/history";
import { resolvePowerup } from "./engine/powerups";
import { defaultRng } from "./engine/rng";
import type { Rng } from "./engine/rng";
import { applyMove } from "./engine/sim";
import { spawnTile } from "./engine/spawn";
import { isTerminal } from "./engine/terminal";

const START_TILES = 2;
const BASE_GOAL = 2048;
export const MAX_SPAWN_PROBABILITY = 0.4;

export type GameOptions = {
  rng?: Rng;
  now?: () => number;
  /** Persisted best score for the configured grid size. */
  bestScore?: number;
  onResult?: (result: GameResult) => void;
};

export type Game = {
  config: GameConfig;
  size: number;
  board: Board;
  score: number;
  moves: number;
  elapsedMs: number;
  over: boolean;
  paused: boolean;
  history: History;
  bestScore: number;
  /** Best score before this game started; beating it raises `newHighScore`. */
  bestAtStart: number;
  newHighScore: boolean;
  result: GameResult | null;
  rng: Rng;
  now: () => number;
  onResult?: (result: GameResult) => void;
};

export type MutationResult = {
  changed: boolean;
  scoreDelta: number;
  /** True only on the mutation that ended the game. */
  gameOver: boolean;
  /** True only on the mutation that first beat the previous best. */
  newHighScore: boolean;
  merged: number[];
  spawned: number | null;
  cleared: number[];
  label: string;
  result: GameResult | null;
};

const noChange = (label = ""): MutationResult => ({
  changed: false,
  scoreDelta: 0,
  gameOver: false,
  newHighScore: false,
  merged: [],
  spawned: null,
  cleared: [],
  label,
  result: null,
});

const clamp = (v: number, lo: number, hi: number) =>
  Number.isFinite(v) ? Math.max(lo, Math.min(hi, v)) : lo;

export const normalizeConfig = (config: GameConfig): GameConfig => ({
  ...config,
  gridSize: clampSize(config.gridSize),
  spawnProbability: clamp(config.spawnProbability, 0, MAX_SPAWN_PROBABILITY),
});

const acceptsInput = (game: Game) => !game.over && !game.paused;

const currentSnapshot = (game: Game, label: string) => takeSnapshot(game.board, game.score, label);

export function newGame(config: GameConfig, options: GameOptions = {}): Game {
  const cfg = normalizeConfig(config);
  const game: Game = {
    config: cfg,
    size: cfg.gridSize,
    board: createEmptyBoard(cfg.gridSize),
    score: 0,
    moves: 0,
    elapsedMs: 0,
    over: false,
    paused: false,
    history: createHistory(),
    bestScore: Math.max(0, options.bestScore ?? 0),
    bestAtStart: 0,
    newHighScore: false,
    result: null,
    rng: options.rng ?? defaultRng,
    now: options.now ?? Date.now,
    onResult: options.onResult,
  };
  startBoard(game);
  return game;
}

function startBoard(game: Game) {
  game.board = createEmptyBoard(game.size);
  game.score = 0;
  game.moves = 0;
  game.elapsedMs = 0;
  game.over = false;
  game.paused = false;
  game.newHighScore = false;
  game.bestAtStart = game.bestScore;
  game.result = null;
  clearHistory(game.history);
  for (let i = 0; i < START_TILES; i++) spawnTile(game.board, game.config, game.rng);
}

/** Emits the game's result once. Untouched games (no score, no moves) emit nothing. */
export function finishGame(game: Game): GameResult | null {
  if (game.result) return null;
  if (game.score === 0 && game.moves === 0) return null;
  const result: GameResult = Object.freeze({
    score: game.score,
    moveCount: game.moves,
    durationMs: game.elapsedMs,
    gridSize: game.size,
    timestamp: game.now(),
  });
  game.result = result;
  game.onResult?.(result);
  return result;
}

/** Closes the current game (emitting its result) and deals a fresh board. */
export function resetGame(game: Game, bestScore = game.bestScore): GameResult | null {
  const result = finishGame(game);
  game.bestScore = Math.max(0, bestScore);
  startBoard(game);
  return result;
}

export function changeGridSize(game: Game, size: number, bestScore = 0): GameResult | null {
  const next = clampSize(size);
  if (next === game.size) return null;
  const result = finishGame(game);
  game.size = next;
  game.config = { ...game.config, gridSize: next };
  game.bestScore = Math.max(0, bestScore);
  startBoard(game);
  return result;
}

/** Forgets the stored best, e.g. after the player wipes their high scores. */
export function clearBestScore(game: Game) {
  game.bestScore = 0;
  game.bestAtStart = 0;
}

/** Applies a new ruleset mid-game; it takes effect from the next spawn. */
export function updateConfig(game: Game, config: GameConfig) {
  game.config = { ...normalizeConfig(config), gridSize: game.size };
}

function trackBest(game: Game): boolean {
  game.bestScore = Math.max(game.bestScore, game.score);
  if (game.newHighScore || game.bestAtStart <= 0 || game.score <= game.bestAtStart) return false;
  game.newHighScore = true;
  return true;
}

function checkTerminal(game: Game): GameResult | null {
  if (game.over || !isTerminal(game.board)) return null;
  game.over = true;
  return finishGame(game);
}

export function move(game: Game, dir: Dir): MutationResult {
  const label = `Move ${dir}`;
  if (!acceptsInput(game)) return noChange(label);

  const { board, moved, scoreDelta, mergedPositions } = applyMove(game.board, dir);
  if (!moved) return noChange(label);

  if (game.config.undoRedoEnabled) recordForUndo(game.history, currentSnapshot(game, label));
  game.moves += 1;
  game.board = board;
  game.score += scoreDelta;
  const spawned = spawnTile(game.board, game.config, game.rng);
  const newHighScore = trackBest(game);
  const wasOver = game.over;
  const result = checkTerminal(game);

  return {
    changed: true,
    scoreDelta,
    gameOver: !wasOver && game.over,
    newHighScore,
    merged: mergedPositions,
    spawned: spawned?.index ?? null,
    cleared: [],
    label,
    result,
  };
}

export function activate(game: Game, index: number): MutationResult {
  if (!acceptsInput(game)) return noChange();
  const effect = resolvePowerup(game.board, index, game.rng);
  if (!effect) return noChange();

  if (game.config.undoRedoEnabled) recordForUndo(game.history, currentSnapshot(game, effect.label));
  game.board = effect.board;
  const result = checkTerminal(game);

  return {
    ...noChange(effect.label),
    changed: true,
    gameOver: game.over,
    cleared: effect.cleared,
    result,
  };
}

const historyEnabled = (game: Game) => game.config.undoRedoEnabled && acceptsInput(game);

export const canUndo = (game: Game) => historyEnabled(game) && game.history.undo.length > 0;
export const canRedo = (game: Game) => historyEnabled(game) && game.history.redo.length > 0;

function restore(game: Game, snap: GameSnapshot) {
  game.board = copyBoard(snap.board);
  game.score = snap.score;
}

export function undo(game: Game): MutationResult {
  if (!historyEnabled(game)) return noChange("Undo");
  const scoreBefore = game.score;
  const prev = stepBack(game.history, currentSnapshot(game, "Undo"));
  if (!prev) return noChange("Undo");
  restore(game, prev);
  game.moves = Math.max(0, game.moves - 1);
  return { ...noChange("Undo"), changed: true, scoreDelta: game.score - scoreBefore };
}

export function redo(game: Game): MutationResult {
  if (!historyEnabled(game)) return noChange("Redo");
  const scoreBefore = game.score;
  const next = stepForward(game.history, currentSnapshot(game, "Redo"));
  if (!next) return noChange("Redo");
  restore(game, next);
  game.moves += 1;
  return { ...noChange("Redo"), changed: true, scoreDelta: game.score - scoreBefore };
}

export const isGameOver = (game: Game) => game.over;

export const snapshotForPersistence = (game: Game): GameSnapshot =>
  currentSnapshot(game, game.over ? "Game over" : "In progress");

export function pauseGame(game: Game) {
  if (game.over) return false;
  game.paused = true;
  return true;
}

export function resumeGame(game: Game) {
  if (game.over) return false;
  game.paused = false;
  return true;
}

/** Adds wall-clock time reported by the presentation clock. Stopped while paused or over. */
export function tick(game: Game, ms: number) {
  if (!acceptsInput(game) || !(ms > 0)) return;
  game.elapsedMs += ms;
}

export const nextGoal = (game: Game) => Math.max(BASE_GOAL, maxTileValue(game.board) * 2);
