import type { Cell, GameSnapshot } from "../types";
import { copyBoard } from "./board";

export type History = {
  undo: GameSnapshot[];
  redo: GameSnapshot[];
};

export const createHistory = (): History => ({ undo: [], redo: [] });

export const takeSnapshot = (board: readonly Cell[], score: number, label: string): GameSnapshot =>
  Object.freeze({ board: Object.freeze(copyBoard(board)), score, label });

export function recordForUndo(history: History, snapshot: GameSnapshot) {
  history.undo.push(snapshot);
  history.redo.length = 0;
}

/** Pops the latest undo entry and parks `current` on the redo stack. */
export function stepBack(history: History, current: GameSnapshot): GameSnapshot | null {
  const prev = history.undo.pop();
  if (!prev) return null;
  history.redo.push(current);
  return prev;
}

export function stepForward(history: History, current: GameSnapshot): GameSnapshot | null {
  const next = history.redo.pop();
  if (!next) return null;
  history.undo.push(current);
  return next;
}

export function clearHistory(history: History) {
  history.undo.length = 0;
  history.redo.length = 0;
}
