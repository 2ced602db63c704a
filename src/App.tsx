import { useCallback, useEffect, useRef, useState } from "react";
import type { TouchEvent } from "react";
import {
  activate,
  canRedo,
  canUndo,
  changeGridSize,
  clearBestScore,
  move,
  newGame,
  nextGoal,
  pauseGame,
  redo,
  resetGame,
  resumeGame,
  tick,
  undo,
  updateConfig,
} from "./game-logic";
import type { Game, MutationResult } from "./game-logic";
import { useAppTheme, useFlash, useInterval } from "./hooks";
import {
  bestScoreFor,
  countMove,
  loadSaved,
  recordResult,
  resetHighScores,
  saveSaved,
  toGameConfig,
  updateBestScore,
} from "./persistence";
import { AppScreens } from "./AppScreens";
import type { GameView } from "./AppScreens";
import { CELEBRATION_MS, KEY_DIRS, swipeDir } from "./app-constants";
import type { Dir, GameResult, Screen, Settings, Stats } from "./types";

const TICK_MS = 1000;
const MERGE_FLASH_MS = 110;

const viewOf = (game: Game): GameView => ({
  board: game.board,
  size: game.size,
  score: game.score,
  bestScore: game.bestScore,
  moves: game.moves,
  elapsedMs: game.elapsedMs,
  nextGoal: nextGoal(game),
  over: game.over,
  paused: game.paused,
  canUndo: canUndo(game),
  canRedo: canRedo(game),
});

const buzz = (enabled: boolean, ms: number) => {
  if (enabled && typeof navigator !== "undefined" && "vibrate" in navigator) navigator.vibrate(ms);
};

export default function Powerup2048() {
  const [initial] = useState(() => loadSaved());
  const [screen, setScreen] = useState<Screen>("game");
  const [settings, setSettings] = useState<Settings>(initial.settings);
  const [stats, setStats] = useState<Stats>(initial.stats);

  const onResult = useCallback((result: GameResult) => setStats((s) => recordResult(s, result)), []);
  const [game] = useState<Game>(() =>
    newGame(toGameConfig(initial.settings), {
      bestScore: bestScoreFor(initial.stats, initial.settings.gridSize),
      onResult,
    })
  );
  const [view, setView] = useState<GameView>(() => viewOf(game));
  const [mergedSet, flashMerged, clearMerged] = useFlash<Set<number>>(new Set(), MERGE_FLASH_MS);
  const [celebrating, setCelebrating] = useState(false);
  const touchStart = useRef<{ x: number; y: number } | null>(null);

  const refresh = useCallback(() => setView(viewOf(game)), [game]);

  useAppTheme(settings.appTheme);

  useEffect(() => {
    saveSaved({ settings, stats });
  }, [settings, stats]);

  useEffect(() => {
    updateConfig(game, toGameConfig(settings));
    refresh();
  }, [game, settings, refresh]);

  useEffect(() => {
    if (!celebrating) return;
    const id = window.setTimeout(() => setCelebrating(false), CELEBRATION_MS);
    return () => window.clearTimeout(id);
  }, [celebrating]);

  const afterMutation = useCallback((res: MutationResult) => {
    if (!res.changed) return;
    if (res.scoreDelta > 0) setStats((s) => updateBestScore(s, game.size, game.score));
    if (res.newHighScore) {
      setCelebrating(true);
      buzz(settings.hapticsEnabled, 60);
    } else {
      buzz(settings.hapticsEnabled, res.gameOver ? 80 : 10);
    }
    flashMerged(new Set(res.merged));
    refresh();
  }, [game, settings.hapticsEnabled, refresh, flashMerged]);

  const doMove = useCallback((dir: Dir) => {
    const res = move(game, dir);
    if (res.changed) setStats(countMove);
    afterMutation(res);
  }, [game, afterMutation]);

  useEffect(() => {
    const onKey = (e: KeyboardEvent) => {
      const d = KEY_DIRS[e.key];
      if (d && screen === "game") { e.preventDefault(); doMove(d); }
    };
    window.addEventListener("keydown", onKey);
    return () => window.removeEventListener("keydown", onKey);
  }, [doMove, screen]);

  useInterval(() => {
    tick(game, TICK_MS);
    refresh();
  }, view.over || view.paused ? null : TICK_MS);

  const onTouchStart = (e: TouchEvent) => {
    const t = e.touches[0];
    touchStart.current = t ? { x: t.clientX, y: t.clientY } : null;
  };

  const onTouchEnd = (e: TouchEvent) => {
    const start = touchStart.current;
    const t = e.changedTouches[0];
    touchStart.current = null;
    if (!start || !t || screen !== "game") return;
    const d = swipeDir(t.clientX - start.x, t.clientY - start.y, settings.swipeThreshold);
    if (d) doMove(d);
  };

  const startOver = () => {
    resetGame(game, bestScoreFor(stats, game.size));
    setCelebrating(false);
    clearMerged();
    refresh();
  };

  const onGridSize = (size: number) => {
    changeGridSize(game, size, bestScoreFor(stats, size));
    setSettings((s) => ({ ...s, gridSize: game.size }));
    setCelebrating(false);
    clearMerged();
    refresh();
  };

  const onTogglePause = () => {
    if (game.paused) resumeGame(game);
    else pauseGame(game);
    buzz(settings.hapticsEnabled, 20);
    refresh();
  };

  const onResetHighScores = () => {
    setStats((s) => resetHighScores(s));
    clearBestScore(game);
    refresh();
  };

  return (
    <AppScreens
      screen={screen}
      setScreen={setScreen}
      game={view}
      mergedCells={mergedSet}
      celebrating={celebrating}
      settings={settings}
      setSettings={setSettings}
      stats={stats}
      onTap={(i) => afterMutation(activate(game, i))}
      onUndo={() => afterMutation(undo(game))}
      onRedo={() => afterMutation(redo(game))}
      onTogglePause={onTogglePause}
      onNewGame={startOver}
      onGridSize={onGridSize}
      onResetHighScores={onResetHighScores}
      onTouchStart={onTouchStart}
      onTouchEnd={onTouchEnd}
    />
  );
}
