import { AnimatePresence, motion } from "framer-motion";
import type { Dispatch, SetStateAction, TouchEventHandler } from "react";
import { BoardView, PowerupLegend, StatBadge } from "./screens";
import { GRID_SIZES, POWERUP_META, THEME_ACCENT, formatTime, headerBadges } from "./app-constants";
import type { HeaderBadge } from "./app-constants";
import { APP_THEMES, THEME_COLORS, averageScore, bestScoreFor } from "./persistence";
import { POWERUP_KINDS } from "./types";
import type { AppTheme, Cell, PowerupConfig, PowerupKind, Screen, Settings, Stats } from "./types";

export type GameView = {
  board: readonly Cell[];
  size: number;
  score: number;
  bestScore: number;
  moves: number;
  elapsedMs: number;
  nextGoal: number;
  over: boolean;
  paused: boolean;
  canUndo: boolean;
  canRedo: boolean;
};

type AppScreensProps = {
  screen: Screen;
  setScreen: (screen: Screen) => void;
  game: GameView;
  mergedCells: Set<number>;
  celebrating: boolean;
  settings: Settings;
  setSettings: Dispatch<SetStateAction<Settings>>;
  stats: Stats;
  onTap: (index: number) => void;
  onUndo: () => void;
  onRedo: () => void;
  onTogglePause: () => void;
  onNewGame: () => void;
  onGridSize: (size: number) => void;
  onResetHighScores: () => void;
  onTouchStart: TouchEventHandler;
  onTouchEnd: TouchEventHandler;
};

const BADGE_LABELS: Record<HeaderBadge, string> = {
  score: "Score",
  best: "Best",
  moves: "Moves",
  time: "Time",
  goal: "Goal",
};

const badgeValue = (badge: HeaderBadge, game: GameView) => {
  switch (badge) {
    case "score": return game.score;
    case "best": return game.bestScore;
    case "moves": return game.moves;
    case "time": return formatTime(game.elapsedMs);
    case "goal": return game.nextGoal;
  }
};

const THEME_LABELS: Record<AppTheme, string> = { system: "System", light: "Light", dark: "Dark" };

const TABS: { id: Screen; label: string }[] = [
  { id: "game", label: "Play" },
  { id: "stats", label: "Stats" },
  { id: "settings", label: "Settings" },
];

export function AppScreens(props: AppScreensProps) {
  return (
    <div className="min-h-screen bg-stone-100 dark:bg-stone-900">
      <nav className="mx-auto max-w-3xl px-6 pt-6 flex gap-2">
        {TABS.map((t) => (
          <button
            key={t.id}
            type="button"
            onClick={() => props.setScreen(t.id)}
            className={`px-3 py-2 rounded-xl ${props.screen === t.id ? `${THEME_ACCENT[props.settings.themeColor]} text-white` : "bg-stone-200 dark:bg-stone-700 dark:text-stone-100"}`}
          >
            {t.label}
          </button>
        ))}
      </nav>
      {props.screen === "game" && <GameScreen {...props} />}
      {props.screen === "stats" && <StatsScreen {...props} />}
      {props.screen === "settings" && <SettingsScreen {...props} />}
    </div>
  );
}

function GameScreen(props: AppScreensProps) {
  const { game, settings } = props;
  const hardcore = !settings.undoRedoEnabled;
  return (
    <div className="mx-auto max-w-3xl p-6 text-stone-900 dark:text-stone-100 space-y-4">
      <div className="flex items-center justify-between">
        <h1 className="text-3xl font-extrabold tracking-tight">2048 Powerups</h1>
        <select
          value={game.size}
          onChange={(e) => props.onGridSize(parseInt(e.target.value))}
          className="px-3 py-2 rounded-xl bg-stone-200 dark:bg-stone-700"
        >
          {GRID_SIZES.map((n) => <option key={n} value={n}>{n}×{n}</option>)}
        </select>
      </div>
      <div className="grid grid-cols-2 md:grid-cols-5 gap-2 text-sm">
        {headerBadges(settings).map((b) => <StatBadge key={b} label={BADGE_LABELS[b]} value={badgeValue(b, game)} />)}
      </div>
      <div className="relative touch-none" onTouchStart={props.onTouchStart} onTouchEnd={props.onTouchEnd}>
        <BoardView board={game.board} size={game.size} mergedCells={props.mergedCells} dimmed={game.paused} onTap={props.onTap} />
        <AnimatePresence>
          {props.celebrating && (
            <motion.div
              initial={{ opacity: 0, y: -12 }}
              animate={{ opacity: 1, y: 0 }}
              exit={{ opacity: 0 }}
              className={`absolute top-4 left-1/2 -translate-x-1/2 rounded-2xl px-4 py-2 text-white font-bold shadow ${THEME_ACCENT[settings.themeColor]}`}
            >
              New high score!
            </motion.div>
          )}
          {game.over && (
            <motion.div
              initial={{ opacity: 0 }}
              animate={{ opacity: 1 }}
              exit={{ opacity: 0 }}
              className="absolute inset-0 flex flex-col items-center justify-center gap-3 rounded-3xl bg-white/80"
            >
              <div className="text-2xl font-extrabold">Game over</div>
              <div className="text-stone-600">Score {game.score} in {game.moves} moves</div>
              <button type="button" onClick={props.onNewGame} className="px-4 py-3 rounded-2xl bg-stone-800 text-white">Play again</button>
            </motion.div>
          )}
        </AnimatePresence>
      </div>
      <div className="flex flex-wrap gap-2">
        {!hardcore && (
          <>
            <button type="button" disabled={!game.canUndo} onClick={props.onUndo} className="px-3 py-2 rounded-xl bg-stone-200 dark:bg-stone-700 disabled:opacity-40">Undo</button>
            <button type="button" disabled={!game.canRedo} onClick={props.onRedo} className="px-3 py-2 rounded-xl bg-stone-200 dark:bg-stone-700 disabled:opacity-40">Redo</button>
          </>
        )}
        <button type="button" disabled={game.over} onClick={props.onTogglePause} className="px-3 py-2 rounded-xl bg-stone-200 dark:bg-stone-700 disabled:opacity-40">
          {game.paused ? "Resume" : "Pause"}
        </button>
        <button type="button" onClick={props.onNewGame} className="px-3 py-2 rounded-xl bg-stone-800 text-white">New Game</button>
        {hardcore && <span className="self-center text-sm text-rose-600 font-semibold">Hardcore</span>}
      </div>
      {!hardcore && settings.masterPowerupEnabled && <PowerupLegend />}
    </div>
  );
}

function StatsScreen(props: AppScreensProps) {
  const { stats } = props;
  return (
    <div className="mx-auto max-w-3xl p-6 text-stone-900 dark:text-stone-100 space-y-4">
      <h1 className="text-2xl font-extrabold">Statistics</h1>
      <div className="grid grid-cols-2 gap-2 text-sm">
        <StatBadge label="Games" value={stats.totalGamesPlayed} />
        <StatBadge label="Moves" value={stats.totalMovesMade} />
        <StatBadge label="Total score" value={stats.totalScoreAccumulated} />
        <StatBadge label="Average" value={Math.round(averageScore(stats))} />
      </div>
      <div className="rounded-3xl bg-white dark:bg-stone-800 p-4 shadow border border-stone-200 dark:border-stone-700 space-y-1 text-sm">
        <h3 className="font-semibold mb-2">Best by grid</h3>
        {GRID_SIZES.map((n) => (
          <div key={n} className="flex justify-between">
            <span>{n}×{n}</span>
            <span>{bestScoreFor(stats, n) || "—"}</span>
          </div>
        ))}
        <div className="text-right pt-2">
          <button type="button" onClick={props.onResetHighScores} className="px-3 py-2 rounded-xl bg-stone-200 dark:bg-stone-700">Reset high scores</button>
        </div>
      </div>
      <div className="rounded-3xl bg-white dark:bg-stone-800 p-4 shadow border border-stone-200 dark:border-stone-700 text-sm">
        <h3 className="font-semibold mb-2">Recent games</h3>
        {stats.history.length === 0 && <div className="text-stone-500">No finished games yet.</div>}
        {stats.history.slice(0, 25).map((r, i) => (
          <div key={`${r.timestamp}-${i}`} className="flex justify-between py-1">
            <span>{new Date(r.timestamp).toLocaleString()} • {r.gridSize}×{r.gridSize}</span>
            <span>{r.score} pts • {r.moveCount} moves • {formatTime(r.durationMs)}</span>
          </div>
        ))}
      </div>
    </div>
  );
}

function SettingsScreen(props: AppScreensProps) {
  const { settings, setSettings } = props;
  const setPowerup = (kind: PowerupKind, patch: Partial<PowerupConfig>) =>
    setSettings((s) => ({ ...s, powerups: { ...s.powerups, [kind]: { ...s.powerups[kind], ...patch } } }));
  const powerupsOn = settings.undoRedoEnabled && settings.masterPowerupEnabled;

  return (
    <div className="mx-auto max-w-3xl p-6 text-stone-900 dark:text-stone-100 space-y-4">
      <h1 className="text-2xl font-extrabold">Settings</h1>
      <div className="rounded-3xl bg-white dark:bg-stone-800 p-4 shadow border border-stone-200 dark:border-stone-700 space-y-3 text-sm">
        <label className="flex items-center gap-2">
          <input type="checkbox" checked={!settings.undoRedoEnabled} onChange={(e) => setSettings((s) => ({ ...s, undoRedoEnabled: !e.target.checked }))} />
          Hardcore mode (no undo, no powerups)
        </label>
        <label className="flex items-center gap-2">
          <span>Swipe sensitivity</span>
          <input type="range" min={10} max={100} step={5} value={settings.swipeThreshold} onChange={(e) => setSettings((s) => ({ ...s, swipeThreshold: parseInt(e.target.value) }))} />
          <span>{settings.swipeThreshold}px</span>
        </label>
        <label className="flex items-center gap-2">
          <input type="checkbox" checked={settings.hapticsEnabled} onChange={(e) => setSettings((s) => ({ ...s, hapticsEnabled: e.target.checked }))} />
          Haptics
        </label>
        <label className="flex items-center gap-2">
          <input type="checkbox" checked={settings.showTimer} onChange={(e) => setSettings((s) => ({ ...s, showTimer: e.target.checked }))} />
          Show timer
        </label>
        <label className="flex items-center gap-2">
          <span>Appearance</span>
          <select
            value={settings.appTheme}
            onChange={(e) => {
              const theme = APP_THEMES.find((t) => t === e.target.value);
              if (theme) setSettings((s) => ({ ...s, appTheme: theme }));
            }}
            className="px-2 py-1 rounded-lg bg-stone-200 dark:bg-stone-700"
          >
            {APP_THEMES.map((t) => <option key={t} value={t}>{THEME_LABELS[t]}</option>)}
          </select>
        </label>
        <div className="flex items-center gap-2">
          <span>Theme</span>
          {THEME_COLORS.map((c) => (
            <button
              key={c}
              type="button"
              aria-label={c}
              onClick={() => setSettings((s) => ({ ...s, themeColor: c }))}
              className={`h-6 w-6 rounded-full ${THEME_ACCENT[c]} ${settings.themeColor === c ? "ring-2 ring-stone-800" : ""}`}
            />
          ))}
        </div>
      </div>
      <div className={`rounded-3xl bg-white dark:bg-stone-800 p-4 shadow border border-stone-200 dark:border-stone-700 space-y-3 text-sm ${settings.undoRedoEnabled ? "" : "opacity-50"}`}>
        <label className="flex items-center gap-2">
          <input type="checkbox" disabled={!settings.undoRedoEnabled} checked={settings.masterPowerupEnabled} onChange={(e) => setSettings((s) => ({ ...s, masterPowerupEnabled: e.target.checked }))} />
          Powerups
        </label>
        <label className="flex items-center gap-2">
          <span>Frequency</span>
          <input type="range" min={0.01} max={0.4} step={0.01} disabled={!powerupsOn} value={settings.spawnProbability} onChange={(e) => setSettings((s) => ({ ...s, spawnProbability: parseFloat(e.target.value) }))} />
          <span>{Math.round(settings.spawnProbability * 100)}%</span>
        </label>
        {POWERUP_KINDS.map((kind) => (
          <div key={kind} className="flex items-center gap-2">
            <input type="checkbox" disabled={!powerupsOn} checked={settings.powerups[kind].enabled} onChange={(e) => setPowerup(kind, { enabled: e.target.checked })} />
            <span className="w-24">{POWERUP_META[kind].glyph} {POWERUP_META[kind].name}</span>
            <input type="range" min={1} max={10} step={1} disabled={!powerupsOn || !settings.powerups[kind].enabled} value={settings.powerups[kind].weight} onChange={(e) => setPowerup(kind, { weight: parseInt(e.target.value) })} />
            <span>{settings.powerups[kind].weight}</span>
          </div>
        ))}
      </div>
    </div>
  );
}
