import type { AppTheme, Dir, PowerupKind, Settings, ThemeColor } from "./types";

export const GRID_SIZES = [3, 4, 5, 6, 7, 8] as const;

export const POWERUP_META: Record<PowerupKind, { name: string; glyph: string; hint: string }> = {
  bomb: { name: "Bomb", glyph: "💣", hint: "Tap to clear the 3×3 area around it." },
  joker: { name: "Joker", glyph: "🃏", hint: "Merges with any number and doubles it." },
  surge: { name: "Surge", glyph: "⚡", hint: "Tap to clear its whole row and column." },
  shuffle: { name: "Shuffle", glyph: "🔀", hint: "Tap to scatter every tile on the board." },
  glass: { name: "Glass", glyph: "🧊", hint: "Tap to break it and free the cell." },
};

export const THEME_ACCENT: Record<ThemeColor, string> = {
  orange: "bg-orange-500",
  blue: "bg-blue-500",
  purple: "bg-purple-500",
  pink: "bg-pink-500",
  green: "bg-emerald-500",
};

export const KEY_DIRS: Record<string, Dir> = {
  ArrowLeft: "left",
  ArrowRight: "right",
  ArrowUp: "up",
  ArrowDown: "down",
  a: "left",
  d: "right",
  w: "up",
  s: "down",
};

export const CELEBRATION_MS = 1200;

export const formatTime = (ms: number) => {
  const s = Math.floor(ms / 1000);
  const m = Math.floor(s / 60);
  const ss = s % 60;
  return `${m.toString().padStart(2, "0")}:${ss.toString().padStart(2, "0")}`;
};

/** Direction of a swipe, or null when it is shorter than `threshold` px. */
export function swipeDir(dx: number, dy: number, threshold: number): Dir | null {
  if (Math.max(Math.abs(dx), Math.abs(dy)) < threshold) return null;
  if (Math.abs(dx) > Math.abs(dy)) return dx > 0 ? "right" : "left";
  return dy > 0 ? "down" : "up";
}

export type HeaderBadge = "score" | "best" | "moves" | "time" | "goal";

/** Header badges for the game screen. Hardcore games have no goal badge. */
export function headerBadges(settings: Pick<Settings, "showTimer" | "undoRedoEnabled">): HeaderBadge[] {
  const out: HeaderBadge[] = ["score", "best", "moves"];
  if (settings.showTimer) out.push("time");
  if (settings.undoRedoEnabled) out.push("goal");
  return out;
}

export const isDarkTheme = (theme: AppTheme, systemDark: boolean) =>
  theme === "dark" || (theme === "system" && systemDark);
