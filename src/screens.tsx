import { AnimatePresence, motion } from "framer-motion";
import type { ReactNode } from "react";
import { POWERUP_KINDS } from "./types";
import type { Cell, Tile } from "./types";
import { POWERUP_META } from "./app-constants";

const TILE_CLASSES: Record<number, string> = {
  2: "bg-amber-100 text-stone-800",
  4: "bg-amber-200 text-stone-800",
  8: "bg-orange-300 text-white",
  16: "bg-orange-400 text-white",
  32: "bg-orange-500 text-white",
  64: "bg-orange-600 text-white",
  128: "bg-yellow-400 text-white",
  256: "bg-yellow-500 text-white",
  512: "bg-yellow-600 text-white",
  1024: "bg-lime-500 text-white",
  2048: "bg-emerald-500 text-white",
};

const POWERUP_CLASSES = "bg-stone-800 text-white ring-2 ring-amber-300";

const tileClass = (tile: Tile) =>
  tile.kind === "number" ? TILE_CLASSES[tile.value] || "bg-emerald-600 text-white" : POWERUP_CLASSES;

const tileLabel = (tile: Tile) => (tile.kind === "number" ? String(tile.value) : POWERUP_META[tile.kind].glyph);

export function StatBadge({
  label,
  value,
}: {
  label: string;
  value: ReactNode;
}) {
  return (
    <div className="rounded-xl bg-stone-200 dark:bg-stone-700 px-3 py-2 text-sm font-medium shadow">
      <span className="text-stone-500 dark:text-stone-400 mr-2">{label}</span>
      <span className="text-stone-900 dark:text-stone-100">{value}</span>
    </div>
  );
}

export function BoardView({
  board,
  size,
  mergedCells,
  dimmed,
  onTap,
}: {
  board: readonly Cell[];
  size: number;
  mergedCells: Set<number>;
  dimmed: boolean;
  onTap: (index: number) => void;
}) {
  return (
    <div className="w-full max-w-[540px] mx-auto">
      <div
        className={`grid gap-2 p-3 rounded-3xl bg-stone-300 shadow-inner ${dimmed ? "opacity-60" : ""}`}
        style={{ gridTemplateColumns: `repeat(${size}, minmax(0, 1fr))` }}
      >
        {board.map((tile, i) => (
          <div key={i} className="aspect-square w-full rounded-2xl bg-stone-200">
            <AnimatePresence>
              {tile && (
                <motion.button
                  type="button"
                  key={tile.id}
                  onClick={() => onTap(i)}
                  initial={{ scale: 0.4, opacity: 0 }}
                  animate={{ scale: mergedCells.has(i) ? 1.06 : 1, opacity: 1 }}
                  exit={{ scale: 0.4, opacity: 0 }}
                  transition={{ type: "spring", stiffness: 420, damping: 24 }}
                  title={tile.kind === "number" ? undefined : POWERUP_META[tile.kind].name}
                  className={`h-full w-full rounded-2xl font-extrabold flex items-center justify-center shadow ${tileClass(tile)}`}
                >
                  <span className={`select-none ${size > 5 ? "text-base" : "text-xl md:text-2xl lg:text-3xl"}`}>
                    {tileLabel(tile)}
                  </span>
                </motion.button>
              )}
            </AnimatePresence>
          </div>
        ))}
      </div>
    </div>
  );
}

export function PowerupLegend() {
  return (
    <div className="rounded-2xl bg-white dark:bg-stone-800 p-4 shadow border border-stone-200 dark:border-stone-700">
      <h3 className="font-semibold mb-2">Powerups</h3>
      <ul className="text-sm text-stone-600 dark:text-stone-300 space-y-1">
        {POWERUP_KINDS.map((kind) => (
          <li key={kind}>
            <span className="mr-2">{POWERUP_META[kind].glyph}</span>
            <span className="font-medium text-stone-800 dark:text-stone-100 mr-1">{POWERUP_META[kind].name}:</span>
            {POWERUP_META[kind].hint}
          </li>
        ))}
      </ul>
    </div>
  );
}
