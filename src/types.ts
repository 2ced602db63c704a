export const DIRS = ["left", "right", "up", "down"] as const;
export type Dir = (typeof DIRS)[number];

export const POWERUP_KINDS = ["bomb", "joker", "surge", "shuffle", "glass"] as const;
export type PowerupKind = (typeof POWERUP_KINDS)[number];
export type TileKind = "number" | PowerupKind;

export type Tile = {
  readonly id: string;
  readonly value: number;
  readonly kind: TileKind;
};

export type Cell = Tile | null;

// Row-major, length size * size.
export type Board = Cell[];

export type GameSnapshot = {
  readonly board: readonly Cell[];
  readonly score: number;
  readonly label: string;
};

export type PowerupConfig = { enabled: boolean; weight: number };

export type SpawnPolicy = {
  undoRedoEnabled: boolean;
  masterPowerupEnabled: boolean;
  spawnProbability: number;
  powerups: Record<PowerupKind, PowerupConfig>;
};

export type GameConfig = SpawnPolicy & { gridSize: number };

export type GameResult = {
  readonly score: number;
  readonly moveCount: number;
  readonly durationMs: number;
  readonly gridSize: number;
  readonly timestamp: number;
};

export type ThemeColor = "orange" | "blue" | "purple" | "pink" | "green";

export type AppTheme = "system" | "light" | "dark";

export type Settings = GameConfig & {
  themeColor: ThemeColor;
  appTheme: AppTheme;
  swipeThreshold: number;
  hapticsEnabled: boolean;
  showTimer: boolean;
};

export type Stats = {
  totalGamesPlayed: number;
  totalMovesMade: number;
  totalScoreAccumulated: number;
  bestScores: Record<string, number>;
  history: GameResult[];
};

export type Screen = "game" | "stats" | "settings";
