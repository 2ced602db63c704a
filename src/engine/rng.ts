export type Rng = () => number;

export const defaultRng: Rng = () => Math.random();

export function createRng(seed?: number): Rng {
  if (seed === undefined || !Number.isFinite(seed)) return defaultRng;
  let state = (seed >>> 0) || 0x6d2b79f5;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let z = state;
    z = Math.imul(z ^ (z >>> 15), z | 1);
    z ^= z + Math.imul(z ^ (z >>> 7), z | 61);
    return ((z ^ (z >>> 14)) >>> 0) / 4294967296;
  };
}

export const randomIndex = (n: number, rng: Rng) =>
  Math.min(n - 1, Math.floor(rng() * n));

// Fisher-Yates, returns a new array.
export function shuffled<T>(items: readonly T[], rng: Rng): T[] {
  const out = items.slice();
  for (let i = out.length - 1; i > 0; i--) {
    const j = randomIndex(i + 1, rng);
    const tmp = out[i];
    out[i] = out[j];
    out[j] = tmp;
  }
  return out;
}
