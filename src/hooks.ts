import { useCallback, useEffect, useRef, useState } from "react";
import { isDarkTheme } from "./app-constants";
import type { AppTheme } from "./types";

/** Calls `callback` every `delayMs`; pass null to stop. */
export function useInterval(callback: () => void, delayMs: number | null) {
  const saved = useRef(callback);

  useEffect(() => {
    saved.current = callback;
  }, [callback]);

  useEffect(() => {
    if (delayMs === null) return;
    const id = window.setInterval(() => saved.current(), delayMs);
    return () => window.clearInterval(id);
  }, [delayMs]);
}

const DARK_QUERY = "(prefers-color-scheme: dark)";

/** Toggles the `dark` class on <html> from the chosen theme and the OS preference. */
export function useAppTheme(theme: AppTheme) {
  const [systemDark, setSystemDark] = useState(() => window.matchMedia(DARK_QUERY).matches);

  useEffect(() => {
    const mq = window.matchMedia(DARK_QUERY);
    const onChange = (e: MediaQueryListEvent) => setSystemDark(e.matches);
    mq.addEventListener("change", onChange);
    return () => mq.removeEventListener("change", onChange);
  }, []);

  useEffect(() => {
    document.documentElement.classList.toggle("dark", isDarkTheme(theme, systemDark));
  }, [theme, systemDark]);
}

/** Sets a value that falls back to `idle` after `ms`; a newer flash cancels the pending reset. */
export function useFlash<T>(idle: T, ms: number): [T, (value: T) => void, () => void] {
  const idleRef = useRef(idle);
  const [value, setValue] = useState<T>(idle);
  const timer = useRef<number | null>(null);

  const cancel = useCallback(() => {
    if (timer.current !== null) window.clearTimeout(timer.current);
    timer.current = null;
  }, []);

  useEffect(() => cancel, [cancel]);

  const flash = useCallback((next: T) => {
    cancel();
    setValue(next);
    timer.current = window.setTimeout(() => {
      timer.current = null;
      setValue(idleRef.current);
    }, ms);
  }, [cancel, ms]);

  const clear = useCallback(() => {
    cancel();
    setValue(idleRef.current);
  }, [cancel]);

  return [value, flash, clear];
}
