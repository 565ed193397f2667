import { useRef, useEffect, useCallback } from "react";

export interface AutoSaveOptions {
  // Changes whenever there may be something new to save
  version: number;
  // Skip scheduling (no file path, or nothing modified)
  enabled: boolean;
  delay?: number;
}

/**
 * Debounced save that follows a version counter.
 * Each version change restarts the timer; a pending save runs on unmount.
 */
export function useAutoSave(
  save: () => void,
  { version, enabled, delay = 1000 }: AutoSaveOptions,
): { flushSave: () => void; cancelSave: () => void } {
  const timeoutRef = useRef<ReturnType<typeof setTimeout> | null>(null);
  const saveRef = useRef(save);

  useEffect(() => {
    saveRef.current = save;
  }, [save]);

  const cancelSave = useCallback(() => {
    if (timeoutRef.current) {
      clearTimeout(timeoutRef.current);
      timeoutRef.current = null;
    }
  }, []);

  const flushSave = useCallback(() => {
    if (timeoutRef.current) {
      clearTimeout(timeoutRef.current);
      timeoutRef.current = null;
      saveRef.current();
    }
  }, []);

  useEffect(() => {
    if (!enabled) return;

    cancelSave();
    timeoutRef.current = setTimeout(() => {
      timeoutRef.current = null;
      saveRef.current();
    }, delay);
  }, [version, enabled, delay, cancelSave]);

  // Flush on unmount
  useEffect(() => flushSave, [flushSave]);

  return { flushSave, cancelSave };
}
