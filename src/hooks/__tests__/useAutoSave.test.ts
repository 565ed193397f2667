// @vitest-environment happy-dom
import { describe, test, expect, beforeEach, afterEach, vi } from "vitest";
import { renderHook, act, cleanup } from "@testing-library/react";
import { useAutoSave } from "../useAutoSave.js";

describe("useAutoSave", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    cleanup();
    vi.useRealTimers();
  });

  function setup(initial: { version: number; enabled: boolean }) {
    const save = vi.fn();
    const hook = renderHook((props) => useAutoSave(save, { ...props, delay: 500 }), {
      initialProps: initial,
    });
    return { save, ...hook };
  }

  test("saves once after the delay", () => {
    const { save } = setup({ version: 1, enabled: true });
    act(() => {
      vi.advanceTimersByTime(499);
    });
    expect(save).not.toHaveBeenCalled();
    act(() => {
      vi.advanceTimersByTime(1);
    });
    expect(save).toHaveBeenCalledTimes(1);
  });

  test("each new version restarts the timer", () => {
    const { save, rerender } = setup({ version: 1, enabled: true });
    act(() => {
      vi.advanceTimersByTime(400);
    });
    rerender({ version: 2, enabled: true });
    act(() => {
      vi.advanceTimersByTime(400);
    });
    expect(save).not.toHaveBeenCalled();
    act(() => {
      vi.advanceTimersByTime(100);
    });
    expect(save).toHaveBeenCalledTimes(1);
  });

  test("does nothing while disabled", () => {
    const { save } = setup({ version: 1, enabled: false });
    act(() => {
      vi.advanceTimersByTime(1000);
    });
    expect(save).not.toHaveBeenCalled();
  });

  test("flushSave runs a pending save immediately", () => {
    const { save, result } = setup({ version: 1, enabled: true });
    act(() => {
      result.current.flushSave();
    });
    expect(save).toHaveBeenCalledTimes(1);

    act(() => {
      vi.advanceTimersByTime(1000);
    });
    expect(save).toHaveBeenCalledTimes(1);
  });

  test("cancelSave drops a pending save", () => {
    const { save, result } = setup({ version: 1, enabled: true });
    act(() => {
      result.current.cancelSave();
      vi.advanceTimersByTime(1000);
    });
    expect(save).not.toHaveBeenCalled();
  });

  test("a pending save runs on unmount", () => {
    const { save, unmount } = setup({ version: 1, enabled: true });
    unmount();
    expect(save).toHaveBeenCalledTimes(1);
  });
});
