import { describe, test, expect } from "vitest";
import { normalizeKey, resolveKey } from "../keymap.js";
import type { KeyEvent, MotionKind } from "../types.js";

const defaults = { lineStartOnQ: false };

function resolve(event: KeyEvent) {
  return resolveKey(event, defaults);
}

describe("normalizeKey", () => {
  test("upper-case letter implies shift", () => {
    expect(normalizeKey({ key: "G" })).toEqual({ char: "g", shift: true });
  });

  test("lower-case letter with shift flag keeps shift", () => {
    expect(normalizeKey({ key: "h", shift: true })).toEqual({ char: "h", shift: true });
  });

  test("symbols are taken as typed", () => {
    expect(normalizeKey({ key: "$", shift: true })).toEqual({ char: "$", shift: true });
    expect(normalizeKey({ key: "0" })).toEqual({ char: "0", shift: false });
  });

  test("named keys pass through", () => {
    expect(normalizeKey({ key: "Escape" })).toEqual({ char: "Escape", shift: false });
  });
});

describe("resolveKey", () => {
  describe("motions", () => {
    const plainMotions: Array<[string, MotionKind]> = [
      ["h", "left"],
      ["l", "right"],
      ["j", "down"],
      ["k", "up"],
      ["0", "lineStart"],
      ["$", "lineEnd"],
      ["^", "firstNonBlank"],
      ["w", "wordRight"],
      ["b", "wordLeft"],
    ];

    test.each(plainMotions)("%s moves %s", (key, motion) => {
      expect(resolve({ key })).toEqual({ kind: "motion", motion, select: false });
    });

    test("Shift+G goes to document end", () => {
      expect(resolve({ key: "G", shift: true })).toEqual({
        kind: "motion",
        motion: "documentEnd",
        select: false,
      });
    });

    test("Shift+H and Shift+L extend the selection", () => {
      expect(resolve({ key: "H" })).toEqual({ kind: "motion", motion: "left", select: true });
      expect(resolve({ key: "L" })).toEqual({ kind: "motion", motion: "right", select: true });
    });

    test("Shift+N and Shift+U extend the selection by lines", () => {
      expect(resolve({ key: "N" })).toEqual({ kind: "motion", motion: "down", select: true });
      expect(resolve({ key: "U" })).toEqual({ kind: "motion", motion: "up", select: true });
    });
  });

  describe("q", () => {
    test("is unmapped by default", () => {
      expect(resolve({ key: "q" })).toEqual({ kind: "misc", action: "unmapped" });
    });

    test("moves to line start when enabled", () => {
      expect(resolveKey({ key: "q" }, { lineStartOnQ: true })).toEqual({
        kind: "motion",
        motion: "lineStart",
        select: false,
      });
    });
  });

  describe("commands", () => {
    test("operators", () => {
      expect(resolve({ key: "d" })).toEqual({ kind: "operator", operator: "delete" });
      expect(resolve({ key: "y" })).toEqual({ kind: "operator", operator: "yank" });
    });

    test("insertion entries", () => {
      expect(resolve({ key: "i" })).toEqual({ kind: "enterInsert", insert: "before" });
      expect(resolve({ key: "a" })).toEqual({ kind: "enterInsert", insert: "after" });
      expect(resolve({ key: "o" })).toEqual({ kind: "enterInsert", insert: "lineBelow" });
      expect(resolve({ key: "O" })).toEqual({ kind: "enterInsert", insert: "lineAbove" });
    });

    test("edits", () => {
      expect(resolve({ key: "x" })).toEqual({ kind: "misc", action: "deleteChar" });
      expect(resolve({ key: "p" })).toEqual({ kind: "misc", action: "paste" });
      expect(resolve({ key: "u" })).toEqual({ kind: "misc", action: "undo" });
      expect(resolve({ key: "g" })).toEqual({ kind: "misc", action: "goPrefix" });
    });

    test("replace and repeat", () => {
      expect(resolve({ key: "r" })).toEqual({ kind: "misc", action: "replacePrefix" });
      expect(resolve({ key: "." })).toEqual({ kind: "misc", action: "repeat" });
      expect(resolve({ key: "R" })).toEqual({ kind: "misc", action: "unmapped" });
    });

    test("unknown keys are unmapped", () => {
      expect(resolve({ key: "z" })).toEqual({ kind: "misc", action: "unmapped" });
      expect(resolve({ key: "D" })).toEqual({ kind: "misc", action: "unmapped" });
      expect(resolve({ key: "J" })).toEqual({ kind: "misc", action: "unmapped" });
    });
  });

  describe("special keys", () => {
    test("Enter is a newline", () => {
      expect(resolve({ key: "Enter" })).toEqual({ kind: "misc", action: "newline" });
    });

    test("Escape", () => {
      expect(resolve({ key: "Escape" })).toEqual({ kind: "misc", action: "escape" });
    });

    test("Ctrl+Shift+J and Ctrl+Shift+K page", () => {
      expect(resolve({ key: "j", ctrl: true, shift: true })).toEqual({
        kind: "misc",
        action: "pageDown",
      });
      expect(resolve({ key: "K", ctrl: true })).toEqual({ kind: "misc", action: "pageUp" });
    });

    test("other modifier chords are left to the host", () => {
      expect(resolve({ key: "s", ctrl: true })).toEqual({ kind: "misc", action: "modifierChord" });
      expect(resolve({ key: "d", alt: true })).toEqual({ kind: "misc", action: "modifierChord" });
      expect(resolve({ key: "j", ctrl: true })).toEqual({ kind: "misc", action: "modifierChord" });
    });

    test("arrows and paging keys navigate natively", () => {
      for (const key of ["ArrowLeft", "ArrowDown", "Home", "End", "PageUp", "PageDown"]) {
        expect(resolve({ key })).toEqual({ kind: "misc", action: "nativeNavigation" });
      }
    });
  });
});
