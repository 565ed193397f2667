import { describe, test, expect } from "vitest";
import { TextDocument } from "../TextDocument.js";

describe("TextDocument", () => {
  describe("lines", () => {
    const doc = new TextDocument("one\ntwo\n\nfour");

    test("counts lines including empty ones", () => {
      expect(doc.lineCount()).toBe(4);
      expect([0, 1, 2, 3].map((line) => doc.lineText(line))).toEqual(["one", "two", "", "four"]);
    });

    test("lineAt maps offsets to lines", () => {
      expect(doc.lineAt(0)).toBe(0);
      expect(doc.lineAt(3)).toBe(0);
      expect(doc.lineAt(4)).toBe(1);
      expect(doc.lineAt(8)).toBe(2);
      expect(doc.lineAt(9)).toBe(3);
      expect(doc.lineAt(100)).toBe(3);
    });

    test("lineStart and lineText", () => {
      expect(doc.lineStart(1)).toBe(4);
      expect(doc.lineText(1)).toBe("two");
      expect(doc.lineText(2)).toBe("");
      expect(doc.lineText(3)).toBe("four");
    });

    test("trailing newline ends with an empty line", () => {
      const trailing = new TextDocument("a\n");
      expect(trailing.lineCount()).toBe(2);
      expect(trailing.lineStart(1)).toBe(2);
      expect(trailing.lineText(1)).toBe("");
    });

    test("empty document has one empty line", () => {
      const empty = new TextDocument();
      expect(empty.lineCount()).toBe(1);
      expect(empty.lineText(0)).toBe("");
    });
  });

  describe("editing", () => {
    test("replaceRange edits and updates lines", () => {
      const doc = new TextDocument("ab");
      doc.replaceRange(1, 1, "\n");
      expect(doc.getText()).toBe("a\nb");
      expect(doc.lineCount()).toBe(2);
    });

    test("invalid ranges throw", () => {
      const doc = new TextDocument("abc");
      expect(() => doc.replaceRange(2, 1, "")).toThrow(RangeError);
      expect(() => doc.replaceRange(0, 4, "")).toThrow(RangeError);
      expect(() => doc.replaceRange(-1, 0, "")).toThrow(RangeError);
    });

    test("empty replacement of an empty range records nothing", () => {
      const doc = new TextDocument("abc");
      doc.replaceRange(1, 1, "");
      expect(doc.canUndo()).toBe(false);
    });

    test("undo returns the offset to restore", () => {
      const doc = new TextDocument("hello world");
      doc.replaceRange(6, 11, "there");
      expect(doc.undo()).toBe(6);
      expect(doc.getText()).toBe("hello world");
      expect(doc.redo()).toBe(6);
      expect(doc.getText()).toBe("hello there");
    });

    test("undo with no history returns null", () => {
      expect(new TextDocument("x").undo()).toBeNull();
    });

    test("groups nest into one undo step", () => {
      const doc = new TextDocument("abc");
      doc.beginGroup("Outer");
      doc.replaceRange(0, 0, "1");
      doc.beginGroup("Inner");
      doc.replaceRange(0, 0, "2");
      doc.endGroup();
      doc.endGroup();

      expect(doc.getUndoDescription()).toBe("Outer");
      doc.undo();
      expect(doc.getText()).toBe("abc");
      expect(doc.canUndo()).toBe(false);
      expect(doc.getRedoDescription()).toBe("Outer");
    });

    test("cursor is clamped after text shrinks", () => {
      const doc = new TextDocument("abcdef");
      doc.setCursor({ position: 6, anchor: 6 });
      doc.replaceRange(2, 6, "");
      expect(doc.getCursor()).toEqual({ position: 2, anchor: 2 });
    });
  });

  describe("cursor", () => {
    test("setCursor clamps to the document", () => {
      const doc = new TextDocument("abc");
      doc.setCursor({ position: 10, anchor: -2 });
      expect(doc.getCursor()).toEqual({ position: 3, anchor: 0 });
    });

    test("getCursor returns a copy", () => {
      const doc = new TextDocument("abc");
      const cursor = doc.getCursor();
      cursor.position = 2;
      expect(doc.getCursor().position).toBe(0);
    });
  });

  describe("saved state", () => {
    test("tracks modification against the last save", () => {
      const doc = new TextDocument("abc");
      expect(doc.isModified()).toBe(false);
      doc.replaceRange(3, 3, "d");
      expect(doc.isModified()).toBe(true);
      doc.markSaved();
      expect(doc.isModified()).toBe(false);
      doc.undo();
      expect(doc.isModified()).toBe(true);
    });

    test("load replaces text and clears history", () => {
      const doc = new TextDocument("abc");
      doc.replaceRange(0, 0, "x");
      doc.setCursor({ position: 2, anchor: 2 });
      doc.load("fresh");

      expect(doc.getText()).toBe("fresh");
      expect(doc.canUndo()).toBe(false);
      expect(doc.isModified()).toBe(false);
      expect(doc.getCursor()).toEqual({ position: 0, anchor: 0 });
    });
  });

  describe("subscribe", () => {
    test("notifies on edits and cursor moves and bumps the version", () => {
      const doc = new TextDocument("abc");
      let calls = 0;
      const unsubscribe = doc.subscribe(() => calls++);
      const before = doc.getVersion();

      doc.setCursor({ position: 1, anchor: 1 });
      expect(calls).toBe(1);

      doc.replaceRange(0, 0, "x");
      expect(calls).toBeGreaterThan(1);
      expect(doc.getVersion()).toBeGreaterThan(before);

      unsubscribe();
      const seen = calls;
      doc.setCursor({ position: 0, anchor: 0 });
      expect(calls).toBe(seen);
    });

    test("setting the same cursor does not notify", () => {
      const doc = new TextDocument("abc");
      let calls = 0;
      doc.subscribe(() => calls++);
      doc.setCursor({ position: 0, anchor: 0 });
      expect(calls).toBe(0);
    });
  });

  test("page line count has a floor of one", () => {
    const doc = new TextDocument("", { pageLines: 10 });
    expect(doc.pageLineCount()).toBe(10);
    doc.setPageLineCount(0);
    expect(doc.pageLineCount()).toBe(1);
  });
});
