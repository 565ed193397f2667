import type { Cursor } from "../lib/vim/types.js";
import { selectionRange } from "../lib/vim/motions.js";

export type SegmentKind = "plain" | "selected" | "cursor";

export interface Segment {
  text: string;
  kind: SegmentKind;
}

/**
 * First visible line after scrolling just enough to keep the cursor line on screen.
 */
export function followCursor(top: number, cursorLine: number, height: number): number {
  const rows = Math.max(1, height);
  if (cursorLine < top) return cursorLine;
  if (cursorLine >= top + rows) return cursorLine - rows + 1;
  return top;
}

/**
 * Split one line into runs for rendering the selection and the caret.
 * A caret sitting on the line's end is drawn as a trailing space.
 */
export function lineSegments(
  text: string,
  lineStart: number,
  cursor: Cursor,
  showCursor: boolean,
): Segment[] {
  const [start, end] = selectionRange(cursor);
  const selStart = clamp(start - lineStart, text.length);
  const selEnd = clamp(end - lineStart, text.length);

  const column = cursor.position - lineStart;
  const caretOnLine = showCursor && column >= 0 && column <= text.length;
  const caretWidth = caretOnLine && column < text.length ? charWidth(text, column) : 0;

  const bounds = new Set([0, text.length, selStart, selEnd]);
  if (caretOnLine) {
    bounds.add(column);
    bounds.add(column + caretWidth);
  }
  const sorted = [...bounds].sort((a, b) => a - b);

  const segments: Segment[] = [];
  for (let i = 0; i + 1 < sorted.length; i++) {
    const from = sorted[i] ?? 0;
    const to = sorted[i + 1] ?? from;
    if (to <= from) continue;

    let kind: SegmentKind = "plain";
    if (caretOnLine && from === column) kind = "cursor";
    else if (from >= selStart && to <= selEnd && selStart < selEnd) kind = "selected";
    push(segments, { text: text.slice(from, to), kind });
  }

  if (caretOnLine && column === text.length) {
    segments.push({ text: " ", kind: "cursor" });
  }

  return segments;
}

function push(segments: Segment[], segment: Segment): void {
  const last = segments[segments.length - 1];
  if (last && last.kind === segment.kind && segment.kind !== "cursor") {
    last.text += segment.text;
    return;
  }
  segments.push(segment);
}

function clamp(value: number, max: number): number {
  return Math.max(0, Math.min(value, max));
}

function charWidth(text: string, index: number): number {
  const code = text.codePointAt(index) ?? 0;
  return code > 0xffff ? 2 : 1;
}
