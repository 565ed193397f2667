import type { Cursor, MotionKind, TextHost } from "./types.js";

// Word classes for w/b: blanks, word characters, everything else
const BLANK = 0;
const WORD = 1;
const PUNCT = 2;
type CharClass = typeof BLANK | typeof WORD | typeof PUNCT;

const WORD_CHAR = /[\p{L}\p{N}_]/u;
const BLANK_CHAR = /\s/;

export function charClass(ch: string): CharClass {
  if (BLANK_CHAR.test(ch)) return BLANK;
  if (WORD_CHAR.test(ch)) return WORD;
  return PUNCT;
}

export function collapsed(offset: number): Cursor {
  return { position: offset, anchor: offset };
}

export function hasSelection(cursor: Cursor): boolean {
  return cursor.position !== cursor.anchor;
}

export function selectionRange(cursor: Cursor): [number, number] {
  return [
    Math.min(cursor.position, cursor.anchor),
    Math.max(cursor.position, cursor.anchor),
  ];
}

export function clampOffset(host: TextHost, offset: number): number {
  return Math.max(0, Math.min(offset, host.length()));
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Offset one character to the right. Surrogate pairs count as one character.
 */
export function nextOffset(host: TextHost, offset: number): number {
  const length = host.length();
  if (offset >= length) return length;
  const pair = host.slice(offset, offset + 2);
  if (
    pair.length === 2 &&
    isHighSurrogate(pair.charCodeAt(0)) &&
    isLowSurrogate(pair.charCodeAt(1))
  ) {
    return offset + 2;
  }
  return offset + 1;
}

/**
 * Offset one character to the left.
 */
export function prevOffset(host: TextHost, offset: number): number {
  if (offset <= 0) return 0;
  if (offset >= 2) {
    const pair = host.slice(offset - 2, offset);
    if (isHighSurrogate(pair.charCodeAt(0)) && isLowSurrogate(pair.charCodeAt(1))) {
      return offset - 2;
    }
  }
  return offset - 1;
}

export function leadingWhitespace(line: string): string {
  return /^[ \t]*/.exec(line)?.[0] ?? "";
}

export function lineEndOffset(host: TextHost, line: number): number {
  return host.lineStart(line) + host.lineText(line).length;
}

function columnOf(host: TextHost, offset: number): number {
  return offset - host.lineStart(host.lineAt(offset));
}

/**
 * Move to the same column on another line, clamped to that line's length.
 */
export function offsetOnLine(host: TextHost, line: number, column: number): number {
  const target = Math.max(0, Math.min(line, host.lineCount() - 1));
  return host.lineStart(target) + Math.min(column, host.lineText(target).length);
}

/**
 * Start of the next word, crossing line breaks. Stops at the document end.
 */
export function findWordRight(text: string, offset: number): number {
  const length = text.length;
  if (offset >= length) return length;

  let i = offset;
  const start = charClass(text.charAt(i));
  if (start !== BLANK) {
    while (i < length && charClass(text.charAt(i)) === start) i++;
  }
  while (i < length && charClass(text.charAt(i)) === BLANK) i++;
  return i;
}

/**
 * Start of the previous word. Stops at the document start.
 */
export function findWordLeft(text: string, offset: number): number {
  let i = Math.min(offset, text.length);
  while (i > 0 && charClass(text.charAt(i - 1)) === BLANK) i--;
  if (i === 0) return 0;

  const cls = charClass(text.charAt(i - 1));
  while (i > 0 && charClass(text.charAt(i - 1)) === cls) i--;
  return i;
}

/**
 * Where a motion lands from `offset`. Never leaves [0, length].
 */
export function motionTarget(host: TextHost, offset: number, motion: MotionKind): number {
  const position = clampOffset(host, offset);
  const line = host.lineAt(position);

  switch (motion) {
    case "left":
      return prevOffset(host, position);
    case "right":
      return nextOffset(host, position);
    case "down":
      if (line >= host.lineCount() - 1) return position;
      return offsetOnLine(host, line + 1, columnOf(host, position));
    case "up":
      if (line <= 0) return position;
      return offsetOnLine(host, line - 1, columnOf(host, position));
    case "lineStart":
      return host.lineStart(line);
    case "lineEnd":
      return lineEndOffset(host, line);
    case "firstNonBlank":
      return host.lineStart(line) + leadingWhitespace(host.lineText(line)).length;
    case "wordRight":
      return findWordRight(host.slice(0, host.length()), position);
    case "wordLeft":
      return findWordLeft(host.slice(0, host.length()), position);
    case "documentStart":
      return 0;
    case "documentEnd":
      return host.length();
  }
}

/**
 * Apply a motion to a cursor. With `select` the anchor stays put and the
 * selection grows; line-wise extension past the first/last line reaches the
 * document start/end.
 */
export function applyMotion(
  host: TextHost,
  cursor: Cursor,
  motion: MotionKind,
  select: boolean,
): Cursor {
  let target = motionTarget(host, cursor.position, motion);

  if (select) {
    const line = host.lineAt(clampOffset(host, cursor.position));
    if (motion === "down" && line >= host.lineCount() - 1) {
      target = host.length();
    } else if (motion === "up" && line <= 0) {
      target = 0;
    }
    return { position: target, anchor: clampOffset(host, cursor.anchor) };
  }

  return collapsed(target);
}

/**
 * Move the cursor a page of lines up or down, keeping the column.
 */
export function pageMove(
  host: TextHost,
  cursor: Cursor,
  lines: number,
  direction: "up" | "down",
): Cursor {
  const position = clampOffset(host, cursor.position);
  const line = host.lineAt(position);
  const step = Math.max(1, lines);
  const target = direction === "down" ? line + step : line - step;
  return collapsed(offsetOnLine(host, target, columnOf(host, position)));
}
