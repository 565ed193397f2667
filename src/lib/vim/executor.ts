import type { Cursor, EditResult, TextHost } from "./types.js";
import {
  clampOffset,
  collapsed,
  hasSelection,
  leadingWhitespace,
  lineEndOffset,
  nextOffset,
  selectionRange,
} from "./motions.js";

function isBlank(char: string): boolean {
  return char === " " || char === "\t";
}

/**
 * Run `fn` as one undo step on the host.
 */
function grouped<T>(host: TextHost, description: string, fn: () => T): T {
  host.beginGroup(description);
  try {
    return fn();
  } finally {
    host.endGroup();
  }
}

/**
 * Index of the last line for line-wise edits. The empty segment after a
 * final newline belongs to the line before it.
 */
export function lastLineIndex(host: TextHost): number {
  const last = host.lineCount() - 1;
  if (last > 0 && host.lineText(last) === "") return last - 1;
  return last;
}

/**
 * Delete the current line with its separator. On the last line the
 * preceding separator goes instead, so no stray blank line is left behind.
 * Returns the line, newline-terminated, for the register.
 */
export function deleteLine(host: TextHost, cursor: Cursor): EditResult {
  if (host.length() === 0) {
    return { cursor: collapsed(0), text: "" };
  }

  const line = host.lineAt(clampOffset(host, cursor.position));
  const start = host.lineStart(line);
  const content = host.lineText(line);
  const end = start + content.length;

  let from = start;
  let to = Math.min(end + 1, host.length());
  if (line >= lastLineIndex(host) && line > 0) {
    from = start - 1;
    to = end;
  }

  grouped(host, "Delete line", () => host.replaceRange(from, to, ""));

  const landing = clampOffset(host, from);
  return {
    cursor: collapsed(host.lineStart(host.lineAt(landing))),
    text: `${content}\n`,
  };
}

/**
 * Current line plus separator, without touching the buffer.
 */
export function yankLine(host: TextHost, cursor: Cursor): string {
  if (host.length() === 0) return "";
  const line = host.lineAt(clampOffset(host, cursor.position));
  return `${host.lineText(line)}\n`;
}

export function deleteSelection(host: TextHost, cursor: Cursor): EditResult {
  if (!hasSelection(cursor)) {
    return { cursor, text: "" };
  }

  const [from, to] = selectionRange(cursor);
  const start = clampOffset(host, from);
  const end = clampOffset(host, to);
  const text = host.slice(start, end);

  grouped(host, "Delete selection", () => host.replaceRange(start, end, ""));
  return { cursor: collapsed(start), text };
}

/**
 * Forward delete of the character at the cursor. No-op at document end.
 */
export function deleteCharForward(host: TextHost, cursor: Cursor): EditResult {
  const position = clampOffset(host, cursor.position);
  if (position >= host.length()) {
    return { cursor: collapsed(position), text: "" };
  }

  const end = nextOffset(host, position);
  const text = host.slice(position, end);
  grouped(host, "Delete character", () => host.replaceRange(position, end, ""));
  return { cursor: collapsed(position), text };
}

/**
 * Replace the character under the cursor, leaving the cursor on it.
 * No-op at a line end or the document end.
 */
export function replaceChar(host: TextHost, cursor: Cursor, char: string): Cursor {
  const position = clampOffset(host, cursor.position);
  if (position >= host.length() || host.slice(position, position + 1) === "\n") {
    return collapsed(position);
  }

  const end = nextOffset(host, position);
  grouped(host, "Replace character", () => host.replaceRange(position, end, char));
  return collapsed(position);
}

/**
 * Insert `text` as a new line below the current one. One trailing newline
 * is dropped. The cursor lands at the start of the new line.
 */
export function pasteAfter(host: TextHost, cursor: Cursor, text: string): Cursor {
  if (text === "") return cursor;

  const body = text.endsWith("\n") ? text.slice(0, -1) : text;
  const line = host.lineAt(clampOffset(host, cursor.position));
  const end = lineEndOffset(host, line);

  grouped(host, "Paste line", () => host.replaceRange(end, end, `\n${body}`));
  return collapsed(end + 1);
}

/**
 * Open a line below the current one, carrying its indentation.
 */
export function openLineBelow(host: TextHost, cursor: Cursor): Cursor {
  // An empty document already is one empty line
  if (host.length() === 0) return collapsed(0);

  const line = host.lineAt(clampOffset(host, cursor.position));
  const indent = leadingWhitespace(host.lineText(line));
  const end = lineEndOffset(host, line);

  grouped(host, "Open line below", () =>
    host.replaceRange(end, end, `\n${indent}`),
  );
  return collapsed(end + 1 + indent.length);
}

/**
 * Open a line above the current one, carrying its indentation.
 */
export function openLineAbove(host: TextHost, cursor: Cursor): Cursor {
  const line = host.lineAt(clampOffset(host, cursor.position));
  const indent = leadingWhitespace(host.lineText(line));
  const start = host.lineStart(line);

  grouped(host, "Open line above", () =>
    host.replaceRange(start, start, `${indent}\n`),
  );
  return collapsed(start + indent.length);
}

/**
 * Line break that repeats the current line's leading whitespace.
 * Replaces the selection if there is one. Blanks right after the break
 * are dropped, so the new line starts with exactly that indentation.
 */
export function autoIndentNewline(host: TextHost, cursor: Cursor): Cursor {
  const [from, to] = selectionRange(cursor);
  const start = clampOffset(host, from);
  const indent = leadingWhitespace(host.lineText(host.lineAt(start)));

  let end = clampOffset(host, to);
  const lineEnd = lineEndOffset(host, host.lineAt(end));
  while (end < lineEnd && isBlank(host.slice(end, end + 1))) {
    end++;
  }

  grouped(host, "New line", () => host.replaceRange(start, end, `\n${indent}`));
  return collapsed(start + 1 + indent.length);
}

/**
 * Cursor for `a`: one character right unless already at document end.
 */
export function afterCursor(host: TextHost, cursor: Cursor): Cursor {
  return collapsed(nextOffset(host, clampOffset(host, cursor.position)));
}
