import type { KeyEvent, NamedKey, TextHost } from "../vim/types.js";
import {
  applyMotion,
  clampOffset,
  collapsed,
  hasSelection,
  nextOffset,
  pageMove,
  prevOffset,
  selectionRange,
} from "../vim/motions.js";

const NAMED_KEYS: ReadonlySet<string> = new Set<NamedKey>([
  "Escape",
  "Enter",
  "Backspace",
  "Delete",
  "Tab",
  "ArrowLeft",
  "ArrowRight",
  "ArrowUp",
  "ArrowDown",
  "Home",
  "End",
  "PageUp",
  "PageDown",
]);

// Control characters never reach the buffer as typed text
const CONTROL_CHARS = /[\u0000-\u0008\u000b-\u001f\u007f]/;

/**
 * Replace the selection (or insert at the cursor) as one edit.
 */
export function typeText(host: TextHost, text: string): void {
  const [from, to] = selectionRange(host.getCursor());
  const start = clampOffset(host, from);
  const end = clampOffset(host, to);
  host.replaceRange(start, end, text);
  host.setCursor(collapsed(start + text.length));
}

function removeBackward(host: TextHost): void {
  const cursor = host.getCursor();
  if (hasSelection(cursor)) {
    typeText(host, "");
    return;
  }
  const position = clampOffset(host, cursor.position);
  if (position === 0) return;
  const start = prevOffset(host, position);
  host.replaceRange(start, position, "");
  host.setCursor(collapsed(start));
}

function removeForward(host: TextHost): void {
  const cursor = host.getCursor();
  if (hasSelection(cursor)) {
    typeText(host, "");
    return;
  }
  const position = clampOffset(host, cursor.position);
  if (position >= host.length()) return;
  host.replaceRange(position, nextOffset(host, position), "");
}

/**
 * Default, non-modal handling of a key the interpreter passed through.
 * Returns false when the key is not a text-editing key (chords, Escape).
 */
export function applyTextInput(host: TextHost, event: KeyEvent): boolean {
  if (event.ctrl || event.alt || event.meta) return false;

  const cursor = host.getCursor();
  const select = Boolean(event.shift);

  switch (event.key) {
    case "Backspace":
      removeBackward(host);
      return true;
    case "Delete":
      removeForward(host);
      return true;
    case "Tab":
      typeText(host, "\t");
      return true;
    case "Enter":
      typeText(host, "\n");
      return true;
    case "ArrowLeft":
      host.setCursor(applyMotion(host, cursor, "left", select));
      return true;
    case "ArrowRight":
      host.setCursor(applyMotion(host, cursor, "right", select));
      return true;
    case "ArrowUp":
      host.setCursor(applyMotion(host, cursor, "up", select));
      return true;
    case "ArrowDown":
      host.setCursor(applyMotion(host, cursor, "down", select));
      return true;
    case "Home":
      host.setCursor(applyMotion(host, cursor, "lineStart", select));
      return true;
    case "End":
      host.setCursor(applyMotion(host, cursor, "lineEnd", select));
      return true;
    case "PageUp":
    case "PageDown":
      host.setCursor(
        pageMove(
          host,
          cursor,
          host.pageLineCount?.() ?? 20,
          event.key === "PageDown" ? "down" : "up",
        ),
      );
      return true;
  }

  if (NAMED_KEYS.has(event.key) || event.key === "" || CONTROL_CHARS.test(event.key)) {
    return false;
  }

  typeText(host, event.key);
  return true;
}
