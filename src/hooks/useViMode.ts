import { useCallback, useSyncExternalStore } from "react";
import { useSelector } from "@xstate/react";
import type { Key } from "ink";
import { modeOf, pendingOf } from "../lib/vim/ViMachine.js";
import type { ViEngine } from "../lib/vim/ViEngine.js";
import type { CursorStyle, KeyEvent, Pending, ViMode } from "../lib/vim/types.js";
import type { TextDocument } from "../lib/document/TextDocument.js";
import { applyTextInput } from "../lib/document/textInput.js";

// ============================================================================
// Key translation
// ============================================================================

// The parts of Ink's Key the editor reads
export type InkKey = Pick<
  Key,
  | "upArrow"
  | "downArrow"
  | "leftArrow"
  | "rightArrow"
  | "pageUp"
  | "pageDown"
  | "return"
  | "escape"
  | "ctrl"
  | "shift"
  | "meta"
  | "tab"
  | "backspace"
  | "delete"
>;

/**
 * Convert Ink's (input, key) pair into a toolkit-independent KeyEvent.
 */
export function toKeyEvent(input: string, key: InkKey): KeyEvent {
  const modifiers = { ctrl: key.ctrl, shift: key.shift, meta: key.meta };

  // Ink flags every Escape as meta, so a bare Escape would read as a chord
  if (key.escape) return { key: "Escape", ctrl: key.ctrl, shift: key.shift, meta: false };
  if (key.return) return { key: "Enter", ...modifiers };
  // Most terminals send DEL for Backspace, which Ink reports as delete
  if (key.backspace || key.delete) return { key: "Backspace", ...modifiers };
  if (key.tab) return { key: "Tab", ...modifiers };
  if (key.leftArrow) return { key: "ArrowLeft", ...modifiers };
  if (key.rightArrow) return { key: "ArrowRight", ...modifiers };
  if (key.upArrow) return { key: "ArrowUp", ...modifiers };
  if (key.downArrow) return { key: "ArrowDown", ...modifiers };
  if (key.pageUp) return { key: "PageUp", ...modifiers };
  if (key.pageDown) return { key: "PageDown", ...modifiers };

  return { key: input, ...modifiers };
}

// ============================================================================
// Hook
// ============================================================================

export interface UseViModeOptions {
  document: TextDocument;
  engine: ViEngine;
  /** Host bindings tried after the interpreter and text input decline a key */
  onUnhandled?: (event: KeyEvent) => boolean;
}

export interface ViModeState {
  mode: ViMode;
  pending: Pending;
  cursorStyle: CursorStyle;
  enabled: boolean;
  /** Bumped on every document change */
  version: number;
  handleKey: (event: KeyEvent) => boolean;
  handleInput: (input: string, key: InkKey) => boolean;
}

/**
 * Bind a ViEngine to a TextDocument for a React host.
 *
 * Keys go to the interpreter first, then to plain text input, then to
 * `onUnhandled`. Returns true when something consumed the key.
 */
export function useViMode({ document, engine, onUnhandled }: UseViModeOptions): ViModeState {
  const mode = useSelector(engine.actorRef, modeOf);
  const pending = useSelector(engine.actorRef, pendingOf, pendingEquals);

  const subscribeEngine = useCallback(
    (onChange: () => void) => engine.subscribe(() => onChange()),
    [engine],
  );
  const cursorStyle = useSyncExternalStore(subscribeEngine, () => engine.getCursorStyle());
  const enabled = useSyncExternalStore(subscribeEngine, () => engine.isEnabled());

  const subscribeDocument = useCallback(
    (onChange: () => void) => document.subscribe(onChange),
    [document],
  );
  const version = useSyncExternalStore(subscribeDocument, () => document.getVersion());

  const handleKey = useCallback(
    (event: KeyEvent): boolean => {
      if (engine.handleKey(event, document) === "handled") return true;
      if (applyTextInput(document, event)) return true;
      return onUnhandled?.(event) ?? false;
    },
    [engine, document, onUnhandled],
  );

  const handleInput = useCallback(
    (input: string, key: InkKey): boolean => handleKey(toKeyEvent(input, key)),
    [handleKey],
  );

  return { mode, pending, cursorStyle, enabled, version, handleKey, handleInput };
}

function pendingEquals(a: Pending, b: Pending): boolean {
  if (a === null || b === null) return a === b;
  if (a.kind !== "operator" || b.kind !== "operator") return a.kind === b.kind;
  return a.operator === b.operator;
}
