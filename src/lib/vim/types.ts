// Vi mode types
export type ViMode = "navigation" | "insertion";

// Operators that wait for a second key (dd, yy)
export type Operator = "delete" | "yank";

// Partially typed two-key command
export type Pending =
  | { kind: "operator"; operator: Operator }
  | { kind: "g" }
  | { kind: "replace" }
  | null;

// Character-offset cursor; a selection exists when anchor !== position
export interface Cursor {
  position: number;
  anchor: number;
}

// Non-printable keys a host may deliver
export type NamedKey =
  | "Escape"
  | "Enter"
  | "Backspace"
  | "Delete"
  | "Tab"
  | "ArrowLeft"
  | "ArrowRight"
  | "ArrowUp"
  | "ArrowDown"
  | "Home"
  | "End"
  | "PageUp"
  | "PageDown";

/**
 * Toolkit-independent key event.
 * `key` is the produced character for printable keys ("G", "$") or a NamedKey.
 */
export interface KeyEvent {
  key: string;
  ctrl?: boolean;
  shift?: boolean;
  alt?: boolean;
  meta?: boolean;
}

export type KeyResult = "handled" | "passThrough";

export type MotionKind =
  | "left"
  | "right"
  | "down"
  | "up"
  | "lineStart"
  | "lineEnd"
  | "firstNonBlank"
  | "wordRight"
  | "wordLeft"
  | "documentStart"
  | "documentEnd";

export type InsertKind = "before" | "after" | "lineBelow" | "lineAbove";

export type MiscKind =
  | "goPrefix" // g, waiting for a second g
  | "deleteChar" // x
  | "paste" // p
  | "undo" // u
  | "replacePrefix" // r, waiting for the replacement character
  | "repeat" // .
  | "escape"
  | "newline"
  | "pageUp"
  | "pageDown"
  | "nativeNavigation" // arrows, Home/End, PageUp/PageDown
  | "modifierChord" // Ctrl/Alt/Meta chords the interpreter leaves alone
  | "unmapped";

// Fully resolved command for one key event
export type ViCommand =
  | { kind: "motion"; motion: MotionKind; select: boolean }
  | { kind: "operator"; operator: Operator }
  | { kind: "enterInsert"; insert: InsertKind }
  | { kind: "misc"; action: MiscKind };

// Last edit `.` replays
export type RepeatableEdit =
  | { kind: "deleteChar" }
  | { kind: "delete" }
  | { kind: "paste" }
  | { kind: "replace"; char: string };

export type CursorStyle = "block" | "bar";

// Notifications a host subscribes to
export type ViEvent =
  | { type: "modeChange"; isInsertion: boolean }
  | { type: "cursorStyle"; style: CursorStyle }
  | { type: "enabledChange"; enabled: boolean };

export type ViListener = (event: ViEvent) => void;

/**
 * Buffer/cursor service the interpreter drives.
 * Owned by the host; the engine only borrows it for one handleKey call.
 */
export interface TextHost {
  length(): number;
  slice(start: number, end: number): string;

  lineCount(): number;
  /** Index of the line containing the offset */
  lineAt(offset: number): number;
  /** Offset of the first character of the line */
  lineStart(line: number): number;
  /** Line text without its separator */
  lineText(line: number): string;

  replaceRange(start: number, end: number, text: string): void;

  getCursor(): Cursor;
  setCursor(cursor: Cursor): void;

  // Edits between begin/end form one undo step
  beginGroup(description: string): void;
  endGroup(): void;

  /** Returns the offset to put the cursor at, or null if there was nothing to undo */
  undo(): number | null;
  redo(): number | null;

  /** Lines visible in one page, for the page-scroll chord */
  pageLineCount?(): number;
}

// Result of a text-mutating primitive
export interface EditResult {
  cursor: Cursor;
  text: string;
}
