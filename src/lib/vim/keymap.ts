import type { KeyEvent, NamedKey, ViCommand } from "./types.js";

export interface KeymapOptions {
  // Bare `q` as line start, for hosts that need the legacy binding
  lineStartOnQ: boolean;
}

// Keys the host navigates with natively, even in navigation mode
const NATIVE_NAVIGATION: ReadonlySet<string> = new Set<NamedKey>([
  "ArrowLeft",
  "ArrowRight",
  "ArrowUp",
  "ArrowDown",
  "Home",
  "End",
  "PageUp",
  "PageDown",
]);

const UNMAPPED: ViCommand = { kind: "misc", action: "unmapped" };

function motion(
  name: Extract<ViCommand, { kind: "motion" }>["motion"],
  select = false,
): ViCommand {
  return { kind: "motion", motion: name, select };
}

/**
 * Split a key event into its base character and whether Shift applies.
 * An upper-case letter counts as Shift + letter even if the host did not
 * set the flag; symbols such as `$` are taken as typed.
 */
export function normalizeKey(event: KeyEvent): { char: string; shift: boolean } {
  const { key } = event;
  const lower = key.toLowerCase();
  if (key.length === 1 && lower !== key.toUpperCase()) {
    return { char: lower, shift: Boolean(event.shift) || key !== lower };
  }
  return { char: key, shift: Boolean(event.shift) };
}

export function hasCommandModifier(event: KeyEvent): boolean {
  return Boolean(event.ctrl || event.alt || event.meta);
}

/**
 * Resolve one key event to a command.
 * The result does not depend on mode; the controller decides what a
 * command means in the current mode and pending state.
 */
export function resolveKey(event: KeyEvent, options: KeymapOptions): ViCommand {
  const { char, shift } = normalizeKey(event);

  if (event.key === "Enter") {
    return { kind: "misc", action: "newline" };
  }

  // Page-scroll chord: Ctrl+Shift+J / Ctrl+Shift+K
  if (event.ctrl && shift && (char === "j" || char === "k")) {
    return { kind: "misc", action: char === "j" ? "pageDown" : "pageUp" };
  }

  if (event.key === "Escape") {
    return { kind: "misc", action: "escape" };
  }

  if (hasCommandModifier(event)) {
    return { kind: "misc", action: "modifierChord" };
  }

  if (NATIVE_NAVIGATION.has(event.key)) {
    return { kind: "misc", action: "nativeNavigation" };
  }

  switch (char) {
    // Motions
    case "h":
      return motion("left", shift);
    case "l":
      return motion("right", shift);
    case "j":
      return shift ? UNMAPPED : motion("down");
    case "k":
      return shift ? UNMAPPED : motion("up");
    case "n":
      // Shift+N extends the selection one line down
      return shift ? motion("down", true) : UNMAPPED;
    case "0":
      return motion("lineStart");
    case "$":
      return motion("lineEnd");
    case "^":
      return motion("firstNonBlank");
    case "q":
      return !shift && options.lineStartOnQ ? motion("lineStart") : UNMAPPED;
    case "w":
      return shift ? UNMAPPED : motion("wordRight");
    case "b":
      return shift ? UNMAPPED : motion("wordLeft");
    case "g":
      return shift ? motion("documentEnd") : { kind: "misc", action: "goPrefix" };

    // Operators
    case "d":
      return shift ? UNMAPPED : { kind: "operator", operator: "delete" };
    case "y":
      return shift ? UNMAPPED : { kind: "operator", operator: "yank" };

    // Insertion
    case "i":
      return shift ? UNMAPPED : { kind: "enterInsert", insert: "before" };
    case "a":
      return shift ? UNMAPPED : { kind: "enterInsert", insert: "after" };
    case "o":
      return {
        kind: "enterInsert",
        insert: shift ? "lineAbove" : "lineBelow",
      };

    // Edits
    case "x":
      return shift ? UNMAPPED : { kind: "misc", action: "deleteChar" };
    case "p":
      return shift ? UNMAPPED : { kind: "misc", action: "paste" };
    case "u":
      // Shift+U extends the selection one line up
      return shift ? motion("up", true) : { kind: "misc", action: "undo" };
    case "r":
      return shift ? UNMAPPED : { kind: "misc", action: "replacePrefix" };
    case ".":
      return { kind: "misc", action: "repeat" };

    default:
      return UNMAPPED;
  }
}
