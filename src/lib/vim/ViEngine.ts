import { createActor, type Actor } from "xstate";
import { viMachine, modeOf, pendingOf, type ViMachine, type ViSnapshot } from "./ViMachine.js";
import { Register } from "./registers.js";
import { resolveKey, hasCommandModifier } from "./keymap.js";
import {
  applyMotion,
  clampOffset,
  collapsed,
  hasSelection,
  pageMove,
} from "./motions.js";
import {
  afterCursor,
  autoIndentNewline,
  deleteCharForward,
  deleteLine,
  deleteSelection,
  openLineAbove,
  openLineBelow,
  pasteAfter,
  replaceChar,
  yankLine,
} from "./executor.js";
import type {
  Cursor,
  CursorStyle,
  InsertKind,
  KeyEvent,
  KeyResult,
  MiscKind,
  Operator,
  Pending,
  RepeatableEdit,
  TextHost,
  ViCommand,
  ViEvent,
  ViListener,
  ViMode,
} from "./types.js";

const DEFAULT_PAGE_LINES = 20;

const CONTROL_CHAR = /^[\u0000-\u001f\u007f]$/;

export interface ViEngineOptions {
  enabled?: boolean;
  blockCursor?: boolean;
  autoIndent?: boolean;
  lineStartOnQ?: boolean;
  // Share one register between several editors
  register?: Register;
  // Page height when the host does not report one
  pageLines?: number;
}

function assertNever(value: never): never {
  throw new Error(`Unhandled vi command: ${JSON.stringify(value)}`);
}

/**
 * Modal command interpreter.
 *
 * Usage:
 * ```
 * const engine = new ViEngine({ enabled: true });
 * engine.subscribe((event) => { ... restyle caret, update badge ... });
 *
 * onKey((event) => {
 *   if (engine.handleKey(event, document) === "handled") return;
 *   // default text input
 * });
 * ```
 */
export class ViEngine {
  readonly register: Register;

  private readonly actor: Actor<ViMachine>;
  private readonly listeners = new Set<ViListener>();
  private enabled: boolean;
  private blockCursor: boolean;
  private autoIndent: boolean;
  private readonly lineStartOnQ: boolean;
  private readonly pageLines: number;
  private lastMode: ViMode = "navigation";
  private lastStyle: CursorStyle;
  private lastEdit: RepeatableEdit | null = null;

  constructor(options: ViEngineOptions = {}) {
    this.enabled = options.enabled ?? true;
    this.blockCursor = options.blockCursor ?? true;
    this.autoIndent = options.autoIndent ?? true;
    this.lineStartOnQ = options.lineStartOnQ ?? false;
    this.pageLines = options.pageLines ?? DEFAULT_PAGE_LINES;
    this.register = options.register ?? new Register();

    this.actor = createActor(viMachine);
    this.lastStyle = this.getCursorStyle();
    this.actor.subscribe((snapshot) => this.onSnapshot(snapshot));
    this.actor.start();
  }

  /** Underlying actor, for hosts that select state reactively */
  get actorRef(): Actor<ViMachine> {
    return this.actor;
  }

  getMode(): ViMode {
    return modeOf(this.actor.getSnapshot());
  }

  getPending(): Pending {
    return pendingOf(this.actor.getSnapshot());
  }

  getRegister(): string {
    return this.register.get();
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  isAutoIndentEnabled(): boolean {
    return this.autoIndent;
  }

  getCursorStyle(): CursorStyle {
    if (!this.enabled || !this.blockCursor) return "bar";
    return this.getMode() === "navigation" ? "block" : "bar";
  }

  /**
   * Turn the interpreter on or off. Enabling always starts in navigation.
   */
  setEnabled(enabled: boolean): void {
    if (this.enabled === enabled) return;
    this.enabled = enabled;
    this.actor.send({ type: "NAVIGATE" });
    this.emit({ type: "enabledChange", enabled });
    if (enabled) {
      this.emit({ type: "modeChange", isInsertion: false });
    }
    this.emitStyleIfChanged();
  }

  setBlockCursorEnabled(enabled: boolean): void {
    this.blockCursor = enabled;
    this.emitStyleIfChanged();
  }

  setAutoIndent(enabled: boolean): void {
    this.autoIndent = enabled;
  }

  /**
   * Subscribe to mode and cursor-style changes.
   */
  subscribe(listener: ViListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Force reset to navigation mode with nothing pending.
   */
  reset(): void {
    this.actor.send({ type: "NAVIGATE" });
  }

  stop(): void {
    this.actor.stop();
    this.listeners.clear();
  }

  /**
   * Handle one key event against the host's buffer.
   * "passThrough" means the host should apply its default handling.
   */
  handleKey(event: KeyEvent, host: TextHost): KeyResult {
    const command = resolveKey(event, { lineStartOnQ: this.lineStartOnQ });

    if (isMisc(command, "newline") && this.autoIndent) {
      if (this.getPending()?.kind === "replace") {
        this.actor.send({ type: "RESET" });
      }
      host.setCursor(autoIndentNewline(host, host.getCursor()));
      return "handled";
    }

    if (!this.enabled) return "passThrough";

    if (isMisc(command, "pageUp") || isMisc(command, "pageDown")) {
      this.scrollPage(host, isMisc(command, "pageDown") ? "down" : "up");
      return "handled";
    }

    if (this.getMode() === "insertion") {
      if (isMisc(command, "escape") && !hasCommandModifier(event)) {
        this.actor.send({ type: "ESCAPE" });
        return "handled";
      }
      this.actor.send({ type: "RESET" });
      return "passThrough";
    }

    if (this.getPending()?.kind === "replace") {
      this.actor.send({ type: "RESET" });
      const char = replacementChar(event);
      if (char !== null) {
        this.runEdit({ kind: "replace", char }, host);
        return "handled";
      }
      // Escape and other non-characters cancel r and act as usual
    }

    return this.dispatch(command, host);
  }

  /**
   * Move the cursor one page, using the host's page height when it has one.
   * Hosts whose terminal cannot deliver the page-scroll chord bind this
   * to keys of their own.
   */
  scrollPage(host: TextHost, direction: "up" | "down"): void {
    const lines = host.pageLineCount?.() ?? this.pageLines;
    host.setCursor(pageMove(host, host.getCursor(), lines, direction));
  }

  private dispatch(command: ViCommand, host: TextHost): KeyResult {
    const cursor = host.getCursor();

    switch (command.kind) {
      case "motion":
        this.actor.send({ type: "RESET" });
        host.setCursor(applyMotion(host, cursor, command.motion, command.select));
        return "handled";
      case "operator":
        return this.applyOperator(command.operator, host, cursor);
      case "enterInsert":
        this.actor.send({ type: "RESET" });
        host.setCursor(this.insertCursor(command.insert, host, cursor));
        this.actor.send({ type: "INSERT" });
        return "handled";
      case "misc":
        return this.applyMisc(command.action, host);
      default:
        return assertNever(command);
    }
  }

  /**
   * Apply a repeatable edit at the host's cursor and remember it for `.`.
   */
  private runEdit(edit: RepeatableEdit, host: TextHost): void {
    const cursor = host.getCursor();

    switch (edit.kind) {
      case "deleteChar":
        if (hasSelection(cursor)) {
          const result = deleteSelection(host, cursor);
          this.register.set(result.text);
          host.setCursor(result.cursor);
        } else {
          host.setCursor(deleteCharForward(host, cursor).cursor);
        }
        break;
      case "delete": {
        // Selection if there is one, otherwise the whole line
        const result = hasSelection(cursor)
          ? deleteSelection(host, cursor)
          : deleteLine(host, cursor);
        this.register.set(result.text);
        host.setCursor(result.cursor);
        break;
      }
      case "paste":
        host.setCursor(pasteAfter(host, cursor, this.register.get()));
        break;
      case "replace":
        host.setCursor(replaceChar(host, cursor, edit.char));
        break;
      default:
        assertNever(edit);
    }

    this.lastEdit = edit;
  }

  private applyOperator(operator: Operator, host: TextHost, cursor: Cursor): KeyResult {
    // d applies to an existing selection straight away
    if (operator === "delete" && hasSelection(cursor)) {
      this.actor.send({ type: "RESET" });
      this.runEdit({ kind: "delete" }, host);
      return "handled";
    }

    const pending = this.getPending();
    if (pending?.kind === "operator" && pending.operator === operator) {
      if (operator === "delete") {
        this.runEdit({ kind: "delete" }, host);
      } else {
        this.register.set(yankLine(host, cursor));
      }
    }

    // Completes the pair or starts waiting for the second key
    this.actor.send({ type: "OPERATOR", operator });
    return "handled";
  }

  private insertCursor(insert: InsertKind, host: TextHost, cursor: Cursor): Cursor {
    switch (insert) {
      case "before":
        return cursor;
      case "after":
        return afterCursor(host, cursor);
      case "lineBelow":
        return openLineBelow(host, cursor);
      case "lineAbove":
        return openLineAbove(host, cursor);
    }
  }

  private applyMisc(action: MiscKind, host: TextHost): KeyResult {
    if (action === "goPrefix") {
      // gg
      if (this.getPending()?.kind === "g") {
        host.setCursor(collapsed(0));
      }
      this.actor.send({ type: "G" });
      return "handled";
    }

    this.actor.send({ type: "RESET" });

    switch (action) {
      case "deleteChar":
        this.runEdit({ kind: "deleteChar" }, host);
        return "handled";
      case "paste":
        this.runEdit({ kind: "paste" }, host);
        return "handled";
      case "replacePrefix":
        this.actor.send({ type: "REPLACE" });
        return "handled";
      case "repeat":
        if (this.lastEdit) {
          this.runEdit(this.lastEdit, host);
        }
        return "handled";
      case "undo": {
        const offset = host.undo();
        if (offset !== null) {
          host.setCursor(collapsed(clampOffset(host, offset)));
        }
        return "handled";
      }
      case "pageUp":
      case "pageDown":
        this.scrollPage(host, action === "pageDown" ? "down" : "up");
        return "handled";
      case "nativeNavigation":
      case "modifierChord":
        return "passThrough";
      case "escape":
      case "newline":
      case "unmapped":
        // Swallowed so nothing is typed outside insertion mode
        return "handled";
    }
  }

  private onSnapshot(snapshot: ViSnapshot): void {
    const mode = modeOf(snapshot);
    if (mode === this.lastMode) return;
    this.lastMode = mode;
    this.emit({ type: "modeChange", isInsertion: mode === "insertion" });
    this.emitStyleIfChanged();
  }

  private emitStyleIfChanged(): void {
    const style = this.getCursorStyle();
    if (style === this.lastStyle) return;
    this.lastStyle = style;
    this.emit({ type: "cursorStyle", style });
  }

  private emit(event: ViEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}

// Printable character typed without a command modifier
function replacementChar(event: KeyEvent): string | null {
  if (hasCommandModifier(event)) return null;
  if (Array.from(event.key).length !== 1 || CONTROL_CHAR.test(event.key)) return null;
  return event.key;
}

function isMisc(command: ViCommand, action: MiscKind): boolean {
  return command.kind === "misc" && command.action === action;
}
