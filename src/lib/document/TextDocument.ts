import { CommandManager, ReplaceRangeCommand, type TextStateAccessors } from "../commands/index.js";
import type { Cursor, TextHost } from "../vim/types.js";

export interface TextDocumentOptions {
  // Lines in one page, reported to the page-scroll chord
  pageLines?: number;
  // Undo depth
  maxHistory?: number;
}

/**
 * In-memory text buffer with a cursor and an undo log.
 *
 * Every edit runs as a ReplaceRangeCommand on the document's own
 * CommandManager; beginGroup/endGroup batch them into one undo step.
 */
export class TextDocument implements TextHost {
  private text: string;
  private savedText: string;
  private starts: number[] | null = null;
  private cursor: Cursor = { position: 0, anchor: 0 };
  private version = 0;
  private pageLines: number;

  private readonly history: CommandManager;
  private readonly accessors: TextStateAccessors;
  private listeners: Set<() => void> = new Set();

  constructor(text = "", options: TextDocumentOptions = {}) {
    this.text = text;
    this.savedText = text;
    this.pageLines = options.pageLines ?? 20;
    this.history = new CommandManager(options.maxHistory);
    this.accessors = {
      getText: () => this.text,
      setText: (next) => this.applyText(next),
    };
    this.history.subscribe(() => this.notifyListeners());
  }

  getText(): string {
    return this.text;
  }

  length(): number {
    return this.text.length;
  }

  slice(start: number, end: number): string {
    return this.text.slice(start, end);
  }

  lineCount(): number {
    return this.lineStarts().length;
  }

  lineAt(offset: number): number {
    const starts = this.lineStarts();
    const target = Math.max(0, Math.min(offset, this.text.length));

    // Last line whose start is <= target
    let low = 0;
    let high = starts.length - 1;
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if ((starts[mid] ?? 0) <= target) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low;
  }

  lineStart(line: number): number {
    const starts = this.lineStarts();
    const index = Math.max(0, Math.min(line, starts.length - 1));
    return starts[index] ?? 0;
  }

  lineText(line: number): string {
    const starts = this.lineStarts();
    const index = Math.max(0, Math.min(line, starts.length - 1));
    const start = starts[index] ?? 0;
    const next = starts[index + 1];
    const end = next === undefined ? this.text.length : next - 1;
    return this.text.slice(start, end);
  }

  replaceRange(start: number, end: number, text: string): void {
    if (
      !Number.isInteger(start) ||
      !Number.isInteger(end) ||
      start < 0 ||
      start > end ||
      end > this.text.length
    ) {
      throw new RangeError(
        `Invalid range [${start}, ${end}) for document of length ${this.text.length}`,
      );
    }
    if (start === end && text === "") return;

    this.history.execute(new ReplaceRangeCommand(this.accessors, start, end, text));
  }

  getCursor(): Cursor {
    return { ...this.cursor };
  }

  setCursor(cursor: Cursor): void {
    const next = {
      position: this.clamp(cursor.position),
      anchor: this.clamp(cursor.anchor),
    };
    if (next.position === this.cursor.position && next.anchor === this.cursor.anchor) {
      return;
    }
    this.cursor = next;
    this.notifyListeners();
  }

  beginGroup(description: string): void {
    this.history.beginBatch(description);
  }

  endGroup(): void {
    this.history.endBatch();
  }

  undo(): number | null {
    const result = this.history.undo();
    if (!result.success) return null;
    return this.clamp(result.position ?? 0);
  }

  redo(): number | null {
    const result = this.history.redo();
    if (!result.success) return null;
    return this.clamp(result.position ?? 0);
  }

  canUndo(): boolean {
    return this.history.canUndo();
  }

  canRedo(): boolean {
    return this.history.canRedo();
  }

  getUndoDescription(): string | null {
    return this.history.getUndoDescription();
  }

  getRedoDescription(): string | null {
    return this.history.getRedoDescription();
  }

  pageLineCount(): number {
    return this.pageLines;
  }

  setPageLineCount(lines: number): void {
    this.pageLines = Math.max(1, Math.floor(lines));
  }

  /**
   * Replace the whole text without recording history (file load).
   */
  load(text: string): void {
    this.history.clear();
    this.savedText = text;
    this.cursor = { position: 0, anchor: 0 };
    this.applyText(text);
  }

  isModified(): boolean {
    return this.text !== this.savedText;
  }

  markSaved(): void {
    this.savedText = this.text;
    this.notifyListeners();
  }

  /**
   * Monotonic change counter, for useSyncExternalStore.
   */
  getVersion(): number {
    return this.version;
  }

  /**
   * Subscribe to text and cursor changes.
   */
  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private applyText(next: string): void {
    this.text = next;
    this.starts = null;
    this.cursor = {
      position: this.clamp(this.cursor.position),
      anchor: this.clamp(this.cursor.anchor),
    };
    this.notifyListeners();
  }

  private lineStarts(): number[] {
    if (this.starts) return this.starts;

    const starts = [0];
    for (let i = 0; i < this.text.length; i++) {
      if (this.text.charCodeAt(i) === 10) {
        starts.push(i + 1);
      }
    }
    this.starts = starts;
    return starts;
  }

  private clamp(offset: number): number {
    return Math.max(0, Math.min(offset, this.text.length));
  }

  private notifyListeners(): void {
    this.version++;
    for (const listener of this.listeners) {
      listener();
    }
  }
}
