import type { Command } from "./Command.js";

// State accessors passed to commands
export interface TextStateAccessors {
  getText: () => string;
  setText: (text: string) => void;
}

function describe(removed: string, inserted: string): string {
  if (removed && inserted) return `Replace ${removed.length} chars`;
  if (removed) return `Delete ${removed.length} chars`;
  return `Insert ${inserted.length} chars`;
}

/**
 * Replace the text in [start, end) with new text.
 * Plain inserts and deletes are the degenerate cases.
 */
export class ReplaceRangeCommand implements Command {
  readonly type = "replaceRange";
  readonly description: string;
  readonly position: number;

  private removed: string | null = null;

  constructor(
    private state: TextStateAccessors,
    private start: number,
    private end: number,
    private inserted: string,
  ) {
    this.position = start;
    this.description = describe(
      state.getText().slice(start, end),
      inserted,
    );
  }

  execute(): void {
    const text = this.state.getText();

    // Capture previous text on first execute
    if (this.removed === null) {
      this.removed = text.slice(this.start, this.end);
    }

    this.state.setText(
      text.slice(0, this.start) + this.inserted + text.slice(this.end),
    );
  }

  undo(): void {
    if (this.removed === null) return;

    const text = this.state.getText();
    this.state.setText(
      text.slice(0, this.start) +
        this.removed +
        text.slice(this.start + this.inserted.length),
    );
  }
}
