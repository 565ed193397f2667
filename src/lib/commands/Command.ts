/**
 * Base interface for all commands.
 * Commands encapsulate a single undoable edit.
 */
export interface Command {
  readonly type: string;
  readonly description: string;

  /** Cursor offset to restore after undo/redo */
  readonly position?: number;

  /** Execute the command (do/redo) */
  execute(): void;

  /** Undo the command */
  undo(): void;
}

/**
 * Batch multiple commands into a single undoable unit.
 */
export class BatchCommand implements Command {
  readonly type = "batch";
  readonly description: string;
  readonly position?: number;

  constructor(
    private commands: Command[],
    description: string,
  ) {
    this.description = description;
    // Undo lands where the group started
    this.position = commands[0]?.position;
  }

  execute(): void {
    for (const cmd of this.commands) {
      cmd.execute();
    }
  }

  undo(): void {
    // Undo in reverse order
    for (const cmd of [...this.commands].reverse()) {
      cmd.undo();
    }
  }
}
