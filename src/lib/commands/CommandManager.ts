import type { Command } from "./Command.js";
import { BatchCommand } from "./Command.js";

/**
 * Result of an undo/redo operation.
 */
export interface UndoRedoResult {
  success: boolean;
  position?: number;
}

/**
 * Manages undo/redo stacks for commands.
 *
 * Usage:
 * - execute(cmd) to run a command and add it to history
 * - undo() to undo the last command
 * - redo() to redo the last undone command
 * - beginBatch()/endBatch() to group commands as one undo unit
 *
 * Batches nest: only the outermost endBatch() pushes to history.
 */
export class CommandManager {
  private undoStack: Command[] = [];
  private redoStack: Command[] = [];
  private batchQueue: Command[] | null = null;
  private batchDepth = 0;
  private batchDescription = "";

  // Listeners for state changes
  private listeners: Set<() => void> = new Set();

  constructor(private readonly maxSize = 100) {}

  /**
   * Execute a command and add it to the undo stack.
   */
  execute(command: Command): void {
    if (this.batchQueue) {
      // In batch mode, queue the command
      this.batchQueue.push(command);
      command.execute();
      this.notifyListeners();
      return;
    }

    command.execute();
    this.push(command);
  }

  beginBatch(description: string): void {
    if (this.batchDepth === 0) {
      this.batchQueue = [];
      this.batchDescription = description;
    }
    this.batchDepth++;
  }

  endBatch(): void {
    if (this.batchDepth === 0) {
      throw new Error("endBatch() called without a matching beginBatch()");
    }
    this.batchDepth--;
    if (this.batchDepth > 0) return;

    const commands = this.batchQueue ?? [];
    this.batchQueue = null;

    if (commands.length > 0) {
      this.push(new BatchCommand(commands, this.batchDescription));
    }
  }

  /**
   * Undo the last command.
   * Returns result with success flag and cursor offset to restore.
   */
  undo(): UndoRedoResult {
    const cmd = this.undoStack.pop();
    if (!cmd) return { success: false };

    cmd.undo();
    this.redoStack.push(cmd);
    this.notifyListeners();
    return { success: true, position: cmd.position };
  }

  /**
   * Redo the last undone command.
   */
  redo(): UndoRedoResult {
    const cmd = this.redoStack.pop();
    if (!cmd) return { success: false };

    cmd.execute();
    this.undoStack.push(cmd);
    this.notifyListeners();
    return { success: true, position: cmd.position };
  }

  canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  /**
   * Get the description of the command that would be undone.
   */
  getUndoDescription(): string | null {
    return this.undoStack[this.undoStack.length - 1]?.description ?? null;
  }

  /**
   * Get the description of the command that would be redone.
   */
  getRedoDescription(): string | null {
    return this.redoStack[this.redoStack.length - 1]?.description ?? null;
  }

  /**
   * Clear all history.
   */
  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
    this.notifyListeners();
  }

  /**
   * Subscribe to state changes.
   */
  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private push(command: Command): void {
    this.undoStack.push(command);
    this.redoStack = []; // Clear redo on new action

    // Trim to max size
    if (this.undoStack.length > this.maxSize) {
      this.undoStack.shift();
    }

    this.notifyListeners();
  }

  private notifyListeners(): void {
    for (const listener of this.listeners) {
      listener();
    }
  }
}
