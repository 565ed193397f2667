export type { Command } from "./Command.js";
export { BatchCommand } from "./Command.js";
export { CommandManager } from "./CommandManager.js";
export type { UndoRedoResult } from "./CommandManager.js";
export type { TextStateAccessors } from "./TextCommands.js";
export { ReplaceRangeCommand } from "./TextCommands.js";
