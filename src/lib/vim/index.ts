// Vi layer exports
export * from "./types.js";
export { viMachine, modeOf, pendingOf } from "./ViMachine.js";
export type { ViMachine, ViMachineEvent, ViSnapshot } from "./ViMachine.js";
export { ViEngine } from "./ViEngine.js";
export type { ViEngineOptions } from "./ViEngine.js";
export { Register } from "./registers.js";
export { resolveKey, normalizeKey } from "./keymap.js";
export type { KeymapOptions } from "./keymap.js";
export {
  applyMotion,
  motionTarget,
  pageMove,
  findWordLeft,
  findWordRight,
  leadingWhitespace,
} from "./motions.js";
export {
  deleteLine,
  yankLine,
  deleteSelection,
  deleteCharForward,
  pasteAfter,
  openLineBelow,
  openLineAbove,
  autoIndentNewline,
} from "./executor.js";
