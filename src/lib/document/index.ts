export { TextDocument } from "./TextDocument.js";
export type { TextDocumentOptions } from "./TextDocument.js";
export { applyTextInput, typeText } from "./textInput.js";
export { loadTextFile, saveTextFile } from "./files.js";
export type { LoadedFile, LineEnding } from "./files.js";
