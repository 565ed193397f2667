export * from "./types.js";
export { serializeSettings, deserializeSettings, validateSettings } from "./serializer.js";
export { getSettingsPath, loadSettings, saveSettings, updateSettings } from "./storage.js";
