import type { EditorSettings, SettingsFile } from "./types.js";
import { DEFAULT_SETTINGS, SETTINGS_VERSION } from "./types.js";

const FLAG_KEYS = ["viMode", "blockCursor", "autoIndent", "lineStartOnQ"] as const;

/**
 * Serialize runtime settings to file format
 */
export function serializeSettings(settings: EditorSettings): SettingsFile {
  return {
    version: SETTINGS_VERSION,
    viMode: settings.viMode,
    blockCursor: settings.blockCursor,
    autoIndent: settings.autoIndent,
    lineStartOnQ: settings.lineStartOnQ,
  };
}

/**
 * Deserialize a settings file; missing flags take their defaults
 */
export function deserializeSettings(file: SettingsFile): EditorSettings {
  const migrated = migrateSettings(file);

  return {
    viMode: migrated.viMode ?? DEFAULT_SETTINGS.viMode,
    blockCursor: migrated.blockCursor ?? DEFAULT_SETTINGS.blockCursor,
    autoIndent: migrated.autoIndent ?? DEFAULT_SETTINGS.autoIndent,
    lineStartOnQ: migrated.lineStartOnQ ?? DEFAULT_SETTINGS.lineStartOnQ,
  };
}

/**
 * Migrate older settings formats to current version
 */
function migrateSettings(file: SettingsFile): SettingsFile {
  const migrated = { ...file };

  // Version 0 or undefined -> Version 1
  if (!migrated.version || migrated.version < 1) {
    migrated.version = 1;
  }

  return migrated;
}

/**
 * Validate a settings file structure
 */
export function validateSettings(file: unknown): file is SettingsFile {
  if (!file || typeof file !== "object" || Array.isArray(file)) return false;

  if (!("version" in file) || typeof file.version !== "number") return false;

  for (const key of FLAG_KEYS) {
    if (key in file) {
      const value: unknown = Reflect.get(file, key);
      if (typeof value !== "boolean") return false;
    }
  }

  return true;
}
