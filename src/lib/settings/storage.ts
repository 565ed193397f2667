import fs from "fs";
import os from "os";
import path from "path";
import type { EditorSettings } from "./types.js";
import { DEFAULT_SETTINGS, SETTINGS_FILE_NAME, SETTINGS_PATH_ENV } from "./types.js";
import { deserializeSettings, serializeSettings, validateSettings } from "./serializer.js";

/**
 * Location of the settings file: $MODAL_EDIT_CONFIG or ~/.modal-edit.json
 */
export function getSettingsPath(env: NodeJS.ProcessEnv = process.env): string {
  const override = env[SETTINGS_PATH_ENV];
  if (override) return path.resolve(override);
  return path.join(os.homedir(), SETTINGS_FILE_NAME);
}

/**
 * Load settings from disk. Falls back to defaults when the file is
 * missing, unreadable or malformed.
 */
export function loadSettings(filePath: string = getSettingsPath()): EditorSettings {
  if (!fs.existsSync(filePath)) {
    return { ...DEFAULT_SETTINGS };
  }

  try {
    const content = fs.readFileSync(filePath, "utf-8");
    const parsed: unknown = JSON.parse(content);

    if (!validateSettings(parsed)) {
      console.warn(`Invalid settings file format, using defaults: ${filePath}`);
      return { ...DEFAULT_SETTINGS };
    }

    return deserializeSettings(parsed);
  } catch (error) {
    console.error("Failed to load settings:", error);
    return { ...DEFAULT_SETTINGS };
  }
}

/**
 * Save settings to disk (atomic write)
 */
export function saveSettings(
  settings: EditorSettings,
  filePath: string = getSettingsPath(),
): void {
  const dir = path.dirname(filePath);
  const tempFile = path.join(dir, `.${path.basename(filePath)}.tmp`);

  try {
    // Ensure directory exists
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    // Write to temp file first
    const content = JSON.stringify(serializeSettings(settings), null, 2);
    fs.writeFileSync(tempFile, content, "utf-8");

    // Atomic rename
    fs.renameSync(tempFile, filePath);
  } catch (error) {
    // Clean up temp file if it exists
    if (fs.existsSync(tempFile)) {
      fs.unlinkSync(tempFile);
    }
    throw error;
  }
}

/**
 * Merge a change into the stored settings and save them
 */
export function updateSettings(
  changes: Partial<EditorSettings>,
  filePath: string = getSettingsPath(),
): EditorSettings {
  const next = { ...loadSettings(filePath), ...changes };
  saveSettings(next, filePath);
  return next;
}
