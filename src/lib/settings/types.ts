// Editor preferences at runtime
export interface EditorSettings {
  viMode: boolean;
  blockCursor: boolean;
  autoIndent: boolean;
  lineStartOnQ: boolean;
}

// Settings as stored in the config file
export interface SettingsFile {
  version: number;
  viMode?: boolean;
  blockCursor?: boolean;
  autoIndent?: boolean;
  lineStartOnQ?: boolean;
}

export const DEFAULT_SETTINGS: Readonly<EditorSettings> = {
  viMode: false,
  blockCursor: true,
  autoIndent: true,
  lineStartOnQ: false,
};

// Current settings file version
export const SETTINGS_VERSION = 1;

export const SETTINGS_FILE_NAME = ".modal-edit.json";

// Overrides the settings file location
export const SETTINGS_PATH_ENV = "MODAL_EDIT_CONFIG";
