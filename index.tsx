#!/usr/bin/env node
import { render } from "ink";
import path from "path";
import App from "./src/App.js";
import { TextDocument, loadTextFile, type LoadedFile } from "./src/lib/document/index.js";
import { ViEngine } from "./src/lib/vim/index.js";
import { getSettingsPath, loadSettings } from "./src/lib/settings/index.js";

// Parse CLI arguments
const args = process.argv.slice(2);
const fileArg = args[0];

if (fileArg === "--help" || fileArg === "-h") {
  console.log("Usage: modal-edit [file]");
  process.exit(0);
}

const filePath = fileArg ? path.resolve(fileArg) : null;

// Load settings ($MODAL_EDIT_CONFIG or ~/.modal-edit.json)
const settingsPath = getSettingsPath();
const settings = loadSettings(settingsPath);

// Load the file, or start an empty buffer
let loaded: LoadedFile = { text: "", lineEnding: "\n", existed: false };
if (filePath) {
  try {
    loaded = loadTextFile(filePath);
  } catch (error) {
    console.error(`Failed to open file: ${filePath}`, error);
    process.exit(1);
  }
  console.log(loaded.existed ? `Opening: ${filePath}` : `New file: ${filePath}`);
}

const document = new TextDocument(loaded.text);
const engine = new ViEngine({
  enabled: settings.viMode,
  blockCursor: settings.blockCursor,
  autoIndent: settings.autoIndent,
  lineStartOnQ: settings.lineStartOnQ,
});

// Use alternate screen buffer for fullscreen experience
process.stdout.write("\x1b[?1049h"); // Enter alternate screen
process.stdout.write("\x1b[?25l"); // Hide cursor

const instance = render(
  <App
    document={document}
    engine={engine}
    filePath={filePath}
    lineEnding={loaded.lineEnding}
    settings={settings}
    settingsPath={settingsPath}
  />,
);

instance
  .waitUntilExit()
  .catch((error: unknown) => {
    console.error("Editor crashed:", error);
    process.exitCode = 1;
  })
  .finally(() => {
    engine.stop();
    process.stdout.write("\x1b[?25h"); // Show cursor
    process.stdout.write("\x1b[?1049l"); // Exit alternate screen
  });
