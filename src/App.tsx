import { useState, useEffect, useCallback, useRef } from "react";
import path from "path";
import { Box, Text, useInput, useApp, useStdout } from "ink";
import EditorView from "./components/EditorView.js";
import StatusLine from "./components/StatusLine.js";
import { followCursor } from "./components/viewport.js";
import { useViMode } from "./hooks/useViMode.js";
import { useAutoSave } from "./hooks/useAutoSave.js";
import type { TextDocument } from "./lib/document/TextDocument.js";
import { saveTextFile, type LineEnding } from "./lib/document/files.js";
import { collapsed } from "./lib/vim/motions.js";
import type { ViEngine } from "./lib/vim/ViEngine.js";
import type { KeyEvent } from "./lib/vim/types.js";
import { updateSettings, type EditorSettings } from "./lib/settings/index.js";

interface AppProps {
  document: TextDocument;
  engine: ViEngine;
  filePath: string | null;
  lineEnding: LineEnding;
  settings: EditorSettings;
  settingsPath: string;
}

// Status line + key help
const CHROME_HEIGHT = 2;

export default function App({
  document,
  engine,
  filePath,
  lineEnding,
  settings: initialSettings,
  settingsPath,
}: AppProps) {
  const { exit } = useApp();
  const { stdout } = useStdout();
  const [settings, setSettings] = useState(initialSettings);
  const [message, setMessage] = useState<string | null>(null);
  const topRef = useRef(0);

  // Terminal dimensions with resize support
  const [dimensions, setDimensions] = useState({
    width: stdout?.columns || 80,
    height: stdout?.rows || 24,
  });

  useEffect(() => {
    const handleResize = () => {
      if (stdout) {
        // Clear screen to prevent rendering artifacts
        stdout.write("\x1b[2J\x1b[H");
        setDimensions({
          width: stdout.columns,
          height: stdout.rows,
        });
      }
    };

    stdout?.on("resize", handleResize);
    return () => {
      stdout?.off("resize", handleResize);
    };
  }, [stdout]);

  const editorHeight = Math.max(1, dimensions.height - CHROME_HEIGHT);

  useEffect(() => {
    document.setPageLineCount(editorHeight);
  }, [document, editorHeight]);

  const save = useCallback((): boolean => {
    if (!filePath) {
      setMessage("No file name");
      return false;
    }
    try {
      saveTextFile(filePath, document.getText(), lineEnding);
      document.markSaved();
      return true;
    } catch (error) {
      console.error("Failed to save file:", error);
      setMessage(`Save failed: ${error instanceof Error ? error.message : String(error)}`);
      return false;
    }
  }, [document, filePath, lineEnding]);

  const persist = useCallback(
    (changes: Partial<EditorSettings>) => {
      try {
        setSettings(updateSettings(changes, settingsPath));
      } catch (error) {
        console.error("Failed to save settings:", error);
        setSettings((prev) => ({ ...prev, ...changes }));
      }
    },
    [settingsPath],
  );

  // Host bindings, reached only by keys nothing else consumed
  const handleHostKey = useCallback(
    (event: KeyEvent): boolean => {
      if (!event.ctrl) return false;

      switch (event.key.toLowerCase()) {
        case "s":
          if (save()) setMessage("Saved");
          return true;
        case "q":
          if (filePath && document.isModified()) save();
          exit();
          return true;
        case "z":
        case "r": {
          const redo = event.key.toLowerCase() === "r";
          const description = redo ? document.getRedoDescription() : document.getUndoDescription();
          const offset = redo ? document.redo() : document.undo();
          if (offset !== null) {
            document.setCursor(collapsed(offset));
            setMessage(`${redo ? "Redo" : "Undo"}: ${description ?? ""}`);
          }
          return true;
        }
        // Terminals cannot tell Ctrl+Shift+J/K from Ctrl+J/K
        case "d":
        case "u":
          engine.scrollPage(document, event.key.toLowerCase() === "d" ? "down" : "up");
          return true;
        case "t": {
          const viMode = !engine.isEnabled();
          engine.setEnabled(viMode);
          persist({ viMode });
          setMessage(viMode ? "Vi mode on" : "Vi mode off");
          return true;
        }
        case "b": {
          const blockCursor = !settings.blockCursor;
          engine.setBlockCursorEnabled(blockCursor);
          persist({ blockCursor });
          return true;
        }
        default:
          return false;
      }
    },
    [document, engine, exit, filePath, persist, save, settings.blockCursor],
  );

  const vi = useViMode({ document, engine, onUnhandled: handleHostKey });

  useAutoSave(
    () => {
      save();
    },
    { version: vi.version, enabled: filePath !== null && document.isModified() },
  );

  useInput((input, key) => {
    setMessage(null);
    vi.handleInput(input, key);
  });

  const cursor = document.getCursor();
  const cursorLine = document.lineAt(cursor.position);
  topRef.current = followCursor(topRef.current, cursorLine, editorHeight);

  return (
    <Box flexDirection="column" width={dimensions.width} height={dimensions.height}>
      <EditorView
        document={document}
        top={topRef.current}
        height={editorHeight}
        cursorStyle={vi.cursorStyle}
      />

      <StatusLine
        mode={vi.mode}
        enabled={vi.enabled}
        pending={vi.pending}
        fileName={filePath ? path.basename(filePath) : "[No Name]"}
        modified={document.isModified()}
        canUndo={document.canUndo()}
        canRedo={document.canRedo()}
        line={cursorLine}
        column={cursor.position - document.lineStart(cursorLine)}
        message={message}
      />

      <Box paddingX={1}>
        <Text dimColor>
          ^s:Save ^q:Quit ^z:Undo ^r:Redo ^d/^u:Page ^t:Vi {vi.enabled ? "on" : "off"} ^b:Block
          cursor {settings.blockCursor ? "on" : "off"}
        </Text>
      </Box>
    </Box>
  );
}
