import fs from "fs";
import path from "path";

export type LineEnding = "\n" | "\r\n";

export interface LoadedFile {
  text: string;
  lineEnding: LineEnding;
  // False when the file did not exist yet
  existed: boolean;
}

/**
 * Line ending used by most lines. Ties go to "\n".
 */
export function detectLineEnding(content: string): LineEnding {
  const crlf = content.match(/\r\n/g)?.length ?? 0;
  const lf = (content.match(/\n/g)?.length ?? 0) - crlf;
  return crlf > lf ? "\r\n" : "\n";
}

/**
 * Read a text file for editing. Line endings are normalized to "\n";
 * the dominant style is reported so saving can restore it.
 * A missing file loads as an empty document.
 */
export function loadTextFile(filePath: string): LoadedFile {
  if (!fs.existsSync(filePath)) {
    return { text: "", lineEnding: "\n", existed: false };
  }

  const content = fs.readFileSync(filePath, "utf-8");
  const lineEnding = detectLineEnding(content);
  return {
    text: content.replace(/\r\n/g, "\n"),
    lineEnding,
    existed: true,
  };
}

/**
 * Save a text file (atomic write)
 */
export function saveTextFile(
  filePath: string,
  text: string,
  lineEnding: LineEnding = "\n",
): void {
  const dir = path.dirname(filePath);
  const tempFile = path.join(dir, `.${path.basename(filePath)}.tmp`);

  try {
    // Ensure directory exists
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }

    const content = lineEnding === "\r\n" ? text.replace(/\n/g, "\r\n") : text;
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
