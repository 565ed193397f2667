import { Box, Text } from "ink";
import type { TextDocument } from "../lib/document/TextDocument.js";
import type { CursorStyle } from "../lib/vim/types.js";
import { lineSegments, type Segment } from "./viewport.js";

interface EditorViewProps {
  document: TextDocument;
  top: number;
  height: number;
  cursorStyle: CursorStyle;
}

function SegmentText({ segment, cursorStyle }: { segment: Segment; cursorStyle: CursorStyle }) {
  switch (segment.kind) {
    case "cursor":
      // Block caret covers the character, bar caret underlines it
      return cursorStyle === "block" ? (
        <Text inverse>{segment.text}</Text>
      ) : (
        <Text underline color="cyan">
          {segment.text}
        </Text>
      );
    case "selected":
      return <Text backgroundColor="blue">{segment.text}</Text>;
    case "plain":
      return <Text>{segment.text}</Text>;
  }
}

export default function EditorView({ document, top, height, cursorStyle }: EditorViewProps) {
  const cursor = document.getCursor();
  const cursorLine = document.lineAt(cursor.position);
  const lineCount = document.lineCount();
  const last = Math.min(lineCount, top + height);
  const gutterWidth = String(lineCount).length;

  const rows = [];
  for (let line = top; line < last; line++) {
    const segments = lineSegments(
      document.lineText(line),
      document.lineStart(line),
      cursor,
      line === cursorLine,
    );

    rows.push(
      <Box key={line}>
        <Text color={line === cursorLine ? "yellow" : "gray"}>
          {String(line + 1).padStart(gutterWidth)}{" "}
        </Text>
        <Text wrap="truncate">
          {segments.length === 0
            ? " "
            : segments.map((segment, index) => (
                <SegmentText key={index} segment={segment} cursorStyle={cursorStyle} />
              ))}
        </Text>
      </Box>,
    );
  }

  return (
    <Box flexDirection="column" height={height} overflow="hidden">
      {rows}
    </Box>
  );
}
