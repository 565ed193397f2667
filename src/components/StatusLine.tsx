import { Box, Text } from "ink";
import type { Pending, ViMode } from "../lib/vim/types.js";

interface StatusLineProps {
  mode: ViMode;
  enabled: boolean;
  pending: Pending;
  fileName: string;
  modified: boolean;
  canUndo: boolean;
  canRedo: boolean;
  line: number;
  column: number;
  message: string | null;
}

function pendingLabel(pending: Pending): string {
  if (pending === null) return "";
  if (pending.kind === "g") return "g";
  if (pending.kind === "replace") return "r";
  return pending.operator === "delete" ? "d" : "y";
}

export default function StatusLine({
  mode,
  enabled,
  pending,
  fileName,
  modified,
  canUndo,
  canRedo,
  line,
  column,
  message,
}: StatusLineProps) {
  const isInsertion = !enabled || mode === "insertion";

  return (
    <Box paddingX={1} justifyContent="space-between">
      {/* Left: mode badge and file */}
      <Box gap={2}>
        <Text color={isInsertion ? "green" : "cyan"} bold inverse>
          {" "}
          {!enabled ? "EDIT" : isInsertion ? "INSERT" : "NORMAL"}{" "}
        </Text>
        <Box gap={1}>
          <Text bold>{fileName}</Text>
          {modified && <Text color="yellow">[+]</Text>}
        </Box>
        {message && <Text color="magenta">{message}</Text>}
      </Box>

      {/* Spacer */}
      <Box flexGrow={1} />

      {/* Right: pending keys, history, position */}
      <Box gap={2}>
        {pending && <Text color="yellow">{pendingLabel(pending)}</Text>}
        {(canUndo || canRedo) && (
          <Text dimColor>
            {canUndo ? "u" : "-"}/{canRedo ? "^r" : "-"}
          </Text>
        )}
        <Text dimColor>
          {line + 1}:{column + 1}
        </Text>
      </Box>
    </Box>
  );
}
