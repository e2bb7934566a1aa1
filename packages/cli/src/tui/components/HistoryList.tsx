/**
 * HistoryList Component
 *
 * Checkpoints newest first with the selection marker. The heading depends
 * on whether history was opened to browse or to roll back.
 *
 * @module tui/components/HistoryList
 */

import { type Checkpoint, firstLine, formatTimestamp, shortHash } from "@rewind/core";
import { Box, Text } from "ink";
import type React from "react";
import type { HistoryPurpose } from "../state/index.js";
import { TEXT } from "../text.js";
import { theme } from "../theme.js";

export interface HistoryListProps {
  readonly checkpoints: readonly Checkpoint[];
  readonly selectedIndex: number;
  readonly purpose: HistoryPurpose;
}

/**
 * `2024-05-06 07:08 abc1234 - message (current)`
 */
export function formatCheckpointLine(checkpoint: Checkpoint): string {
  const current = checkpoint.isCurrent ? TEXT.status.current : "";
  return `${formatTimestamp(checkpoint.date, false)} ${shortHash(checkpoint.hash)} - ${firstLine(checkpoint.message)}${current}`;
}

export function HistoryList({
  checkpoints,
  selectedIndex,
  purpose,
}: HistoryListProps): React.JSX.Element {
  return (
    <Box flexDirection="column">
      <Text bold color={theme.text}>
        {purpose === "rollback" ? TEXT.labels.rollback : TEXT.labels.history}
      </Text>
      {checkpoints.length === 0 ? (
        <Text color={theme.muted}>{TEXT.status.noCheckpoints}</Text>
      ) : (
        checkpoints.map((checkpoint, index) =>
          index === selectedIndex ? (
            <Text key={checkpoint.hash} bold color={theme.selected}>
              ▶ {formatCheckpointLine(checkpoint)}
            </Text>
          ) : (
            <Text key={checkpoint.hash} color={theme.text}>
              {"  "}
              {formatCheckpointLine(checkpoint)}
            </Text>
          )
        )
      )}
      <Box marginTop={1}>
        <Text color={theme.muted}>{TEXT.help.history}</Text>
      </Box>
    </Box>
  );
}
