/**
 * StatusPanel Component
 *
 * Branch, last checkpoint, cleanliness and changed files.
 *
 * @module tui/components/StatusPanel
 */

import type { RepositoryStatus } from "@rewind/core";
import { Box, Text } from "ink";
import type React from "react";
import { TEXT } from "../text.js";
import { theme } from "../theme.js";

export interface StatusPanelProps {
  readonly status: RepositoryStatus;
}

/**
 * `Branch: main (↑1 ↓0)`; the counts appear only when either is non-zero.
 */
export function formatBranchLine(status: RepositoryStatus): string {
  const counts =
    status.ahead > 0 || status.behind > 0 ? ` (↑${status.ahead} ↓${status.behind})` : "";
  return `${TEXT.labels.branch} ${status.branch}${counts}`;
}

interface FileGroupProps {
  readonly label: string;
  readonly marker: string;
  readonly files: readonly string[];
  readonly color: string;
}

function FileGroup({ label, marker, files, color }: FileGroupProps): React.JSX.Element | null {
  if (files.length === 0) {
    return null;
  }
  return (
    <Box flexDirection="column" marginTop={1}>
      <Text color={color}>{label}</Text>
      {files.map((file) => (
        <Text key={file} color={theme.text}>
          {"  "}
          {marker} {file}
        </Text>
      ))}
    </Box>
  );
}

export function StatusPanel({ status }: StatusPanelProps): React.JSX.Element {
  return (
    <Box flexDirection="column" marginBottom={1}>
      <Text color={theme.text}>{formatBranchLine(status)}</Text>
      <Text color={theme.text}>
        {TEXT.labels.lastCheckpoint} {status.lastCheckpoint ?? TEXT.status.noCheckpoints}
      </Text>
      {status.isClean ? (
        <Text bold color={theme.success}>
          {TEXT.status.clean}
        </Text>
      ) : (
        <Text bold color={theme.warning}>
          {TEXT.status.dirty}
        </Text>
      )}
      <FileGroup label={TEXT.labels.staged} marker="✓" files={status.staged} color={theme.success} />
      <FileGroup
        label={TEXT.labels.modified}
        marker="•"
        files={status.modified}
        color={theme.warning}
      />
      <FileGroup
        label={TEXT.labels.untracked}
        marker="?"
        files={status.untracked}
        color={theme.text}
      />
    </Box>
  );
}
