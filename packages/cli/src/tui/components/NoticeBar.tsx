/**
 * NoticeBar Component
 *
 * Shows the result of the last operation: an error, or a success notice.
 * Errors of the "absence" category are guidance, not failures, and are
 * rendered without the error styling.
 *
 * @module tui/components/NoticeBar
 */

import { Box, Text } from "ink";
import type React from "react";
import type { ErrorNotice } from "../state/index.js";
import { TEXT } from "../text.js";
import { theme } from "../theme.js";

export interface NoticeBarProps {
  readonly notice: string | null;
  readonly error: ErrorNotice | null;
}

export function NoticeBar({ notice, error }: NoticeBarProps): React.JSX.Element | null {
  if (error) {
    if (error.category === "absence") {
      return (
        <Box marginBottom={1}>
          <Text color={theme.muted}>{error.message}</Text>
        </Box>
      );
    }
    return (
      <Box marginBottom={1}>
        <Text bold color={theme.error}>
          ⚠ {TEXT.notices.errorPrefix}
          {error.message}
        </Text>
      </Box>
    );
  }

  if (notice) {
    return (
      <Box marginBottom={1}>
        <Text bold color={theme.success}>
          ✓ {notice}
        </Text>
      </Box>
    );
  }

  return null;
}
