/**
 * LoadingIndicator Component
 *
 * Spinner plus the label of the operation in flight.
 *
 * @module tui/components/LoadingIndicator
 */

import { Box, Text } from "ink";
import Spinner from "ink-spinner";
import type React from "react";
import { TEXT } from "../text.js";
import { theme } from "../theme.js";

export interface LoadingIndicatorProps {
  readonly label: string;
  /** Render the spinner frame (disabled in tests for stable frames) */
  readonly animate?: boolean;
}

export function LoadingIndicator({
  label,
  animate = true,
}: LoadingIndicatorProps): React.JSX.Element {
  return (
    <Box>
      {animate && (
        <Text color={theme.selected}>
          <Spinner type="dots" />{" "}
        </Text>
      )}
      <Text color={theme.text}>
        {TEXT.loading.prefix}
        {label}
      </Text>
    </Box>
  );
}
