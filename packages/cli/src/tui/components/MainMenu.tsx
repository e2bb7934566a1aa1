/**
 * MainMenu Component
 *
 * Action list with the selection marker, followed by key help.
 *
 * @module tui/components/MainMenu
 */

import { Box, Text } from "ink";
import type React from "react";
import type { MenuItem } from "../state/index.js";
import { TEXT } from "../text.js";
import { theme } from "../theme.js";

export interface MainMenuProps {
  readonly items: readonly MenuItem[];
  readonly selectedIndex: number;
  /** Key help line */
  readonly help: string;
  /** Show the hotkey line (only meaningful with a repository) */
  readonly showHotkeys: boolean;
}

export function MainMenu({
  items,
  selectedIndex,
  help,
  showHotkeys,
}: MainMenuProps): React.JSX.Element {
  return (
    <Box flexDirection="column">
      <Text bold color={theme.text}>
        {TEXT.labels.actions}
      </Text>
      {items.map((item, index) =>
        index === selectedIndex ? (
          <Text key={item.action} bold color={theme.selected}>
            ▶ {item.label}
          </Text>
        ) : (
          <Text key={item.action} color={theme.text}>
            {"  "}
            {item.label}
          </Text>
        )
      )}
      <Box flexDirection="column" marginTop={1}>
        <Text color={theme.muted}>{help}</Text>
        {showHotkeys && <Text color={theme.muted}>{TEXT.help.hotkeys}</Text>}
      </Box>
    </Box>
  );
}
