import { Box, Text } from "ink";
import type React from "react";
import { theme } from "../theme.js";

export interface HeaderProps {
  readonly title: string;
}

export function Header({ title }: HeaderProps): React.JSX.Element {
  return (
    <Box marginBottom={1}>
      <Text bold color={theme.title.foreground} backgroundColor={theme.title.background}>
        {title}
      </Text>
    </Box>
  );
}
