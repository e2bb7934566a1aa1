/**
 * DescriptionPrompt Component
 *
 * Free-text entry for a checkpoint description with numbered quick picks.
 *
 * @module tui/components/DescriptionPrompt
 */

import { Box, Text } from "ink";
import type React from "react";
import { MAX_NUMBERED_SUGGESTIONS, MAX_VISIBLE_SUGGESTIONS, TEXT } from "../text.js";
import { theme } from "../theme.js";

export interface DescriptionPromptProps {
  readonly draft: string;
  readonly suggestions: readonly string[];
}

/**
 * Suggestion line as displayed: the first nine carry the digit that picks
 * them.
 */
export function formatSuggestion(suggestion: string, index: number): string {
  return index < MAX_NUMBERED_SUGGESTIONS ? `[${index + 1}] ${suggestion}` : `    ${suggestion}`;
}

export function DescriptionPrompt({ draft, suggestions }: DescriptionPromptProps): React.JSX.Element {
  const visible = suggestions.slice(0, MAX_VISIBLE_SUGGESTIONS);

  return (
    <Box flexDirection="column">
      <Text bold color={theme.text}>
        {TEXT.prompts.description}
      </Text>
      <Text color={theme.selected}>
        {"> "}
        {draft}_
      </Text>
      {visible.length > 0 && (
        <Box flexDirection="column" marginTop={1}>
          <Text color={theme.text}>{TEXT.prompts.suggestions}</Text>
          {visible.map((suggestion, index) => (
            // biome-ignore lint/suspicious/noArrayIndexKey: suggestions may repeat and never reorder
            <Text key={index} color={theme.muted}>
              {formatSuggestion(suggestion, index)}
            </Text>
          ))}
        </Box>
      )}
      <Box marginTop={1}>
        <Text color={theme.muted}>{TEXT.help.description}</Text>
      </Box>
    </Box>
  );
}
