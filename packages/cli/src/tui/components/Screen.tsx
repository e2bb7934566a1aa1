/**
 * Screen Component
 *
 * The whole interface as a function of {@link AppState}.
 *
 * @module tui/components/Screen
 */

import { Box, Text } from "ink";
import type React from "react";
import { type AppState, menuItems } from "../state/index.js";
import { TEXT } from "../text.js";
import { theme } from "../theme.js";
import { DescriptionPrompt } from "./DescriptionPrompt.js";
import { Header } from "./Header.js";
import { HistoryList } from "./HistoryList.js";
import { LoadingIndicator } from "./LoadingIndicator.js";
import { MainMenu } from "./MainMenu.js";
import { NoticeBar } from "./NoticeBar.js";
import { StatusPanel } from "./StatusPanel.js";

export interface ScreenProps {
  readonly state: AppState;
  /** Animate the loading spinner */
  readonly animate?: boolean;
}

function helpLine(state: AppState): string {
  switch (state.repository) {
    case "absent":
      return TEXT.help.uninitialized;
    case "unavailable":
      return TEXT.help.unavailable;
    default:
      return TEXT.help.main;
  }
}

function Body({ state }: { readonly state: AppState }): React.JSX.Element | null {
  switch (state.mode) {
    case "description":
      return <DescriptionPrompt draft={state.draft} suggestions={state.suggestions} />;
    case "history":
      return (
        <HistoryList
          checkpoints={state.checkpoints ?? []}
          selectedIndex={state.historyIndex}
          purpose={state.historyPurpose}
        />
      );
    case "main": {
      if (state.repository === "unknown") {
        return null;
      }
      const hasRepository = state.repository === "empty" || state.repository === "ready";
      return (
        <Box flexDirection="column">
          {state.status ? (
            <StatusPanel status={state.status} />
          ) : (
            state.repository === "absent" && (
              <Box marginBottom={1}>
                <Text color={theme.warning}>{TEXT.status.notInitialized}</Text>
              </Box>
            )
          )}
          <MainMenu
            items={menuItems(state.repository)}
            selectedIndex={state.menuIndex}
            help={helpLine(state)}
            showHotkeys={hasRepository}
          />
        </Box>
      );
    }
  }
}

export function Screen({ state, animate = true }: ScreenProps): React.JSX.Element {
  return (
    <Box flexDirection="column" paddingX={1}>
      <Header title={state.mode === "description" ? TEXT.descriptionTitle : TEXT.title} />
      <NoticeBar notice={state.notice} error={state.error} />
      {state.loading ? (
        <LoadingIndicator label={state.loadingLabel} animate={animate} />
      ) : (
        <Body state={state} />
      )}
    </Box>
  );
}
