/**
 * Application Reducer
 *
 * Pure `(state, event) => { state, command? }`. All interface state changes
 * happen here; the runtime only feeds events in and executes the returned
 * command.
 *
 * @module tui/state/reducer
 */

import { DEFAULT_CHECKPOINT_MESSAGE } from "@rewind/core";
import { DEFAULT_SUGGESTIONS, MAX_NUMBERED_SUGGESTIONS, TEXT } from "../text.js";
import type { AppEvent, Command, Transition } from "./events.js";
import type { Key } from "./keys.js";
import { MENU_HOTKEYS, type MenuAction, menuItems } from "./menu.js";
import type { AppState, HistoryPurpose, RepositoryPresence } from "./types.js";

type AppTransition = Transition<AppState>;

/** Command issued once at startup */
export const START_COMMAND: Command = { type: "LOAD_STATUS" };

/**
 * State at startup: loading, waiting for the first status.
 */
export function createInitialState(
  suggestions: readonly string[] = DEFAULT_SUGGESTIONS
): AppState {
  return {
    mode: "main",
    loading: true,
    loadingLabel: TEXT.loading.readingRepository,
    repository: "unknown",
    status: null,
    checkpoints: null,
    historyPurpose: "browse",
    menuIndex: 0,
    historyIndex: 0,
    draft: "",
    suggestions,
    notice: null,
    error: null,
    quitting: false,
  };
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Clamps an index into `[0, length)`, or 0 for an empty list.
 */
export function clampIndex(index: number, length: number): number {
  if (length <= 0) {
    return 0;
  }
  return Math.min(Math.max(index, 0), length - 1);
}

function startLoading(state: AppState, label: string, command: Command): AppTransition {
  return { state: { ...state, loading: true, loadingLabel: label }, command };
}

function refreshStatus(state: AppState, notice: string): AppTransition {
  return startLoading(
    { ...state, notice, error: null },
    TEXT.loading.refreshingStatus,
    START_COMMAND
  );
}

function quit(state: AppState): AppTransition {
  return { state: { ...state, quitting: true }, command: { type: "QUIT" } };
}

function hasRepository(repository: RepositoryPresence): boolean {
  return repository === "empty" || repository === "ready";
}

function isConfirm(key: Key): boolean {
  return key.name === "enter" || (key.name === "char" && key.text === " ");
}

function isUp(key: Key): boolean {
  return key.name === "up" || (key.name === "char" && key.text === "k");
}

function isDown(key: Key): boolean {
  return key.name === "down" || (key.name === "char" && key.text === "j");
}

function isChar(key: Key, text: string): boolean {
  return key.name === "char" && key.text === text;
}

// =============================================================================
// Menu selection
// =============================================================================

function selectAction(state: AppState, action: MenuAction): AppTransition {
  switch (action) {
    case "init":
      return startLoading(state, TEXT.loading.initializing, { type: "INIT_REPOSITORY" });
    case "reload":
      return startLoading(state, TEXT.loading.readingRepository, START_COMMAND);
    case "checkpoint":
      return startLoading(state, TEXT.loading.preparingDescription, {
        type: "PREPARE_DESCRIPTION",
      });
    case "history":
    case "rollback": {
      const purpose: HistoryPurpose = action === "history" ? "browse" : "rollback";
      return startLoading(state, TEXT.loading.loadingHistory, { type: "LOAD_HISTORY", purpose });
    }
    case "sync":
      return startLoading(state, TEXT.loading.syncing, { type: "SYNC" });
  }
}

// =============================================================================
// Keys per mode
// =============================================================================

function reduceMainKey(state: AppState, key: Key): AppTransition {
  const items = menuItems(state.repository);

  if (isUp(key)) {
    return { state: { ...state, menuIndex: clampIndex(state.menuIndex - 1, items.length) } };
  }
  if (isDown(key)) {
    return { state: { ...state, menuIndex: clampIndex(state.menuIndex + 1, items.length) } };
  }
  if (isConfirm(key)) {
    const item = items[state.menuIndex];
    return item ? selectAction(state, item.action) : { state };
  }
  if (key.name === "escape" || isChar(key, "q")) {
    return quit(state);
  }

  if (key.name === "char" && hasRepository(state.repository)) {
    const action = MENU_HOTKEYS.get(key.text);
    const index = items.findIndex((item) => item.action === action);
    if (action !== undefined && index !== -1) {
      return selectAction({ ...state, menuIndex: index }, action);
    }
  }

  return { state };
}

/**
 * Picks the suggestion for a digit key, or undefined when the key is not a
 * digit 1-9 or no suggestion has that number.
 */
function suggestionForKey(state: AppState, text: string): string | undefined {
  if (!/^[1-9]$/.test(text)) {
    return undefined;
  }
  const index = Number(text) - 1;
  return index < MAX_NUMBERED_SUGGESTIONS ? state.suggestions[index] : undefined;
}

function reduceDescriptionKey(state: AppState, key: Key): AppTransition {
  switch (key.name) {
    case "enter": {
      const text = state.draft.trim();
      const message = text === "" ? DEFAULT_CHECKPOINT_MESSAGE : text;
      return startLoading(
        { ...state, mode: "main", draft: "" },
        TEXT.loading.savingCheckpoint,
        { type: "CREATE_CHECKPOINT", message }
      );
    }
    case "escape":
      return { state: { ...state, mode: "main", draft: "" } };
    case "backspace":
      return { state: { ...state, draft: Array.from(state.draft).slice(0, -1).join("") } };
    case "char": {
      if (/^[1-9]$/.test(key.text)) {
        const suggestion = suggestionForKey(state, key.text);
        return suggestion === undefined ? { state } : { state: { ...state, draft: suggestion } };
      }
      return { state: { ...state, draft: state.draft + key.text } };
    }
    default:
      return { state };
  }
}

function reduceHistoryKey(state: AppState, key: Key): AppTransition {
  const length = state.checkpoints?.length ?? 0;

  if (isUp(key)) {
    return { state: { ...state, historyIndex: clampIndex(state.historyIndex - 1, length) } };
  }
  if (isDown(key)) {
    return { state: { ...state, historyIndex: clampIndex(state.historyIndex + 1, length) } };
  }
  if (isConfirm(key)) {
    const target = state.checkpoints?.[state.historyIndex];
    if (!target) {
      return { state };
    }
    return startLoading(
      { ...state, mode: "main", checkpoints: null, historyIndex: 0 },
      TEXT.loading.rollingBack,
      { type: "ROLLBACK", hash: target.hash }
    );
  }
  if (key.name === "escape" || key.name === "backspace") {
    return { state: { ...state, mode: "main", checkpoints: null, historyIndex: 0 } };
  }
  if (isChar(key, "q")) {
    return quit(state);
  }
  return { state };
}

function reduceKey(state: AppState, key: Key): AppTransition {
  if (key.name === "interrupt") {
    return quit(state);
  }
  if (state.loading) {
    return { state };
  }

  const cleared =
    state.notice === null && state.error === null ? state : { ...state, notice: null, error: null };

  switch (cleared.mode) {
    case "main":
      return reduceMainKey(cleared, key);
    case "description":
      return reduceDescriptionKey(cleared, key);
    case "history":
      return reduceHistoryKey(cleared, key);
  }
}

// =============================================================================
// Reducer
// =============================================================================

/**
 * Applies one event. Once quitting, every event is ignored.
 */
export function reduce(state: AppState, event: AppEvent): AppTransition {
  if (state.quitting) {
    return { state };
  }

  switch (event.type) {
    case "KEY_PRESSED":
      return reduceKey(state, event.key);

    case "STATUS_LOADED": {
      const loaded = event.state;
      const repository: RepositoryPresence = loaded.initialized
        ? loaded.status.hasCommits
          ? "ready"
          : "empty"
        : "absent";
      return {
        state: {
          ...state,
          loading: false,
          loadingLabel: "",
          repository,
          status: loaded.initialized ? loaded.status : null,
          menuIndex: clampIndex(state.menuIndex, menuItems(repository).length),
        },
      };
    }

    case "DESCRIPTION_READY":
      return {
        state: {
          ...state,
          mode: "description",
          loading: false,
          loadingLabel: "",
          draft: "",
          suggestions: event.suggestions,
        },
      };

    case "CHECKPOINT_CREATED":
      return refreshStatus(state, event.result.summary);

    case "HISTORY_LOADED":
      return {
        state: {
          ...state,
          mode: "history",
          loading: false,
          loadingLabel: "",
          checkpoints: event.checkpoints,
          historyPurpose: event.purpose,
          historyIndex: 0,
        },
      };

    case "ROLLED_BACK":
      return refreshStatus(state, event.summary);

    case "SYNC_COMPLETED":
      if (event.outcome.localOnly) {
        return {
          state: {
            ...state,
            loading: false,
            loadingLabel: "",
            notice: event.outcome.message,
            error: null,
          },
        };
      }
      return refreshStatus(state, event.outcome.message);

    case "REPOSITORY_INITIALIZED":
      return refreshStatus(state, TEXT.notices.initialized);

    case "OPERATION_FAILED": {
      const category = event.error.category;
      const failed: AppState = {
        ...state,
        loading: false,
        loadingLabel: "",
        notice: null,
        error: { message: event.error.message, category },
      };
      if (category !== "absence") {
        // Without any status yet there is nothing to act on but a reload.
        return state.repository === "unknown"
          ? { state: { ...failed, repository: "unavailable", menuIndex: 0 } }
          : { state: failed };
      }
      return {
        state: {
          ...failed,
          mode: "main",
          checkpoints: null,
          repository: "absent",
          status: null,
          menuIndex: 0,
        },
      };
    }
  }
}
