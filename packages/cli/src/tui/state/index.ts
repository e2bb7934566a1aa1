export type {
  AppEvent,
  CheckpointCreatedEvent,
  Command,
  DescriptionReadyEvent,
  HistoryLoadedEvent,
  KeyPressedEvent,
  OperationFailedEvent,
  RepositoryInitializedEvent,
  RolledBackEvent,
  StatusLoadedEvent,
  SyncCompletedEvent,
  Transition,
} from "./events.js";
export { charKey, type Key, type TerminalKeyFlags, toKey } from "./keys.js";
export { MENU_HOTKEYS, type MenuAction, type MenuItem, menuItems } from "./menu.js";
export { clampIndex, createInitialState, reduce, START_COMMAND } from "./reducer.js";
export type {
  AppMode,
  AppState,
  ErrorNotice,
  HistoryPurpose,
  RepositoryPresence,
} from "./types.js";
