/**
 * Main Menu
 *
 * @module tui/state/menu
 */

import { TEXT } from "../text.js";
import type { RepositoryPresence } from "./types.js";

export type MenuAction = "init" | "reload" | "checkpoint" | "history" | "rollback" | "sync";

export interface MenuItem {
  readonly action: MenuAction;
  readonly label: string;
}

const REPOSITORY_MENU: readonly MenuItem[] = [
  { action: "checkpoint", label: TEXT.menu.checkpoint },
  { action: "history", label: TEXT.menu.history },
  { action: "rollback", label: TEXT.menu.rollback },
  { action: "sync", label: TEXT.menu.sync },
];

const INIT_MENU: readonly MenuItem[] = [{ action: "init", label: TEXT.menu.init }];

const RELOAD_MENU: readonly MenuItem[] = [{ action: "reload", label: TEXT.menu.reload }];

/**
 * Hotkeys on the main screen. They work only while a repository exists.
 */
export const MENU_HOTKEYS: ReadonlyMap<string, MenuAction> = new Map([
  ["c", "checkpoint"],
  ["h", "history"],
  ["r", "rollback"],
  ["s", "sync"],
]);

/**
 * Menu for the current repository presence. Without a repository only
 * initialization is offered; before the first status load nothing is.
 */
export function menuItems(repository: RepositoryPresence): readonly MenuItem[] {
  switch (repository) {
    case "unknown":
      return [];
    case "unavailable":
      return RELOAD_MENU;
    case "absent":
      return INIT_MENU;
    case "empty":
    case "ready":
      return REPOSITORY_MENU;
  }
}
