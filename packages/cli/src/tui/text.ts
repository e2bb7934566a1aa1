/**
 * Interface Text
 *
 * Every string the interface renders, kept in one table.
 *
 * @module tui/text
 */

export const TEXT = {
  title: " Rewind ",
  descriptionTitle: " Rewind · Save checkpoint ",

  menu: {
    init: "Initialize repository",
    reload: "Reload repository",
    checkpoint: "Save checkpoint",
    history: "View history",
    rollback: "Roll back",
    sync: "Sync with remote",
  },

  labels: {
    actions: "What next?",
    history: "Checkpoints:",
    rollback: "Pick a checkpoint to roll back to:",
    branch: "Branch:",
    lastCheckpoint: "Last checkpoint:",
    staged: "Staged:",
    modified: "Modified:",
    untracked: "Untracked:",
  },

  prompts: {
    description: "Describe this checkpoint:",
    suggestions: "Or pick one:",
  },

  help: {
    main: "↑↓/jk Navigate | Enter Select | q Quit",
    hotkeys: "Hotkeys: [C] Save [H] History [R] Roll back [S] Sync",
    uninitialized: "Enter Initialize | q Quit",
    unavailable: "Enter Reload | q Quit",
    description: "[Enter Save] [Esc Cancel] [1-9 Quick pick]",
    history: "↑↓/jk Browse | Enter Roll back here | Esc Back | q Quit",
  },

  status: {
    clean: "✓ Working tree clean",
    dirty: "⚡ Unsaved changes",
    noCheckpoints: "No checkpoints yet",
    notInitialized: "No repository here yet. Initialize one to start saving checkpoints.",
    current: " (current)",
  },

  loading: {
    prefix: "Working: ",
    readingRepository: "Reading repository...",
    refreshingStatus: "Refreshing status...",
    preparingDescription: "Preparing description...",
    savingCheckpoint: "Saving checkpoint...",
    loadingHistory: "Loading history...",
    rollingBack: "Rolling back...",
    syncing: "Syncing with remote...",
    initializing: "Initializing repository...",
  },

  notices: {
    initialized: "Repository initialized",
    errorPrefix: "Error: ",
  },
} as const;

/**
 * Built-in checkpoint descriptions offered in description entry.
 */
export const DEFAULT_SUGGESTIONS: readonly string[] = [
  "Work in progress",
  "Quick fix",
  "New feature ready",
  "Refactoring",
  "Trying something out",
  "Safety save before a risky change",
  "Polished the details",
  "Performance tweaks",
  "Tests pass",
  "End of day snapshot",
  "Steady progress",
  "Cleaned up",
  "Back to a known good state",
  "One step closer to release",
];

/** Suggestions shown in description entry */
export const MAX_VISIBLE_SUGGESTIONS = 10;

/** Suggestions reachable with a digit key */
export const MAX_NUMBERED_SUGGESTIONS = 9;
