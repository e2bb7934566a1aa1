/**
 * Colors used by the interface.
 *
 * @module tui/theme
 */

export const theme = {
  title: { foreground: "#FAFAFA", background: "#7D56F4" },
  selected: "#EE6FF8",
  text: "#FAFAFA",
  muted: "gray",
  error: "#FF5F87",
  success: "#50FA7B",
  warning: "#F1FA8C",
} as const;
