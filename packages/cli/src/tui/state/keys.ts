/**
 * Key Model
 *
 * Keys as the reducer sees them, independent of the terminal library.
 *
 * @module tui/state/keys
 */

/**
 * A key press. `char` carries printable text (one key or a paste);
 * `interrupt` is ctrl+c.
 */
export type Key =
  | { readonly name: "char"; readonly text: string }
  | {
      readonly name: "up" | "down" | "enter" | "escape" | "backspace" | "interrupt";
    };

/**
 * Subset of Ink's key flags used for translation.
 */
export interface TerminalKeyFlags {
  readonly upArrow?: boolean;
  readonly downArrow?: boolean;
  readonly return?: boolean;
  readonly escape?: boolean;
  readonly backspace?: boolean;
  readonly delete?: boolean;
  readonly ctrl?: boolean;
  readonly meta?: boolean;
  readonly tab?: boolean;
}

// biome-ignore lint/suspicious/noControlCharactersInRegex: stripping control characters
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/g;

/**
 * Translates terminal input into a {@link Key}, or null for keys Rewind
 * does not use.
 *
 * Backspace and delete both delete backwards: terminals disagree on which
 * one the backspace key sends.
 */
export function toKey(input: string, flags: TerminalKeyFlags): Key | null {
  if (flags.ctrl && input === "c") {
    return { name: "interrupt" };
  }
  if (flags.upArrow) return { name: "up" };
  if (flags.downArrow) return { name: "down" };
  if (flags.return) return { name: "enter" };
  if (flags.escape) return { name: "escape" };
  if (flags.backspace || flags.delete) return { name: "backspace" };
  if (flags.ctrl || flags.meta || flags.tab) return null;

  const text = input.replace(CONTROL_CHARS, "");
  return text === "" ? null : { name: "char", text };
}

/**
 * Shorthand for building keys in code and tests.
 */
export function charKey(text: string): Key {
  return { name: "char", text };
}
