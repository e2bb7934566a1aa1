/**
 * Alternate screen buffer control.
 *
 * The alternate buffer keeps the interface out of the shell's scrollback and
 * restores the previous screen on exit (DEC private mode 1049).
 *
 * @module tui/terminal
 */

const ENTER_ALTERNATE_BUFFER = "\x1b[?1049h";
const EXIT_ALTERNATE_BUFFER = "\x1b[?1049l";
const CURSOR_HOME = "\x1b[H";

export function enterAlternateBuffer(stream: NodeJS.WriteStream = process.stdout): void {
  if (stream.isTTY) {
    stream.write(ENTER_ALTERNATE_BUFFER + CURSOR_HOME);
  }
}

export function exitAlternateBuffer(stream: NodeJS.WriteStream = process.stdout): void {
  if (stream.isTTY) {
    stream.write(EXIT_ALTERNATE_BUFFER);
  }
}
