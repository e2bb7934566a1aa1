/**
 * Formatting helpers shared by the gateway and the interface.
 *
 * @module git/format
 */

/** Length of an abbreviated commit hash as displayed */
export const SHORT_HASH_LENGTH = 7;

export function shortHash(hash: string): string {
  return hash.slice(0, SHORT_HASH_LENGTH);
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * Local-time `YYYY-MM-DD HH:mm:ss`, or `YYYY-MM-DD HH:mm` without seconds.
 */
export function formatTimestamp(date: Date, withSeconds = true): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}`;
  return withSeconds ? `${day} ${time}:${pad(date.getSeconds())}` : `${day} ${time}`;
}

/**
 * First line of a commit message.
 */
export function firstLine(message: string): string {
  const newline = message.indexOf("\n");
  return (newline === -1 ? message : message.slice(0, newline)).trim();
}
