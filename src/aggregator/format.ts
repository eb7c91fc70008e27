/**
 * printf-style message formatting
 */

import { format } from "node:util";

/**
 * Substitute arguments into a format string.
 * Supports the util.format verbs plus %v as an alias of %s.
 */
export function formatMessage(fmt: string, args: readonly unknown[]): string {
  const normalized = fmt.replace(/%%|%v/g, (verb) => (verb === "%v" ? "%s" : verb));
  return format(normalized, ...args);
}
