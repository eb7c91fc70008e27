/**
 * key=value rendering shared by record text and diagnostics lines
 */

import type { KeyVal } from "../aggregator/types.js";
import { stringifySafe } from "./json.js";

export function formatValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "object" && value !== null) return stringifySafe(value) ?? "";
  return String(value);
}

/** Render pairs as " key=value key=value", or "" when there are none */
export function formatFields(pairs: readonly KeyVal[], styleKey: (key: string) => string = (key) => key): string {
  return pairs.map(({ key, value }) => ` ${styleKey(key)}=${formatValue(value)}`).join("");
}
