/**
 * JSON serialization for arbitrary structured context
 */

/**
 * Stringify a value that may hold bigints, errors or cycles.
 * Bigints become strings, errors become { name, message }, and a reference back
 * to an enclosing object becomes "[Circular]". Returns undefined for values
 * JSON cannot represent at all (undefined, functions).
 */
export function stringifySafe(value: unknown): string | undefined {
  const ancestors: unknown[] = [];
  const text: string | undefined = JSON.stringify(value, function (this: unknown, _key: string, val: unknown) {
    if (typeof val === "bigint") return val.toString();
    if (typeof val !== "object" || val === null) return val;

    // `this` is the object holding val; drop siblings' subtrees from the path
    while (ancestors.length > 0 && ancestors[ancestors.length - 1] !== this) {
      ancestors.pop();
    }
    if (ancestors.includes(val)) return "[Circular]";
    // The returned object is what JSON.stringify descends into, so it goes on the path
    const out = val instanceof Error ? { name: val.name, message: val.message } : val;
    ancestors.push(out);
    return out;
  });
  return text;
}

/** Round-trip a value into plain JSON data */
export function toJsonValue(value: unknown): unknown {
  const text = stringifySafe(value);
  return text === undefined ? undefined : JSON.parse(text);
}
