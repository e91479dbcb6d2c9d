/**
 * GramJS TL objects → payload trees.
 *
 * TL objects carry their constructor name in `className`, bookkeeping
 * fields (`CONSTRUCTOR_ID`, `originalArgs`, ...) and, on custom message
 * wrappers, private `_`-prefixed links back to the client. The tree keeps
 * the schema fields only, names the constructor under `_`, and renders
 * unix-second dates as ISO 8601 strings.
 */
import {
  liftPayload,
  mapNode,
  scalarNode,
  sequenceNode,
  type MapNode,
  type PayloadNode,
} from "../../core/normalize.js";

const SKIPPED_KEYS = new Set([
  "CONSTRUCTOR_ID",
  "SUBCLASS_OF_ID",
  "className",
  "classType",
  "originalArgs",
]);

const DATE_KEYS = new Set(["date", "editDate"]);

export function unixToIso(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}

export function tlToPayload(value: object): MapNode {
  const node = walk(value, new WeakSet<object>());
  return node?.kind === "map" ? node : mapNode([["value", node ?? scalarNode(null)]]);
}

function walk(value: unknown, seen: WeakSet<object>): PayloadNode | undefined {
  if (typeof value !== "object" || value === null) return liftPayload(value);
  if (value instanceof Uint8Array || value instanceof Date) return liftPayload(value);
  if (seen.has(value)) return undefined;

  seen.add(value);
  try {
    if (Array.isArray(value)) {
      const items: PayloadNode[] = [];
      for (const item of value) items.push(walk(item, seen) ?? scalarNode(null));
      return sequenceNode(items);
    }
    // big-integer ids and similar value objects
    if ("toJSON" in value && typeof value.toJSON === "function") {
      return liftPayload(value);
    }

    const entries: [string, PayloadNode][] = [];
    if ("className" in value && typeof value.className === "string") {
      entries.push(["_", scalarNode(value.className)]);
    }
    for (const [key, member] of Object.entries(value)) {
      if (key.startsWith("_") || SKIPPED_KEYS.has(key)) continue;
      if (typeof member === "function") continue;
      if (DATE_KEYS.has(key) && typeof member === "number") {
        entries.push([key, scalarNode(unixToIso(member))]);
        continue;
      }
      const node = walk(member, seen);
      if (node !== undefined) entries.push([key, node]);
    }
    return mapNode(entries);
  } finally {
    seen.delete(value);
  }
}
