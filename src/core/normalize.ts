/**
 * Payload trees and the record normalizer.
 *
 * Message payloads arrive as loosely-typed object graphs. They are lifted
 * into a closed variant (`map`, `sequence`, `scalar`, `bytes`) so the
 * normalizer is a plain structural transform: every `bytes` node is
 * dropped, everything else is kept in place and in order.
 */

// ---------------------------------------------------------------------------
// Payload variant
// ---------------------------------------------------------------------------

export type ScalarValue = string | number | boolean | null;

export interface MapNode {
  kind: "map";
  entries: [string, PayloadNode][];
}

export interface SequenceNode {
  kind: "sequence";
  items: PayloadNode[];
}

export interface ScalarNode {
  kind: "scalar";
  value: ScalarValue;
}

export interface BytesNode {
  kind: "bytes";
  value: Uint8Array;
}

export type PayloadNode = MapNode | SequenceNode | ScalarNode | BytesNode;

export type JsonValue =
  | ScalarValue
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export function mapNode(entries: [string, PayloadNode][]): MapNode {
  return { kind: "map", entries };
}

export function sequenceNode(items: PayloadNode[]): SequenceNode {
  return { kind: "sequence", items };
}

export function scalarNode(value: ScalarValue): ScalarNode {
  return { kind: "scalar", value };
}

export function bytesNode(value: Uint8Array): BytesNode {
  return { kind: "bytes", value };
}

// ---------------------------------------------------------------------------
// Normalizer
// ---------------------------------------------------------------------------

/** Remove every binary field at any depth. A bytes root becomes `null`. */
export function normalizePayload(node: PayloadNode): PayloadNode {
  switch (node.kind) {
    case "bytes":
      return scalarNode(null);
    case "scalar":
      return node;
    case "sequence":
      return sequenceNode(
        node.items
          .filter((item) => item.kind !== "bytes")
          .map((item) => normalizePayload(item)),
      );
    case "map":
      return mapNode(
        node.entries
          .filter(([, value]) => value.kind !== "bytes")
          .map(([key, value]) => [key, normalizePayload(value)]),
      );
  }
}

/** Same as `normalizePayload`, typed for map roots. */
export function normalizeMap(node: MapNode): MapNode {
  return mapNode(
    node.entries
      .filter(([, value]) => value.kind !== "bytes")
      .map(([key, value]) => [key, normalizePayload(value)]),
  );
}

// ---------------------------------------------------------------------------
// Conversions
// ---------------------------------------------------------------------------

function hasToJSON(value: object): value is { toJSON: () => unknown } {
  return "toJSON" in value && typeof value.toJSON === "function";
}

/**
 * Lift an arbitrary JS value into a payload tree.
 *
 * Functions, symbols and `undefined` members are omitted, as are
 * references back to an object that is already being lifted.
 */
export function liftPayload(value: unknown): PayloadNode {
  return lift(value, new WeakSet<object>()) ?? scalarNode(null);
}

function lift(value: unknown, seen: WeakSet<object>): PayloadNode | undefined {
  if (value === null) return scalarNode(null);
  if (typeof value === "string" || typeof value === "boolean") {
    return scalarNode(value);
  }
  if (typeof value === "number") {
    return scalarNode(Number.isFinite(value) ? value : null);
  }
  if (typeof value === "bigint") return scalarNode(value.toString());
  if (typeof value !== "object") return undefined;

  const obj = value;
  if (obj instanceof Uint8Array) return bytesNode(obj);
  if (obj instanceof ArrayBuffer) return bytesNode(new Uint8Array(obj));
  if (obj instanceof Date) {
    return scalarNode(Number.isNaN(obj.getTime()) ? null : obj.toISOString());
  }
  if (seen.has(obj)) return undefined;

  seen.add(obj);
  try {
    if (Array.isArray(obj)) {
      const items: PayloadNode[] = [];
      for (const item of obj) {
        items.push(lift(item, seen) ?? scalarNode(null));
      }
      return sequenceNode(items);
    }
    if (hasToJSON(obj)) {
      return lift(obj.toJSON(), seen);
    }
    const entries: [string, PayloadNode][] = [];
    for (const [key, member] of Object.entries(obj)) {
      const node = lift(member, seen);
      if (node !== undefined) entries.push([key, node]);
    }
    return mapNode(entries);
  } finally {
    seen.delete(obj);
  }
}

/** Render a payload tree as JSON. Bytes are rendered as base64 strings. */
export function payloadToJson(node: PayloadNode): JsonValue {
  switch (node.kind) {
    case "scalar":
      return node.value;
    case "bytes":
      return Buffer.from(node.value).toString("base64");
    case "sequence":
      return node.items.map((item) => payloadToJson(item));
    case "map":
      return mapToJson(node);
  }
}

export function mapToJson(node: MapNode): JsonObject {
  // fromEntries defines own properties, so a "__proto__" key stays a field
  return Object.fromEntries(node.entries.map(([key, value]) => [key, payloadToJson(value)]));
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
