import { createHash } from "node:crypto";

type JsonPrimitive = string | number | boolean | null;
type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

const isPlainObject = (value: unknown): value is Record<string, unknown> => {
  if (!value || typeof value !== "object") return false;
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
};

// NaN and the infinities keep distinct tokens; JSON.stringify would fold all three into null.
const encodeNumber = (value: number): JsonPrimitive => {
  if (Number.isFinite(value)) return value;
  if (Number.isNaN(value)) return "NaN";
  return value > 0 ? "Infinity" : "-Infinity";
};

const toStableValue = (value: unknown): JsonValue => {
  if (value === null || value === undefined) return null;
  if (typeof value === "number") return encodeNumber(value);
  if (typeof value === "string" || typeof value === "boolean") return value;
  if (Array.isArray(value)) return value.map(toStableValue);
  if (isPlainObject(value)) {
    const out: Record<string, JsonValue> = {};
    for (const key of Object.keys(value).sort()) {
      const entry = value[key];
      if (entry !== undefined) out[key] = toStableValue(entry);
    }
    return out;
  }
  return String(value);
};

export function stableJsonStringify(value: unknown): string {
  return JSON.stringify(toStableValue(value));
}

export function hashStableJson(value: unknown): string {
  const hex = createHash("sha256").update(stableJsonStringify(value), "utf8").digest("hex");
  return `sha256:${hex}`;
}
