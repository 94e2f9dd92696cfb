import { createHash } from "crypto";
import type { JsonObject, JsonValue } from "./json.js";

export function sha256Prefixed(data: string | Buffer): `sha256:${string}` {
  return `sha256:${createHash("sha256").update(data).digest("hex")}` as const;
}

/** Sorts object keys at every level; non-finite numbers become null and -0 becomes 0. */
export function canonicalizeJson(value: JsonValue): JsonValue {
  if (value === null || typeof value === "string" || typeof value === "boolean") return value;

  if (typeof value === "number") {
    if (!Number.isFinite(value)) return null;
    if (Object.is(value, -0)) return 0;
    return value;
  }

  if (Array.isArray(value)) return value.map(canonicalizeJson);

  const out: JsonObject = {};
  for (const key of Object.keys(value).sort()) {
    const v = value[key];
    if (v !== undefined) out[key] = canonicalizeJson(v);
  }
  return out;
}

export function hashParams(params: JsonObject): `sha256:${string}` {
  return sha256Prefixed(JSON.stringify(canonicalizeJson(params)));
}
