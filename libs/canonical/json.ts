import crypto from "crypto";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type HashAlgorithm = "sha256" | "sha384" | "sha512";

function stableSort(value: unknown): unknown {
  if (value === null || value === undefined) return value;

  if (Array.isArray(value)) return value.map(stableSort);

  if (typeof value === "object") {
    const entries: [string, unknown][] = Object.entries(value);
    const out: Record<string, unknown> = {};
    for (const [k, v] of entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      // Absent and undefined are the same thing on the wire.
      if (v === undefined) continue;
      out[k] = stableSort(v);
    }
    return out;
  }

  return value;
}

/**
 * JSON with recursively sorted object keys. Identical values always yield
 * identical strings regardless of property insertion order.
 */
export function canonicalize(value: unknown): string {
  return JSON.stringify(stableSort(value));
}

export function digestHex(input: string, algorithm: HashAlgorithm = "sha256"): string {
  return crypto.createHash(algorithm).update(input, "utf8").digest("hex");
}

export function sha256Hex(input: string): string {
  return digestHex(input, "sha256");
}

/**
 * Recursively freezes plain objects and arrays.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
