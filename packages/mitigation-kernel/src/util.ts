import { createHash } from "node:crypto";

export function stableStringify(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

export function sha256Hex(s: string): string {
  return createHash("sha256").update(s).digest("hex");
}

export function contentHash(value: unknown): string {
  return `sha256:${sha256Hex(stableStringify(value))}`;
}

function canonicalize(x: unknown): unknown {
  if (x === null || x === undefined) return x;
  if (Array.isArray(x)) return x.map(canonicalize);
  if (typeof x === "object") {
    const out: Record<string, unknown> = {};
    const entries = Object.entries(x).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [k, v] of entries) {
      if (v !== undefined) out[k] = canonicalize(v);
    }
    return out;
  }
  return x;
}

/**
 * Freezes a record and everything reachable from it.
 * Kernel outputs are shared between pipeline stages and must not be mutated.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const v of Object.values(value)) deepFreeze(v);
  }
  return value;
}

export function isPlainObject(x: unknown): x is Record<string, unknown> {
  return !!x && typeof x === "object" && !Array.isArray(x);
}

export function maxOf(values: Iterable<number>): number {
  let m = 0;
  for (const v of values) if (v > m) m = v;
  return m;
}

export function sortedNumeric(values: Iterable<number>): number[] {
  return Array.from(new Set(values)).sort((a, b) => a - b);
}
