import { InvalidParameterError } from "../errors";

// Out-of-domain parameters are rejected, never clamped.

export function assertPositiveInt(v: number, name: string): void {
  if (!Number.isInteger(v) || v < 1) throw new InvalidParameterError(`${name} must be a positive integer, got ${v}`);
}

export function assertFinite(v: number, name: string): void {
  if (!Number.isFinite(v)) throw new InvalidParameterError(`${name} must be finite, got ${v}`);
}
