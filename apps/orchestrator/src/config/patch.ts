// Per-call config overrides.
//
// Contract:
// - caller options are translated into replace-only patch ops
// - every path must be in manifest.editable; unknown keys are rejected
// - caller overrides are always built against the live SSOT hash; a rejection is 400
// - the patched config is re-validated against the SSOT schema

import { MitigationConfigV1Z, type MitigationConfigV1 } from "@qem/contracts";
import { MitigationError, contentHash } from "@qem/mitigation-kernel";

import { isObj } from "../util";
import type { MitigationConfigEditableItem, MitigationConfigManifestV1 } from "./ssot";

export type ConfigPatchOpV1 = {
  op: "replace";
  path: string;
  value: unknown;
};

export type ConfigPatchV1 = {
  patch_version: "1.0.0";
  base: { ssot_hash: string };
  ops: ConfigPatchOpV1[];
};

export type PatchValidationError = {
  code:
    | "INVALID_PATCH_SCHEMA"
    | "UNKNOWN_KEYS"
    | "SSOT_HASH_MISMATCH"
    | "PATH_NOT_ALLOWED"
    | "VALUE_TYPE_MISMATCH"
    | "VALUE_OUT_OF_RANGE"
    | "VALUE_NOT_IN_ENUM";
  path: string;
  message: string;
  meta?: Record<string, unknown>;
};

export class ConfigOverrideRejected extends MitigationError {
  public readonly status = 400;
  public readonly errors: PatchValidationError[];

  constructor(errors: PatchValidationError[]) {
    super("CONFIG_OVERRIDE_REJECTED", errors.map((e) => `${e.code}:${e.path}`).join(","));
    this.name = "ConfigOverrideRejected";
    this.errors = errors;
  }
}

// Caller-facing option names and the SSOT paths they replace.
export const CALLER_OPTION_PATHS = {
  minActionableThreshold: "thresholds.min_actionable",
  ddThreshold: "thresholds.dd",
  trexThreshold: "thresholds.trex",
  zneThreshold: "thresholds.zne",
  driftThreshold: "thresholds.drift",
  sessionRefreshCadence: "session.refresh_cadence_ms",
  shots: "execution.default_shots",
} as const;

export type CallerConfig = Partial<Record<keyof typeof CALLER_OPTION_PATHS, number>>;

function isCallerOption(k: string): k is keyof typeof CALLER_OPTION_PATHS {
  return Object.prototype.hasOwnProperty.call(CALLER_OPTION_PATHS, k);
}

export function callerConfigToPatch(overrides: unknown, ssotHash: string): ConfigPatchV1 {
  if (overrides === undefined || overrides === null) {
    return { patch_version: "1.0.0", base: { ssot_hash: ssotHash }, ops: [] };
  }
  if (!isObj(overrides)) {
    throw new ConfigOverrideRejected([{ code: "INVALID_PATCH_SCHEMA", path: "config", message: "config must be object" }]);
  }
  const unknown = Object.keys(overrides).filter((k) => !isCallerOption(k));
  if (unknown.length) {
    throw new ConfigOverrideRejected([{ code: "UNKNOWN_KEYS", path: "config", message: `unknown keys: ${unknown.join(",")}` }]);
  }

  const ops: ConfigPatchOpV1[] = [];
  for (const [k, value] of Object.entries(overrides)) {
    if (value === undefined || !isCallerOption(k)) continue;
    ops.push({ op: "replace", path: CALLER_OPTION_PATHS[k], value });
  }
  return { patch_version: "1.0.0", base: { ssot_hash: ssotHash }, ops };
}

function checkValue(rule: MitigationConfigEditableItem, v: unknown, at: string): PatchValidationError[] {
  if (rule.type === "enum") {
    if (typeof v !== "string") return [{ code: "VALUE_TYPE_MISMATCH", path: at, message: "value must be string" }];
    const allowed = rule.enum ?? [];
    if (!allowed.includes(v)) return [{ code: "VALUE_NOT_IN_ENUM", path: at, message: `value not in enum: ${v}`, meta: { enum: allowed } }];
    return [];
  }

  const isInt = rule.type === "int";
  if (typeof v !== "number" || !Number.isFinite(v) || (isInt && !Number.isInteger(v))) {
    return [{ code: "VALUE_TYPE_MISMATCH", path: at, message: `value must be ${isInt ? "int" : "number"}` }];
  }
  if (typeof rule.min === "number" && v < rule.min) {
    return [{ code: "VALUE_OUT_OF_RANGE", path: at, message: "value below min", meta: { min: rule.min, max: rule.max } }];
  }
  if (typeof rule.max === "number" && v > rule.max) {
    return [{ code: "VALUE_OUT_OF_RANGE", path: at, message: "value above max", meta: { min: rule.min, max: rule.max } }];
  }
  return [];
}

export function validatePatchStrict(patch: ConfigPatchV1, manifest: MitigationConfigManifestV1): PatchValidationError[] {
  const errors: PatchValidationError[] = [];

  if (patch.patch_version !== manifest.patch.patch_version) {
    errors.push({ code: "INVALID_PATCH_SCHEMA", path: "patch.patch_version", message: "patch_version must be 1.0.0" });
  }
  if (patch.base.ssot_hash !== manifest.ssot.ssot_hash) {
    errors.push({
      code: "SSOT_HASH_MISMATCH",
      path: "patch.base.ssot_hash",
      message: "patch was built against a different SSOT",
      meta: { expected: manifest.ssot.ssot_hash },
    });
  }

  const allowed = new Map<string, MitigationConfigEditableItem>();
  for (const it of manifest.editable) allowed.set(it.path, it);

  patch.ops.forEach((op, i) => {
    const basePath = `patch.ops[${i}]`;
    if (op.op !== "replace") {
      errors.push({ code: "INVALID_PATCH_SCHEMA", path: `${basePath}.op`, message: "op must be replace" });
      return;
    }
    const rule = allowed.get(op.path);
    if (!rule) {
      errors.push({ code: "PATH_NOT_ALLOWED", path: `${basePath}.path`, message: `path not allowed: ${op.path}` });
      return;
    }
    errors.push(...checkValue(rule, op.value, `${basePath}.value`));
  });

  return errors;
}

function setPath(obj: Record<string, unknown>, dotPath: string, value: unknown): void {
  const parts = dotPath.split(".");
  let cur = obj;
  for (let i = 0; i < parts.length - 1; i++) {
    const next = cur[parts[i]];
    if (!isObj(next)) {
      const fresh: Record<string, unknown> = {};
      cur[parts[i]] = fresh;
      cur = fresh;
    } else {
      cur = next;
    }
  }
  cur[parts[parts.length - 1]] = value;
}

/** Pure replace-only application; callers validate first. */
export function applyPatch(cfg: MitigationConfigV1, patch: ConfigPatchV1): MitigationConfigV1 {
  const out: Record<string, unknown> = structuredClone(cfg);
  for (const op of patch.ops) setPath(out, op.path, op.value);

  const parsed = MitigationConfigV1Z.safeParse(out);
  if (!parsed.success) {
    throw new ConfigOverrideRejected(
      parsed.error.issues.map((i) => ({ code: "VALUE_TYPE_MISMATCH", path: i.path.join("."), message: i.message }))
    );
  }
  return parsed.data;
}

export function computeEffectiveConfigHash(cfg: MitigationConfigV1): string {
  return contentHash(cfg);
}

export type EffectiveConfig = {
  config: MitigationConfigV1;
  hash: string;
};

/** SSOT + validated caller overrides. Throws ConfigOverrideRejected. */
export function resolveEffectiveConfig(
  base: MitigationConfigV1,
  manifest: MitigationConfigManifestV1,
  overrides: unknown
): EffectiveConfig {
  const patch = callerConfigToPatch(overrides, manifest.ssot.ssot_hash);
  const errors = validatePatchStrict(patch, manifest);
  if (errors.length) throw new ConfigOverrideRejected(errors);
  const config = applyPatch(base, patch);
  return { config, hash: computeEffectiveConfigHash(config) };
}
