// Mitigation config SSOT / manifest helpers.
//
// Contract:
// - SSOT file: config/mitigation/default.json
// - ssot_hash: sha256(stableStringify(parsedJson)) with "sha256:" prefix
// - the manifest is the only source of editable paths for per-call overrides

import fs from "node:fs";
import path from "node:path";

import { parseMitigationConfigV1, type MitigationConfigV1 } from "@qem/contracts";
import { contentHash } from "@qem/mitigation-kernel";

import { findRepoRoot, nowMs } from "../util";

export const SSOT_RELATIVE_PATH = "config/mitigation/default.json";

export type ManifestValueType = "int" | "number" | "enum";

export type MitigationConfigEditableItem = {
  // Full dot path (e.g. "thresholds.trex")
  path: string;
  type: ManifestValueType;
  // only for int/number
  min?: number;
  max?: number;
  // only for enum
  enum?: string[];
  description?: string;
};

export type MitigationConfigManifestV1 = {
  ssot: {
    source: typeof SSOT_RELATIVE_PATH;
    schema_version: string;
    ssot_hash: string;
    updated_at_ts: number;
  };
  patch: {
    patch_version: "1.0.0";
    op_allowed: ["replace"];
    unknown_keys_policy: "reject";
  };
  editable: MitigationConfigEditableItem[];
  defaults: Record<string, unknown>;
};

function resolveRepoRoot(): string {
  if (process.env.QEM_REPO_ROOT) return path.resolve(process.env.QEM_REPO_ROOT);
  return findRepoRoot(process.cwd(), SSOT_RELATIVE_PATH);
}

export function loadDefaultConfig(repoRoot = resolveRepoRoot()): MitigationConfigV1 {
  const p = path.join(repoRoot, SSOT_RELATIVE_PATH);
  return parseMitigationConfigV1(JSON.parse(fs.readFileSync(p, "utf8")));
}

export function computeSsotHash(cfg: MitigationConfigV1): string {
  return contentHash(cfg);
}

export function getPath(obj: unknown, dotPath: string): unknown {
  let cur: unknown = obj;
  for (const p of dotPath.split(".")) {
    if (!cur || typeof cur !== "object" || Array.isArray(cur)) return undefined;
    cur = Object.entries(cur).find(([k]) => k === p)?.[1];
  }
  return cur;
}

const EDITABLE: ReadonlyArray<MitigationConfigEditableItem> = [
  { path: "thresholds.min_actionable", type: "number", min: 0, max: 100, description: "Scores at or below this select no mitigation" },
  { path: "thresholds.dd", type: "number", min: 0, max: 1, description: "Idle fraction above which DD is applied" },
  { path: "thresholds.trex", type: "number", min: 0, max: 1, description: "Readout error above which TREX is applied" },
  { path: "thresholds.zne", type: "number", min: 0, max: 100, description: "Overall score above which ZNE is applied" },
  { path: "thresholds.drift", type: "number", min: 0, max: 1, description: "Session drift tolerated before re-selection" },
  { path: "session.refresh_cadence_ms", type: "int", min: 0, max: 86400000, description: "Minimum age of a session snapshot before refresh" },
  { path: "execution.default_shots", type: "int", min: 1, max: 10000000, description: "Shots per estimator job" },
  { path: "execution.calibration_timeout_ms", type: "int", min: 100, max: 600000, description: "Calibration fetch deadline" },
  { path: "analyzer.weights.idle", type: "number", min: 0, max: 100 },
  { path: "analyzer.weights.readout", type: "number", min: 0, max: 100 },
  { path: "analyzer.weights.gate", type: "number", min: 0, max: 100 },
  { path: "analyzer.weights.decoherence", type: "number", min: 0, max: 100 },
  { path: "analyzer.region_depth_window", type: "int", min: 1, max: 100000, description: "Depth layers per region window" },
  { path: "dd.sequence_type", type: "enum", enum: ["XX", "XpXm", "XY4"] },
  {
    path: "zne.extrapolator",
    type: "enum",
    enum: ["linear", "exponential", "double_exponential", "polynomial_degree_2", "polynomial_degree_3", "fallback"],
  },
];

export function getManifest(cfg: MitigationConfigV1): MitigationConfigManifestV1 {
  const defaults: Record<string, unknown> = {};
  for (const it of EDITABLE) defaults[it.path] = getPath(cfg, it.path);

  return {
    ssot: {
      source: SSOT_RELATIVE_PATH,
      schema_version: cfg.schema_version,
      ssot_hash: computeSsotHash(cfg),
      updated_at_ts: nowMs(),
    },
    patch: {
      patch_version: "1.0.0",
      op_allowed: ["replace"],
      unknown_keys_policy: "reject",
    },
    editable: EDITABLE.map((it) => ({ ...it })),
    defaults,
  };
}
