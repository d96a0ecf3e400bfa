import crypto from "node:crypto";
import { classify } from "./classifier.js";
import { normalizeMeasurement } from "./measurement.js";
import { DEFAULT_RULESET } from "./ruleset.config.js";
import type { EvaluationResponse, Measurement, Ruleset } from "./types.js";

function isoNow(): string {
  return new Date().toISOString();
}

function makeRequestId(): string {
  return `traf_${Date.now()}_${Math.random().toString(16).slice(2)}`;
}

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map(stableStringify).join(",")}]`;
  if (isPlainObject(value)) {
    const keys = Object.keys(value).sort();
    return `{${keys.map((k) => `"${k}":${stableStringify(value[k])}`).join(",")}}`;
  }
  return JSON.stringify(value);
}

// Same measurement under the same ruleset version -> same id.
export function computeAssessmentId(rulesetVersion: string, input: Measurement): string {
  const payload = `${rulesetVersion}|${stableStringify(input)}`;
  return crypto.createHash("sha256").update(payload).digest("hex").slice(0, 16);
}

export function evaluateTrafficability(rawInput: unknown, ruleset: Ruleset = DEFAULT_RULESET): EvaluationResponse {
  const input = normalizeMeasurement(rawInput);
  const result = classify(input, ruleset);

  return {
    ok: true,
    requestId: makeRequestId(),
    timestamp: isoNow(),
    assessmentId: computeAssessmentId(ruleset.version, input),
    input,
    result,
  };
}
