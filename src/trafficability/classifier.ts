import { advisoryFor, recommendationsFor } from "./advisory.js";
import { normalizeMeasurement } from "./measurement.js";
import { evaluatePolicy } from "./policy.js";
import { DEFAULT_RULESET } from "./ruleset.config.js";
import type { Measurement, RiskResult, Ruleset } from "./types.js";

/**
 * Classifies trafficability risk for one set of field measurements.
 *
 * Throws a ValidationError naming the first bad field before any rule runs.
 * Otherwise pure: the same measurement and ruleset always give the same result.
 * The level is the worst level over all measurements, and `rationale` holds
 * one line per triggered measurement in evaluation order, so it is empty
 * exactly when the level is "Low".
 */
export function classify(measurement: Measurement, ruleset: Ruleset = DEFAULT_RULESET): RiskResult {
  const policy = evaluatePolicy(normalizeMeasurement(measurement), ruleset);

  return {
    risk_level: policy.riskLevel,
    rationale: policy.triggered.map((t) => t.rationale),
    advisory: advisoryFor(policy.riskLevel),
    recommendations: recommendationsFor(policy.riskLevel),
    factors: policy.factors,
    ruleset_version: ruleset.version,
  };
}
