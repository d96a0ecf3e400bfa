import { FACTORS } from "./ruleset.config.js";
import { comparatorPhrase, crosses, formatCrossing, formatThreshold, riskRank } from "./ruleset.js";
import {
  MEASUREMENT_FIELDS,
  type FactorAssessment,
  type Measurement,
  type MeasurementField,
  type RiskLevel,
  type Ruleset,
  type ThresholdTier,
} from "./types.js";

type TriggeredRule = {
  factor: MeasurementField;
  tier: ThresholdTier;
  rationale: string;
};

export type PolicyEvaluation = {
  riskLevel: RiskLevel;
  factors: FactorAssessment[];
  triggered: TriggeredRule[];
};

function firstCrossedTier(value: number, field: MeasurementField, ruleset: Ruleset): ThresholdTier | undefined {
  const rule = ruleset.rules[field];
  return rule.tiers.find((t) => crosses(value, rule.comparator, t.threshold));
}

function rationaleFor(field: MeasurementField, value: number, tier: ThresholdTier, ruleset: Ruleset): string {
  const { comparator } = ruleset.rules[field];
  const measured = formatCrossing(field, value, comparator, tier.threshold);
  return `${FACTORS[field].label} ${measured} ${comparatorPhrase(comparator)} ${formatThreshold(field, tier.threshold)}: ${tier.finding}`;
}

/**
 * Runs every measurement against its rule in evaluation order.
 * The overall level is the worst level any measurement reached.
 */
export function evaluatePolicy(m: Measurement, ruleset: Ruleset): PolicyEvaluation {
  const factors: FactorAssessment[] = [];
  const triggered: TriggeredRule[] = [];
  let riskLevel: RiskLevel = "Low";

  for (const field of MEASUREMENT_FIELDS) {
    const value = m[field];
    const tier = firstCrossedTier(value, field, ruleset);

    factors.push({
      factor: field,
      value,
      unit: FACTORS[field].unit,
      level: tier?.level ?? "Low",
      note: tier?.finding ?? FACTORS[field].clear,
    });

    if (!tier) continue;

    triggered.push({ factor: field, tier, rationale: rationaleFor(field, value, tier, ruleset) });
    if (riskRank(tier.level) > riskRank(riskLevel)) riskLevel = tier.level;
  }

  return { riskLevel, factors, triggered };
}
