import fs from "node:fs";
import { z } from "zod";
import { RulesetError } from "./errors.js";
import { DEFAULT_RULESET, FACTORS } from "./ruleset.config.js";
import {
  RISK_LEVELS,
  type Comparator,
  type MeasurementField,
  type RiskLevel,
  type Ruleset,
} from "./types.js";

export const RULESET_PATH_ENV = "TRAFFICABILITY_RULESET_PATH";

const COMPARATOR_PHRASE: Record<Comparator, string> = {
  gt: "above",
  gte: "at or above",
  lt: "below",
  lte: "at or below",
};

export function riskRank(level: RiskLevel): number {
  return RISK_LEVELS.indexOf(level);
}

export function crosses(value: number, comparator: Comparator, threshold: number): boolean {
  switch (comparator) {
    case "gt":
      return value > threshold;
    case "gte":
      return value >= threshold;
    case "lt":
      return value < threshold;
    case "lte":
      return value <= threshold;
  }
}

export function comparatorPhrase(comparator: Comparator): string {
  return COMPARATOR_PHRASE[comparator];
}

function decimalsOf(n: number): number {
  return (String(n).split(".")[1] ?? "").length;
}

export function formatMeasure(field: MeasurementField, value: number): string {
  return `${value.toFixed(FACTORS[field].decimals)} ${FACTORS[field].unit}`;
}

// Thresholds keep their own precision so a configured 1.425 never prints as 1.43.
export function formatThreshold(field: MeasurementField, threshold: number): string {
  const decimals = Math.max(FACTORS[field].decimals, decimalsOf(threshold));
  return `${threshold.toFixed(decimals)} ${FACTORS[field].unit}`;
}

const MAX_DECIMALS = 12;

// The printed value must still cross the threshold it is compared with: 1.434 prints as 1.434, not 1.43.
export function formatCrossing(
  field: MeasurementField,
  value: number,
  comparator: Comparator,
  threshold: number
): string {
  let decimals = Math.max(FACTORS[field].decimals, decimalsOf(threshold));
  while (decimals < MAX_DECIMALS && !crosses(Number(value.toFixed(decimals)), comparator, threshold)) {
    decimals++;
  }
  return `${value.toFixed(decimals)} ${FACTORS[field].unit}`;
}

export function describeRule(ruleset: Ruleset, field: MeasurementField): string {
  const rule = ruleset.rules[field];
  const parts = rule.tiers.map(
    (t) => `${t.level} ${comparatorPhrase(rule.comparator)} ${formatThreshold(field, t.threshold)}`
  );
  return `${parts.join("; ")}.`;
}

export function describeRuleset(ruleset: Ruleset): Record<MeasurementField, string> {
  return {
    bulk_density: describeRule(ruleset, "bulk_density"),
    cone_index: describeRule(ruleset, "cone_index"),
    soil_moisture_deficit: describeRule(ruleset, "soil_moisture_deficit"),
    tire_pressure: describeRule(ruleset, "tire_pressure"),
    wheel_load: describeRule(ruleset, "wheel_load"),
    rut_depth: describeRule(ruleset, "rut_depth"),
  };
}

const TierZ = z
  .object({
    level: z.enum(["Moderate", "High", "Severe"]),
    threshold: z.number().finite(),
    finding: z.string().min(1),
  })
  .strict();

const FactorRuleZ = z
  .object({
    comparator: z.enum(["gt", "gte", "lt", "lte"]),
    tiers: z.array(TierZ).min(1),
  })
  .strict()
  .superRefine((rule, ctx) => {
    const descending = rule.comparator === "gt" || rule.comparator === "gte";

    for (let i = 1; i < rule.tiers.length; i++) {
      const prev = rule.tiers[i - 1];
      const cur = rule.tiers[i];

      if (riskRank(cur.level) >= riskRank(prev.level)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["tiers", i, "level"],
          message: `tier levels must be listed most severe first (${prev.level} then ${cur.level})`,
        });
      }

      const ordered = descending ? cur.threshold < prev.threshold : cur.threshold > prev.threshold;
      if (!ordered) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["tiers", i, "threshold"],
          message: descending
            ? `threshold must be below ${prev.threshold} for comparator ${rule.comparator}`
            : `threshold must be above ${prev.threshold} for comparator ${rule.comparator}`,
        });
      }
    }
  });

// Cone index is bearing capacity: only falling readings may raise the level.
const ConeIndexRuleZ = FactorRuleZ.superRefine((rule, ctx) => {
  if (rule.comparator !== "lt" && rule.comparator !== "lte") {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["comparator"],
      message: `cone index rules must use lt or lte, got ${rule.comparator}`,
    });
  }
});

export const RulesetZ = z
  .object({
    version: z.string().regex(/^\d+\.\d+\.\d+$/),
    rules: z
      .object({
        bulk_density: FactorRuleZ,
        cone_index: ConeIndexRuleZ,
        soil_moisture_deficit: FactorRuleZ,
        tire_pressure: FactorRuleZ,
        wheel_load: FactorRuleZ,
        rut_depth: FactorRuleZ,
      })
      .strict(),
  })
  .strict();

export function parseRuleset(raw: unknown, path?: string): Ruleset {
  const parsed = RulesetZ.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join(".") : "ruleset";
    throw new RulesetError(`${where}: ${issue.message}`, path);
  }
  return parsed.data;
}

export function loadRulesetFile(path: string): Ruleset {
  let text: string;
  try {
    text = fs.readFileSync(path, "utf8");
  } catch (err) {
    throw new RulesetError(`cannot read ruleset file (${err instanceof Error ? err.message : String(err)})`, path);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new RulesetError("ruleset file is not valid JSON", path);
  }

  return parseRuleset(raw, path);
}

export function resolveRuleset(env: NodeJS.ProcessEnv = process.env): Ruleset {
  const path = env[RULESET_PATH_ENV]?.trim();
  if (!path) return DEFAULT_RULESET;
  return loadRulesetFile(path);
}
