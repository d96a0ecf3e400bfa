import { FACTORS } from "../trafficability/ruleset.config.js";
import { formatMeasure } from "../trafficability/ruleset.js";
import type { EvaluationResponse } from "../trafficability/types.js";

export function renderTextReport(evaluation: EvaluationResponse): string {
  const { result } = evaluation;
  const lines: string[] = [];

  lines.push(`Overall compaction & trafficability risk: ${result.risk_level}`);
  lines.push(result.advisory);
  lines.push("");

  lines.push("Contributing indicators:");
  for (const f of result.factors) {
    lines.push(`- ${FACTORS[f.factor].label}: ${f.level} (${formatMeasure(f.factor, f.value)}), ${f.note}`);
  }
  lines.push("");

  lines.push("Triggered rules:");
  if (result.rationale.length === 0) {
    lines.push("- none: no risk factors detected");
  } else {
    for (const r of result.rationale) lines.push(`- ${r}`);
  }
  lines.push("");

  lines.push("Recommended actions:");
  for (const r of result.recommendations) lines.push(`- ${r}`);
  lines.push("");

  lines.push(`assessment ${evaluation.assessmentId}, ruleset ${result.ruleset_version}`);

  return lines.join("\n") + "\n";
}
