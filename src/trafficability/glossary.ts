import { DEFAULT_RULESET } from "./ruleset.config.js";
import { describeRule } from "./ruleset.js";
import { MEASUREMENT_FIELDS, type GlossaryAnswer, type GlossaryTopic, type Ruleset } from "./types.js";

type Entry = {
  topic: GlossaryTopic;
  pattern: RegExp;
  definition: string;
};

// Checked in order; the first match answers.
const ENTRIES: Entry[] = [
  {
    topic: "trafficability",
    pattern: /\btrafficab(ility|le)\b/,
    definition:
      "Trafficability is the capacity of land to support vehicle operations without significant soil degradation such as compaction or rutting. It depends on moisture, texture and load.",
  },
  {
    topic: "compaction",
    pattern: /\bcompact(ion|ed)?\b/,
    definition:
      "Soil compaction is the increase in bulk density and soil strength caused by applied stresses. It reduces porosity, aeration and infiltration, and is measured with bulk density and cone index.",
  },
  {
    topic: "bulk_density",
    pattern: /\bbulk density\b|\bbd\b/,
    definition:
      "Bulk density is the mass of dry soil per unit volume. The normal range is about 1.0–1.4 g/cm³; around 1.43 g/cm³ is critical for loamy soils.",
  },
  {
    topic: "cone_index",
    pattern: /\bcone index\b|\bci\b|\bpenetrometer\b/,
    definition:
      "Cone index is the resistance of the soil to a penetrometer cone and indicates strength and bearing capacity. Low values mean the soil cannot carry loads; about 0.8 MPa (800 kPa) is a common trafficability limit.",
  },
  {
    topic: "soil_moisture_deficit",
    pattern: /\bsoil moisture deficit\b|\bsmd\b|\bmoisture\b/,
    definition:
      "Soil moisture deficit (SMD) is the cumulative water deficit below field capacity. Positive values such as +10 mm mean drier soil that favours traffic; negative values mean soil wetter than field capacity.",
  },
  {
    topic: "rut_depth",
    pattern: /\brut depth\b|\bruts?\b|\brutting\b/,
    definition:
      "Rut depth is the depth of the depressions left by passing wheels, an observable symptom of compaction and structural damage.",
  },
  {
    topic: "tire_pressure",
    pattern: /\b(tire|tyre) pressure\b|\binflation\b/,
    definition:
      "Tire inflation pressure sets the contact stress at the soil surface; lower pressures spread the load and reduce topsoil compaction.",
  },
  {
    topic: "wheel_load",
    pattern: /\b(wheel|axle) loads?\b/,
    definition:
      "Wheel load is the weight carried by a single wheel; heavier loads carry stress deeper and drive subsoil compaction.",
  },
];

export const FALLBACK_ANSWER =
  "I give definitions, thresholds and deterministic assessments. Ask about trafficability, compaction, bulk density, cone index, soil moisture deficit, rut depth, tire pressure or wheel load, or run an assessment.";

export function explain(question: string, ruleset: Ruleset = DEFAULT_RULESET): GlossaryAnswer {
  const q = question.toLowerCase().replace(/\s+/g, " ").trim();
  const entry = ENTRIES.find((e) => e.pattern.test(q));
  if (!entry) return { topic: null, answer: FALLBACK_ANSWER };

  const field = MEASUREMENT_FIELDS.find((f) => f === entry.topic);
  if (!field) return { topic: entry.topic, answer: entry.definition };

  return {
    topic: entry.topic,
    answer: `${entry.definition} Thresholds in use (ruleset ${ruleset.version}): ${describeRule(ruleset, field)}`,
  };
}
