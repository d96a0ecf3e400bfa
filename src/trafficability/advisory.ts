import type { RiskLevel } from "./types.js";

type Advice = {
  headline: string;
  recommendations: string[];
};

const HIGH_ACTIONS = [
  "Avoid field traffic until the soil dries (aim for SMD of +10 mm or more) or bulk density and cone index improve.",
  "Reduce tire pressure and/or axle and wheel loads; use wide tires or tracks.",
  "Use controlled traffic farming to confine compaction to fixed lanes.",
  "If persistent subsoil compaction is confirmed, consider deep ripping where agronomically appropriate.",
];

const ADVICE: Record<RiskLevel, Advice> = {
  Low: {
    headline: "Field conditions are acceptable for traffic; continue routine monitoring.",
    recommendations: [
      "Field conditions acceptable for operations; continue routine monitoring of bulk density and cone index.",
      "Practice good traffic management to avoid long-term compaction (controlled traffic, wide tires).",
    ],
  },
  Moderate: {
    headline: "Traffic is possible with precautions; lower pressures and loads and pick a drier window.",
    recommendations: [
      "Lower tire pressures and reduce loads where feasible.",
      "Schedule operations for drier windows; avoid repeated passes.",
      "Monitor bulk density and cone index after operations and adjust tactics accordingly.",
    ],
  },
  High: {
    headline: "Avoid field traffic until conditions improve; compaction damage is likely.",
    recommendations: HIGH_ACTIONS,
  },
  Severe: {
    headline: "Do not traffic the field; any pass will cause lasting structural damage.",
    recommendations: [
      "Stop all non-essential field traffic and postpone operations.",
      ...HIGH_ACTIONS,
    ],
  },
};

export function advisoryFor(level: RiskLevel): string {
  return ADVICE[level].headline;
}

export function recommendationsFor(level: RiskLevel): string[] {
  return [...ADVICE[level].recommendations];
}
