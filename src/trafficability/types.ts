export const RISK_LEVELS = ["Low", "Moderate", "High", "Severe"] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

// Levels a threshold tier may assign. "Low" is what an untriggered measurement gets.
export type TriggeredLevel = Exclude<RiskLevel, "Low">;

// Evaluation order. Rationale lines follow it.
export const MEASUREMENT_FIELDS = [
  "bulk_density",
  "cone_index",
  "soil_moisture_deficit",
  "tire_pressure",
  "wheel_load",
  "rut_depth",
] as const;
export type MeasurementField = (typeof MEASUREMENT_FIELDS)[number];

export type Measurement = {
  bulk_density: number; // g/cm³
  cone_index: number; // kPa
  soil_moisture_deficit: number; // mm, negative = wetter than field capacity
  tire_pressure: number; // kPa
  wheel_load: number; // kg
  rut_depth: number; // cm
};

export type Comparator = "gt" | "gte" | "lt" | "lte";

export type ThresholdTier = {
  level: TriggeredLevel;
  threshold: number;
  finding: string;
};

export type FactorRule = {
  comparator: Comparator;
  // most severe first
  tiers: ThresholdTier[];
};

export type Ruleset = {
  version: string;
  rules: Record<MeasurementField, FactorRule>;
};

export type FactorAssessment = {
  factor: MeasurementField;
  value: number;
  unit: string;
  level: RiskLevel;
  // finding of the crossed tier, or a short all-clear note
  note: string;
};

export type RiskResult = {
  risk_level: RiskLevel;
  rationale: string[];
  advisory: string;
  recommendations: string[];
  factors: FactorAssessment[];
  ruleset_version: string;
};

export type EvaluationResponse = {
  ok: true;
  requestId: string;
  timestamp: string;
  assessmentId: string;
  input: Measurement;
  result: RiskResult;
};

export type GlossaryTopic =
  | "trafficability"
  | "compaction"
  | "bulk_density"
  | "cone_index"
  | "soil_moisture_deficit"
  | "rut_depth"
  | "tire_pressure"
  | "wheel_load";

export type GlossaryAnswer = {
  topic: GlossaryTopic | null;
  answer: string;
};
