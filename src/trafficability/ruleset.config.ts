import type { MeasurementField, Ruleset } from "./types.js";

export const RULESET_VERSION = "1.0.0";

// Presentation metadata per measurement. Not part of a loadable ruleset.
// `clear` is the note for a measurement that crossed no tier.
export const FACTORS: Record<MeasurementField, { label: string; unit: string; decimals: number; clear: string }> = {
  bulk_density: { label: "Bulk density", unit: "g/cm³", decimals: 2, clear: "within the normal range" },
  cone_index: { label: "Cone index", unit: "kPa", decimals: 0, clear: "adequate bearing capacity" },
  soil_moisture_deficit: { label: "Soil moisture deficit", unit: "mm", decimals: 1, clear: "dry enough for traffic" },
  tire_pressure: { label: "Tire pressure", unit: "kPa", decimals: 0, clear: "within low-risk bounds" },
  wheel_load: { label: "Wheel load", unit: "kg", decimals: 0, clear: "within low-risk bounds" },
  rut_depth: { label: "Rut depth", unit: "cm", decimals: 1, clear: "negligible" },
};

export const DEFAULT_RULESET: Ruleset = {
  version: RULESET_VERSION,
  rules: {
    // critical ~1.43 Mg m⁻³ for loamy soils; normal range 1.0–1.4
    bulk_density: {
      comparator: "gt",
      tiers: [
        { level: "Severe", threshold: 1.75, finding: "root-limiting compaction, soil structure already damaged" },
        { level: "High", threshold: 1.43, finding: "exceeds the critical density for loamy soils, high compaction risk" },
        { level: "Moderate", threshold: 1.3, finding: "elevated density, watch for root restriction" },
      ],
    },

    // read as bearing capacity: 0.8 MPa is the usual lower trafficability limit
    cone_index: {
      comparator: "lt",
      tiers: [
        { level: "Severe", threshold: 200, finding: "soil cannot carry traffic, deep rutting expected" },
        { level: "High", threshold: 400, finding: "weak bearing capacity, rutting and compaction likely under load" },
        { level: "Moderate", threshold: 800, finding: "below the common trafficability limit of 0.8 MPa" },
      ],
    },

    soil_moisture_deficit: {
      comparator: "lt",
      tiers: [
        { level: "High", threshold: 0, finding: "soil wetter than field capacity, high compaction risk" },
      ],
    },

    tire_pressure: {
      comparator: "gt",
      tiers: [
        { level: "High", threshold: 300, finding: "contact stress carries compaction into the subsoil" },
        { level: "Moderate", threshold: 200, finding: "inflation pressure raises topsoil contact stress" },
      ],
    },

    wheel_load: {
      comparator: "gte",
      tiers: [
        { level: "High", threshold: 5000, finding: "heavy wheel load increases subsoil compaction risk" },
      ],
    },

    rut_depth: {
      comparator: "gt",
      tiers: [
        { level: "Severe", threshold: 10, finding: "severe surface disturbance, active structural damage" },
        { level: "Moderate", threshold: 3, finding: "noticeable surface deformation" },
      ],
    },
  },
};
