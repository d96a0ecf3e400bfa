import { describe, expect, it } from "vitest";
import { fileURLToPath } from "node:url";
import { FALLBACK_ANSWER, explain } from "../glossary.js";
import { loadRulesetFile } from "../ruleset.js";

describe("explain", () => {
  it("defines trafficability", () => {
    expect(explain("When is trafficability good?")).toEqual({
      topic: "trafficability",
      answer:
        "Trafficability is the capacity of land to support vehicle operations without significant soil degradation such as compaction or rutting. It depends on moisture, texture and load.",
    });
  });

  it("answers threshold questions with the thresholds in use", () => {
    expect(explain("What BD is critical?")).toEqual({
      topic: "bulk_density",
      answer:
        "Bulk density is the mass of dry soil per unit volume. The normal range is about 1.0–1.4 g/cm³; around 1.43 g/cm³ is critical for loamy soils. " +
        "Thresholds in use (ruleset 1.0.0): Severe above 1.75 g/cm³; High above 1.43 g/cm³; Moderate above 1.30 g/cm³.",
    });
  });

  it("follows a loaded ruleset", () => {
    const strict = loadRulesetFile(fileURLToPath(new URL("./fixtures/strict-ruleset.json", import.meta.url)));
    const { topic, answer } = explain("what does SMD mean", strict);

    expect(topic).toBe("soil_moisture_deficit");
    expect(answer.endsWith("Thresholds in use (ruleset 2.0.0): Severe below -20.0 mm; High below 5.0 mm.")).toBe(true);
  });

  it("checks topics in a fixed order", () => {
    expect(explain("does compaction raise bulk density?").topic).toBe("compaction");
    expect(explain("how deep are the ruts").topic).toBe("rut_depth");
    expect(explain("what CI stops traffic").topic).toBe("cone_index");
    expect(explain("is 3 t an acceptable wheel load").topic).toBe("wheel_load");
    expect(explain("best TYRE PRESSURE for spring work").topic).toBe("tire_pressure");
  });

  it("matches abbreviations only as whole words", () => {
    expect(explain("how do I abduct a tractor")).toEqual({ topic: null, answer: FALLBACK_ANSWER });
  });
});
