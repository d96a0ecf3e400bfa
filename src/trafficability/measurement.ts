import { z } from "zod";
import { ValidationError, type ValidationIssue } from "./errors.js";
import { MEASUREMENT_FIELDS, type Measurement } from "./types.js";

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/**
 * Form fields, query strings and CLI options arrive as text.
 * Blank text counts as missing; anything else that is not a number is left
 * for the schema to reject.
 */
function toNumeric(v: unknown): unknown {
  if (typeof v !== "string") return v;
  const s = v.trim();
  if (s === "") return undefined;
  const n = Number(s);
  return Number.isNaN(n) ? v : n;
}

function numeric() {
  return z.number({ required_error: "is required", invalid_type_error: "must be a number" }).finite("must be a finite number");
}

export const MeasurementZ = z.object({
  bulk_density: z.preprocess(
    toNumeric,
    numeric().gt(0, "must be greater than 0").max(2.65, "must not exceed 2.65 g/cm³ (mineral particle density)")
  ),
  cone_index: z.preprocess(toNumeric, numeric().min(0, "must not be negative")),
  soil_moisture_deficit: z.preprocess(toNumeric, numeric()),
  tire_pressure: z.preprocess(toNumeric, numeric().gt(0, "must be greater than 0")),
  wheel_load: z.preprocess(toNumeric, numeric().gt(0, "must be greater than 0")),
  rut_depth: z.preprocess(toNumeric, numeric().min(0, "must not be negative")),
});

function fieldOrder(field: string): number {
  const i = MEASUREMENT_FIELDS.findIndex((f) => f === field);
  return i === -1 ? MEASUREMENT_FIELDS.length : i;
}

/**
 * Accepts `smd` as an alias for `soil_moisture_deficit`; the long name wins
 * when both are present. Unknown keys are dropped.
 */
export function normalizeMeasurement(raw: unknown): Measurement {
  if (!isPlainObject(raw)) {
    throw new ValidationError([{ field: "measurement", message: "must be an object with the six measurement fields" }]);
  }

  const obj: Record<string, unknown> = { ...raw };
  if (obj.soil_moisture_deficit === undefined && obj.smd !== undefined) {
    obj.soil_moisture_deficit = obj.smd;
  }

  const parsed = MeasurementZ.safeParse(obj);
  if (!parsed.success) {
    const issues: ValidationIssue[] = parsed.error.issues
      .map((issue) => ({ field: String(issue.path[0] ?? "measurement"), message: issue.message }))
      .sort((a, b) => fieldOrder(a.field) - fieldOrder(b.field));
    throw new ValidationError(issues);
  }

  return parsed.data;
}
