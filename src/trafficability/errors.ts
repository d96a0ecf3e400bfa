export type TrafficabilityErrorCode = "validation_error" | "ruleset_error";

export abstract class TrafficabilityError extends Error {
  abstract readonly code: TrafficabilityErrorCode;
}

export type ValidationIssue = {
  field: string;
  message: string;
};

/**
 * A measurement field is missing, non-numeric or outside its physical range.
 * `field` names the first offending field in evaluation order.
 */
export class ValidationError extends TrafficabilityError {
  readonly code = "validation_error";
  readonly field: string;
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const first = issues[0] ?? { field: "measurement", message: "invalid measurement" };
    super(`${first.field}: ${first.message}`);
    this.name = "ValidationError";
    this.field = first.field;
    this.issues = issues.length > 0 ? issues : [first];
  }
}

export class RulesetError extends TrafficabilityError {
  readonly code = "ruleset_error";
  readonly path?: string;

  constructor(message: string, path?: string) {
    super(path ? `${path}: ${message}` : message);
    this.name = "RulesetError";
    this.path = path;
  }
}
