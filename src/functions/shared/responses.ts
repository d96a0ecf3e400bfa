import type { HttpResponseInit, InvocationContext } from "@azure/functions";
import { TrafficabilityError, ValidationError } from "../../trafficability/errors.js";

export function validationFailed(err: ValidationError, context: InvocationContext): HttpResponseInit {
  context.warn(`[trafficability] rejected field=${err.field} reason=${err.message}`);
  return {
    status: 400,
    jsonBody: { ok: false, error: err.code, field: err.field, message: err.message },
  };
}

export function internalError(err: unknown, context: InvocationContext): HttpResponseInit {
  context.error(`[trafficability] ${context.functionName} failed:`, err);
  return {
    status: 500,
    jsonBody: {
      ok: false,
      error: err instanceof TrafficabilityError ? err.code : "internal_error",
      detail: err instanceof Error ? err.message : String(err),
    },
  };
}
