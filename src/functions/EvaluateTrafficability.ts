import { app, type HttpRequest, type HttpResponseInit, type InvocationContext } from "@azure/functions";
import { ValidationError } from "../trafficability/errors.js";
import { evaluateTrafficability } from "../trafficability/evaluator.js";
import { resolveRuleset } from "../trafficability/ruleset.js";
import { internalError, validationFailed } from "./shared/responses.js";

/**
 * POST takes the measurement as a JSON body; GET (or a POST with an empty
 * body) reads the same snake_case names from the query string.
 */
async function readMeasurement(req: HttpRequest): Promise<unknown> {
  if (req.method === "POST") {
    const text = await req.text();
    if (text.trim()) {
      try {
        return JSON.parse(text);
      } catch {
        throw new ValidationError([{ field: "body", message: "must be valid JSON" }]);
      }
    }
  }
  return Object.fromEntries(req.query.entries());
}

export async function EvaluateTrafficabilityHttp(
  req: HttpRequest,
  context: InvocationContext
): Promise<HttpResponseInit> {
  try {
    const ruleset = resolveRuleset(process.env);
    const raw = await readMeasurement(req);
    const evaluation = evaluateTrafficability(raw, ruleset);

    context.log(
      `[trafficability] assessment=${evaluation.assessmentId} risk=${evaluation.result.risk_level} ruleset=${ruleset.version}`
    );

    return { status: 200, jsonBody: evaluation };
  } catch (err) {
    if (err instanceof ValidationError) return validationFailed(err, context);
    return internalError(err, context);
  }
}

app.http("EvaluateTrafficability", {
  methods: ["GET", "POST"],
  authLevel: "anonymous",
  route: "trafficability",
  handler: EvaluateTrafficabilityHttp,
});
