import { app, type HttpRequest, type HttpResponseInit, type InvocationContext } from "@azure/functions";
import { describeRuleset, resolveRuleset } from "../trafficability/ruleset.js";
import { internalError } from "./shared/responses.js";

export async function TrafficabilityThresholds(
  _req: HttpRequest,
  context: InvocationContext
): Promise<HttpResponseInit> {
  try {
    const ruleset = resolveRuleset(process.env);

    return {
      status: 200,
      jsonBody: { ok: true, ruleset, descriptions: describeRuleset(ruleset) },
    };
  } catch (err) {
    return internalError(err, context);
  }
}

app.http("TrafficabilityThresholds", {
  methods: ["GET"],
  authLevel: "anonymous",
  route: "trafficability/thresholds",
  handler: TrafficabilityThresholds,
});
