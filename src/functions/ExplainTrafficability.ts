import { app, type HttpRequest, type HttpResponseInit, type InvocationContext } from "@azure/functions";
import { explain } from "../trafficability/glossary.js";
import { resolveRuleset } from "../trafficability/ruleset.js";
import { ValidationError } from "../trafficability/errors.js";
import { internalError, validationFailed } from "./shared/responses.js";

export async function ExplainTrafficability(
  req: HttpRequest,
  context: InvocationContext
): Promise<HttpResponseInit> {
  try {
    const question = (req.query.get("q") ?? "").trim();
    if (!question) {
      return validationFailed(new ValidationError([{ field: "q", message: "is required" }]), context);
    }

    const { topic, answer } = explain(question, resolveRuleset(process.env));
    context.log(`[trafficability] explain topic=${topic ?? "none"}`);

    return { status: 200, jsonBody: { ok: true, topic, answer } };
  } catch (err) {
    return internalError(err, context);
  }
}

app.http("ExplainTrafficability", {
  methods: ["GET"],
  authLevel: "anonymous",
  route: "trafficability/explain",
  handler: ExplainTrafficability,
});
