import { describe, expect, it } from "vitest";
import { HttpRequest, InvocationContext } from "@azure/functions";
import { ExplainTrafficability } from "../ExplainTrafficability.js";
import { TrafficabilityThresholds } from "../TrafficabilityThresholds.js";

const ctx = () => new InvocationContext({ functionName: "test", invocationId: "test-invocation", logHandler: () => {} });

function get(path: string, query: Record<string, string> = {}): HttpRequest {
  const qs = new URLSearchParams(query).toString();
  return new HttpRequest({ method: "GET", url: `http://localhost:7071/api/${path}${qs ? `?${qs}` : ""}`, query });
}

describe("ExplainTrafficability", () => {
  it("answers a question", async () => {
    const res = await ExplainTrafficability(get("trafficability/explain", { q: "how deep can ruts get" }), ctx());

    expect(res.status).toBe(200);
    expect(res.jsonBody.ok).toBe(true);
    expect(res.jsonBody.topic).toBe("rut_depth");
    expect(res.jsonBody.answer.endsWith("Thresholds in use (ruleset 1.0.0): Severe above 10.0 cm; Moderate above 3.0 cm.")).toBe(true);
  });

  it("answers 400 naming q without a question", async () => {
    const res = await ExplainTrafficability(get("trafficability/explain"), ctx());

    expect(res.status).toBe(400);
    expect(res.jsonBody).toEqual({ ok: false, error: "validation_error", field: "q", message: "q: is required" });
  });
});

describe("TrafficabilityThresholds", () => {
  it("lists the active ruleset with descriptions", async () => {
    const res = await TrafficabilityThresholds(get("trafficability/thresholds"), ctx());

    expect(res.status).toBe(200);
    expect(res.jsonBody.ruleset.version).toBe("1.0.0");
    expect(res.jsonBody.descriptions.wheel_load).toBe("High at or above 5000 kg.");
  });
});
