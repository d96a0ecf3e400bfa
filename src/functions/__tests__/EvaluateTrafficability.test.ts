import { describe, expect, it, vi } from "vitest";
import { fileURLToPath } from "node:url";
import { HttpRequest, InvocationContext } from "@azure/functions";
import { EvaluateTrafficabilityHttp } from "../EvaluateTrafficability.js";

const URL_BASE = "http://localhost:7071/api/trafficability";

const FIELD_READY = {
  bulk_density: "1.2",
  cone_index: "800",
  smd: "0",
  tire_pressure: "180",
  wheel_load: "2000",
  rut_depth: "1",
};

function context() {
  const logHandler = vi.fn();
  return {
    logHandler,
    ctx: new InvocationContext({ functionName: "EvaluateTrafficability", invocationId: "test-invocation", logHandler }),
  };
}

function post(body: string): HttpRequest {
  return new HttpRequest({ method: "POST", url: URL_BASE, body: { string: body } });
}

describe("EvaluateTrafficabilityHttp", () => {
  it("classifies a JSON body", async () => {
    const { ctx } = context();
    const res = await EvaluateTrafficabilityHttp(
      post(
        JSON.stringify({
          bulk_density: 1.9,
          cone_index: 300,
          soil_moisture_deficit: -10,
          tire_pressure: 250,
          wheel_load: 5000,
          rut_depth: 8,
        })
      ),
      ctx
    );

    expect(res.status).toBe(200);
    expect(res.jsonBody.ok).toBe(true);
    expect(res.jsonBody.result.risk_level).toBe("Severe");
    expect(res.jsonBody.result.rationale).toHaveLength(6);
  });

  it("reads the query string on GET", async () => {
    const { ctx } = context();
    const query = new URLSearchParams(FIELD_READY).toString();
    const req = new HttpRequest({ method: "GET", url: `${URL_BASE}?${query}`, query: FIELD_READY });

    const res = await EvaluateTrafficabilityHttp(req, ctx);

    expect(res.status).toBe(200);
    expect(res.jsonBody.input).toEqual({
      bulk_density: 1.2,
      cone_index: 800,
      soil_moisture_deficit: 0,
      tire_pressure: 180,
      wheel_load: 2000,
      rut_depth: 1,
    });
    expect(res.jsonBody.result.risk_level).toBe("Low");
    expect(res.jsonBody.result.rationale).toEqual([]);
  });

  it("answers 400 naming the offending field", async () => {
    const { ctx, logHandler } = context();
    const res = await EvaluateTrafficabilityHttp(
      post(JSON.stringify({ ...FIELD_READY, tire_pressure: -5 })),
      ctx
    );

    expect(res.status).toBe(400);
    expect(res.jsonBody).toEqual({
      ok: false,
      error: "validation_error",
      field: "tire_pressure",
      message: "tire_pressure: must be greater than 0",
    });
    expect(logHandler).toHaveBeenCalledWith(
      "warning",
      "[trafficability] rejected field=tire_pressure reason=tire_pressure: must be greater than 0"
    );
  });

  it("answers 400 for a body that is not JSON", async () => {
    const { ctx } = context();
    const res = await EvaluateTrafficabilityHttp(post("bulk_density=1.2"), ctx);

    expect(res.status).toBe(400);
    expect(res.jsonBody.field).toBe("body");
  });

  it("uses the ruleset named in the environment", async () => {
    vi.stubEnv(
      "TRAFFICABILITY_RULESET_PATH",
      fileURLToPath(new URL("../../trafficability/__tests__/fixtures/strict-ruleset.json", import.meta.url))
    );
    const { ctx } = context();
    const res = await EvaluateTrafficabilityHttp(post(JSON.stringify(FIELD_READY)), ctx);

    expect(res.status).toBe(200);
    expect(res.jsonBody.result.ruleset_version).toBe("2.0.0");
    expect(res.jsonBody.result.risk_level).toBe("High");
  });

  it("answers 500 when the ruleset cannot be loaded", async () => {
    vi.stubEnv("TRAFFICABILITY_RULESET_PATH", "/nonexistent/ruleset.json");
    const { ctx } = context();
    const res = await EvaluateTrafficabilityHttp(post(JSON.stringify(FIELD_READY)), ctx);

    expect(res.status).toBe(500);
    expect(res.jsonBody.ok).toBe(false);
    expect(res.jsonBody.error).toBe("ruleset_error");
  });
});
