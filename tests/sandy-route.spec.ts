import request from "supertest";
import { describe, expect, it } from "vitest";
import { resolveSandyConfig } from "@shared/sandy-square";
import { createApp } from "../server/app";

const columns = {
  time: [0, 1, 2],
  H98y2: [1, 2, 3],
  P_rad: [1, 2, 3],
  P_input: [10, 10, 10],
  f_ELM: [0, 0, 0],
  DeltaW_ELM: [0, 0, 0],
};

describe("sandy diagnostics routes", () => {
  it("serves the default configuration", async () => {
    const res = await request(createApp()).get("/api/physics/sandy/config");
    expect(res.status).toBe(200);
    expect(res.body.sandy_square).toEqual({ Z_min: 0.3, Z_max: 0.9, Sigma_min: 0.15, Sigma_max: 0.85 });
    expect(res.body.config.percentile).toBe(90);
    expect(res.body.config.contour_levels).toEqual([0.02, 0.05, 0.1]);
  });

  it("serves the square the server was configured with", async () => {
    const app = createApp(resolveSandyConfig({ sandy_square: { Z_min: 0.2 } }));
    const res = await request(app).get("/api/physics/sandy/config");
    expect(res.status).toBe(200);
    expect(res.body.sandy_square).toEqual({ Z_min: 0.2, Z_max: 0.9, Sigma_min: 0.15, Sigma_max: 0.85 });
    expect(res.body.config.sandy_square).toEqual(res.body.sandy_square);
  });

  it("runs a batch sent as columns", async () => {
    const res = await request(createApp()).post("/api/physics/sandy/diagnostics").send({ columns });
    expect(res.status).toBe(200);
    expect(res.body.schema_version).toBe("sandy_diagnostic_report/1");
    expect(res.body.sample_count).toBe(3);
    expect(res.body.proxies.Z[0]).toBe(0);
  });

  it("runs a batch sent as rows with a manual point", async () => {
    const rows = columns.time.map((time, i) => ({
      time,
      H98y2: columns.H98y2[i],
      P_rad: columns.P_rad[i],
      P_input: columns.P_input[i],
      f_ELM: columns.f_ELM[i],
      DeltaW_ELM: columns.DeltaW_ELM[i],
    }));
    const res = await request(createApp())
      .post("/api/physics/sandy/diagnostics")
      .send({ rows, manual: { Z: 0.2, Sigma: 0.5 }, system_type: "generic_energy_system" });
    expect(res.status).toBe(200);
    expect(res.body.sample_count).toBe(3);
    expect(res.body.system_type).toBe("generic_energy_system");
    expect(res.body.manual.label).toBe("DeadZone");
  });

  it("serializes non-finite series values as null", async () => {
    const res = await request(createApp())
      .post("/api/physics/sandy/diagnostics")
      .send({ columns: { ...columns, P_input: [10, 0, 10] } });
    expect(res.status).toBe(200);
    expect(res.body.proxies.Sigma).toEqual([0, null, 0]);
    expect(res.body.warnings[0].code).toBe("non_finite");
  });

  it("lists missing columns with a 400", async () => {
    const { P_rad: _dropped, ...partial } = columns;
    const res = await request(createApp()).post("/api/physics/sandy/diagnostics").send({ columns: partial });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({
      error: "sandy_validation_failed",
      message: "missing required columns: P_rad",
      missing: ["P_rad"],
    });
  });

  it("answers a single-sample batch with 422", async () => {
    const single = Object.fromEntries(Object.entries(columns).map(([name, values]) => [name, values.slice(0, 1)]));
    const res = await request(createApp()).post("/api/physics/sandy/diagnostics").send({ columns: single });
    expect(res.status).toBe(422);
    expect(res.body.error).toBe("sandy_insufficient_data");
  });

  it("rejects a body with neither rows nor columns", async () => {
    const res = await request(createApp()).post("/api/physics/sandy/diagnostics").send({});
    expect(res.status).toBe(400);
    expect(res.body.message).toBe("request must carry either columns or rows");
  });

  it("merges request overrides over server defaults", async () => {
    const app = createApp(resolveSandyConfig({ percentile: 50 }));
    const res = await request(app)
      .post("/api/physics/sandy/diagnostics")
      .send({ columns, config: { d_crit: 0.5 } });
    expect(res.status).toBe(200);
    expect(res.body.config.percentile).toBe(50);
    expect(res.body.config.d_crit).toBe(0.5);
    expect(res.body.phase0.proximity_flag).toEqual([true, true, true]);
  });

  it("rejects a negative d_crit override", async () => {
    const res = await request(createApp())
      .post("/api/physics/sandy/diagnostics")
      .send({ columns, config: { d_crit: -1 } });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("sandy_validation_failed");
  });

  it("runs a trajectory", async () => {
    const res = await request(createApp())
      .post("/api/physics/sandy/trajectory")
      .send({ columns: { Z_proxy: [0.5, 0.6, 0.95], Sigma_proxy: [0.5, 0.4, 0.1] } });
    expect(res.status).toBe(200);
    expect(res.body.mode).toBe("trajectory");
    expect(res.body.phase0.flagged_count).toBe(2);
  });

  it("classifies a manual point", async () => {
    const res = await request(createApp()).post("/api/physics/sandy/classify").send({ Z: 0.8, Sigma: 0.1 });
    expect(res.status).toBe(200);
    expect(res.body.label).toBe("DangerZone");
    expect(res.body.interpretation.title).toBe("Danger Zone (Phase III Risk)");
  });

  it("rejects a manual point outside the unit square", async () => {
    const res = await request(createApp()).post("/api/physics/sandy/classify").send({ Z: 1.5, Sigma: 0.1 });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("sandy_validation_failed");
  });

  it("exposes health and run metrics", async () => {
    const app = createApp();
    await request(app).post("/api/physics/sandy/diagnostics").send({ columns });
    const health = await request(app).get("/healthz");
    expect(health.status).toBe(200);
    expect(health.body.status).toBe("ok");
    const res = await request(app).get("/metrics");
    expect(res.status).toBe(200);
    expect(res.text).toContain('sandy_diagnostic_runs_total{mode="batch",status="ok"}');
  });
});
