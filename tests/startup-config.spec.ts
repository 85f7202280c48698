import { describe, expect, it } from "vitest";
import { resolveStartupConfig } from "../server/startup-config";

describe("resolveStartupConfig", () => {
  it("uses PORT/HOST as-is", () => {
    const cfg = resolveStartupConfig(
      {
        NODE_ENV: "production",
        PORT: "4312",
        HOST: "127.0.0.1",
      },
      "production",
    );

    expect(cfg.port).toBe(4312);
    expect(cfg.host).toBe("127.0.0.1");
    expect(cfg.sourcePort).toBe("4312");
  });

  it("falls back to the environment port and wildcard host", () => {
    expect(resolveStartupConfig({}, "production").port).toBe(5000);
    const dev = resolveStartupConfig({ PORT: "not-a-port" }, "development");
    expect(dev.port).toBe(5173);
    expect(dev.host).toBe("0.0.0.0");
  });

  it("parses diagnostic threshold defaults and env overrides", () => {
    const defaults = resolveStartupConfig({}, "development");
    expect(defaults.diagnostics.d_crit).toBe(0.05);
    expect(defaults.diagnostics.percentile).toBe(90);
    expect(defaults.diagnostics.epsilon).toBe(1e-6);
    expect(defaults.diagnostics.sandy_square).toEqual({
      Z_min: 0.3,
      Z_max: 0.9,
      Sigma_min: 0.15,
      Sigma_max: 0.85,
    });

    const configured = resolveStartupConfig(
      {
        SANDY_D_CRIT: "0.1",
        SANDY_PERCENTILE: " 75 ",
        SANDY_EPSILON: "1e-9",
      },
      "development",
    );
    expect(configured.diagnostics.d_crit).toBe(0.1);
    expect(configured.diagnostics.percentile).toBe(75);
    expect(configured.diagnostics.epsilon).toBe(1e-9);
  });

  it("ignores unparsable or out-of-range diagnostic overrides", () => {
    const cfg = resolveStartupConfig(
      {
        SANDY_D_CRIT: "abc",
        SANDY_PERCENTILE: "140",
        SANDY_EPSILON: "-1",
      },
      "development",
    );
    expect(cfg.diagnostics.d_crit).toBe(0.05);
    expect(cfg.diagnostics.percentile).toBe(90);
    expect(cfg.diagnostics.epsilon).toBe(1e-6);
  });

  it("drops a negative d_crit so points outside the square stay flagged", () => {
    const cfg = resolveStartupConfig({ SANDY_D_CRIT: "-1" }, "development");
    expect(cfg.diagnostics.d_crit).toBe(0.05);
    expect(resolveStartupConfig({ SANDY_D_CRIT: "0" }, "development").diagnostics.d_crit).toBe(0);
  });
});
