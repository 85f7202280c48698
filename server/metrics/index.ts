import type { Express } from "express";
import { collectDefaultMetrics, Counter, Histogram, Registry } from "prom-client";

const registry = new Registry();
collectDefaultMetrics({ register: registry });

const diagnosticRunsTotal = new Counter({
  name: "sandy_diagnostic_runs_total",
  help: "Z-Sigma diagnostic runs",
  labelNames: ["mode", "status"],
  registers: [registry],
});

const phase0FlaggedFraction = new Histogram({
  name: "sandy_phase0_flagged_fraction",
  help: "Share of samples carrying a phase-0 flag per run",
  labelNames: ["mode"],
  buckets: [0, 0.05, 0.1, 0.2, 0.3, 0.5, 0.75, 1],
  registers: [registry],
});

const diagnosticWarningsTotal = new Counter({
  name: "sandy_diagnostic_warnings_total",
  help: "Warnings attached to diagnostic reports",
  labelNames: ["code"],
  registers: [registry],
});

type RunStatus = "ok" | "invalid" | "insufficient" | "error";

export const metrics = {
  recordRun(mode: string, status: RunStatus): void {
    diagnosticRunsTotal.inc({ mode, status });
  },
  observeFlagged(mode: string, flagged: number, total: number): void {
    if (!Number.isFinite(total) || total <= 0) {
      return;
    }
    phase0FlaggedFraction.observe({ mode }, flagged / total);
  },
  recordWarning(code: string): void {
    diagnosticWarningsTotal.inc({ code });
  },
};

export function registerMetricsEndpoint(app: Express): void {
  app.get("/metrics", async (_req, res) => {
    res.setHeader("Content-Type", registry.contentType);
    res.send(await registry.metrics());
  });
}
