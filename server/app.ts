import express from "express";
import type { TSandyDiagnosticsConfig } from "@shared/sandy-square";
import { registerMetricsEndpoint } from "./metrics";
import { createSandyRouter } from "./routes/physics.sandy";

export const createApp = (diagnostics?: TSandyDiagnosticsConfig) => {
  const app = express();
  app.use(express.json({ limit: "5mb" }));

  app.get("/healthz", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });
  registerMetricsEndpoint(app);
  app.use("/api/physics/sandy", createSandyRouter(diagnostics));

  return app;
};
