import express, { type Response } from "express";
import { ZodError } from "zod";
import {
  SandyDiagnosticsRequest,
  SandyManualPoint,
  SandyTrajectoryRequest,
  type TSandyDiagnosticReport,
} from "@shared/sandy-diagnostics";
import {
  mergeSandyConfig,
  resolveSandyConfig,
  type TSandyDiagnosticsConfig,
} from "@shared/sandy-square";
import { metrics } from "../metrics";
import { runManualDiagnostics } from "../services/physics/phase-classifier";
import {
  runSandyDiagnostics,
  runSandyTrajectory,
  toSandyColumns,
} from "../services/physics/sandy-diagnostics";
import {
  SandyInsufficientDataError,
  SandyValidationError,
} from "../services/physics/sandy-errors";
import { log } from "../utils/log";

type RunMode = TSandyDiagnosticReport["mode"] | "manual";

const sendError = (res: Response, mode: RunMode, err: unknown) => {
  if (err instanceof SandyValidationError) {
    metrics.recordRun(mode, "invalid");
    res.status(err.status).json({
      error: "sandy_validation_failed",
      message: err.message,
      ...(err.missing.length ? { missing: err.missing } : {}),
    });
    return;
  }
  if (err instanceof ZodError) {
    metrics.recordRun(mode, "invalid");
    res.status(400).json({
      error: "sandy_validation_failed",
      message: err.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; "),
    });
    return;
  }
  if (err instanceof SandyInsufficientDataError) {
    metrics.recordRun(mode, "insufficient");
    res.status(err.status).json({ error: "sandy_insufficient_data", message: err.message });
    return;
  }
  metrics.recordRun(mode, "error");
  log(`${mode} run failed: ${err instanceof Error ? err.message : String(err)}`, "sandy", "stderr");
  res.status(500).json({ error: "sandy_internal_error" });
};

const recordReport = (report: TSandyDiagnosticReport) => {
  metrics.recordRun(report.mode, "ok");
  metrics.observeFlagged(report.mode, report.phase0.flagged_count, report.sample_count);
  for (const warning of report.warnings) metrics.recordWarning(warning.code);
  log(
    `${report.mode} ${report.sample_count} samples, ${report.phase0.flagged_count} flagged, ` +
      `${report.warnings.length} warnings`,
    "sandy",
  );
};

export const createSandyRouter = (
  defaults: TSandyDiagnosticsConfig = resolveSandyConfig(),
) => {
  const router = express.Router();

  router.get("/config", (_req, res) => {
    res.json({ config: defaults, sandy_square: defaults.sandy_square });
  });

  router.post("/diagnostics", (req, res) => {
    try {
      const body = SandyDiagnosticsRequest.parse(req.body ?? {});
      const report = runSandyDiagnostics(toSandyColumns(body), {
        config: mergeSandyConfig(defaults, body.config),
        system_type: body.system_type,
        manual: body.manual,
      });
      recordReport(report);
      res.json(report);
    } catch (err) {
      sendError(res, "batch", err);
    }
  });

  router.post("/trajectory", (req, res) => {
    try {
      const body = SandyTrajectoryRequest.parse(req.body ?? {});
      const report = runSandyTrajectory(toSandyColumns(body), {
        config: mergeSandyConfig(defaults, body.config),
        system_type: body.system_type,
      });
      recordReport(report);
      res.json(report);
    } catch (err) {
      sendError(res, "trajectory", err);
    }
  });

  router.post("/classify", (req, res) => {
    try {
      const point = SandyManualPoint.parse(req.body ?? {});
      metrics.recordRun("manual", "ok");
      res.json(runManualDiagnostics(point, { contour_levels: defaults.contour_levels }));
    } catch (err) {
      sendError(res, "manual", err);
    }
  });

  return router;
};
