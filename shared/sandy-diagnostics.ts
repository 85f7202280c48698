import { z } from "zod";
import {
  SandyDiagnosticsConfig,
  SandyDiagnosticsConfigOverrides,
  SandySystemType,
} from "./sandy-square";

export const SANDY_REQUIRED_COLUMNS = [
  "time",
  "H98y2",
  "P_rad",
  "P_input",
  "f_ELM",
  "DeltaW_ELM",
] as const;

export type SandyRequiredColumn = (typeof SANDY_REQUIRED_COLUMNS)[number];

export const SANDY_TRAJECTORY_COLUMNS = ["Z_proxy", "Sigma_proxy"] as const;

export type SandyTrajectoryColumn = (typeof SANDY_TRAJECTORY_COLUMNS)[number];

/** Column name -> numeric sequence, the only shape the pipeline reads. */
export type SandyColumns = Record<string, readonly number[]>;

// Non-finite values are carried through the series, never rejected.
const SeriesValue = z.union([z.number(), z.nan()]);
const Series = z.array(SeriesValue);

// JSON has no NaN; a null cell stands in for a missing or non-finite reading.
const CellValue = z.union([z.number(), z.null()]);

export const SandyPhaseLabel = z.enum(["DeadZone", "DangerZone", "SafeZone"]);

export type TSandyPhaseLabel = z.infer<typeof SandyPhaseLabel>;

export const SandyPhaseInterpretation = z.object({
  label: SandyPhaseLabel,
  title: z.string().min(1),
  message: z.string().min(1),
  tone: z.enum(["gray", "red", "green"]),
});

export type TSandyPhaseInterpretation = z.infer<typeof SandyPhaseInterpretation>;

export const SandyManualPoint = z.object({
  Z: z.number().min(0).max(1),
  Sigma: z.number().min(0).max(1),
});

export type TSandyManualPoint = z.infer<typeof SandyManualPoint>;

export const SandyManualDiagnostics = z.object({
  Z: z.number(),
  Sigma: z.number(),
  G: z.number(),
  label: SandyPhaseLabel,
  interpretation: SandyPhaseInterpretation,
  contours_crossed: z.array(z.number()),
});

export type TSandyManualDiagnostics = z.infer<typeof SandyManualDiagnostics>;

export const SandyDiagnosticWarning = z.object({
  code: z.enum(["degenerate_range", "non_finite"]),
  message: z.string().min(1),
  column: z.string().optional(),
  indices: z.array(z.number().int().nonnegative()).optional(),
});

export type TSandyDiagnosticWarning = z.infer<typeof SandyDiagnosticWarning>;

export const SandyColumnRange = z.object({
  min: SeriesValue,
  max: SeriesValue,
  range: SeriesValue,
});

export type TSandyColumnRange = z.infer<typeof SandyColumnRange>;

export const SandyProxySeries = z.object({
  Z: Series,
  Sigma: Series,
  f_rad: Series.optional(),
  Sigma_raw: Series.optional(),
  ranges: z
    .object({
      H98y2: SandyColumnRange,
      Sigma_raw: SandyColumnRange,
    })
    .optional(),
});

export type TSandyProxySeries = z.infer<typeof SandyProxySeries>;

export const SandyGateSeries = z.object({
  G: Series,
  dGdt: Series,
});

export type TSandyGateSeries = z.infer<typeof SandyGateSeries>;

export const SandyPhase0Report = z.object({
  d_crit: z.number(),
  percentile: z.number().min(0).max(100),
  dG_crit: SeriesValue,
  distance_to_wall: Series,
  proximity_flag: z.array(z.boolean()),
  pressure_flag: z.array(z.boolean()),
  phase0_flag: z.array(z.boolean()),
  min_distance: SeriesValue,
  max_slope: SeriesValue,
  flagged_count: z.number().int().nonnegative(),
});

export type TSandyPhase0Report = z.infer<typeof SandyPhase0Report>;

export const SandyDiagnosticReport = z.object({
  schema_version: z.literal("sandy_diagnostic_report/1"),
  kind: z.literal("sandy_diagnostic_report"),
  mode: z.enum(["batch", "trajectory"]),
  generated_at_iso: z.string().datetime(),
  system_type: SandySystemType,
  config: SandyDiagnosticsConfig,
  sample_count: z.number().int().nonnegative(),
  time: Series.optional(),
  proxies: SandyProxySeries,
  gate: SandyGateSeries,
  phase0: SandyPhase0Report,
  warnings: z.array(SandyDiagnosticWarning),
  manual: SandyManualDiagnostics.optional(),
  report_hash: z.string().min(8),
});

export type TSandyDiagnosticReport = z.infer<typeof SandyDiagnosticReport>;

const TabularInput = z.object({
  columns: z.record(z.string(), z.array(CellValue)).optional(),
  rows: z.array(z.record(z.string(), CellValue)).optional(),
});

export type TSandyTabularInput = z.infer<typeof TabularInput>;

export const SandyDiagnosticsRequest = TabularInput.extend({
  config: SandyDiagnosticsConfigOverrides.optional(),
  system_type: SandySystemType.optional(),
  manual: SandyManualPoint.optional(),
});

export type TSandyDiagnosticsRequest = z.infer<typeof SandyDiagnosticsRequest>;

export const SandyTrajectoryRequest = TabularInput.extend({
  config: SandyDiagnosticsConfigOverrides.optional(),
  system_type: SandySystemType.optional(),
});

export type TSandyTrajectoryRequest = z.infer<typeof SandyTrajectoryRequest>;
