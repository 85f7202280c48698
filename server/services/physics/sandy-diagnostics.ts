import {
  SANDY_REQUIRED_COLUMNS,
  SANDY_TRAJECTORY_COLUMNS,
  SandyDiagnosticReport,
  type SandyColumns,
  type TSandyDiagnosticReport,
  type TSandyDiagnosticWarning,
  type TSandyManualPoint,
  type TSandyTabularInput,
} from "@shared/sandy-diagnostics";
import {
  resolveSandyConfig,
  type TSandyDiagnosticsConfig,
  type TSandyDiagnosticsConfigInput,
  type TSandySystemType,
} from "@shared/sandy-square";
import { hashStableJson } from "../../utils/stable-hash";
import { computeGateSeries } from "./gate-product";
import { detectPhase0 } from "./phase0-detector";
import { runManualDiagnostics } from "./phase-classifier";
import { SandyInsufficientDataError, SandyValidationError } from "./sandy-errors";
import {
  assertSandyColumns,
  assertTrajectoryColumns,
  computeSandyProxies,
  nonFiniteWarning,
} from "./sandy-proxies";

export type SandyRunOptions = {
  config?: TSandyDiagnosticsConfigInput;
  system_type?: TSandySystemType;
  manual?: TSandyManualPoint;
  generated_at_iso?: string;
};

const DEFAULT_SYSTEM_TYPE: TSandySystemType = "fusion_tokamak";

const toCell = (value: number | null | undefined): number =>
  typeof value === "number" ? value : Number.NaN;

/**
 * Flattens a request body into the column mapping the pipeline reads. Columns win
 * over rows when both are present; a row lacking a cell contributes NaN.
 */
export const toSandyColumns = (input: TSandyTabularInput): SandyColumns => {
  if (input.columns) {
    const out: Record<string, number[]> = {};
    for (const [name, values] of Object.entries(input.columns)) {
      out[name] = values.map(toCell);
    }
    return out;
  }
  if (input.rows) {
    const names = new Set<string>();
    for (const row of input.rows) {
      for (const key of Object.keys(row)) names.add(key);
    }
    const out: Record<string, number[]> = {};
    for (const name of names) {
      out[name] = input.rows.map((row) => toCell(row[name]));
    }
    return out;
  }
  throw new SandyValidationError("request must carry either columns or rows");
};

const pickColumns = (columns: SandyColumns, names: readonly string[]): SandyColumns => {
  const out: Record<string, readonly number[]> = {};
  for (const name of names) {
    const values = columns[name];
    if (values) out[name] = values;
  }
  return out;
};

const buildReportHash = (
  mode: TSandyDiagnosticReport["mode"],
  inputs: SandyColumns,
  config: TSandyDiagnosticsConfig,
  systemType: TSandySystemType,
  manual?: TSandyManualPoint,
): string => hashStableJson({ mode, inputs, config, system_type: systemType, manual });

export function runSandyDiagnostics(
  columns: SandyColumns,
  opts: SandyRunOptions = {},
): TSandyDiagnosticReport {
  const config = resolveSandyConfig(opts.config);
  const sampleCount = assertSandyColumns(columns);
  if (sampleCount < 2) throw new SandyInsufficientDataError(sampleCount);
  const systemType = opts.system_type ?? DEFAULT_SYSTEM_TYPE;

  const { proxies, warnings } = computeSandyProxies(columns, { epsilon: config.epsilon });
  const gate = computeGateSeries(proxies);
  const phase0 = detectPhase0(proxies, gate, config);
  const manual = opts.manual
    ? runManualDiagnostics(opts.manual, { contour_levels: config.contour_levels })
    : undefined;
  const inputs = pickColumns(columns, [...SANDY_REQUIRED_COLUMNS, "tau_E"]);

  return SandyDiagnosticReport.parse({
    schema_version: "sandy_diagnostic_report/1",
    kind: "sandy_diagnostic_report",
    mode: "batch",
    generated_at_iso: opts.generated_at_iso ?? new Date().toISOString(),
    system_type: systemType,
    config,
    sample_count: sampleCount,
    time: columns.time,
    proxies,
    gate,
    phase0,
    warnings,
    manual,
    report_hash: buildReportHash("batch", inputs, config, systemType, opts.manual),
  });
}

export function runSandyTrajectory(
  columns: SandyColumns,
  opts: Omit<SandyRunOptions, "manual"> = {},
): TSandyDiagnosticReport {
  const config = resolveSandyConfig(opts.config);
  const sampleCount = assertTrajectoryColumns(columns);
  if (sampleCount < 2) throw new SandyInsufficientDataError(sampleCount);
  const systemType = opts.system_type ?? DEFAULT_SYSTEM_TYPE;
  const time = columns.time;
  if (time && time.length !== sampleCount) {
    throw new SandyValidationError(
      `column length mismatch: expected ${sampleCount} samples in time`,
    );
  }

  const proxies = { Z: columns.Z_proxy, Sigma: columns.Sigma_proxy };
  const warnings: TSandyDiagnosticWarning[] = [];
  for (const name of SANDY_TRAJECTORY_COLUMNS) {
    const warning = nonFiniteWarning(name, columns[name]);
    if (warning) warnings.push(warning);
  }
  const gate = computeGateSeries(proxies);
  const phase0 = detectPhase0(proxies, gate, config);
  const inputs = pickColumns(columns, ["time", ...SANDY_TRAJECTORY_COLUMNS]);

  return SandyDiagnosticReport.parse({
    schema_version: "sandy_diagnostic_report/1",
    kind: "sandy_diagnostic_report",
    mode: "trajectory",
    generated_at_iso: opts.generated_at_iso ?? new Date().toISOString(),
    system_type: systemType,
    config,
    sample_count: sampleCount,
    time,
    proxies,
    gate,
    phase0,
    warnings,
    report_hash: buildReportHash("trajectory", inputs, config, systemType),
  });
}
