import {
  SANDY_REQUIRED_COLUMNS,
  SANDY_TRAJECTORY_COLUMNS,
  type SandyColumns,
  type TSandyDiagnosticWarning,
  type TSandyProxySeries,
} from "@shared/sandy-diagnostics";
import { DEFAULT_NORMALIZATION_EPSILON } from "@shared/sandy-square";
import { SandyValidationError } from "./sandy-errors";
import { minMaxNormalize, nonFiniteIndices, type ColumnRange } from "./series-stats";

const F_RAD_WEIGHT = 0.5;
const F_ELM_WEIGHT = 0.4;
const DELTA_W_ELM_WEIGHT = 0.3;

type ProxyOptions = {
  epsilon?: number;
};

export type SandyProxyResult = {
  proxies: TSandyProxySeries;
  warnings: TSandyDiagnosticWarning[];
};

const findMissing = (columns: SandyColumns, required: readonly string[]): string[] =>
  required.filter((name) => !Object.prototype.hasOwnProperty.call(columns, name));

/**
 * Throws when any required column is absent or the required columns disagree on
 * length. Returns the shared sample count.
 */
export const assertColumns = (
  columns: SandyColumns,
  required: readonly string[],
  message?: string,
): number => {
  const missing = findMissing(columns, required);
  if (missing.length) {
    throw new SandyValidationError(
      message ?? `missing required columns: ${missing.join(", ")}`,
      missing,
    );
  }
  const lengths = required.map((name) => columns[name].length);
  const count = lengths[0] ?? 0;
  const mismatched = required.filter((name) => columns[name].length !== count);
  if (mismatched.length) {
    throw new SandyValidationError(
      `column length mismatch: expected ${count} samples in ${mismatched.join(", ")}`,
    );
  }
  return count;
};

export const assertSandyColumns = (columns: SandyColumns): number =>
  assertColumns(columns, SANDY_REQUIRED_COLUMNS);

export const assertTrajectoryColumns = (columns: SandyColumns): number =>
  assertColumns(
    columns,
    SANDY_TRAJECTORY_COLUMNS,
    `CSV must contain columns: ${SANDY_TRAJECTORY_COLUMNS.join(", ")}`,
  );

const degenerateWarning = (
  column: string,
  range: ColumnRange,
  epsilon: number,
): TSandyDiagnosticWarning | null => {
  if (Number.isNaN(range.range)) {
    return {
      code: "degenerate_range",
      column,
      message: `${column} has no defined range (non-finite min/max); normalized values are NaN`,
    };
  }
  if (range.range > epsilon) return null;
  return {
    code: "degenerate_range",
    column,
    message: `${column} spans ${range.range} (<= epsilon ${epsilon}); normalized values carry no contrast`,
  };
};

export const nonFiniteWarning = (
  column: string,
  values: readonly number[],
  message = `${column} is not finite at %n sample(s)`,
): TSandyDiagnosticWarning | null => {
  const indices = nonFiniteIndices(values);
  if (!indices.length) return null;
  return {
    code: "non_finite",
    column,
    indices,
    message: message.replace("%n", String(indices.length)),
  };
};

export const computeRadiatedFraction = (
  pRad: readonly number[],
  pInput: readonly number[],
): number[] => pRad.map((value, i) => value / pInput[i]);

export const computeSigmaRaw = (
  fRad: readonly number[],
  fElm: readonly number[],
  deltaWElm: readonly number[],
): number[] =>
  fRad.map(
    (value, i) => F_RAD_WEIGHT * value + F_ELM_WEIGHT * fElm[i] - DELTA_W_ELM_WEIGHT * deltaWElm[i],
  );

export const computeSandyProxies = (
  columns: SandyColumns,
  opts: ProxyOptions = {},
): SandyProxyResult => {
  assertSandyColumns(columns);
  const epsilon = opts.epsilon ?? DEFAULT_NORMALIZATION_EPSILON;

  const z = minMaxNormalize(columns.H98y2, epsilon);
  const fRad = computeRadiatedFraction(columns.P_rad, columns.P_input);
  const sigmaRaw = computeSigmaRaw(fRad, columns.f_ELM, columns.DeltaW_ELM);
  const sigma = minMaxNormalize(sigmaRaw, epsilon);

  const warnings: TSandyDiagnosticWarning[] = [];
  for (const warning of [
    ...SANDY_REQUIRED_COLUMNS.map((name) => nonFiniteWarning(name, columns[name])),
    nonFiniteWarning(
      "f_rad",
      fRad,
      "P_rad / P_input is not finite at %n sample(s); values propagate into Sigma",
    ),
    degenerateWarning("H98y2", z.range, epsilon),
    degenerateWarning("Sigma_raw", sigma.range, epsilon),
  ]) {
    if (warning) warnings.push(warning);
  }

  return {
    proxies: {
      Z: z.normalized,
      Sigma: sigma.normalized,
      f_rad: fRad,
      Sigma_raw: sigmaRaw,
      ranges: {
        H98y2: z.range,
        Sigma_raw: sigma.range,
      },
    },
    warnings,
  };
};
