import { z } from "zod";

export const SANDY_SQUARE = Object.freeze({
  Z_min: 0.3,
  Z_max: 0.9,
  Sigma_min: 0.15,
  Sigma_max: 0.85,
});

export const DEFAULT_D_CRIT = 0.05;
export const DEFAULT_SLOPE_PERCENTILE = 90;
export const DEFAULT_NORMALIZATION_EPSILON = 1e-6;
export const DEFAULT_CONTOUR_LEVELS: readonly number[] = Object.freeze([0.02, 0.05, 0.1]);

export const SandySquare = z
  .object({
    Z_min: z.number().finite().default(SANDY_SQUARE.Z_min),
    Z_max: z.number().finite().default(SANDY_SQUARE.Z_max),
    Sigma_min: z.number().finite().default(SANDY_SQUARE.Sigma_min),
    Sigma_max: z.number().finite().default(SANDY_SQUARE.Sigma_max),
  })
  .refine((square) => square.Z_min < square.Z_max, {
    message: "Z_min must be below Z_max",
    path: ["Z_min"],
  })
  .refine((square) => square.Sigma_min < square.Sigma_max, {
    message: "Sigma_min must be below Sigma_max",
    path: ["Sigma_min"],
  });

export type TSandySquare = z.infer<typeof SandySquare>;

export const SandyDiagnosticsConfig = z.object({
  sandy_square: SandySquare.default({}),
  // Negative d_crit would leave points outside the square unflagged.
  d_crit: z.number().finite().nonnegative().default(DEFAULT_D_CRIT),
  percentile: z.number().min(0).max(100).default(DEFAULT_SLOPE_PERCENTILE),
  epsilon: z.number().positive().default(DEFAULT_NORMALIZATION_EPSILON),
  contour_levels: z
    .array(z.number().finite().nonnegative())
    .default(() => [...DEFAULT_CONTOUR_LEVELS]),
});

export type TSandyDiagnosticsConfig = z.infer<typeof SandyDiagnosticsConfig>;
export type TSandyDiagnosticsConfigInput = z.input<typeof SandyDiagnosticsConfig>;

/** Request-side overrides: only the keys a caller names are set. */
export const SandyDiagnosticsConfigOverrides = SandyDiagnosticsConfig.partial();

export type TSandyDiagnosticsConfigOverrides = z.infer<typeof SandyDiagnosticsConfigOverrides>;

export const resolveSandyConfig = (
  input: TSandyDiagnosticsConfigInput = {},
): TSandyDiagnosticsConfig => SandyDiagnosticsConfig.parse(input);

export const mergeSandyConfig = (
  base: TSandyDiagnosticsConfig,
  overrides: TSandyDiagnosticsConfigOverrides = {},
): TSandyDiagnosticsConfig => {
  const merged: TSandyDiagnosticsConfigInput = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(merged, { [key]: value });
  }
  return resolveSandyConfig(merged);
};

export const SandySystemType = z.enum([
  "fusion_tokamak",
  "stellar_system",
  "generic_energy_system",
]);

export type TSandySystemType = z.infer<typeof SandySystemType>;
