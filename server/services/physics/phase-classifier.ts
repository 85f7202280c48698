import type {
  TSandyManualDiagnostics,
  TSandyPhaseInterpretation,
  TSandyPhaseLabel,
} from "@shared/sandy-diagnostics";
import { DEFAULT_CONTOUR_LEVELS } from "@shared/sandy-square";
import { gateProduct } from "./gate-product";

const DEAD_ZONE_Z_MAX = 0.3;
const DANGER_ZONE_Z_MIN = 0.7;
const DANGER_ZONE_SIGMA_MAX = 0.15;

const INTERPRETATIONS: Record<TSandyPhaseLabel, Omit<TSandyPhaseInterpretation, "label">> = {
  DeadZone: {
    title: "Dead Zone",
    message: "Low confinement. Energy escapes freely. No sustained structure or gain is possible.",
    tone: "gray",
  },
  DangerZone: {
    title: "Danger Zone (Phase III Risk)",
    message:
      "High confinement with insufficient entropy export. Stress accumulation likely. Breakout or disruption imminent.",
    tone: "red",
  },
  SafeZone: {
    title: "Safe Zone (Phase II – False Freedom)",
    message:
      "High confinement with controlled entropy flow. System remains stable without stress accumulation.",
    tone: "green",
  },
};

// Order matters: a low-Z point is dead before it can be dangerous.
export const classifyPhase = (Z: number, Sigma: number): TSandyPhaseLabel => {
  if (Z < DEAD_ZONE_Z_MAX) return "DeadZone";
  if (Z > DANGER_ZONE_Z_MIN && Sigma < DANGER_ZONE_SIGMA_MAX) return "DangerZone";
  return "SafeZone";
};

export const interpretPhase = (label: TSandyPhaseLabel): TSandyPhaseInterpretation => ({
  label,
  ...INTERPRETATIONS[label],
});

export const contoursCrossed = (G: number, levels: readonly number[]): number[] =>
  levels.filter((level) => G >= level).sort((a, b) => a - b);

export const runManualDiagnostics = (
  point: { Z: number; Sigma: number },
  opts: { contour_levels?: readonly number[] } = {},
): TSandyManualDiagnostics => {
  const G = gateProduct(point.Z, point.Sigma);
  const label = classifyPhase(point.Z, point.Sigma);
  return {
    Z: point.Z,
    Sigma: point.Sigma,
    G,
    label,
    interpretation: interpretPhase(label),
    contours_crossed: contoursCrossed(G, opts.contour_levels ?? DEFAULT_CONTOUR_LEVELS),
  };
};
