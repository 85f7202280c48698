import type { TSandyPhase0Report } from "@shared/sandy-diagnostics";
import {
  DEFAULT_D_CRIT,
  DEFAULT_SLOPE_PERCENTILE,
  SANDY_SQUARE,
  type TSandySquare,
} from "@shared/sandy-square";
import type { GateSeries, ProxyPair } from "./gate-product";
import { percentile } from "./series-stats";

type Phase0Options = {
  sandy_square?: TSandySquare;
  d_crit?: number;
  percentile?: number;
};

/** Signed distance to the nearest wall; negative once the point has left the square. */
export const distanceToWall = (
  Z: number,
  Sigma: number,
  square: TSandySquare = SANDY_SQUARE,
): number =>
  Math.min(Z - square.Z_min, square.Z_max - Z, Sigma - square.Sigma_min, square.Sigma_max - Sigma);

const reduceOrNaN = (
  values: readonly number[],
  pick: (a: number, b: number) => number,
  seed: number,
): number => {
  let acc = seed;
  for (const v of values) {
    if (Number.isNaN(v)) return Number.NaN;
    acc = pick(acc, v);
  }
  return acc;
};

export const detectPhase0 = (
  proxies: ProxyPair,
  gate: Pick<GateSeries, "dGdt">,
  opts: Phase0Options = {},
): TSandyPhase0Report => {
  const square = opts.sandy_square ?? SANDY_SQUARE;
  const dCrit = opts.d_crit ?? DEFAULT_D_CRIT;
  const p = opts.percentile ?? DEFAULT_SLOPE_PERCENTILE;
  // Threshold is relative to this batch's own slopes.
  const dGCrit = percentile(gate.dGdt, p);

  const distance_to_wall = proxies.Z.map((z, i) => distanceToWall(z, proxies.Sigma[i], square));
  const proximity_flag = distance_to_wall.map((d) => d < dCrit);
  const pressure_flag = gate.dGdt.map((slope) => slope > dGCrit);
  const phase0_flag = proximity_flag.map((near, i) => near || pressure_flag[i]);

  return {
    d_crit: dCrit,
    percentile: p,
    dG_crit: dGCrit,
    distance_to_wall,
    proximity_flag,
    pressure_flag,
    phase0_flag,
    min_distance: reduceOrNaN(distance_to_wall, Math.min, Number.POSITIVE_INFINITY),
    max_slope: reduceOrNaN(gate.dGdt, Math.max, Number.NEGATIVE_INFINITY),
    flagged_count: phase0_flag.filter(Boolean).length,
  };
};
