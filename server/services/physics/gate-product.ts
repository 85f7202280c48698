import { SandyInsufficientDataError } from "./sandy-errors";
import { indexGradient } from "./series-stats";

export type ProxyPair = {
  readonly Z: readonly number[];
  readonly Sigma: readonly number[];
};

export type GateSeries = {
  readonly G: readonly number[];
  readonly dGdt: readonly number[];
};

export const gateProduct = (Z: number, Sigma: number): number => (1 - Z) * Sigma;

export const computeGateSeries = (proxies: ProxyPair): GateSeries => {
  const n = proxies.Z.length;
  if (n < 2) throw new SandyInsufficientDataError(n);
  const G = proxies.Z.map((z, i) => gateProduct(z, proxies.Sigma[i]));
  return Object.freeze({
    G: Object.freeze(G),
    dGdt: Object.freeze(indexGradient(G)),
  });
};
