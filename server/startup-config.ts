import { resolveSandyConfig, type TSandyDiagnosticsConfig } from "@shared/sandy-square";

export type StartupConfig = {
  port: number;
  host: string;
  fallbackPort: number;
  sourcePort: string | undefined;
  sourceHost: string | undefined;
  diagnostics: TSandyDiagnosticsConfig;
};

const parsePositivePort = (value: string | undefined): number | null => {
  if (!value) return null;
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || Number.isNaN(parsed) || parsed <= 0) return null;
  return parsed;
};

const parseFiniteNumber = (value: string | undefined): number | undefined => {
  if (!value?.trim()) return undefined;
  const parsed = Number(value.trim());
  return Number.isFinite(parsed) ? parsed : undefined;
};

const parsePercentile = (value: string | undefined): number | undefined => {
  const parsed = parseFiniteNumber(value);
  if (parsed === undefined || parsed < 0 || parsed > 100) return undefined;
  return parsed;
};

const parsePositiveNumber = (value: string | undefined): number | undefined => {
  const parsed = parseFiniteNumber(value);
  return parsed !== undefined && parsed > 0 ? parsed : undefined;
};

const parseNonNegativeNumber = (value: string | undefined): number | undefined => {
  const parsed = parseFiniteNumber(value);
  return parsed !== undefined && parsed >= 0 ? parsed : undefined;
};

export const resolveStartupConfig = (env: NodeJS.ProcessEnv, appEnv: string): StartupConfig => {
  const fallbackPort = appEnv === "production" ? 5000 : 5173;
  const port = parsePositivePort(env.PORT) ?? fallbackPort;
  const host = env.HOST?.trim() ? env.HOST.trim() : "0.0.0.0";

  return {
    port,
    host,
    fallbackPort,
    sourcePort: env.PORT,
    sourceHost: env.HOST,
    diagnostics: resolveSandyConfig({
      d_crit: parseNonNegativeNumber(env.SANDY_D_CRIT),
      percentile: parsePercentile(env.SANDY_PERCENTILE),
      epsilon: parsePositiveNumber(env.SANDY_EPSILON),
    }),
  };
};
