import { createReadStream } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { pipeline } from "node:stream/promises";
import { parse } from "csv-parse";
import { z } from "zod";
import {
  SandyManualPoint,
  type SandyColumns,
  type TSandyDiagnosticReport,
  type TSandyManualPoint,
} from "@shared/sandy-diagnostics";
import {
  SandySystemType,
  type TSandyDiagnosticsConfigInput,
  type TSandySystemType,
} from "@shared/sandy-square";
import {
  runSandyDiagnostics,
  runSandyTrajectory,
  toSandyColumns,
} from "../server/services/physics/sandy-diagnostics";
import { SandyValidationError } from "../server/services/physics/sandy-errors";

export const DEFAULT_DATASET_PATH = path.resolve(
  process.cwd(),
  "datasets",
  "sandy-discharge.fixture.csv",
);

export type SandyRunMode = "batch" | "trajectory";

export type RunOptions = {
  mode?: SandyRunMode;
  config?: TSandyDiagnosticsConfigInput;
  system_type?: TSandySystemType;
  manual?: TSandyManualPoint;
  generated_at_iso?: string;
};

const CsvRecord = z.record(z.string(), z.string());

const JsonDataset = z.union([
  z.array(z.record(z.string(), z.union([z.number(), z.null()]))),
  z.record(z.string(), z.array(z.union([z.number(), z.null()]))),
]);

/** Blank cells read as NaN so they surface in the report instead of vanishing. */
export const parseCell = (raw: string): number => {
  const text = raw.trim();
  if (!text) return Number.NaN;
  return Number(text);
};

export const csvRecordsToColumns = (records: Record<string, string>[]): SandyColumns => {
  const names = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) names.add(key);
  }
  const out: Record<string, number[]> = {};
  for (const name of names) {
    out[name] = records.map((record) => parseCell(record[name] ?? ""));
  }
  return out;
};

async function readCsvRecords(resolved: string): Promise<Record<string, string>[]> {
  const records: Record<string, string>[] = [];
  await pipeline(
    createReadStream(resolved),
    parse({ columns: true, skip_empty_lines: true, trim: true }),
    async function (src: AsyncIterable<unknown>) {
      for await (const rec of src) {
        records.push(CsvRecord.parse(rec));
      }
    },
  );
  return records;
}

export async function loadSandyDataset(datasetPath = DEFAULT_DATASET_PATH): Promise<SandyColumns> {
  const resolved = path.resolve(datasetPath);
  if (resolved.endsWith(".json")) {
    const parsed = JsonDataset.safeParse(JSON.parse(await fs.readFile(resolved, "utf8")));
    if (!parsed.success) {
      throw new SandyValidationError(
        `invalid JSON dataset ${resolved}: expected a row array or a column mapping`,
      );
    }
    return Array.isArray(parsed.data)
      ? toSandyColumns({ rows: parsed.data })
      : toSandyColumns({ columns: parsed.data });
  }
  return csvRecordsToColumns(await readCsvRecords(resolved));
}

export function runSandyDataset(
  columns: SandyColumns,
  opts: RunOptions = {},
): TSandyDiagnosticReport {
  const shared = {
    config: opts.config,
    system_type: opts.system_type,
    generated_at_iso: opts.generated_at_iso,
  };
  if (opts.mode === "trajectory") {
    return runSandyTrajectory(columns, shared);
  }
  return runSandyDiagnostics(columns, { ...shared, manual: opts.manual });
}

export type SandyCliArgs = {
  dataset?: string;
  out?: string;
  mode?: string;
  system?: string;
  z?: string;
  sigma?: string;
  d_crit?: string;
  percentile?: string;
  epsilon?: string;
};

const CLI_FLAGS: Record<string, keyof SandyCliArgs> = {
  "-d": "dataset",
  "--dataset": "dataset",
  "-o": "out",
  "--out": "out",
  "--mode": "mode",
  "--system": "system",
  "--z": "z",
  "--sigma": "sigma",
  "--d-crit": "d_crit",
  "--percentile": "percentile",
  "--epsilon": "epsilon",
};

export function parseSandyCliArgs(argv: string[]): SandyCliArgs {
  const parsed: SandyCliArgs = {};
  for (let i = 0; i < argv.length; i += 1) {
    const key = CLI_FLAGS[argv[i]];
    if (key && argv[i + 1] !== undefined) {
      parsed[key] = argv[i + 1];
      i += 1;
    }
  }
  return parsed;
}

const parseNumberArg = (flag: string, value: string | undefined): number | undefined => {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw new SandyValidationError(`${flag} expects a number, got "${value}"`);
  }
  return parsed;
};

export function buildSandyRunOptions(args: SandyCliArgs): RunOptions {
  const mode = z.enum(["batch", "trajectory"]).parse(args.mode ?? "batch");
  const manualZ = parseNumberArg("--z", args.z);
  const sigma = parseNumberArg("--sigma", args.sigma);
  if ((manualZ === undefined) !== (sigma === undefined)) {
    throw new SandyValidationError("--z and --sigma must be given together");
  }
  const config: TSandyDiagnosticsConfigInput = {};
  const dCrit = parseNumberArg("--d-crit", args.d_crit);
  const pct = parseNumberArg("--percentile", args.percentile);
  const epsilon = parseNumberArg("--epsilon", args.epsilon);
  if (dCrit !== undefined) config.d_crit = dCrit;
  if (pct !== undefined) config.percentile = pct;
  if (epsilon !== undefined) config.epsilon = epsilon;
  return {
    mode,
    config,
    system_type: args.system ? SandySystemType.parse(args.system) : undefined,
    manual:
      manualZ !== undefined && sigma !== undefined
        ? SandyManualPoint.parse({ Z: manualZ, Sigma: sigma })
        : undefined,
  };
}
