#!/usr/bin/env -S tsx
import fs from "node:fs/promises";
import path from "node:path";
import { log } from "../server/utils/log";
import {
  DEFAULT_DATASET_PATH,
  buildSandyRunOptions,
  loadSandyDataset,
  parseSandyCliArgs,
  runSandyDataset,
} from "../tools/sandy-diagnostics-runner";

async function main() {
  const args = parseSandyCliArgs(process.argv.slice(2));
  const options = buildSandyRunOptions(args);
  const datasetPath = path.resolve(args.dataset ?? DEFAULT_DATASET_PATH);
  const columns = await loadSandyDataset(datasetPath);
  const report = runSandyDataset(columns, options);

  log(
    `${report.mode} ${datasetPath}: ${report.sample_count} samples, ` +
      `${report.phase0.flagged_count} phase-0 flags, ${report.warnings.length} warnings`,
    "sandy-cli",
    "stderr",
  );

  if (args.out) {
    const outPath = path.resolve(args.out);
    await fs.writeFile(outPath, JSON.stringify(report, null, 2));
    log(`wrote report to ${outPath}`, "sandy-cli", "stderr");
  }

  console.log(JSON.stringify(report, null, 2));
}

main().catch((err) => {
  log(err instanceof Error ? err.message : String(err), "sandy-cli", "stderr");
  process.exit(1);
});
