import { createServer } from "node:http";
import { createApp } from "./app";
import { resolveStartupConfig } from "./startup-config";
import { log } from "./utils/log";

const runtimeEnv = process.env.NODE_ENV ?? "development";
const startupConfig = resolveStartupConfig(process.env, runtimeEnv);
const app = createApp(startupConfig.diagnostics);
const server = createServer(app);

let shuttingDown = false;
const shutdown = (signal: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  log(`received ${signal}, closing server`, "express");
  server.close((err) => {
    if (err) {
      log(`close failed: ${err.message}`, "express", "stderr");
      process.exit(1);
    }
    process.exit(0);
  });
};

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

server.listen(startupConfig.port, startupConfig.host, () => {
  log(
    `serving on ${startupConfig.host}:${startupConfig.port} ` +
      `(d_crit=${startupConfig.diagnostics.d_crit}, percentile=${startupConfig.diagnostics.percentile})`,
    "express",
  );
});
