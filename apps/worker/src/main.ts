#!/usr/bin/env node
import { parseRuntimeEnv } from "@ingestkit/config";
import { createLogger } from "@ingestkit/logger";
import { createProgram } from "./cli.js";

async function main(): Promise<void> {
  const runtime = parseRuntimeEnv(process.env);
  const logger = createLogger({ level: runtime.logLevel, service: "ingestkit-worker" });
  const controller = new AbortController();

  const shutdown = (signal: NodeJS.Signals): void => {
    logger.warn({ signal }, "Shutting down, aborting the running job");
    controller.abort();
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);

  const program = createProgram({ logger, signal: controller.signal }, (code) => {
    process.exitCode = code;
  });
  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  console.error("[ingestkit-worker] Fatal error:", err);
  process.exit(1);
});
