#!/usr/bin/env tsx
/**
 * hd-funder entry point.
 *
 * Exit codes: 0 success, 1 fatal (bad configuration, unrecoverable send
 * failure or crash), 2 usage error.
 */

import "dotenv/config";
import { ZodError } from "zod";
import { USAGE, parseCliArgs } from "./args.js";
import { loadConfig, redactConfig, type AppConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { EXIT_FATAL, EXIT_OK, EXIT_USAGE, runMode } from "./run.js";
import { createRuntime } from "./runtime.js";

async function main(argv: readonly string[]): Promise<number> {
  const args = parseCliArgs(argv);
  if (args.kind === "help") {
    process.stdout.write(USAGE);
    return EXIT_OK;
  }
  if (args.kind === "usage-error") {
    process.stderr.write(`${args.message}\n\n${USAGE}`);
    return EXIT_USAGE;
  }

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err: unknown) {
    if (err instanceof ZodError) {
      for (const issue of err.issues) {
        process.stderr.write(`Invalid configuration: ${issue.path.join(".")}: ${issue.message}\n`);
      }
      return EXIT_FATAL;
    }
    throw err;
  }

  const logger = createLogger(config);
  logger.info({ mode: args.mode, config: redactConfig(config) }, "starting");

  const runtime = await createRuntime(config, logger);
  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, "shutdown signal received, finishing current work");
    controller.abort();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  try {
    return await runMode(
      runtime.engine,
      args.mode,
      controller.signal,
      (line) => process.stdout.write(`${line}\n`),
      logger,
    );
  } finally {
    process.off("SIGINT", shutdown);
    process.off("SIGTERM", shutdown);
    await runtime.close();
  }
}

main(process.argv.slice(2))
  .then((code) => {
    process.exit(code);
  })
  .catch((err: unknown) => {
    console.error("Fatal error:", err);
    process.exit(EXIT_FATAL);
  });
