/**
 * paramsync fetch <manifest> --sector-size <bytes>
 *
 * Reads a manifest file and reconciles the parameter directory against it.
 * SIGINT/SIGTERM stop the wait; transfers already running are not joined.
 */

import { readFile } from "node:fs/promises";
import { loadConfig } from "@paramsync/core/config";
import { createLogger, type Logger } from "@paramsync/core/logger";
import {
  createLogProgressSink,
  createParamFetcher,
  type ReconcileOutcome,
} from "@paramsync/core/params";

export interface FetchCommandOptions {
  sectorSize: number;
  gateway?: string;
  dir?: string;
}

export interface FetchCommandDeps {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  /** Custom fetch implementation (for testing) */
  fetchFn?: typeof fetch;
  /** Replaces the SIGINT/SIGTERM wiring when given. */
  signal?: AbortSignal;
}

const STOP_SIGNALS = ["SIGINT", "SIGTERM"] as const;

export async function fetchCommand(
  manifestPath: string,
  options: FetchCommandOptions,
  deps?: FetchCommandDeps,
): Promise<ReconcileOutcome> {
  const config = loadConfig({
    env: deps?.env,
    overrides: { paramDir: options.dir, gatewayUrl: options.gateway },
  });
  const logger = deps?.logger ?? createLogger(config.logging);
  const manifestBytes = await readFile(manifestPath);

  const fetcher = createParamFetcher({
    config,
    logger,
    fetchFn: deps?.fetchFn,
    progress: (label) => createLogProgressSink(logger, label),
  });

  const controller = new AbortController();
  const stop = () => controller.abort();
  if (!deps?.signal) {
    for (const name of STOP_SIGNALS) process.once(name, stop);
  }

  logger.info(
    { manifest: manifestPath, paramDir: config.paramDir, sectorSize: options.sectorSize },
    "Reconciling parameter files",
  );

  let outcome: ReconcileOutcome;
  try {
    outcome = await fetcher.reconcile(
      deps?.signal ?? controller.signal,
      manifestBytes,
      options.sectorSize,
    );
  } finally {
    for (const name of STOP_SIGNALS) process.off(name, stop);
  }

  switch (outcome.status) {
    case "complete":
      logger.info(
        { processed: outcome.processed.length, skipped: outcome.skipped.length },
        "All parameter files are present and verified",
      );
      break;
    case "failed":
      logger.error(
        { errors: outcome.error.errors.map((err: Error) => err.message) },
        "Some parameter files could not be fetched",
      );
      break;
    case "cancelled":
      logger.warn(
        { errors: outcome.error?.errors.map((err: Error) => err.message) ?? [] },
        "Parameter fetch cancelled",
      );
      break;
  }

  return outcome;
}

/** Process exit code for an outcome. */
export function exitCodeFor(outcome: ReconcileOutcome): number {
  switch (outcome.status) {
    case "complete":
      return 0;
    case "failed":
      return 1;
    case "cancelled":
      return 130;
  }
}
