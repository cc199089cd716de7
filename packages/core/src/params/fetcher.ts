/**
 * Reconciles the parameter directory against a manifest.
 *
 * Every in-scope entry gets its own task. Tasks verify concurrently; only
 * the download and the check that follows it go through the download gate,
 * one entry at a time. Per-entry failures are collected and returned as a
 * single `ReconcileError`.
 */

import { mkdir, unlink } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "pino";
import type { FetcherConfig } from "../schemas/fetcher-config.js";
import type { ManifestEntry } from "../schemas/manifest.js";
import {
  CheckFailedError,
  FetchFailedError,
  RemoveFailedError,
  combineErrors,
  isNotFoundError,
  type ReconcileError,
} from "../errors/catalog.js";
import { VerificationCache } from "./verification-cache.js";
import { createVerifier, type Verifier } from "./verifier.js";
import { createDownloadGate, type DownloadGate } from "./gate.js";
import { createDownloader, type Downloader } from "./downloader.js";
import type { ProgressSinkFactory } from "./progress.js";
import { isInScope, parseManifest } from "./manifest.js";

export interface ParamFetcherOptions {
  config: Pick<FetcherConfig, "paramDir" | "gatewayUrl" | "trustParams">;
  logger: Logger;
  /** Verified-path memo; pass the same instance to share it between fetchers */
  cache?: VerificationCache;
  gate?: DownloadGate;
  verifier?: Verifier;
  downloader?: Downloader;
  progress?: ProgressSinkFactory;
  /** Custom fetch implementation (for testing) */
  fetchFn?: typeof fetch;
}

interface ReconcileSummary {
  /** Entries that were checked, in manifest order. */
  processed: string[];
  /** `.params` entries left out because of their sector size. */
  skipped: string[];
}

export type ReconcileOutcome =
  | ({ status: "complete" } & ReconcileSummary)
  | ({ status: "failed"; error: ReconcileError } & ReconcileSummary)
  | ({
      status: "cancelled";
      /** Errors recorded before the signal fired; later ones are dropped. */
      error: ReconcileError | null;
    } & ReconcileSummary);

export interface ParamFetcher {
  readonly cache: VerificationCache;

  /**
   * Make every in-scope manifest entry present and verified.
   *
   * @throws when the directory cannot be created or the manifest is invalid
   */
  reconcile(
    signal: AbortSignal,
    manifestBytes: string | Uint8Array,
    requiredSize: number,
  ): Promise<ReconcileOutcome>;

  /**
   * Same as `reconcile`, rejecting with the combined error when any entry
   * failed. A cancelled call with nothing recorded resolves.
   */
  getParams(
    signal: AbortSignal,
    manifestBytes: string | Uint8Array,
    requiredSize: number,
  ): Promise<void>;
}

/** Resolves true when `signal` fires before `work` settles. */
function waitOrAbort(signal: AbortSignal, work: Promise<unknown>): Promise<boolean> {
  if (signal.aborted) return Promise.resolve(true);

  return new Promise((resolve) => {
    const onAbort = () => resolve(true);
    signal.addEventListener("abort", onAbort, { once: true });
    void work.finally(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(false);
    });
  });
}

export function createParamFetcher(options: ParamFetcherOptions): ParamFetcher {
  const { config, logger } = options;
  const paramDir = config.paramDir;
  const cache = options.cache ?? new VerificationCache();
  const gate = options.gate ?? createDownloadGate();
  const verifier =
    options.verifier ??
    createVerifier({ cache, logger, trustParams: config.trustParams });
  const downloader =
    options.downloader ??
    createDownloader({
      gatewayUrl: config.gatewayUrl,
      logger,
      progress: options.progress,
      fetchFn: options.fetchFn,
    });

  async function reconcileEntry(
    signal: AbortSignal,
    entry: ManifestEntry,
    errors: Error[],
  ): Promise<void> {
    const path = join(paramDir, entry.name);

    const existing = await verifier.verify(path, entry);
    if (existing.ok) return;

    // A missing file is the normal first run; anything else is worth a
    // warning but is still handled by fetching.
    if (!(existing.reason === "io-error" && isNotFoundError(existing.error))) {
      logger.warn(
        { path, reason: existing.reason, error: existing.error.message },
        "Pre-fetch verification failed, fetching",
      );
    }

    await gate.run(async () => {
      try {
        await downloader.fetch(signal, path, entry);
      } catch (err) {
        errors.push(new FetchFailedError(path, err));
        return;
      }

      const fetched = await verifier.verify(path, entry);
      if (fetched.ok) return;

      errors.push(new CheckFailedError(path, fetched.error));
      try {
        await unlink(path);
      } catch (err) {
        errors.push(new RemoveFailedError(path, err));
      }
    });
  }

  const fetcher: ParamFetcher = {
    cache,

    async reconcile(signal, manifestBytes, requiredSize) {
      await mkdir(paramDir, { recursive: true });
      const manifest = parseManifest(manifestBytes);

      const errors: Error[] = [];
      const processed: string[] = [];
      const skipped: string[] = [];
      const tasks: Promise<void>[] = [];

      for (const entry of manifest.values()) {
        if (!isInScope(entry.name, entry.requiredSize, requiredSize)) {
          logger.debug(
            { file: entry.name, sectorSize: entry.requiredSize, requiredSize },
            "Skipping parameter file for another sector size",
          );
          skipped.push(entry.name);
          continue;
        }
        processed.push(entry.name);
        tasks.push(
          reconcileEntry(signal, entry, errors).catch((err: unknown) => {
            errors.push(new FetchFailedError(join(paramDir, entry.name), err));
          }),
        );
      }

      const cancelled = await waitOrAbort(signal, Promise.all(tasks));
      const summary = { processed, skipped };

      if (cancelled) {
        logger.info("context closed... shutting down");
        return {
          status: "cancelled",
          error: combineErrors([...errors]),
          ...summary,
        };
      }

      logger.info("parameter and key-fetching complete");
      const error = combineErrors(errors);
      return error === null
        ? { status: "complete", ...summary }
        : { status: "failed", error, ...summary };
    },

    async getParams(signal, manifestBytes, requiredSize) {
      const outcome = await fetcher.reconcile(
        signal,
        manifestBytes,
        requiredSize,
      );
      if (outcome.status !== "complete" && outcome.error !== null) {
        throw outcome.error;
      }
    },
  };

  return fetcher;
}
